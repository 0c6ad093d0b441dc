import equal from "fast-deep-equal"
import { codecFailure } from "./error"
import type { JSONRecord, JSONValue } from "./json"

/**
 * Checks if a value is an object (typeof === "object" && !== null).
 */
export function isObject(value: unknown): value is object {
  return value !== null && typeof value === "object"
}

/**
 * Checks if a JSON value is a record (an object that is not an array).
 */
export function isRecord(value: JSONValue): value is JSONRecord {
  return isObject(value) && !Array.isArray(value)
}

/**
 * Decodes JSON text, rethrowing decoder failures as `DecodeError`.
 */
export function decodeJson(text: string): JSONValue {
  try {
    const decoded: JSONValue = JSON.parse(text)
    return decoded
  } catch (e) {
    return codecFailure("decode", e)
  }
}

/**
 * Encodes a JSON value, rethrowing encoder failures as `EncodeError`.
 */
export function encodeJson(value: unknown, space?: string | number): string {
  let text: string | undefined
  try {
    text = JSON.stringify(value, undefined, space)
  } catch (e) {
    return codecFailure("encode", e)
  }
  // top-level undefined, functions and symbols have no JSON text
  return text ?? "null"
}

/**
 * Copies an arbitrary value into a fresh JSON tree, going through the encoder so
 * that whatever it refuses (cycles, BigInt) fails here and nothing of the
 * caller's value is shared with the result.
 */
export function toJSONValue(value: unknown): JSONValue {
  return decodeJson(encodeJson(value))
}

/**
 * Checks whether two JSON texts decode to structurally equal values.
 * Member order and whitespace do not matter; array order does.
 */
export function jsonTextEqual(actual: string, expected: string): boolean {
  return equal(decodeJson(actual), decodeJson(expected))
}
