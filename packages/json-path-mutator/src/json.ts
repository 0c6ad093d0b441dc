/**
 * A JSON primitive.
 */
export type JSONPrimitive = null | boolean | number | string

/**
 * A JSON record.
 */
export type JSONRecord = { [k: string]: JSONValue }

/**
 * A JSON container.
 */
export type JSONObject = JSONRecord | JSONValue[]

/**
 * A JSON value, as produced by decoding untyped JSON text.
 */
export type JSONValue = JSONPrimitive | JSONObject
