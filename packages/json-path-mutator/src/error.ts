/**
 * Base class of every error thrown by this library.
 */
export class JsonMutatorError extends Error {
  constructor(msg: string, options?: ErrorOptions) {
    super(msg, options)

    // Set the prototype explicitly for better instanceof support
    Object.setPrototypeOf(this, new.target.prototype)
    this.name = new.target.name
  }
}

/**
 * The path text does not match the path grammar.
 */
export class ParsePathError extends JsonMutatorError {
  constructor(
    msg: string,
    readonly path: string
  ) {
    super(msg)
  }
}

/**
 * A path segment kind (attribute / index) does not match the container it addresses.
 */
export class AddressError extends JsonMutatorError {}

/**
 * An array index is not a valid insertion point.
 */
export class BoundsError extends JsonMutatorError {}

/**
 * The path continues past a scalar value.
 */
export class PathError extends JsonMutatorError {}

export class DecodeError extends JsonMutatorError {}

export class EncodeError extends JsonMutatorError {}

export function addressFailure(container: "object" | "array"): never {
  const by = container === "object" ? "index" : "attribute"
  throw new AddressError(`cannot address content of JSON ${container} by ${by}`)
}

export function boundsFailure(): never {
  throw new BoundsError("out of bounds insertion index")
}

export function pathFailure(): never {
  throw new PathError("invalid path")
}

/**
 * Rethrows an error raised by `JSON.parse` / `JSON.stringify` with the same message.
 */
export function codecFailure(kind: "decode" | "encode", cause: unknown): never {
  const message = cause instanceof Error ? cause.message : String(cause)
  throw kind === "decode"
    ? new DecodeError(message, { cause })
    : new EncodeError(message, { cause })
}
