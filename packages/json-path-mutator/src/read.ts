import type { JSONValue } from "./json"
import { readAt } from "./mutate"
import { parsePath } from "./path"

/**
 * Reads the value at `path`, or `undefined` when any segment is absent, past the
 * end of an array, or does not match the kind of the value it addresses.
 */
export function readPath(tree: JSONValue, path: string): JSONValue | undefined {
  return readAt(tree, parsePath(path))
}
