import type { JSONValue } from "./json"
import { removeAt, setAt } from "./mutate"
import { parsePath } from "./path"
import { toJSONValue } from "./utils"

/**
 * A deferred change to a JSON tree.
 * Paths are parsed when the mutation is applied, so a malformed path fails there.
 */
export type Mutation =
  | { readonly kind: "remove"; readonly path: string }
  | { readonly kind: "set"; readonly path: string; readonly value: unknown }

/**
 * Removes the value at `path`. Removing an absent value is a no-op.
 */
export function remove(path: string): Mutation {
  return { kind: "remove", path }
}

/**
 * Sets the value at `path`, creating missing objects and arrays on the way.
 * `value` is copied through the JSON encoder when the mutation is applied.
 */
export function set(path: string, value: unknown): Mutation {
  return { kind: "set", path, value }
}

/**
 * Applies one mutation and returns the new root.
 */
export function applyMutation(tree: JSONValue, mutation: Mutation): JSONValue {
  const path = parsePath(mutation.path)

  switch (mutation.kind) {
    case "remove":
      return removeAt(tree, path)

    case "set":
      return setAt(tree, path, toJSONValue(mutation.value))
  }
}
