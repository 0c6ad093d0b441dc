import { isDraft } from "immer"
import { addressFailure, boundsFailure, PathError, pathFailure } from "./error"
import type { JSONRecord, JSONValue } from "./json"
import type { Path } from "./path"
import { isRecord } from "./utils"

function readMember(record: JSONRecord, name: string): JSONValue | undefined {
  return Object.hasOwn(record, name) ? record[name] : undefined
}

function writeMember(record: JSONRecord, name: string, value: JSONValue): void {
  if (name === "__proto__" && !Object.hasOwn(record, name)) {
    if (isDraft(record)) {
      throw new PathError(`cannot create member "${name}" in a shared tree`)
    }
    // plain assignment would go through the prototype setter
    Object.defineProperty(record, name, {
      value,
      writable: true,
      enumerable: true,
      configurable: true,
    })
    return
  }
  record[name] = value
}

/**
 * Removes the value addressed by `path` from `node` and returns the new node.
 *
 * Removing something that is not there is a no-op: missing members, indices past
 * the end of an array and `null` on the way all leave the tree unchanged.
 * Array elements after a removed one shift down.
 *
 * Containers are updated in place.
 */
export function removeAt(node: JSONValue, path: Path): JSONValue {
  if (path.length === 0 || node === null) {
    return node
  }

  const [head, ...rest] = path
  const isLast = rest.length === 0

  if (Array.isArray(node)) {
    if (head.kind !== "index") {
      addressFailure("array")
    }
    if (head.index >= node.length) {
      return node
    }
    if (isLast) {
      node.splice(head.index, 1)
    } else {
      node[head.index] = removeAt(node[head.index], rest)
    }
    return node
  }

  if (isRecord(node)) {
    if (head.kind !== "attribute") {
      addressFailure("object")
    }
    if (isLast) {
      delete node[head.name]
      return node
    }
    const child = readMember(node, head.name)
    if (child !== undefined) {
      node[head.name] = removeAt(child, rest)
    }
    return node
  }

  return pathFailure()
}

/**
 * Writes `value` at the location addressed by `path` inside `node` and returns
 * the new node.
 *
 * Missing members and `null` values on the way are replaced by a new object or
 * array, depending on the kind of the next segment. An array index may address
 * an existing element or the position right after the last one (append).
 *
 * Containers are updated in place; `value` is installed as is.
 */
export function setAt(node: JSONValue, path: Path, value: JSONValue): JSONValue {
  if (path.length === 0) {
    return value
  }

  const [head, ...rest] = path

  if (node === null) {
    return setAt(head.kind === "attribute" ? {} : [], path, value)
  }

  if (Array.isArray(node)) {
    if (head.kind !== "index") {
      addressFailure("array")
    }
    const { index } = head
    if (index < 0 || index > node.length) {
      boundsFailure()
    }
    const updated = setAt(index < node.length ? node[index] : null, rest, value)
    if (index === node.length) {
      node.push(updated)
    } else {
      node[index] = updated
    }
    return node
  }

  if (isRecord(node)) {
    if (head.kind !== "attribute") {
      addressFailure("object")
    }
    const updated = setAt(readMember(node, head.name) ?? null, rest, value)
    writeMember(node, head.name, updated)
    return node
  }

  return pathFailure()
}

/**
 * Reads the value addressed by `path`, or `undefined` when nothing is there.
 */
export function readAt(node: JSONValue, path: Path): JSONValue | undefined {
  let current: JSONValue | undefined = node
  for (const segment of path) {
    if (current === undefined) {
      return undefined
    }
    if (segment.kind === "index") {
      current = Array.isArray(current) ? current[segment.index] : undefined
    } else {
      current = isRecord(current) ? readMember(current, segment.name) : undefined
    }
  }
  return current
}
