export {
  AddressError,
  BoundsError,
  DecodeError,
  EncodeError,
  JsonMutatorError,
  ParsePathError,
  PathError,
} from "./error"
export type { JSONObject, JSONPrimitive, JSONRecord, JSONValue } from "./json"
export type { Logger } from "./logger"
export {
  applyMutations,
  createJsonModifier,
  type JsonModifier,
  type JsonModifierOptions,
  modify,
} from "./modify"
export { applyMutation, type Mutation, remove, set } from "./mutations"
export {
  attributeSegment,
  formatPath,
  indexSegment,
  parsePath,
  type Path,
  type PathSegment,
} from "./path"
export { readPath } from "./read"
export { jsonTextEqual } from "./utils"
