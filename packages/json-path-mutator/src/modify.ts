import { Immer } from "immer"
import type { JSONValue } from "./json"
import { createLogger, type Logger } from "./logger"
import { applyMutation, type Mutation } from "./mutations"
import { decodeJson, encodeJson, isObject } from "./utils"

export interface JsonModifierOptions {
  /**
   * Logger receiving a `debug` entry per applied mutation.
   * Default: a pino logger configured from the environment.
   */
  logger?: Logger

  /**
   * Indentation of the produced JSON text, as accepted by `JSON.stringify`.
   * Default: compact output.
   */
  space?: string | number
}

export interface JsonModifier {
  /**
   * Decodes `input`, applies `mutations` in order and encodes the result.
   * The first failing mutation aborts the whole call; later ones are not attempted.
   */
  modify(input: string, ...mutations: readonly Mutation[]): string

  /**
   * Applies `mutations` in order to a tree held by the caller and returns the new
   * tree. The given tree is never modified; unchanged branches are shared.
   */
  applyMutations(tree: JSONValue, ...mutations: readonly Mutation[]): JSONValue
}

// results share branches with the caller's tree, so they must stay writable
const immer = new Immer({ autoFreeze: false })

export function createJsonModifier(options: JsonModifierOptions = {}): JsonModifier {
  const logger = options.logger ?? createLogger()
  const { space } = options

  // folds over a tree this call owns, mutating it in place
  const applyInPlace = (tree: JSONValue, mutations: readonly Mutation[]): JSONValue => {
    let root = tree
    for (const mutation of mutations) {
      try {
        root = applyMutation(root, mutation)
      } catch (err) {
        logger.debug({ err, kind: mutation.kind, path: mutation.path }, "mutation failed")
        throw err
      }
      logger.debug({ kind: mutation.kind, path: mutation.path }, "mutation applied")
    }
    return root
  }

  return {
    modify(input, ...mutations) {
      const tree = decodeJson(input)
      return encodeJson(applyInPlace(tree, mutations), space)
    },

    applyMutations(tree, ...mutations) {
      if (!isObject(tree)) {
        // scalars are immutable, nothing to protect
        return applyInPlace(tree, mutations)
      }
      return immer.produce(tree, (draft: JSONValue) => {
        // container roots are always updated in place, so the returned root is the draft
        applyInPlace(draft, mutations)
      })
    },
  }
}

let defaultModifier: JsonModifier | undefined

function getDefaultModifier(): JsonModifier {
  defaultModifier ??= createJsonModifier()
  return defaultModifier
}

/**
 * Decodes `input`, applies `mutations` in order and encodes the result.
 *
 * @example
 * modify(`{"name":"Perceval"}`, set("manager.titles[0].fr", "Suzerain"))
 * // {"name":"Perceval","manager":{"titles":[{"fr":"Suzerain"}]}}
 */
export function modify(input: string, ...mutations: readonly Mutation[]): string {
  return getDefaultModifier().modify(input, ...mutations)
}

/**
 * Applies `mutations` in order to `tree` without modifying it and returns the new tree.
 */
export function applyMutations(tree: JSONValue, ...mutations: readonly Mutation[]): JSONValue {
  return getDefaultModifier().applyMutations(tree, ...mutations)
}
