import { ParsePathError } from "./error"

/**
 * One step of a path: a member of a JSON object or an element of a JSON array.
 */
export type PathSegment =
  | { readonly kind: "attribute"; readonly name: string }
  | { readonly kind: "index"; readonly index: number }

/**
 * A parsed path. Never empty.
 */
export type Path = readonly PathSegment[]

export function attributeSegment(name: string): PathSegment {
  return { kind: "attribute", name }
}

export function indexSegment(index: number): PathSegment {
  return { kind: "index", index }
}

const pathRegExp = /^(?:[a-zA-Z0-9_-]+|\[[0-9]+\])(?:\.[a-zA-Z0-9_-]+|\[[0-9]+\])*$/

/**
 * Parses a path such as `knights[0].quests[2]`.
 *
 * Attributes are joined by `.`; array indices are written `[n]` right after the
 * previous segment. There is no escaping, so attribute names cannot contain
 * `.` or `[`.
 *
 * @throws ParsePathError when the text is not a valid path.
 */
export function parsePath(text: string): PathSegment[] {
  if (!pathRegExp.test(text)) {
    throw new ParsePathError(
      `cannot parse json path [${JSON.stringify(text)}], it doesn't seem valid`,
      text
    )
  }

  const segments: PathSegment[] = []
  let rest = text
  while (rest !== "") {
    if (rest[0] === ".") {
      rest = rest.slice(1)
    }

    if (rest[0] === "[") {
      const closing = rest.indexOf("]")
      const digits = rest.slice(1, closing)
      const index = Number(digits)
      if (!Number.isSafeInteger(index)) {
        throw new ParsePathError(
          `failed to parse json path: malformed index ${JSON.stringify(digits)}`,
          text
        )
      }
      segments.push(indexSegment(index))
      rest = rest.slice(closing + 1)
      continue
    }

    const end = rest.search(/[.[]/)
    const name = end === -1 ? rest : rest.slice(0, end)
    segments.push(attributeSegment(name))
    rest = end === -1 ? "" : rest.slice(end)
  }

  return segments
}

/**
 * Writes segments back in path syntax. Inverse of `parsePath`.
 */
export function formatPath(segments: Path): string {
  let text = ""
  for (const segment of segments) {
    if (segment.kind === "index") {
      text += `[${segment.index}]`
    } else {
      text += text === "" ? segment.name : `.${segment.name}`
    }
  }
  return text
}
