import * as Data from "effect/Data"
import * as Either from "effect/Either"
import { dual } from "effect/Function"

import type { JsonType } from "./json.js"

// CHANGE: model cursors as structural values with a canonical composition form
// WHY: a cursor computed during traversal must equal the same path written by hand
// QUOTE(TZ): "Cursors are serializable"
// REF: req-cursor-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a,b,c: andThen(andThen(a,b),c) = andThen(a,andThen(b,c)) ∧ andThen(identity,a) = a = andThen(a,identity)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Compose.next is always a single step; Identity never occurs inside a Compose
// COMPLEXITY: andThen O(|that|), steps O(n)

export class Identity extends Data.TaggedClass("Identity")<{}> {}

export class Field extends Data.TaggedClass("Field")<{ readonly name: string }> {}

export class Element extends Data.TaggedClass("Element")<{ readonly index: number }> {}

export class Filter extends Data.TaggedClass("Filter")<{ readonly type: JsonType }> {}

export class Compose extends Data.TaggedClass("Compose")<{
  readonly prev: JsonCursor
  readonly next: Step
}> {}

export type Step = Field | Element | Filter

export type JsonCursor = Identity | Step | Compose

export const identity: JsonCursor = new Identity()

export const field = (name: string): JsonCursor => new Field({ name })

export const element = (index: number): JsonCursor => new Element({ index })

export const filter = (type: JsonType): JsonCursor => new Filter({ type })

/** Sequential composition (`self >>> that`). */
export const andThen: {
  (that: JsonCursor): (self: JsonCursor) => JsonCursor
  (self: JsonCursor, that: JsonCursor): JsonCursor
} = dual(2, (self: JsonCursor, that: JsonCursor): JsonCursor => {
  switch (that._tag) {
    case "Identity":
      return self
    case "Compose":
      return new Compose({ prev: andThen(self, that.prev), next: that.next })
    default:
      return self._tag === "Identity" ? that : new Compose({ prev: self, next: that })
  }
})

export const path = (...cursors: ReadonlyArray<JsonCursor>): JsonCursor =>
  cursors.reduce<JsonCursor>((acc, cursor) => andThen(acc, cursor), identity)

export const downField: {
  (name: string): (self: JsonCursor) => JsonCursor
  (self: JsonCursor, name: string): JsonCursor
} = dual(2, (self: JsonCursor, name: string): JsonCursor => andThen(self, field(name)))

export const downElement: {
  (index: number): (self: JsonCursor) => JsonCursor
  (self: JsonCursor, index: number): JsonCursor
} = dual(2, (self: JsonCursor, index: number): JsonCursor => andThen(self, element(index)))

export const isNull = (self: JsonCursor): JsonCursor => andThen(self, filter("Null"))
export const isBoolean = (self: JsonCursor): JsonCursor => andThen(self, filter("Bool"))
export const isNumber = (self: JsonCursor): JsonCursor => andThen(self, filter("Num"))
export const isString = (self: JsonCursor): JsonCursor => andThen(self, filter("Str"))
export const isArray = (self: JsonCursor): JsonCursor => andThen(self, filter("Arr"))
export const isObject = (self: JsonCursor): JsonCursor => andThen(self, filter("Obj"))

/** Flatten a cursor into the single steps it applies, first step first. */
export const steps = (cursor: JsonCursor): ReadonlyArray<Step> => {
  const result: Array<Step> = []
  let current = cursor
  while (current._tag === "Compose") {
    result.push(current.next)
    current = current.prev
  }
  if (current._tag !== "Identity") {
    result.push(current)
  }
  return result.reverse()
}

const identifierPattern = /^[A-Za-z_$][\w$]*$/u

const quoteName = (name: string): string => {
  let out = "\""
  for (const char of name) {
    if (char === "\"" || char === "\\") {
      out += `\\${char}`
    } else {
      out += char
    }
  }
  return `${out}"`
}

const renderStep = (step: Step): string => {
  switch (step._tag) {
    case "Field":
      return identifierPattern.test(step.name) ? `.${step.name}` : `[${quoteName(step.name)}]`
    case "Element":
      return `[${step.index}]`
    case "Filter":
      return `<${step.type}>`
  }
}

/**
 * Render a cursor as path text, e.g. `.entities<Obj>.hashtags<Arr>[1]`.
 * The identity cursor renders as the empty string.
 *
 * @pure true
 * @invariant parse(render(c)) = Right(c)
 */
export const render = (cursor: JsonCursor): string => steps(cursor).map(renderStep).join("")

export type CursorSyntaxError = {
  readonly _tag: "CursorSyntaxError"
  readonly input: string
  readonly position: number
  readonly message: string
}

const syntaxError = (input: string, position: number, detail: string): CursorSyntaxError => ({
  _tag: "CursorSyntaxError",
  input,
  position,
  message: `Invalid cursor '${input}' at ${position}: ${detail}`
})

const jsonTypes: ReadonlyArray<JsonType> = ["Null", "Bool", "Num", "Str", "Arr", "Obj"]

const parseJsonType = (value: string): JsonType | undefined => jsonTypes.find((type) => type === value)

interface Parsed {
  readonly step: Step
  readonly next: number
}

const readIdentifier = (input: string, start: number): number => {
  let end = start
  while (end < input.length && /[\w$]/u.test(input.charAt(end))) {
    end += 1
  }
  return end
}

const parseQuoted = (input: string, start: number): Either.Either<Parsed, CursorSyntaxError> => {
  let name = ""
  let index = start + 1
  while (index < input.length) {
    const char = input.charAt(index)
    if (char === "\\") {
      name += input.charAt(index + 1)
      index += 2
    } else if (char === "\"") {
      if (input.charAt(index + 1) !== "]") {
        return Either.left(syntaxError(input, index + 1, "expected ']'"))
      }
      return Either.right({ step: new Field({ name }), next: index + 2 })
    } else {
      name += char
      index += 1
    }
  }
  return Either.left(syntaxError(input, index, "unterminated field name"))
}

const parseBracket = (input: string, start: number): Either.Either<Parsed, CursorSyntaxError> => {
  if (input.charAt(start + 1) === "\"") {
    return parseQuoted(input, start + 1)
  }
  const close = input.indexOf("]", start)
  const digits = close === -1 ? "" : input.slice(start + 1, close)
  if (!/^\d+$/u.test(digits)) {
    return Either.left(syntaxError(input, start, "expected an element index"))
  }
  return Either.right({ step: new Element({ index: Number(digits) }), next: close + 1 })
}

const parseStep = (input: string, start: number): Either.Either<Parsed, CursorSyntaxError> => {
  const char = input.charAt(start)
  if (char === ".") {
    const end = readIdentifier(input, start + 1)
    if (end === start + 1) {
      return Either.left(syntaxError(input, start, "expected a field name"))
    }
    return Either.right({ step: new Field({ name: input.slice(start + 1, end) }), next: end })
  }
  if (char === "[") {
    return parseBracket(input, start)
  }
  if (char === "<") {
    const close = input.indexOf(">", start)
    const type = close === -1 ? undefined : parseJsonType(input.slice(start + 1, close))
    if (type === undefined) {
      return Either.left(syntaxError(input, start, "expected one of Null, Bool, Num, Str, Arr, Obj"))
    }
    return Either.right({ step: new Filter({ type }), next: close + 1 })
  }
  return Either.left(syntaxError(input, start, `unexpected '${char}'`))
}

/**
 * Parse path text produced by {@link render}.
 *
 * @pure true
 * @complexity O(n)
 */
export const parse = (input: string): Either.Either<JsonCursor, CursorSyntaxError> => {
  const text = input.trim()
  let cursor: JsonCursor = identity
  let index = 0
  while (index < text.length) {
    const parsed = parseStep(text, index)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    cursor = andThen(cursor, parsed.right.step)
    index = parsed.right.next
  }
  return Either.right(cursor)
}
