import type { FieldMatcher } from "./field-matcher.js"
import type { RetractReader } from "./reader.js"
import type { Trace } from "./trace.js"
import { fail } from "./trace.js"

// CHANGE: provide the token-level primitives decoders are written against
// WHY: decoders consume input incrementally and never build intermediate trees
// QUOTE(TZ): "the lexer raises \"unexpected end of input\""
// REF: req-lexer-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ JsonText: skipValue consumes exactly the characters of v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: failures carry the caller's trace plus a terminal message
// COMPLEXITY: O(n) in consumed characters

const isWhitespace = (char: string): boolean => char === " " || char === "\n" || char === "\r" || char === "\t"

const show = (char: string | undefined): string => char === undefined ? "end of input" : `'${char}'`

export const next = (trace: Trace, input: RetractReader): string => {
  const got = input.read()
  return got === undefined ? fail(trace, "unexpected end of input") : got
}

export const nextNonWhitespace = (trace: Trace, input: RetractReader): string => {
  let current = next(trace, input)
  while (isWhitespace(current)) {
    current = next(trace, input)
  }
  return current
}

export const char = (trace: Trace, input: RetractReader, expected: string): void => {
  const got = nextNonWhitespace(trace, input)
  if (got !== expected) {
    fail(trace, `expected '${expected}' got '${got}'`)
  }
}

const readLiteral = (trace: Trace, input: RetractReader, rest: string): void => {
  for (const expected of rest) {
    const got = input.read()
    if (got !== expected) {
      fail(trace, `expected '${expected}' got ${show(got)}`)
    }
  }
}

/** Call after `{`: true when at least one entry follows. */
export const firstObject = (trace: Trace, input: RetractReader): boolean => {
  if (nextNonWhitespace(trace, input) === "}") {
    return false
  }
  input.retract()
  return true
}

/** Consumes `,` (true) or `}` (false). */
export const nextObject = (trace: Trace, input: RetractReader): boolean => {
  const got = nextNonWhitespace(trace, input)
  if (got === ",") {
    return true
  }
  if (got === "}") {
    return false
  }
  return fail(trace, `expected ',' or '}' got '${got}'`)
}

export const firstArray = (trace: Trace, input: RetractReader): boolean => {
  if (nextNonWhitespace(trace, input) === "]") {
    return false
  }
  input.retract()
  return true
}

export const nextArray = (trace: Trace, input: RetractReader): boolean => {
  const got = nextNonWhitespace(trace, input)
  if (got === ",") {
    return true
  }
  if (got === "]") {
    return false
  }
  return fail(trace, `expected ',' or ']' got '${got}'`)
}

const escapes: Readonly<Record<string, string>> = {
  "\"": "\"",
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t"
}

const readUnicodeEscape = (trace: Trace, input: RetractReader): string => {
  let hex = ""
  for (let index = 0; index < 4; index += 1) {
    hex += next(trace, input)
  }
  if (!/^[0-9a-fA-F]{4}$/u.test(hex)) {
    return fail(trace, `invalid unicode escape '\\u${hex}'`)
  }
  return String.fromCharCode(Number.parseInt(hex, 16))
}

/** Reads the rest of a string whose opening quote was already consumed. */
export const stringBody = (trace: Trace, input: RetractReader): string => {
  let result = ""
  for (;;) {
    const got = next(trace, input)
    if (got === "\"") {
      return result
    }
    if (got === "\\") {
      const escape = next(trace, input)
      if (escape === "u") {
        result += readUnicodeEscape(trace, input)
      } else {
        const decoded = escapes[escape]
        result += decoded === undefined ? fail(trace, `invalid escape '\\${escape}'`) : decoded
      }
    } else if (got < " ") {
      fail(trace, "invalid control in string")
    } else {
      result += got
    }
  }
}

export const string = (trace: Trace, input: RetractReader): string => {
  char(trace, input, "\"")
  return stringBody(trace, input)
}

/** Reads `"key":` and returns the key's position in `matcher`, or -1. */
export const field = (trace: Trace, input: RetractReader, matcher: FieldMatcher): number => {
  const name = string(trace, input)
  char(trace, input, ":")
  return matcher.indexOf(name)
}

/** Reads a string value and returns its position in `matcher`, or -1. */
export const enumeration = (trace: Trace, input: RetractReader, matcher: FieldMatcher): number =>
  matcher.indexOf(string(trace, input))

export const boolean = (trace: Trace, input: RetractReader): boolean => {
  const got = nextNonWhitespace(trace, input)
  if (got === "t") {
    readLiteral(trace, input, "rue")
    return true
  }
  if (got === "f") {
    readLiteral(trace, input, "alse")
    return false
  }
  return fail(trace, `expected a Boolean got '${got}'`)
}

export const nullLiteral = (trace: Trace, input: RetractReader): void => {
  char(trace, input, "n")
  readLiteral(trace, input, "ull")
}

/** Consumes `null` when it is next and reports whether it did. */
export const skipNull = (trace: Trace, input: RetractReader): boolean => {
  if (nextNonWhitespace(trace, input) === "n") {
    readLiteral(trace, input, "ull")
    return true
  }
  input.retract()
  return false
}

const numberPattern = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/u

const isNumberChar = (char: string): boolean => /[-+.eE0-9]/u.test(char)

/** Raw text of a numeric literal, validated against the JSON grammar. */
export const numberText = (trace: Trace, input: RetractReader): string => {
  let text = nextNonWhitespace(trace, input)
  for (;;) {
    const got = input.read()
    if (got === undefined) {
      break
    }
    if (!isNumberChar(got)) {
      input.retract()
      break
    }
    text += got
  }
  if (!numberPattern.test(text)) {
    return fail(trace, `expected a number got '${text}'`)
  }
  return text
}

export const number = (trace: Trace, input: RetractReader): number => Number(numberText(trace, input))

/** Consumes one complete value without decoding it. */
export const skipValue = (trace: Trace, input: RetractReader): void => {
  const got = nextNonWhitespace(trace, input)
  switch (got) {
    case "\"":
      stringBody(trace, input)
      return
    case "{":
      if (firstObject(trace, input)) {
        do {
          string(trace, input)
          char(trace, input, ":")
          skipValue(trace, input)
        } while (nextObject(trace, input))
      }
      return
    case "[":
      if (firstArray(trace, input)) {
        do {
          skipValue(trace, input)
        } while (nextArray(trace, input))
      }
      return
    case "t":
      readLiteral(trace, input, "rue")
      return
    case "f":
      readLiteral(trace, input, "alse")
      return
    case "n":
      readLiteral(trace, input, "ull")
      return
    default:
      if (got === "-" || (got >= "0" && got <= "9")) {
        input.retract()
        numberText(trace, input)
        return
      }
      fail(trace, `unexpected '${got}'`)
  }
}

/** Only whitespace may follow a complete document. */
export const end = (trace: Trace, input: RetractReader): void => {
  for (;;) {
    const got = input.read()
    if (got === undefined) {
      return
    }
    if (!isWhitespace(got)) {
      fail(trace, `unexpected trailing content '${got}'`)
    }
  }
}
