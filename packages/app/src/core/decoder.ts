import * as Either from "effect/Either"
import { dual } from "effect/Function"
import * as Option from "effect/Option"

import type { Json, JsonField } from "./json.js"
import { JsonArr, JsonObj, Null, bool, num, str } from "./json.js"
import * as Lexer from "./lexer.js"
import type { RetractReader } from "./reader.js"
import { StringReader } from "./reader.js"
import * as Trace from "./trace.js"

// CHANGE: implement streaming decoders that fail with a located trace
// WHY: malformed input is reported with its exact path and never yields a partial value
// QUOTE(TZ): "the whole input must be consumed apart from trailing whitespace"
// REF: req-decoder-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d,s: decode(d, s) = Left(e) → e.trace locates the failing token
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: UnsafeJson never escapes decode()
// COMPLEXITY: O(n) in input size

export interface Decoder<A> {
  readonly unsafeDecode: (trace: Trace.Trace, input: RetractReader) => A
  /** Value for an object field that never appeared; fails unless overridden. */
  readonly unsafeDecodeMissing: (trace: Trace.Trace) => A
}

const missing = (trace: Trace.Trace): never => Trace.fail(trace, "missing")

export const make = <A>(
  unsafeDecode: (trace: Trace.Trace, input: RetractReader) => A,
  unsafeDecodeMissing: (trace: Trace.Trace) => A = missing
): Decoder<A> => ({ unsafeDecode, unsafeDecodeMissing })

/**
 * Decode a complete document. Only whitespace may follow the value.
 *
 * @pure true
 * @invariant Left carries the innermost-first trace of the first failure
 */
export const decode: {
  (text: string): <A>(self: Decoder<A>) => Either.Either<A, Trace.DecodeError>
  <A>(self: Decoder<A>, text: string): Either.Either<A, Trace.DecodeError>
} = dual(2, <A>(self: Decoder<A>, text: string): Either.Either<A, Trace.DecodeError> => {
  const input = new StringReader(text)
  try {
    const value = self.unsafeDecode(Trace.root, input)
    Lexer.end(Trace.root, input)
    return Either.right(value)
  } catch (error) {
    if (error instanceof Trace.UnsafeJson) {
      return Either.left(Trace.decodeError(error.trace))
    }
    throw error
  }
})

export const map: {
  <A, B>(f: (value: A) => B): (self: Decoder<A>) => Decoder<B>
  <A, B>(self: Decoder<A>, f: (value: A) => B): Decoder<B>
} = dual(2, <A, B>(self: Decoder<A>, f: (value: A) => B): Decoder<B> =>
  make(
    (trace, input) => f(self.unsafeDecode(trace, input)),
    (trace) => f(self.unsafeDecodeMissing(trace))
  ))

/** Post-decode validation; a `Left` message is appended to the trace. */
export const mapOrFail: {
  <A, B>(f: (value: A) => Either.Either<B, string>): (self: Decoder<A>) => Decoder<B>
  <A, B>(self: Decoder<A>, f: (value: A) => Either.Either<B, string>): Decoder<B>
} = dual(2, <A, B>(self: Decoder<A>, f: (value: A) => Either.Either<B, string>): Decoder<B> => {
  const check = (trace: Trace.Trace, value: A): B =>
    Either.match(f(value), {
      onLeft: (text) => Trace.fail(trace, text),
      onRight: (mapped) => mapped
    })
  return make(
    (trace, input) => check(trace, self.unsafeDecode(trace, input)),
    (trace) => check(trace, self.unsafeDecodeMissing(trace))
  )
})

/** Invariant map; decoding only needs `f`, `g` belongs to the encoding side. */
export const xmap: {
  <A, B>(f: (value: A) => B, g: (value: B) => A): (self: Decoder<A>) => Decoder<B>
  <A, B>(self: Decoder<A>, f: (value: A) => B, g: (value: B) => A): Decoder<B>
} = dual(3, <A, B>(self: Decoder<A>, f: (value: A) => B, _g: (value: B) => A): Decoder<B> => map(self, f))

/** Defers construction, for recursive structures. */
export const lazy = <A>(f: () => Decoder<A>): Decoder<A> =>
  make(
    (trace, input) => f().unsafeDecode(trace, input),
    (trace) => f().unsafeDecodeMissing(trace)
  )

export const string: Decoder<string> = make(Lexer.string)

export const boolean: Decoder<boolean> = make(Lexer.boolean)

const nonFinite = (trace: Trace.Trace, text: string): number => {
  switch (text) {
    case "NaN":
      return Number.NaN
    case "Infinity":
      return Number.POSITIVE_INFINITY
    case "-Infinity":
      return Number.NEGATIVE_INFINITY
    default:
      return Trace.fail(trace, `expected a number got '"${text}"'`)
  }
}

/** Accepts numeric literals and the quoted `NaN`/`Infinity`/`-Infinity` the number encoder emits. */
export const number: Decoder<number> = make((trace, input) => {
  if (Lexer.nextNonWhitespace(trace, input) === "\"") {
    return nonFinite(trace, Lexer.stringBody(trace, input))
  }
  input.retract()
  return Lexer.number(trace, input)
})

export const int: Decoder<number> = mapOrFail(
  number,
  (value) => Number.isInteger(value) ? Either.right(value) : Either.left(`expected an integer got ${value}`)
)

export const bigint: Decoder<bigint> = make((trace, input) => {
  const text = Lexer.numberText(trace, input)
  return /^-?\d+$/u.test(text) ? BigInt(text) : Trace.fail(trace, `expected an integer got ${text}`)
})

/** `null` and absent fields decode to `None`. */
export const option = <A>(self: Decoder<A>): Decoder<Option.Option<A>> =>
  make(
    (trace, input) => Lexer.skipNull(trace, input) ? Option.none() : Option.some(self.unsafeDecode(trace, input)),
    () => Option.none()
  )

export const array = <A>(self: Decoder<A>): Decoder<ReadonlyArray<A>> =>
  make((trace, input) => {
    Lexer.char(trace, input, "[")
    const values: Array<A> = []
    if (Lexer.firstArray(trace, input)) {
      do {
        values.push(self.unsafeDecode(Trace.push(trace, Trace.arrayAccess(values.length)), input))
      } while (Lexer.nextArray(trace, input))
    }
    return values
  })

/** Interprets JSON object keys. */
export interface FieldDecoder<K> {
  readonly unsafeDecodeField: (trace: Trace.Trace, key: string) => K
}

export const fieldString: FieldDecoder<string> = { unsafeDecodeField: (_trace, key) => key }

export const fieldNumber: FieldDecoder<number> = {
  unsafeDecodeField: (trace, key) =>
    /^-?\d+$/u.test(key) ? Number(key) : Trace.fail(trace, `expected an integer key got '${key}'`)
}

export const mapField = <K, B>(self: FieldDecoder<K>, f: (key: K) => B): FieldDecoder<B> => ({
  unsafeDecodeField: (trace, key) => f(self.unsafeDecodeField(trace, key))
})

export const keyList = <K, A>(
  key: FieldDecoder<K>,
  value: Decoder<A>
): Decoder<ReadonlyArray<readonly [K, A]>> =>
  make((trace, input) => {
    Lexer.char(trace, input, "{")
    const entries: Array<readonly [K, A]> = []
    if (Lexer.firstObject(trace, input)) {
      do {
        const name = Lexer.string(trace, input)
        Lexer.char(trace, input, ":")
        const entryTrace = Trace.push(trace, Trace.objectAccess(name))
        const decodedKey = key.unsafeDecodeField(entryTrace, name)
        entries.push([decodedKey, value.unsafeDecode(entryTrace, input)])
      } while (Lexer.nextObject(trace, input))
    }
    return entries
  })

export const readonlyMap = <K, A>(key: FieldDecoder<K>, value: Decoder<A>): Decoder<ReadonlyMap<K, A>> =>
  map(keyList(key, value), (entries) => new Map(entries))

export const record = <A>(value: Decoder<A>): Decoder<Readonly<Record<string, A>>> =>
  map(keyList(fieldString, value), (entries) => Object.fromEntries(entries))

export const either = <L, R>(left: Decoder<L>, right: Decoder<R>): Decoder<Either.Either<R, L>> =>
  make((trace, input) => {
    Lexer.char(trace, input, "{")
    const name = Lexer.string(trace, input)
    Lexer.char(trace, input, ":")
    const entryTrace = Trace.push(trace, Trace.objectAccess(name))
    const result = name === "Left"
      ? Either.left(left.unsafeDecode(entryTrace, input))
      : name === "Right"
      ? Either.right(right.unsafeDecode(entryTrace, input))
      : Trace.fail(trace, "expected 'Left' or 'Right'")
    Lexer.char(trace, input, "}")
    return result
  })

const decodeJson = (trace: Trace.Trace, input: RetractReader): Json => {
  const got = Lexer.nextNonWhitespace(trace, input)
  switch (got) {
    case "{": {
      const fields: Array<JsonField> = []
      if (Lexer.firstObject(trace, input)) {
        do {
          const name = Lexer.string(trace, input)
          Lexer.char(trace, input, ":")
          fields.push([name, decodeJson(Trace.push(trace, Trace.objectAccess(name)), input)])
        } while (Lexer.nextObject(trace, input))
      }
      return new JsonObj(fields)
    }
    case "[": {
      const elements: Array<Json> = []
      if (Lexer.firstArray(trace, input)) {
        do {
          elements.push(decodeJson(Trace.push(trace, Trace.arrayAccess(elements.length)), input))
        } while (Lexer.nextArray(trace, input))
      }
      return new JsonArr(elements)
    }
    case "\"":
      return str(Lexer.stringBody(trace, input))
    case "t":
    case "f":
      input.retract()
      return bool(Lexer.boolean(trace, input))
    case "n":
      input.retract()
      Lexer.nullLiteral(trace, input)
      return Null
    default:
      input.retract()
      return num(Lexer.number(trace, input))
  }
}

/** Parses any value into the AST, keeping key order and duplicate keys. */
export const json: Decoder<Json> = make(decodeJson)
