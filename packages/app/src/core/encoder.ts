import type * as Either from "effect/Either"
import { dual } from "effect/Function"
import * as Option from "effect/Option"

import type { Json } from "./json.js"
import type { Indent, Writer } from "./writer.js"
import { bump, colon, compact, pad, pretty, StringWriter } from "./writer.js"

// CHANGE: implement the streaming encoder protocol with contravariant composition
// WHY: typed values render to text without materialising a Json tree
// QUOTE(TZ): "Combinators: contramap(f), xmap(f, g) ..., isNothing preserved through both."
// REF: req-encoder-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e,f,b: encode(contramap(e,f), b) = encode(e, f(b)) ∧ isNothing(contramap(e,f))(b) = isNothing(e)(f(b))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: fields whose encoder reports isNothing are omitted from objects
// COMPLEXITY: O(n) in output size

export interface Encoder<A> {
  readonly unsafeEncode: (value: A, indent: Indent, out: Writer) => void
  readonly isNothing: (value: A) => boolean
}

const never = (): boolean => false

export const make = <A>(
  unsafeEncode: (value: A, indent: Indent, out: Writer) => void,
  isNothing: (value: A) => boolean = never
): Encoder<A> => ({ unsafeEncode, isNothing })

export const encode: {
  <A>(value: A, indent: Indent): (self: Encoder<A>) => string
  <A>(self: Encoder<A>, value: A, indent: Indent): string
} = dual(3, <A>(self: Encoder<A>, value: A, indent: Indent): string => {
  const writer = new StringWriter()
  self.unsafeEncode(value, indent, writer)
  return writer.toString()
})

export const toJson: {
  <A>(encoder: Encoder<A>): (value: A) => string
  <A>(value: A, encoder: Encoder<A>): string
} = dual(2, <A>(value: A, encoder: Encoder<A>): string => encode(encoder, value, compact))

/** Two-space indented rendering. */
export const toJsonPretty: {
  <A>(encoder: Encoder<A>): (value: A) => string
  <A>(value: A, encoder: Encoder<A>): string
} = dual(2, <A>(value: A, encoder: Encoder<A>): string => encode(encoder, value, pretty(0)))

export const contramap: {
  <B, A>(f: (value: B) => A): (self: Encoder<A>) => Encoder<B>
  <A, B>(self: Encoder<A>, f: (value: B) => A): Encoder<B>
} = dual(2, <A, B>(self: Encoder<A>, f: (value: B) => A): Encoder<B> =>
  make(
    (value, indent, out) => self.unsafeEncode(f(value), indent, out),
    (value) => self.isNothing(f(value))
  ))

/**
 * Invariant map. Encoding only ever needs `g`; `f` is accepted so that
 * encoders and decoders share one signature, and is not called here.
 */
export const xmap: {
  <A, B>(f: (value: A) => B, g: (value: B) => A): (self: Encoder<A>) => Encoder<B>
  <A, B>(self: Encoder<A>, f: (value: A) => B, g: (value: B) => A): Encoder<B>
} = dual(3, <A, B>(self: Encoder<A>, _f: (value: A) => B, g: (value: B) => A): Encoder<B> => contramap(self, g))

const escapeChar = (char: string): string => {
  switch (char) {
    case "\"":
      return "\\\""
    case "\\":
      return "\\\\"
    case "\b":
      return "\\b"
    case "\f":
      return "\\f"
    case "\n":
      return "\\n"
    case "\r":
      return "\\r"
    case "\t":
      return "\\t"
    default: {
      const code = char.charCodeAt(0)
      return code < 0x20 ? `\\u${code.toString(16).padStart(4, "0")}` : char
    }
  }
}

export const writeString = (value: string, out: Writer): void => {
  let escaped = "\""
  for (const char of value) {
    escaped += escapeChar(char)
  }
  out.write(`${escaped}"`)
}

const explicit = <A>(render: (value: A) => string): Encoder<A> =>
  make((value, _indent, out) => out.write(render(value)))

export const string: Encoder<string> = make((value, _indent, out) => writeString(value, out))

export const boolean: Encoder<boolean> = explicit((value) => value ? "true" : "false")

/** Non-finite values are emitted quoted, e.g. `"NaN"`. */
export const number: Encoder<number> = explicit((value) =>
  Number.isFinite(value) ? String(value) : `"${String(value)}"`
)

export const bigint: Encoder<bigint> = explicit((value) => value.toString())

/** `None` is nothing: omitted inside objects, `null` anywhere else. */
export const option = <A>(self: Encoder<A>): Encoder<Option.Option<A>> =>
  make(
    (value, indent, out) =>
      Option.match(value, {
        onNone: () => out.write("null"),
        onSome: (inner) => self.unsafeEncode(inner, indent, out)
      }),
    Option.isNone
  )

export const array = <A>(self: Encoder<A>): Encoder<ReadonlyArray<A>> =>
  make((values, indent, out) => {
    out.write("[")
    let first = true
    for (const value of values) {
      if (first) {
        first = false
      } else {
        out.write(Option.isNone(indent) ? "," : ", ")
      }
      self.unsafeEncode(value, indent, out)
    }
    out.write("]")
  })

export const set = <A>(self: Encoder<A>): Encoder<ReadonlySet<A>> =>
  contramap(array(self), (values: ReadonlySet<A>) => [...values])

/** Renders map keys as JSON object keys. */
export interface FieldEncoder<K> {
  readonly unsafeEncodeField: (key: K) => string
}

export const fieldString: FieldEncoder<string> = { unsafeEncodeField: (key) => key }

export const fieldNumber: FieldEncoder<number> = { unsafeEncodeField: (key) => String(key) }

export const contramapField = <K, B>(self: FieldEncoder<K>, f: (key: B) => K): FieldEncoder<B> => ({
  unsafeEncodeField: (key) => self.unsafeEncodeField(f(key))
})

export const xmapField = <K, B>(
  self: FieldEncoder<K>,
  _f: (key: K) => B,
  g: (key: B) => K
): FieldEncoder<B> => contramapField(self, g)

/** A named object member that writes its own value at the given indentation. */
export type Member = readonly [name: string, write: (indent: Indent, out: Writer) => void]

/**
 * Shared object writer for records, maps, the AST and derived products. No
 * members renders `{}` in every mode.
 */
export const writeObject = (members: ReadonlyArray<Member>, indent: Indent, out: Writer): void => {
  if (members.length === 0) {
    out.write("{}")
    return
  }
  const inner = bump(indent)
  out.write("{")
  pad(inner, out)
  members.forEach(([name, write], index) => {
    if (index > 0) {
      out.write(",")
      pad(inner, out)
    }
    writeString(name, out)
    colon(indent, out)
    write(inner, out)
  })
  pad(indent, out)
  out.write("}")
}

/** Entries whose value is nothing are skipped. */
export const writeEntries = <A>(
  entries: Iterable<readonly [string, A]>,
  value: Encoder<A>,
  indent: Indent,
  out: Writer
): void => {
  const members: Array<Member> = []
  for (const [key, entry] of entries) {
    if (!value.isNothing(entry)) {
      members.push([key, (inner, sink) => value.unsafeEncode(entry, inner, sink)])
    }
  }
  writeObject(members, indent, out)
}

export const keyList = <K, A>(
  key: FieldEncoder<K>,
  value: Encoder<A>
): Encoder<ReadonlyArray<readonly [K, A]>> =>
  make((entries, indent, out) =>
    writeEntries(
      entries.map(([k, a]) => [key.unsafeEncodeField(k), a] as const),
      value,
      indent,
      out
    )
  )

export const readonlyMap = <K, A>(key: FieldEncoder<K>, value: Encoder<A>): Encoder<ReadonlyMap<K, A>> =>
  contramap(keyList(key, value), (entries: ReadonlyMap<K, A>) => [...entries])

export const record = <A>(value: Encoder<A>): Encoder<Readonly<Record<string, A>>> =>
  contramap(keyList(fieldString, value), (entries: Readonly<Record<string, A>>) => Object.entries(entries))

export const either = <L, R>(left: Encoder<L>, right: Encoder<R>): Encoder<Either.Either<R, L>> =>
  make((value, indent, out) => {
    const inner = bump(indent)
    out.write("{")
    pad(inner, out)
    if (value._tag === "Left") {
      writeString("Left", out)
      colon(indent, out)
      left.unsafeEncode(value.left, inner, out)
    } else {
      writeString("Right", out)
      colon(indent, out)
      right.unsafeEncode(value.right, inner, out)
    }
    pad(indent, out)
    out.write("}")
  })

/** Encoder for the Json AST itself. */
export const json: Encoder<Json> = make((value, indent, out) => {
  switch (value._tag) {
    case "Null":
      return out.write("null")
    case "Bool":
      return boolean.unsafeEncode(value.value, indent, out)
    case "Num":
      return number.unsafeEncode(value.value, indent, out)
    case "Str":
      return writeString(value.value, out)
    case "Arr":
      return array(json).unsafeEncode(value.elements, indent, out)
    case "Obj":
      return writeEntries(value.fields, json, indent, out)
  }
})
