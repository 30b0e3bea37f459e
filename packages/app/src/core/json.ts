import * as Equal from "effect/Equal"
import { dual } from "effect/Function"
import * as Hash from "effect/Hash"
import * as Option from "effect/Option"

// CHANGE: introduce the immutable Json AST with order-independent object equality
// WHY: let trees built in any key order compare and hash alike
// QUOTE(TZ): "Obj equality is multiset equality over (key, value) pairs"
// REF: req-ast-equality-1
// SOURCE: n/a
// FORMAT THEOREM: ∀o1,o2 ∈ Obj: multiset(o1.fields) = multiset(o2.fields) → o1 = o2 ∧ hash(o1) = hash(o2)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: values of different variants are never equal
// COMPLEXITY: equality O(n²) in object width, hash O(n) cached per node

export type JsonType = "Null" | "Bool" | "Num" | "Str" | "Arr" | "Obj"

export type Json = JsonNull | JsonBool | JsonNum | JsonStr | JsonArr | JsonObj

export type JsonField = readonly [key: string, value: Json]

/** Plain JavaScript JSON data, as produced by `JSON.parse`. */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<JsonValue>
  | { readonly [key: string]: JsonValue }

const sameNumber = (left: number, right: number): boolean =>
  left === right || (Number.isNaN(left) && Number.isNaN(right))

export class JsonNull implements Equal.Equal {
  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof JsonNull
  }

  [Hash.symbol](): number {
    return Hash.string("Null")
  }

  readonly _tag = "Null"
}

export class JsonBool implements Equal.Equal {
  readonly _tag = "Bool"

  constructor(readonly value: boolean) {}

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof JsonBool && that.value === this.value
  }

  [Hash.symbol](): number {
    return Hash.combine(Hash.string(this.value ? "true" : "false"))(Hash.string("Bool"))
  }
}

export class JsonNum implements Equal.Equal {
  readonly _tag = "Num"

  constructor(readonly value: number) {}

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof JsonNum && sameNumber(that.value, this.value)
  }

  [Hash.symbol](): number {
    return Hash.combine(Hash.number(this.value))(Hash.string("Num"))
  }
}

export class JsonStr implements Equal.Equal {
  readonly _tag = "Str"

  constructor(readonly value: string) {}

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof JsonStr && that.value === this.value
  }

  [Hash.symbol](): number {
    return Hash.combine(Hash.string(this.value))(Hash.string("Str"))
  }
}

export class JsonArr implements Equal.Equal {
  readonly _tag = "Arr"

  constructor(readonly elements: ReadonlyArray<Json>) {}

  [Equal.symbol](that: Equal.Equal): boolean {
    if (!(that instanceof JsonArr) || that.elements.length !== this.elements.length) {
      return false
    }
    return this.elements.every((element, index) => {
      const other = that.elements[index]
      return other !== undefined && Equal.equals(element, other)
    })
  }

  [Hash.symbol](): number {
    return Hash.cached(this, Hash.combine(Hash.array(this.elements))(Hash.string("Arr")))
  }
}

export class JsonObj implements Equal.Equal {
  readonly _tag = "Obj"

  constructor(readonly fields: ReadonlyArray<JsonField>) {}

  [Equal.symbol](that: Equal.Equal): boolean {
    if (!(that instanceof JsonObj) || that.fields.length !== this.fields.length) {
      return false
    }
    const claimed = new Array<boolean>(that.fields.length).fill(false)
    for (const [key, value] of this.fields) {
      const index = that.fields.findIndex(([otherKey, otherValue], position) =>
        claimed[position] !== true && otherKey === key && Equal.equals(value, otherValue)
      )
      if (index === -1) {
        return false
      }
      claimed[index] = true
    }
    return true
  }

  // per-pair hashes are summed so that entry order cannot change the result
  [Hash.symbol](): number {
    let sum = 0
    for (const [key, value] of this.fields) {
      sum = (sum + Hash.combine(Hash.hash(value))(Hash.string(key))) | 0
    }
    return Hash.cached(this, Hash.optimize(Hash.combine(sum)(Hash.string("Obj"))))
  }
}

export const Null: Json = new JsonNull()

export const bool = (value: boolean): Json => new JsonBool(value)

export const num = (value: number): Json => new JsonNum(value)

export const str = (value: string): Json => new JsonStr(value)

export const arr = (...elements: ReadonlyArray<Json>): Json => new JsonArr(elements)

export const obj = (...fields: ReadonlyArray<JsonField>): Json => new JsonObj(fields)

export const fromElements = (elements: Iterable<Json>): JsonArr => new JsonArr([...elements])

export const fromFields = (fields: Iterable<JsonField>): JsonObj => new JsonObj([...fields])

export const isJson = (value: unknown): value is Json =>
  value instanceof JsonNull ||
  value instanceof JsonBool ||
  value instanceof JsonNum ||
  value instanceof JsonStr ||
  value instanceof JsonArr ||
  value instanceof JsonObj

export const typeOf = (json: Json): JsonType => json._tag

export const isType: {
  (type: JsonType): (json: Json) => boolean
  (json: Json, type: JsonType): boolean
} = dual(2, (json: Json, type: JsonType): boolean => json._tag === type)

export const asObject = (json: Json): Option.Option<JsonObj> =>
  json._tag === "Obj" ? Option.some(json) : Option.none()

export const asArray = (json: Json): Option.Option<JsonArr> =>
  json._tag === "Arr" ? Option.some(json) : Option.none()

export const asString = (json: Json): Option.Option<string> =>
  json._tag === "Str" ? Option.some(json.value) : Option.none()

export const asNumber = (json: Json): Option.Option<number> =>
  json._tag === "Num" ? Option.some(json.value) : Option.none()

export const asBoolean = (json: Json): Option.Option<boolean> =>
  json._tag === "Bool" ? Option.some(json.value) : Option.none()

/** First value stored under `key`; later duplicates are shadowed. */
export const getField: {
  (key: string): (self: JsonObj) => Option.Option<Json>
  (self: JsonObj, key: string): Option.Option<Json>
} = dual(2, (self: JsonObj, key: string): Option.Option<Json> => {
  const entry = self.fields.find(([name]) => name === key)
  return entry === undefined ? Option.none() : Option.some(entry[1])
})

export const keys = (self: JsonObj): ReadonlyArray<string> => self.fields.map(([key]) => key)

export const values = (self: JsonObj): ReadonlyArray<Json> => self.fields.map(([, value]) => value)

const mergeFields = (
  left: ReadonlyArray<JsonField>,
  right: ReadonlyArray<JsonField>
): ReadonlyArray<JsonField> => {
  const rightByKey = new Map<string, Json>()
  for (const [key, value] of right) {
    if (!rightByKey.has(key)) {
      rightByKey.set(key, value)
    }
  }
  const leftKeys = new Set(left.map(([key]) => key))
  const merged: Array<JsonField> = left.map(([key, value]) => {
    const other = rightByKey.get(key)
    return other === undefined ? [key, value] : [key, merge(value, other)]
  })
  for (const [key, value] of right) {
    if (!leftKeys.has(key)) {
      merged.push([key, value])
    }
  }
  return merged
}

/**
 * Deep merge: objects merge by key, arrays concatenate, anything else is
 * replaced by `that`.
 *
 * @pure true
 * @invariant key order of `self` is kept; new keys of `that` follow
 */
export const merge: {
  (that: Json): (self: Json) => Json
  (self: Json, that: Json): Json
} = dual(2, (self: Json, that: Json): Json => {
  if (self._tag === "Obj" && that._tag === "Obj") {
    return new JsonObj(mergeFields(self.fields, that.fields))
  }
  if (self._tag === "Arr" && that._tag === "Arr") {
    return new JsonArr([...self.elements, ...that.elements])
  }
  return that
})

const isValueRecord = (
  value: JsonValue
): value is { readonly [key: string]: JsonValue } =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const fromJsonValue = (value: JsonValue): Json => {
  if (value === null) {
    return Null
  }
  if (typeof value === "boolean") {
    return bool(value)
  }
  if (typeof value === "number") {
    return num(value)
  }
  if (typeof value === "string") {
    return str(value)
  }
  if (isValueRecord(value)) {
    return new JsonObj(Object.entries(value).map(([key, entry]) => [key, fromJsonValue(entry)]))
  }
  return new JsonArr(value.map((element) => fromJsonValue(element)))
}

/**
 * Convert to plain JavaScript data. Duplicate keys collapse to the last
 * occurrence, as `JSON.parse` does.
 */
export const toJsonValue = (json: Json): JsonValue => {
  switch (json._tag) {
    case "Null":
      return null
    case "Bool":
    case "Num":
    case "Str":
      return json.value
    case "Arr":
      return json.elements.map((element) => toJsonValue(element))
    case "Obj":
      return Object.fromEntries(
        json.fields.map(([key, value]): readonly [string, JsonValue] => [key, toJsonValue(value)])
      )
  }
}
