import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Equal from "effect/Equal"
import * as Hash from "effect/Hash"
import * as HashSet from "effect/HashSet"
import * as Option from "effect/Option"

import * as Json from "../../src/core/json.js"

const entries: ReadonlyArray<Json.JsonField> = [
  ["a", Json.num(1)],
  ["b", Json.str("x")],
  ["c", Json.arr(Json.bool(true), Json.Null)],
  ["d", Json.obj(["inner", Json.num(2)])]
]

const permutations = <A>(items: ReadonlyArray<A>): ReadonlyArray<ReadonlyArray<A>> =>
  items.length <= 1
    ? [items]
    : items.flatMap((item, index) =>
      permutations([...items.slice(0, index), ...items.slice(index + 1)]).map((rest) => [item, ...rest])
    )

describe("Json equality and hashing", () => {
  it.effect("objects are equal and hash alike under every entry permutation", () =>
    Effect.sync(() => {
      const reference = Json.obj(...entries)
      for (const permuted of permutations(entries)) {
        const candidate = Json.obj(...permuted)
        expect(Equal.equals(reference, candidate)).toBe(true)
        expect(Hash.hash(candidate)).toBe(Hash.hash(reference))
      }
    }))

  it.effect("objects with duplicate keys compare as multisets", () =>
    Effect.sync(() => {
      const twice = Json.obj(["k", Json.num(1)], ["k", Json.num(1)])
      const once = Json.obj(["k", Json.num(1)], ["j", Json.num(1)])
      expect(Equal.equals(twice, once)).toBe(false)
      expect(Equal.equals(twice, Json.obj(["k", Json.num(1)], ["k", Json.num(1)]))).toBe(true)
    }))

  it.effect("arrays are order-sensitive in equality and hash", () =>
    Effect.sync(() => {
      const left = Json.arr(Json.str("one"), Json.obj(["two", Json.num(2)]), Json.num(3))
      const right = Json.arr(Json.num(3), Json.str("one"), Json.obj(["two", Json.num(2)]))
      expect(Equal.equals(left, right)).toBe(false)
      expect(Hash.hash(left)).not.toBe(Hash.hash(right))
    }))

  it.effect("values of different variants are never equal", () =>
    Effect.sync(() => {
      const samples: ReadonlyArray<Json.Json> = [
        Json.Null,
        Json.bool(false),
        Json.num(0),
        Json.str(""),
        Json.arr(),
        Json.obj()
      ]
      samples.forEach((left, i) => {
        samples.forEach((right, j) => {
          expect(Equal.equals(left, right)).toBe(i === j)
        })
      })
    }))

  it.effect("NaN numbers are structurally equal", () =>
    Effect.sync(() => {
      expect(Equal.equals(Json.num(Number.NaN), Json.num(Number.NaN))).toBe(true)
    }))

  it.effect("HashSet deduplicates reordered objects", () =>
    Effect.sync(() => {
      const set = HashSet.make(
        Json.obj(["x", Json.num(1)], ["y", Json.num(2)]),
        Json.obj(["y", Json.num(2)], ["x", Json.num(1)])
      )
      expect(HashSet.size(set)).toBe(1)
    }))
})

describe("Json accessors", () => {
  it.effect("reads fields, keys and values in insertion order", () =>
    Effect.sync(() => {
      const value = Json.fromFields([["b", Json.num(1)], ["a", Json.num(2)], ["b", Json.num(3)]])
      expect(Json.keys(value)).toEqual(["b", "a", "b"])
      expect(Json.values(value)).toEqual([Json.num(1), Json.num(2), Json.num(3)])
      expect(Json.getField(value, "b")).toEqual(Option.some(Json.num(1)))
      expect(Json.getField(value, "z")).toEqual(Option.none())
    }))

  it.effect("narrows by variant", () =>
    Effect.sync(() => {
      expect(Json.asString(Json.str("s"))).toEqual(Option.some("s"))
      expect(Json.asNumber(Json.str("s"))).toEqual(Option.none())
      expect(Json.typeOf(Json.arr())).toBe("Arr")
      expect(Json.isType(Json.obj(), "Obj")).toBe(true)
      expect(Json.isJson(Json.Null)).toBe(true)
      expect(Json.typeOf(Json.Null)).toBe("Null")
      expect(Equal.equals(Json.Null, new Json.JsonNull())).toBe(true)
      expect(Json.isJson({ _tag: "Null" })).toBe(false)
      expect(Json.asBoolean(Json.bool(false))).toEqual(Option.some(false))
      expect(Json.asBoolean(Json.num(0))).toEqual(Option.none())
    }))

  it.effect("builds arrays from any iterable", () =>
    Effect.sync(() => {
      const value = Json.fromElements(new Set([Json.num(1), Json.str("b")]))
      expect(value).toEqual(Json.arr(Json.num(1), Json.str("b")))
      expect(Json.asArray(value)).toEqual(Option.some(value))
    }))
})

describe("Json merge", () => {
  it.effect("merges objects recursively and concatenates arrays", () =>
    Effect.sync(() => {
      const left = Json.obj(
        ["name", Json.str("a")],
        ["tags", Json.arr(Json.str("x"))],
        ["nested", Json.obj(["keep", Json.num(1)], ["swap", Json.num(2)])]
      )
      const right = Json.obj(
        ["tags", Json.arr(Json.str("y"))],
        ["nested", Json.obj(["swap", Json.num(3)])],
        ["extra", Json.bool(true)]
      )
      expect(Json.merge(left, right)).toEqual(Json.obj(
        ["name", Json.str("a")],
        ["tags", Json.arr(Json.str("x"), Json.str("y"))],
        ["nested", Json.obj(["keep", Json.num(1)], ["swap", Json.num(3)])],
        ["extra", Json.bool(true)]
      ))
    }))

  it.effect("replaces mismatched variants with the right-hand value", () =>
    Effect.sync(() => {
      expect(Json.merge(Json.arr(Json.num(1)), Json.str("z"))).toEqual(Json.str("z"))
    }))
})

describe("Json plain value conversion", () => {
  it.effect("converts plain data both ways", () =>
    Effect.sync(() => {
      const plain: Json.JsonValue = { id: 1, tags: ["a", null], ok: true }
      const tree = Json.fromJsonValue(plain)
      expect(tree).toEqual(Json.obj(
        ["id", Json.num(1)],
        ["tags", Json.arr(Json.str("a"), Json.Null)],
        ["ok", Json.bool(true)]
      ))
      expect(Json.toJsonValue(tree)).toEqual(plain)
    }))

  it.effect("keeps the last duplicate key when converting to plain data", () =>
    Effect.sync(() => {
      expect(Json.toJsonValue(Json.obj(["k", Json.num(1)], ["k", Json.num(2)]))).toEqual({ k: 2 })
    }))

  it.effect("keeps a __proto__ key as an own property", () =>
    Effect.sync(() => {
      const plain = Json.toJsonValue(Json.obj(["__proto__", Json.obj(["x", Json.num(1)])]))
      expect(Object.keys(plain ?? {})).toEqual(["__proto__"])
      expect(Object.getPrototypeOf(plain)).toBe(Object.prototype)
      expect(Object.getOwnPropertyDescriptor(plain, "__proto__")?.value).toEqual({ x: 1 })
    }))
})
