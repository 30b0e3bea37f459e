import { describe, expect, it } from "@effect/vitest"
import { Effect, pipe } from "effect"
import * as Either from "effect/Either"
import * as Equal from "effect/Equal"

import * as JsonCursor from "../../src/core/cursor.js"

const hashtag = pipe(
  JsonCursor.field("entities"),
  JsonCursor.isObject,
  JsonCursor.downField("hashtags"),
  JsonCursor.isArray,
  JsonCursor.downElement(1)
)

describe("JsonCursor composition", () => {
  it.effect("is associative and has identity as its unit", () =>
    Effect.sync(() => {
      const a = JsonCursor.field("a")
      const b = JsonCursor.element(2)
      const c = JsonCursor.filter("Str")
      const left = JsonCursor.andThen(JsonCursor.andThen(a, b), c)
      const right = JsonCursor.andThen(a, JsonCursor.andThen(b, c))
      expect(Equal.equals(left, right)).toBe(true)
      expect(Equal.equals(JsonCursor.andThen(JsonCursor.identity, a), a)).toBe(true)
      expect(Equal.equals(JsonCursor.andThen(a, JsonCursor.identity), a)).toBe(true)
    }))

  it.effect("flattens into single steps in application order", () =>
    Effect.sync(() => {
      expect(JsonCursor.steps(hashtag).map((step) => step._tag)).toEqual([
        "Field",
        "Filter",
        "Field",
        "Filter",
        "Element"
      ])
      expect(JsonCursor.steps(JsonCursor.identity)).toEqual([])
    }))

  it.effect("path builds the same cursor as chained andThen", () =>
    Effect.sync(() => {
      const built = JsonCursor.path(
        JsonCursor.field("entities"),
        JsonCursor.filter("Obj"),
        JsonCursor.field("hashtags"),
        JsonCursor.filter("Arr"),
        JsonCursor.element(1)
      )
      expect(Equal.equals(built, hashtag)).toBe(true)
    }))
})

describe("JsonCursor render/parse", () => {
  it.effect("renders path text", () =>
    Effect.sync(() => {
      expect(JsonCursor.render(hashtag)).toBe(".entities<Obj>.hashtags<Arr>[1]")
      expect(JsonCursor.render(JsonCursor.field("a key"))).toBe("[\"a key\"]")
      expect(JsonCursor.render(JsonCursor.identity)).toBe("")
    }))

  it.effect("parses rendered text back to an equal cursor", () =>
    Effect.sync(() => {
      const cursor = JsonCursor.path(JsonCursor.field("say \"hi\""), JsonCursor.element(0), JsonCursor.filter("Null"))
      const parsed = JsonCursor.parse(JsonCursor.render(cursor))
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(Equal.equals(parsed.right, cursor)).toBe(true)
      }
    }))

  it.effect("parses the empty string as identity", () =>
    Effect.sync(() => {
      expect(JsonCursor.parse("")).toEqual(Either.right(JsonCursor.identity))
    }))

  it.effect("reports the failing position", () =>
    Effect.sync(() => {
      const parsed = JsonCursor.parse(".a<Thing>")
      expect(Either.isLeft(parsed)).toBe(true)
      if (Either.isLeft(parsed)) {
        expect(parsed.left.position).toBe(2)
        expect(parsed.left.message).toBe(
          "Invalid cursor '.a<Thing>' at 2: expected one of Null, Bool, Num, Str, Arr, Obj"
        )
      }
    }))

  it.effect("rejects a non-numeric element index", () =>
    Effect.sync(() => {
      const parsed = JsonCursor.parse("[x]")
      expect(Either.isLeft(parsed) ? parsed.left.message : "").toBe(
        "Invalid cursor '[x]' at 0: expected an element index"
      )
    }))
})
