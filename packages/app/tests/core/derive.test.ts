import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import * as Decoder from "../../src/core/decoder.js"
import * as Derive from "../../src/core/derive.js"
import * as Encoder from "../../src/core/encoder.js"
import { StringWriter, compact, pretty } from "../../src/core/writer.js"

interface User {
  readonly id: number
  readonly name: string
  readonly email: Option.Option<string>
}

type Circle = { readonly _tag: "Circle"; readonly radius: number }
type Square = { readonly _tag: "Square"; readonly side: number }
type Empty = { readonly _tag: "Empty" }
type Shape = Circle | Square | Empty

const userEncoder = Derive.productEncoder<User>((field) => [
  field("id", Encoder.number),
  field("name", Encoder.string, { rename: "full_name" }),
  field("email", Encoder.option(Encoder.string))
])

const userShape = (field: Derive.FieldDecoderBuilder<User>): Derive.ProductShape<User> => {
  const id = field("id", Decoder.number)
  const name = field("name", Decoder.string, { rename: "full_name" })
  const email = field("email", Decoder.option(Decoder.string))
  return {
    fields: [id, name, email],
    construct: () => ({ id: id.get(), name: name.get(), email: email.get() })
  }
}

const userDecoder = Derive.productDecoder(userShape)
const strictUserDecoder = Derive.productDecoder(userShape, { noExtraFields: true })

const circleEncoder = Derive.productEncoder<Circle>((field) => [field("radius", Encoder.number)])
const squareEncoder = Derive.productEncoder<Square>((field) => [field("side", Encoder.number)])
const emptyEncoder = Derive.productEncoder<Empty>(() => [])

const circleDecoder = Derive.productDecoder<Circle>((field) => {
  const radius = field("radius", Decoder.number)
  return { fields: [radius], construct: () => ({ _tag: "Circle", radius: radius.get() }) }
})
const squareDecoder = Derive.productDecoder<Square>((field) => {
  const side = field("side", Decoder.number)
  return { fields: [side], construct: () => ({ _tag: "Square", side: side.get() }) }
})
const emptyDecoder = Derive.productDecoder<Empty>(() => ({ fields: [], construct: () => ({ _tag: "Empty" }) }))

const shapeEncoder = (options?: Derive.SumOptions): Encoder.Encoder<Shape> =>
  Derive.sumEncoder<Shape>((variant) => [
    variant("Circle", circleEncoder),
    variant("Square", squareEncoder),
    variant("Empty", emptyEncoder)
  ], options)

const shapeDecoder = (options?: Derive.SumOptions): Decoder.Decoder<Shape> =>
  Derive.sumDecoder<Shape>((variant) => [
    variant("Circle", circleDecoder),
    variant("Square", squareDecoder),
    variant("Empty", emptyDecoder)
  ], options)

const tagged = { discriminator: "type" }

const failure = <A>(result: Either.Either<A, { readonly message: string }>): string =>
  Either.isLeft(result) ? result.left.message : "decoded"

const ada: User = { id: 1, name: "Ada", email: Option.none() }

describe("Derive products", () => {
  it.effect("encodes fields in declaration order and omits nothing values", () =>
    Effect.sync(() => {
      expect(Encoder.toJson(ada, userEncoder)).toBe("{\"id\":1,\"full_name\":\"Ada\"}")
      expect(Encoder.toJsonPretty({ ...ada, email: Option.some("ada@example.com") }, userEncoder)).toBe(
        "{\n  \"id\" : 1,\n  \"full_name\" : \"Ada\",\n  \"email\" : \"ada@example.com\"\n}"
      )
    }))

  it.effect("encodes a zero-field product as an empty object", () =>
    Effect.sync(() => {
      expect(Encoder.toJson({ _tag: "Empty" }, emptyEncoder)).toBe("{}")
      expect(Encoder.toJsonPretty({ _tag: "Empty" }, emptyEncoder)).toBe("{}")
    }))

  it.effect("decodes in any key order, skipping unknown keys and filling optional fields", () =>
    Effect.sync(() => {
      expect(Decoder.decode(userDecoder, "{\"full_name\":\"Ada\",\"extra\":[1,{}],\"id\":1}")).toEqual(
        Either.right(ada)
      )
    }))

  it.effect("rejects duplicates, missing fields and extra fields", () =>
    Effect.sync(() => {
      expect(failure(Decoder.decode(userDecoder, "{\"id\":1,\"id\":2,\"full_name\":\"x\"}"))).toBe(".id(duplicate)")
      expect(failure(Decoder.decode(userDecoder, "{\"id\":1}"))).toBe(".full_name(missing)")
      expect(failure(Decoder.decode(strictUserDecoder, "{\"id\":1,\"full_name\":\"x\",\"zzz\":0}"))).toBe(
        "(invalid extra field)"
      )
    }))

  it.effect("traces field failures by their JSON name", () =>
    Effect.sync(() => {
      expect(failure(Decoder.decode(userDecoder, "{\"id\":1,\"full_name\":2}"))).toBe(
        ".full_name(expected '\"' got '2')"
      )
    }))

  it.effect("decodes each call with fresh field state", () =>
    Effect.sync(() => {
      const decoder = Decoder.array(userDecoder)
      expect(Decoder.decode(decoder, "[{\"id\":1,\"full_name\":\"a\"},{\"id\":2,\"full_name\":\"b\"}]")).toEqual(
        Either.right([
          { id: 1, name: "a", email: Option.none() },
          { id: 2, name: "b", email: Option.none() }
        ])
      )
    }))

  it.effect("zero-field products skip any value unless extra fields are rejected", () =>
    Effect.sync(() => {
      expect(Decoder.decode(emptyDecoder, "{\"a\":[1]}")).toEqual(Either.right({ _tag: "Empty" }))
      const strict = Derive.productDecoder<Empty>(
        () => ({ fields: [], construct: () => ({ _tag: "Empty" }) }),
        { noExtraFields: true }
      )
      expect(Decoder.decode(strict, " { } ")).toEqual(Either.right({ _tag: "Empty" }))
      expect(failure(Decoder.decode(strict, "{\"a\":1}"))).toBe("(expected '}' got '\"')")
    }))
})

describe("Derive sums without a discriminator", () => {
  it.effect("wraps the variant body under its name", () =>
    Effect.sync(() => {
      expect(Encoder.toJson({ _tag: "Circle", radius: 1 }, shapeEncoder())).toBe("{\"Circle\":{\"radius\":1}}")
      expect(Encoder.toJson({ _tag: "Empty" }, shapeEncoder())).toBe("{\"Empty\":{}}")
      expect(Encoder.toJsonPretty({ _tag: "Circle", radius: 1 }, shapeEncoder())).toBe(
        "{\n  \"Circle\" : {\n    \"radius\" : 1\n  }\n}"
      )
    }))

  it.effect("uses renamed variant names", () =>
    Effect.sync(() => {
      const encoder = Derive.sumEncoder<Shape>((variant) => [
        variant("Circle", circleEncoder, { rename: "round" }),
        variant("Square", squareEncoder),
        variant("Empty", emptyEncoder)
      ])
      expect(Encoder.toJson({ _tag: "Circle", radius: 3 }, encoder)).toBe("{\"round\":{\"radius\":3}}")
    }))

  it.effect("decodes the single recognised key", () =>
    Effect.sync(() => {
      expect(Decoder.decode(shapeDecoder(), "{ \"Square\" : { \"side\" : 2 } }")).toEqual(
        Either.right({ _tag: "Square", side: 2 })
      )
    }))

  it.effect("rejects empty, unknown and multi-key objects", () =>
    Effect.sync(() => {
      expect(failure(Decoder.decode(shapeDecoder(), "{}"))).toBe("(expected non-empty object)")
      expect(failure(Decoder.decode(shapeDecoder(), "{\"Triangle\":{}}"))).toBe("(invalid disambiguator)")
      expect(failure(Decoder.decode(shapeDecoder(), "{\"Circle\":{\"radius\":1},\"Square\":{}}"))).toBe(
        "(expected '}' got ',')"
      )
    }))

  it.effect("traces failures inside the variant", () =>
    Effect.sync(() => {
      expect(failure(Decoder.decode(shapeDecoder(), "{\"Circle\":{\"radius\":\"x\"}}"))).toBe(
        "{Circle}.radius(expected a number got '\"x\"')"
      )
    }))
})

describe("Derive sums with a discriminator", () => {
  it.effect("inserts exactly one comma before a non-empty body", () =>
    Effect.sync(() => {
      expect(Encoder.toJson({ _tag: "Circle", radius: 1 }, shapeEncoder(tagged))).toBe(
        "{\"type\":\"Circle\",\"radius\":1}"
      )
      expect(Encoder.toJsonPretty({ _tag: "Circle", radius: 1 }, shapeEncoder(tagged))).toBe(
        "{\n  \"type\" : \"Circle\",\n  \"radius\" : 1\n}"
      )
    }))

  it.effect("inserts no comma for an empty body", () =>
    Effect.sync(() => {
      expect(Encoder.toJson({ _tag: "Empty" }, shapeEncoder(tagged))).toBe("{\"type\":\"Empty\"}")
      expect(Encoder.toJsonPretty({ _tag: "Empty" }, shapeEncoder(tagged))).toBe("{\n  \"type\" : \"Empty\"\n}")
    }))

  it.effect("decodes when the discriminator is not the first key", () =>
    Effect.sync(() => {
      expect(Decoder.decode(shapeDecoder(tagged), "{\"radius\":2,\"type\":\"Circle\"}")).toEqual(
        Either.right({ _tag: "Circle", radius: 2 })
      )
    }))

  it.effect("decodes variants inside arrays", () =>
    Effect.sync(() => {
      const decoder = Decoder.array(shapeDecoder(tagged))
      expect(Decoder.decode(decoder, "[{\"type\":\"Square\",\"side\":3}, {\"type\":\"Empty\"}]")).toEqual(
        Either.right([{ _tag: "Square", side: 3 }, { _tag: "Empty" }])
      )
    }))

  it.effect("round-trips every variant", () =>
    Effect.sync(() => {
      const shapes: ReadonlyArray<Shape> = [
        { _tag: "Circle", radius: 1.5 },
        { _tag: "Square", side: 2 },
        { _tag: "Empty" }
      ]
      for (const shape of shapes) {
        expect(Decoder.decode(shapeDecoder(tagged), Encoder.toJsonPretty(shape, shapeEncoder(tagged)))).toEqual(
          Either.right(shape)
        )
        expect(Decoder.decode(shapeDecoder(), Encoder.toJson(shape, shapeEncoder()))).toEqual(Either.right(shape))
      }
    }))

  it.effect("rejects a missing or unknown discriminator", () =>
    Effect.sync(() => {
      expect(failure(Decoder.decode(shapeDecoder(tagged), "{\"radius\":2}"))).toBe("(missing hint 'type')")
      expect(failure(Decoder.decode(shapeDecoder(tagged), "{\"type\":\"Hexagon\"}"))).toBe("(invalid disambiguator)")
    }))

  it.effect("traces failures inside the variant", () =>
    Effect.sync(() => {
      expect(failure(Decoder.decode(shapeDecoder(tagged), "{\"type\":\"Square\",\"side\":\"x\"}"))).toBe(
        "{Square}.side(expected a number got '\"x\"')"
      )
    }))
})

describe("NestedWriter", () => {
  it.effect("splices a body written in small chunks", () =>
    Effect.sync(() => {
      const out = new StringWriter()
      const nested = new Derive.NestedWriter(out, compact, compact)
      for (const chunk of ["{", "\"a\"", ":", "1", "}"]) {
        nested.write(chunk)
      }
      expect(out.toString()).toBe(",\"a\":1}")
    }))

  it.effect("indents the closing brace of an empty body", () =>
    Effect.sync(() => {
      const out = new StringWriter()
      new Derive.NestedWriter(out, pretty(2), pretty(1)).write("{}")
      expect(out.toString()).toBe("\n  }")
    }))
})
