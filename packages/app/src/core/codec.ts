import type * as Either from "effect/Either"
import { dual } from "effect/Function"
import type * as Option from "effect/Option"

import * as Decoder from "./decoder.js"
import * as Encoder from "./encoder.js"
import type { Json } from "./json.js"
import type { DecodeError } from "./trace.js"

// CHANGE: pair an encoder with a decoder for the same type
// WHY: one value describes both directions so invariant mapping stays consistent
// QUOTE(TZ): "Codec.xmap(f, g) is the one consumer of both directions"
// REF: req-codec-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c,v: fromJson(c, toJson(c, v)) = Right(v) for lossless codecs
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: xmap applies g on the way out and f on the way in
// COMPLEXITY: O(1) construction

export interface Codec<A> {
  readonly encoder: Encoder.Encoder<A>
  readonly decoder: Decoder.Decoder<A>
}

export const make = <A>(encoder: Encoder.Encoder<A>, decoder: Decoder.Decoder<A>): Codec<A> => ({
  encoder,
  decoder
})

export const xmap: {
  <A, B>(f: (value: A) => B, g: (value: B) => A): (self: Codec<A>) => Codec<B>
  <A, B>(self: Codec<A>, f: (value: A) => B, g: (value: B) => A): Codec<B>
} = dual(3, <A, B>(self: Codec<A>, f: (value: A) => B, g: (value: B) => A): Codec<B> =>
  make(Encoder.contramap(self.encoder, g), Decoder.map(self.decoder, f)))

export const toJson: {
  <A>(codec: Codec<A>): (value: A) => string
  <A>(value: A, codec: Codec<A>): string
} = dual(2, <A>(value: A, codec: Codec<A>): string => Encoder.toJson(value, codec.encoder))

export const toJsonPretty: {
  <A>(codec: Codec<A>): (value: A) => string
  <A>(value: A, codec: Codec<A>): string
} = dual(2, <A>(value: A, codec: Codec<A>): string => Encoder.toJsonPretty(value, codec.encoder))

export const fromJson: {
  (text: string): <A>(codec: Codec<A>) => Either.Either<A, DecodeError>
  <A>(codec: Codec<A>, text: string): Either.Either<A, DecodeError>
} = dual(2, <A>(codec: Codec<A>, text: string): Either.Either<A, DecodeError> =>
  Decoder.decode(codec.decoder, text))

export const string: Codec<string> = make(Encoder.string, Decoder.string)

export const boolean: Codec<boolean> = make(Encoder.boolean, Decoder.boolean)

export const number: Codec<number> = make(Encoder.number, Decoder.number)

export const int: Codec<number> = make(Encoder.number, Decoder.int)

export const bigint: Codec<bigint> = make(Encoder.bigint, Decoder.bigint)

export const json: Codec<Json> = make(Encoder.json, Decoder.json)

export const option = <A>(self: Codec<A>): Codec<Option.Option<A>> =>
  make(Encoder.option(self.encoder), Decoder.option(self.decoder))

export const array = <A>(self: Codec<A>): Codec<ReadonlyArray<A>> =>
  make(Encoder.array(self.encoder), Decoder.array(self.decoder))

export const record = <A>(self: Codec<A>): Codec<Readonly<Record<string, A>>> =>
  make(Encoder.record(self.encoder), Decoder.record(self.decoder))

export const either = <L, R>(left: Codec<L>, right: Codec<R>): Codec<Either.Either<R, L>> =>
  make(Encoder.either(left.encoder, right.encoder), Decoder.either(left.decoder, right.decoder))
