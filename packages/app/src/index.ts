export * as Codec from "./core/codec.js"
export * as JsonCursor from "./core/cursor.js"
export * as Decoder from "./core/decoder.js"
export * as Derive from "./core/derive.js"
export * as Encoder from "./core/encoder.js"
export * as Json from "./core/json.js"
export * as Lexer from "./core/lexer.js"
export * as Reader from "./core/reader.js"
export * as Trace from "./core/trace.js"
export * as Traversal from "./core/traversal.js"
export * as Writer from "./core/writer.js"
export { FieldMatcher } from "./core/field-matcher.js"
