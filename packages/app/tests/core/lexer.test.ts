import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { FieldMatcher } from "../../src/core/field-matcher.js"
import * as Lexer from "../../src/core/lexer.js"
import { RecordingReader, StringReader } from "../../src/core/reader.js"
import * as Trace from "../../src/core/trace.js"

const readAll = (reader: RecordingReader): string => {
  let text = ""
  for (let char = reader.read(); char !== undefined; char = reader.read()) {
    text += char
  }
  return text
}

const failureOf = (run: () => unknown): string => {
  try {
    run()
    return "no failure"
  } catch (error) {
    return error instanceof Trace.UnsafeJson ? Trace.render(error.trace) : "unexpected error"
  }
}

describe("FieldMatcher", () => {
  it.effect("returns candidate positions, first duplicate winning", () =>
    Effect.sync(() => {
      const matcher = new FieldMatcher(["id", "name", "id"])
      expect(matcher.indexOf("name")).toBe(1)
      expect(matcher.indexOf("id")).toBe(0)
      expect(matcher.indexOf("other")).toBe(-1)
    }))
})

describe("RecordingReader", () => {
  it.effect("replays what it read and then continues with the rest", () =>
    Effect.sync(() => {
      const reader = new RecordingReader(new StringReader("abcdef"))
      expect(reader.read()).toBe("a")
      expect(reader.read()).toBe("b")
      reader.retract()
      expect(reader.read()).toBe("b")
      expect(reader.read()).toBe("c")
      reader.rewind()
      expect(readAll(reader)).toBe("abcdef")
    }))
})

describe("Lexer", () => {
  it.effect("matches field names and enumeration values", () =>
    Effect.sync(() => {
      const matcher = new FieldMatcher(["kind", "size"])
      const input = new StringReader("{ \"size\" : \"kind\" }")
      Lexer.char(Trace.root, input, "{")
      expect(Lexer.firstObject(Trace.root, input)).toBe(true)
      expect(Lexer.field(Trace.root, input, matcher)).toBe(1)
      expect(Lexer.enumeration(Trace.root, input, matcher)).toBe(0)
      expect(Lexer.nextObject(Trace.root, input)).toBe(false)
    }))

  it.effect("skips a complete value and stops at the next token", () =>
    Effect.sync(() => {
      const input = new StringReader("{\"a\":[1,-2.5e3,{\"b\":null}],\"c\":\"x\\\"y\",\"d\":true} ,")
      Lexer.skipValue(Trace.root, input)
      expect(Lexer.nextArray(Trace.root, input)).toBe(true)
    }))

  it.effect("skipNull consumes only null", () =>
    Effect.sync(() => {
      const input = new StringReader(" null 7")
      expect(Lexer.skipNull(Trace.root, input)).toBe(true)
      expect(Lexer.skipNull(Trace.root, input)).toBe(false)
      expect(Lexer.number(Trace.root, input)).toBe(7)
    }))

  it.effect("fails on malformed literals with the caller's trace", () =>
    Effect.sync(() => {
      const trace = Trace.push(Trace.root, Trace.objectAccess("flag"))
      expect(failureOf(() => Lexer.boolean(trace, new StringReader("tru")))).toBe(
        ".flag(expected 'e' got end of input)"
      )
      expect(failureOf(() => Lexer.skipValue(Trace.root, new StringReader("?")))).toBe("(unexpected '?')")
      expect(failureOf(() => Lexer.nextObject(Trace.root, new StringReader("]")))).toBe(
        "(expected ',' or '}' got ']')"
      )
    }))
})
