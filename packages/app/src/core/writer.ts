import * as Option from "effect/Option"

// CHANGE: define the output sink contract shared by every encoder
// WHY: nested encoders write straight into the caller's sink without intermediate strings
// QUOTE(TZ): "None is compact, Some(n) pretty at level n."
// REF: req-writer-1
// SOURCE: n/a
// FORMAT THEOREM: ∀w: toString(w) = concat(writes(w))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Some(n) indentation pads with exactly 2n spaces
// COMPLEXITY: O(1) amortised per write

export interface Writer {
  readonly write: (chunk: string) => void
}

/** `None` renders compactly; `Some(level)` pretty-prints at that nesting level. */
export type Indent = Option.Option<number>

export const compact: Indent = Option.none()

export const pretty = (level: number): Indent => Option.some(level)

export class StringWriter implements Writer {
  private readonly chunks: Array<string> = []

  readonly write = (chunk: string): void => {
    this.chunks.push(chunk)
  }

  toString(): string {
    return this.chunks.join("")
  }
}

export const bump = (indent: Indent): Indent => Option.map(indent, (level) => level + 1)

export const pad = (indent: Indent, out: Writer): void => {
  if (Option.isSome(indent)) {
    out.write(`\n${" ".repeat(2 * indent.value)}`)
  }
}

/** Key/value separator: `:` compact, ` : ` pretty. */
export const colon = (indent: Indent, out: Writer): void => {
  out.write(Option.isNone(indent) ? ":" : " : ")
}
