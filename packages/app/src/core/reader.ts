// CHANGE: add character readers with one-step retraction and object replay
// WHY: discriminator decoding must re-read an object after finding its tag
// QUOTE(TZ): "rewinds to the opening { and decodes the whole object with the chosen variant decoder"
// REF: req-reader-replay-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r: rewind(r); read*(r) = chars read since r was created, then the rest of the input
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a RecordingReader buffers only what was read through it
// COMPLEXITY: O(1) per character

export interface RetractReader {
  /** Next character, or `undefined` at the end of input. */
  readonly read: () => string | undefined
  /** Step back over the last character read. */
  readonly retract: () => void
}

export class StringReader implements RetractReader {
  private position = 0

  constructor(private readonly input: string) {}

  readonly read = (): string | undefined => {
    if (this.position >= this.input.length) {
      return undefined
    }
    const char = this.input.charAt(this.position)
    this.position += 1
    return char
  }

  readonly retract = (): void => {
    if (this.position > 0) {
      this.position -= 1
    }
  }
}

/**
 * Records everything read through it so that decoding can restart from the
 * point where the recorder was created. Scoped to a single decode call.
 */
export class RecordingReader implements RetractReader {
  private readonly buffer: Array<string> = []
  private position = 0

  constructor(private readonly underlying: RetractReader) {}

  readonly read = (): string | undefined => {
    const buffered = this.buffer[this.position]
    if (buffered !== undefined) {
      this.position += 1
      return buffered
    }
    const char = this.underlying.read()
    if (char !== undefined) {
      this.buffer.push(char)
      this.position += 1
    }
    return char
  }

  readonly retract = (): void => {
    if (this.position > 0) {
      this.position -= 1
    }
  }

  readonly rewind = (): void => {
    this.position = 0
  }
}
