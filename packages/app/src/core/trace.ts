import * as List from "effect/List"

// CHANGE: describe decode failure locations as an innermost-first trace
// WHY: a failure names its exact field/element path without re-walking the input
// QUOTE(TZ): "DecodeError carries the ordered trace (innermost first)"
// REF: req-decode-trace-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: render(t) lists steps root-first
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the head of a trace is the innermost step
// COMPLEXITY: prepend O(1), render O(n)

export type JsonError =
  | { readonly _tag: "ObjectAccess"; readonly field: string }
  | { readonly _tag: "ArrayAccess"; readonly index: number }
  | { readonly _tag: "SumType"; readonly name: string }
  | { readonly _tag: "Message"; readonly text: string }

export type Trace = List.List<JsonError>

export const root: Trace = List.empty()

export const objectAccess = (field: string): JsonError => ({ _tag: "ObjectAccess", field })

export const arrayAccess = (index: number): JsonError => ({ _tag: "ArrayAccess", index })

export const sumType = (name: string): JsonError => ({ _tag: "SumType", name })

export const message = (text: string): JsonError => ({ _tag: "Message", text })

export const push = (trace: Trace, step: JsonError): Trace => List.prepend(trace, step)

const renderStep = (step: JsonError): string => {
  switch (step._tag) {
    case "ObjectAccess":
      return `.${step.field}`
    case "ArrayAccess":
      return `[${step.index}]`
    case "SumType":
      return `{${step.name}}`
    case "Message":
      return `(${step.text})`
  }
}

/** Root-first rendering, e.g. `.user.name(expected '"' got '1')`. */
export const render = (trace: Trace): string =>
  List.toArray(List.reverse(trace)).map(renderStep).join("")

/**
 * Raised inside decoders and caught once at the decode boundary, where it
 * becomes a {@link DecodeError}.
 */
export class UnsafeJson extends Error {
  constructor(readonly trace: Trace) {
    super(render(trace))
    this.name = "UnsafeJson"
  }
}

export const fail = (trace: Trace, text: string): never => {
  throw new UnsafeJson(push(trace, message(text)))
}

export type DecodeError = {
  readonly _tag: "DecodeError"
  readonly trace: ReadonlyArray<JsonError>
  readonly message: string
}

export const decodeError = (trace: Trace): DecodeError => ({
  _tag: "DecodeError",
  trace: List.toArray(trace),
  message: render(trace)
})
