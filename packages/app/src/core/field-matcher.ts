// CHANGE: recognise object keys and enum tags against a fixed candidate set
// WHY: field and variant names are resolved to positions once per key
// QUOTE(TZ): "keys are matched through the field matcher"
// REF: req-field-matcher-1
// SOURCE: n/a
// FORMAT THEOREM: ∀m,s: indexOf(m, s) = i ≥ 0 → candidates(m)[i] = s
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the first occurrence of a repeated candidate wins
// COMPLEXITY: O(|s|) per lookup

export class FieldMatcher {
  private readonly positions = new Map<string, number>()

  constructor(readonly candidates: ReadonlyArray<string>) {
    candidates.forEach((candidate, index) => {
      if (!this.positions.has(candidate)) {
        this.positions.set(candidate, index)
      }
    })
  }

  /** Position of `name` among the candidates, or -1. */
  indexOf(name: string): number {
    return this.positions.get(name) ?? -1
  }
}
