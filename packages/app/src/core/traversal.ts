import * as Either from "effect/Either"
import { dual } from "effect/Function"
import * as Option from "effect/Option"

import * as JsonCursor from "./cursor.js"
import type { Json, JsonField, JsonType } from "./json.js"
import { JsonArr, JsonObj, Null } from "./json.js"

// CHANGE: implement cursor navigation, deletion, folds and rewrites over the Json AST
// WHY: every edit returns a new tree and failures are values, never exceptions
// QUOTE(TZ): "returns a new tree with the node at cursor removed"
// REF: req-traversal-1
// SOURCE: n/a
// FORMAT THEOREM: ∀j: delete(j, identity) = Right(Null) ∧ (filter mismatch → delete(j, c) = Right(j))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: input trees are never mutated
// COMPLEXITY: get/delete O(depth · width), folds and transforms O(n)

export type NoSuchField = { readonly _tag: "NoSuchField"; readonly name: string; readonly message: string }
export type IndexOutOfBounds = {
  readonly _tag: "IndexOutOfBounds"
  readonly index: number
  readonly length: number
  readonly message: string
}
export type TypeMismatch = {
  readonly _tag: "TypeMismatch"
  readonly expected: JsonType
  readonly actual: JsonType
  readonly message: string
}

export type NavigationError = NoSuchField | IndexOutOfBounds | TypeMismatch

export const noSuchField = (name: string): NoSuchField => ({
  _tag: "NoSuchField",
  name,
  message: `No such field: '${name}'`
})

export const indexOutOfBounds = (index: number, length: number): IndexOutOfBounds => ({
  _tag: "IndexOutOfBounds",
  index,
  length,
  message: `Index out of bounds: ${index} (length ${length})`
})

export const typeMismatch = (expected: JsonType, actual: JsonType): TypeMismatch => ({
  _tag: "TypeMismatch",
  expected,
  actual,
  message: `Expected ${expected} but found ${actual}`
})

type Navigation<A> = Either.Either<A, NavigationError>

const lookupField = (json: Json, name: string): Navigation<Json> => {
  if (json._tag !== "Obj") {
    return Either.left(typeMismatch("Obj", json._tag))
  }
  const entry = json.fields.find(([key]) => key === name)
  return entry === undefined ? Either.left(noSuchField(name)) : Either.right(entry[1])
}

const lookupElement = (json: Json, index: number): Navigation<Json> => {
  if (json._tag !== "Arr") {
    return Either.left(typeMismatch("Arr", json._tag))
  }
  const found = json.elements[index]
  return found === undefined ? Either.left(indexOutOfBounds(index, json.elements.length)) : Either.right(found)
}

const applyStep = (json: Json, step: JsonCursor.Step): Navigation<Json> => {
  switch (step._tag) {
    case "Field":
      return lookupField(json, step.name)
    case "Element":
      return lookupElement(json, step.index)
    case "Filter":
      return json._tag === step.type ? Either.right(json) : Either.left(typeMismatch(step.type, json._tag))
  }
}

/**
 * Resolve a cursor against a tree.
 *
 * @pure true
 * @invariant the first failing step decides the error
 */
export const get: {
  (cursor: JsonCursor.JsonCursor): (self: Json) => Navigation<Json>
  (self: Json, cursor: JsonCursor.JsonCursor): Navigation<Json>
} = dual(2, (self: Json, cursor: JsonCursor.JsonCursor): Navigation<Json> => {
  let current = self
  for (const step of JsonCursor.steps(cursor)) {
    const next = applyStep(current, step)
    if (Either.isLeft(next)) {
      return next
    }
    current = next.right
  }
  return Either.right(current)
})

const replaceField = (self: JsonObj, name: string, value: Json): JsonObj => {
  let replaced = false
  return new JsonObj(self.fields.map(([key, current]): JsonField => {
    if (!replaced && key === name) {
      replaced = true
      return [key, value]
    }
    return [key, current]
  }))
}

// a remaining path made only of filters deletes the child here when all of them accept it
const onlyFilters = (path: ReadonlyArray<JsonCursor.Step>): boolean => path.every((step) => step._tag === "Filter")

const acceptedBy = (json: Json, path: ReadonlyArray<JsonCursor.Step>): boolean =>
  path.every((step) => step._tag !== "Filter" || step.type === json._tag)

const deleteIn = (json: Json, path: ReadonlyArray<JsonCursor.Step>): Navigation<Json> => {
  const [step, ...rest] = path
  if (step === undefined) {
    return Either.right(Null)
  }
  switch (step._tag) {
    case "Filter":
      return json._tag === step.type ? deleteIn(json, rest) : Either.right(json)
    case "Field": {
      const child = lookupField(json, step.name)
      if (Either.isLeft(child) || json._tag !== "Obj") {
        return child
      }
      if (onlyFilters(rest)) {
        return Either.right(
          acceptedBy(child.right, rest) ? new JsonObj(json.fields.filter(([key]) => key !== step.name)) : json
        )
      }
      return Either.map(deleteIn(child.right, rest), (updated) =>
        updated === child.right ? json : replaceField(json, step.name, updated))
    }
    case "Element": {
      const child = lookupElement(json, step.index)
      if (Either.isLeft(child) || json._tag !== "Arr") {
        return child
      }
      if (onlyFilters(rest)) {
        return Either.right(
          acceptedBy(child.right, rest)
            ? new JsonArr(json.elements.filter((_, index) => index !== step.index))
            : json
        )
      }
      return Either.map(deleteIn(child.right, rest), (updated) =>
        updated === child.right
          ? json
          : new JsonArr(json.elements.map((element, index) => index === step.index ? updated : element)))
    }
  }
}

/**
 * Remove the node a cursor points at, including one reached through filters
 * that accept it. Deleting the root yields `Null`; a filter step that does
 * not match leaves the tree untouched.
 *
 * @pure true
 * @invariant unrelated paths resolve to the same values after deletion
 */
export const remove: {
  (cursor: JsonCursor.JsonCursor): (self: Json) => Navigation<Json>
  (self: Json, cursor: JsonCursor.JsonCursor): Navigation<Json>
} = dual(2, (self: Json, cursor: JsonCursor.JsonCursor): Navigation<Json> => deleteIn(self, JsonCursor.steps(cursor)))

export { remove as delete }

const children = (json: Json): ReadonlyArray<Json> => {
  switch (json._tag) {
    case "Arr":
      return json.elements
    case "Obj":
      return json.fields.map(([, value]) => value)
    default:
      return []
  }
}

/** Post-order fold: children left-to-right, then the node itself. */
export const foldUp: {
  <A>(seed: A, f: (acc: A, json: Json) => A): (self: Json) => A
  <A>(self: Json, seed: A, f: (acc: A, json: Json) => A): A
} = dual(3, <A>(self: Json, seed: A, f: (acc: A, json: Json) => A): A => {
  let acc = seed
  for (const child of children(self)) {
    acc = foldUp(child, acc, f)
  }
  return f(acc, self)
})

/** Pre-order fold: the node itself, then its children left-to-right. */
export const foldDown: {
  <A>(seed: A, f: (acc: A, json: Json) => A): (self: Json) => A
  <A>(self: Json, seed: A, f: (acc: A, json: Json) => A): A
} = dual(3, <A>(self: Json, seed: A, f: (acc: A, json: Json) => A): A => {
  let acc = f(seed, self)
  for (const child of children(self)) {
    acc = foldDown(child, acc, f)
  }
  return acc
})

const mapChildren = (json: Json, f: (child: Json) => Json): Json => {
  switch (json._tag) {
    case "Arr":
      return new JsonArr(json.elements.map(f))
    case "Obj":
      return new JsonObj(json.fields.map(([key, value]): JsonField => [key, f(value)]))
    default:
      return json
  }
}

export const transformDown: {
  (f: (json: Json) => Json): (self: Json) => Json
  (self: Json, f: (json: Json) => Json): Json
} = dual(2, (self: Json, f: (json: Json) => Json): Json => mapChildren(f(self), (child) => transformDown(child, f)))

export const transformUp: {
  (f: (json: Json) => Json): (self: Json) => Json
  (self: Json, f: (json: Json) => Json): Json
} = dual(2, (self: Json, f: (json: Json) => Json): Json => f(mapChildren(self, (child) => transformUp(child, f))))

export type CursorRule = (json: Json, cursor: JsonCursor.JsonCursor) => Option.Option<Json>

const childCursor = (
  parent: JsonCursor.JsonCursor,
  guard: (cursor: JsonCursor.JsonCursor) => JsonCursor.JsonCursor,
  step: JsonCursor.JsonCursor
): JsonCursor.JsonCursor =>
  parent._tag === "Identity" ? step : JsonCursor.andThen(guard(parent), step)

const transformAt = (json: Json, cursor: JsonCursor.JsonCursor, rule: CursorRule): Json => {
  const current = Option.getOrElse(rule(json, cursor), () => json)
  switch (current._tag) {
    case "Arr":
      return new JsonArr(current.elements.map((element, index) =>
        transformAt(element, childCursor(cursor, JsonCursor.isArray, JsonCursor.element(index)), rule)
      ))
    case "Obj":
      return new JsonObj(current.fields.map(([key, value]): JsonField => [
        key,
        transformAt(value, childCursor(cursor, JsonCursor.isObject, JsonCursor.field(key)), rule)
      ]))
    default:
      return current
  }
}

/**
 * Top-down rewrite that hands each node its cursor. When `rule` returns a
 * replacement, descent continues into the replacement's children.
 *
 * Child cursors read `parent >>> isObject >>> field(key)` and
 * `parent >>> isArray >>> element(index)`, with the guard omitted at the root.
 *
 * @pure true
 * @complexity O(n · depth) for cursor construction
 */
export const transformDownWithCursor: {
  (rule: CursorRule): (self: Json) => Json
  (self: Json, rule: CursorRule): Json
} = dual(2, (self: Json, rule: CursorRule): Json => transformAt(self, JsonCursor.identity, rule))
