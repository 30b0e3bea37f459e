import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import * as Decoder from "../core/decoder.js"
import * as Encoder from "../core/encoder.js"
import type { AppError } from "../core/errors.js"
import { decodeFailed, fileError } from "../core/errors.js"
import type { Json } from "../core/json.js"
import type { Indent } from "../core/writer.js"

// CHANGE: read and write JSON documents through the streaming codec
// WHY: isolate filesystem IO while the AST keeps key order and duplicates
// QUOTE(TZ): "parse any value into the AST, keeping object entry order and duplicate keys"
// REF: req-json-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀j,i: read(write(j, i)) ≡ j
// PURITY: SHELL
// EFFECT: Effect<Json, AppError, FileSystem>
// INVARIANT: written files end with a single newline
// COMPLEXITY: O(n)

export const renderJson = (json: Json, indent: Indent): string => `${Encoder.encode(Encoder.json, json, indent)}\n`

export const readJsonFile = (
  path: string
): Effect.Effect<Json, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const raw = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(Effect.logDebug(`Read ${raw.length} characters from ${path}`))
    const decoded = Decoder.decode(Decoder.json, raw)
    if (Either.isLeft(decoded)) {
      return yield* _(Effect.fail(decodeFailed(path, decoded.left)))
    }
    return decoded.right
  })

export const writeJsonFile = (
  path: string,
  json: Json,
  indent: Indent
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    yield* _(
      fs.writeFileString(path, renderJson(json, indent)).pipe(
        Effect.mapError((error) => fileError(String(error)))
      )
    )
    yield* _(Effect.logDebug(`Wrote ${path}`))
  })
