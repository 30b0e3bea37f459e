import { Match } from "effect"

import type { CliError } from "./cli.js"
import type { CursorSyntaxError } from "./cursor.js"
import type { DecodeError } from "./trace.js"
import type { NavigationError } from "./traversal.js"

// CHANGE: unify error algebra for the CLI tool
// WHY: provide typed failures for program flow and exit codes
// QUOTE(TZ): "a closed set of _tagged records built by constructor functions"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type DecodeFailed = {
  readonly _tag: "DecodeFailed"
  readonly file: string
  readonly error: DecodeError
  readonly message: string
}
export type NavigationFailed = {
  readonly _tag: "NavigationFailed"
  readonly cursor: string
  readonly error: NavigationError
  readonly message: string
}

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | DecodeFailed
  | NavigationFailed
  | CursorSyntaxError

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const decodeFailed = (file: string, error: DecodeError): DecodeFailed => ({
  _tag: "DecodeFailed",
  file,
  error,
  message: `Invalid JSON in ${file}: ${error.message}`
})

export const navigationFailed = (cursor: string, error: NavigationError): NavigationFailed => ({
  _tag: "NavigationFailed",
  cursor,
  error,
  message: `${error.message} (cursor '${cursor}')`
})

/**
 * Single-line description for stderr.
 *
 * @pure true
 */
export const renderError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (e) => e.message),
    Match.tag("ConfigError", (e) => `Invalid config: ${e.message}`),
    Match.tag("FileError", (e) => e.message),
    Match.tag("DecodeFailed", (e) => e.message),
    Match.tag("NavigationFailed", (e) => e.message),
    Match.tag("CursorSyntaxError", (e) => e.message),
    Match.exhaustive
  )
