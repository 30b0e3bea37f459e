import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { defaultConfigPath, resolveConfig, toIndent } from "../core/config.js"
import * as JsonCursor from "../core/cursor.js"
import type { AppError } from "../core/errors.js"
import { navigationFailed } from "../core/errors.js"
import type { Json } from "../core/json.js"
import * as Traversal from "../core/traversal.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readJsonFile, renderJson, writeJsonFile } from "../shell/json-file.js"

// CHANGE: orchestrate CLI commands with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "jsonkit <command> --file <path> [flags]"
// REF: req-cli-run-1
// SOURCE: n/a
// FORMAT THEOREM: ∀cmd: run(cmd) = Right(result) → result.exitCode = 0
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output emitted at most once; the input file changes only with --write
// COMPLEXITY: O(n) in document size

export interface ProgramResult {
  /** Text written to stdout, empty when the document was saved instead. */
  readonly output: string
  readonly exitCode: number
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const parseCursor = (cli: CliArgs): Effect.Effect<JsonCursor.JsonCursor, AppError> =>
  fromEither(JsonCursor.parse(cli.cursor ?? ""))

const navigate = (
  cursorText: string,
  result: Either.Either<Json, Traversal.NavigationError>
): Effect.Effect<Json, AppError> =>
  result._tag === "Left"
    ? Effect.fail(navigationFailed(cursorText, result.left))
    : Effect.succeed(result.right)

const emit = (
  cli: CliArgs,
  config: ResolvedConfig,
  json: Json
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const indent = toIndent(config)
    if (cli.write) {
      yield* _(writeJsonFile(cli.file, json, indent))
      return { output: "", exitCode: 0 }
    }
    const output = renderJson(json, indent)
    yield* _(writeStdout(output))
    return { output, exitCode: 0 }
  })

const handleGet = (
  cli: CliArgs,
  config: ResolvedConfig,
  document: Json
): Effect.Effect<ProgramResult, AppError> =>
  Effect.gen(function*(_) {
    const cursor = yield* _(parseCursor(cli))
    yield* _(Effect.logDebug(`get ${JsonCursor.render(cursor)}`))
    const found = yield* _(navigate(cli.cursor ?? "", Traversal.get(document, cursor)))
    const output = renderJson(found, toIndent(config))
    yield* _(writeStdout(output))
    return { output, exitCode: 0 }
  })

const handleDelete = (
  cli: CliArgs,
  config: ResolvedConfig,
  document: Json
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cursor = yield* _(parseCursor(cli))
    yield* _(Effect.logDebug(`delete ${JsonCursor.render(cursor)}`))
    const next = yield* _(navigate(cli.cursor ?? "", Traversal.remove(document, cursor)))
    return yield* _(emit(cli, config, next))
  })

const executeCommand = (
  cli: CliArgs,
  config: ResolvedConfig,
  document: Json
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Match.value(cli.command).pipe(
    Match.when("get", () => handleGet(cli, config, document)),
    Match.when("delete", () => handleDelete(cli, config, document)),
    Match.when("format", () => emit(cli, config, document)),
    Match.exhaustive
  )

const runCommand = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const configFile = yield* _(loadConfigFile(cli.configPath ?? defaultConfigPath, cli.configPath !== undefined))
    const config = resolveConfig(cli, configFile)
    yield* _(Effect.logDebug(`command=${cli.command} pretty=${config.pretty} indent=${config.indent}`))
    const document = yield* _(readJsonFile(cli.file))
    return yield* _(executeCommand(cli, config, document))
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the printed output and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(
      runCommand(cli).pipe(
        Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info)
      )
    )
  })
