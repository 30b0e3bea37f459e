import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for jsonkit
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "Flags: --file (required), --cursor <path> (required for get/delete)"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.file ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected; get/delete always carry a cursor
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "get" | "delete" | "format"

export interface CliArgs {
  readonly command: CliCommand
  readonly file: string
  readonly cursor: string | undefined
  readonly pretty: boolean | undefined
  readonly write: boolean
  readonly configPath: string | undefined
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const usage = "Usage: jsonkit <get|delete|format> --file <path> [--cursor <path>] " +
  "[--pretty|--compact] [--write] [--config <path>] [--verbose]"

const isFlag = (value: string): boolean => value.startsWith("-")

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("get", () => Either.right<CliCommand>("get")),
    Match.when("delete", () => Either.right<CliCommand>("delete")),
    Match.when("format", () => Either.right<CliCommand>("format")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

interface ParsingArgs {
  readonly file: string | undefined
  readonly cursor: string | undefined
  readonly pretty: boolean | undefined
  readonly write: boolean
  readonly configPath: string | undefined
  readonly verbose: boolean
}

const initialArgs: ParsingArgs = {
  file: undefined,
  cursor: undefined,
  pretty: undefined,
  write: false,
  configPath: undefined,
  verbose: false
}

type Parsed = { readonly next: ParsingArgs; readonly consumed: number }

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: ParsingArgs): Either.Either<Parsed, CliError> => Either.right({ next, consumed: 1 })

const parseValueFlag = (
  flagName: string,
  current: ParsingArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: ParsingArgs, value: string) => ParsingArgs
): Either.Either<Parsed, CliError> =>
  Either.map(readFlagValue(flagName, inlineValue, nextValue), (value) => ({
    next: update(current, value),
    consumed: inlineValue === undefined ? 2 : 1
  }))

type FlagParser = (
  current: ParsingArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<Parsed, CliError>

const flagParsers: Readonly<Record<string, FlagParser>> = {
  pretty: (current) => setParsedFlag({ ...current, pretty: true }),
  compact: (current) => setParsedFlag({ ...current, pretty: false }),
  write: (current) => setParsedFlag({ ...current, write: true }),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }),
  file: (current, inlineValue, nextValue) =>
    parseValueFlag("file", current, inlineValue, nextValue, (args, value) => ({ ...args, file: value })),
  cursor: (current, inlineValue, nextValue) =>
    parseValueFlag("cursor", current, inlineValue, nextValue, (args, value) => ({ ...args, cursor: value })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) => ({ ...args, configPath: value }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: ParsingArgs
): Either.Either<Parsed, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const body = raw.slice(2)
  const separator = body.indexOf("=")
  const name = separator === -1 ? body : body.slice(0, separator)
  const inlineValue = separator === -1 ? undefined : body.slice(separator + 1)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parseFlags = (rawArgs: ReadonlyArray<string>): Either.Either<ParsingArgs, CliError> => {
  let args = initialArgs
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const finish = (command: CliCommand, args: ParsingArgs): Either.Either<CliArgs, CliError> => {
  if (args.file === undefined) {
    return Either.left(cliError("Missing required flag: --file"))
  }
  if (command !== "format" && args.cursor === undefined) {
    return Either.left(cliError(`Missing required flag for ${command}: --cursor`))
  }
  return Either.right({ ...args, command, file: args.file })
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant the command is the first argument after the script path
 * @complexity O(n)
 */
export const parseCliArgs = (argv: ReadonlyArray<string>): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.left(cliError(`Missing command. ${usage}`))
  }
  return Either.flatMap(
    parseCommand(first),
    (command) => Either.flatMap(parseFlags(rawArgs.slice(1)), (args) => finish(command, args))
  )
}
