import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for dart-prune
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "scan: только отчёт, clean --write: удаление"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and positional arguments are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "scan" | "clean"

export interface CliArgs {
  readonly command: CliCommand
  readonly projectPath: string
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly sourceDir: string | undefined
  readonly entryPoints: ReadonlyArray<string>
  readonly exclude: ReadonlyArray<string>
  readonly json: boolean
  readonly silent: boolean
  readonly verbose: boolean
  readonly failOnUnused: boolean
  readonly write: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const splitList = (value: string): ReadonlyArray<string> =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("scan", () => Either.right<CliCommand>("scan")),
    Match.when("clean", () => Either.right<CliCommand>("clean")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  projectPath: ".",
  configPath: undefined,
  configPathExplicit: false,
  sourceDir: undefined,
  entryPoints: [],
  exclude: [],
  json: false,
  silent: false,
  verbose: false,
  failOnUnused: false,
  write: false
})

type FlagResult = Either.Either<{ readonly next: CliArgs; readonly consumed: number }, CliError>

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

const setParsedFlag = (next: CliArgs, consumed: number): FlagResult => Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => CliArgs
): FlagResult =>
  Either.map(readFlagValue(flagName, inlineValue, nextValue), (value) => ({
    next: update(current, value),
    consumed: inlineValue === undefined ? 2 : 1
  }))

const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): FlagResult => {
  const useNext = inlineValue === undefined && nextValue !== undefined && !isFlag(nextValue) &&
    parseBoolean(nextValue)._tag === "Right"
  const nextValueResolved = inlineValue ?? (useNext && nextValue !== undefined ? nextValue : "true")
  return Either.map(parseBoolean(nextValueResolved), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => FlagResult

const flagParsers: Record<string, FlagParser> = {
  json: (current) => setParsedFlag({ ...current, json: true }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  "fail-on-unused": (current) => setParsedFlag({ ...current, failOnUnused: true }, 1),
  write: (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      write: value
    })),
  project: (current, inlineValue, nextValue) =>
    parseValueFlag("project", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      projectPath: value
    })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      configPath: value,
      configPathExplicit: true
    })),
  source: (current, inlineValue, nextValue) =>
    parseValueFlag("source", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      sourceDir: value
    })),
  entry: (current, inlineValue, nextValue) =>
    parseValueFlag("entry", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      entryPoints: [...args.entryPoints, ...splitList(value)]
    })),
  exclude: (current, inlineValue, nextValue) =>
    parseValueFlag("exclude", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      exclude: [...args.exclude, ...splitList(value)]
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): FlagResult => {
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

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "scan", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
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

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to scan when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const commandEither = parseCommandFromArgs(rawArgs)
  if (Either.isLeft(commandEither)) {
    return Either.left(commandEither.left)
  }
  const parsed = commandEither.right
  return Either.flatMap(
    parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command)),
    (args): Either.Either<CliArgs, CliError> =>
      args.write && args.command !== "clean"
        ? Either.left(cliError("--write is only valid with clean"))
        : Either.right(args)
  )
}
