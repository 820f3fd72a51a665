import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import { Effect, Match } from "effect"
import type * as Either from "effect/Either"
import * as Logger from "effect/Logger"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { AppError } from "../core/errors.js"
import { buildReport, renderHumanReport, renderJsonReport } from "../core/report.js"
import type { AnalysisOutcome, DeletionSummary, Report } from "../core/types.js"
import { analyzeProject, loadRunConfig } from "../shell/analyze.js"
import { deleteFiles } from "../shell/delete.js"
import { logLevelFor } from "../shell/logger.js"

// CHANGE: orchestrate scan and clean with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "scan: только отчёт, clean --write: удаление"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀mode: run(mode) returns exitCode ∈ {0,1,2}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem | Path>
// INVARIANT: report emitted at most once; files are deleted only by clean --write
// COMPLEXITY: O(V + E)

export interface ProgramResult {
  readonly report: Report
  readonly exitCode: number
}

type ProgramEnv = FileSystemService | PathService

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emitReport = (report: Report, json: boolean, silent: boolean): Effect.Effect<void> => {
  if (silent) {
    return Effect.void
  }
  const payload = json ? renderJsonReport(report) : renderHumanReport(report)
  return writeStdout(payload)
}

const toReport = (
  outcome: AnalysisOutcome,
  deletion: DeletionSummary | undefined
): Effect.Effect<Report, never, PathService> =>
  Effect.map(Path, (path) => buildReport(outcome, (file) => path.relative(outcome.projectRoot, file), deletion))

const unusedExitCode = (cli: CliArgs, report: Report): number =>
  cli.failOnUnused && report.unused.length > 0 ? 2 : 0

const analyze = (cli: CliArgs): Effect.Effect<AnalysisOutcome, AppError, ProgramEnv> =>
  Effect.flatMap(loadRunConfig(cli), analyzeProject)

const handleScan = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const outcome = yield* _(analyze(cli))
    const report = yield* _(toReport(outcome, undefined))
    yield* _(emitReport(report, cli.json, cli.silent))
    return { report, exitCode: unusedExitCode(cli, report) }
  })

const handleClean = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const outcome = yield* _(analyze(cli))
    if (!cli.write) {
      const report = yield* _(toReport(outcome, undefined))
      yield* _(emitReport(report, cli.json, cli.silent))
      if (!cli.json && !cli.silent && report.unused.length > 0) {
        yield* _(writeStdout("Dry run: nothing deleted. Re-run with: dart-prune clean --write"))
      }
      return { report, exitCode: unusedExitCode(cli, report) }
    }
    const deletion = yield* _(deleteFiles([...outcome.unused]))
    const report = yield* _(toReport(outcome, deletion))
    yield* _(emitReport(report, cli.json, cli.silent))
    return { report, exitCode: deletion.failed.length > 0 ? 1 : 0 }
  })

const executeCommand = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Match.value(cli.command).pipe(
    Match.when("scan", () => handleScan(cli)),
    Match.when("clean", () => handleClean(cli)),
    Match.exhaustive
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with report and exit code.
 *
 * @pure false
 * @effect FileSystem, Path, Logger
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(V + E)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(executeCommand(cli).pipe(Logger.withMinimumLogLevel(logLevelFor(cli))))
  })
