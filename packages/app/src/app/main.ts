#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { formatAppError } from "../core/errors.js"
import { stderrLoggerLayer } from "../shell/logger.js"
import { runCli } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// QUOTE(TZ): "Коды возврата: 0 успех, 1 ошибка, 2 найдены неиспользуемые файлы"
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) terminates with exitCode from ProgramResult
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: every AppError ends the process with status 1
// COMPLEXITY: O(1)

const setExitCode = (code: number): Effect.Effect<void> =>
  Effect.sync(() => {
    process.exitCode = code
  })

const main = Effect.gen(function*(_) {
  const result = yield* _(runCli(process.argv))
  if (result.exitCode !== 0) {
    yield* _(setExitCode(result.exitCode))
  }
}).pipe(
  Effect.catchAll((error) =>
    Effect.sync(() => {
      process.stderr.write(`error: ${formatAppError(error)}\n`)
    }).pipe(Effect.zipRight(setExitCode(1)))
  )
)

NodeRuntime.runMain(main.pipe(Effect.provide(NodeContext.layer), Effect.provide(stderrLoggerLayer)))
