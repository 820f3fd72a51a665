import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"

// CHANGE: route Effect logs to stderr
// WHY: stdout carries only the report so --json output stays machine-readable
// QUOTE(TZ): "предупреждения логируются, но не прерывают анализ"
// REF: req-logging-1
// SOURCE: n/a
// FORMAT THEOREM: ∀log: written(log) → stream(log) = stderr
// PURITY: SHELL
// EFFECT: Layer<never>
// INVARIANT: one line per log entry
// COMPLEXITY: O(|message|)

const renderPart = (value: unknown): string => {
  if (typeof value === "string") {
    return value
  }
  if (value instanceof Error) {
    return value.message
  }
  return JSON.stringify(value) ?? String(value)
}

const renderMessage = (message: unknown): string =>
  Array.isArray(message) ? message.map(renderPart).join(" ") : renderPart(message)

const stderrLogger = Logger.make(({ logLevel, message }) => {
  process.stderr.write(`${logLevel.label.toLowerCase()}: ${renderMessage(message)}\n`)
})

export const stderrLoggerLayer = Logger.replace(Logger.defaultLogger, stderrLogger)

export const logLevelFor = (flags: { readonly silent: boolean; readonly verbose: boolean }): LogLevel.LogLevel => {
  if (flags.silent) {
    return LogLevel.Error
  }
  return flags.verbose ? LogLevel.Debug : LogLevel.Info
}
