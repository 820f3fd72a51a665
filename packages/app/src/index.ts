export { runCli } from "./app/program.js"
export type { ProgramResult } from "./app/program.js"
export type { CliArgs, CliCommand } from "./core/cli.js"
export { parseCliArgs } from "./core/cli.js"
export type { RunConfig } from "./core/config.js"
export { extractDirectives } from "./core/directives.js"
export type { AppError } from "./core/errors.js"
export { formatAppError } from "./core/errors.js"
export { buildReport, renderHumanReport, renderJsonReport } from "./core/report.js"
export { classifyUri } from "./core/resolve.js"
export type { UriClass } from "./core/resolve.js"
export type { AnalysisOutcome, Directive, Report, Warning } from "./core/types.js"
export { analyzeProject, loadRunConfig } from "./shell/analyze.js"
export { deleteFiles } from "./shell/delete.js"
