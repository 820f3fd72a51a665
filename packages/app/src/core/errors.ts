import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the CLI tool
// WHY: provide typed failures for program flow and exit codes
// QUOTE(TZ): "Коды возврата: 1 при ошибке выполнения"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique; every AppError aborts before traversal starts
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type SourceRootNotFound = { readonly _tag: "SourceRootNotFound"; readonly path: string }
export type ManifestError = {
  readonly _tag: "ManifestError"
  readonly path: string
  readonly message: string
}
export type NoEntryPoint = {
  readonly _tag: "NoEntryPoint"
  readonly sourceRoot: string
  readonly entryName: string
}

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | SourceRootNotFound
  | ManifestError
  | NoEntryPoint

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const sourceRootNotFound = (path: string): SourceRootNotFound => ({
  _tag: "SourceRootNotFound",
  path
})

export const manifestError = (path: string, message: string): ManifestError => ({
  _tag: "ManifestError",
  path,
  message
})

export const noEntryPoint = (sourceRoot: string, entryName: string): NoEntryPoint => ({
  _tag: "NoEntryPoint",
  sourceRoot,
  entryName
})

/**
 * Render an AppError as a one-line diagnostic.
 *
 * @pure true
 * @invariant every tag has a message
 */
export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => value.message),
    Match.tag("ConfigError", (value) => `invalid config: ${value.message}`),
    Match.tag("FileError", (value) => value.message),
    Match.tag("SourceRootNotFound", (value) => `source directory not found: ${value.path}`),
    Match.tag("ManifestError", (value) => `cannot determine package name from ${value.path}: ${value.message}`),
    Match.tag(
      "NoEntryPoint",
      (value) => `no entry point found: no ${value.entryName} under ${value.sourceRoot} and none configured`
    ),
    Match.exhaustive
  )
