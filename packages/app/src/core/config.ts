import type { CliArgs } from "./cli.js"
import type { CanonicalPath } from "./types.js"

// CHANGE: define config merging rules, defaults, and the immutable run configuration
// WHY: ensure CLI flags override config file and defaults deterministically
// QUOTE(TZ): "Приоритет: CLI-флаги > конфиг > дефолты."
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: RunConfig is built once per run and never mutated
// COMPLEXITY: O(n)/O(1)

export interface FileConfig {
  readonly sourceDir?: string
  readonly entryPoints?: ReadonlyArray<string>
  readonly exclude?: ReadonlyArray<string>
}

export interface ResolvedConfig {
  readonly sourceDir: string
  readonly entryPoints: ReadonlyArray<string>
  readonly exclude: ReadonlyArray<string>
}

/**
 * Everything a run needs, resolved up front and passed to every component.
 */
export interface RunConfig {
  readonly projectRoot: CanonicalPath
  readonly sourceRoot: CanonicalPath
  readonly manifestPath: CanonicalPath
  readonly packageName: string
  readonly usesFlutter: boolean
  readonly sourceSuffix: string
  readonly entryName: string
  readonly extraEntries: ReadonlyArray<CanonicalPath>
  readonly exclude: ReadonlyArray<RegExp>
}

export const defaultSourceDir = "lib"
export const manifestFileName = "pubspec.yaml"
export const configFileName = ".dart-prune.json"
export const sourceSuffix = ".dart"
export const entryName = "main.dart"

const unique = (values: ReadonlyArray<string>): ReadonlyArray<string> => {
  const seen = new Set<string>()
  const result: Array<string> = []
  for (const value of values) {
    if (!seen.has(value)) {
      seen.add(value)
      result.push(value)
    }
  }
  return result
}

const resolveSourceDir = (cli: CliArgs, fileConfig: FileConfig | undefined): string =>
  cli.sourceDir ?? fileConfig?.sourceDir ?? defaultSourceDir

const resolveEntryPoints = (cli: CliArgs, fileConfig: FileConfig | undefined): ReadonlyArray<string> =>
  unique([...(fileConfig?.entryPoints ?? []), ...cli.entryPoints])

const resolveExclude = (cli: CliArgs, fileConfig: FileConfig | undefined): ReadonlyArray<string> =>
  unique([...(fileConfig?.exclude ?? []), ...cli.exclude])

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .dart-prune.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @invariant list settings are the de-duplicated union of file and CLI values
 * @complexity O(n)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  sourceDir: resolveSourceDir(cli, fileConfig),
  entryPoints: resolveEntryPoints(cli, fileConfig),
  exclude: resolveExclude(cli, fileConfig)
})
