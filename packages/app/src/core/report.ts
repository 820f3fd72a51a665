import { Match } from "effect"

import type { AnalysisOutcome, DeletionSummary, Report, RevivedPartition, Warning } from "./types.js"

// CHANGE: build structured reports and render output formats
// WHY: keep reporting pure and deterministic across CLI modes
// QUOTE(TZ): "отсортированный список путей относительно проекта"
// REF: req-report-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r: report(r).unused is sorted and unique
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: output ordering depends only on the path strings
// COMPLEXITY: O(n log n)

export const compareStrings = (left: string, right: string): number => {
  if (left < right) {
    return -1
  }
  return left > right ? 1 : 0
}

const sortUnique = (values: Iterable<string>): ReadonlyArray<string> => [...new Set(values)].toSorted(compareStrings)

const toSlashes = (value: string): string => value.replaceAll("\\", "/")

const relativizeWarning = (warning: Warning, display: (file: string) => string): Warning =>
  Match.value(warning).pipe(
    Match.when({ type: "unreadable-directory" }, (value): Warning => ({ ...value, path: display(value.path) })),
    Match.when({ type: "missing-entry" }, (value): Warning => ({ ...value, path: display(value.path) })),
    Match.when({ type: "orphaned-partition" }, (value): Warning => ({ ...value, file: display(value.file) })),
    Match.orElse((value): Warning => "file" in value ? { ...value, file: display(value.file) } : value)
  )

/**
 * Build a Report with project-relative paths.
 *
 * @param outcome - Analysis outcome with canonical paths.
 * @param relative - Maps a canonical path to a project-relative one.
 * @param deletion - Deletion summary when files were removed.
 * @returns Report ready for output.
 *
 * @pure true
 * @invariant report.unused is sorted and unique
 * @complexity O(n log n)
 */
export const buildReport = (
  outcome: AnalysisOutcome,
  relative: (file: string) => string,
  deletion: DeletionSummary | undefined
): Report => {
  const display = (file: string): string => toSlashes(relative(file))
  const revived: ReadonlyArray<RevivedPartition> = outcome.revived
    .map((entry) => ({ file: display(entry.file), parent: display(entry.parent) }))
    .toSorted((left, right) => compareStrings(left.file, right.file))
  return {
    unused: sortUnique([...outcome.unused].map(display)),
    entryPoints: sortUnique(outcome.entryPoints.map(display)),
    revivedPartitions: revived,
    warnings: outcome.warnings.map((warning) => relativizeWarning(warning, display)),
    stats: {
      filesScanned: outcome.universe.size,
      reachable: [...outcome.reachable].filter((file) => outcome.universe.has(file)).length,
      candidates: outcome.candidates.size,
      unused: outcome.unused.size
    },
    deletion: deletion === undefined
      ? undefined
      : {
        deleted: sortUnique(deletion.deleted.map(display)),
        failed: deletion.failed
          .map((failure) => ({ file: display(failure.file), error: failure.error }))
          .toSorted((left, right) => compareStrings(left.file, right.file))
      }
  }
}

export const formatWarning = (warning: Warning): string =>
  Match.value(warning).pipe(
    Match.when({ type: "unreadable-directory" }, (value) => `[unreadable-directory] ${value.path}: ${value.error}`),
    Match.when({ type: "unreadable-file" }, (value) => `[unreadable-file] ${value.file}: ${value.error}`),
    Match.when({ type: "parse-fallback" }, (value) => `[parse-fallback] ${value.file}: ${value.error}`),
    Match.when({ type: "unresolved-import" }, (value) => `[unresolved-import] ${value.file}: ${value.uri}`),
    Match.when({ type: "unsupported-uri" }, (value) => `[unsupported-uri] ${value.file}: ${value.uri}`),
    Match.when(
      { type: "orphaned-partition" },
      (value) => `[orphaned-partition] ${value.file}: parent ${value.parent} not found`
    ),
    Match.when({ type: "missing-entry" }, (value) => `[missing-entry] ${value.path}`),
    Match.exhaustive
  )

const formatList = (title: string, values: ReadonlyArray<string>): ReadonlyArray<string> => {
  if (values.length === 0) {
    return [`${title}: (none)`]
  }
  return [title + ":", ...values.map((value) => `  - ${value}`)]
}

const formatDeletion = (deletion: DeletionSummary | undefined): ReadonlyArray<string> => {
  if (deletion === undefined) {
    return []
  }
  return [
    ...deletion.failed.map((failure) => `Failed to delete: ${failure.file} (${failure.error})`),
    `Unused files deleted: ${deletion.deleted.length}`
  ]
}

/**
 * Render a human-readable report.
 *
 * @param report - Report data.
 * @returns Multi-line string for stdout.
 *
 * @pure true
 * @invariant output lists all required sections
 * @complexity O(n)
 */
export const renderHumanReport = (report: Report): string => {
  const unusedLines = report.unused.length === 0
    ? ["No unused files found."]
    : ["Unused files:", ...report.unused.map((file) => `  - ${file}`)]
  const warningLines = formatList("Warnings", report.warnings.map(formatWarning))
  const statsLines = [
    `Stats: filesScanned=${report.stats.filesScanned}, reachable=${report.stats.reachable}, ` +
    `candidates=${report.stats.candidates}, unused=${report.stats.unused}`
  ]
  return [
    ...unusedLines,
    ...formatList("Entry points", report.entryPoints),
    ...formatList(
      "Kept partitions",
      report.revivedPartitions.map((entry) => `${entry.file} (part of ${entry.parent})`)
    ),
    ...warningLines,
    ...statsLines,
    ...formatDeletion(report.deletion)
  ].join("\n")
}

/**
 * Render report as JSON text.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderJsonReport = (report: Report): string =>
  JSON.stringify(
    {
      unused: report.unused,
      entryPoints: report.entryPoints,
      revivedPartitions: report.revivedPartitions,
      warnings: report.warnings,
      stats: report.stats,
      ...(report.deletion === undefined ? {} : { deletion: report.deletion })
    },
    null,
    2
  )
