// CHANGE: define core domain types for directives, warnings, and reports
// WHY: keep IO-free data structures reusable across CLI modes and tests
// QUOTE(TZ): "Найти файлы, недостижимые ни из одной точки входа"
// REF: req-report-types-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r ∈ Report: r.unused ⊆ Universe ∧ r.unused ∩ Reachable = ∅
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every path in Report is project-relative and uses "/" separators
// COMPLEXITY: O(1)/O(1)

/**
 * Canonical path: absolute and normalized, the sole identity of a module.
 */
export type CanonicalPath = string

export type ImportKeyword = "import" | "export"

export type PartitionTarget =
  | { readonly _tag: "Uri"; readonly uri: string }
  | { readonly _tag: "LibraryName"; readonly name: string }

export type Directive =
  | { readonly _tag: "Import"; readonly uri: string; readonly keyword: ImportKeyword }
  | { readonly _tag: "Partition"; readonly uri: string }
  | { readonly _tag: "PartitionOf"; readonly target: PartitionTarget }

export type Warning =
  | { readonly type: "unreadable-directory"; readonly path: string; readonly error: string }
  | { readonly type: "unreadable-file"; readonly file: string; readonly error: string }
  | { readonly type: "parse-fallback"; readonly file: string; readonly error: string }
  | { readonly type: "unresolved-import"; readonly file: string; readonly uri: string }
  | { readonly type: "unsupported-uri"; readonly file: string; readonly uri: string }
  | { readonly type: "orphaned-partition"; readonly file: string; readonly parent: string }
  | { readonly type: "missing-entry"; readonly path: string }

export interface RevivedPartition {
  readonly file: string
  readonly parent: string
}

export interface AnalysisStats {
  readonly filesScanned: number
  readonly reachable: number
  readonly candidates: number
  readonly unused: number
}

/**
 * Result of one analysis run, with absolute paths.
 * Converted to project-relative paths only when the report is built.
 */
export interface AnalysisOutcome {
  readonly projectRoot: CanonicalPath
  readonly universe: ReadonlySet<CanonicalPath>
  readonly entryPoints: ReadonlyArray<CanonicalPath>
  readonly reachable: ReadonlySet<CanonicalPath>
  readonly candidates: ReadonlySet<CanonicalPath>
  readonly unused: ReadonlySet<CanonicalPath>
  readonly revived: ReadonlyArray<RevivedPartition>
  readonly warnings: ReadonlyArray<Warning>
}

export interface DeletionFailure {
  readonly file: string
  readonly error: string
}

export interface DeletionSummary {
  readonly deleted: ReadonlyArray<string>
  readonly failed: ReadonlyArray<DeletionFailure>
}

export interface Report {
  readonly unused: ReadonlyArray<string>
  readonly entryPoints: ReadonlyArray<string>
  readonly revivedPartitions: ReadonlyArray<RevivedPartition>
  readonly warnings: ReadonlyArray<Warning>
  readonly stats: AnalysisStats
  readonly deletion: DeletionSummary | undefined
}
