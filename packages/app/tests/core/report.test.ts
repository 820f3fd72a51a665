import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { buildReport, formatWarning, renderHumanReport, renderJsonReport } from "../../src/core/report.js"
import type { AnalysisOutcome } from "../../src/core/types.js"

const relative = (file: string): string => file.slice("/p/".length)

const outcome: AnalysisOutcome = {
  projectRoot: "/p",
  universe: new Set(["/p/lib/main.dart", "/p/lib/env.dart", "/p/lib/env.g.dart", "/p/lib/dead.dart"]),
  entryPoints: ["/p/lib/main.dart"],
  reachable: new Set(["/p/lib/main.dart", "/p/lib/env.dart", "/p/bin/tool.dart"]),
  candidates: new Set(["/p/lib/env.g.dart", "/p/lib/dead.dart"]),
  unused: new Set(["/p/lib/dead.dart"]),
  revived: [{ file: "/p/lib/env.g.dart", parent: "/p/lib/env.dart" }],
  warnings: [{ type: "unresolved-import", file: "/p/lib/main.dart", uri: "missing.dart" }]
}

describe("buildReport", () => {
  it.effect("relativizes paths and counts only reachable files inside the universe", () =>
    Effect.sync(() => {
      const report = buildReport(outcome, relative, undefined)
      expect(report).toStrictEqual({
        unused: ["lib/dead.dart"],
        entryPoints: ["lib/main.dart"],
        revivedPartitions: [{ file: "lib/env.g.dart", parent: "lib/env.dart" }],
        warnings: [{ type: "unresolved-import", file: "lib/main.dart", uri: "missing.dart" }],
        stats: { filesScanned: 4, reachable: 2, candidates: 2, unused: 1 },
        deletion: undefined
      })
    }))

  it.effect("sorts unused files by path", () =>
    Effect.sync(() => {
      const report = buildReport(
        { ...outcome, unused: new Set(["/p/lib/z.dart", "/p/lib/B.dart", "/p/lib/a.dart"]) },
        relative,
        undefined
      )
      expect(report.unused).toStrictEqual(["lib/B.dart", "lib/a.dart", "lib/z.dart"])
    }))
})

describe("renderHumanReport", () => {
  it.effect("lists every section", () =>
    Effect.sync(() => {
      const text = renderHumanReport(buildReport(outcome, relative, undefined))
      expect(text).toBe(
        [
          "Unused files:",
          "  - lib/dead.dart",
          "Entry points:",
          "  - lib/main.dart",
          "Kept partitions:",
          "  - lib/env.g.dart (part of lib/env.dart)",
          "Warnings:",
          "  - [unresolved-import] lib/main.dart: missing.dart",
          "Stats: filesScanned=4, reachable=2, candidates=2, unused=1"
        ].join("\n")
      )
    }))

  it.effect("reports a clean project and a deletion summary", () =>
    Effect.sync(() => {
      const clean: AnalysisOutcome = { ...outcome, unused: new Set(), revived: [], warnings: [] }
      const text = renderHumanReport(
        buildReport(clean, relative, {
          deleted: [],
          failed: [{ file: "/p/lib/locked.dart", error: "permission denied" }]
        })
      )
      expect(text.split("\n")).toStrictEqual([
        "No unused files found.",
        "Entry points:",
        "  - lib/main.dart",
        "Kept partitions: (none)",
        "Warnings: (none)",
        "Stats: filesScanned=4, reachable=2, candidates=2, unused=0",
        "Failed to delete: lib/locked.dart (permission denied)",
        "Unused files deleted: 0"
      ])
    }))
})

describe("renderJsonReport", () => {
  it.effect("omits the deletion block for scans", () =>
    Effect.sync(() => {
      const parsed: unknown = JSON.parse(renderJsonReport(buildReport(outcome, relative, undefined)))
      expect(parsed).toStrictEqual({
        unused: ["lib/dead.dart"],
        entryPoints: ["lib/main.dart"],
        revivedPartitions: [{ file: "lib/env.g.dart", parent: "lib/env.dart" }],
        warnings: [{ type: "unresolved-import", file: "lib/main.dart", uri: "missing.dart" }],
        stats: { filesScanned: 4, reachable: 2, candidates: 2, unused: 1 }
      })
    }))
})

describe("formatWarning", () => {
  it.effect("names the orphaned parent", () =>
    Effect.sync(() => {
      expect(formatWarning({ type: "orphaned-partition", file: "lib/a.g.dart", parent: "a.dart" }))
        .toBe("[orphaned-partition] lib/a.g.dart: parent a.dart not found")
      expect(formatWarning({ type: "missing-entry", path: "bin/cli.dart" })).toBe("[missing-entry] bin/cli.dart")
    }))
})
