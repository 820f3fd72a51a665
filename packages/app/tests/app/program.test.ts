import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { runCli } from "../../src/app/program.js"
import type { TempContext } from "./test-helpers.js"
import { provideNodeContext, pubspec, withTempDir, writeTree } from "./test-helpers.js"

const writeProject = (context: TempContext) =>
  writeTree(context, context.tempDir, {
    "pubspec.yaml": pubspec("demo"),
    "lib/main.dart": [
      "import 'package:demo/src/used.dart';",
      "import 'package:flutter/material.dart';",
      "import 'dart:async';",
      "import 'src/missing.dart';",
      "",
      "void main() {}",
      ""
    ].join("\n"),
    "lib/src/used.dart": "import '../env.dart';\n",
    "lib/env.dart": "part 'env.g.dart';\n",
    "lib/env.g.dart": "part of 'env.dart';\n",
    "lib/src/dead.dart": "import 'dead_helper.dart';\n",
    "lib/src/dead_helper.dart": "import 'dead.dart';\n",
    "lib/old.dart": "part 'old.g.dart';\n",
    "lib/old.g.dart": "part of 'old.dart';\n",
    "lib/lost.g.dart": "part of 'lost.dart';\n"
  })

const expectedUnused = ["lib/old.dart", "lib/old.g.dart", "lib/src/dead.dart", "lib/src/dead_helper.dart"]

const cli = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "dart-prune", ...args]

describe("runCli scan", () => {
  it.scoped("reports unused files with their warnings", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        yield* _(writeProject(context))
        const result = yield* _(runCli(cli("scan", "--project", context.tempDir, "--silent")))
        expect(result.exitCode).toBe(0)
        expect(result.report.unused).toStrictEqual(expectedUnused)
        expect(result.report.entryPoints).toStrictEqual(["lib/main.dart"])
        expect(result.report.revivedPartitions).toStrictEqual([{ file: "lib/env.g.dart", parent: "lib/env.dart" }])
        expect(result.report.warnings).toStrictEqual([
          { type: "unresolved-import", file: "lib/main.dart", uri: "src/missing.dart" },
          { type: "orphaned-partition", file: "lib/lost.g.dart", parent: "lost.dart" }
        ])
        expect(result.report.stats).toStrictEqual({ filesScanned: 9, reachable: 3, candidates: 6, unused: 4 })
        expect(result.report.deletion).toBeUndefined()
      })
    ).pipe(provideNodeContext))

  it.scoped("exits with 2 under --fail-on-unused", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        yield* _(writeProject(context))
        const result = yield* _(runCli(cli("--project", context.tempDir, "--fail-on-unused", "--silent")))
        expect(result.exitCode).toBe(2)
      })
    ).pipe(provideNodeContext))

  it.scoped("is idempotent", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        yield* _(writeProject(context))
        const first = yield* _(runCli(cli("--project", context.tempDir, "--silent")))
        const second = yield* _(runCli(cli("--project", context.tempDir, "--silent")))
        expect(second.report).toStrictEqual(first.report)
      })
    ).pipe(provideNodeContext))
})

describe("runCli clean", () => {
  it.scoped("deletes nothing without --write", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        yield* _(writeProject(context))
        const result = yield* _(runCli(cli("clean", "--project", context.tempDir, "--silent")))
        expect(result.report.unused).toStrictEqual(expectedUnused)
        expect(result.report.deletion).toBeUndefined()
        expect(yield* _(context.fs.exists(context.path.join(context.tempDir, "lib", "old.dart")))).toBe(true)
      })
    ).pipe(provideNodeContext))

  it.scoped("removes the unused files and leaves a clean project", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        yield* _(writeProject(context))
        const result = yield* _(runCli(cli("clean", "--write", "--project", context.tempDir, "--silent")))
        expect(result.exitCode).toBe(0)
        expect(result.report.deletion).toStrictEqual({ deleted: expectedUnused, failed: [] })
        const lib = context.path.join(context.tempDir, "lib")
        expect(yield* _(context.fs.exists(context.path.join(lib, "src", "dead.dart")))).toBe(false)
        expect(yield* _(context.fs.exists(context.path.join(lib, "env.g.dart")))).toBe(true)

        const rescan = yield* _(runCli(cli("--project", context.tempDir, "--fail-on-unused", "--silent")))
        expect(rescan.exitCode).toBe(0)
        expect(rescan.report.unused).toStrictEqual([])
      })
    ).pipe(provideNodeContext))

  it.scoped("keeps a live file that is also reachable through a symlinked directory", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const lib = context.path.join(context.tempDir, "lib")
        yield* _(
          writeTree(context, context.tempDir, {
            "pubspec.yaml": pubspec("demo"),
            "lib/main.dart": "import 'b/x.dart';\n",
            "lib/b/x.dart": ""
          })
        )
        yield* _(context.fs.symlink(context.path.join(lib, "b"), context.path.join(lib, "a")))
        const result = yield* _(runCli(cli("clean", "--write", "--project", context.tempDir, "--silent")))
        expect(result.exitCode).toBe(0)
        expect(result.report.unused).toStrictEqual([])
        expect(result.report.deletion).toStrictEqual({ deleted: [], failed: [] })
        expect(yield* _(context.fs.exists(context.path.join(lib, "b", "x.dart")))).toBe(true)
      })
    ).pipe(provideNodeContext))
})

describe("runCli errors", () => {
  it.effect("rejects --write on scan before touching the project", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(runCli(cli("scan", "--write", "--project", "/nonexistent", "--silent"))))
      expect(error).toStrictEqual({ _tag: "CliError", message: "--write is only valid with clean" })
    }).pipe(provideNodeContext))

  it.scoped("fails before traversal when the source root is missing", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        yield* _(writeTree(context, context.tempDir, { "pubspec.yaml": pubspec("demo") }))
        const error = yield* _(Effect.flip(runCli(cli("--project", context.tempDir, "--source", "app", "--silent"))))
        expect(error).toStrictEqual({ _tag: "SourceRootNotFound", path: context.path.join(context.tempDir, "app") })
      })
    ).pipe(provideNodeContext))

  it.effect("rejects an explicit config file that does not exist", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(runCli(cli("--config", "/nonexistent/dart-prune.json", "--silent"))))
      expect(error).toStrictEqual({ _tag: "FileError", message: "Config file not found: /nonexistent/dart-prune.json" })
    }).pipe(provideNodeContext))
})
