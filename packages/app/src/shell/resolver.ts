import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import { Match } from "effect"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"

import type { ResolveContext } from "../core/resolve.js"
import { classifyUri } from "../core/resolve.js"
import type { CanonicalPath } from "../core/types.js"
import { canonicalFile } from "./inventory.js"
import type { WarningSink } from "./warnings.js"

// CHANGE: resolve a directive URI to an existing file or nothing
// WHY: unresolved edges terminate expansion instead of failing the run
// QUOTE(TZ): "Unresolved: не ошибка, ребро просто обрывается"
// REF: req-resolve-io-1
// SOURCE: n/a
// FORMAT THEOREM: resolve(u, f) = Some(p) → regular(p) ∧ p = realpath(classify(u, f).path)
// PURITY: SHELL
// EFFECT: Effect<Option<CanonicalPath>, never, FileSystem | Path>
// INVARIANT: dart: URIs are never expanded
// COMPLEXITY: O(1) file system calls

export const resolveImport = (
  uri: string,
  fromFile: CanonicalPath,
  context: ResolveContext,
  sink: WarningSink
): Effect.Effect<Option.Option<CanonicalPath>, never, FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const path = yield* _(Path)
    const classified = classifyUri(uri, fromFile, context, path)
    const step: Effect.Effect<Option.Option<CanonicalPath>, never, FileSystemService> = Match.value(classified)
      .pipe(
        Match.tag("Builtin", () => Effect.succeed(Option.none<CanonicalPath>())),
        Match.tag("External", (value) =>
          Effect.logDebug(`external package ${value.packageName}: ${value.uri} in ${fromFile}`).pipe(
            Effect.as(Option.none<CanonicalPath>())
          )),
        Match.tag("Unsupported", (value) =>
          sink.record({ type: "unsupported-uri", file: fromFile, uri: value.uri }).pipe(
            Effect.as(Option.none<CanonicalPath>())
          )),
        Match.tag("Candidate", (value) =>
          Effect.flatMap(canonicalFile(value.path), (resolved) =>
            Option.isSome(resolved)
              ? Effect.succeed(resolved)
              : sink.record({ type: "unresolved-import", file: fromFile, uri: value.uri }).pipe(
                Effect.as(Option.none<CanonicalPath>())
              ))),
        Match.exhaustive
      )
    return yield* _(step)
  })
