import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import { extractDirectives } from "../core/directives.js"
import type { CanonicalPath, Directive } from "../core/types.js"
import type { WarningSink } from "./warnings.js"

// CHANGE: read each source file once and cache its directives
// WHY: traversal and the partition pass both need directives; files are read lazily
// QUOTE(TZ): "SourceFile: путь плюс содержимое, читается лениво один раз"
// REF: req-sources-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f: directives(f) is computed at most once per run
// PURITY: SHELL
// EFFECT: Effect<SourceStore>
// INVARIANT: unreadable files behave as leaves (no directives)
// COMPLEXITY: O(size(f)) on first access, O(1) afterwards

export interface SourceStore {
  readonly directives: (
    file: CanonicalPath
  ) => Effect.Effect<ReadonlyArray<Directive>, never, FileSystemService>
}

export const makeSourceStore = (sink: WarningSink): SourceStore => {
  const cache = new Map<CanonicalPath, ReadonlyArray<Directive>>()

  const load = (file: CanonicalPath): Effect.Effect<ReadonlyArray<Directive>, never, FileSystemService> =>
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystem)
      const source = yield* _(Effect.either(fs.readFileString(file)))
      if (Either.isLeft(source)) {
        yield* _(sink.record({ type: "unreadable-file", file, error: source.left.message }))
        return []
      }
      const extracted = extractDirectives(source.right)
      if (extracted.error !== undefined) {
        yield* _(sink.record({ type: "parse-fallback", file, error: extracted.error }))
      }
      return extracted.directives
    })

  return {
    directives: (file) =>
      Effect.suspend(() => {
        const cached = cache.get(file)
        if (cached !== undefined) {
          return Effect.succeed(cached)
        }
        return Effect.tap(load(file), (directives) =>
          Effect.sync(() => {
            cache.set(file, directives)
          }))
      })
  }
}
