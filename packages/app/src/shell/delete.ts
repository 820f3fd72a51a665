import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { CanonicalPath, DeletionFailure, DeletionSummary } from "../core/types.js"

// CHANGE: delete the Final Unused Set file by file
// WHY: deletion is the only mutation the tool performs and must not stop at the first failure
// QUOTE(TZ): "удаление только после явного подтверждения"
// REF: req-clean-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f ∈ files: f ∈ deleted ⊕ f ∈ failed
// PURITY: SHELL
// EFFECT: Effect<DeletionSummary, never, FileSystem>
// INVARIANT: a failed removal is recorded and the next file is still attempted
// COMPLEXITY: O(n)

export const deleteFiles = (
  files: Iterable<CanonicalPath>
): Effect.Effect<DeletionSummary, never, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const deleted: Array<CanonicalPath> = []
    const failed: Array<DeletionFailure> = []
    for (const file of files) {
      const removed = yield* _(Effect.either(fs.remove(file)))
      if (Either.isLeft(removed)) {
        failed.push({ file, error: removed.left.message })
        yield* _(Effect.logWarning(`failed to delete ${file}: ${removed.left.message}`))
      } else {
        deleted.push(file)
        yield* _(Effect.logInfo(`deleted ${file}`))
      }
    }
    return { deleted, failed }
  })
