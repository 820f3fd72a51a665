import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"

import type { AppError } from "../core/errors.js"
import { manifestError } from "../core/errors.js"
import { decodeManifest } from "../core/manifest.js"

// CHANGE: read pubspec.yaml once per run
// WHY: the package name is a precondition of package: resolution
// QUOTE(TZ): "имя проекта читается один раз из манифеста"
// REF: req-manifest-io-1
// SOURCE: n/a
// FORMAT THEOREM: read(p) = Right(m) → m.name ≠ ∅
// PURITY: SHELL
// EFFECT: Effect<ProjectInfo, AppError, FileSystem>
// INVARIANT: a missing manifest or name is fatal; other malformed fields are not
// COMPLEXITY: O(n)

export interface ProjectInfo {
  readonly packageName: string
  readonly usesFlutter: boolean
}

export const readManifest = (
  manifestPath: string
): Effect.Effect<ProjectInfo, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const raw = yield* _(
      fs.readFileString(manifestPath).pipe(
        Effect.mapError((error) => manifestError(manifestPath, String(error)))
      )
    )
    const manifest = decodeManifest(raw)
    if (manifest.parseError !== undefined) {
      yield* _(Effect.logDebug(`${manifestPath} is not well-formed YAML, reading fields line by line`))
    }
    if (Option.isNone(manifest.name)) {
      return yield* _(Effect.fail(manifestError(manifestPath, "no `name` field")))
    }
    return { packageName: manifest.name.value, usesFlutter: manifest.usesFlutter }
  })
