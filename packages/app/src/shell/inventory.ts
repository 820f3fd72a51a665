import type { PlatformError } from "@effect/platform/Error"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { AppError } from "../core/errors.js"
import { sourceRootNotFound } from "../core/errors.js"
import { compareStrings } from "../core/report.js"
import type { CanonicalPath } from "../core/types.js"
import type { WarningSink } from "./warnings.js"

// CHANGE: enumerate the Universe of source files under the source root
// WHY: unused detection is Universe minus Reachable
// QUOTE(TZ): "каталоги, которые нельзя прочитать, пропускаются с предупреждением"
// REF: req-inventory-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f ∈ walk(root): regular(f) ∧ f ends with suffix → canonical(f) ∈ Universe
// PURITY: SHELL
// EFFECT: Effect<ReadonlySet<CanonicalPath>, never, FileSystem | Path>
// INVARIANT: each directory (by real path) is listed at most once; files are identified by real path
// COMPLEXITY: O(n) where n = directory entries

const describeError = (error: PlatformError): string => error.message

export const ensureSourceRoot = (
  sourceRoot: CanonicalPath
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const info = yield* _(Effect.either(fs.stat(sourceRoot)))
    if (Either.isLeft(info) || info.right.type !== "Directory") {
      return yield* _(Effect.fail(sourceRootNotFound(sourceRoot)))
    }
  })

const realOrSelf = (
  fs: FileSystemService,
  target: string
): Effect.Effect<string> =>
  fs.realPath(target).pipe(
    Effect.catchAll((error) =>
      Effect.logDebug(`cannot resolve real path of ${target}: ${describeError(error)}`).pipe(
        Effect.as(target)
      )
    )
  )

export const realPathOf = (
  target: string
): Effect.Effect<CanonicalPath, never, FileSystemService> => Effect.flatMap(FileSystem, (fs) => realOrSelf(fs, target))

/**
 * Canonical identity of an existing regular file: its real path.
 *
 * @returns None when the path is missing or not a regular file.
 *
 * @pure false
 * @effect FileSystem
 * @invariant two spellings of one file (through a symlinked directory) yield the same path
 */
export const canonicalFile = (
  file: string
): Effect.Effect<Option.Option<CanonicalPath>, never, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const info = yield* _(Effect.either(fs.stat(file)))
    if (Either.isLeft(info) || info.right.type !== "File") {
      return Option.none()
    }
    return Option.some(yield* _(realOrSelf(fs, file)))
  })

interface WalkContext {
  readonly fs: FileSystemService
  readonly path: PathService
  readonly suffix: string
  readonly sink: WarningSink
}

const listDirectory = (
  context: WalkContext,
  directory: string,
  files: Set<CanonicalPath>
): Effect.Effect<ReadonlyArray<string>> =>
  Effect.gen(function*(_) {
    const entries = yield* _(Effect.either(context.fs.readDirectory(directory)))
    if (Either.isLeft(entries)) {
      yield* _(
        context.sink.record({
          type: "unreadable-directory",
          path: directory,
          error: describeError(entries.left)
        })
      )
      return []
    }
    const subdirectories: Array<string> = []
    for (const name of entries.right.toSorted(compareStrings)) {
      const entry = context.path.resolve(directory, name)
      const info = yield* _(Effect.either(context.fs.stat(entry)))
      if (Either.isLeft(info)) {
        yield* _(Effect.logDebug(`skipping ${entry}: ${describeError(info.left)}`))
        continue
      }
      if (info.right.type === "Directory") {
        subdirectories.push(entry)
      } else if (info.right.type === "File" && name.endsWith(context.suffix)) {
        files.add(yield* _(realOrSelf(context.fs, entry)))
      }
    }
    return subdirectories
  })

/**
 * Walk the source root and collect canonical paths of all source files.
 *
 * @param sourceRoot - Canonical source root (must exist, see ensureSourceRoot).
 * @param suffix - Recognized source suffix, e.g. ".dart".
 * @param sink - Receives unreadable-directory warnings.
 * @returns The Universe.
 *
 * @pure false
 * @effect FileSystem, Path
 * @invariant unreadable directories are skipped, never fatal
 * @complexity O(n)
 */
export const listSourceFiles = (
  sourceRoot: CanonicalPath,
  suffix: string,
  sink: WarningSink
): Effect.Effect<ReadonlySet<CanonicalPath>, never, FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const context: WalkContext = { fs, path, suffix, sink }
    const files = new Set<CanonicalPath>()
    const listed = new Set<string>()
    const stack: Array<string> = [path.resolve(sourceRoot)]
    while (stack.length > 0) {
      const directory = stack.pop()
      if (directory === undefined) {
        continue
      }
      const real = yield* _(realOrSelf(fs, directory))
      if (listed.has(real)) {
        continue
      }
      listed.add(real)
      const subdirectories = yield* _(listDirectory(context, directory, files))
      stack.push(...subdirectories.toReversed())
    }
    return files
  })
