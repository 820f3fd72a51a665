import { NodeContext } from "@effect/platform-node"
import { type PlatformError, SystemError } from "@effect/platform/Error"
import { FileSystem, type FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path, type Path as PathService } from "@effect/platform/Path"
import { Effect, Logger } from "effect"
import type { Scope } from "effect/Scope"

export interface TempContext {
  readonly fs: FileSystemService
  readonly path: PathService
  readonly tempDir: string
}

export const withTempDir = <A, E, R>(
  use: (context: TempContext) => Effect.Effect<A, E, R>
): Effect.Effect<A, E | PlatformError, R | FileSystemService | PathService | Scope> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const tempDir = yield* _(fs.realPath(yield* _(fs.makeTempDirectoryScoped())))
    return yield* _(use({ fs, path, tempDir }))
  })

/**
 * Write files relative to `root`, creating parent directories.
 */
export const writeTree = (
  context: TempContext,
  root: string,
  files: Readonly<Record<string, string>>
): Effect.Effect<void, PlatformError> =>
  Effect.forEach(
    Object.entries(files),
    ([relative, contents]) => {
      const target = context.path.join(root, relative)
      return context.fs.makeDirectory(context.path.dirname(target), { recursive: true }).pipe(
        Effect.zipRight(context.fs.writeFileString(target, contents))
      )
    },
    { discard: true }
  )

export const pubspec = (name: string, extra = ""): string => `name: ${name}\nversion: 1.0.0\n${extra}`

export const provideNodeContext = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
  effect.pipe(
    Effect.provide(NodeContext.layer),
    Effect.provide(Logger.replace(Logger.defaultLogger, Logger.none))
  )

/**
 * Wrap a FileSystem so that listing or reading one of `blocked` fails with PermissionDenied.
 */
export const denyingFileSystem = (
  fs: FileSystemService,
  blocked: ReadonlySet<string>
): FileSystemService => {
  const deny = (method: string, target: string) =>
    Effect.fail(SystemError({ reason: "PermissionDenied", module: "FileSystem", method, pathOrDescriptor: target }))
  return {
    ...fs,
    readDirectory: (target, options) =>
      blocked.has(target) ? deny("readDirectory", target) : fs.readDirectory(target, options),
    readFileString: (target, encoding) =>
      blocked.has(target) ? deny("readFileString", target) : fs.readFileString(target, encoding)
  }
}
