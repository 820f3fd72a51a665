import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"

import type { CliArgs } from "../core/cli.js"
import type { RunConfig } from "../core/config.js"
import { configFileName, entryName, manifestFileName, resolveConfig, sourceSuffix } from "../core/config.js"
import { firstPartitionOf, importUris, partitionUris } from "../core/directives.js"
import { selectEntryPoints } from "../core/entry.js"
import type { AppError } from "../core/errors.js"
import { noEntryPoint } from "../core/errors.js"
import { compileGlobs, matchesAnyGlob } from "../core/glob.js"
import type { ParentLink } from "../core/partition.js"
import { correctPartitions } from "../core/partition.js"
import { traverseClosure, unusedCandidates } from "../core/reachability.js"
import type { ResolveContext } from "../core/resolve.js"
import { classifyUri } from "../core/resolve.js"
import type { AnalysisOutcome, CanonicalPath, PartitionTarget } from "../core/types.js"
import { loadConfigFile } from "./config-file.js"
import { canonicalFile, ensureSourceRoot, listSourceFiles, realPathOf } from "./inventory.js"
import { readManifest } from "./manifest.js"
import { resolveImport } from "./resolver.js"
import type { SourceStore } from "./sources.js"
import { makeSourceStore } from "./sources.js"
import type { WarningSink } from "./warnings.js"
import { makeWarningSink } from "./warnings.js"

// CHANGE: orchestrate inventory, entry selection, traversal, and partition correction
// WHY: one sequential run produces the Final Unused Set or aborts before traversal
// QUOTE(TZ): "замыкание всегда вычисляется до конца, либо запуск прерывается до обхода"
// REF: req-analyze-1
// SOURCE: n/a
// FORMAT THEOREM: Final = correct(Universe − closure(Entries))
// PURITY: SHELL
// EFFECT: Effect<AnalysisOutcome, AppError, FileSystem | Path>
// INVARIANT: Entries ⊆ Reachable; Final ⊆ Candidates ⊆ Universe
// COMPLEXITY: O(V + E) plus file reads

type AnalyzeEnv = FileSystemService | PathService

/**
 * Build the immutable run configuration: fatal preconditions are checked here.
 *
 * @param cli - Parsed CLI arguments.
 * @returns RunConfig for the project.
 *
 * @pure false
 * @effect FileSystem, Path
 * @invariant fails with SourceRootNotFound before ManifestError
 * @complexity O(1) file system calls
 */
export const loadRunConfig = (
  cli: CliArgs
): Effect.Effect<RunConfig, AppError, AnalyzeEnv> =>
  Effect.gen(function*(_) {
    const path = yield* _(Path)
    const projectRoot = yield* _(realPathOf(path.resolve(cli.projectPath)))
    const configPath = cli.configPath === undefined
      ? path.join(projectRoot, configFileName)
      : path.resolve(cli.configPath)
    const fileConfig = yield* _(loadConfigFile(configPath, cli.configPathExplicit))
    const resolved = resolveConfig(cli, fileConfig)
    const requestedRoot = path.resolve(projectRoot, resolved.sourceDir)
    yield* _(ensureSourceRoot(requestedRoot))
    const sourceRoot = yield* _(realPathOf(requestedRoot))
    const manifestPath = path.join(projectRoot, manifestFileName)
    const project = yield* _(readManifest(manifestPath))
    return {
      projectRoot,
      sourceRoot,
      manifestPath,
      packageName: project.packageName,
      usesFlutter: project.usesFlutter,
      sourceSuffix,
      entryName,
      extraEntries: resolved.entryPoints.map((entry) => path.resolve(projectRoot, entry)),
      exclude: compileGlobs(resolved.exclude)
    }
  })

const isExcluded = (config: RunConfig, path: PathService, file: CanonicalPath): boolean =>
  config.exclude.length > 0 &&
  matchesAnyGlob(config.exclude, [path.relative(config.projectRoot, file), path.relative(config.sourceRoot, file)])

const existingEntries = (
  config: RunConfig,
  sink: WarningSink
): Effect.Effect<ReadonlyArray<CanonicalPath>, never, FileSystemService> =>
  Effect.gen(function*(_) {
    const found: Array<CanonicalPath> = []
    for (const entry of config.extraEntries) {
      const canonical = yield* _(canonicalFile(entry))
      if (Option.isSome(canonical)) {
        found.push(canonical.value)
      } else {
        yield* _(sink.record({ type: "missing-entry", path: entry }))
      }
    }
    return found
  })

const frameworkDefaultEntry = (
  config: RunConfig,
  path: PathService
): Effect.Effect<Option.Option<CanonicalPath>, never, FileSystemService> => {
  if (!config.usesFlutter) {
    return Effect.succeed(Option.none())
  }
  const candidate = path.join(config.sourceRoot, config.entryName)
  return canonicalFile(candidate)
}

const resolveImports = (
  file: CanonicalPath,
  store: SourceStore,
  context: ResolveContext,
  sink: WarningSink
): Effect.Effect<ReadonlyArray<CanonicalPath>, never, AnalyzeEnv> =>
  Effect.gen(function*(_) {
    const directives = yield* _(store.directives(file))
    const targets: Array<CanonicalPath> = []
    for (const uri of importUris(directives)) {
      const resolved = yield* _(resolveImport(uri, file, context, sink))
      if (Option.isSome(resolved)) {
        targets.push(resolved.value)
      }
    }
    return targets
  })

interface PartitionContext {
  readonly store: SourceStore
  readonly resolve: ResolveContext
  readonly universe: ReadonlySet<CanonicalPath>
  readonly path: PathService
}

const canonicalTarget = (
  uri: string,
  fromFile: CanonicalPath,
  context: PartitionContext
): Effect.Effect<Option.Option<CanonicalPath>, never, FileSystemService> => {
  const classified = classifyUri(uri, fromFile, context.resolve, context.path)
  return classified._tag === "Candidate" ? canonicalFile(classified.path) : Effect.succeed(Option.none())
}

// part file -> the Universe file whose `part '...'` directive names it
const indexPartOwners = (
  context: PartitionContext
): Effect.Effect<ReadonlyMap<CanonicalPath, CanonicalPath>, never, FileSystemService> =>
  Effect.gen(function*(_) {
    const owners = new Map<CanonicalPath, CanonicalPath>()
    for (const owner of context.universe) {
      const directives = yield* _(context.store.directives(owner))
      for (const uri of partitionUris(directives)) {
        const part = yield* _(canonicalTarget(uri, owner, context))
        if (Option.isSome(part) && !owners.has(part.value)) {
          owners.set(part.value, owner)
        }
      }
    }
    return owners
  })

const linkByUri = (
  file: CanonicalPath,
  uri: string,
  context: PartitionContext
): Effect.Effect<ParentLink, never, FileSystemService> =>
  Effect.map(canonicalTarget(uri, file, context), (parent): ParentLink =>
    Option.isSome(parent) ? { _tag: "Parent", parent: parent.value } : { _tag: "Orphaned", reference: uri })

const collectParentLinks = (
  candidates: ReadonlySet<CanonicalPath>,
  context: PartitionContext
): Effect.Effect<ReadonlyMap<CanonicalPath, ParentLink>, never, FileSystemService> =>
  Effect.gen(function*(_) {
    const links = new Map<CanonicalPath, ParentLink>()
    let owners: ReadonlyMap<CanonicalPath, CanonicalPath> | undefined
    for (const file of candidates) {
      const target: PartitionTarget | undefined = firstPartitionOf(yield* _(context.store.directives(file)))
      if (target === undefined) {
        continue
      }
      if (target._tag === "Uri") {
        links.set(file, yield* _(linkByUri(file, target.uri, context)))
        continue
      }
      owners = owners ?? (yield* _(indexPartOwners(context)))
      const owner = owners.get(file)
      links.set(file, owner === undefined ? { _tag: "Orphaned", reference: target.name } : { _tag: "Parent", parent: owner })
    }
    return links
  })

/**
 * Run the reachability analysis for a project.
 *
 * @param config - Immutable run configuration.
 * @returns AnalysisOutcome with the Final Unused Set.
 *
 * @pure false
 * @effect FileSystem, Path, Logger
 * @invariant fails only with NoEntryPoint; every other problem is a Warning
 * @complexity O(V + E)
 */
export const analyzeProject = (
  config: RunConfig
): Effect.Effect<AnalysisOutcome, AppError, AnalyzeEnv> =>
  Effect.gen(function*(_) {
    const path = yield* _(Path)
    const sink = yield* _(makeWarningSink)
    const scanned = yield* _(listSourceFiles(config.sourceRoot, config.sourceSuffix, sink))
    const universe: ReadonlySet<CanonicalPath> = new Set(
      [...scanned].filter((file) => !isExcluded(config, path, file))
    )
    const explicit = yield* _(existingEntries(config, sink))
    const frameworkDefault = yield* _(frameworkDefaultEntry(config, path))
    const entryPoints = selectEntryPoints({
      universe,
      entryName: config.entryName,
      explicit,
      frameworkDefault,
      basename: (file) => path.basename(file)
    })
    if (entryPoints.length === 0) {
      return yield* _(Effect.fail(noEntryPoint(config.sourceRoot, config.entryName)))
    }
    yield* _(Effect.logDebug(`entry points: ${entryPoints.join(", ")}`))

    const store = makeSourceStore(sink)
    const resolveContext: ResolveContext = { packageName: config.packageName, sourceRoot: config.sourceRoot }
    const reachable = yield* _(
      traverseClosure(entryPoints, (file) => resolveImports(file, store, resolveContext, sink))
    )
    const candidates = unusedCandidates(universe, reachable)
    const links = yield* _(
      collectParentLinks(candidates, { store, resolve: resolveContext, universe, path })
    )
    const correction = correctPartitions(candidates, links)
    for (const orphan of correction.orphaned) {
      yield* _(sink.record({ type: "orphaned-partition", file: orphan.file, parent: orphan.reference }))
    }
    for (const entry of correction.revived) {
      yield* _(Effect.logDebug(`${entry.file} is part of reachable ${entry.parent}`))
    }
    const warnings = yield* _(sink.snapshot)
    return {
      projectRoot: config.projectRoot,
      universe,
      entryPoints,
      reachable,
      candidates,
      unused: correction.unused,
      revived: correction.revived,
      warnings
    }
  })
