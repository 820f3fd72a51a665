import type { Path as PathService } from "@effect/platform/Path"

import type { CanonicalPath } from "./types.js"

// CHANGE: classify Dart import URIs before touching the file system
// WHY: keep scheme rules pure so the shell only has to check existence
// QUOTE(TZ): "package:<другой пакет>/... никогда не должен указывать в дерево текущего проекта"
// REF: req-resolve-1
// SOURCE: n/a
// FORMAT THEOREM: ∀u: classify(u) = Candidate(p) → scheme(u) ∈ {package:self, none}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: package URIs naming another package never yield a Candidate
// COMPLEXITY: O(|u|)

export interface ResolveContext {
  readonly packageName: string
  readonly sourceRoot: CanonicalPath
}

export type UriClass =
  | { readonly _tag: "Builtin"; readonly uri: string }
  | { readonly _tag: "External"; readonly uri: string; readonly packageName: string }
  | { readonly _tag: "Unsupported"; readonly uri: string; readonly scheme: string }
  | { readonly _tag: "Candidate"; readonly uri: string; readonly path: CanonicalPath }

const schemePattern = /^([A-Za-z][A-Za-z0-9+.-]*):/u

const packagePattern = /^package:([^/]+)\/(.*)$/u

export const uriScheme = (uri: string): string | undefined => schemePattern.exec(uri)?.[1]

const classifyPackageUri = (
  uri: string,
  context: ResolveContext,
  path: PathService
): UriClass => {
  const match = packagePattern.exec(uri)
  const name = match?.[1]
  const relativePath = match?.[2]
  if (name === undefined || relativePath === undefined) {
    return { _tag: "External", uri, packageName: uri.slice("package:".length) }
  }
  if (name !== context.packageName || relativePath.length === 0) {
    return { _tag: "External", uri, packageName: name }
  }
  const resolved = path.resolve(context.sourceRoot, relativePath)
  const inside = path.relative(context.sourceRoot, resolved)
  // package: URIs never leave the package's source root
  if (inside.startsWith("..") || path.isAbsolute(inside)) {
    return { _tag: "External", uri, packageName: name }
  }
  return { _tag: "Candidate", uri, path: resolved }
}

/**
 * Classify an import URI relative to the importing file.
 *
 * @param uri - Raw URI from an import/export/part directive.
 * @param fromFile - Canonical path of the importing file.
 * @param context - Own package name and source root.
 * @param path - Path service used for joining and normalization.
 * @returns UriClass; only Candidate needs an existence check.
 *
 * @pure true
 * @invariant Candidate.path is absolute and normalized
 * @complexity O(|uri|)
 */
export const classifyUri = (
  uri: string,
  fromFile: CanonicalPath,
  context: ResolveContext,
  path: PathService
): UriClass => {
  const trimmed = uri.trim()
  const scheme = uriScheme(trimmed)
  if (scheme === "dart") {
    return { _tag: "Builtin", uri: trimmed }
  }
  if (scheme === "package") {
    return classifyPackageUri(trimmed, context, path)
  }
  if (scheme !== undefined) {
    return { _tag: "Unsupported", uri: trimmed, scheme }
  }
  return { _tag: "Candidate", uri: trimmed, path: path.resolve(path.dirname(fromFile), trimmed) }
}
