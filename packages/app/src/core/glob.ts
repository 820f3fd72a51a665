// CHANGE: glob matching for `exclude` patterns over project paths
// WHY: let users drop generated or vendored sources from the Universe
// QUOTE(TZ): "исключить **/*.freezed.dart из анализа"
// REF: req-glob-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: match(glob, p) ∈ {true,false}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: '*' never matches path separator '/'
// COMPLEXITY: O(n) per match

const normalizeSlashes = (value: string): string => value.replaceAll("\\", "/")

const stripDotSlash = (value: string): string => value.startsWith("./") ? value.slice(2) : value

const escapeRegex = (value: string): string => value.replaceAll(/[.+^${}()|[\]\\]/gu, String.raw`\$&`)

const globToRegex = (pattern: string): RegExp => {
  const normalized = stripDotSlash(normalizeSlashes(pattern.trim()))
  let regex = "^"
  let index = 0
  while (index < normalized.length) {
    const char = normalized.charAt(index)
    if (char === "*" && normalized.charAt(index + 1) === "*") {
      const slashFollows = normalized.charAt(index + 2) === "/"
      regex += slashFollows ? "(?:.*/)?" : ".*"
      index += slashFollows ? 3 : 2
      continue
    }
    if (char === "*") {
      regex += "[^/]*"
    } else if (char === "?") {
      regex += "[^/]"
    } else {
      regex += escapeRegex(char)
    }
    index += 1
  }
  return new RegExp(`${regex}$`, "u")
}

/**
 * Compile glob patterns into regexes.
 *
 * @pure true
 * @invariant compiled regexes match only whole paths
 * @complexity O(n) where n = total pattern length
 */
export const compileGlobs = (patterns: ReadonlyArray<string>): ReadonlyArray<RegExp> =>
  patterns.filter((pattern) => pattern.trim().length > 0).map((pattern) => globToRegex(pattern))

/**
 * Check whether any glob matches any of the candidate spellings of one path.
 *
 * @param globs - Compiled patterns.
 * @param candidates - The same file written relative to different roots.
 *
 * @pure true
 * @complexity O(k·c)
 */
export const matchesAnyGlob = (
  globs: ReadonlyArray<RegExp>,
  candidates: ReadonlyArray<string>
): boolean =>
  candidates.some((candidate) => {
    const normalized = stripDotSlash(normalizeSlashes(candidate))
    return globs.some((glob) => glob.test(normalized))
  })
