import type { CanonicalPath } from "./types.js"

// CHANGE: correct false positives for `part of` files after the import closure
// WHY: part files are stitched into their parent by the compiler and are never imported
// QUOTE(TZ): "env.g.dart не должен попадать в отчёт, если env.dart используется"
// REF: req-generated-1
// SOURCE: n/a
// FORMAT THEOREM: ∀g ∈ C with parent p: g ∈ Final ↔ exists(p) ∧ p ∈ C
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Final ⊆ Candidates; files without a part-of link pass through unchanged
// COMPLEXITY: O(n)

export type ParentLink =
  | { readonly _tag: "Parent"; readonly parent: CanonicalPath }
  | { readonly _tag: "Orphaned"; readonly reference: string }

export interface PartitionCorrection {
  readonly unused: ReadonlySet<CanonicalPath>
  readonly revived: ReadonlyArray<{ readonly file: CanonicalPath; readonly parent: CanonicalPath }>
  readonly orphaned: ReadonlyArray<{ readonly file: CanonicalPath; readonly reference: string }>
}

/**
 * Apply the partition correction to the unused candidate set.
 *
 * @param candidates - Universe minus reachable.
 * @param links - First `part of` link of each candidate that declares one.
 * @returns Final unused set plus the partitions that were dropped and why.
 *
 * @pure true
 * @invariant a partition whose parent is itself a candidate stays (the whole family is dead)
 * @complexity O(n)
 */
export const correctPartitions = (
  candidates: ReadonlySet<CanonicalPath>,
  links: ReadonlyMap<CanonicalPath, ParentLink>
): PartitionCorrection => {
  const unused = new Set<CanonicalPath>()
  const revived: Array<{ readonly file: CanonicalPath; readonly parent: CanonicalPath }> = []
  const orphaned: Array<{ readonly file: CanonicalPath; readonly reference: string }> = []
  for (const file of candidates) {
    const link = links.get(file)
    if (link === undefined) {
      unused.add(file)
    } else if (link._tag === "Orphaned") {
      orphaned.push({ file, reference: link.reference })
    } else if (candidates.has(link.parent)) {
      unused.add(file)
    } else {
      revived.push({ file, parent: link.parent })
    }
  }
  return { unused, revived, orphaned }
}
