import * as Effect from "effect/Effect"

import type { CanonicalPath } from "./types.js"

// CHANGE: compute the transitive closure of import edges from the entry set
// WHY: every file outside the closure is an unused candidate
// QUOTE(TZ): "повторный вход (A→B→A) посещает каждый файл ровно один раз"
// REF: req-traverse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f: f ∈ closure(E) ↔ ∃ finite chain e →* f with e ∈ E
// PURITY: CORE
// EFFECT: Effect<ReadonlySet<CanonicalPath>, E, R> (effects come only from `successors`)
// INVARIANT: each node is expanded at most once; E ⊆ closure(E)
// COMPLEXITY: O(V + E)

/**
 * Iterative depth-first closure over an effectful successor function.
 *
 * @param entries - Traversal roots.
 * @param successors - Resolved outgoing edges of a node.
 * @returns Set of every node reachable from the roots, roots included.
 *
 * @pure true (given a pure `successors`)
 * @invariant visited set only grows; revisits are skipped
 * @complexity O(V + E)
 */
export const traverseClosure = <E, R>(
  entries: Iterable<CanonicalPath>,
  successors: (node: CanonicalPath) => Effect.Effect<ReadonlyArray<CanonicalPath>, E, R>
): Effect.Effect<ReadonlySet<CanonicalPath>, E, R> =>
  Effect.gen(function*(_) {
    const visited = new Set<CanonicalPath>()
    const stack: Array<CanonicalPath> = [...entries].reverse()
    while (stack.length > 0) {
      const node = stack.pop()
      if (node === undefined || visited.has(node)) {
        continue
      }
      visited.add(node)
      const next = yield* _(successors(node))
      for (let index = next.length - 1; index >= 0; index -= 1) {
        const target = next[index]
        if (target !== undefined && !visited.has(target)) {
          stack.push(target)
        }
      }
    }
    return visited
  })

/**
 * Universe minus reachable, in Universe iteration order.
 *
 * @pure true
 * @complexity O(n)
 */
export const unusedCandidates = (
  universe: ReadonlySet<CanonicalPath>,
  reachable: ReadonlySet<CanonicalPath>
): ReadonlySet<CanonicalPath> => new Set([...universe].filter((file) => !reachable.has(file)))
