import * as Option from "effect/Option"

import type { CanonicalPath } from "./types.js"

// CHANGE: select traversal roots from the Universe
// WHY: "used" is only defined relative to program entry points
// QUOTE(TZ): "если main.dart нет, но проект Flutter, взять lib/main.dart"
// REF: req-entry-1
// SOURCE: n/a
// FORMAT THEOREM: entries = conventional ∪ explicit, or {frameworkDefault} when that union is empty
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: result has no duplicates; conventional entries keep Universe order
// COMPLEXITY: O(n)

export interface EntrySelection {
  readonly universe: ReadonlySet<CanonicalPath>
  readonly entryName: string
  readonly explicit: ReadonlyArray<CanonicalPath>
  readonly frameworkDefault: Option.Option<CanonicalPath>
  readonly basename: (path: CanonicalPath) => string
}

export const selectEntryPoints = (selection: EntrySelection): ReadonlyArray<CanonicalPath> => {
  const conventional = [...selection.universe].filter((file) => selection.basename(file) === selection.entryName)
  const combined = [...new Set([...conventional, ...selection.explicit])]
  if (combined.length > 0) {
    return combined
  }
  return Option.match(selection.frameworkDefault, {
    onNone: () => [],
    onSome: (file) => [file]
  })
}
