import * as Effect from "effect/Effect"
import * as Ref from "effect/Ref"

import { formatWarning } from "../core/report.js"
import type { Warning } from "../core/types.js"

// CHANGE: collect recoverable per-file problems while logging them
// WHY: recoverable errors degrade one file, never the run, but must stay visible
// QUOTE(TZ): "логируется как предупреждение, не фатально"
// REF: req-warnings-1
// SOURCE: n/a
// FORMAT THEOREM: ∀w: record(w) → w ∈ snapshot ∧ logged(w)
// PURITY: SHELL
// EFFECT: Effect<WarningSink>
// INVARIANT: snapshot preserves recording order
// COMPLEXITY: O(1) per record

export interface WarningSink {
  readonly record: (warning: Warning) => Effect.Effect<void>
  readonly snapshot: Effect.Effect<ReadonlyArray<Warning>>
}

export const makeWarningSink: Effect.Effect<WarningSink> = Effect.map(
  Ref.make<ReadonlyArray<Warning>>([]),
  (ref) => ({
    record: (warning) =>
      Ref.update(ref, (warnings) => [...warnings, warning]).pipe(
        Effect.zipRight(Effect.logWarning(formatWarning(warning)))
      ),
    snapshot: Ref.get(ref)
  })
)
