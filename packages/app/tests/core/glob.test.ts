import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { compileGlobs, matchesAnyGlob } from "../../src/core/glob.js"

describe("glob matching", () => {
  it.effect("drops empty patterns", () =>
    Effect.sync(() => {
      expect(compileGlobs(["**/*.g.dart", " ", "lib/generated/*"])).toHaveLength(2)
    }))

  it.effect("matches across directories only with **", () =>
    Effect.sync(() => {
      const globs = compileGlobs(["**/*.g.dart", "lib/generated/*"])
      expect(matchesAnyGlob(globs, ["lib/models/user.g.dart"])).toBe(true)
      expect(matchesAnyGlob(globs, ["user.g.dart"])).toBe(true)
      expect(matchesAnyGlob(globs, ["lib/generated/a.dart"])).toBe(true)
      expect(matchesAnyGlob(globs, ["lib/generated/deep/a.dart"])).toBe(false)
    }))

  it.effect("accepts any spelling of the same file", () =>
    Effect.sync(() => {
      const globs = compileGlobs(["generated/*.dart"])
      expect(matchesAnyGlob(globs, ["lib/generated/a.dart", "./generated/a.dart"])).toBe(true)
      expect(matchesAnyGlob(globs, ["lib\\generated\\a.dart"])).toBe(false)
    }))
})
