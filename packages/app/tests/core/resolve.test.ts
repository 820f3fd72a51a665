import { describe, expect, it } from "@effect/vitest"
import { Path } from "@effect/platform/Path"
import { Effect } from "effect"

import { classifyUri, uriScheme } from "../../src/core/resolve.js"
import { provideNodeContext } from "../app/test-helpers.js"

const context = { packageName: "demo", sourceRoot: "/work/demo/lib" }
const importer = "/work/demo/lib/src/pages/home.dart"

describe("classifyUri", () => {
  it.effect("never expands dart: URIs", () =>
    Effect.gen(function*(_) {
      const path = yield* _(Path)
      expect(classifyUri("dart:io", importer, context, path)).toStrictEqual({ _tag: "Builtin", uri: "dart:io" })
    }).pipe(provideNodeContext))

  it.effect("maps the own package onto the source root", () =>
    Effect.gen(function*(_) {
      const path = yield* _(Path)
      expect(classifyUri("package:demo/src/api.dart", importer, context, path)).toStrictEqual({
        _tag: "Candidate",
        uri: "package:demo/src/api.dart",
        path: "/work/demo/lib/src/api.dart"
      })
    }).pipe(provideNodeContext))

  it.effect("keeps own package URIs that climb out of the source root external", () =>
    Effect.gen(function*(_) {
      const path = yield* _(Path)
      expect(classifyUri("package:demo/../tool/gen.dart", importer, context, path)).toStrictEqual({
        _tag: "External",
        uri: "package:demo/../tool/gen.dart",
        packageName: "demo"
      })
    }).pipe(provideNodeContext))

  it.effect("keeps other packages external even when their name starts with the own name", () =>
    Effect.gen(function*(_) {
      const path = yield* _(Path)
      expect(classifyUri("package:demo_extras/src/api.dart", importer, context, path)).toStrictEqual({
        _tag: "External",
        uri: "package:demo_extras/src/api.dart",
        packageName: "demo_extras"
      })
    }).pipe(provideNodeContext))

  it.effect("resolves relative URIs against the importing directory", () =>
    Effect.gen(function*(_) {
      const path = yield* _(Path)
      expect(classifyUri("../models/user.dart", importer, context, path)).toStrictEqual({
        _tag: "Candidate",
        uri: "../models/user.dart",
        path: "/work/demo/lib/src/models/user.dart"
      })
    }).pipe(provideNodeContext))

  it.effect("reports other schemes as unsupported", () =>
    Effect.gen(function*(_) {
      const path = yield* _(Path)
      expect(classifyUri("file:///tmp/x.dart", importer, context, path)).toStrictEqual({
        _tag: "Unsupported",
        uri: "file:///tmp/x.dart",
        scheme: "file"
      })
    }).pipe(provideNodeContext))
})

describe("uriScheme", () => {
  it.effect("returns undefined for relative paths", () =>
    Effect.sync(() => {
      expect(uriScheme("src/a.dart")).toBeUndefined()
      expect(uriScheme("package:demo/a.dart")).toBe("package")
    }))
})
