import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import {
  extractDirectives,
  firstPartitionOf,
  importUris,
  parseDirectiveHeader,
  partitionUris,
  scanDirectivePatterns
} from "../../src/core/directives.js"

describe("parseDirectiveHeader", () => {
  it.effect("reads imports, exports and parts in source order", () =>
    Effect.sync(() => {
      const source = [
        "// Copyright header",
        "library app.home;",
        "",
        "import 'dart:async';",
        "import \"package:demo/widgets/button.dart\" as button show Button, Icon;",
        "export 'src/api.dart' hide Internal;",
        "part 'home.g.dart';",
        "",
        "class Home {}"
      ].join("\n")
      const parsed = parseDirectiveHeader(source)
      expect(Either.getOrThrow(parsed)).toStrictEqual([
        { _tag: "Import", uri: "dart:async", keyword: "import" },
        { _tag: "Import", uri: "package:demo/widgets/button.dart", keyword: "import" },
        { _tag: "Import", uri: "src/api.dart", keyword: "export" },
        { _tag: "Partition", uri: "home.g.dart" }
      ])
    }))

  it.effect("treats every conditional alternative as an import", () =>
    Effect.sync(() => {
      const source = "import 'stub.dart'\n  if (dart.library.io) 'io.dart'\n  if (dart.library.html) 'web.dart';\n"
      const parsed = parseDirectiveHeader(source)
      expect(importUris(Either.getOrThrow(parsed))).toStrictEqual(["stub.dart", "io.dart", "web.dart"])
    }))

  it.effect("skips annotations, deferred prefixes and block comments", () =>
    Effect.sync(() => {
      const source = [
        "#!/usr/bin/env dart",
        "/* outer /* nested */ still comment */",
        "@Deprecated('use v2')",
        "import 'legacy.dart' deferred as legacy;",
        "@pragma('vm:entry-point')",
        "void main() {}"
      ].join("\n")
      expect(importUris(Either.getOrThrow(parseDirectiveHeader(source)))).toStrictEqual(["legacy.dart"])
    }))

  it.effect("reads both forms of part of", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(parseDirectiveHeader("part of 'env.dart';\n"))).toStrictEqual([
        { _tag: "PartitionOf", target: { _tag: "Uri", uri: "env.dart" } }
      ])
      expect(Either.getOrThrow(parseDirectiveHeader("part of app.models;\n"))).toStrictEqual([
        { _tag: "PartitionOf", target: { _tag: "LibraryName", name: "app.models" } }
      ])
    }))

  it.effect("fails on an unterminated string literal", () =>
    Effect.sync(() => {
      const parsed = parseDirectiveHeader("import 'broken.dart\n")
      expect(Either.isLeft(parsed) ? parsed.left : undefined).toBe("Unterminated string literal")
    }))

  it.effect("stops at the first declaration", () =>
    Effect.sync(() => {
      const source = "import 'a.dart';\nvoid main() {}\nimport 'b.dart';\n"
      expect(importUris(Either.getOrThrow(parseDirectiveHeader(source)))).toStrictEqual(["a.dart"])
    }))
})

describe("extractDirectives", () => {
  it.effect("uses the structured tier when it succeeds", () =>
    Effect.sync(() => {
      const extracted = extractDirectives("import 'a.dart';\n")
      expect(extracted.tier).toBe("structured")
      expect(extracted.error).toBeUndefined()
      expect(importUris(extracted.directives)).toStrictEqual(["a.dart"])
    }))

  it.effect("recovers directives from a malformed file with the fallback tier", () =>
    Effect.sync(() => {
      const source = "import 'a.dart';\nimport 'b.dart' as @@;\nimport 'c.dart';\n"
      const extracted = extractDirectives(source)
      expect(extracted.tier).toBe("fallback")
      expect(extracted.error).toBe("Unexpected '@' in import directive")
      expect(importUris(extracted.directives)).toStrictEqual(["a.dart", "b.dart", "c.dart"])
    }))

  it.effect("finds nothing in an incomplete part of", () =>
    Effect.sync(() => {
      const extracted = extractDirectives("part of 'incomplete\n")
      expect(extracted.tier).toBe("fallback")
      expect(extracted.directives).toStrictEqual([])
      expect(firstPartitionOf(extracted.directives)).toBeUndefined()
    }))

  it.effect("keeps only the first part of declaration", () =>
    Effect.sync(() => {
      const extracted = extractDirectives("part of 'first.dart';\npart of 'second.dart';\n")
      expect(firstPartitionOf(extracted.directives)).toStrictEqual({ _tag: "Uri", uri: "first.dart" })
    }))

  it.effect("falls back silently when the header has no directives", () =>
    Effect.sync(() => {
      const extracted = extractDirectives("void main() {}\n")
      expect(extracted).toStrictEqual({ directives: [], tier: "fallback", error: undefined })
    }))
})

describe("scanDirectivePatterns", () => {
  it.effect("matches line-anchored directives only", () =>
    Effect.sync(() => {
      const source = "  part 'x.g.dart';\nfinal s = \"import 'nope.dart'\";\nexport \"y.dart\";\n"
      const directives = scanDirectivePatterns(source)
      expect(partitionUris(directives)).toStrictEqual(["x.g.dart"])
      expect(importUris(directives)).toStrictEqual(["y.dart"])
    }))
})
