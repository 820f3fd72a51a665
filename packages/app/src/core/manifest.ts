import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"
import * as Option from "effect/Option"
import { parse } from "yaml"

// CHANGE: decode pubspec.yaml into the fields the analyzer needs
// WHY: the package name drives package: resolution; the flutter marker drives the default entry
// QUOTE(TZ): "битый pubspec.yaml не должен ломать анализ, не заполняется только конкретное поле"
// REF: req-manifest-1
// SOURCE: n/a
// FORMAT THEOREM: ∀raw: decode(raw).name = yaml(raw).name if yaml(raw) is well-formed else line(raw, "name:")
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: decoding never fails; malformed input only degrades individual fields
// COMPLEXITY: O(n)

export interface ProjectManifest {
  readonly name: Option.Option<string>
  readonly usesFlutter: boolean
  readonly parseError: string | undefined
}

const PubspecSchema = S.partial(
  S.Struct({
    name: S.String,
    flutter: S.Unknown,
    dependencies: S.NullOr(S.Record({ key: S.String, value: S.Unknown }))
  })
)

type Pubspec = S.Schema.Type<typeof PubspecSchema>

const namePattern = /^name:[ \t]*(\S+)/mu

const flutterPattern = /^[ \t]*flutter[ \t]*:/mu

const unquote = (value: string): string => {
  const first = value.charAt(0)
  if (value.length >= 2 && (first === "'" || first === "\"") && value.endsWith(first)) {
    return value.slice(1, -1)
  }
  return value
}

const nonEmpty = (value: string | undefined): Option.Option<string> =>
  pipe(
    Option.fromNullable(value),
    Option.map((name) => name.trim()),
    Option.filter((name) => name.length > 0)
  )

const parseYaml = (raw: string): Either.Either<Pubspec, string> =>
  pipe(
    Either.try({
      try: (): unknown => parse(raw),
      catch: (error) => error instanceof Error ? error.message : String(error)
    }),
    Either.flatMap((document) =>
      pipe(
        S.decodeUnknownEither(PubspecSchema)(document),
        Either.mapLeft((error) => TreeFormatter.formatErrorSync(error))
      )
    )
  )

const fromPubspec = (pubspec: Pubspec): ProjectManifest => ({
  name: nonEmpty(pubspec.name),
  usesFlutter: pubspec.flutter !== undefined ||
    (pubspec.dependencies !== undefined && pubspec.dependencies !== null &&
      Object.hasOwn(pubspec.dependencies, "flutter")),
  parseError: undefined
})

const fromLines = (raw: string, parseError: string): ProjectManifest => ({
  name: pipe(nonEmpty(namePattern.exec(raw)?.[1]), Option.map(unquote)),
  usesFlutter: flutterPattern.test(raw),
  parseError
})

/**
 * Decode pubspec.yaml contents.
 *
 * @param raw - Manifest text.
 * @returns ProjectManifest; line patterns are used when the YAML is malformed.
 *
 * @pure true
 * @invariant usesFlutter is true iff a flutter section or flutter dependency is declared
 * @complexity O(n)
 */
export const decodeManifest = (raw: string): ProjectManifest => {
  const structured = parseYaml(raw)
  return Either.isRight(structured) ? fromPubspec(structured.right) : fromLines(raw, structured.left)
}
