import { Effect, ParseResult, Predicate, Schema } from "effect"
import { InvalidEntityError } from "../Errors.js"

const nameOf = (input: unknown): string | undefined =>
  Predicate.hasProperty(input, "name") && Predicate.isString(input.name) ? input.name : undefined

/**
 * Flattens every issue of a parse failure into `path: message` rules.
 */
export const formatRules = (error: ParseResult.ParseError): string =>
  ParseResult.ArrayFormatter.formatErrorSync(error)
    .map((issue) => (issue.path.length === 0 ? issue.message : `${issue.path.join(".")}: ${issue.message}`))
    .join("; ")

/**
 * Builds the caller-facing constructor of an entity kind: unknown-shaped input
 * is decoded against the entity schema and every violated rule is reported in
 * a single `InvalidEntityError`.
 */
export const makeEntity = <A, I>(kind: string, schema: Schema.Schema<A, I, never>) => {
  const decode = Schema.decodeUnknown(schema, { errors: "all" })
  return (input: I): Effect.Effect<A, InvalidEntityError> =>
    decode(input).pipe(
      Effect.mapError((error) => new InvalidEntityError({ kind, entity: nameOf(input), rule: formatRules(error) })),
    )
}
