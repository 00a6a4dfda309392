/**
 * Error hierarchy for the stormwater network model.
 *
 * Construction either yields a permanently valid entity or fails with one of
 * these tagged errors, so callers can pattern match with `Effect.catchTag`.
 * Nothing here is retried: every failure names the entity kind and the rule
 * that was broken so the input can be corrected before any output is written.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Raised when an entity cannot be constructed from the supplied fields: a value
 * outside its range or enumeration, a reference of the wrong kind, a variant
 * missing a field its tag requires, or paired sequences that do not line up.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new InvalidEntityError({ kind: "Transect", entity: "t1", rule: "xleft must be one of the station values" })
 * yield* Effect.fail(error)
 * ```
 */
export class InvalidEntityError extends Data.TaggedError("InvalidEntityError")<{
  readonly kind: string
  readonly entity?: string | undefined
  readonly rule: string
}> {
  override get message(): string {
    const subject = this.entity === undefined ? this.kind : `${this.kind} "${this.entity}"`
    return `Invalid ${subject}: ${this.rule}`
  }
}

/**
 * Raised when a construct known to the input format has no implementation
 * here. It fails unconditionally, whatever the fields.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnsupportedFeatureError extends Data.TaggedError("UnsupportedFeatureError")<{
  readonly feature: string
}> {
  override get message(): string {
    return `${this.feature} is not supported`
  }
}

/**
 * Raised by the opt-in document check when names collide or references point
 * at entities the document does not contain.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DocumentIntegrityError extends Data.TaggedError("DocumentIntegrityError")<{
  readonly problems: ReadonlyArray<string>
}> {
  override get message(): string {
    return `Document failed integrity check: ${this.problems.join("; ")}`
  }
}

/**
 * Union of the errors entity construction can fail with.
 *
 * @category Errors
 * @since 0.1.0
 */
export type EntityError = InvalidEntityError | UnsupportedFeatureError
