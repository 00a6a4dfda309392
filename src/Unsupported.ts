/**
 * Constructs the input format knows about but this library does not model yet.
 *
 * Each one is a class whose constructor throws, and whose `make` fails, with
 * `UnsupportedFeatureError`. Other entities may still declare a reference to
 * them so their variants keep the full shape of the format.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { UnsupportedFeatureError } from "./Errors.js"

/**
 * Class factory for an unsupported construct named `feature`.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * class Pattern extends Unsupported<{ readonly name: string }>("Pattern") {}
 * new Pattern({ name: "p1" }) // throws UnsupportedFeatureError
 * ```
 */
export const Unsupported = <Props>(feature: string) =>
  class {
    constructor(_props: Props) {
      throw new UnsupportedFeatureError({ feature })
    }

    static make(_props: Props): Effect.Effect<never, UnsupportedFeatureError> {
      return Effect.fail(new UnsupportedFeatureError({ feature }))
    }
  }
