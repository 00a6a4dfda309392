import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import { DocumentIntegrityError, InvalidEntityError, UnsupportedFeatureError } from "../src/Errors.js"

describe("Entity error hierarchy", () => {
  it("formats invalid entity message with a name", () => {
    const error = new InvalidEntityError({ kind: "Junction", entity: "j1", rule: "elevation: Expected a finite number" })

    expect(error.message).toBe("Invalid Junction \"j1\": elevation: Expected a finite number")
  })

  it("formats invalid entity message without a name", () => {
    const error = new InvalidEntityError({ kind: "Options", rule: "threads: Expected a positive number" })

    expect(error.entity).toBeUndefined()
    expect(error.message).toBe("Invalid Options: threads: Expected a positive number")
  })

  it("formats unsupported feature message", () => {
    expect(new UnsupportedFeatureError({ feature: "Curve" }).message).toBe("Curve is not supported")
  })

  it("lists every integrity problem", () => {
    const error = new DocumentIntegrityError({ problems: ["duplicate node name \"j1\"", "vertex refers to missing link \"c9\""] })

    expect(error.message).toBe(
      "Document failed integrity check: duplicate node name \"j1\"; vertex refers to missing link \"c9\"",
    )
  })

  it.effect("supports catchTag on InvalidEntityError", () =>
    Effect.gen(function* () {
      const handled = yield* Effect.fail(new InvalidEntityError({ kind: "Street", entity: "s", rule: "sides" })).pipe(
        Effect.catchTag("InvalidEntityError", (error) => {
          expect(error.kind).toBe("Street")
          expect(error.entity).toBe("s")
          return Effect.succeed("handled")
        }),
      )

      expect(handled).toBe("handled")
    }),
  )

  it.effect("supports catchTag on UnsupportedFeatureError", () =>
    Effect.gen(function* () {
      const feature = yield* Effect.fail(new UnsupportedFeatureError({ feature: "Pattern" })).pipe(
        Effect.catchTag("UnsupportedFeatureError", (error) => Effect.succeed(error.feature)),
      )

      expect(feature).toBe("Pattern")
    }),
  )
})
