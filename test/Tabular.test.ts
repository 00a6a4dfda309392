import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import { renderSection } from "../src/Section.js"
import { Curve, makeTimeseries, Pattern, TimeseriesSection } from "../src/Tabular.js"
import { makeCatchment } from "./fixtures.js"

describe("Timeseries", () => {
  it("writes the description, the date on the first line and every reading", () => {
    const { timeseries1 } = makeCatchment()

    expect(renderSection(TimeseriesSection, [timeseries1])).toBe(
      "[TIMESERIES]\n" +
        ";;Name           Date       Time       Value     \n" +
        ";;-------------- ---------- ---------- ----------\n" +
        `; ${"A short description of timeseries1".padEnd(47)}\n` +
        "timeseries1      1/1/2022   0.00       0.000     \n" +
        "timeseries1                 1.00       0.500     \n" +
        "timeseries1                 2.00       1.000     \n" +
        "timeseries1                 3.00       0.150     \n",
    )
  })

  it("wraps long descriptions over several comment lines", () => {
    const { timeseries2 } = makeCatchment()
    const lines = renderSection(TimeseriesSection, [timeseries2]).split("\n")

    expect(lines.slice(3, 6)).toEqual([
      "; A loong description A loong description A loong",
      `; ${"description A loong description A loong".padEnd(47)}`,
      `; ${"description".padEnd(47)}`,
    ])
  })

  it("writes a blank comment line without a description", () => {
    const { timeseries3 } = makeCatchment()
    const lines = renderSection(TimeseriesSection, [timeseries3]).split("\n")

    expect(lines[3]).toBe(";".padEnd(49))
    expect(lines[4]).toBe("timeseries3      1/1/2022   0.00       0.000     ")
  })

  it.effect("rejects times and values of different lengths", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(makeTimeseries({ name: "ts", times: [0, 1], values: [1] }))

      expect(error._tag).toBe("InvalidEntityError")
      expect(error.entity).toBe("ts")
      expect(error.rule).toBe("times and values must be the same length")
    }),
  )

  it.effect("rejects names with whitespace", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(makeTimeseries({ name: "rain fall", times: [], values: [] }))

      expect(error.rule).toContain("name must not contain whitespace")
    }),
  )
})

describe("Curves and patterns", () => {
  it("cannot be constructed", () => {
    expect(() => new Curve({ name: "c1" })).toThrow("Curve is not supported")
    expect(() => new Pattern({ name: "p1" })).toThrow("Pattern is not supported")
  })

  it.effect("fail with UnsupportedFeatureError", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(Curve.make({ name: "c1" }))

      expect(error._tag).toBe("UnsupportedFeatureError")
      expect(error.feature).toBe("Curve")
    }),
  )
})
