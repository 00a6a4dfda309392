import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import {
  Divider,
  FixedOutfall,
  Junction,
  JunctionSection,
  makeJunction,
  makeOutfall,
  NormalOutfall,
  Outfall,
  OutfallSection,
  Storage,
  TimeseriesOutfall,
} from "../src/Nodes.js"
import { renderSection } from "../src/Section.js"
import { Timeseries } from "../src/Tabular.js"
import { isNode } from "../src/Topology.js"
import { makeCatchment, makeConduitNetwork } from "./fixtures.js"

describe("Junction", () => {
  it("writes junctions with the default depths", () => {
    const { j1, j2 } = makeConduitNetwork()

    expect(renderSection(JunctionSection, [j1, j2])).toBe(
      "[JUNCTIONS]\n" +
        ";;Name           Elevation  MaxDepth   InitDepth  SurDepth   Aponded    \n" +
        ";;-------------- ---------- ---------- ---------- ---------- ---------- \n" +
        "j1               10.000     0.00       0.00       0.00       0          \n" +
        "j2               9.000      0.00       0.00       0.00       0          \n",
    )
  })

  it("writes every depth and the ponded area", () => {
    const junction = new Junction({
      name: "j3",
      elevation: 12.5,
      maxDepth: 3,
      initDepth: 0.5,
      surchargeDepth: 1,
      pondedArea: 25.5,
    })

    expect(JunctionSection.render(junction)).toEqual([
      "j3               12.500     3.00       0.50       1.00       25.5       ",
    ])
  })

  it("is a node", () => {
    const { j1 } = makeConduitNetwork()

    expect(isNode(j1)).toBe(true)
  })

  it.effect("rejects negative depths", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(makeJunction({ name: "j1", elevation: 10, maxDepth: -1 }))

      expect(error.kind).toBe("Junction")
      expect(error.entity).toBe("j1")
      expect(error.rule).toMatch(/^maxDepth: /)
    }),
  )

  it.effect("reports every broken rule at once", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(makeJunction({ name: "j1", elevation: Number.NaN, initDepth: -1 }))

      expect(error.rule.split("; ").map((rule) => rule.split(":")[0])).toEqual(["elevation", "initDepth"])
    }),
  )

  it.effect("names an optional field once when it breaks its rule", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(makeJunction({ name: "j1", elevation: 1, initDepth: -1 }))

      expect(error.rule).toBe("initDepth: Expected a non-negative number, actual -1")
    }),
  )
})

describe("Outfall", () => {
  it("writes a free outfall with blank stage data", () => {
    const { out1 } = makeConduitNetwork()

    expect(renderSection(OutfallSection, [out1])).toBe(
      "[OUTFALLS]\n" +
        ";;Name           Elevation  Type       Stage Data       Gated    Route To        \n" +
        ";;-------------- ---------- ---------- ---------------- -------- ----------------\n" +
        "out1             8.000      FREE                        NO       \n",
    )
  })

  it("writes the stage data matching the boundary type", () => {
    const { s1 } = makeCatchment()
    const tide = new Timeseries({ name: "tide", times: [0, 12], values: [1, 2] })
    const fixed = new Outfall({ name: "out2", elevation: 2, stage: FixedOutfall.make({ stage: 3.5 }), gated: "YES" })
    const series = new Outfall({
      name: "out3",
      elevation: 2,
      stage: TimeseriesOutfall.make({ timeseries: tide }),
      routeTo: s1,
    })
    const normal = new Outfall({ name: "out4", elevation: 1, stage: NormalOutfall.make({}) })

    expect([fixed, series, normal].flatMap(OutfallSection.render)).toEqual([
      "out2             2.000      FIXED      3.500            YES      ",
      "out3             2.000      TIMESERIES tide             NO       s1              ",
      "out4             1.000      NORMAL                      NO       ",
    ])
    expect(series.outfallType).toBe("TIMESERIES")
  })

  it.effect("requires a finite stage for a FIXED outfall", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        makeOutfall({ name: "out1", elevation: 8, stage: { _tag: "FIXED", stage: Number.NaN } }),
      )

      expect(error.kind).toBe("Outfall")
      expect(error.rule).toMatch(/^stage\.stage: /)
    }),
  )

  it.effect("rejects stage data on a FREE outfall", () =>
    Effect.gen(function* () {
      const stage = { _tag: "FREE" as const, stage: 3 }
      const error = yield* Effect.flip(makeOutfall({ name: "out1", elevation: 8, stage }))

      expect(error.rule).toMatch(/^stage/)
    }),
  )
})

describe("Unsupported nodes", () => {
  it.effect("fail to build dividers and storage units", () =>
    Effect.gen(function* () {
      const { c1 } = makeConduitNetwork()
      const divider = yield* Effect.flip(Divider.make({ name: "d1", elevation: 1, dividedLink: c1 }))
      const storage = yield* Effect.flip(Storage.make({ name: "su1", elevation: 1 }))

      expect(divider.feature).toBe("Divider")
      expect(storage.feature).toBe("Storage")
    }),
  )
})
