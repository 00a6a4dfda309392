import { describe, it, expect } from "vitest"
import { Schema } from "effect"
import {
  Circular,
  Dummy,
  Egg,
  FilledCircular,
  ForceMain,
  geometry,
  ModifiedBasketHandle,
  Power,
  RectClosed,
  Trapezoidal,
  Triangular,
} from "../src/Shapes.js"

describe("Cross-section shapes", () => {
  it("lays out the dimensions each shape uses", () => {
    expect(geometry(Circular.make({ diameter: 1.5 }))).toEqual([1.5, 0, 0, 0])
    expect(geometry(ForceMain.make({ diameter: 0.6, roughness: 120 }))).toEqual([0.6, 120, 0, 0])
    expect(geometry(RectClosed.make({ height: 2, width: 3 }))).toEqual([2, 3, 0, 0])
    expect(geometry(Trapezoidal.make({ height: 2, baseWidth: 4, leftSlope: 1, rightSlope: 1.5 }))).toEqual([2, 4, 1, 1.5])
    expect(geometry(Triangular.make({ height: 1, topWidth: 2 }))).toEqual([1, 2, 0, 0])
    expect(geometry(Power.make({ height: 1, topWidth: 2, exponent: 3 }))).toEqual([1, 2, 3, 0])
    expect(geometry(ModifiedBasketHandle.make({ height: 3, bottomWidth: 2, topRadius: 1 }))).toEqual([3, 2, 1, 0])
    expect(geometry(Egg.make({ height: 1.2 }))).toEqual([1.2, 0, 0, 0])
    expect(geometry(Dummy.make({}))).toEqual([0, 0, 0, 0])
  })

  it("decodes partly filled pipes below their diameter only", () => {
    const decode = Schema.decodeUnknownEither(FilledCircular)

    expect(decode({ _tag: "FILLED_CIRCULAR", diameter: 1, sedimentDepth: 0.2 })._tag).toBe("Right")
    expect(decode({ _tag: "FILLED_CIRCULAR", diameter: 1, sedimentDepth: 1 })._tag).toBe("Left")
    expect(decode({ _tag: "FILLED_CIRCULAR", diameter: 1, sedimentDepth: -0.1 })._tag).toBe("Left")
  })

  it("rejects dimensions of other shapes", () => {
    const decode = Schema.decodeUnknownEither(Circular)

    expect(decode({ _tag: "CIRCULAR", diameter: 1, width: 2 })._tag).toBe("Left")
    expect(decode({ _tag: "CIRCULAR", diameter: 0 })._tag).toBe("Left")
  })
})
