import { describe, it, expect } from "vitest"
import * as StormwaterInp from "../src/index.js"

describe("public API export surface", () => {
  it("exposes entities, sections and the assembler", () => {
    expect(StormwaterInp).toHaveProperty("Junction")
    expect(StormwaterInp).toHaveProperty("makeJunction")
    expect(StormwaterInp).toHaveProperty("Conduit")
    expect(StormwaterInp).toHaveProperty("Subcatchment")
    expect(StormwaterInp).toHaveProperty("XSection")
    expect(StormwaterInp).toHaveProperty("MapExtent")
    expect(StormwaterInp).toHaveProperty("TransectSection")
    expect(StormwaterInp).toHaveProperty("assembleInp")
    expect(StormwaterInp).toHaveProperty("renderInp")
    expect(StormwaterInp).toHaveProperty("verifyDocument")
    expect(StormwaterInp).toHaveProperty("InpSink")
    expect(StormwaterInp).toHaveProperty("InvalidEntityError")
    expect(StormwaterInp).toHaveProperty("UnsupportedFeatureError")
  })

  it("leaves the global Map unshadowed", () => {
    expect(StormwaterInp).not.toHaveProperty("Map")
  })
})
