import { Effect, Schema } from "effect"
import { Infiltration, Subarea, Subcatchment } from "../src/Catchment.js"
import { CurbInlet, GrateInlet, Inlet, InletUsage, IrregularShape, Street, StreetShape, Transect, XSection } from "../src/Geometry.js"
import { Coordinate } from "../src/Gui.js"
import { formatRules } from "../src/internal/construct.js"
import { Conduit } from "../src/Links.js"
import { Raingage, TimeseriesRain } from "../src/Meteo.js"
import { Junction, Outfall } from "../src/Nodes.js"
import { Timeseries } from "../src/Tabular.js"

/**
 * Two junctions draining through two conduits to a free outfall.
 */
export const makeConduitNetwork = () => {
  const j1 = new Junction({ name: "j1", elevation: 10 })
  const j2 = new Junction({ name: "j2", elevation: 9 })
  const out1 = new Outfall({ name: "out1", elevation: 8 })
  const c1 = new Conduit({ name: "c1", fromNode: j1, toNode: j2, length: 100, roughness: 0.015 })
  const c2 = new Conduit({ name: "c2", fromNode: j2, toNode: out1, length: 200, roughness: 0.012 })
  const coordinates = [
    new Coordinate({ node: j1, point: [0, 0] }),
    new Coordinate({ node: j2, point: [100, 0] }),
    new Coordinate({ node: out1, point: [250, 100] })
  ]
  return { j1, j2, out1, c1, c2, coordinates }
}

/**
 * Two subcatchments fed by gages reading their own time series.
 */
export const makeCatchment = () => {
  const j1 = new Junction({ name: "j1", elevation: 150 })
  const timeseries1 = new Timeseries({
    name: "timeseries1",
    times: [0, 1, 2, 3],
    values: [0, 0.5, 1, 0.15],
    date: "1/1/2022",
    description: "A short description of timeseries1"
  })
  const timeseries2 = new Timeseries({
    name: "timeseries2",
    times: [0, 1, 2],
    values: [10, 20, 50],
    date: "1/1/2022",
    description: "A loong description ".repeat(5)
  })
  const timeseries3 = new Timeseries({
    name: "timeseries3",
    times: [0, 1],
    values: [0, 0],
    date: "1/1/2022"
  })
  const rg1 = new Raingage({
    name: "rg1",
    form: "INTENSITY",
    interval: "1:00",
    source: TimeseriesRain.make({ timeseries: timeseries1 })
  })
  const rg2 = new Raingage({
    name: "rg2",
    form: "VOLUME",
    interval: 0.25,
    scf: 0.5,
    source: TimeseriesRain.make({ timeseries: timeseries2 })
  })
  const s1 = new Subcatchment({
    name: "s1",
    raingage: rg1,
    outlet: j1,
    area: 100,
    percentImpervious: 100,
    width: 100,
    slope: 0.15
  })
  const s2 = new Subcatchment({
    name: "s2",
    raingage: rg2,
    outlet: s1,
    area: 200,
    percentImpervious: 25,
    width: 123,
    slope: 0.9
  })
  const subareas = [
    new Subarea({
      subcatchment: s1,
      nImpervious: 0.015,
      nPervious: 0.123,
      storageImpervious: 0.01,
      storagePervious: 0.011,
      percentZero: 50
    }),
    new Subarea({
      subcatchment: s2,
      nImpervious: 0.02,
      nPervious: 0.2,
      storageImpervious: 0,
      storagePervious: 0,
      percentZero: 0,
      routeTo: "PERVIOUS",
      percentRouted: 40
    })
  ]
  const infiltration = [
    new Infiltration({ subcatchment: s1, method: "HORTON", parameters: [1, 2, 3, 4, 5] }),
    new Infiltration({ subcatchment: s2, method: "MODIFIED_GREEN_AMPT", parameters: [10, 20, 30] })
  ]
  return { j1, timeseries1, timeseries2, timeseries3, rg1, rg2, s1, s2, subareas, infiltration }
}

/**
 * Street conduits collecting flow through a grate and a curb inlet.
 */
export const makeStreetNetwork = () => {
  const street = new Street({ name: "street1", crownWidth: 0.2, curbHeight: 0.1, crossSlope: 0.1, roadRoughness: 0.05 })
  const j1 = new Junction({ name: "j1", elevation: 100 })
  const j2 = new Junction({ name: "j2", elevation: 99.5 })
  const out1 = new Outfall({ name: "out1", elevation: 99 })
  const conduit1 = new Conduit({ name: "conduit1", fromNode: j1, toNode: j2, length: 100, roughness: 0.015 })
  const conduit2 = new Conduit({ name: "conduit2", fromNode: j2, toNode: out1, length: 50, roughness: 0.012 })
  const xsections = [
    new XSection({ link: conduit1, shape: StreetShape.make({ street }) }),
    new XSection({ link: conduit2, shape: StreetShape.make({ street }) })
  ]
  const inlet1 = new Inlet({ name: "inlet1", design: GrateInlet.make({ length: 2, width: 0.75, grateType: "P_BAR-50" }) })
  const inlet2 = new Inlet({
    name: "inlet2",
    design: CurbInlet.make({ length: 1.2, height: 4.8, throatAngle: "HORIZONTAL" })
  })
  const inletUsages = [
    new InletUsage({ conduit: conduit1, inlet: inlet1, node: j2, percentClogged: 25 }),
    new InletUsage({ conduit: conduit1, inlet: inlet2, node: j2 })
  ]
  return { street, j1, j2, out1, conduit1, conduit2, xsections, inlet1, inlet2, inletUsages }
}

/**
 * Natural channels described by two HEC-2 transects.
 */
export const makeTransectNetwork = () => {
  const stations = Array.from({ length: 11 }, (_, index) => index)
  const transect1 = new Transect({
    name: "transect1",
    stations,
    elevations: [10, 9, 8, 7, 6, 5, 6, 7, 8, 9, 10],
    nLeft: 0.02,
    nRight: 0.02,
    nChannel: 0.01,
    xLeft: 1,
    xRight: 3,
    stationModifier: 0.8
  })
  const transect2 = new Transect({
    name: "transect2",
    stations,
    elevations: [10, 8, 6, 4, 2, 0, 2, 4, 6, 8, 10],
    nLeft: 0.025,
    nRight: 0.025,
    nChannel: 0,
    xLeft: 1,
    xRight: 3
  })
  const j1 = new Junction({ name: "j1", elevation: 5 })
  const j2 = new Junction({ name: "j2", elevation: 0 })
  const out1 = new Outfall({ name: "out1", elevation: -1 })
  const c1 = new Conduit({ name: "c1", fromNode: j1, toNode: j2, length: 100, roughness: 0.015 })
  const c2 = new Conduit({ name: "c2", fromNode: j1, toNode: out1, length: 120, roughness: 0.01 })
  const xsections = [
    new XSection({ link: c1, shape: IrregularShape.make({ transect: transect1 }) }),
    new XSection({ link: c2, shape: IrregularShape.make({ transect: transect2 }) })
  ]
  return { transect1, transect2, j1, j2, out1, c1, c2, xsections }
}

/**
 * Rules broken by untyped input, decoded the way the entity constructors do.
 * Fails with the entity when the input is valid.
 */
export const brokenRules = <A, I>(schema: Schema.Schema<A, I>, input: unknown) =>
  Schema.decodeUnknown(schema, { errors: "all" })(input).pipe(Effect.flip, Effect.map(formatRules))
