/**
 * Runoff-producing land: subcatchments, their subareas and infiltration.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import { makeEntity } from "./internal/construct.js"
import { blank, fixed, pad } from "./internal/format.js"
import { Raingage } from "./Meteo.js"
import { type Section, tabular } from "./Section.js"
import { Area, AreaTypeId, EntityName, isArea, Node } from "./Topology.js"
import { Unsupported } from "./Unsupported.js"
import { InfiltrationMethod, RouteTo } from "./Vocabulary.js"

const NonNegative = Schema.Number.pipe(Schema.nonNegative())

const Percent = Schema.Number.pipe(Schema.between(0, 100))

/**
 * Snow pack parameters. Not supported yet: construction always fails.
 *
 * @category Models
 * @since 0.1.0
 */
export class Snowpack extends Unsupported<{ readonly name: string }>("Snowpack") {
  declare readonly name: string
}

/**
 * A land area generating runoff from rainfall. The outlet is the node or the
 * other subcatchment receiving that runoff.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const s1 = new Subcatchment({
 *   name: "s1",
 *   raingage: rg1,
 *   outlet: j1,
 *   area: 100,
 *   percentImpervious: 100,
 *   width: 100,
 *   slope: 0.15
 * })
 * ```
 */
export class Subcatchment extends Schema.Class<Subcatchment>("Subcatchment")(
  Schema.Struct({
    name: EntityName,
    raingage: Schema.instanceOf(Raingage),
    outlet: Schema.Union(Node, Area),
    area: Schema.Number.pipe(Schema.positive()),
    percentImpervious: Percent,
    width: Schema.Number.pipe(Schema.positive()),
    slope: NonNegative,
    curbLength: Schema.optionalWith(NonNegative, { exact: true, default: () => 0 }),
    snowPack: Schema.optionalWith(
      Schema.instanceOf(Snowpack, { message: () => "snow packs are not supported" }),
      { exact: true },
    ),
  }).pipe(
    Schema.filter((subcatchment) =>
      isArea(subcatchment.outlet) && subcatchment.outlet.name === subcatchment.name
        ? "outlet must not be the subcatchment itself"
        : undefined
    ),
  ),
) {
  get [AreaTypeId](): AreaTypeId {
    return AreaTypeId
  }
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeSubcatchment = makeEntity("Subcatchment", Subcatchment)

/**
 * `[SUBCATCHMENTS]`.
 *
 * @category Sections
 * @since 0.1.0
 */
export const SubcatchmentSection: Section<Subcatchment> = tabular(
  "SUBCATCHMENTS",
  [
    { label: "Name", width: 16 },
    { label: "Rain Gage", width: 16 },
    { label: "Outlet", width: 16 },
    { label: "Area", width: 8 },
    { label: "%Imperv", width: 8 },
    { label: "Width", width: 8 },
    { label: "%Slope", width: 8 },
    { label: "CurbLen", width: 8 },
    { label: "SnowPack", width: 16 },
  ],
  (subcatchment) =>
    [
      pad(subcatchment.name, 16),
      pad(subcatchment.raingage.name, 16),
      pad(subcatchment.outlet.name, 16),
      fixed(subcatchment.area, 8, 2),
      fixed(subcatchment.percentImpervious, 8, 2),
      fixed(subcatchment.width, 8, 2),
      fixed(subcatchment.slope, 8, 4),
      fixed(subcatchment.curbLength, 8, 2),
      blank(16),
    ].join(" "),
)

/**
 * Pervious and impervious runoff parameters of a subcatchment: Manning's n
 * and depression storage of each subarea, the share of impervious area
 * without depression storage, and how runoff is routed between the two.
 *
 * @category Models
 * @since 0.1.0
 */
export class Subarea extends Schema.Class<Subarea>("Subarea")({
  subcatchment: Schema.instanceOf(Subcatchment),
  nImpervious: NonNegative,
  nPervious: NonNegative,
  storageImpervious: NonNegative,
  storagePervious: NonNegative,
  percentZero: Percent,
  routeTo: Schema.optionalWith(RouteTo, { exact: true, default: () => "OUTLET" as const }),
  percentRouted: Schema.optionalWith(Percent, { exact: true, default: () => 100 }),
}) {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeSubarea = makeEntity("Subarea", Subarea)

/**
 * `[SUBAREAS]`.
 *
 * @category Sections
 * @since 0.1.0
 */
export const SubareaSection: Section<Subarea> = tabular(
  "SUBAREAS",
  [
    { label: "Subcatchment", width: 16 },
    { label: "N-Imperv", width: 10 },
    { label: "N-Perv", width: 10 },
    { label: "S-Imperv", width: 10 },
    { label: "S-Perv", width: 10 },
    { label: "PctZero", width: 10 },
    { label: "RouteTo", width: 10 },
    { label: "PctRouted", width: 10 },
  ],
  (subarea) =>
    [
      pad(subarea.subcatchment.name, 16),
      fixed(subarea.nImpervious, 10, 4),
      fixed(subarea.nPervious, 10, 4),
      fixed(subarea.storageImpervious, 10, 4),
      fixed(subarea.storagePervious, 10, 4),
      fixed(subarea.percentZero, 10, 2),
      pad(subarea.routeTo, 10),
      fixed(subarea.percentRouted, 10, 2),
    ].join(" "),
)

/**
 * Number of parameters an infiltration method takes. The second Curve Number
 * parameter is no longer used but still occupies its column.
 *
 * @category Utils
 * @since 0.1.0
 */
export const parameterCount = (method: InfiltrationMethod): number => {
  switch (method) {
    case "HORTON":
    case "MODIFIED_HORTON":
      return 5
    case "GREEN_AMPT":
    case "MODIFIED_GREEN_AMPT":
    case "CURVE_NUMBER":
      return 3
  }
}

/**
 * Infiltration parameters of the pervious subarea of a subcatchment.
 *
 * | method | parameters |
 * | --- | --- |
 * | HORTON, MODIFIED_HORTON | max rate, min rate, decay constant, drying time, max volume |
 * | GREEN_AMPT, MODIFIED_GREEN_AMPT | suction head, conductivity, initial deficit |
 * | CURVE_NUMBER | curve number, unused, drying time |
 *
 * @category Models
 * @since 0.1.0
 */
export class Infiltration extends Schema.Class<Infiltration>("Infiltration")(
  Schema.Struct({
    subcatchment: Schema.instanceOf(Subcatchment),
    method: InfiltrationMethod,
    parameters: Schema.Array(Schema.Number.pipe(Schema.finite())),
  }).pipe(
    Schema.filter((infiltration) => {
      const expected = parameterCount(infiltration.method)
      return infiltration.parameters.length === expected
        ? undefined
        : `${infiltration.method} requires ${expected} parameters, got ${infiltration.parameters.length}`
    }),
  ),
) {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeInfiltration = makeEntity("Infiltration", Infiltration)

const PARAMETERS_WIDTH = 54

/**
 * `[INFILTRATION]`: the parameters fill a fixed-width block before the method.
 *
 * @category Sections
 * @since 0.1.0
 */
export const InfiltrationSection: Section<Infiltration> = tabular(
  "INFILTRATION",
  [
    { label: "Subcatchment", width: 16 },
    { label: "Param1", width: 10 },
    { label: "Param2", width: 10 },
    { label: "Param3", width: 10 },
    { label: "Param4", width: 10 },
    { label: "Param5", width: 10 },
  ],
  (infiltration) =>
    [
      pad(infiltration.subcatchment.name, 16),
      pad(infiltration.parameters.map((parameter) => fixed(parameter, 10, 2)).join(" "), PARAMETERS_WIDTH),
      infiltration.method,
    ].join(" "),
)
