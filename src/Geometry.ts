/**
 * Cross-section geometry of links, and street inlets.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import { makeEntity } from "./internal/construct.js"
import { batched, decimal, fixed, integer, pad } from "./internal/format.js"
import { columnComments, type Section, tabular } from "./Section.js"
import { GeometricShape, geometry } from "./Shapes.js"
import { Curve } from "./Tabular.js"
import { EntityName, Link, Node } from "./Topology.js"
import { GrateType, InletPlacement, ThroatAngle } from "./Vocabulary.js"

const Strict = { parseOptions: { onExcessProperty: "error" } } as const

const NonNegative = Schema.Number.pipe(Schema.nonNegative())

const Finite = Schema.Number.pipe(Schema.finite())

const Positive = Schema.Number.pipe(Schema.positive())

/**
 * Cross-section of a natural channel or irregular conduit in HEC-2 form.
 * `xLeft` and `xRight` are the stations where the left overbank ends and the
 * right overbank begins; both must be among `stations`. A roughness of 0 keeps
 * the value of the previous transect.
 *
 * @category Models
 * @since 0.1.0
 */
export class Transect extends Schema.Class<Transect>("Transect")(
  Schema.Struct({
    name: EntityName,
    stations: Schema.Array(Finite),
    elevations: Schema.Array(Finite),
    nLeft: NonNegative,
    nRight: NonNegative,
    nChannel: NonNegative,
    xLeft: Finite,
    xRight: Finite,
    meanderModifier: Schema.optionalWith(NonNegative, { exact: true, default: () => 0 }),
    stationModifier: Schema.optionalWith(NonNegative, { exact: true, default: () => 0 }),
    elevationOffset: Schema.optionalWith(Finite, { exact: true, default: () => 0 }),
  }).pipe(
    Schema.filter((transect) => {
      const issues: Array<string> = []
      if (transect.stations.length !== transect.elevations.length) {
        issues.push("stations and elevations must be the same length")
      }
      if (!transect.stations.includes(transect.xLeft)) {
        issues.push("xLeft must be one of the stations")
      }
      if (!transect.stations.includes(transect.xRight)) {
        issues.push("xRight must be one of the stations")
      }
      return issues.length === 0 ? undefined : issues.join(", ")
    }),
  ),
) {
  get stationCount(): number {
    return this.stations.length
  }
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeTransect = makeEntity("Transect", Transect)

const POINTS_PER_LINE = 5

/**
 * `[TRANSECTS]`: per transect a blank comment, the `NC` roughness line, the
 * `X1` geometry line and `GR` lines of up to five elevation/station pairs.
 *
 * @category Sections
 * @since 0.1.0
 */
export const TransectSection: Section<Transect> = {
  name: "TRANSECTS",
  comments: [";;Transect Data in HEC-2 format"],
  render: (transect) => [
    ";",
    `NC ${fixed(transect.nLeft, 11, 4)} ${fixed(transect.nRight, 10, 4)} ${fixed(transect.nChannel, 10, 4)}`,
    [
      "X1",
      pad(transect.name, 17),
      pad(integer(transect.stationCount), 8),
      fixed(transect.xLeft, 8, 2),
      fixed(transect.xRight, 8, 2),
      pad("0.0", 8),
      pad("0.0", 8),
      fixed(transect.meanderModifier, 8, 2),
      fixed(transect.stationModifier, 8, 2),
      pad(decimal(transect.elevationOffset), 8),
    ].join(" "),
    ...batched(transect.stations.map((station, index) => [transect.elevations[index] ?? 0, station] as const), POINTS_PER_LINE)
      .map((points) =>
        `GR ${points.map(([elevation, station]) => `${fixed(elevation, 8, 2)} ${fixed(station, 8, 2)} `).join("")}`
      ),
  ],
}

/**
 * Street cross-section used by STREET conduits. Without a depressed gutter
 * (`gutterDepression` 0) the gutter width is ignored; without a backing the
 * three backing parameters stay 0.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const street = new Street({ name: "street1", crownWidth: 0.2, curbHeight: 0.1, crossSlope: 0.1, roadRoughness: 0.05 })
 * ```
 */
export class Street extends Schema.Class<Street>("Street")({
  name: EntityName,
  crownWidth: Positive,
  curbHeight: Positive,
  crossSlope: NonNegative,
  roadRoughness: NonNegative,
  gutterDepression: Schema.optionalWith(NonNegative, { exact: true, default: () => 0 }),
  gutterWidth: Schema.optionalWith(NonNegative, { exact: true, default: () => 0 }),
  sides: Schema.optionalWith(Schema.Literal(1, 2), { exact: true, default: () => 1 as const }),
  backingWidth: Schema.optionalWith(NonNegative, { exact: true, default: () => 0 }),
  backingSlope: Schema.optionalWith(NonNegative, { exact: true, default: () => 0 }),
  backingRoughness: Schema.optionalWith(NonNegative, { exact: true, default: () => 0 }),
}) {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeStreet = makeEntity("Street", Street)

/**
 * `[STREETS]`.
 *
 * @category Sections
 * @since 0.1.0
 */
export const StreetSection: Section<Street> = tabular(
  "STREETS",
  [
    { label: "Name", width: 16 },
    { label: "Tcrown", width: 8 },
    { label: "Hcurb", width: 8 },
    { label: "Sx", width: 8 },
    { label: "nRoad", width: 8 },
    { label: "a", width: 8 },
    { label: "W", width: 8 },
    { label: "Sides", width: 8 },
    { label: "Tback", width: 8 },
    { label: "Sback", width: 8 },
    { label: "nBack", width: 8 },
  ],
  (street) =>
    [
      pad(street.name, 16),
      fixed(street.crownWidth, 8, 2),
      fixed(street.curbHeight, 8, 2),
      fixed(street.crossSlope, 8, 4),
      fixed(street.roadRoughness, 8, 4),
      fixed(street.gutterDepression, 8, 2),
      fixed(street.gutterWidth, 8, 2),
      pad(integer(street.sides), 8),
      fixed(street.backingWidth, 8, 2),
      fixed(street.backingSlope, 8, 4),
      fixed(street.backingRoughness, 8, 4),
    ].join(" "),
)

/**
 * Closed shape whose width varies with depth along a shape curve.
 *
 * @category Shapes
 * @since 0.1.0
 */
export const CustomShape = Schema.TaggedStruct("CUSTOM", {
  height: Positive,
  curve: Schema.instanceOf(Curve),
}).annotations(Strict)

/**
 * Natural channel described by a transect.
 *
 * @category Shapes
 * @since 0.1.0
 */
export const IrregularShape = Schema.TaggedStruct("IRREGULAR", {
  transect: Schema.instanceOf(Transect),
}).annotations(Strict)

/**
 * Street described by a street cross-section.
 *
 * @category Shapes
 * @since 0.1.0
 */
export const StreetShape = Schema.TaggedStruct("STREET", {
  street: Schema.instanceOf(Street),
}).annotations(Strict)

/**
 * @category Shapes
 * @since 0.1.0
 */
export const Shape = Schema.Union(GeometricShape, CustomShape, IrregularShape, StreetShape)

/**
 * @category Shapes
 * @since 0.1.0
 */
export type Shape = typeof Shape.Type

/**
 * Cross-section of a conduit or regulator link. `barrels` counts identical
 * parallel pipes; `culvert` is the inlet geometry code of a culvert subject to
 * inlet control.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const xs = new XSection({ link: c1, shape: Circular.make({ diameter: 1.5 }) })
 * const street = new XSection({ link: c2, shape: StreetShape.make({ street: street1 }) })
 * ```
 */
export class XSection extends Schema.Class<XSection>("XSection")({
  link: Link,
  shape: Shape,
  barrels: Schema.optionalWith(Schema.Int.pipe(Schema.positive()), { exact: true, default: () => 1 }),
  culvert: Schema.optionalWith(Schema.Int.pipe(Schema.between(1, 57)), { exact: true }),
}) {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeXSection = makeEntity("XSection", XSection)

const shapeFields = (xsection: XSection): ReadonlyArray<string> => {
  const shape = xsection.shape
  switch (shape._tag) {
    case "CUSTOM":
      return [fixed(shape.height, 16, 3), pad(shape.curve.name, 16), pad(integer(xsection.barrels), 10)]
    case "IRREGULAR":
      return [pad(shape.transect.name, 16)]
    case "STREET":
      return [pad(shape.street.name, 16)]
    default: {
      const [geom1, geom2, geom3, geom4] = geometry(shape)
      return [
        fixed(geom1, 16, 3),
        fixed(geom2, 10, 3),
        fixed(geom3, 10, 3),
        fixed(geom4, 10, 3),
        pad(integer(xsection.barrels), 10),
        pad(xsection.culvert === undefined ? "" : integer(xsection.culvert), 10),
      ]
    }
  }
}

/**
 * `[XSECTIONS]`. Shapes referring to a curve, transect or street write that
 * record's name in place of the geometry.
 *
 * @category Sections
 * @since 0.1.0
 */
export const XSectionSection: Section<XSection> = tabular(
  "XSECTIONS",
  [
    { label: "Link", width: 16 },
    { label: "Shape", width: 12 },
    { label: "Geom1", width: 16 },
    { label: "Geom2", width: 10 },
    { label: "Geom3", width: 10 },
    { label: "Geom4", width: 10 },
    { label: "Barrels", width: 10 },
    { label: "Culvert", width: 10 },
  ],
  (xsection) => [pad(xsection.link.name, 16), pad(xsection.shape._tag, 12), ...shapeFields(xsection)].join(" "),
)

const grate = {
  length: Positive,
  width: Positive,
  grateType: GrateType,
  openArea: Schema.optionalWith(Schema.Number.pipe(Schema.between(0, 1)), { exact: true }),
  splashVelocity: Schema.optionalWith(NonNegative, { exact: true }),
}

/**
 * Grate inlet on a street. A GENERIC grate also needs its open area fraction
 * and splash over velocity.
 *
 * @category Variants
 * @since 0.1.0
 */
export const GrateInlet = Schema.TaggedStruct("GRATE", grate).annotations(Strict)

/**
 * Grate inlet on an open channel.
 *
 * @category Variants
 * @since 0.1.0
 */
export const DropGrateInlet = Schema.TaggedStruct("DROP_GRATE", grate).annotations(Strict)

/**
 * Curb opening inlet on a street.
 *
 * @category Variants
 * @since 0.1.0
 */
export const CurbInlet = Schema.TaggedStruct("CURB", {
  length: Positive,
  height: Positive,
  throatAngle: ThroatAngle,
}).annotations(Strict)

/**
 * Curb opening inlet on an open channel.
 *
 * @category Variants
 * @since 0.1.0
 */
export const DropCurbInlet = Schema.TaggedStruct("DROP_CURB", {
  length: Positive,
  height: Positive,
}).annotations(Strict)

/**
 * @category Variants
 * @since 0.1.0
 */
export const SlottedInlet = Schema.TaggedStruct("SLOTTED", {
  length: Positive,
  width: Positive,
}).annotations(Strict)

/**
 * Inlet whose capture is given by exactly one curve: a diversion curve
 * (captured versus approach flow) or a rating curve (captured flow versus
 * depth).
 *
 * @category Variants
 * @since 0.1.0
 */
export const CustomInlet = Schema.TaggedStruct("CUSTOM", {
  diversionCurve: Schema.optionalWith(Schema.instanceOf(Curve), { exact: true }),
  ratingCurve: Schema.optionalWith(Schema.instanceOf(Curve), { exact: true }),
}).annotations(Strict)

/**
 * @category Variants
 * @since 0.1.0
 */
export const InletDesign = Schema.Union(GrateInlet, DropGrateInlet, CurbInlet, DropCurbInlet, SlottedInlet, CustomInlet)

/**
 * @category Variants
 * @since 0.1.0
 */
export type InletDesign = typeof InletDesign.Type

const designRule = (design: InletDesign): string | undefined => {
  switch (design._tag) {
    case "GRATE":
    case "DROP_GRATE":
      return design.grateType === "GENERIC" && (design.openArea === undefined || design.splashVelocity === undefined)
        ? "a GENERIC grate requires openArea and splashVelocity"
        : undefined
    case "CUSTOM":
      return (design.diversionCurve === undefined) === (design.ratingCurve === undefined)
        ? "a CUSTOM inlet requires exactly one of diversionCurve and ratingCurve"
        : undefined
    default:
      return undefined
  }
}

/**
 * Inlet structure design capturing street or channel flow into the sewer.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const inlet = new Inlet({
 *   name: "inlet1",
 *   design: GrateInlet.make({ length: 2, width: 0.75, grateType: "P_BAR-50" })
 * })
 * ```
 */
export class Inlet extends Schema.Class<Inlet>("Inlet")(
  Schema.Struct({
    name: EntityName,
    design: InletDesign,
  }).pipe(Schema.filter((inlet) => designRule(inlet.design))),
) {
  get inletType(): InletDesign["_tag"] {
    return this.design._tag
  }
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeInlet = makeEntity("Inlet", Inlet)

const designFields = (design: InletDesign): ReadonlyArray<string> => {
  switch (design._tag) {
    case "GRATE":
    case "DROP_GRATE":
      return [
        fixed(design.length, 9, 2),
        fixed(design.width, 9, 2),
        pad(design.grateType, 12),
        ...(design.grateType === "GENERIC"
          ? [fixed(design.openArea ?? 0, 9, 2), fixed(design.splashVelocity ?? 0, 9, 2)]
          : []),
      ]
    case "CURB":
      return [fixed(design.length, 9, 2), fixed(design.height, 9, 2), pad(design.throatAngle, 12)]
    case "DROP_CURB":
      return [fixed(design.length, 9, 2), fixed(design.height, 9, 2)]
    case "SLOTTED":
      return [fixed(design.length, 9, 2), fixed(design.width, 9, 2)]
    case "CUSTOM": {
      const curve = design.diversionCurve ?? design.ratingCurve
      return [pad(curve === undefined ? "" : curve.name, 16)]
    }
  }
}

/**
 * `[INLETS]`.
 *
 * @category Sections
 * @since 0.1.0
 */
export const InletSection: Section<Inlet> = tabular(
  "INLETS",
  [
    { label: "Name", width: 16 },
    { label: "Type", width: 16 },
    { label: "Parameters:", width: 11 },
  ],
  (inlet) => [pad(inlet.name, 16), pad(inlet.inletType, 16), ...designFields(inlet.design)].join(" "),
)

/**
 * Places `number` inlets of one design on each side of a street or channel
 * conduit, sending the captured flow to `node`. A `maxFlow` of 0 leaves the
 * captured flow unrestricted.
 *
 * @category Models
 * @since 0.1.0
 */
export class InletUsage extends Schema.Class<InletUsage>("InletUsage")({
  conduit: Link,
  inlet: Schema.instanceOf(Inlet),
  node: Node,
  number: Schema.optionalWith(Schema.Int.pipe(Schema.positive()), { exact: true, default: () => 1 }),
  percentClogged: Schema.optionalWith(Schema.Number.pipe(Schema.between(0, 100)), { exact: true, default: () => 0 }),
  maxFlow: Schema.optionalWith(NonNegative, { exact: true, default: () => 0 }),
  localDepression: Schema.optionalWith(NonNegative, { exact: true, default: () => 0 }),
  localWidth: Schema.optionalWith(NonNegative, { exact: true, default: () => 0 }),
  placement: Schema.optionalWith(InletPlacement, { exact: true, default: () => "AUTOMATIC" as const }),
}) {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeInletUsage = makeEntity("InletUsage", InletUsage)

const [usageHeader] = columnComments([
  { label: "Conduit", width: 16 },
  { label: "Inlet", width: 16 },
  { label: "Node", width: 16 },
  { label: "Number", width: 9 },
  { label: "%Clogged", width: 9 },
  { label: "Qmax", width: 9 },
  { label: "aLocal", width: 9 },
  { label: "wLocal", width: 9 },
  { label: "Placement", width: 9 },
])

/**
 * `[INLET_USAGE]`.
 *
 * @category Sections
 * @since 0.1.0
 */
export const InletUsageSection: Section<InletUsage> = {
  name: "INLET_USAGE",
  comments: [
    usageHeader,
    `;;${["-".repeat(14), "-".repeat(16), "-".repeat(16), ...Array.from({ length: 7 }, () => "-".repeat(9))].join(" ")}`,
  ],
  render: (usage) => [
    [
      pad(usage.conduit.name, 16),
      pad(usage.inlet.name, 16),
      pad(usage.node.name, 16),
      pad(integer(usage.number), 9),
      fixed(usage.percentClogged, 9, 2),
      fixed(usage.maxFlow, 9, 2),
      fixed(usage.localDepression, 9, 2),
      fixed(usage.localWidth, 9, 2),
      pad(usage.placement, 19),
    ].join(" "),
  ],
}
