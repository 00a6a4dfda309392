/**
 * Link kinds of the drainage network: conduits, pumps, weirs and outlets.
 *
 * Every link connects two nodes of any kind. The cross-section of a link is
 * described separately by an `XSection`.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import { makeEntity } from "./internal/construct.js"
import { blank, fixed, fixedOrBlank, integer, pad } from "./internal/format.js"
import { type Section, tabular } from "./Section.js"
import { Curve } from "./Tabular.js"
import { EntityName, LinkTypeId, Node } from "./Topology.js"
import { Unsupported } from "./Unsupported.js"
import { PumpStatus, RoadSurface, YesNo } from "./Vocabulary.js"

const Strict = { parseOptions: { onExcessProperty: "error" } } as const

const NonNegative = Schema.Number.pipe(Schema.nonNegative())

const Offset = Schema.Number.pipe(Schema.finite())

const endpoints = {
  name: EntityName,
  fromNode: Node,
  toNode: Node,
}

const linkColumns = [
  { label: "Name", width: 16 },
  { label: "From Node", width: 16 },
  { label: "To Node", width: 16 },
] as const

const linkFields = (link: { readonly name: string; readonly fromNode: Node; readonly toNode: Node }) => [
  pad(link.name, 16),
  pad(link.fromNode.name, 16),
  pad(link.toNode.name, 16),
]

/**
 * Conduit: a pipe or channel conveying water from one node to another.
 * Offsets are measured above the invert of the respective end node.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const c1 = new Conduit({ name: "c1", fromNode: j1, toNode: out1, length: 400, roughness: 0.01 })
 * ```
 */
export class Conduit extends Schema.Class<Conduit>("Conduit")({
  ...endpoints,
  length: Schema.Number.pipe(Schema.positive()),
  roughness: Schema.Number.pipe(Schema.positive()),
  inOffset: Schema.optionalWith(Offset, { exact: true, default: () => 0 }),
  outOffset: Schema.optionalWith(Offset, { exact: true, default: () => 0 }),
  initFlow: Schema.optionalWith(Schema.Number.pipe(Schema.finite()), { exact: true, default: () => 0 }),
  maxFlow: Schema.optionalWith(NonNegative, { exact: true }),
}) {
  get [LinkTypeId](): LinkTypeId {
    return LinkTypeId
  }
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeConduit = makeEntity("Conduit", Conduit)

/**
 * `[CONDUITS]`. A conduit without a flow limit keeps a blank MaxFlow column.
 *
 * @category Sections
 * @since 0.1.0
 */
export const ConduitSection: Section<Conduit> = tabular(
  "CONDUITS",
  [
    ...linkColumns,
    { label: "Length", width: 10 },
    { label: "Roughness", width: 10 },
    { label: "InOffset", width: 10 },
    { label: "OutOffset", width: 10 },
    { label: "InitFlow", width: 10 },
    { label: "MaxFlow", width: 10 },
  ],
  (conduit) =>
    [
      ...linkFields(conduit),
      fixed(conduit.length, 10, 2),
      fixed(conduit.roughness, 10, 5),
      fixed(conduit.inOffset, 10, 2),
      fixed(conduit.outOffset, 10, 2),
      fixed(conduit.initFlow, 10, 2),
      fixedOrBlank(conduit.maxFlow, 10, 2),
    ].join(" "),
)

/**
 * Pump link driven by a pump curve. `startupDepth` and `shutoffDepth` are
 * inlet node depths switching the pump on and off.
 *
 * @category Models
 * @since 0.1.0
 */
export class Pump extends Schema.Class<Pump>("Pump")({
  ...endpoints,
  curve: Schema.instanceOf(Curve),
  status: Schema.optionalWith(PumpStatus, { exact: true, default: () => "ON" as const }),
  startupDepth: Schema.optionalWith(NonNegative, { exact: true, default: () => 0 }),
  shutoffDepth: Schema.optionalWith(NonNegative, { exact: true, default: () => 0 }),
}) {
  get [LinkTypeId](): LinkTypeId {
    return LinkTypeId
  }
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makePump = makeEntity("Pump", Pump)

/**
 * `[PUMPS]`.
 *
 * @category Sections
 * @since 0.1.0
 */
export const PumpSection: Section<Pump> = tabular(
  "PUMPS",
  [
    ...linkColumns,
    { label: "Pump Curve", width: 16 },
    { label: "Status", width: 6 },
    { label: "Startup", width: 10 },
    { label: "Shutoff", width: 10 },
  ],
  (pump) =>
    [
      ...linkFields(pump),
      pad(pump.curve.name, 16),
      pad(pump.status, 6),
      fixed(pump.startupDepth, 10, 2),
      fixed(pump.shutoffDepth, 10, 2),
    ].join(" "),
)

/**
 * Orifice link. Not supported yet: construction always fails.
 *
 * @category Models
 * @since 0.1.0
 */
export class Orifice extends Unsupported<{
  readonly name: string
  readonly fromNode: Node
  readonly toNode: Node
  readonly orificeType: "SIDE" | "BOTTOM"
  readonly offset: number
  readonly coefficient: number
}>("Orifice") {}

const sharpCrested = {
  gated: Schema.optionalWith(YesNo, { exact: true, default: () => "NO" as const }),
  endContractions: Schema.optionalWith(Schema.Int.pipe(Schema.nonNegative()), { exact: true, default: () => 0 }),
  secondaryCoefficient: Schema.optionalWith(NonNegative, { exact: true }),
  surcharge: Schema.optionalWith(YesNo, { exact: true, default: () => "YES" as const }),
}

/**
 * @category Variants
 * @since 0.1.0
 */
export const TransverseWeir = Schema.TaggedStruct("TRANSVERSE", sharpCrested).annotations(Strict)

/**
 * @category Variants
 * @since 0.1.0
 */
export const SideflowWeir = Schema.TaggedStruct("SIDEFLOW", sharpCrested).annotations(Strict)

/**
 * @category Variants
 * @since 0.1.0
 */
export const VNotchWeir = Schema.TaggedStruct("V-NOTCH", sharpCrested).annotations(Strict)

/**
 * `secondaryCoefficient` applies to the triangular ends.
 *
 * @category Variants
 * @since 0.1.0
 */
export const TrapezoidalWeir = Schema.TaggedStruct("TRAPEZOIDAL", sharpCrested).annotations(Strict)

/**
 * Broad crested roadway crossing. Flap gate, end contractions, secondary
 * coefficient and surcharge are fixed for this type, so any such input is
 * dropped.
 *
 * @category Variants
 * @since 0.1.0
 */
export const RoadwayWeir = Schema.TaggedStruct("ROADWAY", {
  roadWidth: Schema.Number.pipe(Schema.positive()),
  roadSurface: RoadSurface,
})

/**
 * @category Variants
 * @since 0.1.0
 */
export const WeirDesign = Schema.Union(TransverseWeir, SideflowWeir, VNotchWeir, TrapezoidalWeir, RoadwayWeir)

/**
 * @category Variants
 * @since 0.1.0
 */
export type WeirDesign = typeof WeirDesign.Type

/**
 * Weir link, used for flow diversions and storage outlets. The opening shape
 * goes in the cross-section: RECT_OPEN for TRANSVERSE, SIDEFLOW and ROADWAY,
 * TRIANGULAR for V-NOTCH and TRAPEZOIDAL for TRAPEZOIDAL.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const road = new Weir({
 *   name: "w1",
 *   fromNode: j1,
 *   toNode: j2,
 *   crestHeight: 1.5,
 *   coefficient: 3.33,
 *   design: RoadwayWeir.make({ roadWidth: 12, roadSurface: "PAVED" })
 * })
 * road.surcharge // "NO"
 * ```
 */
export class Weir extends Schema.Class<Weir>("Weir")({
  ...endpoints,
  crestHeight: Offset,
  coefficient: NonNegative,
  design: WeirDesign,
}) {
  get [LinkTypeId](): LinkTypeId {
    return LinkTypeId
  }

  get weirType(): WeirDesign["_tag"] {
    return this.design._tag
  }

  get gated(): YesNo {
    return this.design._tag === "ROADWAY" ? "NO" : this.design.gated
  }

  get endContractions(): number {
    return this.design._tag === "ROADWAY" ? 0 : this.design.endContractions
  }

  get secondaryCoefficient(): number {
    return this.design._tag === "ROADWAY" ? 0 : this.design.secondaryCoefficient ?? this.coefficient
  }

  get surcharge(): YesNo {
    return this.design._tag === "ROADWAY" ? "NO" : this.design.surcharge
  }
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeWeir = makeEntity("Weir", Weir)

/**
 * `[WEIRS]`. Road columns stay blank for the sharp crested types.
 *
 * @category Sections
 * @since 0.1.0
 */
export const WeirSection: Section<Weir> = tabular(
  "WEIRS",
  [
    ...linkColumns,
    { label: "Type", width: 12 },
    { label: "CrestHt", width: 10 },
    { label: "Qcoeff", width: 10 },
    { label: "Gated", width: 8 },
    { label: "EndCon", width: 8 },
    { label: "EndCoeff", width: 10 },
    { label: "Surcharge", width: 10 },
    { label: "RoadWidth", width: 10 },
    { label: "RoadSurf", width: 10 },
  ],
  (weir) =>
    [
      ...linkFields(weir),
      pad(weir.weirType, 12),
      fixed(weir.crestHeight, 10, 2),
      fixed(weir.coefficient, 10, 3),
      pad(weir.gated, 8),
      pad(integer(weir.endContractions), 8),
      fixed(weir.secondaryCoefficient, 10, 3),
      pad(weir.surcharge, 10),
      weir.design._tag === "ROADWAY" ? fixed(weir.design.roadWidth, 10, 2) : blank(10),
      weir.design._tag === "ROADWAY" ? pad(weir.design.roadSurface, 10) : blank(10),
    ].join(" "),
)

/**
 * Outflow read from a rating curve against the inlet depth.
 *
 * @category Variants
 * @since 0.1.0
 */
export const TabularDepthRating = Schema.TaggedStruct("TABULAR/DEPTH", {
  curve: Schema.instanceOf(Curve),
}).annotations(Strict)

/**
 * Outflow read from a rating curve against the head difference.
 *
 * @category Variants
 * @since 0.1.0
 */
export const TabularHeadRating = Schema.TaggedStruct("TABULAR/HEAD", {
  curve: Schema.instanceOf(Curve),
}).annotations(Strict)

const powerLaw = {
  coefficient: NonNegative,
  exponent: Schema.Number.pipe(Schema.finite()),
}

/**
 * Outflow `Q = coefficient * depth ^ exponent`.
 *
 * @category Variants
 * @since 0.1.0
 */
export const FunctionalDepthRating = Schema.TaggedStruct("FUNCTIONAL/DEPTH", powerLaw).annotations(Strict)

/**
 * Outflow `Q = coefficient * head ^ exponent`.
 *
 * @category Variants
 * @since 0.1.0
 */
export const FunctionalHeadRating = Schema.TaggedStruct("FUNCTIONAL/HEAD", powerLaw).annotations(Strict)

/**
 * @category Variants
 * @since 0.1.0
 */
export const OutletRating = Schema.Union(
  TabularDepthRating,
  TabularHeadRating,
  FunctionalDepthRating,
  FunctionalHeadRating,
)

/**
 * @category Variants
 * @since 0.1.0
 */
export type OutletRating = typeof OutletRating.Type

/**
 * Outlet link: a flow control device with a user-defined relation between
 * outflow and water depth or head.
 *
 * @category Models
 * @since 0.1.0
 */
export class Outlet extends Schema.Class<Outlet>("Outlet")({
  ...endpoints,
  offset: Offset,
  rating: OutletRating,
  gated: Schema.optionalWith(YesNo, { exact: true, default: () => "NO" as const }),
}) {
  get [LinkTypeId](): LinkTypeId {
    return LinkTypeId
  }

  get outletType(): OutletRating["_tag"] {
    return this.rating._tag
  }
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeOutlet = makeEntity("Outlet", Outlet)

const ratingFields = (rating: OutletRating): readonly [string, string] => {
  switch (rating._tag) {
    case "TABULAR/DEPTH":
    case "TABULAR/HEAD":
      return [pad(rating.curve.name, 16), blank(10)]
    case "FUNCTIONAL/DEPTH":
    case "FUNCTIONAL/HEAD":
      return [fixed(rating.coefficient, 16, 3), fixed(rating.exponent, 10, 3)]
  }
}

/**
 * `[OUTLETS]`.
 *
 * @category Sections
 * @since 0.1.0
 */
export const OutletSection: Section<Outlet> = tabular(
  "OUTLETS",
  [
    ...linkColumns,
    { label: "Offset", width: 10 },
    { label: "Type", width: 16 },
    { label: "QTable/Qcoeff", width: 16 },
    { label: "Qexpon", width: 10 },
    { label: "Gated", width: 8 },
  ],
  (outlet) =>
    [
      ...linkFields(outlet),
      fixed(outlet.offset, 10, 2),
      pad(outlet.outletType, 16),
      ...ratingFields(outlet.rating),
      pad(outlet.gated, 8),
    ].join(" "),
)
