/**
 * Node kinds of the drainage network.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import { makeEntity } from "./internal/construct.js"
import { blank, fixed, pad } from "./internal/format.js"
import { type Section, tabular } from "./Section.js"
import { Curve, Timeseries } from "./Tabular.js"
import { Area, EntityName, type Link, NodeTypeId } from "./Topology.js"
import { Unsupported } from "./Unsupported.js"
import { type OutfallType, YesNo } from "./Vocabulary.js"

const Strict = { parseOptions: { onExcessProperty: "error" } } as const

const Depth = Schema.Number.pipe(Schema.nonNegative())

/**
 * Junction: a point where channels and pipes connect, such as a manhole.
 *
 * A `maxDepth` of 0 lets the engine use the distance from the invert to the
 * top of the highest connecting link. Ponding over `pondedArea` only happens
 * when the ALLOW_PONDING option is on.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const j1 = new Junction({ name: "j1", elevation: 10 })
 * ```
 */
export class Junction extends Schema.Class<Junction>("Junction")({
  name: EntityName,
  elevation: Schema.Number.pipe(Schema.finite()),
  maxDepth: Schema.optionalWith(Depth, { exact: true, default: () => 0 }),
  initDepth: Schema.optionalWith(Depth, { exact: true, default: () => 0 }),
  surchargeDepth: Schema.optionalWith(Depth, { exact: true, default: () => 0 }),
  pondedArea: Schema.optionalWith(Schema.Number.pipe(Schema.nonNegative()), { exact: true, default: () => 0 }),
}) {
  get [NodeTypeId](): NodeTypeId {
    return NodeTypeId
  }
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeJunction = makeEntity("Junction", Junction)

/**
 * `[JUNCTIONS]`.
 *
 * @category Sections
 * @since 0.1.0
 */
export const JunctionSection: Section<Junction> = tabular(
  "JUNCTIONS",
  [
    { label: "Name", width: 16 },
    { label: "Elevation", width: 10 },
    { label: "MaxDepth", width: 10 },
    { label: "InitDepth", width: 10 },
    { label: "SurDepth", width: 10 },
    { label: "Aponded", width: 10 },
  ],
  (junction) =>
    [
      pad(junction.name, 16),
      fixed(junction.elevation, 10, 3),
      fixed(junction.maxDepth, 10, 2),
      fixed(junction.initDepth, 10, 2),
      fixed(junction.surchargeDepth, 10, 2),
      pad(String(junction.pondedArea), 11),
    ].join(" "),
  { trailingSeparator: true },
)

/**
 * @category Variants
 * @since 0.1.0
 */
export const FreeOutfall = Schema.TaggedStruct("FREE", {}).annotations(Strict)

/**
 * @category Variants
 * @since 0.1.0
 */
export const NormalOutfall = Schema.TaggedStruct("NORMAL", {}).annotations(Strict)

/**
 * Outfall held at a fixed stage elevation.
 *
 * @category Variants
 * @since 0.1.0
 */
export const FixedOutfall = Schema.TaggedStruct("FIXED", {
  stage: Schema.Number.pipe(Schema.finite()),
}).annotations(Strict)

/**
 * Outfall following a tidal curve of stage versus hour of day.
 *
 * @category Variants
 * @since 0.1.0
 */
export const TidalOutfall = Schema.TaggedStruct("TIDAL", {
  curve: Schema.instanceOf(Curve),
}).annotations(Strict)

/**
 * Outfall whose stage follows a time series.
 *
 * @category Variants
 * @since 0.1.0
 */
export const TimeseriesOutfall = Schema.TaggedStruct("TIMESERIES", {
  timeseries: Schema.instanceOf(Timeseries),
}).annotations(Strict)

/**
 * Boundary condition of an outfall. The tag selects what the stage data is:
 * nothing, a number, a curve or a time series.
 *
 * @category Variants
 * @since 0.1.0
 */
export const OutfallStage = Schema.Union(FreeOutfall, NormalOutfall, FixedOutfall, TidalOutfall, TimeseriesOutfall)

/**
 * @category Variants
 * @since 0.1.0
 */
export type OutfallStage = typeof OutfallStage.Type

/**
 * Outfall: a terminal node of the drainage system. `gated` marks a flap gate
 * preventing reverse flow and `routeTo` an optional subcatchment receiving the
 * discharge.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const out1 = new Outfall({ name: "out1", elevation: 8 })
 * const tide = new Outfall({ name: "out2", elevation: 2, stage: FixedOutfall.make({ stage: 3.5 }) })
 * ```
 */
export class Outfall extends Schema.Class<Outfall>("Outfall")({
  name: EntityName,
  elevation: Schema.Number.pipe(Schema.finite()),
  stage: Schema.optionalWith(OutfallStage, { exact: true, default: () => FreeOutfall.make({}) }),
  gated: Schema.optionalWith(YesNo, { exact: true, default: () => "NO" as const }),
  routeTo: Schema.optionalWith(Area, { exact: true }),
}) {
  get [NodeTypeId](): NodeTypeId {
    return NodeTypeId
  }

  get outfallType(): OutfallType {
    return this.stage._tag
  }
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeOutfall = makeEntity("Outfall", Outfall)

const STAGE_WIDTH = 16

const stageData = (stage: OutfallStage): string => {
  switch (stage._tag) {
    case "FREE":
    case "NORMAL":
      return blank(STAGE_WIDTH)
    case "FIXED":
      return fixed(stage.stage, STAGE_WIDTH, 3)
    case "TIDAL":
      return pad(stage.curve.name, STAGE_WIDTH)
    case "TIMESERIES":
      return pad(stage.timeseries.name, STAGE_WIDTH)
  }
}

/**
 * `[OUTFALLS]`.
 *
 * @category Sections
 * @since 0.1.0
 */
export const OutfallSection: Section<Outfall> = tabular(
  "OUTFALLS",
  [
    { label: "Name", width: 16 },
    { label: "Elevation", width: 10 },
    { label: "Type", width: 10 },
    { label: "Stage Data", width: 16 },
    { label: "Gated", width: 8 },
    { label: "Route To", width: 16 },
  ],
  (outfall) =>
    [
      pad(outfall.name, 16),
      fixed(outfall.elevation, 10, 3),
      pad(outfall.outfallType, 10),
      stageData(outfall.stage),
      pad(outfall.gated, 8),
      outfall.routeTo === undefined ? "" : pad(outfall.routeTo.name, 16),
    ].join(" "),
)

/**
 * Flow divider node. Not supported yet: construction always fails.
 *
 * @category Models
 * @since 0.1.0
 */
export class Divider extends Unsupported<{
  readonly name: string
  readonly elevation: number
  readonly dividedLink: Link
}>("Divider") {}

/**
 * Storage unit node. Not supported yet: construction always fails.
 *
 * @category Models
 * @since 0.1.0
 */
export class Storage extends Unsupported<{ readonly name: string; readonly elevation: number }>("Storage") {}
