/**
 * Closed vocabularies used as discriminant tags across the network model.
 *
 * Every enumeration is a `Schema.Literal`, so membership is checked when an
 * entity is constructed and the matching string union is available as a type.
 * No enumeration carries a numeric encoding: the literal text is what gets
 * written to the input file.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * Flow units. US units switch every other quantity to US customary units,
 * metric units switch them to SI.
 *
 * @category Vocabulary
 * @since 0.1.0
 */
export const FlowUnits = Schema.Literal("CFS", "GPM", "MGD", "CMS", "LPS", "MLD")

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export type FlowUnits = typeof FlowUnits.Type

/**
 * Infiltration models for the pervious subarea of a subcatchment.
 *
 * @category Vocabulary
 * @since 0.1.0
 */
export const InfiltrationMethod = Schema.Literal(
  "HORTON",
  "MODIFIED_HORTON",
  "GREEN_AMPT",
  "MODIFIED_GREEN_AMPT",
  "CURVE_NUMBER",
)

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export type InfiltrationMethod = typeof InfiltrationMethod.Type

/**
 * Flow routing methods: steady state, kinematic wave and dynamic wave.
 *
 * @category Vocabulary
 * @since 0.1.0
 */
export const RoutingMethod = Schema.Literal("STEADY", "KINWAVE", "DYNWAVE")

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export type RoutingMethod = typeof RoutingMethod.Type

/**
 * Boundary condition types of an outfall node.
 *
 * @category Vocabulary
 * @since 0.1.0
 */
export const OutfallType = Schema.Literal("FREE", "NORMAL", "FIXED", "TIDAL", "TIMESERIES")

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export type OutfallType = typeof OutfallType.Type

/**
 * How potential evaporation rates vary with time.
 *
 * @category Vocabulary
 * @since 0.1.0
 */
export const EvaporationFormat = Schema.Literal("CONSTANT", "MONTHLY", "TIMESERIES", "TEMPERATURE", "FILE")

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export type EvaporationFormat = typeof EvaporationFormat.Type

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export const YesNo = Schema.Literal("YES", "NO")

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export type YesNo = typeof YesNo.Type

/**
 * Form of recorded rainfall at a gage.
 *
 * @category Vocabulary
 * @since 0.1.0
 */
export const RainForm = Schema.Literal("INTENSITY", "VOLUME", "CUMULATIVE")

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export type RainForm = typeof RainForm.Type

/**
 * Depth units of a user-prepared rainfall file.
 *
 * @category Vocabulary
 * @since 0.1.0
 */
export const RainUnits = Schema.Literal("IN", "MM")

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export type RainUnits = typeof RainUnits.Type

/**
 * Where subarea runoff is routed.
 *
 * @category Vocabulary
 * @since 0.1.0
 */
export const RouteTo = Schema.Literal("OUTLET", "IMPERVIOUS", "PERVIOUS")

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export type RouteTo = typeof RouteTo.Type

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export const LinkOffsets = Schema.Literal("DEPTH", "ELEVATION")

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export const ForceMainEquation = Schema.Literal("H-W", "D-W")

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export const InertialDamping = Schema.Literal("NONE", "PARTIAL", "FULL")

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export const NormalFlowLimited = Schema.Literal("SLOPE", "FROUDE", "BOTH")

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export const SurchargeMethod = Schema.Literal("EXTRAN", "SLOT")

/**
 * Grate designs accepted by GRATE and DROP_GRATE inlets.
 *
 * @category Vocabulary
 * @since 0.1.0
 */
export const GrateType = Schema.Literal(
  "P_BAR-50",
  "P_BAR-50X100",
  "P_BAR-30",
  "CURVED_VANE",
  "TILT_BAR-45",
  "TILT_BAR-30",
  "RETICULINE",
  "GENERIC",
)

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export type GrateType = typeof GrateType.Type

/**
 * Throat angle of a curb opening inlet.
 *
 * @category Vocabulary
 * @since 0.1.0
 */
export const ThroatAngle = Schema.Literal("HORIZONTAL", "INCLINED", "VERTICAL")

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export type ThroatAngle = typeof ThroatAngle.Type

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export const InletPlacement = Schema.Literal("AUTOMATIC", "ON_GRADE", "ON_SAG")

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export const MapUnits = Schema.Literal("FEET", "METERS", "DEGREES", "NONE")

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export const PumpStatus = Schema.Literal("ON", "OFF")

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export const RoadSurface = Schema.Literal("PAVED", "GRAVEL")

/**
 * @category Vocabulary
 * @since 0.1.0
 */
export type RoadSurface = typeof RoadSurface.Type

/**
 * Units of a daily climate file.
 *
 * @category Vocabulary
 * @since 0.1.0
 */
export const TemperatureUnits = Schema.Literal("C", "F", "C10")
