/**
 * Run-level configuration: project title, analysis options and report
 * contents.
 *
 * Every field carries the default the engine assumes, so `new Options()` and
 * `new Report()` describe a plain dynamic wave run reporting continuity and
 * flow statistics only.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import { makeEntity } from "./internal/construct.js"
import { decimal, integer, pad } from "./internal/format.js"
import type { Section } from "./Section.js"
import { Area, Link, Node } from "./Topology.js"
import {
  FlowUnits,
  ForceMainEquation,
  InertialDamping,
  InfiltrationMethod,
  LinkOffsets,
  NormalFlowLimited,
  RoutingMethod,
  SurchargeMethod,
  YesNo,
} from "./Vocabulary.js"

/**
 * Project title and notes.
 *
 * @category Models
 * @since 0.1.0
 */
export class Title extends Schema.Class<Title>("Title")({
  header: Schema.optionalWith(Schema.String, { exact: true, default: () => "Project Title" }),
  description: Schema.optionalWith(Schema.String, { exact: true, default: () => "Project Description" }),
}) {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeTitle = makeEntity("Title", Title)

/**
 * `[TITLE]`.
 *
 * @category Sections
 * @since 0.1.0
 */
export const TitleSection: Section<Title> = {
  name: "TITLE",
  comments: [";;Project Title/Notes"],
  render: (title) => [title.header, title.description],
}

const no = () => "NO" as const

const CalendarDate = Schema.String.pipe(
  Schema.pattern(/^\d{1,2}\/\d{1,2}\/\d{4}$/, { message: () => "dates are written month/day/year" }),
)

const MonthDay = Schema.String.pipe(
  Schema.pattern(/^\d{1,2}\/\d{1,2}$/, { message: () => "days of the year are written month/day" }),
)

const Clock = Schema.String.pipe(
  Schema.pattern(/^\d{1,2}:\d{2}(:\d{2})?$/, { message: () => "times are written hours:minutes[:seconds]" }),
)

const Count = Schema.Int.pipe(Schema.nonNegative())

const NonNegative = Schema.Number.pipe(Schema.nonNegative())

/**
 * Analysis options. Dates are month/day/year, times of day and time steps
 * hours:minutes:seconds, `routingStep` and the other routing steps seconds.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const options = new Options({ flowUnits: "LPS", flowRouting: "KINWAVE" })
 * ```
 */
export class Options extends Schema.Class<Options>("Options")({
  flowUnits: Schema.optionalWith(FlowUnits, { exact: true, default: () => "CFS" as const }),
  infiltration: Schema.optionalWith(InfiltrationMethod, { exact: true, default: () => "HORTON" as const }),
  flowRouting: Schema.optionalWith(RoutingMethod, { exact: true, default: () => "DYNWAVE" as const }),
  linkOffsets: Schema.optionalWith(LinkOffsets, { exact: true, default: () => "DEPTH" as const }),
  forceMainEquation: Schema.optionalWith(ForceMainEquation, { exact: true, default: () => "H-W" as const }),
  ignoreRainfall: Schema.optionalWith(YesNo, { exact: true, default: no }),
  ignoreSnowmelt: Schema.optionalWith(YesNo, { exact: true, default: no }),
  ignoreGroundwater: Schema.optionalWith(YesNo, { exact: true, default: no }),
  ignoreRdii: Schema.optionalWith(YesNo, { exact: true, default: no }),
  ignoreRouting: Schema.optionalWith(YesNo, { exact: true, default: no }),
  ignoreQuality: Schema.optionalWith(YesNo, { exact: true, default: no }),
  allowPonding: Schema.optionalWith(YesNo, { exact: true, default: no }),
  skipSteadyState: Schema.optionalWith(YesNo, { exact: true, default: no }),
  sysFlowTol: Schema.optionalWith(Count, { exact: true, default: () => 5 }),
  latFlowTol: Schema.optionalWith(Count, { exact: true, default: () => 5 }),
  startDate: Schema.optionalWith(CalendarDate, { exact: true, default: () => "1/1/2004" }),
  startTime: Schema.optionalWith(Clock, { exact: true, default: () => "0:00:00" }),
  endDate: Schema.optionalWith(CalendarDate, { exact: true, default: () => "1/1/2004" }),
  endTime: Schema.optionalWith(Clock, { exact: true, default: () => "23:59:59" }),
  reportStartDate: Schema.optionalWith(CalendarDate, { exact: true, default: () => "1/1/2004" }),
  reportStartTime: Schema.optionalWith(Clock, { exact: true, default: () => "0:00:00" }),
  sweepStart: Schema.optionalWith(MonthDay, { exact: true, default: () => "1/1" }),
  sweepEnd: Schema.optionalWith(MonthDay, { exact: true, default: () => "12/31" }),
  dryDays: Schema.optionalWith(Count, { exact: true, default: () => 0 }),
  reportStep: Schema.optionalWith(Clock, { exact: true, default: () => "0:15:00" }),
  wetStep: Schema.optionalWith(Clock, { exact: true, default: () => "0:05:00" }),
  dryStep: Schema.optionalWith(Clock, { exact: true, default: () => "1:00:00" }),
  routingStep: Schema.optionalWith(NonNegative, { exact: true, default: () => 20 }),
  lengtheningStep: Schema.optionalWith(NonNegative, { exact: true, default: () => 0 }),
  variableStep: Schema.optionalWith(NonNegative, { exact: true, default: () => 0 }),
  minimumStep: Schema.optionalWith(NonNegative, { exact: true, default: () => 0.5 }),
  inertialDamping: Schema.optionalWith(InertialDamping, { exact: true, default: () => "PARTIAL" as const }),
  normalFlowLimited: Schema.optionalWith(NormalFlowLimited, { exact: true, default: () => "BOTH" as const }),
  surchargeMethod: Schema.optionalWith(SurchargeMethod, { exact: true, default: () => "EXTRAN" as const }),
  minSurfaceArea: Schema.optionalWith(NonNegative, { exact: true, default: () => 0 }),
  minSlope: Schema.optionalWith(NonNegative, { exact: true, default: () => 0 }),
  maxTrials: Schema.optionalWith(Count, { exact: true, default: () => 8 }),
  headTolerance: Schema.optionalWith(NonNegative, { exact: true, default: () => 0.005 }),
  threads: Schema.optionalWith(Schema.Int.pipe(Schema.positive()), { exact: true, default: () => 8 }),
}) {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeOptions = makeEntity("Options", Options)

const optionRows = (options: Options): ReadonlyArray<readonly [string, string]> => [
  ["FLOW_UNITS", options.flowUnits],
  ["INFILTRATION", options.infiltration],
  ["FLOW_ROUTING", options.flowRouting],
  ["LINK_OFFSETS", options.linkOffsets],
  ["FORCE_MAIN_EQUATION", options.forceMainEquation],
  ["IGNORE_RAINFALL", options.ignoreRainfall],
  ["IGNORE_SNOWMELT", options.ignoreSnowmelt],
  ["IGNORE_GROUNDWATER", options.ignoreGroundwater],
  ["IGNORE_RDII", options.ignoreRdii],
  ["IGNORE_ROUTING", options.ignoreRouting],
  ["IGNORE_QUALITY", options.ignoreQuality],
  ["ALLOW_PONDING", options.allowPonding],
  ["SKIP_STEADY_STATE", options.skipSteadyState],
  ["SYS_FLOW_TOL", integer(options.sysFlowTol)],
  ["LAT_FLOW_TOL", integer(options.latFlowTol)],
  ["START_DATE", options.startDate],
  ["START_TIME", options.startTime],
  ["END_DATE", options.endDate],
  ["END_TIME", options.endTime],
  ["REPORT_START_DATE", options.reportStartDate],
  ["REPORT_START_TIME", options.reportStartTime],
  ["SWEEP_START", options.sweepStart],
  ["SWEEP_END", options.sweepEnd],
  ["DRY_DAYS", integer(options.dryDays)],
  ["REPORT_STEP", options.reportStep],
  ["WET_STEP", options.wetStep],
  ["DRY_STEP", options.dryStep],
  ["ROUTING_STEP", decimal(options.routingStep)],
  ["LENGTHENING_STEP", decimal(options.lengtheningStep)],
  ["VARIABLE_STEP", decimal(options.variableStep)],
  ["MINIMUM_STEP", decimal(options.minimumStep)],
  ["INERTIAL_DAMPING", options.inertialDamping],
  ["NORMAL_FLOW_LIMITED", options.normalFlowLimited],
  ["SURCHARGE_METHOD", options.surchargeMethod],
  ["MIN_SURFAREA", decimal(options.minSurfaceArea)],
  ["MIN_SLOPE", decimal(options.minSlope)],
  ["MAX_TRIALS", integer(options.maxTrials)],
  ["HEAD_TOLERANCE", decimal(options.headTolerance)],
  ["THREADS", integer(options.threads)],
]

/**
 * `[OPTIONS]`: one `KEY value` line per option, in a fixed order.
 *
 * @category Sections
 * @since 0.1.0
 */
export const OptionsSection: Section<Options> = {
  name: "OPTIONS",
  comments: [";;Option             Value"],
  render: (options) => optionRows(options).map(([key, value]) => `${pad(key, 20)} ${value}`),
}

const selection = <A>(member: Schema.Schema<A>) =>
  Schema.optionalWith(Schema.Union(Schema.Literal("ALL", "NONE"), Schema.NonEmptyArray(member)), {
    exact: true,
    default: () => "NONE" as const,
  })

/**
 * Which results go to the report file. Each element list takes ALL, NONE or
 * the handles whose results are reported.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const report = new Report({ nodes: "ALL", links: [c1, c2] })
 * ```
 */
export class Report extends Schema.Class<Report>("Report")({
  disabled: Schema.optionalWith(YesNo, { exact: true, default: no }),
  input: Schema.optionalWith(YesNo, { exact: true, default: no }),
  continuity: Schema.optionalWith(YesNo, { exact: true, default: () => "YES" as const }),
  flowStats: Schema.optionalWith(YesNo, { exact: true, default: () => "YES" as const }),
  controls: Schema.optionalWith(YesNo, { exact: true, default: no }),
  subcatchments: selection(Area),
  nodes: selection(Node),
  links: selection(Link),
}) {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeReport = makeEntity("Report", Report)

const listed = (value: "ALL" | "NONE" | ReadonlyArray<{ readonly name: string }>): string =>
  typeof value === "string" ? value : value.map((entry) => entry.name).join(" ")

const reportRows = (report: Report): ReadonlyArray<readonly [string, string]> => [
  ["DISABLED", report.disabled],
  ["INPUT", report.input],
  ["CONTINUITY", report.continuity],
  ["FLOWSTATS", report.flowStats],
  ["CONTROLS", report.controls],
  ["SUBCATCHMENTS", listed(report.subcatchments)],
  ["NODES", listed(report.nodes)],
  ["LINKS", listed(report.links)],
]

/**
 * `[REPORT]`, written without column comments.
 *
 * @category Sections
 * @since 0.1.0
 */
export const ReportSection: Section<Report> = {
  name: "REPORT",
  comments: [],
  render: (report) => reportRows(report).map(([key, value]) => `${pad(key, 21)} ${value}`),
}
