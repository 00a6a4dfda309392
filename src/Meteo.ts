/**
 * Meteorological inputs: rain gages, evaporation and temperature.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import { makeEntity } from "./internal/construct.js"
import { decimal, fixed, pad, quoted, textOrDecimal } from "./internal/format.js"
import { type Section, tabular } from "./Section.js"
import { Timeseries } from "./Tabular.js"
import { EntityName } from "./Topology.js"
import { Unsupported } from "./Unsupported.js"
import { RainForm, RainUnits, TemperatureUnits, YesNo } from "./Vocabulary.js"

const Strict = { parseOptions: { onExcessProperty: "error" } } as const

const NonNegative = Schema.Number.pipe(Schema.nonNegative())

const MonthlyValues = Schema.Array(Schema.Number.pipe(Schema.finite())).pipe(Schema.itemsCount(12))

/**
 * Rain gage fed by a time series of the same document.
 *
 * @category Variants
 * @since 0.1.0
 */
export const TimeseriesRain = Schema.TaggedStruct("TIMESERIES", {
  timeseries: Schema.instanceOf(Timeseries),
}).annotations(Strict)

/**
 * Rain gage fed by an external rainfall file. `station` and `units` describe
 * the recording station of a user-prepared file.
 *
 * @category Variants
 * @since 0.1.0
 */
export const FileRain = Schema.TaggedStruct("FILE", {
  file: Schema.NonEmptyTrimmedString,
  station: Schema.NonEmptyTrimmedString,
  units: RainUnits,
}).annotations(Strict)

/**
 * Data source of a rain gage: exactly one time series or one file.
 *
 * @category Variants
 * @since 0.1.0
 */
export const RainSource = Schema.Union(TimeseriesRain, FileRain)

/**
 * @category Variants
 * @since 0.1.0
 */
export type RainSource = typeof RainSource.Type

/**
 * A rain gage providing rainfall data. `interval` is the recording interval in
 * decimal hours or as `hours:minutes` text (e.g. `"0:15"`); `scf` the snow
 * catch correction factor.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const gage = new Raingage({
 *   name: "rg1",
 *   form: "INTENSITY",
 *   interval: "1:00",
 *   source: TimeseriesRain.make({ timeseries: rain })
 * })
 * ```
 */
export class Raingage extends Schema.Class<Raingage>("Raingage")({
  name: EntityName,
  form: RainForm,
  interval: Schema.Union(
    Schema.String.pipe(Schema.pattern(/^\d+:\d{2}$/, { message: () => "interval must be hours:minutes" })),
    Schema.Number.pipe(Schema.positive()),
  ),
  scf: Schema.optionalWith(NonNegative, { exact: true, default: () => 1 }),
  source: RainSource,
}) {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeRaingage = makeEntity("Raingage", Raingage)

const rainSource = (source: RainSource): string => {
  switch (source._tag) {
    case "TIMESERIES":
      return `TIMESERIES ${source.timeseries.name} `
    case "FILE":
      return `FILE ${quoted(source.file)} ${pad(source.station, 10)} ${pad(source.units, 10)}`
  }
}

/**
 * `[RAINGAGES]`.
 *
 * @category Sections
 * @since 0.1.0
 */
export const RaingageSection: Section<Raingage> = tabular(
  "RAINGAGES",
  [
    { label: "Name", width: 16 },
    { label: "Format", width: 9 },
    { label: "Interval", width: 9 },
    { label: "SCF", width: 6 },
    { label: "Source", width: 10 },
  ],
  (gage) =>
    [pad(gage.name, 16), pad(gage.form, 9), pad(textOrDecimal(gage.interval), 9), fixed(gage.scf, 6, 2), rainSource(gage.source)]
      .join(" "),
)

/**
 * @category Variants
 * @since 0.1.0
 */
export const ConstantEvaporation = Schema.TaggedStruct("CONSTANT", { rate: NonNegative }).annotations(Strict)

/**
 * @category Variants
 * @since 0.1.0
 */
export const MonthlyEvaporation = Schema.TaggedStruct("MONTHLY", { rates: MonthlyValues }).annotations(Strict)

/**
 * @category Variants
 * @since 0.1.0
 */
export const TimeseriesEvaporation = Schema.TaggedStruct("TIMESERIES", {
  timeseries: Schema.instanceOf(Timeseries),
}).annotations(Strict)

/**
 * Rates computed from the daily air temperatures of the `[TEMPERATURE]`
 * climate file.
 *
 * @category Variants
 * @since 0.1.0
 */
export const TemperatureEvaporation = Schema.TaggedStruct("TEMPERATURE", {}).annotations(Strict)

/**
 * Rates read from the climate file, optionally scaled by monthly pan
 * coefficients.
 *
 * @category Variants
 * @since 0.1.0
 */
export const FileEvaporation = Schema.TaggedStruct("FILE", {
  panCoefficients: Schema.optionalWith(MonthlyValues, { exact: true }),
}).annotations(Strict)

/**
 * @category Variants
 * @since 0.1.0
 */
export const EvaporationSource = Schema.Union(
  ConstantEvaporation,
  MonthlyEvaporation,
  TimeseriesEvaporation,
  TemperatureEvaporation,
  FileEvaporation,
)

/**
 * @category Variants
 * @since 0.1.0
 */
export type EvaporationSource = typeof EvaporationSource.Type

/**
 * Potential evaporation rates of the study area. `dryOnly` restricts
 * evaporation to periods without precipitation.
 *
 * @category Models
 * @since 0.1.0
 */
export class Evaporation extends Schema.Class<Evaporation>("Evaporation")({
  source: EvaporationSource,
  dryOnly: Schema.optionalWith(YesNo, { exact: true, default: () => "NO" as const }),
}) {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeEvaporation = makeEntity("Evaporation", Evaporation)

const valueRow = (values: ReadonlyArray<number>): string => values.map((value) => fixed(value, 10, 3)).join("")

const evaporationParameters = (source: EvaporationSource): string => {
  switch (source._tag) {
    case "CONSTANT":
      return decimal(source.rate)
    case "MONTHLY":
      return valueRow(source.rates)
    case "TIMESERIES":
      return source.timeseries.name
    case "TEMPERATURE":
      return ""
    case "FILE":
      return source.panCoefficients === undefined ? "" : valueRow(source.panCoefficients)
  }
}

/**
 * `[EVAPORATION]`: the data source line followed by the `DRY_ONLY` line.
 *
 * @category Sections
 * @since 0.1.0
 */
export const EvaporationSection: Section<Evaporation> = {
  name: "EVAPORATION",
  comments: [";;Data Source    Parameters", ";;-------------- ----------------"],
  render: (evaporation) => [
    `${pad(evaporation.source._tag, 16)} ${evaporationParameters(evaporation.source)}`,
    `DRY_ONLY         ${pad(evaporation.dryOnly, 16)}`,
  ],
}

/**
 * @category Variants
 * @since 0.1.0
 */
export const TimeseriesTemperature = Schema.TaggedStruct("TIMESERIES", {
  timeseries: Schema.instanceOf(Timeseries),
}).annotations(Strict)

/**
 * Daily climate file. `start` (month/day/year) is where reading begins, the
 * beginning of the file when omitted.
 *
 * @category Variants
 * @since 0.1.0
 */
export const FileTemperature = Schema.TaggedStruct("FILE", {
  file: Schema.NonEmptyTrimmedString,
  start: Schema.optionalWith(Schema.String.pipe(Schema.pattern(/^\d{1,2}\/\d{1,2}\/\d{4}$/)), { exact: true }),
  units: Schema.optionalWith(TemperatureUnits, { exact: true, default: () => "C10" as const }),
}).annotations(Strict)

/**
 * @category Variants
 * @since 0.1.0
 */
export const TemperatureSource = Schema.Union(TimeseriesTemperature, FileTemperature)

/**
 * @category Variants
 * @since 0.1.0
 */
export type TemperatureSource = typeof TemperatureSource.Type

/**
 * @category Variants
 * @since 0.1.0
 */
export const MonthlyWindSpeed = Schema.TaggedStruct("MONTHLY", { speeds: MonthlyValues }).annotations(Strict)

/**
 * Wind speeds read from the climate file named by a FILE temperature source.
 *
 * @category Variants
 * @since 0.1.0
 */
export const FileWindSpeed = Schema.TaggedStruct("FILE", {}).annotations(Strict)

/**
 * @category Variants
 * @since 0.1.0
 */
export const WindSpeed = Schema.Union(MonthlyWindSpeed, FileWindSpeed)

/**
 * @category Variants
 * @since 0.1.0
 */
export type WindSpeed = typeof WindSpeed.Type

/**
 * Snowmelt parameters of the study area.
 *
 * @category Models
 * @since 0.1.0
 */
export const Snowmelt = Schema.Struct({
  /** Air temperature at which precipitation falls as snow. */
  dividingTemperature: Schema.Number,
  atiWeight: Schema.optionalWith(Schema.Number.pipe(Schema.between(0, 1)), { exact: true, default: () => 0.5 }),
  negativeMeltRatio: Schema.optionalWith(Schema.Number.pipe(Schema.between(0, 1)), { exact: true, default: () => 0.6 }),
  elevation: Schema.optionalWith(Schema.Number, { exact: true, default: () => 0 }),
  latitude: Schema.optionalWith(Schema.Number.pipe(Schema.between(-90, 90)), { exact: true, default: () => 50 }),
  /** Minutes between true solar time and standard clock time. */
  longitudeCorrection: Schema.optionalWith(Schema.Number, { exact: true, default: () => 0 }),
})

/**
 * @category Models
 * @since 0.1.0
 */
export type Snowmelt = typeof Snowmelt.Type

const DepletionCurve = Schema.Array(Schema.Number.pipe(Schema.between(0, 1))).pipe(Schema.itemsCount(10))

const noDepletion = (): ReadonlyArray<number> => Array.from({ length: 10 }, () => 1)

/**
 * Air temperatures, wind speeds and snowmelt parameters of the study area.
 * Areal depletion curves give the snow-covered fraction at depth ratios 0,
 * 0.1, ... 0.9 and default to no depletion.
 *
 * @category Models
 * @since 0.1.0
 */
export class Temperature extends Schema.Class<Temperature>("Temperature")(
  Schema.Struct({
    source: Schema.optionalWith(TemperatureSource, { exact: true }),
    windSpeed: Schema.optionalWith(WindSpeed, { exact: true }),
    snowmelt: Schema.optionalWith(Snowmelt, { exact: true }),
    adcImpervious: Schema.optionalWith(DepletionCurve, { exact: true, default: noDepletion }),
    adcPervious: Schema.optionalWith(DepletionCurve, { exact: true, default: noDepletion }),
  }).pipe(
    Schema.filter((temperature) =>
      temperature.windSpeed?._tag === "FILE" && temperature.source?._tag !== "FILE"
        ? "wind speeds read from FILE require a FILE temperature source"
        : undefined
    ),
  ),
) {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeTemperature = makeEntity("Temperature", Temperature)

const element = (key: string, value: string): string => `${pad(key, 18)} ${value}`

const temperatureSource = (source: TemperatureSource): string => {
  switch (source._tag) {
    case "TIMESERIES":
      return element("TIMESERIES", source.timeseries.name)
    case "FILE":
      return element("FILE", `${quoted(source.file)} ${source.start ?? "*"} ${source.units}`)
  }
}

/**
 * `[TEMPERATURE]`: one line per data element supplied.
 *
 * @category Sections
 * @since 0.1.0
 */
export const TemperatureSection: Section<Temperature> = {
  name: "TEMPERATURE",
  comments: [";;Data Element     Values"],
  render: ({ adcImpervious, adcPervious, snowmelt, source, windSpeed }) => [
    ...(source === undefined ? [] : [temperatureSource(source)]),
    ...(windSpeed === undefined
      ? []
      : [element("WINDSPEED", windSpeed._tag === "FILE" ? "FILE" : `MONTHLY    ${valueRow(windSpeed.speeds)}`)]),
    ...(snowmelt === undefined ? [] : [
      element(
        "SNOWMELT",
        valueRow([
          snowmelt.dividingTemperature,
          snowmelt.atiWeight,
          snowmelt.negativeMeltRatio,
          snowmelt.elevation,
          snowmelt.latitude,
          snowmelt.longitudeCorrection,
        ]),
      ),
      element("ADC IMPERVIOUS", valueRow(adcImpervious)),
      element("ADC PERVIOUS", valueRow(adcPervious)),
    ]),
  ],
}

/**
 * Monthly climate adjustments. Not supported yet: construction always fails.
 *
 * @category Models
 * @since 0.1.0
 */
export class Adjustments extends Unsupported<Record<string, never>>("Adjustments") {}
