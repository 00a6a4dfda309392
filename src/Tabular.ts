/**
 * Tabular relationships: time series, curves and patterns.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import { makeEntity } from "./internal/construct.js"
import { fixed, pad, wrap } from "./internal/format.js"
import { columnComments, type Section } from "./Section.js"
import { EntityName } from "./Topology.js"
import { Unsupported } from "./Unsupported.js"

/**
 * Curve relating two quantities (storage, rating, tidal, pump, shape...).
 * Not supported yet: construction always fails.
 *
 * @category Models
 * @since 0.1.0
 */
export class Curve extends Unsupported<{ readonly name: string }>("Curve") {
  declare readonly name: string
}

/**
 * Time pattern of multipliers. Not supported yet: construction always fails.
 *
 * @category Models
 * @since 0.1.0
 */
export class Pattern extends Unsupported<{ readonly name: string }>("Pattern") {
  declare readonly name: string
}

/**
 * Describes how a quantity varies over time: `times` are hours since the start
 * of the simulation and `values` the matching readings. `date` (month/day/year)
 * is written on the first data line only.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const rain = new Timeseries({
 *   name: "rain",
 *   times: [0, 1, 2],
 *   values: [0, 0.5, 0.1],
 *   date: "1/1/2022",
 *   description: "Design storm"
 * })
 * ```
 */
export class Timeseries extends Schema.Class<Timeseries>("Timeseries")(
  Schema.Struct({
    name: EntityName,
    times: Schema.Array(Schema.Number.pipe(Schema.finite())),
    values: Schema.Array(Schema.Number.pipe(Schema.finite())),
    date: Schema.optionalWith(Schema.String, { exact: true, default: () => "" }),
    description: Schema.optionalWith(Schema.String, { exact: true, default: () => "" }),
  }).pipe(
    Schema.filter((series) =>
      series.times.length === series.values.length ? undefined : "times and values must be the same length"
    ),
  ),
) {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeTimeseries = makeEntity("Timeseries", Timeseries)

const DESCRIPTION_WIDTH = 48

const describe = (description: string): ReadonlyArray<string> => {
  const chunks = wrap(description, DESCRIPTION_WIDTH)
  return chunks.length === 0
    ? [";".padEnd(DESCRIPTION_WIDTH + 1)]
    : chunks.map((chunk) => `; ${pad(chunk, DESCRIPTION_WIDTH - 1)}`)
}

/**
 * `[TIMESERIES]`: a wrapped description comment (or a blank comment line) per
 * series, then one line per reading.
 *
 * @category Sections
 * @since 0.1.0
 */
export const TimeseriesSection: Section<Timeseries> = {
  name: "TIMESERIES",
  comments: columnComments([
    { label: "Name", width: 16 },
    { label: "Date", width: 10 },
    { label: "Time", width: 10 },
    { label: "Value", width: 10 },
  ]),
  render: (series) => [
    ...describe(series.description),
    ...series.times.map((time, index) =>
      [
        pad(series.name, 16),
        pad(index === 0 ? series.date : "", 10),
        fixed(time, 10, 2),
        fixed(series.values[index] ?? 0, 10, 3),
      ].join(" ")
    ),
  ],
}

