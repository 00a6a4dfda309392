import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import {
  Adjustments,
  ConstantEvaporation,
  Evaporation,
  EvaporationSection,
  FileRain,
  FileTemperature,
  FileWindSpeed,
  makeEvaporation,
  makeRaingage,
  makeTemperature,
  MonthlyEvaporation,
  MonthlyWindSpeed,
  Raingage,
  RaingageSection,
  Snowmelt,
  Temperature,
  TemperatureEvaporation,
  TemperatureSection,
  TimeseriesEvaporation,
} from "../src/Meteo.js"
import { renderSection } from "../src/Section.js"
import { makeCatchment } from "./fixtures.js"

const monthly = [0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1, 1.1, 1.2]

describe("Raingage", () => {
  it("writes gages fed by time series", () => {
    const { rg1, rg2 } = makeCatchment()

    expect(renderSection(RaingageSection, [rg1, rg2])).toBe(
      "[RAINGAGES]\n" +
        ";;Name           Format    Interval  SCF    Source    \n" +
        ";;-------------- --------- --------- ------ ----------\n" +
        "rg1              INTENSITY 1:00      1.00   TIMESERIES timeseries1 \n" +
        "rg2              VOLUME    0.25      0.50   TIMESERIES timeseries2 \n",
    )
  })

  it("writes gages fed by files, quoting file names with spaces", () => {
    const gage = new Raingage({
      name: "rg3",
      form: "CUMULATIVE",
      interval: "0:15",
      source: FileRain.make({ file: "rain data.dat", station: "STA1", units: "MM" }),
    })

    expect(RaingageSection.render(gage)).toEqual([
      "rg3              CUMULATIVE 0:15      1.00   FILE \"rain data.dat\" STA1       MM        ",
    ])
  })

  it.effect("rejects a source carrying fields of another source", () =>
    Effect.gen(function* () {
      const { timeseries1 } = makeCatchment()
      const source = { _tag: "TIMESERIES" as const, timeseries: timeseries1, file: "rain.dat" }
      const error = yield* Effect.flip(makeRaingage({ name: "rg1", form: "INTENSITY", interval: "1:00", source }))

      expect(error._tag).toBe("InvalidEntityError")
      expect(error.kind).toBe("Raingage")
      expect(error.entity).toBe("rg1")
    }),
  )

  it.effect("rejects malformed intervals", () =>
    Effect.gen(function* () {
      const { timeseries1 } = makeCatchment()
      const error = yield* Effect.flip(
        makeRaingage({
          name: "rg1",
          form: "INTENSITY",
          interval: "1h",
          source: { _tag: "TIMESERIES", timeseries: timeseries1 },
        }),
      )

      expect(error.rule).toContain("interval must be hours:minutes")
    }),
  )
})

describe("Evaporation", () => {
  it("writes a constant rate and the dry only flag", () => {
    const evaporation = new Evaporation({ source: ConstantEvaporation.make({ rate: 0.2 }) })

    expect(renderSection(EvaporationSection, [evaporation])).toBe(
      "[EVAPORATION]\n" +
        ";;Data Source    Parameters\n" +
        ";;-------------- ----------------\n" +
        "CONSTANT         0.2\n" +
        "DRY_ONLY         NO              \n",
    )
  })

  it("writes twelve monthly rates", () => {
    const evaporation = new Evaporation({ source: MonthlyEvaporation.make({ rates: monthly }), dryOnly: "YES" })

    expect(EvaporationSection.render(evaporation)).toEqual([
      "MONTHLY          0.100     0.200     0.300     0.400     0.500     0.600     0.700     0.800     0.900     1.000     1.100     1.200     ",
      "DRY_ONLY         YES             ",
    ])
  })

  it("writes the time series name or nothing for temperature based rates", () => {
    const { timeseries1 } = makeCatchment()
    const fromSeries = new Evaporation({ source: TimeseriesEvaporation.make({ timeseries: timeseries1 }) })
    const fromTemperature = new Evaporation({ source: TemperatureEvaporation.make({}) })

    expect(EvaporationSection.render(fromSeries)[0]).toBe("TIMESERIES       timeseries1")
    expect(EvaporationSection.render(fromTemperature)[0]).toBe("TEMPERATURE      ")
  })

  it.effect("requires exactly twelve monthly rates", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(makeEvaporation({ source: { _tag: "MONTHLY", rates: [0.1, 0.2] } }))

      expect(error.kind).toBe("Evaporation")
      expect(error.entity).toBeUndefined()
    }),
  )
})

describe("Temperature", () => {
  it("writes the climate file, wind speeds and snowmelt parameters", () => {
    const temperature = new Temperature({
      source: FileTemperature.make({ file: "climate.dat" }),
      windSpeed: FileWindSpeed.make({}),
      snowmelt: Snowmelt.make({ dividingTemperature: 34 }),
    })
    const ones = "1.000     ".repeat(10)

    expect(renderSection(TemperatureSection, [temperature])).toBe(
      "[TEMPERATURE]\n" +
        ";;Data Element     Values\n" +
        "FILE               climate.dat * C10\n" +
        "WINDSPEED          FILE\n" +
        "SNOWMELT           34.000    0.500     0.600     0.000     50.000    0.000     \n" +
        `ADC IMPERVIOUS     ${ones}\n` +
        `ADC PERVIOUS       ${ones}\n`,
    )
  })

  it("writes monthly wind speeds", () => {
    const temperature = new Temperature({
      windSpeed: MonthlyWindSpeed.make({ speeds: [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11] }),
    })

    expect(TemperatureSection.render(temperature)).toEqual([
      "WINDSPEED          MONTHLY    0.000     1.000     2.000     3.000     4.000     5.000     6.000     7.000     8.000     9.000     10.000    11.000    ",
    ])
  })

  it("writes the start date of the climate file", () => {
    const temperature = new Temperature({
      source: FileTemperature.make({ file: "climate.dat", start: "6/1/2020", units: "F" }),
    })

    expect(TemperatureSection.render(temperature)).toEqual(["FILE               climate.dat 6/1/2020 F"])
  })

  it.effect("reads wind speeds from file only with a climate file", () =>
    Effect.gen(function* () {
      const { timeseries1 } = makeCatchment()
      const error = yield* Effect.flip(
        makeTemperature({ source: { _tag: "TIMESERIES", timeseries: timeseries1 }, windSpeed: { _tag: "FILE" } }),
      )

      expect(error.rule).toBe("wind speeds read from FILE require a FILE temperature source")
    }),
  )

  it("does not support climate adjustments", () => {
    expect(() => new Adjustments({})).toThrow("Adjustments is not supported")
  })
})
