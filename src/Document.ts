/**
 * Document assembler.
 *
 * An `InpDocument` is the title, the options and every optional collection of
 * one model run. `assembleInp` writes the sections in the canonical order of
 * the input format, skipping absent and empty collections, and follows every
 * written section with one blank line.
 *
 * @since 0.1.0
 */

import { Effect, Option } from "effect"
import type { Infiltration, Subarea, Subcatchment } from "./Catchment.js"
import { InfiltrationSection, SubareaSection, SubcatchmentSection } from "./Catchment.js"
import { DocumentIntegrityError } from "./Errors.js"
import type { Inlet, InletUsage, Street, Transect, XSection } from "./Geometry.js"
import { InletSection, InletUsageSection, StreetSection, TransectSection, XSectionSection } from "./Geometry.js"
import type { Coordinate, LinkVertex, MapExtent, PolygonVertex, SymbolPoint } from "./Gui.js"
import { CoordinateSection, MapSection, PolygonSection, SymbolSection, VertexSection } from "./Gui.js"
import type { Options, Report, Title } from "./Header.js"
import { OptionsSection, ReportSection, TitleSection } from "./Header.js"
import type { Conduit, Outlet, Pump, Weir } from "./Links.js"
import { ConduitSection, OutletSection, PumpSection, WeirSection } from "./Links.js"
import type { Evaporation, Raingage, Temperature } from "./Meteo.js"
import { EvaporationSection, RaingageSection, TemperatureSection } from "./Meteo.js"
import type { Junction, Outfall } from "./Nodes.js"
import { JunctionSection, OutfallSection } from "./Nodes.js"
import { type Section, writeSection } from "./Section.js"
import { captureOutput, InpSink } from "./Sink.js"
import type { Timeseries } from "./Tabular.js"
import { TimeseriesSection } from "./Tabular.js"
import type { Named } from "./Topology.js"

/**
 * Everything written to one input file. Collections keep the order the caller
 * gives them.
 *
 * @category Models
 * @since 0.1.0
 */
export interface InpDocument {
  readonly title: Title
  readonly options: Options
  readonly evaporation?: Evaporation | undefined
  readonly temperature?: Temperature | undefined
  readonly raingages?: ReadonlyArray<Raingage> | undefined
  readonly subcatchments?: ReadonlyArray<Subcatchment> | undefined
  readonly subareas?: ReadonlyArray<Subarea> | undefined
  readonly infiltration?: ReadonlyArray<Infiltration> | undefined
  readonly junctions?: ReadonlyArray<Junction> | undefined
  readonly outfalls?: ReadonlyArray<Outfall> | undefined
  readonly conduits?: ReadonlyArray<Conduit> | undefined
  readonly pumps?: ReadonlyArray<Pump> | undefined
  readonly weirs?: ReadonlyArray<Weir> | undefined
  readonly outlets?: ReadonlyArray<Outlet> | undefined
  readonly xsections?: ReadonlyArray<XSection> | undefined
  readonly transects?: ReadonlyArray<Transect> | undefined
  readonly timeseries?: ReadonlyArray<Timeseries> | undefined
  readonly streets?: ReadonlyArray<Street> | undefined
  readonly inlets?: ReadonlyArray<Inlet> | undefined
  readonly inletUsages?: ReadonlyArray<InletUsage> | undefined
  readonly map?: MapExtent | undefined
  readonly coordinates?: ReadonlyArray<Coordinate> | undefined
  readonly vertices?: ReadonlyArray<LinkVertex> | undefined
  readonly polygons?: ReadonlyArray<PolygonVertex> | undefined
  readonly symbols?: ReadonlyArray<SymbolPoint> | undefined
  readonly report?: Report | undefined
}

interface PlannedSection {
  readonly name: string
  readonly write: Option.Option<Effect.Effect<void, never, InpSink>>
}

const many = <A>(section: Section<A>, entries: ReadonlyArray<A> | undefined): PlannedSection => ({
  name: section.name,
  write: entries === undefined || entries.length === 0 ? Option.none() : Option.some(writeSection(section, entries)),
})

const one = <A>(section: Section<A>, entry: A | undefined): PlannedSection =>
  many(section, entry === undefined ? undefined : [entry])

const plan = (document: InpDocument): ReadonlyArray<PlannedSection> => [
  one(TitleSection, document.title),
  one(OptionsSection, document.options),
  one(EvaporationSection, document.evaporation),
  one(TemperatureSection, document.temperature),
  many(RaingageSection, document.raingages),
  many(SubcatchmentSection, document.subcatchments),
  many(SubareaSection, document.subareas),
  many(InfiltrationSection, document.infiltration),
  many(JunctionSection, document.junctions),
  many(OutfallSection, document.outfalls),
  many(ConduitSection, document.conduits),
  many(PumpSection, document.pumps),
  many(WeirSection, document.weirs),
  many(OutletSection, document.outlets),
  many(XSectionSection, document.xsections),
  many(TransectSection, document.transects),
  many(TimeseriesSection, document.timeseries),
  many(StreetSection, document.streets),
  many(InletSection, document.inlets),
  many(InletUsageSection, document.inletUsages),
  one(MapSection, document.map),
  many(CoordinateSection, document.coordinates),
  many(VertexSection, document.vertices),
  many(PolygonSection, document.polygons),
  many(SymbolSection, document.symbols),
  one(ReportSection, document.report),
]

/**
 * Writes `document` to the provided `InpSink`.
 *
 * @category Serialization
 * @since 0.1.0
 * @example
 * ```ts
 * import * as fs from "node:fs"
 *
 * const program = assembleInp({ title: new Title(), options: new Options(), junctions: [j1] }).pipe(
 *   Effect.provide(InpSink.fromWriter(fs.createWriteStream("model.inp")))
 * )
 * ```
 */
export const assembleInp = (document: InpDocument): Effect.Effect<void, never, InpSink> =>
  Effect.gen(function* () {
    const sink = yield* InpSink
    const written: Array<string> = []
    for (const section of plan(document)) {
      if (Option.isNone(section.write)) {
        yield* Effect.logDebug(`skipping section [${section.name}]`)
        continue
      }
      yield* section.write.value
      yield* sink.write("\n")
      written.push(section.name)
    }
    yield* Effect.logInfo("input file assembled").pipe(Effect.annotateLogs({ sections: written.join(",") }))
  }).pipe(Effect.withLogSpan("assembleInp"))

/**
 * Assembles `document` into a string.
 *
 * @category Serialization
 * @since 0.1.0
 */
export const renderInp = (document: InpDocument): Effect.Effect<string> => captureOutput(assembleInp(document))

const duplicates = (namespace: string, entries: ReadonlyArray<Named>): ReadonlyArray<string> => {
  const seen = new Set<string>()
  const repeated = new Set<string>()
  for (const entry of entries) {
    if (seen.has(entry.name)) {
      repeated.add(entry.name)
    }
    seen.add(entry.name)
  }
  return [...repeated].map((name) => `duplicate ${namespace} name "${name}"`)
}

const namesOf = (...groups: ReadonlyArray<ReadonlyArray<Named>>): ReadonlySet<string> =>
  new Set(groups.flatMap((group) => group.map((entry) => entry.name)))

/**
 * Checks a document for duplicate names within each namespace and for
 * references to entities the document does not contain. The assembler never
 * runs this check; call it before assembling when the document is built from
 * untrusted parts.
 *
 * @category Validation
 * @since 0.1.0
 */
export const verifyDocument = (document: InpDocument): Effect.Effect<InpDocument, DocumentIntegrityError> =>
  Effect.suspend((): Effect.Effect<InpDocument, DocumentIntegrityError> => {
    const raingages = document.raingages ?? []
    const subcatchments = document.subcatchments ?? []
    const nodes = [...(document.junctions ?? []), ...(document.outfalls ?? [])]
    const links = [
      ...(document.conduits ?? []),
      ...(document.pumps ?? []),
      ...(document.weirs ?? []),
      ...(document.outlets ?? []),
    ]
    const timeseries = document.timeseries ?? []
    const transects = document.transects ?? []
    const streets = document.streets ?? []
    const inlets = document.inlets ?? []

    const known = {
      node: namesOf(nodes),
      link: namesOf(links),
      subcatchment: namesOf(subcatchments),
      raingage: namesOf(raingages),
      timeseries: namesOf(timeseries),
      transect: namesOf(transects),
      street: namesOf(streets),
      inlet: namesOf(inlets),
    }
    const outletNames = namesOf(nodes, subcatchments)

    const problems: Array<string> = [
      ...duplicates("node", nodes),
      ...duplicates("link", links),
      ...duplicates("subcatchment", subcatchments),
      ...duplicates("raingage", raingages),
      ...duplicates("timeseries", timeseries),
      ...duplicates("transect", transects),
      ...duplicates("street", streets),
      ...duplicates("inlet", inlets),
    ]
    const expect = (owner: string, kind: keyof typeof known, name: string) => {
      if (!known[kind].has(name)) {
        problems.push(`${owner} refers to missing ${kind} "${name}"`)
      }
    }

    for (const gage of raingages) {
      if (gage.source._tag === "TIMESERIES") {
        expect(`raingage "${gage.name}"`, "timeseries", gage.source.timeseries.name)
      }
    }
    const evaporation = document.evaporation?.source
    if (evaporation?._tag === "TIMESERIES") {
      expect("evaporation", "timeseries", evaporation.timeseries.name)
    }
    const temperature = document.temperature?.source
    if (temperature?._tag === "TIMESERIES") {
      expect("temperature", "timeseries", temperature.timeseries.name)
    }
    for (const subcatchment of subcatchments) {
      expect(`subcatchment "${subcatchment.name}"`, "raingage", subcatchment.raingage.name)
      if (!outletNames.has(subcatchment.outlet.name)) {
        problems.push(`subcatchment "${subcatchment.name}" refers to missing outlet "${subcatchment.outlet.name}"`)
      }
    }
    for (const subarea of document.subareas ?? []) {
      expect("subarea", "subcatchment", subarea.subcatchment.name)
    }
    for (const infiltration of document.infiltration ?? []) {
      expect("infiltration", "subcatchment", infiltration.subcatchment.name)
    }
    for (const outfall of document.outfalls ?? []) {
      if (outfall.stage._tag === "TIMESERIES") {
        expect(`outfall "${outfall.name}"`, "timeseries", outfall.stage.timeseries.name)
      }
      if (outfall.routeTo !== undefined) {
        expect(`outfall "${outfall.name}"`, "subcatchment", outfall.routeTo.name)
      }
    }
    for (const link of links) {
      expect(`link "${link.name}"`, "node", link.fromNode.name)
      expect(`link "${link.name}"`, "node", link.toNode.name)
    }
    for (const xsection of document.xsections ?? []) {
      const owner = `xsection of "${xsection.link.name}"`
      expect(owner, "link", xsection.link.name)
      if (xsection.shape._tag === "IRREGULAR") {
        expect(owner, "transect", xsection.shape.transect.name)
      } else if (xsection.shape._tag === "STREET") {
        expect(owner, "street", xsection.shape.street.name)
      }
    }
    for (const usage of document.inletUsages ?? []) {
      expect("inlet usage", "link", usage.conduit.name)
      expect("inlet usage", "inlet", usage.inlet.name)
      expect("inlet usage", "node", usage.node.name)
    }
    for (const coordinate of document.coordinates ?? []) {
      expect("coordinate", "node", coordinate.node.name)
    }
    for (const vertex of document.vertices ?? []) {
      expect("vertex", "link", vertex.link.name)
    }
    for (const vertex of document.polygons ?? []) {
      expect("polygon", "subcatchment", vertex.subcatchment.name)
    }
    for (const symbol of document.symbols ?? []) {
      expect("symbol", "raingage", symbol.raingage.name)
    }

    return problems.length === 0
      ? Effect.succeed(document)
      : Effect.fail(new DocumentIntegrityError({ problems }))
  })
