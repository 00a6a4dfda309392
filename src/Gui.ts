/**
 * Map annotations: drawing extent and the coordinates of nodes, gages, link
 * vertices and subcatchment outlines.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import { Subcatchment } from "./Catchment.js"
import { makeEntity } from "./internal/construct.js"
import { fixed, pad, toFixedEven } from "./internal/format.js"
import { Raingage } from "./Meteo.js"
import { type Section, tabular } from "./Section.js"
import { Link, Node } from "./Topology.js"
import { MapUnits } from "./Vocabulary.js"

const Finite = Schema.Number.pipe(Schema.finite())

/**
 * An `[x, y]` map position.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const Point = Schema.Tuple(Finite, Finite)

/**
 * @category Schemas
 * @since 0.1.0
 */
export type Point = typeof Point.Type

/**
 * Drawing extent `[x1, y1, x2, y2]` from the lower-left to the upper-right
 * corner of the map.
 *
 * @category Models
 * @since 0.1.0
 */
export class MapExtent extends Schema.Class<MapExtent>("MapExtent")({
  dimensions: Schema.Tuple(Finite, Finite, Finite, Finite),
  units: Schema.optionalWith(MapUnits, { exact: true, default: () => "NONE" as const }),
}) {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeMapExtent = makeEntity("MapExtent", MapExtent)

/**
 * `[MAP]`, written without column comments.
 *
 * @category Sections
 * @since 0.1.0
 */
export const MapSection: Section<MapExtent> = {
  name: "MAP",
  comments: [],
  render: (map) => [
    `DIMENSIONS ${map.dimensions.map((dimension) => toFixedEven(dimension, 2)).join(" ")}`,
    `UNITS     ${map.units}`,
  ],
}

const pointSection = <A extends { readonly point: Point }>(
  name: string,
  label: string,
  owner: (entry: A) => string,
): Section<A> =>
  tabular(
    name,
    [
      { label, width: 16 },
      { label: "X-Coord", width: 18 },
      { label: "Y-Coord", width: 18 },
    ],
    (entry) => [pad(owner(entry), 16), fixed(entry.point[0], 18, 3), fixed(entry.point[1], 18, 3)].join(" "),
  )

/**
 * Map position of a node.
 *
 * @category Models
 * @since 0.1.0
 */
export class Coordinate extends Schema.Class<Coordinate>("Coordinate")({
  node: Node,
  point: Point,
}) {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeCoordinate = makeEntity("Coordinate", Coordinate)

/**
 * `[COORDINATES]`.
 *
 * @category Sections
 * @since 0.1.0
 */
export const CoordinateSection: Section<Coordinate> = pointSection(
  "COORDINATES",
  "Node",
  (coordinate) => coordinate.node.name,
)

/**
 * Map position of a rain gage symbol.
 *
 * @category Models
 * @since 0.1.0
 */
export class SymbolPoint extends Schema.Class<SymbolPoint>("SymbolPoint")({
  raingage: Schema.instanceOf(Raingage),
  point: Point,
}) {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeSymbolPoint = makeEntity("SymbolPoint", SymbolPoint)

/**
 * `[SYMBOLS]`.
 *
 * @category Sections
 * @since 0.1.0
 */
export const SymbolSection: Section<SymbolPoint> = pointSection("SYMBOLS", "Rain Gage", (symbol) => symbol.raingage.name)

/**
 * Interior vertex of a link, listed from the inlet node to the outlet node.
 * Straight links have none.
 *
 * @category Models
 * @since 0.1.0
 */
export class LinkVertex extends Schema.Class<LinkVertex>("LinkVertex")({
  link: Link,
  point: Point,
}) {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeLinkVertex = makeEntity("LinkVertex", LinkVertex)

/**
 * `[VERTICES]`.
 *
 * @category Sections
 * @since 0.1.0
 */
export const VertexSection: Section<LinkVertex> = pointSection("VERTICES", "Link", (vertex) => vertex.link.name)

/**
 * Vertex of a subcatchment outline, listed in a consistent clockwise or
 * counter-clockwise order.
 *
 * @category Models
 * @since 0.1.0
 */
export class PolygonVertex extends Schema.Class<PolygonVertex>("PolygonVertex")({
  subcatchment: Schema.instanceOf(Subcatchment),
  point: Point,
}) {}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makePolygonVertex = makeEntity("PolygonVertex", PolygonVertex)

/**
 * `[POLYGONS]`.
 *
 * @category Sections
 * @since 0.1.0
 */
export const PolygonSection: Section<PolygonVertex> = pointSection(
  "POLYGONS",
  "Subcatchment",
  (vertex) => vertex.subcatchment.name,
)
