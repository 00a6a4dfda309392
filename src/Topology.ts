/**
 * Topology primitives shared by every network entity.
 *
 * A `Node` is a named point with an invert elevation, a `Link` a directed edge
 * between two nodes and an `Area` a named region that produces runoff. Concrete
 * entities opt into a family by exposing the family's type id, which lets the
 * schemas below check "is this a node?" at construction time without the
 * entity modules importing one another.
 *
 * @since 0.1.0
 */

import { Predicate, Schema } from "effect"

/**
 * @category Type IDs
 * @since 0.1.0
 */
export const NodeTypeId: unique symbol = Symbol.for("effect-stormwater-inp/Node")

/**
 * @category Type IDs
 * @since 0.1.0
 */
export type NodeTypeId = typeof NodeTypeId

/**
 * @category Type IDs
 * @since 0.1.0
 */
export const LinkTypeId: unique symbol = Symbol.for("effect-stormwater-inp/Link")

/**
 * @category Type IDs
 * @since 0.1.0
 */
export type LinkTypeId = typeof LinkTypeId

/**
 * @category Type IDs
 * @since 0.1.0
 */
export const AreaTypeId: unique symbol = Symbol.for("effect-stormwater-inp/Area")

/**
 * @category Type IDs
 * @since 0.1.0
 */
export type AreaTypeId = typeof AreaTypeId

/**
 * Anything written to the input file under its name.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Named {
  readonly name: string
}

/**
 * A point of the drainage graph (junction, outfall, divider, storage).
 *
 * @category Models
 * @since 0.1.0
 */
export interface Node extends Named {
  readonly [NodeTypeId]: NodeTypeId
  readonly elevation: number
}

/**
 * A directed connection between two nodes (conduit, pump, weir, outlet).
 *
 * @category Models
 * @since 0.1.0
 */
export interface Link extends Named {
  readonly [LinkTypeId]: LinkTypeId
  readonly fromNode: Node
  readonly toNode: Node
}

/**
 * A land region contributing runoff (subcatchment).
 *
 * @category Models
 * @since 0.1.0
 */
export interface Area extends Named {
  readonly [AreaTypeId]: AreaTypeId
}

/**
 * @category Guards
 * @since 0.1.0
 */
export const isNode = (u: unknown): u is Node => Predicate.hasProperty(u, NodeTypeId)

/**
 * @category Guards
 * @since 0.1.0
 */
export const isLink = (u: unknown): u is Link => Predicate.hasProperty(u, LinkTypeId)

/**
 * @category Guards
 * @since 0.1.0
 */
export const isArea = (u: unknown): u is Area => Predicate.hasProperty(u, AreaTypeId)

/**
 * Reference to any node kind.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const Node: Schema.Schema<Node> = Schema.declare(isNode, {
  identifier: "Node",
  description: "a node such as a Junction or an Outfall",
})

/**
 * Reference to any link kind.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const Link: Schema.Schema<Link> = Schema.declare(isLink, {
  identifier: "Link",
  description: "a link such as a Conduit",
})

/**
 * Reference to any area kind.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const Area: Schema.Schema<Area> = Schema.declare(isArea, {
  identifier: "Area",
  description: "an area such as a Subcatchment",
})

/**
 * Entity name as written in the first column of a section.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const EntityName = Schema.NonEmptyTrimmedString.pipe(
  Schema.pattern(/^\S+$/, { message: () => "name must not contain whitespace" }),
)
