/**
 * Standard geometric cross-section shapes.
 *
 * Each shape carries only the dimensions it uses; `geometry` lays them out in
 * the four geometry columns of a cross-section line, unused ones as 0. Shapes
 * that refer to another record (CUSTOM, IRREGULAR, STREET) live with the
 * cross-section itself in `Geometry`.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

const Strict = { parseOptions: { onExcessProperty: "error" } } as const

const Length = Schema.Number.pipe(Schema.positive())

const NonNegative = Schema.Number.pipe(Schema.nonNegative())

/**
 * @category Shapes
 * @since 0.1.0
 */
export const Circular = Schema.TaggedStruct("CIRCULAR", { diameter: Length }).annotations(Strict)

/**
 * Circular force main; `roughness` is the Hazen-Williams C or Darcy-Weisbach
 * roughness height, depending on the FORCE_MAIN_EQUATION option.
 *
 * @category Shapes
 * @since 0.1.0
 */
export const ForceMain = Schema.TaggedStruct("FORCE_MAIN", {
  diameter: Length,
  roughness: Length,
}).annotations(Strict)

/**
 * Circular pipe partly filled with sediment.
 *
 * @category Shapes
 * @since 0.1.0
 */
export const FilledCircular = Schema.TaggedStruct("FILLED_CIRCULAR", {
  diameter: Length,
  sedimentDepth: NonNegative,
}).annotations(Strict).pipe(
  Schema.filter((shape) => shape.sedimentDepth < shape.diameter ? undefined : "sediment depth must be below the diameter"),
)

/**
 * @category Shapes
 * @since 0.1.0
 */
export const RectClosed = Schema.TaggedStruct("RECT_CLOSED", { height: Length, width: Length }).annotations(Strict)

/**
 * @category Shapes
 * @since 0.1.0
 */
export const RectOpen = Schema.TaggedStruct("RECT_OPEN", { height: Length, width: Length }).annotations(Strict)

/**
 * Trapezoid with side slopes given as horizontal run per unit rise.
 *
 * @category Shapes
 * @since 0.1.0
 */
export const Trapezoidal = Schema.TaggedStruct("TRAPEZOIDAL", {
  height: Length,
  baseWidth: NonNegative,
  leftSlope: NonNegative,
  rightSlope: NonNegative,
}).annotations(Strict)

/**
 * @category Shapes
 * @since 0.1.0
 */
export const Triangular = Schema.TaggedStruct("TRIANGULAR", { height: Length, topWidth: Length }).annotations(Strict)

/**
 * @category Shapes
 * @since 0.1.0
 */
export const HorizontalEllipse = Schema.TaggedStruct("HORIZ_ELLIPSE", { height: Length, width: Length }).annotations(
  Strict,
)

/**
 * @category Shapes
 * @since 0.1.0
 */
export const VerticalEllipse = Schema.TaggedStruct("VERT_ELLIPSE", { height: Length, width: Length }).annotations(
  Strict,
)

/**
 * @category Shapes
 * @since 0.1.0
 */
export const Arch = Schema.TaggedStruct("ARCH", { height: Length, width: Length }).annotations(Strict)

/**
 * @category Shapes
 * @since 0.1.0
 */
export const Parabolic = Schema.TaggedStruct("PARABOLIC", { height: Length, topWidth: Length }).annotations(Strict)

/**
 * Power function section whose width grows with `depth ^ (1 / exponent)`.
 *
 * @category Shapes
 * @since 0.1.0
 */
export const Power = Schema.TaggedStruct("POWER", {
  height: Length,
  topWidth: Length,
  exponent: Length,
}).annotations(Strict)

/**
 * @category Shapes
 * @since 0.1.0
 */
export const RectTriangular = Schema.TaggedStruct("RECT_TRIANGULAR", {
  height: Length,
  topWidth: Length,
  triangleHeight: Length,
}).annotations(Strict)

/**
 * @category Shapes
 * @since 0.1.0
 */
export const RectRound = Schema.TaggedStruct("RECT_ROUND", {
  height: Length,
  topWidth: Length,
  bottomRadius: Length,
}).annotations(Strict)

/**
 * @category Shapes
 * @since 0.1.0
 */
export const ModifiedBasketHandle = Schema.TaggedStruct("MODBASKETHANDLE", {
  height: Length,
  bottomWidth: Length,
  topRadius: Length,
}).annotations(Strict)

const fullHeight = <Tag extends string>(tag: Tag) => Schema.TaggedStruct(tag, { height: Length }).annotations(Strict)

/**
 * @category Shapes
 * @since 0.1.0
 */
export const Egg = fullHeight("EGG")

/**
 * @category Shapes
 * @since 0.1.0
 */
export const Horseshoe = fullHeight("HORSESHOE")

/**
 * @category Shapes
 * @since 0.1.0
 */
export const Gothic = fullHeight("GOTHIC")

/**
 * @category Shapes
 * @since 0.1.0
 */
export const Catenary = fullHeight("CATENARY")

/**
 * @category Shapes
 * @since 0.1.0
 */
export const SemiElliptical = fullHeight("SEMIELLIPTICAL")

/**
 * @category Shapes
 * @since 0.1.0
 */
export const BasketHandle = fullHeight("BASKETHANDLE")

/**
 * @category Shapes
 * @since 0.1.0
 */
export const SemiCircular = fullHeight("SEMICIRCULAR")

/**
 * Placeholder section of a link with no physical geometry.
 *
 * @category Shapes
 * @since 0.1.0
 */
export const Dummy = Schema.TaggedStruct("DUMMY", {}).annotations(Strict)

/**
 * Every shape described by its own dimensions.
 *
 * @category Shapes
 * @since 0.1.0
 */
export const GeometricShape = Schema.Union(
  Circular,
  ForceMain,
  FilledCircular,
  RectClosed,
  RectOpen,
  Trapezoidal,
  Triangular,
  HorizontalEllipse,
  VerticalEllipse,
  Arch,
  Parabolic,
  Power,
  RectTriangular,
  RectRound,
  ModifiedBasketHandle,
  Egg,
  Horseshoe,
  Gothic,
  Catenary,
  SemiElliptical,
  BasketHandle,
  SemiCircular,
  Dummy,
)

/**
 * @category Shapes
 * @since 0.1.0
 */
export type GeometricShape = typeof GeometricShape.Type

/**
 * The four geometry columns of `shape`.
 *
 * @category Utils
 * @since 0.1.0
 * @example
 * ```ts
 * geometry(Trapezoidal.make({ height: 2, baseWidth: 4, leftSlope: 1, rightSlope: 1.5 }))
 * // [2, 4, 1, 1.5]
 * ```
 */
export const geometry = (shape: GeometricShape): readonly [number, number, number, number] => {
  switch (shape._tag) {
    case "CIRCULAR":
      return [shape.diameter, 0, 0, 0]
    case "FORCE_MAIN":
      return [shape.diameter, shape.roughness, 0, 0]
    case "FILLED_CIRCULAR":
      return [shape.diameter, shape.sedimentDepth, 0, 0]
    case "RECT_CLOSED":
    case "RECT_OPEN":
    case "HORIZ_ELLIPSE":
    case "VERT_ELLIPSE":
    case "ARCH":
      return [shape.height, shape.width, 0, 0]
    case "TRAPEZOIDAL":
      return [shape.height, shape.baseWidth, shape.leftSlope, shape.rightSlope]
    case "TRIANGULAR":
    case "PARABOLIC":
      return [shape.height, shape.topWidth, 0, 0]
    case "POWER":
      return [shape.height, shape.topWidth, shape.exponent, 0]
    case "RECT_TRIANGULAR":
      return [shape.height, shape.topWidth, shape.triangleHeight, 0]
    case "RECT_ROUND":
      return [shape.height, shape.topWidth, shape.bottomRadius, 0]
    case "MODBASKETHANDLE":
      return [shape.height, shape.bottomWidth, shape.topRadius, 0]
    case "EGG":
    case "HORSESHOE":
    case "GOTHIC":
    case "CATENARY":
    case "SEMIELLIPTICAL":
    case "BASKETHANDLE":
    case "SEMICIRCULAR":
      return [shape.height, 0, 0, 0]
    case "DUMMY":
      return [0, 0, 0, 0]
  }
}
