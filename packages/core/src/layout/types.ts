/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Defines the geometric types and child capabilities shared by the
 * measure and arrange passes. Coordinates are host units (float64);
 * `Infinity` marks an unconstrained axis.
 */

/** Rectangle with position (x,y) and dimensions (w,h). */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Size dimensions (width and height). */
export type Size = Readonly<{ w: number; h: number }>;

/** Host visibility state. Only "visible" children take part in cell sizing. */
export type Visibility = "visible" | "hidden" | "collapsed";

/** A child that can report its preferred size. */
export interface Sizable {
  measureNatural(maxW: number, maxH: number): Size;
}

/** A child that accepts its final rectangle. */
export interface Placeable {
  placeAt(rect: Rect): void;
}

/**
 * Layout participant owned by the host element tree.
 * The grid never creates or destroys children.
 */
export interface UniformGridChild extends Sizable, Placeable {
  readonly visibility: Visibility;
}

/**
 * How the shared cell size is derived from visible children.
 *
 * - "lastVisible": the last visible child's natural size wins.
 * - "maxVisible": component-wise maximum over visible children.
 */
export type CellPolicy = "lastVisible" | "maxVisible";

/** Two-phase contract the host layout scheduler drives once per pass. */
export interface LayoutManager {
  measure(maxW: number, maxH: number): Size;
  arrangeChildren(bounds: Rect): Size;
}

export const ZERO_SIZE: Size = Object.freeze({ w: 0, h: 0 });
