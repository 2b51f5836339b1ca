/**
 * Core geometry types shared by the resolver, router and box-tree engine.
 *
 * All absolute values are canvas units (EMU).
 */

/**
 * Absolute rectangle used as the origin for percentage conversions.
 */
export interface Canvas {
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * Placement in percentages (0-100) of a reference rectangle.
 */
export interface RelativeRect {
  x: number;
  y: number;
  w: number;
  h: number;
}

/**
 * Resolved placement in canvas units.
 */
export interface AbsoluteRect {
  x: number;
  y: number;
  w: number;
  h: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface RectEdges {
  left: number;
  right: number;
  top: number;
  bottom: number;
}

/**
 * Cell grid laid over a reference rectangle.
 */
export interface GridSpec {
  rows: number;
  cols: number;
}

/**
 * Zero-based grid cell.
 */
export interface GridCell {
  row: number;
  col: number;
}
