/**
 * Geometry Resolver
 *
 * Percentage placement → absolute integer coordinates. Values are
 * truncated with floor so repeated conversions never drift upward, and
 * out-of-range percentages are passed through unclamped.
 */

import type { AbsoluteRect, Canvas, GridCell, GridSpec, Point, RectEdges, RelativeRect } from '../types';

/** Grid used when a diagram places nodes by cell without naming one */
export const DEFAULT_GRID: GridSpec = { rows: 3, cols: 5 };

/** Share of its cell a grid-placed node covers, on each axis */
export const GRID_NODE_SCALE = 0.7;

/**
 * floor(total * pct / 100). Multiplying first keeps integer inputs exact.
 */
export function percentOf(total: number, pct: number): number {
  return Math.floor((total * pct) / 100);
}

/**
 * Resolve a relative rectangle against a reference rectangle.
 */
export function resolveRect(rel: RelativeRect, reference: Canvas): AbsoluteRect {
  return {
    x: reference.left + percentOf(reference.width, rel.x),
    y: reference.top + percentOf(reference.height, rel.y),
    w: percentOf(reference.width, rel.w),
    h: percentOf(reference.height, rel.h),
  };
}

export function isGridCell(pos: RelativeRect | GridCell): pos is GridCell {
  return 'row' in pos;
}

/**
 * Resolve a grid cell against a reference rectangle. The node covers
 * GRID_NODE_SCALE of the cell and is centred in it; cells outside the
 * grid are passed through like out-of-range percentages.
 */
export function resolveGridCell(cell: GridCell, grid: GridSpec, reference: Canvas): AbsoluteRect {
  const cellWidth = reference.width / grid.cols;
  const cellHeight = reference.height / grid.rows;
  const w = Math.floor(cellWidth * GRID_NODE_SCALE);
  const h = Math.floor(cellHeight * GRID_NODE_SCALE);
  return {
    x: reference.left + Math.floor(cell.col * cellWidth + (cellWidth - w) / 2),
    y: reference.top + Math.floor(cell.row * cellHeight + (cellHeight - h) / 2),
    w,
    h,
  };
}

export function toCanvas(rect: AbsoluteRect): Canvas {
  return { left: rect.x, top: rect.y, width: rect.w, height: rect.h };
}

export function toAbsolute(canvas: Canvas): AbsoluteRect {
  return { x: canvas.left, y: canvas.top, w: canvas.width, h: canvas.height };
}

export function centerOf(rect: AbsoluteRect): Point {
  return { x: rect.x + rect.w / 2, y: rect.y + rect.h / 2 };
}

export function edgesOf(rect: AbsoluteRect): RectEdges {
  return {
    left: rect.x,
    right: rect.x + rect.w,
    top: rect.y,
    bottom: rect.y + rect.h,
  };
}
