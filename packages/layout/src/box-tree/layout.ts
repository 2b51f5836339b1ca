/**
 * Box Tree Layout Engine
 *
 * Pure arithmetic layout: BoxTreeRoot → BoxTreeLayout.
 * Columns follow tree depth, each parent's height is split among its
 * children by weight, and the last child absorbs rounding so every
 * parent's children (plus gaps) add up to the parent exactly.
 */

import { percentOf } from '../geometry/resolver';
import type { AbsoluteRect, Canvas } from '../types';
import type {
  BoxLayoutOptions,
  BoxPlacement,
  BoxTreeLayout,
  BoxTreeNode,
  BoxTreeRoot,
  ColumnSlot,
  HeaderPlacement,
  HeightDistribution,
} from './types';

/** Layout constants, in percent of the target rectangle */
export const BOX_LAYOUT = {
  /** Gap between columns (of target width) */
  columnGapPct: 3,
  /** Share of the gap-free width given to column 0 */
  firstColumnPct: 20,
  /** Gap between siblings (of target height) */
  rowGapPct: 1,
  /** Header band height (of target height) */
  headerBandPct: 8,
} as const;

// ---- Depth ----

export function nodeDepth(node: BoxTreeNode): number {
  const children = node.children ?? [];
  if (children.length === 0) {
    return 0;
  }
  return 1 + Math.max(...children.map(nodeDepth));
}

export function treeDepth(root: BoxTreeRoot): number {
  if (root.kind === 'tree') {
    return nodeDepth(root.node);
  }
  return root.nodes.length === 0 ? 0 : Math.max(...root.nodes.map(nodeDepth));
}

export function columnCount(root: BoxTreeRoot, maxColumns?: number): number {
  const columns = treeDepth(root) + 1;
  if (maxColumns === undefined) {
    return columns;
  }
  return Math.min(columns, Math.max(1, Math.floor(maxColumns)));
}

// ---- Columns ----

/**
 * Column 0 gets a fixed share of the gap-free width, the rest split the
 * remainder with integer division.
 */
export function computeColumns(target: Canvas, count: number): ColumnSlot[] {
  if (count <= 1) {
    return [{ index: 0, x: target.left, width: target.width }];
  }

  const gap = percentOf(target.width, BOX_LAYOUT.columnGapPct);
  const remaining = target.width - gap * (count - 1);
  const first = percentOf(remaining, BOX_LAYOUT.firstColumnPct);
  const other = Math.floor((remaining - first) / (count - 1));

  const columns: ColumnSlot[] = [{ index: 0, x: target.left, width: first }];
  let x = target.left + first + gap;
  for (let i = 1; i < count; i++) {
    columns.push({ index: i, x, width: other });
    x += other + gap;
  }
  return columns;
}

// ---- Vertical distribution ----

/**
 * Round to the nearest integer, ties to the even neighbour.
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) {
    return floor + 1;
  }
  if (fraction < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Split `height` among siblings by weight.
 *
 * Every sibling but the last gets round(usable * w / Σw), ties to even,
 * capped at the usable height not yet handed out; the last gets whatever
 * is left, so
 * Σheights + gap * (n - 1) === height. Gaps that would not fit are dropped.
 * All-zero weights fall back to an equal split.
 */
export function distributeHeights(
  weights: readonly number[],
  height: number,
  gap: number,
): HeightDistribution {
  const n = weights.length;
  if (n === 0) {
    return { heights: [], gap };
  }

  let clamped = weights.map((w) => Math.max(w, 0));
  let total = clamped.reduce((sum, w) => sum + w, 0);
  if (!Number.isFinite(total)) {
    // Sum overflowed: rescale by the largest weight
    const peak = Math.max(...clamped);
    clamped = clamped.map((w) => (w === peak ? 1 : w / peak));
    total = clamped.reduce((sum, w) => sum + w, 0);
  }

  let localGap = gap;
  let usable = height - gap * (n - 1);
  if (usable < 0) {
    usable = height;
    localGap = 0;
  }

  const heights: number[] = [];
  let allocated = 0;
  for (let i = 0; i < n - 1; i++) {
    const share = total > 0 ? clamped[i] / total : 1 / n;
    const h = Math.min(roundHalfEven(usable * share), Math.max(usable - allocated, 0));
    heights.push(h);
    allocated += h;
  }
  heights.push(height - allocated - localGap * (n - 1));

  return { heights, gap: localGap };
}

// ---- Layout ----

interface LayoutState {
  columns: ColumnSlot[];
  content: AbsoluteRect;
  rowGap: number;
  boxes: BoxPlacement[];
}

/**
 * Lay out a box tree (or forest) inside the target rectangle.
 */
export function layoutBoxTree(
  root: BoxTreeRoot,
  target: Canvas,
  options: BoxLayoutOptions = {},
): BoxTreeLayout {
  const headers = options.headers ?? [];
  const count = columnCount(root, options.maxColumns);
  const columns = computeColumns(target, count);

  // Headers are never invented: no strings, no band
  const headerHeight = headers.length > 0 ? percentOf(target.height, BOX_LAYOUT.headerBandPct) : 0;
  const content: AbsoluteRect = {
    x: target.left,
    y: target.top + headerHeight,
    w: target.width,
    h: target.height - headerHeight,
  };

  const state: LayoutState = {
    columns,
    content,
    rowGap: percentOf(target.height, BOX_LAYOUT.rowGapPct),
    boxes: [],
  };

  if (root.kind === 'tree') {
    placeNode(root.node, 0, 0, content.y, content.h, state);
  } else {
    placeSiblings(root.nodes, 0, 0, content.y, content.h, state);
  }

  const headerPlacements: HeaderPlacement[] = [];
  for (const column of columns) {
    const text = headers[column.index];
    if (text === undefined) {
      continue;
    }
    headerPlacements.push({
      column: column.index,
      text,
      rect: { x: column.x, y: target.top, w: column.width, h: headerHeight },
    });
  }

  return {
    columns,
    headers: headerPlacements,
    content,
    rowGap: state.rowGap,
    boxes: state.boxes,
  };
}

function placeNode(
  node: BoxTreeNode,
  column: number,
  depth: number,
  y: number,
  h: number,
  state: LayoutState,
): void {
  const { content, columns } = state;
  const top = Math.max(y, content.y);
  const height = Math.min(h, content.y + content.h - top);
  const slot = columns[column];

  state.boxes.push({
    node,
    column,
    depth,
    rect: { x: slot.x, y: top, w: slot.width, h: height },
  });

  const children = node.children ?? [];
  if (children.length === 0) {
    return;
  }
  const childColumn = Math.min(column + 1, columns.length - 1);
  placeSiblings(children, childColumn, depth + 1, top, height, state);
}

function placeSiblings(
  nodes: readonly BoxTreeNode[],
  column: number,
  depth: number,
  y: number,
  h: number,
  state: LayoutState,
): void {
  const weights = nodes.map((node) => node.weight ?? 1);
  const { heights, gap } = distributeHeights(weights, h, state.rowGap);

  let cursor = y;
  nodes.forEach((node, i) => {
    placeNode(node, column, depth, cursor, heights[i], state);
    cursor += heights[i] + gap;
  });
}
