import type { AbsoluteRect } from '../types';

/**
 * A weighted box in a decomposition tree.
 */
export interface BoxTreeNode {
  name: string;
  /** Relative share of the parent's height (default 1, negatives count as 0) */
  weight?: number;
  children?: readonly BoxTreeNode[];
}

/**
 * Layout root: a single tree, or an ordered forest of top-level boxes
 * sharing column 0.
 */
export type BoxTreeRoot =
  | { kind: 'tree'; node: BoxTreeNode }
  | { kind: 'forest'; nodes: readonly BoxTreeNode[] };

export interface BoxLayoutOptions {
  /** Column header strings; a header band is reserved only when non-empty */
  headers?: readonly string[];
  /** Upper bound on the column count; deeper nodes collapse into the last column */
  maxColumns?: number;
}

export interface ColumnSlot {
  index: number;
  x: number;
  width: number;
}

export interface BoxPlacement {
  node: BoxTreeNode;
  column: number;
  /** Depth in the tree; differs from column once the column cap is reached */
  depth: number;
  rect: AbsoluteRect;
}

export interface HeaderPlacement {
  column: number;
  text: string;
  rect: AbsoluteRect;
}

export interface HeightDistribution {
  heights: number[];
  /** Gap actually used between siblings (0 when the requested gaps did not fit) */
  gap: number;
}

export interface BoxTreeLayout {
  columns: ColumnSlot[];
  headers: HeaderPlacement[];
  /** Area below the header band */
  content: AbsoluteRect;
  /** Requested sibling gap */
  rowGap: number;
  /** Depth-first, parent before children, input sibling order */
  boxes: BoxPlacement[];
}
