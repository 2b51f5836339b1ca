/**
 * @boxwire/layout - geometry resolution, connector routing and box-tree layout
 *
 * Pure functions over canvas-unit rectangles; nothing here draws.
 */

// ---- Geometry ----
export {
  DEFAULT_GRID,
  GRID_NODE_SCALE,
  centerOf,
  edgesOf,
  isGridCell,
  percentOf,
  resolveGridCell,
  resolveRect,
  toAbsolute,
  toCanvas,
} from './geometry/resolver';
export type { AbsoluteRect, Canvas, GridCell, GridSpec, Point, RectEdges, RelativeRect } from './types';
export { EMU_PER_INCH, EMU_PER_MM, EMU_PER_PIXEL, EMU_PER_POINT, inches, mm, pt, toPixels } from './units';

// ---- Routing ----
export {
  ALIGNMENT_FACTOR,
  labelRect,
  oppositeSite,
  routeConnector,
  segmentMidpoint,
} from './routing/router';
export { ConnectorType, Site } from './routing/types';
export type { RoutingResult } from './routing/types';

// ---- Box tree ----
export {
  BOX_LAYOUT,
  columnCount,
  computeColumns,
  distributeHeights,
  layoutBoxTree,
  nodeDepth,
  roundHalfEven,
  treeDepth,
} from './box-tree/layout';
export type {
  BoxLayoutOptions,
  BoxPlacement,
  BoxTreeLayout,
  BoxTreeNode,
  BoxTreeRoot,
  ColumnSlot,
  HeaderPlacement,
  HeightDistribution,
} from './box-tree/types';
