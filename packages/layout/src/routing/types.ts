import type { Point } from '../types';

/**
 * How a connector is drawn between two rectangles.
 */
export enum ConnectorType {
  STRAIGHT_HORIZONTAL = 'straight-horizontal',
  STRAIGHT_VERTICAL = 'straight-vertical',
  ELBOW = 'elbow',
}

/**
 * Cardinal attachment point on a rectangle's boundary.
 */
export enum Site {
  TOP = 'top',
  LEFT = 'left',
  BOTTOM = 'bottom',
  RIGHT = 'right',
}

export interface RoutingResult {
  startPoint: Point;
  endPoint: Point;
  connectorType: ConnectorType;
  /** Site on the source rectangle */
  beginSite: Site;
  /** Site on the target rectangle */
  endSite: Site;
}
