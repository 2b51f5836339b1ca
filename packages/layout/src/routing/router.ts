/**
 * Connector Router
 *
 * Classifies the spatial relationship of two rectangles and picks a
 * connector type, anchor points and attachment sites. Rules are tried in
 * order and the first match wins:
 *
 *   1. roughly the same row and apart on x  → straight-horizontal
 *   2. roughly the same column and apart on y → straight-vertical
 *   3. anything else (diagonal, overlapping) → elbow between centers
 */

import { centerOf, edgesOf } from '../geometry/resolver';
import type { AbsoluteRect, Point } from '../types';
import { ConnectorType, Site, type RoutingResult } from './types';

/**
 * Two rectangles count as aligned on an axis when their centers differ by
 * less than this fraction of their combined extent on the other axis.
 * Empirical; tuned for landscape slide proportions.
 */
export const ALIGNMENT_FACTOR = 0.25;

const OPPOSITE_SITE: Record<Site, Site> = {
  [Site.TOP]: Site.BOTTOM,
  [Site.BOTTOM]: Site.TOP,
  [Site.LEFT]: Site.RIGHT,
  [Site.RIGHT]: Site.LEFT,
};

export function oppositeSite(site: Site): Site {
  return OPPOSITE_SITE[site];
}

/**
 * Route a connector from one rectangle to another.
 *
 * @param margin - distance the straight-line anchors are pushed away from the facing edges
 */
export function routeConnector(from: AbsoluteRect, to: AbsoluteRect, margin = 0): RoutingResult {
  const f = edgesOf(from);
  const t = edgesOf(to);
  const fc = centerOf(from);
  const tc = centerOf(to);

  const dx = Math.abs(tc.x - fc.x);
  const dy = Math.abs(tc.y - fc.y);

  const horizontallyAligned = dy < (from.h + to.h) * ALIGNMENT_FACTOR;
  const verticallyAligned = dx < (from.w + to.w) * ALIGNMENT_FACTOR;

  const apartOnX = f.right <= t.left || t.right <= f.left;
  const apartOnY = f.bottom <= t.top || t.bottom <= f.top;

  if (horizontallyAligned && apartOnX) {
    if (f.right <= t.left) {
      return straight(
        ConnectorType.STRAIGHT_HORIZONTAL,
        { x: f.right + margin, y: fc.y },
        { x: t.left - margin, y: tc.y },
        Site.RIGHT,
      );
    }
    return straight(
      ConnectorType.STRAIGHT_HORIZONTAL,
      { x: f.left - margin, y: fc.y },
      { x: t.right + margin, y: tc.y },
      Site.LEFT,
    );
  }

  if (verticallyAligned && apartOnY) {
    if (f.bottom <= t.top) {
      return straight(
        ConnectorType.STRAIGHT_VERTICAL,
        { x: fc.x, y: f.bottom + margin },
        { x: tc.x, y: t.top - margin },
        Site.BOTTOM,
      );
    }
    return straight(
      ConnectorType.STRAIGHT_VERTICAL,
      { x: fc.x, y: f.top - margin },
      { x: tc.x, y: t.bottom + margin },
      Site.TOP,
    );
  }

  // Elbow: dominant displacement decides the sites
  let beginSite: Site;
  if (dx >= dy) {
    beginSite = tc.x > fc.x ? Site.RIGHT : Site.LEFT;
  } else {
    beginSite = tc.y > fc.y ? Site.BOTTOM : Site.TOP;
  }

  return {
    startPoint: fc,
    endPoint: tc,
    connectorType: ConnectorType.ELBOW,
    beginSite,
    endSite: oppositeSite(beginSite),
  };
}

function straight(
  connectorType: ConnectorType,
  startPoint: Point,
  endPoint: Point,
  beginSite: Site,
): RoutingResult {
  return { startPoint, endPoint, connectorType, beginSite, endSite: oppositeSite(beginSite) };
}

/**
 * Midpoint of the anchor segment.
 */
export function segmentMidpoint(start: Point, end: Point): Point {
  return { x: (start.x + end.x) / 2, y: (start.y + end.y) / 2 };
}

/**
 * Rectangle of the given size centred on the anchor segment midpoint.
 * Independent of connector type.
 */
export function labelRect(start: Point, end: Point, width: number, height: number): AbsoluteRect {
  const mid = segmentMidpoint(start, end);
  return {
    x: Math.floor(mid.x) - Math.floor(width / 2),
    y: Math.floor(mid.y) - Math.floor(height / 2),
    w: width,
    h: height,
  };
}
