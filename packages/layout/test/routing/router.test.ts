/**
 * Unit tests for connector routing
 */

import { describe, expect, it } from 'vitest';
import { labelRect, oppositeSite, routeConnector, segmentMidpoint } from '../../src/routing/router';
import { ConnectorType, Site } from '../../src/routing/types';
import type { AbsoluteRect } from '../../src/types';

describe('routeConnector - Straight horizontal', () => {
  const a: AbsoluteRect = { x: 0, y: 0, w: 100, h: 50 };
  const b: AbsoluteRect = { x: 300, y: 0, w: 100, h: 50 };

  it('should connect side-by-side rectangles with a straight horizontal line', () => {
    const route = routeConnector(a, b);

    expect(route.connectorType).toBe(ConnectorType.STRAIGHT_HORIZONTAL);
    expect(route.beginSite).toBe(Site.RIGHT);
    expect(route.endSite).toBe(Site.LEFT);
    expect(route.startPoint).toEqual({ x: 100, y: 25 });
    expect(route.endPoint).toEqual({ x: 300, y: 25 });
  });

  it('should attach left to right when the target is on the left', () => {
    const route = routeConnector(b, a);

    expect(route.connectorType).toBe(ConnectorType.STRAIGHT_HORIZONTAL);
    expect(route.beginSite).toBe(Site.LEFT);
    expect(route.endSite).toBe(Site.RIGHT);
    expect(route.startPoint).toEqual({ x: 300, y: 25 });
    expect(route.endPoint).toEqual({ x: 100, y: 25 });
  });

  it('should push anchors away from the facing edges by the margin', () => {
    const route = routeConnector(a, b, 10);

    expect(route.startPoint).toEqual({ x: 110, y: 25 });
    expect(route.endPoint).toEqual({ x: 290, y: 25 });
  });

  it('should treat touching edges as separated', () => {
    const route = routeConnector(a, { x: 100, y: 10, w: 100, h: 50 });

    expect(route.connectorType).toBe(ConnectorType.STRAIGHT_HORIZONTAL);
    expect(route.startPoint).toEqual({ x: 100, y: 25 });
    expect(route.endPoint).toEqual({ x: 100, y: 35 });
  });
});

describe('routeConnector - Straight vertical', () => {
  const a: AbsoluteRect = { x: 0, y: 0, w: 100, h: 50 };
  const b: AbsoluteRect = { x: 0, y: 200, w: 100, h: 50 };

  it('should connect stacked rectangles with a straight vertical line', () => {
    const route = routeConnector(a, b);

    expect(route.connectorType).toBe(ConnectorType.STRAIGHT_VERTICAL);
    expect(route.beginSite).toBe(Site.BOTTOM);
    expect(route.endSite).toBe(Site.TOP);
    expect(route.startPoint).toEqual({ x: 50, y: 50 });
    expect(route.endPoint).toEqual({ x: 50, y: 200 });
  });

  it('should attach top to bottom when the target is above', () => {
    const route = routeConnector(b, a, 5);

    expect(route.connectorType).toBe(ConnectorType.STRAIGHT_VERTICAL);
    expect(route.beginSite).toBe(Site.TOP);
    expect(route.endSite).toBe(Site.BOTTOM);
    expect(route.startPoint).toEqual({ x: 50, y: 195 });
    expect(route.endPoint).toEqual({ x: 50, y: 55 });
  });
});

describe('routeConnector - Elbow', () => {
  it('should use an elbow between centers for diagonal rectangles', () => {
    const route = routeConnector(
      { x: 0, y: 0, w: 100, h: 100 },
      { x: 150, y: 150, w: 100, h: 100 },
    );

    expect(route.connectorType).toBe(ConnectorType.ELBOW);
    expect(route.startPoint).toEqual({ x: 50, y: 50 });
    expect(route.endPoint).toEqual({ x: 200, y: 200 });
    // dx === dy resolves to the horizontal sites
    expect(route.beginSite).toBe(Site.RIGHT);
    expect(route.endSite).toBe(Site.LEFT);
  });

  it('should pick top/bottom sites when vertical displacement dominates', () => {
    const route = routeConnector(
      { x: 0, y: 0, w: 100, h: 100 },
      { x: 120, y: 300, w: 100, h: 100 },
    );

    expect(route.connectorType).toBe(ConnectorType.ELBOW);
    expect(route.beginSite).toBe(Site.BOTTOM);
    expect(route.endSite).toBe(Site.TOP);
  });

  it('should orient sites toward a target up and to the left', () => {
    const up = routeConnector(
      { x: 120, y: 300, w: 100, h: 100 },
      { x: 0, y: 0, w: 100, h: 100 },
    );
    expect(up.beginSite).toBe(Site.TOP);
    expect(up.endSite).toBe(Site.BOTTOM);

    const left = routeConnector(
      { x: 300, y: 300, w: 100, h: 100 },
      { x: 0, y: 0, w: 100, h: 100 },
    );
    expect(left.beginSite).toBe(Site.LEFT);
    expect(left.endSite).toBe(Site.RIGHT);
  });

  it('should use an elbow for overlapping rectangles', () => {
    const route = routeConnector(
      { x: 0, y: 0, w: 100, h: 100 },
      { x: 50, y: 10, w: 100, h: 100 },
    );

    expect(route.connectorType).toBe(ConnectorType.ELBOW);
    expect(route.startPoint).toEqual({ x: 50, y: 50 });
    expect(route.endPoint).toEqual({ x: 100, y: 60 });
  });

  it('should fall through to an elbow when rows are offset by the alignment threshold', () => {
    // dy = 30 is not below (40 + 40) / 4
    const route = routeConnector(
      { x: 0, y: 0, w: 100, h: 40 },
      { x: 300, y: 30, w: 100, h: 40 },
    );

    expect(route.connectorType).toBe(ConnectorType.ELBOW);
    expect(route.startPoint).toEqual({ x: 50, y: 20 });
    expect(route.endPoint).toEqual({ x: 350, y: 50 });
  });

  it('should give identical rectangles an elbow rather than no route', () => {
    const rect = { x: 10, y: 10, w: 40, h: 40 };
    const route = routeConnector(rect, rect);

    expect(route.connectorType).toBe(ConnectorType.ELBOW);
    expect(route.startPoint).toEqual(route.endPoint);
  });
});

describe('routeConnector - Properties', () => {
  const positions = [-300, -120, -40, 0, 40, 120, 300];
  const sizes = [
    { w: 0, h: 0 },
    { w: 100, h: 50 },
    { w: 60, h: 200 },
  ];

  it('should always resolve to exactly one connector type', () => {
    const types = new Set<string>(Object.values(ConnectorType));
    const from = { x: 0, y: 0, w: 100, h: 80 };

    for (const x of positions) {
      for (const y of positions) {
        for (const size of sizes) {
          const route = routeConnector(from, { x, y, ...size });
          expect(types.has(route.connectorType)).toBe(true);
          expect(route.endSite).toBe(oppositeSite(route.beginSite));
        }
      }
    }
  });

  it('should mirror sites when the direction is reversed for separated rectangles', () => {
    const a = { x: 0, y: 0, w: 100, h: 50 };
    const pairs: AbsoluteRect[] = [
      { x: 250, y: 5, w: 80, h: 50 },
      { x: -400, y: -10, w: 120, h: 60 },
      { x: 10, y: 180, w: 100, h: 50 },
      { x: -15, y: -300, w: 90, h: 40 },
    ];

    for (const b of pairs) {
      const forward = routeConnector(a, b);
      const backward = routeConnector(b, a);

      expect(forward.connectorType).not.toBe(ConnectorType.ELBOW);
      expect(backward.connectorType).toBe(forward.connectorType);
      expect(backward.beginSite).toBe(forward.endSite);
      expect(backward.endSite).toBe(forward.beginSite);
    }
  });
});

describe('label placement', () => {
  it('should centre the label rectangle on the anchor segment midpoint', () => {
    expect(segmentMidpoint({ x: 100, y: 25 }, { x: 300, y: 25 })).toEqual({ x: 200, y: 25 });
    expect(labelRect({ x: 100, y: 25 }, { x: 300, y: 25 }, 80, 20)).toEqual({
      x: 160,
      y: 15,
      w: 80,
      h: 20,
    });
  });

  it('should keep integer coordinates for fractional midpoints', () => {
    expect(labelRect({ x: 0, y: 0 }, { x: 5, y: 5 }, 3, 3)).toEqual({ x: 1, y: 1, w: 3, h: 3 });
  });
});
