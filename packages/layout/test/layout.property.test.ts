import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { distributeHeights } from '../src/box-tree/layout';
import { resolveRect } from '../src/geometry/resolver';
import { routeConnector } from '../src/routing/router';
import { ConnectorType, Site } from '../src/routing/types';
import type { AbsoluteRect, Canvas } from '../src/types';

const canvasArb: fc.Arbitrary<Canvas> = fc.record({
  left: fc.integer({ min: -10_000, max: 10_000 }),
  top: fc.integer({ min: -10_000, max: 10_000 }),
  width: fc.integer({ min: 0, max: 20_000_000 }),
  height: fc.integer({ min: 0, max: 20_000_000 }),
});

/** Start and extent (percent) that stay inside 0..100 */
const spanArb = fc
  .tuple(fc.integer({ min: 0, max: 100 }), fc.integer({ min: 0, max: 100 }))
  .map(([a, b]) => (a <= b ? { start: a, size: b - a } : { start: b, size: a - b }));

const rectArb: fc.Arbitrary<AbsoluteRect> = fc.record({
  x: fc.integer({ min: -5_000, max: 5_000 }),
  y: fc.integer({ min: -5_000, max: 5_000 }),
  w: fc.integer({ min: 1, max: 2_000 }),
  h: fc.integer({ min: 1, max: 2_000 }),
});

const centre = (r: AbsoluteRect) => ({ x: r.x + r.w / 2, y: r.y + r.h / 2 });

describe('Geometry resolver - Property Tests', () => {
  it('should keep in-range placements inside the reference', () => {
    fc.assert(
      fc.property(canvasArb, spanArb, spanArb, (canvas, across, down) => {
        const rect = resolveRect({ x: across.start, y: down.start, w: across.size, h: down.size }, canvas);

        expect(rect.x).toBeGreaterThanOrEqual(canvas.left);
        expect(rect.y).toBeGreaterThanOrEqual(canvas.top);
        expect(rect.x + rect.w).toBeLessThanOrEqual(canvas.left + canvas.width);
        expect(rect.y + rect.h).toBeLessThanOrEqual(canvas.top + canvas.height);
        expect(Number.isInteger(rect.x) && Number.isInteger(rect.w)).toBe(true);
      }),
    );
  });
});

describe('Connector router - Property Tests', () => {
  it('should always produce a connector with opposite sites', () => {
    fc.assert(
      fc.property(rectArb, rectArb, (from, to) => {
        const result = routeConnector(from, to);

        expect(Object.values(ConnectorType)).toContain(result.connectorType);
        if (result.connectorType === ConnectorType.STRAIGHT_HORIZONTAL) {
          expect([result.beginSite, result.endSite].sort()).toEqual([Site.LEFT, Site.RIGHT].sort());
        }
        if (result.connectorType === ConnectorType.STRAIGHT_VERTICAL) {
          expect([result.beginSite, result.endSite].sort()).toEqual([Site.BOTTOM, Site.TOP].sort());
        }
      }),
    );
  });

  it('should mirror sites when the endpoints are swapped', () => {
    fc.assert(
      fc.property(rectArb, rectArb, (from, to) => {
        const a = centre(from);
        const b = centre(to);
        fc.pre(a.x !== b.x || a.y !== b.y);

        const forward = routeConnector(from, to);
        const reverse = routeConnector(to, from);

        expect(reverse.connectorType).toBe(forward.connectorType);
        expect(reverse.beginSite).toBe(forward.endSite);
        expect(reverse.endSite).toBe(forward.beginSite);
      }),
    );
  });
});

describe('distributeHeights - Property Tests', () => {
  it('should hand out exactly the parent height', () => {
    fc.assert(
      fc.property(
        fc.array(fc.double({ min: 0, max: 1_000, noNaN: true }), { minLength: 1, maxLength: 12 }),
        fc.integer({ min: 0, max: 10_000_000 }),
        fc.integer({ min: 0, max: 100_000 }),
        (weights, height, gap) => {
          const result = distributeHeights(weights, height, gap);
          const sum = result.heights.reduce((acc, h) => acc + h, 0);

          expect(result.heights).toHaveLength(weights.length);
          expect(sum + result.gap * (weights.length - 1)).toBe(height);
          for (const h of result.heights) {
            expect(h).toBeGreaterThanOrEqual(0);
          }
        },
      ),
    );
  });
});
