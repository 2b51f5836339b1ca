/**
 * SVG emitter
 *
 * Draws emitter calls with svg.js on a headless svgdom window. The viewBox
 * is the canvas in EMU so every coordinate is written as received; the
 * outer width/height are the canvas size in CSS pixels.
 *
 * Connector attachments are kept as data attributes on the connector path
 * (data-begin-shape, data-begin-site, data-end-shape, data-end-site).
 */

import {
  ConnectorType,
  pt,
  toPixels,
  type AbsoluteRect,
  type Canvas,
  type Point,
  type Site,
} from '@boxwire/layout';
import type { Element, G, Marker, Path } from '@svgdotjs/svg.js';
import { createSvgContext, type SvgContext } from './svg-context';
import {
  EmitterError,
  ShapeKind,
  type ArrowHead,
  type ConnectorEnd,
  type ConnectorHandle,
  type DashStyle,
  type EmitterCapabilities,
  type Handle,
  type ShapeEmitter,
  type ShapeHandle,
  type TextHandle,
  type TextStyle,
} from './types';

export interface SvgEmitterOptions {
  fontFamily?: string;
  /** Page colour; `null` leaves the page transparent */
  background?: string | null;
}

interface ShapeEntry {
  group: G;
  body: Element;
  rect: AbsoluteRect;
  label?: G;
}

interface TextEntry {
  group: G;
  background: Element;
}

interface ConnectorEntry {
  path: Path;
  arrowHead: ArrowHead;
  color: string | null;
}

/** Corner radius of rounded shapes, as a fraction of the shorter side */
const CORNER_RATIO = 0.1667;
/** Height of a cylinder's end ellipse, as a fraction of the shorter side */
const CAN_CAP_RATIO = 0.25;
const LINE_SPACING = 1.2;
const TEXT_INSET = pt(4);

const DEFAULT_FILL = '#FFFFFF';
const DEFAULT_STROKE = '#000000';
const DEFAULT_STROKE_PT = 0.75;

export class SvgEmitter implements ShapeEmitter {
  readonly capabilities: EmitterCapabilities = { anchoredConnectors: true };

  private readonly ctx: SvgContext;
  private readonly fontFamily: string;
  private readonly shapes = new Map<string, ShapeEntry>();
  private readonly texts = new Map<string, TextEntry>();
  private readonly connectors = new Map<string, ConnectorEntry>();
  private readonly markers = new Map<string, Marker>();
  private counter = 0;

  constructor(canvas: Canvas, options: SvgEmitterOptions = {}) {
    this.fontFamily = options.fontFamily ?? 'sans-serif';
    this.ctx = createSvgContext(toPixels(canvas.width), toPixels(canvas.height));
    this.ctx.canvas.viewbox(canvas.left, canvas.top, canvas.width, canvas.height);

    const background = options.background === undefined ? DEFAULT_FILL : options.background;
    if (background !== null) {
      this.ctx.canvas
        .rect(canvas.width, canvas.height)
        .move(canvas.left, canvas.top)
        .fill(background)
        .attr('data-role', 'background');
    }
  }

  // ---- Shapes ----

  addShape(kind: ShapeKind, rect: AbsoluteRect): ShapeHandle {
    const handle: ShapeHandle = { type: 'shape', id: this.nextId('shape') };
    const group = this.ctx.canvas.group().id(handle.id).attr('data-kind', kind);
    const body = drawBody(group, kind, rect);
    body.fill(DEFAULT_FILL).stroke({ color: DEFAULT_STROKE, width: pt(DEFAULT_STROKE_PT) });

    this.shapes.set(handle.id, { group, body, rect: { ...rect } });
    return handle;
  }

  setText(shape: ShapeHandle, text: string, style: TextStyle): void {
    const entry = this.shapeEntry(shape);
    entry.label?.remove();
    entry.label = this.drawText(entry.group, entry.rect, text, style);
  }

  // ---- Text boxes ----

  addTextBox(rect: AbsoluteRect, text: string, style: TextStyle): TextHandle {
    const handle: TextHandle = { type: 'text', id: this.nextId('text') };
    const group = this.ctx.canvas.group().id(handle.id).attr('data-kind', 'text');
    const background = group.rect(rect.w, rect.h).move(rect.x, rect.y).fill('none').stroke('none');
    this.drawText(group, rect, text, style);

    this.texts.set(handle.id, { group, background });
    return handle;
  }

  // ---- Connectors ----

  addConnector(type: ConnectorType, start: Point, end: Point, arrowHead: ArrowHead = 'end'): ConnectorHandle {
    const handle: ConnectorHandle = { type: 'connector', id: this.nextId('connector') };
    const path = this.ctx.canvas
      .path(connectorPath(type, start, end))
      .id(handle.id)
      .fill('none')
      .stroke({ color: DEFAULT_STROKE, width: pt(DEFAULT_STROKE_PT) })
      .attr('data-connector-type', type);

    this.connectors.set(handle.id, { path, arrowHead, color: DEFAULT_STROKE });
    return handle;
  }

  attachConnector(connector: ConnectorHandle, shape: ShapeHandle, site: Site, end: ConnectorEnd): void {
    const entry = this.connectorEntry(connector);
    this.shapeEntry(shape);
    entry.path.attr({ [`data-${end}-shape`]: shape.id, [`data-${end}-site`]: site });
  }

  // ---- Styling ----

  setFill(handle: ShapeHandle | TextHandle, color: string | null): void {
    const element = handle.type === 'shape' ? this.shapeEntry(handle).body : this.textEntry(handle).background;
    element.fill(color ?? 'none');
  }

  setLine(handle: Handle, color: string | null, widthPt: number, dash: DashStyle = 'solid'): void {
    let element: Element;
    if (handle.type === 'connector') {
      const entry = this.connectorEntry(handle);
      entry.color = color;
      element = entry.path;
    } else if (handle.type === 'shape') {
      element = this.shapeEntry(handle).body;
    } else {
      element = this.textEntry(handle).background;
    }

    if (color === null) {
      element.stroke('none').attr('stroke-dasharray', null);
      return;
    }

    const width = pt(widthPt);
    element.stroke({ color, width });
    element.attr('stroke-dasharray', dash === 'dashed' ? `${width * 4} ${width * 3}` : null);
  }

  // ---- Output ----

  toSvg(): string {
    for (const entry of this.connectors.values()) {
      this.applyMarkers(entry);
    }
    return this.ctx.toSvg();
  }

  dispose(): void {
    this.ctx.dispose();
    this.shapes.clear();
    this.texts.clear();
    this.connectors.clear();
    this.markers.clear();
  }

  // ---- Internals ----

  private drawText(parent: G, rect: AbsoluteRect, text: string, style: TextStyle): G {
    const label = parent.group().attr('data-role', 'label');
    if (text === '') {
      return label;
    }

    const size = pt(style.fontSizePt);
    const lineHeight = Math.round(size * LINE_SPACING);
    const lines = text.split('\n');
    const align = style.align ?? 'center';
    const x = align === 'center' ? rect.x + Math.round(rect.w / 2) : rect.x + TEXT_INSET;
    const firstY =
      (style.verticalAnchor ?? 'middle') === 'middle'
        ? rect.y + Math.round(rect.h / 2) - Math.round(((lines.length - 1) * lineHeight) / 2)
        : rect.y + TEXT_INSET + Math.round(lineHeight / 2);

    lines.forEach((line, i) => {
      label.plain(line).attr({
        x,
        y: firstY + i * lineHeight,
        'font-family': this.fontFamily,
        'font-size': size,
        'font-weight': style.bold ? 'bold' : 'normal',
        'font-style': style.italic ? 'italic' : 'normal',
        'text-anchor': align === 'center' ? 'middle' : 'start',
        'dominant-baseline': 'central',
        fill: style.color,
      });
    });
    return label;
  }

  private applyMarkers(entry: ConnectorEntry): void {
    const { path, arrowHead, color } = entry;
    path.attr({ 'marker-start': null, 'marker-end': null });
    if (color === null || arrowHead === 'none') {
      return;
    }
    const marker = this.markerFor(color);
    if (arrowHead === 'start' || arrowHead === 'both') {
      path.marker('start', marker);
    }
    if (arrowHead === 'end' || arrowHead === 'both') {
      path.marker('end', marker);
    }
  }

  /** One arrowhead definition per stroke colour */
  private markerFor(color: string): Marker {
    const existing = this.markers.get(color);
    if (existing) {
      return existing;
    }
    const marker = this.ctx.canvas
      .marker(4, 4, (add) => {
        add.path('M 0 0 L 4 2 L 0 4 z').fill(color);
      })
      .ref(4, 2)
      .id(`arrow-${this.markers.size + 1}`)
      .attr('orient', 'auto-start-reverse');
    this.markers.set(color, marker);
    return marker;
  }

  private shapeEntry(handle: ShapeHandle): ShapeEntry {
    const entry = this.shapes.get(handle.id);
    if (!entry) {
      throw new EmitterError(`Unknown shape handle "${handle.id}"`, handle.id);
    }
    return entry;
  }

  private textEntry(handle: TextHandle): TextEntry {
    const entry = this.texts.get(handle.id);
    if (!entry) {
      throw new EmitterError(`Unknown text handle "${handle.id}"`, handle.id);
    }
    return entry;
  }

  private connectorEntry(handle: ConnectorHandle): ConnectorEntry {
    const entry = this.connectors.get(handle.id);
    if (!entry) {
      throw new EmitterError(`Unknown connector handle "${handle.id}"`, handle.id);
    }
    return entry;
  }

  private nextId(prefix: string): string {
    this.counter += 1;
    return `${prefix}-${this.counter}`;
  }
}

// ---- Geometry ----

function drawBody(group: G, kind: ShapeKind, rect: AbsoluteRect): Element {
  const { x, y, w, h } = rect;
  const shorter = Math.min(w, h);

  switch (kind) {
    case ShapeKind.ROUNDED_RECTANGLE:
      return group.rect(w, h).move(x, y).radius(Math.round(shorter * CORNER_RATIO));
    case ShapeKind.ROUND_CORNER_RECTANGLE: {
      const r = Math.round(shorter * CORNER_RATIO);
      return group.path(`M ${x} ${y} H ${x + w - r} A ${r} ${r} 0 0 1 ${x + w} ${y + r} V ${y + h} H ${x} Z`);
    }
    case ShapeKind.CAN: {
      const rx = Math.round(w / 2);
      const ry = Math.round((shorter * CAN_CAP_RATIO) / 2);
      return group.path(
        `M ${x} ${y + ry} A ${rx} ${ry} 0 0 1 ${x + w} ${y + ry} V ${y + h - ry} ` +
          `A ${rx} ${ry} 0 0 1 ${x} ${y + h - ry} Z ` +
          `M ${x} ${y + ry} A ${rx} ${ry} 0 0 0 ${x + w} ${y + ry}`,
      );
    }
    case ShapeKind.RECTANGLE:
      return group.rect(w, h).move(x, y);
  }
}

/**
 * Path data for a connector. Elbows bend at the midpoint, running
 * horizontally first when the horizontal distance dominates.
 */
export function connectorPath(type: ConnectorType, start: Point, end: Point): string {
  const move = `M ${start.x} ${start.y}`;
  if (type !== ConnectorType.ELBOW) {
    return `${move} L ${end.x} ${end.y}`;
  }
  const dx = Math.abs(end.x - start.x);
  const dy = Math.abs(end.y - start.y);
  if (dx >= dy) {
    const midX = Math.round((start.x + end.x) / 2);
    return `${move} H ${midX} V ${end.y} H ${end.x}`;
  }
  const midY = Math.round((start.y + end.y) / 2);
  return `${move} V ${midY} H ${end.x} V ${end.y}`;
}
