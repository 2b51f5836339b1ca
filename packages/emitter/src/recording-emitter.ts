/**
 * Recording emitter
 *
 * Keeps every emitter call as a plain event. Used by tests and by the
 * `--format json` output of the CLI.
 */

import type { AbsoluteRect, ConnectorType, Point, Site } from '@boxwire/layout';
import {
  EmitterError,
  type ArrowHead,
  type ConnectorEnd,
  type ConnectorHandle,
  type DashStyle,
  type EmitterCapabilities,
  type Handle,
  type ShapeEmitter,
  type ShapeHandle,
  type ShapeKind,
  type TextHandle,
  type TextStyle,
} from './types';

export type EmitterEvent =
  | { op: 'addShape'; handle: ShapeHandle; kind: ShapeKind; rect: AbsoluteRect }
  | {
      op: 'addConnector';
      handle: ConnectorHandle;
      connectorType: ConnectorType;
      start: Point;
      end: Point;
      arrowHead: ArrowHead;
    }
  | { op: 'attachConnector'; connector: ConnectorHandle; shape: ShapeHandle; site: Site; end: ConnectorEnd }
  | { op: 'addTextBox'; handle: TextHandle; rect: AbsoluteRect; text: string; style: TextStyle }
  | { op: 'setText'; shape: ShapeHandle; text: string; style: TextStyle }
  | { op: 'setFill'; handle: ShapeHandle | TextHandle; color: string | null }
  | { op: 'setLine'; handle: Handle; color: string | null; widthPt: number; dash: DashStyle };

export type EmitterOp = EmitterEvent['op'];

export interface RecordingEmitterOptions {
  anchoredConnectors?: boolean;
}

export class RecordingEmitter implements ShapeEmitter {
  readonly capabilities: EmitterCapabilities;
  readonly events: EmitterEvent[] = [];
  private counter = 0;

  constructor(options: RecordingEmitterOptions = {}) {
    this.capabilities = { anchoredConnectors: options.anchoredConnectors ?? true };
  }

  /**
   * Events of a single kind, narrowed to that kind.
   */
  calls<K extends EmitterOp>(op: K): Extract<EmitterEvent, { op: K }>[] {
    return this.events.filter((event): event is Extract<EmitterEvent, { op: K }> => event.op === op);
  }

  addShape(kind: ShapeKind, rect: AbsoluteRect): ShapeHandle {
    const handle: ShapeHandle = { type: 'shape', id: this.nextId('shape') };
    this.events.push({ op: 'addShape', handle, kind, rect: { ...rect } });
    return handle;
  }

  addConnector(connectorType: ConnectorType, start: Point, end: Point, arrowHead: ArrowHead = 'end'): ConnectorHandle {
    const handle: ConnectorHandle = { type: 'connector', id: this.nextId('connector') };
    this.events.push({ op: 'addConnector', handle, connectorType, start: { ...start }, end: { ...end }, arrowHead });
    return handle;
  }

  attachConnector(connector: ConnectorHandle, shape: ShapeHandle, site: Site, end: ConnectorEnd): void {
    if (!this.capabilities.anchoredConnectors) {
      throw new EmitterError('This emitter does not support anchored connectors', connector.id);
    }
    this.events.push({ op: 'attachConnector', connector, shape, site, end });
  }

  addTextBox(rect: AbsoluteRect, text: string, style: TextStyle): TextHandle {
    const handle: TextHandle = { type: 'text', id: this.nextId('text') };
    this.events.push({ op: 'addTextBox', handle, rect: { ...rect }, text, style: { ...style } });
    return handle;
  }

  setText(shape: ShapeHandle, text: string, style: TextStyle): void {
    this.events.push({ op: 'setText', shape, text, style: { ...style } });
  }

  setFill(handle: ShapeHandle | TextHandle, color: string | null): void {
    this.events.push({ op: 'setFill', handle, color });
  }

  setLine(handle: Handle, color: string | null, widthPt: number, dash: DashStyle = 'solid'): void {
    this.events.push({ op: 'setLine', handle, color, widthPt, dash });
  }

  private nextId(prefix: string): string {
    this.counter += 1;
    return `${prefix}-${this.counter}`;
  }
}
