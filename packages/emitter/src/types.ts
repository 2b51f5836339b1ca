/**
 * Shape emitter contract
 *
 * The composer only ever talks to this interface; concrete emitters decide
 * what a "shape" is in their output format.
 */

import type { AbsoluteRect, ConnectorType, Point, Site } from '@boxwire/layout';

export enum ShapeKind {
  RECTANGLE = 'rectangle',
  ROUNDED_RECTANGLE = 'rounded-rectangle',
  /** Rectangle with a single rounded corner (top right) */
  ROUND_CORNER_RECTANGLE = 'round-corner-rectangle',
  /** Cylinder */
  CAN = 'can',
}

export type DashStyle = 'solid' | 'dashed';
export type ArrowHead = 'start' | 'end' | 'both' | 'none';
export type ConnectorEnd = 'begin' | 'end';
export type TextAlign = 'left' | 'center';
export type VerticalAnchor = 'top' | 'middle';

export interface TextStyle {
  fontSizePt: number;
  bold?: boolean;
  italic?: boolean;
  /** #RRGGBB */
  color: string;
  align?: TextAlign;
  verticalAnchor?: VerticalAnchor;
}

export interface ShapeHandle {
  readonly type: 'shape';
  readonly id: string;
}

export interface ConnectorHandle {
  readonly type: 'connector';
  readonly id: string;
}

export interface TextHandle {
  readonly type: 'text';
  readonly id: string;
}

export type Handle = ShapeHandle | ConnectorHandle | TextHandle;

export interface EmitterCapabilities {
  /** Connectors can be bound to shape connection sites */
  anchoredConnectors: boolean;
}

export interface ShapeEmitter {
  readonly capabilities: EmitterCapabilities;
  addShape(kind: ShapeKind, rect: AbsoluteRect): ShapeHandle;
  addConnector(type: ConnectorType, start: Point, end: Point, arrowHead?: ArrowHead): ConnectorHandle;
  /** Only valid when `capabilities.anchoredConnectors` is true */
  attachConnector(connector: ConnectorHandle, shape: ShapeHandle, site: Site, end: ConnectorEnd): void;
  addTextBox(rect: AbsoluteRect, text: string, style: TextStyle): TextHandle;
  setText(shape: ShapeHandle, text: string, style: TextStyle): void;
  /** `null` removes the fill */
  setFill(handle: ShapeHandle | TextHandle, color: string | null): void;
  /** `null` colour removes the outline */
  setLine(handle: Handle, color: string | null, widthPt: number, dash?: DashStyle): void;
}

export class EmitterError extends Error {
  constructor(
    message: string,
    public readonly handleId?: string,
  ) {
    super(message);
    this.name = 'EmitterError';
  }
}
