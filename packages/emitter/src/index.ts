/**
 * @boxwire/emitter - shape emitter contract and concrete emitters
 */

export { RecordingEmitter } from './recording-emitter';
export type { EmitterEvent, EmitterOp, RecordingEmitterOptions } from './recording-emitter';
export { createSvgContext } from './svg-context';
export type { SvgContext } from './svg-context';
export { SvgEmitter, connectorPath } from './svg-emitter';
export type { SvgEmitterOptions } from './svg-emitter';
export { EmitterError, ShapeKind } from './types';
export type {
  ArrowHead,
  ConnectorEnd,
  ConnectorHandle,
  DashStyle,
  EmitterCapabilities,
  Handle,
  ShapeEmitter,
  ShapeHandle,
  TextAlign,
  TextHandle,
  TextStyle,
  VerticalAnchor,
} from './types';
