import type { ArrowHead, DashStyle } from "@boxwire/emitter";
import type { BoxTreeRoot, GridCell, GridSpec, RelativeRect } from "@boxwire/layout";

/**
 * Node kinds the composer knows how to draw. Anything else is drawn as RECT.
 */
export enum NodeKind {
	USER = "user",
	RECT = "rect",
	SYSTEM = "system",
	DATABASE = "database",
}

export interface NodeStyle {
	fill?: string;
	stroke?: string;
	/** Outline width in points (default 1.2) */
	strokePt: number;
	/** Falls back to the theme font colour */
	fontColor?: string;
	/** Label size in points (default 11) */
	fontSize: number;
}

export interface DiagramNode {
	id: string;
	/** Raw kind as written; see NodeKind */
	kind: string;
	label: string;
	/** Percent of the diagram rectangle, or a cell of the diagram grid */
	pos: RelativeRect | GridCell;
	style: NodeStyle;
}

export interface ConnectorStyle {
	color: string;
	pt: number;
	dash: DashStyle;
	arrowHead: ArrowHead;
}

export interface DiagramConnector {
	from: string;
	to: string;
	label?: string;
	style: ConnectorStyle;
}

/**
 * Labelled frame drawn around a set of nodes.
 */
export interface Boundary {
	label: string;
	nodes: string[];
	style: DashStyle;
	color?: string;
}

interface DiagramBase {
	id?: string;
	/** Placement on the canvas in percent (default: whole canvas) */
	pos: RelativeRect;
	/** Drawing order; lower first, ties keep document order */
	zIndex: number;
}

export interface ComponentDiagram extends DiagramBase {
	type: "component";
	/** Grid for cell-placed nodes; DEFAULT_GRID when absent */
	grid?: GridSpec;
	nodes: DiagramNode[];
	connectors: DiagramConnector[];
	boundaries: Boundary[];
}

export interface BoxDiagram extends DiagramBase {
	type: "boxes";
	root: BoxTreeRoot;
	columnHeaders: string[];
	maxColumns?: number;
}

export type Diagram = ComponentDiagram | BoxDiagram;

export type CanvasPreset = "16x9" | "4x3";

export type CanvasSpec =
	| { kind: "preset"; preset: CanvasPreset }
	| { kind: "custom"; widthMm: number; heightMm: number };

export interface ThemeSpec {
	fontColor?: string;
	palette?: string[];
}

export interface DiagramDocument {
	canvas?: CanvasSpec;
	theme?: ThemeSpec;
	diagrams: Diagram[];
}

/**
 * A validation problem; `path` points at the offending value,
 * e.g. `diagrams[0].nodes[1].id`.
 */
export interface ParseIssue {
	path: string;
	message: string;
}

export interface ParseResult {
	document: DiagramDocument | null;
	errors: ParseIssue[];
}

/**
 * Result of validating a fragment on its own (used for config files).
 */
export interface FragmentResult<T> {
	value: T | null;
	errors: ParseIssue[];
}
