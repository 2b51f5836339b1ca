import { ParseErrors } from "@boxwire/constants";
import type { BoxTreeNode, BoxTreeRoot, GridCell, GridSpec, RelativeRect } from "@boxwire/layout";
import type { AppLogObj, Logger } from "@boxwire/logger";
import type { ArrowHead, DashStyle } from "@boxwire/emitter";
import { FieldReader, childPath, isObject, type JsonObject } from "./fields";
import type {
	BoxDiagram,
	Boundary,
	CanvasPreset,
	CanvasSpec,
	ComponentDiagram,
	Diagram,
	DiagramConnector,
	DiagramDocument,
	DiagramNode,
	FragmentResult,
	ParseResult,
	ThemeSpec,
} from "./types";

const DASH_STYLES: readonly DashStyle[] = ["solid", "dashed"];
const ARROW_HEADS: readonly ArrowHead[] = ["start", "end", "both", "none"];
const CANVAS_PRESETS: readonly CanvasPreset[] = ["16x9", "4x3"];

export const NODE_DEFAULTS = {
	kind: "rect",
	strokePt: 1.2,
	fontSize: 11,
} as const;

export const CONNECTOR_DEFAULTS = {
	color: "#888888",
	pt: 1.2,
	dash: "solid",
	arrowHead: "end",
} as const;

/** Diagrams without a `pos` cover the whole canvas */
export const FULL_CANVAS: RelativeRect = { x: 0, y: 0, w: 100, h: 100 };

/**
 * DocumentParser validates an untrusted JSON value into a DiagramDocument,
 * filling in defaults. It never throws on bad input: every problem is
 * reported as a `{path, message}` issue and the document is withheld.
 *
 * Accepted shapes: a document object (`{canvas?, theme?, diagrams}`), a
 * single diagram object, or an array of diagrams.
 */
export class DocumentParser {
	parse(input: unknown, logger?: Logger<AppLogObj>): ParseResult {
		const reader = new FieldReader();
		const raw = this.normalize(input, reader);
		if (raw === undefined) {
			return { document: null, errors: reader.issues };
		}

		const document: DiagramDocument = {
			diagrams: reader
				.array(raw, "diagrams", "")
				.map((item, i) => this.readDiagram(item, childPath("diagrams", i), reader)),
		};
		if (raw.canvas !== undefined) {
			document.canvas = readCanvas(raw.canvas, "canvas", reader);
		}
		if (raw.theme !== undefined) {
			document.theme = readTheme(raw.theme, "theme", reader);
		}

		if (reader.issues.length > 0) {
			logger?.debug("Document rejected", { count: reader.issues.length });
			return { document: null, errors: reader.issues };
		}

		logger?.debug("Document parsed", { count: document.diagrams.length });
		return { document, errors: [] };
	}

	/**
	 * Wrap a bare diagram or bare diagram array into a document object.
	 */
	private normalize(input: unknown, reader: FieldReader): JsonObject | undefined {
		if (Array.isArray(input)) {
			return { diagrams: input };
		}
		if (isObject(input)) {
			if (input.diagrams !== undefined) {
				return input;
			}
			if (input.type !== undefined) {
				return { diagrams: [input] };
			}
		}
		reader.fail("", ParseErrors.NOT_A_DOCUMENT);
		return undefined;
	}

	// ---- Diagrams ----

	private readDiagram(value: unknown, path: string, reader: FieldReader): Diagram {
		const obj = reader.object(value, path) ?? {};
		const type = reader.requiredString(obj, "type", path);

		if (type === "boxes") {
			return this.readBoxDiagram(obj, path, reader);
		}
		if (type !== "component" && type !== "") {
			reader.fail(childPath(path, "type"), ParseErrors.UNKNOWN_DIAGRAM_TYPE(type));
		}
		return this.readComponentDiagram(obj, path, reader);
	}

	private readComponentDiagram(obj: JsonObject, path: string, reader: FieldReader): ComponentDiagram {
		const nodes = reader
			.array(obj, "nodes", path)
			.map((item, i) => this.readNode(item, childPath(childPath(path, "nodes"), i), reader));

		const seen = new Set<string>();
		nodes.forEach((node, i) => {
			if (seen.has(node.id)) {
				reader.fail(childPath(childPath(childPath(path, "nodes"), i), "id"), ParseErrors.DUPLICATE_ID(node.id));
			}
			seen.add(node.id);
		});

		const diagram: ComponentDiagram = {
			type: "component",
			...this.readDiagramBase(obj, path, reader),
			nodes,
			connectors: reader
				.array(obj, "connectors", path)
				.map((item, i) => this.readConnector(item, childPath(childPath(path, "connectors"), i), reader)),
			boundaries: reader
				.array(obj, "boundaries", path)
				.map((item, i) => this.readBoundary(item, childPath(childPath(path, "boundaries"), i), reader)),
		};
		if (obj.grid !== undefined) {
			diagram.grid = readGrid(obj.grid, childPath(path, "grid"), reader);
		}
		return diagram;
	}

	private readBoxDiagram(obj: JsonObject, path: string, reader: FieldReader): BoxDiagram {
		const diagram: BoxDiagram = {
			type: "boxes",
			...this.readDiagramBase(obj, path, reader),
			root: this.readBoxRoot(obj.root, childPath(path, "root"), reader),
			columnHeaders: reader.stringList(obj, "columnHeaders", path),
		};
		const maxColumns = reader.optionalPositiveInteger(obj, "maxColumns", path);
		if (maxColumns !== undefined) {
			diagram.maxColumns = maxColumns;
		}
		return diagram;
	}

	private readDiagramBase(
		obj: JsonObject,
		path: string,
		reader: FieldReader,
	): { id?: string; pos: RelativeRect; zIndex: number } {
		const base: { id?: string; pos: RelativeRect; zIndex: number } = {
			pos: obj.pos === undefined ? { ...FULL_CANVAS } : readRect(obj.pos, childPath(path, "pos"), reader),
			zIndex: reader.number(obj, "zIndex", path, 0),
		};
		const id = reader.optionalString(obj, "id", path);
		if (id !== undefined) {
			base.id = id;
		}
		return base;
	}

	// ---- Component diagram parts ----

	private readNode(value: unknown, path: string, reader: FieldReader): DiagramNode {
		const obj = reader.object(value, path) ?? {};
		const styleObj = obj.style === undefined ? {} : (reader.object(obj.style, childPath(path, "style")) ?? {});
		const stylePath = childPath(path, "style");

		const node: DiagramNode = {
			id: reader.requiredString(obj, "id", path),
			kind: reader.optionalString(obj, "kind", path) ?? NODE_DEFAULTS.kind,
			label: reader.optionalString(obj, "label", path) ?? "",
			pos: readNodePos(obj.pos, childPath(path, "pos"), reader),
			style: {
				strokePt: reader.number(styleObj, "strokePt", stylePath, NODE_DEFAULTS.strokePt),
				fontSize: reader.number(styleObj, "fontSize", stylePath, NODE_DEFAULTS.fontSize),
			},
		};

		const fill = reader.color(styleObj, "fill", stylePath);
		const stroke = reader.color(styleObj, "stroke", stylePath);
		const fontColor = reader.color(styleObj, "fontColor", stylePath);
		if (fill !== undefined) node.style.fill = fill;
		if (stroke !== undefined) node.style.stroke = stroke;
		if (fontColor !== undefined) node.style.fontColor = fontColor;

		return node;
	}

	private readConnector(value: unknown, path: string, reader: FieldReader): DiagramConnector {
		const obj = reader.object(value, path) ?? {};
		const styleObj = obj.style === undefined ? {} : (reader.object(obj.style, childPath(path, "style")) ?? {});
		const stylePath = childPath(path, "style");

		const connector: DiagramConnector = {
			from: reader.requiredString(obj, "from", path),
			to: reader.requiredString(obj, "to", path),
			style: {
				color: reader.color(styleObj, "color", stylePath) ?? CONNECTOR_DEFAULTS.color,
				pt: reader.number(styleObj, "pt", stylePath, CONNECTOR_DEFAULTS.pt),
				dash: reader.choice(styleObj, "dash", stylePath, DASH_STYLES, CONNECTOR_DEFAULTS.dash),
				arrowHead: reader.choice(styleObj, "arrowHead", stylePath, ARROW_HEADS, CONNECTOR_DEFAULTS.arrowHead),
			},
		};
		const label = reader.optionalString(obj, "label", path);
		if (label !== undefined) {
			connector.label = label;
		}
		return connector;
	}

	private readBoundary(value: unknown, path: string, reader: FieldReader): Boundary {
		const obj = reader.object(value, path) ?? {};
		const boundary: Boundary = {
			label: reader.requiredString(obj, "label", path, true),
			nodes: reader.stringList(obj, "nodes", path),
			style: reader.choice(obj, "style", path, DASH_STYLES, "solid"),
		};
		const color = reader.color(obj, "color", path);
		if (color !== undefined) {
			boundary.color = color;
		}
		return boundary;
	}

	// ---- Box trees ----

	private readBoxRoot(value: unknown, path: string, reader: FieldReader): BoxTreeRoot {
		if (Array.isArray(value)) {
			return { kind: "forest", nodes: value.map((item, i) => this.readBoxNode(item, childPath(path, i), reader)) };
		}
		if (isObject(value)) {
			return { kind: "tree", node: this.readBoxNode(value, path, reader) };
		}
		reader.fail(path, value === undefined ? ParseErrors.REQUIRED : ParseErrors.EXPECTED_BOX_ROOT);
		return { kind: "forest", nodes: [] };
	}

	private readBoxNode(value: unknown, path: string, reader: FieldReader): BoxTreeNode {
		const obj = reader.object(value, path) ?? {};
		const node: { name: string; weight?: number; children?: BoxTreeNode[] } = {
			name: reader.requiredString(obj, "name", path, true),
		};
		if (obj.weight !== undefined) {
			node.weight = reader.number(obj, "weight", path, 1);
		}
		const children = reader.array(obj, "children", path);
		if (children.length > 0) {
			node.children = children.map((item, i) => this.readBoxNode(item, childPath(childPath(path, "children"), i), reader));
		}
		return node;
	}
}

// ---- Shared fragments ----

function readRect(value: unknown, path: string, reader: FieldReader): RelativeRect {
	if (value === undefined) {
		reader.fail(path, ParseErrors.REQUIRED);
		return { x: 0, y: 0, w: 0, h: 0 };
	}
	const obj = reader.object(value, path) ?? {};
	return {
		x: reader.number(obj, "x", path),
		y: reader.number(obj, "y", path),
		w: reader.number(obj, "w", path),
		h: reader.number(obj, "h", path),
	};
}

/**
 * A node position is a percentage rectangle, or a `{row, col}` cell when
 * either of those keys is present.
 */
function readNodePos(value: unknown, path: string, reader: FieldReader): RelativeRect | GridCell {
	if (isObject(value) && (value.row !== undefined || value.col !== undefined)) {
		return {
			row: reader.index(value, "row", path),
			col: reader.index(value, "col", path),
		};
	}
	return readRect(value, path, reader);
}

function readGrid(value: unknown, path: string, reader: FieldReader): GridSpec {
	const obj = reader.object(value, path) ?? {};
	return {
		rows: reader.positiveInteger(obj, "rows", path),
		cols: reader.positiveInteger(obj, "cols", path),
	};
}

function readCanvas(value: unknown, path: string, reader: FieldReader): CanvasSpec {
	const fallback: CanvasSpec = { kind: "preset", preset: "16x9" };
	if (typeof value === "string") {
		const preset = CANVAS_PRESETS.find((p) => p === value);
		if (preset === undefined) {
			reader.fail(path, ParseErrors.INVALID_CHOICE(value, CANVAS_PRESETS));
			return fallback;
		}
		return { kind: "preset", preset };
	}
	if (!isObject(value)) {
		reader.fail(path, ParseErrors.EXPECTED_CANVAS);
		return fallback;
	}
	if (value.preset !== undefined) {
		return readCanvas(value.preset, childPath(path, "preset"), reader);
	}
	if (value.widthMm === undefined && value.heightMm === undefined) {
		reader.fail(path, ParseErrors.EXPECTED_CANVAS);
		return fallback;
	}
	return {
		kind: "custom",
		widthMm: reader.number(value, "widthMm", path),
		heightMm: reader.number(value, "heightMm", path),
	};
}

function readTheme(value: unknown, path: string, reader: FieldReader): ThemeSpec {
	const obj = reader.object(value, path) ?? {};
	const theme: ThemeSpec = {};
	const fontColor = reader.color(obj, "fontColor", path);
	if (fontColor !== undefined) {
		theme.fontColor = fontColor;
	}
	if (obj.palette !== undefined) {
		const palette: string[] = [];
		reader.stringList(obj, "palette", path).forEach((color, i) => {
			const normalized = reader.colorValue(color, childPath(childPath(path, "palette"), i));
			if (normalized !== undefined) {
				palette.push(normalized);
			}
		});
		theme.palette = palette;
	}
	return theme;
}

function fragment<T>(read: (reader: FieldReader) => T): FragmentResult<T> {
	const reader = new FieldReader();
	const value = read(reader);
	return reader.issues.length > 0 ? { value: null, errors: reader.issues } : { value, errors: [] };
}

/**
 * Validate a canvas setting on its own (config files, CLI flags).
 */
export function parseCanvasSpec(value: unknown, path = "canvas"): FragmentResult<CanvasSpec> {
	return fragment((reader) => readCanvas(value, path, reader));
}

/**
 * Validate a theme setting on its own (config files).
 */
export function parseThemeSpec(value: unknown, path = "theme"): FragmentResult<ThemeSpec> {
	return fragment((reader) => readTheme(value, path, reader));
}
