import { describe, expect, it } from "vitest";
import { Logger, type AppLogObj } from "@boxwire/logger";
import { DocumentParser, parseCanvasSpec, parseThemeSpec } from "../../src/document/parser";

// ── Test Helpers ──────────────────────────────────────────────────────────────

function createTestLogger() {
	const logs: Record<string, unknown>[] = [];
	const logger = new Logger<AppLogObj>({
		name: "test-document-parser",
		type: "hidden",
		minLevel: 0,
	});
	logger.attachTransport((logObj: Record<string, unknown>) => {
		logs.push(logObj);
	});
	return { logger, logs };
}

const POS = { x: 0, y: 0, w: 10, h: 10 };

// ── Tests ─────────────────────────────────────────────────────────────────────

describe("DocumentParser", () => {
	const parser = new DocumentParser();

	// ── Feature: Input Shapes ───────────────────────────────────────────────

	describe("Feature: Input Shapes", () => {
		it("should wrap a bare diagram into a document", () => {
			const result = parser.parse({ type: "component", nodes: [] });

			expect(result.errors).toEqual([]);
			expect(result.document?.diagrams).toHaveLength(1);
			expect(result.document?.diagrams[0]?.type).toBe("component");
		});

		it("should wrap a bare array of diagrams into a document", () => {
			const result = parser.parse([{ type: "component" }, { type: "boxes", root: { name: "R" } }]);

			expect(result.errors).toEqual([]);
			expect(result.document?.diagrams.map((d) => d.type)).toEqual(["component", "boxes"]);
		});

		it("should reject values that are neither documents nor diagrams", () => {
			for (const input of [42, "text", null, { foo: 1 }]) {
				expect(parser.parse(input)).toEqual({
					document: null,
					errors: [
						{
							path: "",
							message: "Expected a document object, a diagram object or an array of diagrams",
						},
					],
				});
			}
		});
	});

	// ── Feature: Defaults ───────────────────────────────────────────────────

	describe("Feature: Defaults", () => {
		it("should fill node, connector and diagram defaults", () => {
			const result = parser.parse({
				diagrams: [
					{
						type: "component",
						nodes: [{ id: "a", pos: { x: 10, y: 20, w: 30, h: 40 } }],
						connectors: [{ from: "a", to: "b" }],
					},
				],
			});

			expect(result.errors).toEqual([]);
			expect(result.document).toEqual({
				diagrams: [
					{
						type: "component",
						pos: { x: 0, y: 0, w: 100, h: 100 },
						zIndex: 0,
						nodes: [
							{
								id: "a",
								kind: "rect",
								label: "",
								pos: { x: 10, y: 20, w: 30, h: 40 },
								style: { strokePt: 1.2, fontSize: 11 },
							},
						],
						connectors: [
							{
								from: "a",
								to: "b",
								style: { color: "#888888", pt: 1.2, dash: "solid", arrowHead: "end" },
							},
						],
						boundaries: [],
					},
				],
			});
		});

		it("should keep unknown node kinds as written", () => {
			const result = parser.parse({ type: "component", nodes: [{ id: "a", kind: "cloud", pos: POS }] });

			expect(result.errors).toEqual([]);
			const diagram = result.document?.diagrams[0];
			expect(diagram?.type === "component" ? diagram.nodes[0]?.kind : undefined).toBe("cloud");
		});

		it("should add the hash to colours written without one", () => {
			const result = parser.parse({
				type: "component",
				nodes: [{ id: "a", pos: POS, style: { fill: "F0F4FF", stroke: "#647896" } }],
			});

			const diagram = result.document?.diagrams[0];
			expect(diagram?.type === "component" ? diagram.nodes[0]?.style : undefined).toEqual({
				fill: "#F0F4FF",
				stroke: "#647896",
				strokePt: 1.2,
				fontSize: 11,
			});
		});

		it("should read boundaries with a solid default style", () => {
			const result = parser.parse({
				type: "component",
				boundaries: [{ label: "Backend", nodes: ["api", "db"] }, { label: "", style: "dashed", color: "#FF0000" }],
			});

			const diagram = result.document?.diagrams[0];
			expect(diagram?.type === "component" ? diagram.boundaries : undefined).toEqual([
				{ label: "Backend", nodes: ["api", "db"], style: "solid" },
				{ label: "", nodes: [], style: "dashed", color: "#FF0000" },
			]);
		});
	});

	// ── Feature: Box Diagrams ───────────────────────────────────────────────

	describe("Feature: Box Diagrams", () => {
		it("should read a single root as a tree", () => {
			const result = parser.parse({
				type: "boxes",
				id: "goals",
				zIndex: 2,
				root: { name: "Root", children: [{ name: "A", weight: 2 }, { name: "B" }] },
				columnHeaders: ["L1", "L2"],
				maxColumns: 2,
			});

			expect(result.errors).toEqual([]);
			expect(result.document?.diagrams[0]).toEqual({
				type: "boxes",
				id: "goals",
				pos: { x: 0, y: 0, w: 100, h: 100 },
				zIndex: 2,
				root: {
					kind: "tree",
					node: { name: "Root", children: [{ name: "A", weight: 2 }, { name: "B" }] },
				},
				columnHeaders: ["L1", "L2"],
				maxColumns: 2,
			});
		});

		it("should read an array root as a forest", () => {
			const result = parser.parse({ type: "boxes", root: [{ name: "x" }, { name: "y", weight: 0 }] });
			const diagram = result.document?.diagrams[0];

			expect(diagram?.type === "boxes" ? diagram.root : undefined).toEqual({
				kind: "forest",
				nodes: [{ name: "x" }, { name: "y", weight: 0 }],
			});
		});

		it("should report box problems with their paths", () => {
			expect(parser.parse({ type: "boxes" }).errors).toEqual([{ path: "diagrams[0].root", message: "Required" }]);
			expect(parser.parse({ type: "boxes", root: 5 }).errors).toEqual([
				{ path: "diagrams[0].root", message: "Expected a box object or an array of boxes" },
			]);
			expect(parser.parse({ type: "boxes", root: { name: "R", children: [{ weight: 1 }] } }).errors).toEqual([
				{ path: "diagrams[0].root.children[0].name", message: "Required" },
			]);
			expect(parser.parse({ type: "boxes", root: { name: "R" }, maxColumns: 0 }).errors).toEqual([
				{ path: "diagrams[0].maxColumns", message: "Expected a positive integer" },
			]);
		});
	});

	// ── Feature: Error Reporting ────────────────────────────────────────────

	describe("Feature: Error Reporting", () => {
		it("should collect every bad field with its path and withhold the document", () => {
			const result = parser.parse({
				diagrams: [
					{
						type: "component",
						nodes: [
							{ id: "a", pos: POS },
							{ pos: { x: 0, y: 0, w: 1, h: "wide" } },
						],
					},
				],
			});

			expect(result).toEqual({
				document: null,
				errors: [
					{ path: "diagrams[0].nodes[1].id", message: "Required" },
					{ path: "diagrams[0].nodes[1].pos.h", message: "Expected a finite number" },
				],
			});
		});

		it("should reject malformed colours and unknown choices", () => {
			const result = parser.parse({
				type: "component",
				connectors: [{ from: "a", to: "b", style: { color: "red", dash: "dotted" } }],
			});

			expect(result.errors).toEqual([
				{ path: "diagrams[0].connectors[0].style.color", message: 'Invalid colour "red". Expected #RRGGBB' },
				{ path: "diagrams[0].connectors[0].style.dash", message: 'Invalid value "dotted". Expected one of: solid, dashed' },
			]);
		});

		it("should reject duplicate node ids", () => {
			const result = parser.parse({
				type: "component",
				nodes: [
					{ id: "a", pos: POS },
					{ id: "a", pos: POS },
				],
			});

			expect(result.errors).toEqual([{ path: "diagrams[0].nodes[1].id", message: 'Duplicate node id "a"' }]);
		});

		it("should reject unknown diagram types", () => {
			expect(parser.parse({ type: "pie" }).errors).toEqual([
				{ path: "diagrams[0].type", message: 'Unknown diagram type "pie". Expected component or boxes' },
			]);
		});

		it("should require node positions", () => {
			expect(parser.parse({ type: "component", nodes: [{ id: "a" }] }).errors).toEqual([
				{ path: "diagrams[0].nodes[0].pos", message: "Required" },
			]);
		});
	});

	// ── Feature: Grid Placement ─────────────────────────────────────────────

	describe("Feature: Grid Placement", () => {
		it("should read a diagram grid and cell positions next to percentage ones", () => {
			const result = parser.parse({
				type: "component",
				grid: { rows: 2, cols: 4 },
				nodes: [
					{ id: "a", pos: { row: 1, col: 3 } },
					{ id: "b", pos: POS },
				],
			});

			expect(result.errors).toEqual([]);
			expect(result.document?.diagrams[0]).toMatchObject({
				grid: { rows: 2, cols: 4 },
				nodes: [
					{ id: "a", pos: { row: 1, col: 3 } },
					{ id: "b", pos: POS },
				],
			});
		});

		it("should leave the grid unset when the diagram names none", () => {
			const result = parser.parse({ type: "component", nodes: [{ id: "a", pos: { row: 0, col: 0 } }] });

			expect(result.errors).toEqual([]);
			expect(result.document?.diagrams[0]).not.toHaveProperty("grid");
		});

		it("should reject negative or missing cell indices", () => {
			const result = parser.parse({ type: "component", nodes: [{ id: "a", pos: { row: -1 } }] });

			expect(result.errors).toEqual([
				{ path: "diagrams[0].nodes[0].pos.row", message: "Expected a non-negative integer" },
				{ path: "diagrams[0].nodes[0].pos.col", message: "Required" },
			]);
		});

		it("should reject grids without positive row and column counts", () => {
			const result = parser.parse({ type: "component", grid: { rows: 0 } });

			expect(result.errors).toEqual([
				{ path: "diagrams[0].grid.rows", message: "Expected a positive integer" },
				{ path: "diagrams[0].grid.cols", message: "Required" },
			]);
		});
	});

	// ── Feature: Logging ────────────────────────────────────────────────────

	describe("Feature: Logging", () => {
		it("should log the diagram count at debug level", () => {
			const { logger, logs } = createTestLogger();
			parser.parse([{ type: "component" }, { type: "component" }], logger);

			expect(logs).toHaveLength(1);
			expect(JSON.stringify(logs[0])).toContain("Document parsed");
			expect(JSON.stringify(logs[0])).toContain('"count":2');
		});
	});
});

describe("Document settings", () => {
	it("should read canvas presets and millimetre sizes", () => {
		expect(parseCanvasSpec("4x3")).toEqual({ value: { kind: "preset", preset: "4x3" }, errors: [] });
		expect(parseCanvasSpec({ preset: "16x9" })).toEqual({ value: { kind: "preset", preset: "16x9" }, errors: [] });
		expect(parseCanvasSpec({ widthMm: 200, heightMm: 100 })).toEqual({
			value: { kind: "custom", widthMm: 200, heightMm: 100 },
			errors: [],
		});
	});

	it("should reject unknown canvas settings", () => {
		expect(parseCanvasSpec("A4")).toEqual({
			value: null,
			errors: [{ path: "canvas", message: 'Invalid value "A4". Expected one of: 16x9, 4x3' }],
		});
		expect(parseCanvasSpec({}).errors).toEqual([
			{ path: "canvas", message: "Expected a preset name (16x9, 4x3) or an object with widthMm and heightMm" },
		]);
	});

	it("should read themes and normalise palette colours", () => {
		expect(parseThemeSpec({ fontColor: "#333333", palette: ["#4472C4", "ED7D31"] })).toEqual({
			value: { fontColor: "#333333", palette: ["#4472C4", "#ED7D31"] },
			errors: [],
		});
		expect(parseThemeSpec({ palette: ["#4472C4", "blue"] })).toEqual({
			value: null,
			errors: [{ path: "theme.palette[1]", message: 'Invalid colour "blue". Expected #RRGGBB' }],
		});
	});

	it("should carry canvas and theme on the document", () => {
		const result = new DocumentParser().parse({ canvas: "4x3", theme: { fontColor: "#111111" }, diagrams: [] });

		expect(result.document).toEqual({
			canvas: { kind: "preset", preset: "4x3" },
			theme: { fontColor: "#111111" },
			diagrams: [],
		});
	});
});
