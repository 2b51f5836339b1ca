export {
	CONNECTOR_DEFAULTS,
	DocumentParser,
	FULL_CANVAS,
	NODE_DEFAULTS,
	parseCanvasSpec,
	parseThemeSpec,
} from "./document/parser";
export { NodeKind } from "./document/types";
export type {
	BoxDiagram,
	Boundary,
	CanvasPreset,
	CanvasSpec,
	ComponentDiagram,
	ConnectorStyle,
	Diagram,
	DiagramConnector,
	DiagramDocument,
	DiagramNode,
	FragmentResult,
	NodeStyle,
	ParseIssue,
	ParseResult,
	ThemeSpec,
} from "./document/types";
