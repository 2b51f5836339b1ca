export { renderBoxDiagram, columnFill, BOX_STYLE } from "./box-diagram";
export { CANVAS_PRESETS, DEFAULT_CANVAS_PRESET, resolveCanvas } from "./canvas";
export {
    renderComponentDiagram,
    resolveNodeKind,
    resolveNodeRect,
    COMPONENT_STYLE,
    NODE_SHAPES,
} from "./component-diagram";
export { renderDocument, diagramId } from "./document";
export { DEFAULT_THEME, mergeTheme } from "./theme";
export type { Theme } from "./theme";
export type {
    BoxRenderResult,
    ComponentRenderOptions,
    ComponentRenderResult,
    DiagramRenderResult,
    DocumentRenderOptions,
    DocumentRenderResult,
    DrawnBoundary,
    RenderOptions,
    RoutedConnector,
    SkippedConnector,
} from "./types";
