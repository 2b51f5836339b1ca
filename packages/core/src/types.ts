import type { ConnectorHandle, ShapeHandle, TextHandle } from "@boxwire/emitter";
import type { AbsoluteRect, BoxTreeLayout, Canvas, RoutingResult } from "@boxwire/layout";
import type { AppLogObj, Logger } from "@boxwire/logger";
import type { Theme } from "./theme";

/**
 * Options shared by the diagram renderers.
 */
export interface RenderOptions {
    /** Defaults to DEFAULT_THEME */
    theme?: Theme;
    logger?: Logger<AppLogObj>;
}

export interface ComponentRenderOptions extends RenderOptions {
    /**
     * Distance (EMU) straight connectors stop short of the facing edges.
     * Defaults to 0.
     */
    connectorMargin?: number;
}

export interface RoutedConnector {
    /** Position in the diagram's connector list */
    index: number;
    from: string;
    to: string;
    routing: RoutingResult;
    handle: ConnectorHandle;
    label?: TextHandle;
}

export interface SkippedConnector {
    index: number;
    from: string;
    to: string;
    /** Endpoint ids with no matching node */
    missing: string[];
}

export interface DrawnBoundary {
    label: string;
    rect: AbsoluteRect;
    shape: ShapeHandle;
    labelBox: TextHandle;
}

export interface ComponentRenderResult {
    type: "component";
    /** Absolute node geometry by node id */
    geometries: Map<string, AbsoluteRect>;
    shapes: Map<string, ShapeHandle>;
    boundaries: DrawnBoundary[];
    connectors: RoutedConnector[];
    skipped: SkippedConnector[];
}

export interface BoxRenderResult {
    type: "boxes";
    layout: BoxTreeLayout;
    /** One shape per layout box, same order */
    shapes: ShapeHandle[];
    headers: TextHandle[];
}

export type DiagramRenderResult = (ComponentRenderResult | BoxRenderResult) & {
    /** Diagram id, or `<type>-<n>` from its document position */
    id: string;
    target: Canvas;
};

export interface DocumentRenderOptions {
    /** Replaces the document's own canvas setting */
    canvas?: Canvas;
    /** Settings the document's theme is layered over */
    baseTheme?: Theme;
    logger?: Logger<AppLogObj>;
}

export interface DocumentRenderResult {
    canvas: Canvas;
    theme: Theme;
    /** In drawing order */
    diagrams: DiagramRenderResult[];
}
