import type { ShapeEmitter } from "@boxwire/emitter";
import { resolveRect, toCanvas } from "@boxwire/layout";
import { diagramLogger } from "@boxwire/logger";
import type { Diagram, DiagramDocument } from "@boxwire/parser";
import { renderBoxDiagram } from "./box-diagram";
import { resolveCanvas } from "./canvas";
import { renderComponentDiagram } from "./component-diagram";
import { DEFAULT_THEME, mergeTheme } from "./theme";
import type { DiagramRenderResult, DocumentRenderOptions, DocumentRenderResult } from "./types";

/**
 * Id used for logs and results: the diagram's own id, or `<type>-<n>`
 * where n is its 1-based position in the document.
 */
export function diagramId(diagram: Diagram, position: number): string {
    return diagram.id ?? `${diagram.type}-${position + 1}`;
}

/**
 * Draw every diagram of a document onto one emitter.
 *
 * Diagrams are drawn in ascending zIndex; equal zIndex keeps document
 * order. Each diagram's `pos` is resolved against the canvas and used as
 * the target rectangle for its renderer.
 */
export function renderDocument(
    document: DiagramDocument,
    emitter: ShapeEmitter,
    options: DocumentRenderOptions = {},
): DocumentRenderResult {
    const canvas = options.canvas ?? resolveCanvas(document.canvas);
    const theme = mergeTheme(options.baseTheme ?? DEFAULT_THEME, document.theme);
    const logger = options.logger;

    const order = document.diagrams
        .map((diagram, position) => ({ diagram, position }))
        .sort((a, b) => a.diagram.zIndex - b.diagram.zIndex || a.position - b.position);

    const diagrams: DiagramRenderResult[] = [];
    for (const { diagram, position } of order) {
        const id = diagramId(diagram, position);
        const target = toCanvas(resolveRect(diagram.pos, canvas));
        const scoped = logger ? diagramLogger(logger, id) : undefined;

        if (diagram.type === "component") {
            const result = renderComponentDiagram(diagram, target, emitter, { theme, logger: scoped });
            diagrams.push({ ...result, id, target });
        } else {
            const result = renderBoxDiagram(diagram, target, emitter, { theme, logger: scoped });
            diagrams.push({ ...result, id, target });
        }
        scoped?.info(`Rendered ${diagram.type} diagram`, { diagram: id });
    }

    return { canvas, theme, diagrams };
}
