import {
    ShapeKind,
    type ShapeEmitter,
    type ShapeHandle,
    type TextHandle,
} from "@boxwire/emitter";
import { RenderWarnings, formatMessage } from "@boxwire/constants";
import {
    DEFAULT_GRID,
    isGridCell,
    labelRect,
    pt,
    resolveGridCell,
    resolveRect,
    routeConnector,
    type AbsoluteRect,
    type Canvas,
    type GridSpec,
} from "@boxwire/layout";
import type { AppLogObj, Logger } from "@boxwire/logger";
import {
    NodeKind,
    type Boundary,
    type ComponentDiagram,
    type DiagramConnector,
    type DiagramNode,
} from "@boxwire/parser";
import { DEFAULT_THEME, type Theme } from "./theme";
import type {
    ComponentRenderOptions,
    ComponentRenderResult,
    DrawnBoundary,
    RoutedConnector,
    SkippedConnector,
} from "./types";

/**
 * Shape drawn for each node kind.
 */
export const NODE_SHAPES: Record<NodeKind, ShapeKind> = {
    [NodeKind.USER]: ShapeKind.ROUND_CORNER_RECTANGLE,
    [NodeKind.RECT]: ShapeKind.RECTANGLE,
    [NodeKind.SYSTEM]: ShapeKind.ROUNDED_RECTANGLE,
    [NodeKind.DATABASE]: ShapeKind.CAN,
};

export const COMPONENT_STYLE = {
    userFill: "#F0F4FF",
    nodeFill: "#FFFFFF",
    nodeStroke: "#647896",
    boundaryStroke: "#647896",
    boundaryPaddingPt: 20,
    boundaryLinePt: 1.5,
    boundaryLabel: { offsetXPt: 5, offsetYPt: -15, widthPt: 200, heightPt: 20, fontSizePt: 11 },
    connectorLabel: { widthPt: 100, heightPt: 28, fontSizePt: 10 },
} as const;

/**
 * Known node kind for a raw kind string, if any.
 */
export function resolveNodeKind(kind: string): NodeKind | undefined {
    return Object.values(NodeKind).find((known) => known === kind);
}

/**
 * Absolute geometry of a node placed by percentage or by grid cell.
 */
export function resolveNodeRect(node: DiagramNode, grid: GridSpec, target: Canvas): AbsoluteRect {
    return isGridCell(node.pos) ? resolveGridCell(node.pos, grid, target) : resolveRect(node.pos, target);
}

/**
 * Draw a component diagram into `target`.
 *
 * All node geometry is resolved before anything is routed. Boundaries are
 * drawn first so they sit behind the nodes; connectors are drawn last in
 * input order. Connectors naming an unknown node are skipped and reported,
 * never thrown.
 */
export function renderComponentDiagram(
    diagram: ComponentDiagram,
    target: Canvas,
    emitter: ShapeEmitter,
    options: ComponentRenderOptions = {},
): ComponentRenderResult {
    const theme = options.theme ?? DEFAULT_THEME;
    const logger = options.logger;

    const grid = diagram.grid ?? DEFAULT_GRID;
    const placed = diagram.nodes.map((node) => ({ node, rect: resolveNodeRect(node, grid, target) }));
    const geometries = new Map<string, AbsoluteRect>();
    for (const { node, rect } of placed) {
        geometries.set(node.id, rect);
    }

    const boundaries: DrawnBoundary[] = [];
    for (const boundary of diagram.boundaries) {
        const drawn = drawBoundary(boundary, geometries, emitter, theme, logger);
        if (drawn) boundaries.push(drawn);
    }

    const shapes = new Map<string, ShapeHandle>();
    for (const { node, rect } of placed) {
        shapes.set(node.id, drawNode(node, rect, emitter, theme, logger));
    }

    const connectors: RoutedConnector[] = [];
    const skipped: SkippedConnector[] = [];
    diagram.connectors.forEach((connector, index) => {
        const from = geometries.get(connector.from);
        const to = geometries.get(connector.to);
        if (!from || !to) {
            const missing = [...new Set([connector.from, connector.to])].filter((id) => !geometries.has(id));
            skipped.push({ index, from: connector.from, to: connector.to, missing });
            logger?.warn(formatMessage(RenderWarnings.CONNECTOR_SKIPPED(index, missing)), { connector: index });
            return;
        }
        connectors.push(
            drawConnector(connector, index, from, to, shapes, emitter, theme, options.connectorMargin ?? 0),
        );
    });

    logger?.debug("Component diagram drawn", {
        count: diagram.nodes.length,
        connectors: connectors.length,
        skipped: skipped.length,
    });

    return { type: "component", geometries, shapes, boundaries, connectors, skipped };
}

function drawNode(
    node: DiagramNode,
    rect: AbsoluteRect,
    emitter: ShapeEmitter,
    theme: Theme,
    logger?: Logger<AppLogObj>,
): ShapeHandle {
    const known = resolveNodeKind(node.kind);
    if (known === undefined) {
        logger?.warn(formatMessage(RenderWarnings.UNKNOWN_NODE_KIND(node.id, node.kind)), { node: node.id });
    }
    const kind = known ?? NodeKind.RECT;

    const shape = emitter.addShape(NODE_SHAPES[kind], rect);
    emitter.setFill(shape, node.style.fill ?? (kind === NodeKind.USER ? COMPONENT_STYLE.userFill : COMPONENT_STYLE.nodeFill));
    emitter.setLine(shape, node.style.stroke ?? COMPONENT_STYLE.nodeStroke, node.style.strokePt, "solid");
    emitter.setText(shape, node.label, {
        fontSizePt: node.style.fontSize,
        color: node.style.fontColor ?? theme.fontColor,
        align: "center",
        verticalAnchor: "middle",
    });
    return shape;
}

function drawConnector(
    connector: DiagramConnector,
    index: number,
    from: AbsoluteRect,
    to: AbsoluteRect,
    shapes: Map<string, ShapeHandle>,
    emitter: ShapeEmitter,
    theme: Theme,
    margin: number,
): RoutedConnector {
    const routing = routeConnector(from, to, margin);
    const handle = emitter.addConnector(
        routing.connectorType,
        routing.startPoint,
        routing.endPoint,
        connector.style.arrowHead,
    );

    if (emitter.capabilities.anchoredConnectors) {
        const fromShape = shapes.get(connector.from);
        const toShape = shapes.get(connector.to);
        if (fromShape && toShape) {
            emitter.attachConnector(handle, fromShape, routing.beginSite, "begin");
            emitter.attachConnector(handle, toShape, routing.endSite, "end");
        }
    }

    emitter.setLine(handle, connector.style.color, connector.style.pt, connector.style.dash);

    const routed: RoutedConnector = { index, from: connector.from, to: connector.to, routing, handle };
    if (connector.label) {
        const { widthPt, heightPt, fontSizePt } = COMPONENT_STYLE.connectorLabel;
        routed.label = emitter.addTextBox(
            labelRect(routing.startPoint, routing.endPoint, pt(widthPt), pt(heightPt)),
            connector.label,
            { fontSizePt, color: theme.fontColor, align: "center", verticalAnchor: "middle" },
        );
    }
    return routed;
}

/**
 * Rounded, unfilled frame around the boundary's known nodes, padded on
 * every side, with an italic label just above its top-left corner.
 */
function drawBoundary(
    boundary: Boundary,
    geometries: Map<string, AbsoluteRect>,
    emitter: ShapeEmitter,
    theme: Theme,
    logger?: Logger<AppLogObj>,
): DrawnBoundary | undefined {
    const rects = boundary.nodes
        .map((id) => geometries.get(id))
        .filter((rect): rect is AbsoluteRect => rect !== undefined);
    if (rects.length === 0) {
        logger?.warn(formatMessage(RenderWarnings.BOUNDARY_EMPTY(boundary.label)));
        return undefined;
    }

    const padding = pt(COMPONENT_STYLE.boundaryPaddingPt);
    const minX = Math.min(...rects.map((r) => r.x));
    const minY = Math.min(...rects.map((r) => r.y));
    const maxX = Math.max(...rects.map((r) => r.x + r.w));
    const maxY = Math.max(...rects.map((r) => r.y + r.h));
    const rect: AbsoluteRect = {
        x: minX - padding,
        y: minY - padding,
        w: maxX - minX + 2 * padding,
        h: maxY - minY + 2 * padding,
    };

    const shape = emitter.addShape(ShapeKind.ROUNDED_RECTANGLE, rect);
    emitter.setFill(shape, null);
    emitter.setLine(shape, boundary.color ?? COMPONENT_STYLE.boundaryStroke, COMPONENT_STYLE.boundaryLinePt, boundary.style);

    const label = COMPONENT_STYLE.boundaryLabel;
    const labelBox: TextHandle = emitter.addTextBox(
        {
            x: rect.x + pt(label.offsetXPt),
            y: rect.y + pt(label.offsetYPt),
            w: pt(label.widthPt),
            h: pt(label.heightPt),
        },
        boundary.label,
        { fontSizePt: label.fontSizePt, italic: true, color: theme.fontColor, align: "left", verticalAnchor: "top" },
    );

    return { label: boundary.label, rect, shape, labelBox };
}
