import { contrastColor, mixWithWhite } from "@boxwire/color";
import { ShapeKind, type ShapeEmitter, type ShapeHandle, type TextHandle } from "@boxwire/emitter";
import { layoutBoxTree, type Canvas } from "@boxwire/layout";
import type { BoxDiagram } from "@boxwire/parser";
import { DEFAULT_THEME, type Theme } from "./theme";
import type { BoxRenderResult, RenderOptions } from "./types";

export const BOX_STYLE = {
    firstColumnFill: "#DDEBF7",
    otherColumnFill: "#F2F2F2",
    /** Share of white blended into palette colours */
    paletteWhiteRatio: 0.7,
    nameFontPt: 12,
    /** Columns up to this index get bold names */
    boldThroughColumn: 1,
    headerFontPt: 10,
} as const;

/**
 * Fill for a column: the theme palette (cycled, pastel) when there is one,
 * light blue for column 0 and light grey elsewhere otherwise.
 */
export function columnFill(column: number, theme: Theme): string {
    if (theme.palette.length > 0) {
        return mixWithWhite(theme.palette[column % theme.palette.length], BOX_STYLE.paletteWhiteRatio);
    }
    return column === 0 ? BOX_STYLE.firstColumnFill : BOX_STYLE.otherColumnFill;
}

/**
 * Draw a box-tree diagram into `target`: optional column headers, then one
 * rounded, outline-free box per layout placement.
 */
export function renderBoxDiagram(
    diagram: BoxDiagram,
    target: Canvas,
    emitter: ShapeEmitter,
    options: RenderOptions = {},
): BoxRenderResult {
    const theme = options.theme ?? DEFAULT_THEME;
    const layout = layoutBoxTree(diagram.root, target, {
        headers: diagram.columnHeaders,
        maxColumns: diagram.maxColumns,
    });

    const headers: TextHandle[] = layout.headers.map((header) =>
        emitter.addTextBox(header.rect, header.text, {
            fontSizePt: BOX_STYLE.headerFontPt,
            bold: true,
            color: theme.fontColor,
            align: "center",
            verticalAnchor: "middle",
        }),
    );

    const shapes: ShapeHandle[] = layout.boxes.map((box) => {
        const fill = columnFill(box.column, theme);
        const shape = emitter.addShape(ShapeKind.ROUNDED_RECTANGLE, box.rect);
        emitter.setFill(shape, fill);
        emitter.setLine(shape, null, 0);
        emitter.setText(shape, box.node.name, {
            fontSizePt: BOX_STYLE.nameFontPt,
            bold: box.column <= BOX_STYLE.boldThroughColumn,
            color: contrastColor(fill),
            align: "center",
            verticalAnchor: "middle",
        });
        return shape;
    });

    options.logger?.debug("Box diagram drawn", {
        count: layout.boxes.length,
        columns: layout.columns.length,
    });

    return { type: "boxes", layout, shapes, headers };
}
