import { inches, mm, type Canvas } from "@boxwire/layout";
import type { CanvasPreset, CanvasSpec } from "@boxwire/parser";

/**
 * Slide sizes: 10in wide, 5.625in (16:9) or 7.5in (4:3) high.
 */
export const CANVAS_PRESETS: Record<CanvasPreset, { width: number; height: number }> = {
    "16x9": { width: inches(10), height: inches(5.625) },
    "4x3": { width: inches(10), height: inches(7.5) },
};

export const DEFAULT_CANVAS_PRESET: CanvasPreset = "16x9";

/**
 * Canvas in EMU with its origin at (0, 0).
 */
export function resolveCanvas(spec?: CanvasSpec): Canvas {
    if (spec?.kind === "custom") {
        return { left: 0, top: 0, width: mm(spec.widthMm), height: mm(spec.heightMm) };
    }
    const size = CANVAS_PRESETS[spec?.preset ?? DEFAULT_CANVAS_PRESET];
    return { left: 0, top: 0, width: size.width, height: size.height };
}
