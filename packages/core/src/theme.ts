import type { ThemeSpec } from "@boxwire/parser";

/**
 * Resolved theme used while drawing.
 */
export interface Theme {
    /** Default text colour for labels and headers */
    fontColor: string;
    /** Column colours for box diagrams; empty means built-in fills */
    palette: string[];
}

export const DEFAULT_THEME: Theme = {
    fontColor: "#000000",
    palette: [],
};

/**
 * Layer theme settings over a base theme. Later settings win field by field.
 */
export function mergeTheme(base: Theme, ...overrides: (ThemeSpec | undefined)[]): Theme {
    let theme: Theme = { fontColor: base.fontColor, palette: [...base.palette] };
    for (const override of overrides) {
        if (!override) continue;
        theme = {
            fontColor: override.fontColor ?? theme.fontColor,
            palette: override.palette ? [...override.palette] : theme.palette,
        };
    }
    return theme;
}
