import { ColorError, ColorErrorCode, type Rgb } from "./types";

const HEX_PATTERN = /^#?[0-9a-fA-F]{6}$/;

export const BLACK = "#000000";
export const WHITE = "#FFFFFF";

export function isHexColor(value: string): boolean {
	return HEX_PATTERN.test(value);
}

export function hexToRgb(hex: string): Rgb {
	if (!isHexColor(hex)) {
		throw new ColorError(ColorErrorCode.INVALID_HEX, `Invalid hex colour "${hex}". Expected #RRGGBB`, hex);
	}
	const digits = hex.startsWith("#") ? hex.slice(1) : hex;
	return [
		Number.parseInt(digits.slice(0, 2), 16),
		Number.parseInt(digits.slice(2, 4), 16),
		Number.parseInt(digits.slice(4, 6), 16),
	];
}

function channel(value: number): number {
	return Math.max(0, Math.min(255, Math.trunc(value)));
}

/**
 * Channels are truncated and clamped to 0-255; output is upper-case.
 */
export function rgbToHex(r: number, g: number, b: number): string {
	return `#${[r, g, b]
		.map((c) => channel(c).toString(16).padStart(2, "0"))
		.join("")
		.toUpperCase()}`;
}

/**
 * Pastel variant: blend `ratio` of white into the colour.
 */
export function mixWithWhite(hex: string, ratio = 0.7): string {
	const [r, g, b] = hexToRgb(hex);
	return rgbToHex(r + (255 - r) * ratio, g + (255 - g) * ratio, b + (255 - b) * ratio);
}

/**
 * Relative luminance (ITU-R BT.709) in 0-1.
 */
export function luminance(hex: string): number {
	const [r, g, b] = hexToRgb(hex);
	return (0.2126 * r + 0.7152 * g + 0.0722 * b) / 255;
}

/**
 * Black text on light backgrounds, white on dark ones.
 */
export function contrastColor(backgroundHex: string): string {
	return luminance(backgroundHex) > 0.5 ? BLACK : WHITE;
}
