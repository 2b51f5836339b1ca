export {
	BLACK,
	WHITE,
	contrastColor,
	hexToRgb,
	isHexColor,
	luminance,
	mixWithWhite,
	rgbToHex,
} from "./color";
export { ColorError, ColorErrorCode } from "./types";
export type { Rgb } from "./types";
