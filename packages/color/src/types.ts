/**
 * Red, green, blue channels in 0-255.
 */
export type Rgb = readonly [number, number, number];

export enum ColorErrorCode {
	INVALID_HEX = "INVALID_HEX",
}

export class ColorError extends Error {
	constructor(
		public readonly code: ColorErrorCode,
		message: string,
		public readonly value: unknown
	) {
		super(message);
		this.name = "ColorError";
	}
}
