/**
 * Canvas unit conversions. The canvas unit is the English Metric Unit.
 */

export const EMU_PER_INCH = 914400;
export const EMU_PER_POINT = 12700;
export const EMU_PER_MM = 36000;
/** One CSS pixel at 96 dpi */
export const EMU_PER_PIXEL = 9525;

export function pt(points: number): number {
  return Math.round(points * EMU_PER_POINT);
}

export function inches(value: number): number {
  return Math.round(value * EMU_PER_INCH);
}

export function mm(value: number): number {
  return Math.round(value * EMU_PER_MM);
}

export function toPixels(emu: number): number {
  return emu / EMU_PER_PIXEL;
}
