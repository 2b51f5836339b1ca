/**
 * Headless svg.js canvas backed by an svgdom window.
 */

import { SVG, registerWindow, type Svg } from '@svgdotjs/svg.js';
import { createSVGWindow } from 'svgdom';

export interface SvgContext {
  canvas: Svg;
  toSvg(): string;
  dispose(): void;
}

export function createSvgContext(width: number, height: number): SvgContext {
  const window = createSVGWindow();
  const document = window.document;
  registerWindow(window, document);

  const canvas = SVG().addTo(document.documentElement).size(width, height);

  return {
    canvas,
    toSvg: () => canvas.svg(),
    dispose: () => {
      canvas.remove();
    },
  };
}
