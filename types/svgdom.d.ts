// svgdom ships without type declarations and has no @types package.
declare module 'svgdom' {
  export function createSVGWindow(): Window;
}
