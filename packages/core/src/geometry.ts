/**
 * Screen-space geometry shared by the controller and the overlay.
 * All values are in layout pixels, origin at the top-left of the viewport.
 */

export type Offset = {
  x: number;
  y: number;
};

export type Size = {
  width: number;
  height: number;
};

export type Rect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export const ZERO_OFFSET: Offset = Object.freeze({ x: 0, y: 0 });
export const ZERO_SIZE: Size = Object.freeze({ width: 0, height: 0 });

/** Path command for custom cutout outlines */
export type PathCommand =
  | { op: "moveTo"; x: number; y: number }
  | { op: "lineTo"; x: number; y: number }
  | { op: "quadTo"; x1: number; y1: number; x: number; y: number }
  | { op: "cubicTo"; x1: number; y1: number; x2: number; y2: number; x: number; y: number }
  | { op: "close" };

/** Cutout shape of a spotlight zone */
export type SpotlightShape =
  | { kind: "circle" }
  | { kind: "rectangle" }
  | { kind: "rounded-rectangle"; cornerRadius: number }
  | { kind: "custom"; path: (size: Size) => PathCommand[] };

export const CircleShape: SpotlightShape = Object.freeze({ kind: "circle" });
export const RectangleShape: SpotlightShape = Object.freeze({ kind: "rectangle" });

export function roundedRectangleShape(cornerRadius: number): SpotlightShape {
  return { kind: "rounded-rectangle", cornerRadius };
}

export function customShape(path: (size: Size) => PathCommand[]): SpotlightShape {
  return { kind: "custom", path };
}

export function rectFrom(offset: Offset, size: Size): Rect {
  return { x: offset.x, y: offset.y, width: size.width, height: size.height };
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
