/**
 * Shape Outlines
 *
 * Turns a SpotlightShape into a closed path and moves paths around the
 * viewport. Circles are rounded rectangles with a half-extent radius.
 */

import type { Offset, PathCommand, Size, SpotlightShape } from "@tourlight/core";
import type { Outline } from "./types";

/** Cubic Bézier handle length for a quarter circle */
const KAPPA = 0.5522847498;

function rectanglePath(width: number, height: number): Outline {
  return [
    { op: "moveTo", x: 0, y: 0 },
    { op: "lineTo", x: width, y: 0 },
    { op: "lineTo", x: width, y: height },
    { op: "lineTo", x: 0, y: height },
    { op: "close" },
  ];
}

function roundedRectanglePath(width: number, height: number, cornerRadius: number): Outline {
  const r = Math.min(Math.max(cornerRadius, 0), width / 2, height / 2);
  if (r === 0) {
    return rectanglePath(width, height);
  }
  const k = r * KAPPA;
  return [
    { op: "moveTo", x: r, y: 0 },
    { op: "lineTo", x: width - r, y: 0 },
    { op: "cubicTo", x1: width - r + k, y1: 0, x2: width, y2: r - k, x: width, y: r },
    { op: "lineTo", x: width, y: height - r },
    { op: "cubicTo", x1: width, y1: height - r + k, x2: width - r + k, y2: height, x: width - r, y: height },
    { op: "lineTo", x: r, y: height },
    { op: "cubicTo", x1: r - k, y1: height, x2: 0, y2: height - r + k, x: 0, y: height - r },
    { op: "lineTo", x: 0, y: r },
    { op: "cubicTo", x1: 0, y1: r - k, x2: r - k, y2: 0, x: r, y: 0 },
    { op: "close" },
  ];
}

/** Outline of `shape` at `size`, origin at its top-left corner */
export function shapeOutline(shape: SpotlightShape, size: Size): Outline {
  switch (shape.kind) {
    case "circle":
      return roundedRectanglePath(size.width, size.height, Math.min(size.width, size.height) / 2);
    case "rectangle":
      return rectanglePath(size.width, size.height);
    case "rounded-rectangle":
      return roundedRectanglePath(size.width, size.height, shape.cornerRadius);
    case "custom":
      return shape.path(size);
  }
}

/** Apply `transform` to every point of the path */
export function mapOutline(outline: Outline, transform: (x: number, y: number) => Offset): Outline {
  return outline.map((command): PathCommand => {
    switch (command.op) {
      case "moveTo":
      case "lineTo": {
        const p = transform(command.x, command.y);
        return { op: command.op, x: p.x, y: p.y };
      }
      case "quadTo": {
        const c = transform(command.x1, command.y1);
        const p = transform(command.x, command.y);
        return { op: "quadTo", x1: c.x, y1: c.y, x: p.x, y: p.y };
      }
      case "cubicTo": {
        const c1 = transform(command.x1, command.y1);
        const c2 = transform(command.x2, command.y2);
        const p = transform(command.x, command.y);
        return { op: "cubicTo", x1: c1.x, y1: c1.y, x2: c2.x, y2: c2.y, x: p.x, y: p.y };
      }
      case "close":
        return command;
    }
  });
}

export function translateOutline(outline: Outline, dx: number, dy: number): Outline {
  return mapOutline(outline, (x, y) => ({ x: x + dx, y: y + dy }));
}

/** Scale about `center` */
export function scaleOutline(outline: Outline, factor: number, center: Offset): Outline {
  return mapOutline(outline, (x, y) => ({
    x: center.x + (x - center.x) * factor,
    y: center.y + (y - center.y) * factor,
  }));
}

/** Number with at most three decimals, as written into path data */
export function formatNumber(value: number): string {
  const rounded = Number(value.toFixed(3));
  return Object.is(rounded, -0) ? "0" : String(rounded);
}

/** SVG `d` attribute for the path */
export function toSvgPathData(outline: Outline): string {
  return outline
    .map((command) => {
      switch (command.op) {
        case "moveTo":
          return `M${formatNumber(command.x)} ${formatNumber(command.y)}`;
        case "lineTo":
          return `L${formatNumber(command.x)} ${formatNumber(command.y)}`;
        case "quadTo":
          return `Q${[command.x1, command.y1, command.x, command.y].map(formatNumber).join(" ")}`;
        case "cubicTo":
          return `C${[command.x1, command.y1, command.x2, command.y2, command.x, command.y]
            .map(formatNumber)
            .join(" ")}`;
        case "close":
          return "Z";
      }
    })
    .join(" ");
}

