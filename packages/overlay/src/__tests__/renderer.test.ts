/**
 * Overlay SVG Renderer Tests
 */

import { describe, expect, it } from "vitest";
import { renderOverlaySvg } from "../renderer";
import type { RadialFrame, ShapeAdaptedFrame } from "../types";

const cutout: RadialFrame["cutout"] = [
  { op: "moveTo", x: 40, y: 20 },
  { op: "lineTo", x: 60, y: 20 },
  { op: "lineTo", x: 60, y: 30 },
  { op: "lineTo", x: 40, y: 30 },
  { op: "close" },
];

const radialFrame: RadialFrame = {
  mode: "radial",
  viewport: { width: 100, height: 50 },
  center: { x: 50, y: 25 },
  clearRadius: 10,
  gradientRadius: 35,
  stops: [
    { position: 0, color: { r: 0, g: 0, b: 0, a: 0 } },
    { position: 0.5, color: { r: 1, g: 0.5, b: 0, a: 0.25 } },
  ],
  cutout,
  blockers: [{ x: 0, y: 0, width: 100, height: 20 }],
};

describe("renderOverlaySvg", () => {
  it("renders a radial frame as a masked gradient with blockers", () => {
    expect(renderOverlaySvg(radialFrame, { idPrefix: "tour" })).toBe(
      [
        '<svg xmlns="http://www.w3.org/2000/svg" width="100" height="50" viewBox="0 0 100 50">',
        "<defs>",
        '<radialGradient id="tour-ripple" gradientUnits="userSpaceOnUse" cx="50" cy="25" r="35">',
        '<stop offset="0" stop-color="rgb(0,0,0)" stop-opacity="0"/>',
        '<stop offset="0.5" stop-color="rgb(255,128,0)" stop-opacity="0.25"/>',
        "</radialGradient>",
        '<mask id="tour-cutout">',
        '<rect width="100" height="50" fill="white"/>',
        '<path d="M40 20 L60 20 L60 30 L40 30 Z" fill="black"/>',
        "</mask>",
        "</defs>",
        '<rect width="100" height="50" fill="url(#tour-ripple)" mask="url(#tour-cutout)"/>',
        '<rect data-blocker="top" x="0" y="0" width="100" height="20" fill="transparent" pointer-events="all"/>',
        "</svg>",
      ].join("\n")
    );
  });

  it("renders shape layers inside the cutout mask", () => {
    const frame: ShapeAdaptedFrame = {
      ...radialFrame,
      mode: "shape-adapted",
      blockers: [],
      background: { r: 0, g: 0, b: 0, a: 0.5 },
      layers: [{ outline: cutout, color: { r: 0, g: 0, b: 0, a: 0.125 } }],
    };

    const lines = renderOverlaySvg(frame).split("\n");

    expect(lines).toContain('<g mask="url(#spotlight-cutout)">');
    expect(lines).toContain('<rect width="100" height="50" fill="rgb(0,0,0)" fill-opacity="0.5"/>');
    expect(lines).toContain('<path d="M40 20 L60 20 L60 30 L40 30 Z" fill="rgb(0,0,0)" fill-opacity="0.125"/>');
    expect(lines.some((line) => line.startsWith("<radialGradient"))).toBe(false);
  });

  it("strips characters outside the id alphabet from the prefix", () => {
    const svg = renderOverlaySvg(radialFrame, { idPrefix: 'a b"<c' });

    expect(svg.split("\n")).toContain('<mask id="abc-cutout">');
  });
});
