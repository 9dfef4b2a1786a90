/**
 * Overlay SVG Renderer
 *
 * Serialises an OverlayFrame to a standalone SVG document for hosts that
 * render through the DOM. Blockers become transparent rects that take
 * pointer input.
 */

import type { Rect } from "@tourlight/core";
import { formatNumber, toSvgPathData } from "./outline";
import type { Color, ColorStop, OverlayFrame } from "./types";

export type SvgRenderOptions = {
  /** Prefix of gradient and mask ids; keep it unique per document */
  idPrefix?: string;
};

const BLOCKER_NAMES = ["top", "bottom", "left", "right"] as const;

function rgb(color: Color): string {
  const channel = (value: number) => Math.round(value * 255);
  return `rgb(${channel(color.r)},${channel(color.g)},${channel(color.b)})`;
}

function renderStop(stop: ColorStop): string {
  return `<stop offset="${formatNumber(stop.position)}" stop-color="${rgb(stop.color)}" stop-opacity="${formatNumber(stop.color.a)}"/>`;
}

function renderBlocker(rect: Rect, index: number): string {
  const name = BLOCKER_NAMES[index] ?? String(index);
  return `<rect data-blocker="${name}" x="${formatNumber(rect.x)}" y="${formatNumber(rect.y)}" width="${formatNumber(rect.width)}" height="${formatNumber(rect.height)}" fill="transparent" pointer-events="all"/>`;
}

/**
 * Render a frame as SVG markup
 */
export function renderOverlaySvg(frame: OverlayFrame, options: SvgRenderOptions = {}): string {
  const prefix = (options.idPrefix ?? "spotlight").replace(/[^A-Za-z0-9_-]/g, "");
  const width = formatNumber(frame.viewport.width);
  const height = formatNumber(frame.viewport.height);
  const maskId = `${prefix}-cutout`;

  const defs: string[] = [
    `<mask id="${maskId}">`,
    `<rect width="${width}" height="${height}" fill="white"/>`,
    `<path d="${toSvgPathData(frame.cutout)}" fill="black"/>`,
    "</mask>",
  ];
  const body: string[] = [];

  if (frame.mode === "radial") {
    const gradientId = `${prefix}-ripple`;
    defs.unshift(
      `<radialGradient id="${gradientId}" gradientUnits="userSpaceOnUse" cx="${formatNumber(frame.center.x)}" cy="${formatNumber(frame.center.y)}" r="${formatNumber(frame.gradientRadius)}">`,
      ...frame.stops.map(renderStop),
      "</radialGradient>"
    );
    body.push(`<rect width="${width}" height="${height}" fill="url(#${gradientId})" mask="url(#${maskId})"/>`);
  } else {
    body.push(`<g mask="url(#${maskId})">`);
    body.push(
      `<rect width="${width}" height="${height}" fill="${rgb(frame.background)}" fill-opacity="${formatNumber(frame.background.a)}"/>`
    );
    for (const layer of frame.layers) {
      body.push(
        `<path d="${toSvgPathData(layer.outline)}" fill="${rgb(layer.color)}" fill-opacity="${formatNumber(layer.color.a)}"/>`
      );
    }
    body.push("</g>");
  }

  body.push(...frame.blockers.map(renderBlocker));

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    "<defs>",
    ...defs,
    "</defs>",
    ...body,
    "</svg>",
  ].join("\n");
}
