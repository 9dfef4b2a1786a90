import { clamp, type Rect, type Size } from "@tourlight/core";

/**
 * Four input-consuming strips around `hole`: full-width top and bottom,
 * hole-height left and right. Together with the clamped hole they tile the
 * viewport without overlap; strips may have zero area.
 */
export function computeTouchBlockers(hole: Rect, viewport: Size): Rect[] {
  const left = clamp(hole.x, 0, viewport.width);
  const top = clamp(hole.y, 0, viewport.height);
  const right = clamp(hole.x + hole.width, left, viewport.width);
  const bottom = clamp(hole.y + hole.height, top, viewport.height);
  const holeHeight = bottom - top;

  return [
    { x: 0, y: 0, width: viewport.width, height: top },
    { x: 0, y: bottom, width: viewport.width, height: viewport.height - bottom },
    { x: 0, y: top, width: left, height: holeHeight },
    { x: right, y: top, width: viewport.width - right, height: holeHeight },
  ];
}
