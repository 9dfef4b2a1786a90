/**
 * Tooltip Placement
 *
 * Places a tooltip above or below its anchor and aligns it horizontally,
 * keeping it inside the window.
 */

import { clamp, type Offset, type Rect, type Size } from "@tourlight/core";

export type TooltipPosition = "TOP" | "BOTTOM" | "AUTO";
export type TooltipAlignment = "START" | "CENTER" | "END" | "AUTO";

/** Gap between anchor and tooltip */
export const DEFAULT_TOOLTIP_SPACING = 4;

export type TooltipPlacementOptions = {
  position?: TooltipPosition;
  alignment?: TooltipAlignment;
  spacing?: number;
};

function resolveAlignment(alignment: TooltipAlignment, anchor: Rect, window: Size): TooltipAlignment {
  if (alignment !== "AUTO") {
    return alignment;
  }
  const centerX = anchor.x + anchor.width / 2;
  const third = window.width / 3;
  if (centerX < third) {
    return "START";
  }
  if (centerX > third * 2) {
    return "END";
  }
  return "CENTER";
}

/**
 * Top-left corner of the tooltip.
 *
 * TOP and BOTTOM flip to the other side when the preferred one does not
 * fit; AUTO prefers the side facing the window's center.
 */
export function computeTooltipPosition(
  anchor: Rect,
  window: Size,
  popup: Size,
  options: TooltipPlacementOptions = {}
): Offset {
  const position = options.position ?? "AUTO";
  const spacing = options.spacing ?? DEFAULT_TOOLTIP_SPACING;
  const aboveY = anchor.y - popup.height - spacing;
  const belowY = anchor.y + anchor.height + spacing;
  const fitsAbove = aboveY >= 0;
  const fitsBelow = belowY + popup.height <= window.height;

  let preferAbove: boolean;
  switch (position) {
    case "TOP":
      preferAbove = true;
      break;
    case "BOTTOM":
      preferAbove = false;
      break;
    case "AUTO":
      preferAbove = anchor.y + anchor.height / 2 > window.height / 2;
      break;
  }
  const y = preferAbove ? (fitsAbove ? aboveY : belowY) : fitsBelow ? belowY : aboveY;

  let x: number;
  switch (resolveAlignment(options.alignment ?? "AUTO", anchor, window)) {
    case "START":
      x = anchor.x;
      break;
    case "END":
      x = anchor.x + anchor.width - popup.width;
      break;
    default:
      x = anchor.x + (anchor.width - popup.width) / 2;
  }

  return {
    x: clamp(x, 0, Math.max(window.width - popup.width, 0)),
    y: clamp(y, 0, Math.max(window.height - popup.height, 0)),
  };
}
