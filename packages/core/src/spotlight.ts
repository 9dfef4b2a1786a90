import type { Offset, Size, SpotlightShape } from "./geometry";
import { RectangleShape, ZERO_OFFSET, ZERO_SIZE } from "./geometry";

/** Whether the dimming overlay renders */
export type DimState = "STOPPED" | "RUNNING";

/** Default padding between a zone's bounds and its cutout */
export const DEFAULT_SPOTLIGHT_PADDING = 4;

/**
 * Published geometry of the current spotlight.
 * Snapshots are frozen; the render path only ever reads them.
 */
export type SpotlightLocation = Readonly<{
  offset: Offset;
  size: Size;
  shape: SpotlightShape;
  forcedNavigation: boolean;
  adaptComponentShape: boolean;
  spotlightPadding: number;
}>;

export function createSpotlightLocation(
  partial: Partial<SpotlightLocation> = {}
): SpotlightLocation {
  return Object.freeze({
    offset: partial.offset ?? ZERO_OFFSET,
    size: partial.size ?? ZERO_SIZE,
    shape: partial.shape ?? RectangleShape,
    forcedNavigation: partial.forcedNavigation ?? false,
    adaptComponentShape: partial.adaptComponentShape ?? false,
    spotlightPadding: partial.spotlightPadding ?? DEFAULT_SPOTLIGHT_PADDING,
  });
}
