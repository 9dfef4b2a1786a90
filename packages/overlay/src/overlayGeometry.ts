/**
 * Overlay Geometry
 *
 * Per-frame geometry of the dim overlay: gradient stops, cutout, the
 * concentric layers of the shape-adapted mode and the forced-navigation
 * touch blockers. Pure; the render path calls it every animation frame.
 */

import { type DimState, rectFrom, type Size, type SpotlightLocation } from "@tourlight/core";
import { scaleOutline, shapeOutline, translateOutline } from "./outline";
import {
  buildRippleColorStops,
  computeClearRadius,
  computeGradientRadius,
  ripplePhase,
  sampleColorStops,
} from "./ripple";
import { computeTouchBlockers } from "./touchBlockers";
import {
  DEFAULT_OVERLAY_CONFIG,
  DEFAULT_RIPPLE_EFFECT,
  type OutlineLayer,
  type OverlayConfig,
  type OverlayFrame,
  type RippleEffect,
} from "./types";

export type OverlayFrameInput = {
  location: SpotlightLocation;
  dimState: DimState;
  viewport: Size;
  effect?: RippleEffect;
  config?: OverlayConfig;
  /** Time since the ripple animation started */
  elapsedMs?: number;
};

/** Frame to draw, or null while dimming is stopped */
export function computeOverlayFrame(input: OverlayFrameInput): OverlayFrame | null {
  if (input.dimState !== "RUNNING") {
    return null;
  }

  const config = input.config ?? DEFAULT_OVERLAY_CONFIG;
  const effect = input.effect ?? DEFAULT_RIPPLE_EFFECT;
  const { offset, size, shape, spotlightPadding: padding } = input.location;

  const center = { x: offset.x + size.width / 2, y: offset.y + size.height / 2 };
  const clearRadius = computeClearRadius(shape, size, padding, config.minClearRadius);
  const gradientRadius = computeGradientRadius(clearRadius, config);
  const stops = buildRippleColorStops(
    clearRadius / gradientRadius,
    ripplePhase(effect, input.elapsedMs ?? 0),
    config.dimAlpha,
    effect
  );

  const paddedSize = { width: size.width + padding * 2, height: size.height + padding * 2 };
  const cutout = translateOutline(shapeOutline(shape, paddedSize), offset.x - padding, offset.y - padding);
  const blockers = input.location.forcedNavigation
    ? computeTouchBlockers(rectFrom(offset, size), input.viewport)
    : [];

  const base = { viewport: input.viewport, center, clearRadius, gradientRadius, stops, cutout, blockers };

  if (!input.location.adaptComponentShape) {
    return { mode: "radial", ...base };
  }

  const layers: OutlineLayer[] = [];
  const steps = config.layerCount - 1;
  for (let k = 0; k <= steps; k++) {
    const radius = gradientRadius - ((gradientRadius - clearRadius) * k) / steps;
    layers.push({
      outline: scaleOutline(cutout, radius / clearRadius, center),
      color: sampleColorStops(stops, radius / gradientRadius),
    });
  }

  return {
    mode: "shape-adapted",
    ...base,
    background: sampleColorStops(stops, 1),
    layers,
  };
}
