/**
 * Ripple Gradient
 *
 * Radial color stops of the dim overlay. Positions are normalized to the
 * gradient radius: [0, r] is fully transparent, (r, 1] is the ripple band
 * where four staggered rings travel outward, and the dim settles at
 * `dimAlpha` at position 1.
 */

import type { Size, SpotlightShape } from "@tourlight/core";
import type { Color, ColorStop, OverlayConfig, RippleEffect } from "./types";

type Ring = {
  /** Brightness added at the ring's crest */
  peakOffset: number;
  /** Brightness removed just behind the crest */
  troughOffset: number;
};

const RINGS: readonly Ring[] = [
  { peakOffset: 0.02, troughOffset: 0.06 },
  { peakOffset: 0.04, troughOffset: 0.09 },
  { peakOffset: 0.05, troughOffset: 0.1 },
  { peakOffset: 0.04, troughOffset: 0.07 },
];

const RING_START = 0.04;
const RING_TRAVEL = 0.82;
const TROUGH_GAP = 0.1;
const FADE_SPAN = 0.15;

/**
 * Radius of the transparent disk around the zone center. Circles use half
 * the width; every other shape uses the half-diagonal so the disk encloses
 * the cutout.
 */
export function computeClearRadius(
  shape: SpotlightShape,
  size: Size,
  padding: number,
  minClearRadius: number
): number {
  const raw =
    shape.kind === "circle"
      ? size.width / 2
      : Math.sqrt((size.width / 2) ** 2 + (size.height / 2) ** 2);
  return Math.max(raw + padding, minClearRadius);
}

export function computeGradientRadius(clearRadius: number, config: Pick<OverlayConfig, "rippleExtentFactor">): number {
  return clearRadius + clearRadius * config.rippleExtentFactor;
}

/** Animation phase in [0, 1); fixed at 0 for a static ripple */
export function ripplePhase(effect: Pick<RippleEffect, "animated" | "speedMs">, elapsedMs: number): number {
  if (!effect.animated || elapsedMs <= 0) {
    return 0;
  }
  return (elapsedMs % effect.speedMs) / effect.speedMs;
}

/** Triangular fade over a ring's lifecycle position */
export function rippleEnvelope(lifecycle: number): number {
  if (lifecycle < FADE_SPAN) {
    return lifecycle / FADE_SPAN;
  }
  if (lifecycle > 1 - FADE_SPAN) {
    return (1 - lifecycle) / FADE_SPAN;
  }
  return 1;
}

function withAlpha(color: Color, alpha: number): Color {
  return { r: color.r, g: color.g, b: color.b, a: alpha };
}

/**
 * @param r - clearRadius / gradientRadius
 * @param phase - from ripplePhase()
 */
export function buildRippleColorStops(
  r: number,
  phase: number,
  dimAlpha: number,
  effect: Pick<RippleEffect, "intensity" | "color">
): ColorStop[] {
  const band = 1 - r;
  const ringStops: ColorStop[] = [];

  RINGS.forEach((ring, index) => {
    const lifecycle = (phase + (index + 0.5) / RINGS.length) % 1;
    const strength = effect.intensity * rippleEnvelope(lifecycle);
    const peakPos = RING_START + lifecycle * RING_TRAVEL;
    const troughPos = peakPos + TROUGH_GAP;

    ringStops.push({
      position: r + band * peakPos,
      color: withAlpha(effect.color, Math.min(dimAlpha * peakPos + ring.peakOffset * strength, 1)),
    });
    ringStops.push({
      position: r + band * troughPos,
      color: withAlpha(effect.color, Math.max(dimAlpha * troughPos - ring.troughOffset * strength, 0)),
    });
  });

  ringStops.sort((a, b) => a.position - b.position);

  return [
    { position: 0, color: withAlpha(effect.color, 0) },
    { position: r, color: withAlpha(effect.color, 0) },
    ...ringStops,
    { position: 1, color: withAlpha(effect.color, dimAlpha) },
  ];
}

function lerp(from: number, to: number, t: number): number {
  return from + (to - from) * t;
}

/**
 * Color at `position`, interpolated channel by channel between the nearest
 * enclosing stops. Stops must be sorted by position.
 */
export function sampleColorStops(stops: readonly ColorStop[], position: number): Color {
  const first = stops[0];
  const last = stops[stops.length - 1];
  if (!first || !last) {
    return { r: 0, g: 0, b: 0, a: 0 };
  }
  if (position <= first.position) {
    return { ...first.color };
  }
  if (position >= last.position) {
    return { ...last.color };
  }

  for (let i = 1; i < stops.length; i++) {
    const upper = stops[i];
    const lower = stops[i - 1];
    if (!upper || !lower || position > upper.position) {
      continue;
    }
    const span = upper.position - lower.position;
    const t = span === 0 ? 1 : (position - lower.position) / span;
    return {
      r: lerp(lower.color.r, upper.color.r, t),
      g: lerp(lower.color.g, upper.color.g, t),
      b: lerp(lower.color.b, upper.color.b, t),
      a: lerp(lower.color.a, upper.color.a, t),
    };
  }
  return { ...last.color };
}
