/**
 * Overlay Types
 *
 * Render-side view of a spotlight: ripple parameters, overlay configuration
 * and the per-frame geometry handed to a renderer.
 */

import type { Offset, PathCommand, Rect, Size } from "@tourlight/core";
import { z } from "zod";

/** RGBA color, every channel in [0, 1] */
export type Color = {
  r: number;
  g: number;
  b: number;
  a: number;
};

export const TRANSPARENT: Color = Object.freeze({ r: 0, g: 0, b: 0, a: 0 });
export const BLACK: Color = Object.freeze({ r: 0, g: 0, b: 0, a: 1 });

/** Color at a normalized position along the gradient radius */
export type ColorStop = {
  position: number;
  color: Color;
};

const ChannelSchema = z.number().min(0).max(1);

export const ColorSchema = z.object({
  r: ChannelSchema,
  g: ChannelSchema,
  b: ChannelSchema,
  a: ChannelSchema.default(1),
});

export const RippleEffectSchema = z.object({
  kind: z.literal("ripple").default("ripple"),
  /** Ring contrast; 0 renders a smooth ramp, out-of-range values are clamped */
  intensity: z
    .number()
    .default(1)
    .transform((value) => Math.min(Math.max(value, 0), 1)),
  color: ColorSchema.default(BLACK),
  animated: z.boolean().default(true),
  /** Duration of one ring expansion cycle */
  speedMs: z.number().positive().default(2400),
});

export type RippleEffect = z.output<typeof RippleEffectSchema>;
export type RippleEffectInput = z.input<typeof RippleEffectSchema>;
/** Effects the overlay can render; the ripple is the only one so far */
export type SpotlightEffect = RippleEffect;

export const OverlayConfigSchema = z.object({
  /** Alpha of the dim at and beyond the gradient radius */
  dimAlpha: z.number().min(0).max(1).default(0.5),
  /** Lower bound of the clear radius, so a zero-size zone still renders */
  minClearRadius: z.number().positive().default(4),
  /** Ripple band width as a multiple of the clear radius */
  rippleExtentFactor: z.number().positive().default(2.5),
  /** Concentric outlines drawn in shape-adapted mode */
  layerCount: z.number().int().min(2).default(40),
});

export type OverlayConfig = z.output<typeof OverlayConfigSchema>;
export type OverlayConfigInput = z.input<typeof OverlayConfigSchema>;

export const DEFAULT_OVERLAY_CONFIG: OverlayConfig = OverlayConfigSchema.parse({});
export const DEFAULT_RIPPLE_EFFECT: RippleEffect = RippleEffectSchema.parse({});

/** Closed path in viewport coordinates */
export type Outline = PathCommand[];

/** One concentric outline of the shape-adapted mode */
export type OutlineLayer = {
  outline: Outline;
  color: Color;
};

type FrameBase = {
  viewport: Size;
  center: Offset;
  clearRadius: number;
  gradientRadius: number;
  stops: ColorStop[];
  /** Padded zone outline that is cleared to full transparency */
  cutout: Outline;
  /** Input-consuming rectangles around the zone; empty without forced navigation */
  blockers: Rect[];
};

export type RadialFrame = FrameBase & {
  mode: "radial";
};

export type ShapeAdaptedFrame = FrameBase & {
  mode: "shape-adapted";
  /** Fill behind the layers */
  background: Color;
  /** Outermost first */
  layers: OutlineLayer[];
};

/** Everything a renderer needs for one animation frame */
export type OverlayFrame = RadialFrame | ShapeAdaptedFrame;
