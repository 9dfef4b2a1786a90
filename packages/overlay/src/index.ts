/**
 * @tourlight/overlay
 *
 * Dim overlay of a spotlight tour:
 * - Shape outlines and cutout
 * - Ripple color stops and sampling
 * - Radial and shape-adapted frames
 * - Forced-navigation touch blockers
 * - Tooltip placement
 * - SVG serialisation
 */

// Types
export * from "./types";

export { parseOverlayConfig, parseRippleEffect } from "./config";
export {
  formatNumber,
  mapOutline,
  scaleOutline,
  shapeOutline,
  toSvgPathData,
  translateOutline,
} from "./outline";
export {
  buildRippleColorStops,
  computeClearRadius,
  computeGradientRadius,
  rippleEnvelope,
  ripplePhase,
  sampleColorStops,
} from "./ripple";
export { computeTouchBlockers } from "./touchBlockers";
export { computeOverlayFrame, type OverlayFrameInput } from "./overlayGeometry";
export {
  DEFAULT_TOOLTIP_SPACING,
  computeTooltipPosition,
  type TooltipAlignment,
  type TooltipPlacementOptions,
  type TooltipPosition,
} from "./tooltipPosition";
export { renderOverlaySvg, type SvgRenderOptions } from "./renderer";

// Controller
export {
  OverlayController,
  createOverlayController,
  type OverlayControllerEvents,
  type OverlayControllerOptions,
  type SpotlightSource,
} from "./overlayController";
