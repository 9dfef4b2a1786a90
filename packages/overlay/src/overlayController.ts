/**
 * Overlay Controller
 *
 * Render-side observer of a spotlight controller. Holds the viewport and
 * effect, tracks the ripple clock and produces a frame on demand.
 * Platform-agnostic: drawing is done by the UI layer.
 */

import {
  type DimState,
  getLogger,
  type ReadonlyObservable,
  type Size,
  type SpotlightLocation,
  type SpotlightLogger,
  type Unsubscribe,
} from "@tourlight/core";
import { parseOverlayConfig, parseRippleEffect } from "./config";
import { computeOverlayFrame } from "./overlayGeometry";
import { renderOverlaySvg, type SvgRenderOptions } from "./renderer";
import type { OverlayConfig, OverlayConfigInput, OverlayFrame, RippleEffect, RippleEffectInput } from "./types";

/** Streams the overlay reads; a SpotlightController satisfies this */
export type SpotlightSource = {
  readonly dimState: ReadonlyObservable<DimState>;
  readonly location: ReadonlyObservable<SpotlightLocation>;
};

/** Overlay controller events, keyed by payload */
export type OverlayControllerEvents = {
  visibilityChange: boolean;
  locationChange: SpotlightLocation;
};

type ListenerMap = {
  [K in keyof OverlayControllerEvents]: Set<(payload: OverlayControllerEvents[K]) => void>;
};

export type OverlayControllerOptions = {
  viewport?: Size;
  effect?: RippleEffectInput;
  config?: OverlayConfigInput;
  logger?: SpotlightLogger;
  /** Clock of the ripple animation */
  now?: () => number;
};

export class OverlayController {
  private readonly source: SpotlightSource;
  private readonly config: OverlayConfig;
  private readonly logger: SpotlightLogger;
  private readonly now: () => number;
  private effect: RippleEffect;
  private viewport: Size;
  private animationStartedAt: number;
  private subscriptions: Unsubscribe[] = [];
  private readonly listeners: ListenerMap = {
    visibilityChange: new Set(),
    locationChange: new Set(),
  };

  constructor(source: SpotlightSource, options: OverlayControllerOptions = {}) {
    this.source = source;
    this.config = parseOverlayConfig(options.config);
    this.effect = parseRippleEffect(options.effect);
    this.viewport = options.viewport ?? { width: 0, height: 0 };
    this.logger = options.logger ?? getLogger();
    this.now = options.now ?? (() => Date.now());
    this.animationStartedAt = this.now();
  }

  /** Start observing the source; idempotent */
  attach(): void {
    if (this.subscriptions.length > 0) {
      return;
    }
    let previousDim: DimState | null = null;
    this.subscriptions.push(
      this.source.dimState.subscribe((state) => {
        if (state === previousDim) {
          return;
        }
        previousDim = state;
        if (state === "RUNNING") {
          this.animationStartedAt = this.now();
        }
        this.logger.debug("overlay", `Dim state ${state}`);
        this.emit("visibilityChange", state === "RUNNING");
      }),
      this.source.location.subscribe((location) => {
        this.emit("locationChange", location);
      })
    );
  }

  detach(): void {
    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.subscriptions = [];
  }

  isVisible(): boolean {
    return this.source.dimState.value === "RUNNING";
  }

  getConfig(): OverlayConfig {
    return this.config;
  }

  getEffect(): RippleEffect {
    return this.effect;
  }

  /** Replace the effect; throws INVALID_CONFIG on invalid input */
  setEffect(input: RippleEffectInput): void {
    this.effect = parseRippleEffect(input);
  }

  setViewport(viewport: Size): void {
    this.viewport = { width: Math.max(viewport.width, 0), height: Math.max(viewport.height, 0) };
  }

  getViewport(): Size {
    return this.viewport;
  }

  /** Geometry of the frame at `now`, or null while dimming is stopped */
  frame(now: number = this.now()): OverlayFrame | null {
    return computeOverlayFrame({
      location: this.source.location.value,
      dimState: this.source.dimState.value,
      viewport: this.viewport,
      effect: this.effect,
      config: this.config,
      elapsedMs: now - this.animationStartedAt,
    });
  }

  renderSvg(now?: number, options?: SvgRenderOptions): string | null {
    const frame = this.frame(now);
    return frame ? renderOverlaySvg(frame, options) : null;
  }

  on<K extends keyof OverlayControllerEvents>(
    event: K,
    listener: (payload: OverlayControllerEvents[K]) => void
  ): void {
    this.listeners[event].add(listener);
  }

  off<K extends keyof OverlayControllerEvents>(
    event: K,
    listener: (payload: OverlayControllerEvents[K]) => void
  ): void {
    this.listeners[event].delete(listener);
  }

  private emit<K extends keyof OverlayControllerEvents>(event: K, payload: OverlayControllerEvents[K]): void {
    for (const listener of this.listeners[event]) {
      listener(payload);
    }
  }
}

export function createOverlayController(
  source: SpotlightSource,
  options?: OverlayControllerOptions
): OverlayController {
  return new OverlayController(source, options);
}
