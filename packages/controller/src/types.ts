/**
 * Spotlight Controller Types
 */

import type {
  AudioPlayer,
  DimState,
  ReadonlyObservable,
  Rect,
  SpotlightLocation,
  SpotlightLogger,
  SpotlightShape,
} from "@tourlight/core";

/** Visibility handle of the tooltip anchored to a zone */
export interface TooltipHandle {
  show(): void;
  dismiss(): void;
}

/** Registered metadata of one zone, as last reported by its host element */
export type ZoneEntry = {
  /** Screen-space bounds from the latest layout pass */
  bounds: Rect;
  shape: SpotlightShape;
  /** Block input everywhere except the zone while it is spotlighted */
  forcedNavigation: boolean;
  /** Ripple bands follow the zone's outline instead of a circle */
  adaptComponentShape: boolean;
  spotlightPadding: number;
  /** False once the element has left the layout tree but not unregistered yet */
  attached: boolean;
  tooltip: TooltipHandle | null;
  audioPlayer: AudioPlayer | null;
};

/** Host-facing registration input; everything but bounds has a default */
export type ZoneRegistration = Pick<ZoneEntry, "bounds"> & Partial<Omit<ZoneEntry, "bounds">>;

export type EnqueueOptions = {
  /** Cancels the wait for the zone to register */
  signal?: AbortSignal;
};

export type SpotlightControllerOptions = {
  /** How long enqueue waits for a zone to register */
  registrationTimeoutMs: number;
  /** Poll interval of that wait */
  registrationPollMs: number;
  /** Sampling interval of isAudioPlaying() */
  audioPollMs: number;
  /** groundDimming used when dequeueAndSpotlight() is called without one */
  defaultGroundDimming: boolean;
  logger?: SpotlightLogger;
};

/**
 * Spotlight Controller Interface
 *
 * Orchestrates the zone registry, the sequencing queue and the dim state.
 * setup() must be called before any queue operation.
 */
export interface ISpotlightController {
  readonly dimState: ReadonlyObservable<DimState>;
  /** Geometry of the current spotlight, consumed by the overlay every frame */
  readonly location: ReadonlyObservable<SpotlightLocation>;
  readonly currentZone: ReadonlyObservable<string | null>;
  readonly currentZoneKey: string | null;
  readonly currentTooltip: TooltipHandle | null;
  readonly currentAudioPlayer: AudioPlayer | null;

  /**
   * Bind to a durable namespace. Reloads the persisted queue when the
   * namespace was marked persistent, replacing the in-memory queue.
   */
  setup(id: string): Promise<void>;
  isPersistent(): Promise<boolean>;
  /** Persist the queue; later enqueue calls are ignored */
  setPersistent(): Promise<void>;
  startGroundDimming(): void;
  stopGroundDimming(): void;
  /**
   * Append a zone once it has registered.
   * @returns false when ignored (persistent queue) or the zone never registered in time
   */
  enqueue(key: string, options?: EnqueueOptions): Promise<boolean>;
  /** enqueue() each key in order, one after the other */
  enqueueAll(keys: readonly string[], options?: EnqueueOptions): Promise<void>;
  /** Tear down the current spotlight and spotlight the head of the queue, if any */
  dequeueAndSpotlight(groundDimming?: boolean): Promise<void>;
  /**
   * Insert or replace a zone. Re-registering the current zone republishes
   * its geometry and swaps its tooltip; the audio player stays the one
   * captured at dequeue, which the running narration is bound to.
   */
  registerZone(key: string, zone: ZoneRegistration): void;
  unregisterZone(key: string): void;
  getZone(key: string): ZoneEntry | undefined;
  isAudioPlaying(): ReadonlyObservable<boolean>;
}
