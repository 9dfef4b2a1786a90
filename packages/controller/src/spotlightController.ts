/**
 * Spotlight Controller
 *
 * Owns the zone registry, the sequencing queue and the dim state, and
 * publishes the geometry of the current spotlight for the overlay.
 */

import {
  type AudioPlayer,
  type DimState,
  ObservableValue,
  type ReadonlyObservable,
  SpotlightError,
  type SpotlightLocation,
  type SpotlightLogger,
  SpotlightPreferences,
  ZERO_OFFSET,
  ZERO_SIZE,
  createPolledObservable,
  createSpotlightLocation,
  getLogger,
  waitFor,
} from "@tourlight/core";
import { resolveControllerOptions } from "./options";
import { SequenceQueue } from "./sequenceQueue";
import type {
  EnqueueOptions,
  ISpotlightController,
  SpotlightControllerOptions,
  TooltipHandle,
  ZoneEntry,
  ZoneRegistration,
} from "./types";
import { ZoneRegistry, createZoneEntry } from "./zoneRegistry";

function locationOf(zone: ZoneEntry): SpotlightLocation {
  const detached = !zone.attached;
  return createSpotlightLocation({
    offset: detached ? ZERO_OFFSET : { x: zone.bounds.x, y: zone.bounds.y },
    size: detached ? ZERO_SIZE : { width: zone.bounds.width, height: zone.bounds.height },
    shape: zone.shape,
    forcedNavigation: zone.forcedNavigation,
    adaptComponentShape: zone.adaptComponentShape,
    spotlightPadding: zone.spotlightPadding,
  });
}

export class SpotlightController implements ISpotlightController {
  protected readonly registry = new ZoneRegistry();
  protected readonly queue: SequenceQueue;
  private readonly options: SpotlightControllerOptions;
  private logger: SpotlightLogger;

  private readonly dimStateValue = new ObservableValue<DimState>("STOPPED");
  private readonly locationValue = new ObservableValue<SpotlightLocation>(createSpotlightLocation());
  private readonly currentZoneValue = new ObservableValue<string | null>(null);
  private tooltip: TooltipHandle | null = null;
  private audioPlayer: AudioPlayer | null = null;
  private readonly audioPlaying: ReadonlyObservable<boolean>;

  readonly dimState = this.dimStateValue.asReadonly();
  readonly location = this.locationValue.asReadonly();
  readonly currentZone = this.currentZoneValue.asReadonly();

  constructor(
    preferences: SpotlightPreferences = new SpotlightPreferences(),
    options: Partial<SpotlightControllerOptions> = {}
  ) {
    this.options = resolveControllerOptions(options);
    this.logger = this.options.logger ?? getLogger();
    this.queue = new SequenceQueue(preferences, () => this.logger);
    this.audioPlaying = createPolledObservable(
      () => this.audioPlayer?.isPlaying() ?? false,
      this.options.audioPollMs
    );
  }

  get currentZoneKey(): string | null {
    return this.currentZoneValue.value;
  }

  get currentTooltip(): TooltipHandle | null {
    return this.tooltip;
  }

  get currentAudioPlayer(): AudioPlayer | null {
    return this.audioPlayer;
  }

  async setup(id: string): Promise<void> {
    if (id.trim() === "") {
      throw new SpotlightError("INVALID_CONFIG", "Controller id must not be blank");
    }
    this.logger = (this.options.logger ?? getLogger()).child({ controllerId: id });
    await this.queue.bind(id);
    this.logger.debug("queue", "Controller set up", { queued: this.queue.length });
  }

  isPersistent(): Promise<boolean> {
    return this.queue.isPersistent();
  }

  async setPersistent(): Promise<void> {
    if (await this.queue.setPersistent()) {
      this.logger.info("persistence", "Queue marked persistent", { queued: this.queue.length });
    }
  }

  startGroundDimming(): void {
    this.dimStateValue.set("RUNNING");
  }

  stopGroundDimming(): void {
    this.dimStateValue.set("STOPPED");
  }

  async enqueue(key: string, options: EnqueueOptions = {}): Promise<boolean> {
    if (await this.queue.isPersistent()) {
      this.logger.debug("queue", "Enqueue ignored on persistent queue", { zoneKey: key });
      return false;
    }

    const registered = await waitFor(() => this.registry.contains(key), {
      timeoutMs: this.options.registrationTimeoutMs,
      intervalMs: this.options.registrationPollMs,
      signal: options.signal,
    });
    if (!registered) {
      this.logger.logDegraded("registry", "zone not registered in time", {
        zoneKey: key,
        timeoutMs: this.options.registrationTimeoutMs,
      });
      return false;
    }

    const appended = await this.queue.append(key);
    if (appended) {
      this.logger.debug("queue", "Enqueued zone", { zoneKey: key, queued: this.queue.length });
    }
    return appended;
  }

  async enqueueAll(keys: readonly string[], options: EnqueueOptions = {}): Promise<void> {
    if (await this.queue.isPersistent()) {
      this.logger.debug("queue", "EnqueueAll ignored on persistent queue", { count: keys.length });
      return;
    }
    for (const key of keys) {
      await this.enqueue(key, options);
    }
  }

  /**
   * Teardown, pop and publish all happen inside one queue transaction, so
   * concurrent calls cannot leave a stale tooltip showing.
   */
  async dequeueAndSpotlight(groundDimming: boolean = this.options.defaultGroundDimming): Promise<void> {
    await this.queue.transaction((items) => {
      this.releaseCurrent();
      const head = items.shift();
      if (head === undefined) {
        this.stopGroundDimming();
        this.logger.debug("queue", "Queue drained");
        return;
      }
      if (groundDimming) {
        this.startGroundDimming();
      } else {
        this.stopGroundDimming();
      }
      this.spotlight(head);
    });
  }

  registerZone(key: string, zone: ZoneRegistration): void {
    const entry = createZoneEntry(zone);
    this.registry.register(key, entry);
    if (key !== this.currentZoneValue.value) {
      return;
    }
    // layout passes keep the current cutout on the moving element
    this.locationValue.set(locationOf(entry));
    if (entry.tooltip !== this.tooltip) {
      const previous = this.tooltip;
      this.tooltip = entry.tooltip;
      if (previous) {
        this.callHandle("tooltip dismiss", key, () => previous.dismiss());
      }
      const next = entry.tooltip;
      if (next) {
        this.callHandle("tooltip show", key, () => next.show());
      }
    }
  }

  unregisterZone(key: string): void {
    this.registry.unregister(key);
  }

  getZone(key: string): ZoneEntry | undefined {
    return this.registry.get(key);
  }

  isAudioPlaying(): ReadonlyObservable<boolean> {
    return this.audioPlaying;
  }

  private releaseCurrent(): void {
    const zoneKey = this.currentZoneValue.value;
    const tooltip = this.tooltip;
    const audioPlayer = this.audioPlayer;
    this.tooltip = null;
    this.audioPlayer = null;
    if (tooltip) {
      this.callHandle("tooltip dismiss", zoneKey, () => tooltip.dismiss());
    }
    if (audioPlayer) {
      this.callHandle("audio stop", zoneKey, () => audioPlayer.stop());
    }
    this.currentZoneValue.set(null);
  }

  /** Host handle failures are logged; the queue keeps moving */
  private callHandle(action: string, zoneKey: string | null, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.logger.logDegraded(
        "queue",
        `${action} failed`,
        { zoneKey, action },
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  private spotlight(key: string): void {
    const zone = this.registry.get(key);
    if (!zone) {
      this.logger.logDegraded("registry", "spotlighted zone is no longer registered", { zoneKey: key });
      this.locationValue.set(createSpotlightLocation());
      this.currentZoneValue.set(key);
      return;
    }

    this.locationValue.set(locationOf(zone));
    this.tooltip = zone.tooltip;
    this.audioPlayer = zone.audioPlayer;
    this.currentZoneValue.set(key);
    const tooltip = this.tooltip;
    if (tooltip) {
      this.callHandle("tooltip show", key, () => tooltip.show());
    }
    this.logger.debug("queue", "Spotlighted zone", { zoneKey: key, queued: this.queue.length });
  }
}

export function createSpotlightController(
  preferences?: SpotlightPreferences,
  options?: Partial<SpotlightControllerOptions>
): SpotlightController {
  return new SpotlightController(preferences, options);
}
