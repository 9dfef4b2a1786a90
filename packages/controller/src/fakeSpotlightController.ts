/**
 * Fake Spotlight Controller
 *
 * In-memory controller for host tests: enqueue never waits for
 * registration and nothing is persisted.
 */

import {
  type AudioPlayer,
  type DimState,
  ObservableValue,
  type ReadonlyObservable,
  type SpotlightLocation,
  createSpotlightLocation,
} from "@tourlight/core";
import type { ISpotlightController, TooltipHandle, ZoneEntry, ZoneRegistration } from "./types";
import { createZoneEntry } from "./zoneRegistry";

export class FakeSpotlightController implements ISpotlightController {
  private readonly zones = new Map<string, ZoneEntry>();
  private queue: string[] = [];
  private persistent = false;
  private readonly dimStateValue = new ObservableValue<DimState>("STOPPED");
  private readonly locationValue = new ObservableValue<SpotlightLocation>(createSpotlightLocation());
  private readonly currentZoneValue = new ObservableValue<string | null>(null);
  private readonly audioPlayingValue = new ObservableValue(false);

  readonly dimState = this.dimStateValue.asReadonly();
  readonly location = this.locationValue.asReadonly();
  readonly currentZone = this.currentZoneValue.asReadonly();
  /** Last id passed to setup() */
  setupId: string | null = null;

  get currentZoneKey(): string | null {
    return this.currentZoneValue.value;
  }

  get currentTooltip(): TooltipHandle | null {
    return this.currentZoneKey === null ? null : (this.zones.get(this.currentZoneKey)?.tooltip ?? null);
  }

  get currentAudioPlayer(): AudioPlayer | null {
    return this.currentZoneKey === null ? null : (this.zones.get(this.currentZoneKey)?.audioPlayer ?? null);
  }

  async setup(id: string): Promise<void> {
    this.setupId = id;
  }

  async isPersistent(): Promise<boolean> {
    return this.persistent;
  }

  async setPersistent(): Promise<void> {
    this.persistent = true;
  }

  startGroundDimming(): void {
    this.dimStateValue.set("RUNNING");
  }

  stopGroundDimming(): void {
    this.dimStateValue.set("STOPPED");
  }

  async enqueue(key: string): Promise<boolean> {
    if (this.persistent) {
      return false;
    }
    this.queue.push(key);
    return true;
  }

  async enqueueAll(keys: readonly string[]): Promise<void> {
    for (const key of keys) {
      await this.enqueue(key);
    }
  }

  async dequeueAndSpotlight(groundDimming = true): Promise<void> {
    const head = this.queue.shift();
    if (head === undefined) {
      this.currentZoneValue.set(null);
      this.stopGroundDimming();
      return;
    }
    if (groundDimming) {
      this.startGroundDimming();
    } else {
      this.stopGroundDimming();
    }
    this.currentZoneValue.set(head);
  }

  registerZone(key: string, zone: ZoneRegistration): void {
    this.zones.set(key, createZoneEntry(zone));
  }

  unregisterZone(key: string): void {
    this.zones.delete(key);
  }

  getZone(key: string): ZoneEntry | undefined {
    return this.zones.get(key);
  }

  isAudioPlaying(): ReadonlyObservable<boolean> {
    return this.audioPlayingValue.asReadonly();
  }

  /** Drive isAudioPlaying() from a test */
  setAudioPlaying(playing: boolean): void {
    this.audioPlayingValue.set(playing);
  }

  getQueue(): readonly string[] {
    return [...this.queue];
  }

  getRegisteredZones(): ReadonlyMap<string, ZoneEntry> {
    return new Map(this.zones);
  }

  reset(): void {
    this.zones.clear();
    this.queue = [];
    this.persistent = false;
    this.setupId = null;
    this.currentZoneValue.set(null);
    this.locationValue.set(createSpotlightLocation());
    this.audioPlayingValue.set(false);
    this.stopGroundDimming();
  }
}
