import { DEFAULT_SPOTLIGHT_PADDING, RectangleShape } from "@tourlight/core";
import type { ZoneEntry, ZoneRegistration } from "./types";

export function createZoneEntry(registration: ZoneRegistration): ZoneEntry {
  return {
    bounds: { ...registration.bounds },
    shape: registration.shape ?? RectangleShape,
    forcedNavigation: registration.forcedNavigation ?? false,
    adaptComponentShape: registration.adaptComponentShape ?? false,
    spotlightPadding: registration.spotlightPadding ?? DEFAULT_SPOTLIGHT_PADDING,
    attached: registration.attached ?? true,
    tooltip: registration.tooltip ?? null,
    audioPlayer: registration.audioPlayer ?? null,
  };
}

/**
 * Zone key -> zone metadata.
 *
 * Every method is synchronous and never yields, so calls from different
 * lifecycle callbacks cannot interleave: the event loop is the exclusion
 * domain of the map.
 */
export class ZoneRegistry {
  private readonly zones = new Map<string, ZoneEntry>();

  /** Insert or replace; the last registration wins */
  register(key: string, entry: ZoneEntry): void {
    this.zones.set(key, entry);
  }

  /** Returns whether the key was registered */
  unregister(key: string): boolean {
    return this.zones.delete(key);
  }

  get(key: string): ZoneEntry | undefined {
    return this.zones.get(key);
  }

  contains(key: string): boolean {
    return this.zones.has(key);
  }

  keys(): string[] {
    return [...this.zones.keys()];
  }

  get size(): number {
    return this.zones.size;
  }

  clear(): void {
    this.zones.clear();
  }
}
