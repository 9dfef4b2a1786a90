/**
 * Spotlight Manager
 *
 * Process-wide entry point: shares one preference store across the
 * controllers it creates and carries the enable signals a host's remote
 * configuration drives.
 */

import {
  FilePreferenceBackend,
  ObservableValue,
  type PreferenceBackend,
  type ReadonlyObservable,
  type SpotlightLogger,
  SpotlightPreferences,
  getLogger,
  isOnboardingEnabledByDefault,
  isSpotlightEnabledByDefault,
} from "@tourlight/core";
import { persistenceFlagKey, persistentQueueKey } from "./sequenceQueue";
import { SpotlightController } from "./spotlightController";
import type { SpotlightControllerOptions } from "./types";

export type SpotlightManagerOptions = {
  /** Store preferences in this JSON file; ignored when `backend` is given */
  filePath?: string;
  backend?: PreferenceBackend;
  spotlightEnabled?: boolean;
  onboardingEnabled?: boolean;
  logger?: SpotlightLogger;
  /** Defaults applied to every created controller */
  controllerDefaults?: Partial<Omit<SpotlightControllerOptions, "logger">>;
};

export class SpotlightManager {
  readonly preferences: SpotlightPreferences;
  private readonly logger: SpotlightLogger;
  private readonly controllerDefaults: Partial<Omit<SpotlightControllerOptions, "logger">>;
  private readonly spotlightEnabledValue: ObservableValue<boolean>;
  private readonly onboardingEnabledValue: ObservableValue<boolean>;

  constructor(options: SpotlightManagerOptions = {}) {
    this.logger = options.logger ?? getLogger();
    const backend =
      options.backend ??
      (options.filePath ? new FilePreferenceBackend(options.filePath, { logger: this.logger }) : undefined);
    this.preferences = new SpotlightPreferences(backend);
    this.controllerDefaults = options.controllerDefaults ?? {};
    this.spotlightEnabledValue = new ObservableValue(options.spotlightEnabled ?? isSpotlightEnabledByDefault());
    this.onboardingEnabledValue = new ObservableValue(
      options.onboardingEnabled ?? isOnboardingEnabledByDefault()
    );
  }

  get spotlightEnabled(): ReadonlyObservable<boolean> {
    return this.spotlightEnabledValue.asReadonly();
  }

  get onboardingEnabled(): ReadonlyObservable<boolean> {
    return this.onboardingEnabledValue.asReadonly();
  }

  setSpotlightEnabled(enabled: boolean): void {
    this.spotlightEnabledValue.set(enabled);
  }

  setOnboardingEnabled(enabled: boolean): void {
    this.onboardingEnabledValue.set(enabled);
  }

  createController(options: Partial<SpotlightControllerOptions> = {}): SpotlightController {
    return new SpotlightController(this.preferences, {
      ...this.controllerDefaults,
      logger: this.logger.child({}),
      ...options,
    });
  }

  /** Forget the stored queue of `id`, so its tour can run again */
  async resetTour(id: string): Promise<void> {
    await this.preferences.remove(persistenceFlagKey(id));
    await this.preferences.remove(persistentQueueKey(id));
    this.logger.info("manager", "Reset stored tour", { controllerId: id });
  }
}

export function createSpotlightManager(options?: SpotlightManagerOptions): SpotlightManager {
  return new SpotlightManager(options);
}
