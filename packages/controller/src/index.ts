/**
 * @tourlight/controller
 *
 * Zone registry, sequencing queue and dim state of a spotlight tour.
 */

export { configure, setupWith, SpotlightSetupSchema, type SpotlightSetup } from "./config";
export { FakeSpotlightController } from "./fakeSpotlightController";
export { DEFAULT_CONTROLLER_OPTIONS, resolveControllerOptions } from "./options";
export { SequenceQueue, persistenceFlagKey, persistentQueueKey } from "./sequenceQueue";
export { SpotlightController, createSpotlightController } from "./spotlightController";
export { SpotlightManager, createSpotlightManager, type SpotlightManagerOptions } from "./spotlightManager";
export type {
  EnqueueOptions,
  ISpotlightController,
  SpotlightControllerOptions,
  TooltipHandle,
  ZoneEntry,
  ZoneRegistration,
} from "./types";
export { ZoneRegistry, createZoneEntry } from "./zoneRegistry";
