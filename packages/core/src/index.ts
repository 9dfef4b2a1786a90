/**
 * @tourlight/core
 *
 * Shared contracts and primitives of the spotlight tour packages:
 * geometry and shape types, the audio player contract, concurrency
 * primitives, durable preferences, logging and errors.
 */

export type { AudioPlayer, AudioPlayerListener, ItemTransitionReason, PlaybackState } from "./audio";
export * from "./concurrency";
export { SpotlightError, isSpotlightError, type SpotlightErrorCode } from "./errors";
export {
  SPOTLIGHT_FLAGS,
  getDefaultLogLevel,
  isOnboardingEnabledByDefault,
  isSpotlightEnabledByDefault,
} from "./flags";
export * from "./geometry";
export * from "./observability";
export * from "./persistence";
export {
  DEFAULT_SPOTLIGHT_PADDING,
  createSpotlightLocation,
  type DimState,
  type SpotlightLocation,
} from "./spotlight";
