/**
 * @tourlight/narration - Tooltip and audio narration of a spotlight tour
 *
 * @example
 * ```typescript
 * import { createSpotlightMessage, TourRunner } from "@tourlight/narration";
 *
 * const runner = new TourRunner(controller, {
 *   search: { messages: [createSpotlightMessage("Find anything here", { delayMs: 2000 })] },
 * });
 * runner.start();
 * await controller.dequeueAndSpotlight();
 * ```
 */

// Types
export {
  DEFAULT_BUILDER_DELAY_MS,
  DEFAULT_ERROR_RECOVERY_DELAY_MS,
  DEFAULT_MESSAGE_DELAY_MS,
  type SequencerCallbacks,
  type SpotlightMessage,
} from "./types";

export { AudioSource, resolveAudioSource, type ResourceResolver } from "./audioSource";
export { SpotlightMessageBuilder, createSpotlightMessage, spotlightMessage } from "./messageBuilder";
export { MessageSequencer, createMessageSequencer, type MessageSequencerOptions } from "./messageSequencer";
export {
  TourRunner,
  createTourRunner,
  type TourController,
  type TourRunnerOptions,
  type TourStep,
} from "./tourRunner";
