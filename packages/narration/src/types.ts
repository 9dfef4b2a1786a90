/**
 * Narration - Core Type Definitions
 */

/**
 * One step of a zone's tooltip sequence. Immutable once built.
 *
 * `content` is an opaque payload the host renders in the tooltip.
 */
export type SpotlightMessage<TContent = unknown> = Readonly<{
  content: TContent;
  /** Audio locator; null means the message is timed by `delayMs` */
  audioUri: string | null;
  /** How long the message shows when it has no audio */
  delayMs: number;
}>;

/** Delay of a message built without one */
export const DEFAULT_MESSAGE_DELAY_MS = 1000;

/** Delay a builder starts from */
export const DEFAULT_BUILDER_DELAY_MS = 3000;

/** Pause before advancing past a message whose audio failed */
export const DEFAULT_ERROR_RECOVERY_DELAY_MS = 1000;

/**
 * Event callbacks for a message sequencer
 */
export interface SequencerCallbacks<TContent = unknown> {
  /** Called exactly once, after the last message */
  onFinish: () => void;
  /** Called when a new message becomes current; null once finished */
  onMessageChange?: (index: number, message: SpotlightMessage<TContent> | null) => void;
  /** Input outside the tooltip should be blocked while a message shows */
  onInputBlockedChange?: (blocked: boolean) => void;
}
