/**
 * Message Sequencer
 *
 * Walks one zone's messages in order. A message without audio advances
 * after its delay; a message with audio advances when its playlist item
 * completes. Playback errors fall back to a recovery delay so the tour
 * never stalls. The index only ever moves forward one step at a time,
 * through advanceFrom(), which drops stale or duplicate completions.
 */

import type { AudioPlayer, ItemTransitionReason, PlaybackState, SpotlightLogger } from "@tourlight/core";
import { getLogger } from "@tourlight/core";
import { DEFAULT_ERROR_RECOVERY_DELAY_MS, type SequencerCallbacks, type SpotlightMessage } from "./types";

export type MessageSequencerOptions<TContent> = SequencerCallbacks<TContent> & {
  messages: readonly SpotlightMessage<TContent>[];
  player?: AudioPlayer | null;
  /** Whether the app starts in the foreground */
  foreground?: boolean;
  errorRecoveryDelayMs?: number;
  logger?: SpotlightLogger;
};

export class MessageSequencer<TContent = unknown> {
  private readonly messages: readonly SpotlightMessage<TContent>[];
  private readonly player: AudioPlayer | null;
  private readonly callbacks: SequencerCallbacks<TContent>;
  private readonly errorRecoveryDelayMs: number;
  private readonly logger: SpotlightLogger;
  /** Message index -> playlist item index, for messages with audio */
  private readonly itemByMessage = new Map<number, number>();
  private readonly messageByItem: number[] = [];
  private readonly playlist: string[] = [];

  private index = 0;
  private foreground: boolean;
  private started = false;
  private finished = false;
  private disposed = false;
  private inputBlocked = false;
  private announcedIndex = -1;
  /** Message whose playback was started (seeked to), so a resume does not restart it */
  private playingIndex = -1;
  /** Message whose audio failed; it is timed by the recovery delay instead */
  private failedIndex = -1;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private removeListener: (() => void) | null = null;

  constructor(options: MessageSequencerOptions<TContent>) {
    this.messages = options.messages;
    this.player = options.player ?? null;
    this.callbacks = {
      onFinish: options.onFinish,
      onMessageChange: options.onMessageChange,
      onInputBlockedChange: options.onInputBlockedChange,
    };
    this.foreground = options.foreground ?? true;
    this.errorRecoveryDelayMs = options.errorRecoveryDelayMs ?? DEFAULT_ERROR_RECOVERY_DELAY_MS;
    this.logger = options.logger ?? getLogger();

    this.messages.forEach((message, messageIndex) => {
      if (message.audioUri !== null) {
        this.itemByMessage.set(messageIndex, this.playlist.length);
        this.messageByItem.push(messageIndex);
        this.playlist.push(message.audioUri);
      }
    });
  }

  get currentIndex(): number {
    return this.index;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  get isInputBlocked(): boolean {
    return this.inputBlocked;
  }

  get currentMessage(): SpotlightMessage<TContent> | null {
    return this.messages[this.index] ?? null;
  }

  /** Load the playlist and show the first message; idempotent */
  start(): void {
    if (this.started || this.disposed) {
      return;
    }
    this.started = true;

    const player = this.player;
    if (player && this.playlist.length > 0) {
      this.removeListener = player.addListener({
        onItemTransition: (itemIndex, reason) => this.handleItemTransition(itemIndex, reason),
        onPlaybackStateChanged: (state) => this.handlePlaybackState(state),
        onError: (error) => this.handlePlaybackError(error),
      });
      player.setItems(this.playlist);
    }
    this.evaluate();
  }

  /** Skip the current message, as a user would */
  advance(): boolean {
    return this.advanceFrom(this.index);
  }

  /**
   * Background pauses the current message: playback is paused and a
   * pending delay is cancelled. Foreground resumes it without skipping.
   */
  setForeground(foreground: boolean): void {
    if (this.foreground === foreground) {
      return;
    }
    this.foreground = foreground;
    if (!this.started || this.finished || this.disposed) {
      return;
    }
    if (foreground) {
      this.evaluate();
      return;
    }
    this.clearTimer();
    if (this.itemByMessage.has(this.index)) {
      this.player?.pause();
    }
  }

  /** Release the player and stop reacting to it */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.clearTimer();
    this.removeListener?.();
    this.removeListener = null;
    if (this.started && this.playlist.length > 0) {
      this.player?.stop();
    }
    this.setInputBlocked(false);
  }

  private advanceFrom(expected: number): boolean {
    if (this.disposed || this.finished || !this.started || this.index !== expected) {
      return false;
    }
    this.clearTimer();
    this.index = expected + 1;
    this.evaluate();
    return true;
  }

  private evaluate(): void {
    if (this.disposed || this.finished) {
      return;
    }
    const index = this.index;
    const message = this.messages[index];
    if (!message) {
      this.finish();
      return;
    }

    this.setInputBlocked(true);
    if (this.announcedIndex !== index) {
      this.announcedIndex = index;
      this.callbacks.onMessageChange?.(index, message);
    }

    const item = this.itemByMessage.get(index);
    if (item === undefined || !this.player) {
      if (this.player?.isPlaying()) {
        this.player.pause();
      }
      if (this.foreground) {
        this.schedule(message.delayMs, index);
      }
      return;
    }

    if (!this.foreground) {
      return;
    }
    if (this.failedIndex === index) {
      this.schedule(this.errorRecoveryDelayMs, index);
      return;
    }
    if (this.playingIndex !== index) {
      this.playingIndex = index;
      this.player.seekTo(item, 0);
    }
    this.player.play();
  }

  private finish(): void {
    this.finished = true;
    this.clearTimer();
    if (this.playlist.length > 0) {
      this.player?.stop();
    }
    this.setInputBlocked(false);
    this.callbacks.onMessageChange?.(this.messages.length, null);
    this.logger.debug("sequencer", "Message sequence finished", { messages: this.messages.length });
    this.callbacks.onFinish();
  }

  private handleItemTransition(itemIndex: number, reason: ItemTransitionReason): void {
    // seeks and playlist changes are ours; only an automatic move means the previous item completed
    if (reason !== "auto" || itemIndex === 0) {
      return;
    }
    const completed = this.messageByItem[itemIndex - 1];
    if (completed !== undefined) {
      this.advanceFrom(completed);
    }
  }

  private handlePlaybackState(state: PlaybackState): void {
    if (state !== "ended" || !this.player) {
      return;
    }
    const completed = this.messageByItem[this.player.currentItemIndex()];
    if (completed !== undefined) {
      this.advanceFrom(completed);
    }
  }

  private handlePlaybackError(error: Error): void {
    const index = this.index;
    if (this.disposed || this.finished || !this.itemByMessage.has(index)) {
      return;
    }
    this.logger.logDegraded(
      "audio",
      "playback failed, falling back to a timed delay",
      { messageIndex: index, recoveryDelayMs: this.errorRecoveryDelayMs },
      error
    );
    this.failedIndex = index;
    this.player?.pause();
    if (this.foreground) {
      this.schedule(this.errorRecoveryDelayMs, index);
    }
  }

  private schedule(delayMs: number, index: number): void {
    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.advanceFrom(index);
    }, delayMs);
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private setInputBlocked(blocked: boolean): void {
    if (this.inputBlocked === blocked) {
      return;
    }
    this.inputBlocked = blocked;
    this.callbacks.onInputBlockedChange?.(blocked);
  }
}

export function createMessageSequencer<TContent>(
  options: MessageSequencerOptions<TContent>
): MessageSequencer<TContent> {
  return new MessageSequencer(options);
}
