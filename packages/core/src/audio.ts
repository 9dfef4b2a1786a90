/**
 * Audio Player Contract
 *
 * The playback engine is opaque to the spotlight core. Hosts adapt their
 * engine (media element, native player, ...) to this interface.
 */

export type PlaybackState = "idle" | "buffering" | "ready" | "ended";

/**
 * Why the player moved to another item.
 * Only "auto" means the previous item played to completion.
 */
export type ItemTransitionReason = "auto" | "seek" | "playlist";

export interface AudioPlayerListener {
  onError?(error: Error): void;
  onItemTransition?(itemIndex: number, reason: ItemTransitionReason): void;
  onPlaybackStateChanged?(state: PlaybackState): void;
}

export interface AudioPlayer {
  play(): void;
  pause(): void;
  stop(): void;
  /** Jump to an item of the current playlist */
  seekTo(itemIndex: number, positionMs: number): void;
  /** Replace the playlist; playback does not start until play() */
  setItems(uris: readonly string[]): void;
  isPlaying(): boolean;
  currentItemIndex(): number;
  /** Returns a function that removes the listener */
  addListener(listener: AudioPlayerListener): () => void;
}
