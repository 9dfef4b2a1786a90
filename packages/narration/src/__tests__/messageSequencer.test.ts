/**
 * Message Sequencer Tests
 */

import { type LogEntry, SpotlightLogger } from "@tourlight/core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createSpotlightMessage } from "../messageBuilder";
import { MessageSequencer, type MessageSequencerOptions } from "../messageSequencer";
import { FakeAudioPlayer } from "./fakeAudioPlayer";

const silent = new SpotlightLogger({ console: false });

function createSequencer(options: Partial<MessageSequencerOptions<string>> & Pick<MessageSequencerOptions<string>, "messages">) {
  const onFinish = vi.fn();
  const sequencer = new MessageSequencer<string>({ logger: silent, onFinish, ...options });
  return { sequencer, onFinish };
}

describe("MessageSequencer", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("timed messages", () => {
    it("finishes a single 2000ms message no sooner than 2000ms, exactly once", async () => {
      const { sequencer, onFinish } = createSequencer({
        messages: [createSpotlightMessage("Welcome", { delayMs: 2000 })],
      });

      sequencer.start();
      await vi.advanceTimersByTimeAsync(1999);
      expect(sequencer.currentIndex).toBe(0);
      expect(onFinish).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(sequencer.currentIndex).toBe(1);
      expect(sequencer.isFinished).toBe(true);
      expect(onFinish).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(10_000);
      expect(sequencer.advance()).toBe(false);
      expect(onFinish).toHaveBeenCalledTimes(1);
    });

    it("finishes at once when there are no messages", () => {
      const { sequencer, onFinish } = createSequencer({ messages: [] });

      sequencer.start();

      expect(onFinish).toHaveBeenCalledTimes(1);
      expect(sequencer.isInputBlocked).toBe(false);
    });

    it("announces each message and blocks input until the end", async () => {
      const onMessageChange = vi.fn();
      const onInputBlockedChange = vi.fn();
      const first = createSpotlightMessage("one", { delayMs: 100 });
      const second = createSpotlightMessage("two", { delayMs: 100 });
      const { sequencer } = createSequencer({
        messages: [first, second],
        onMessageChange,
        onInputBlockedChange,
      });

      sequencer.start();
      await vi.advanceTimersByTimeAsync(200);

      expect(onMessageChange.mock.calls).toEqual([
        [0, first],
        [1, second],
        [2, null],
      ]);
      expect(onInputBlockedChange.mock.calls).toEqual([[true], [false]]);
    });

    it("skips one message per manual advance", async () => {
      const { sequencer, onFinish } = createSequencer({
        messages: [createSpotlightMessage("a", { delayMs: 1000 }), createSpotlightMessage("b", { delayMs: 1000 })],
      });
      sequencer.start();

      expect(sequencer.advance()).toBe(true);
      expect(sequencer.currentIndex).toBe(1);
      await vi.advanceTimersByTimeAsync(999);
      expect(onFinish).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(onFinish).toHaveBeenCalledTimes(1);
    });

    it("restarts the full delay after returning to the foreground", async () => {
      const { sequencer, onFinish } = createSequencer({
        messages: [createSpotlightMessage("a", { delayMs: 2000 })],
      });
      sequencer.start();

      await vi.advanceTimersByTimeAsync(1500);
      sequencer.setForeground(false);
      await vi.advanceTimersByTimeAsync(5000);
      expect(onFinish).not.toHaveBeenCalled();

      sequencer.setForeground(true);
      await vi.advanceTimersByTimeAsync(1999);
      expect(onFinish).not.toHaveBeenCalled();
      await vi.advanceTimersByTimeAsync(1);
      expect(onFinish).toHaveBeenCalledTimes(1);
    });
  });

  describe("audio messages", () => {
    it("plays audio items and waits on timed messages in between", async () => {
      const player = new FakeAudioPlayer();
      const { sequencer, onFinish } = createSequencer({
        player,
        messages: [
          createSpotlightMessage("a", { audioUri: "https://cdn.test/a.mp3" }),
          createSpotlightMessage("b", { delayMs: 500 }),
          createSpotlightMessage("c", { audioUri: "https://cdn.test/c.mp3" }),
        ],
      });

      sequencer.start();
      expect(player.items).toEqual(["https://cdn.test/a.mp3", "https://cdn.test/c.mp3"]);

      player.completeItem();
      expect(sequencer.currentIndex).toBe(1);
      await vi.advanceTimersByTimeAsync(500);
      expect(sequencer.currentIndex).toBe(2);

      player.completeItem();
      expect(onFinish).toHaveBeenCalledTimes(1);
      expect(player.calls).toEqual(["setItems", "seek:0:0", "play", "pause", "seek:1:0", "play", "stop"]);
    });

    it("ignores seeks and repeated completions", () => {
      const player = new FakeAudioPlayer();
      const { sequencer } = createSequencer({
        player,
        messages: [
          createSpotlightMessage("a", { audioUri: "a.mp3" }),
          createSpotlightMessage("b", { audioUri: "b.mp3" }),
        ],
      });
      sequencer.start();

      player.completeItem();
      player.emitTransition(1, "auto");
      player.emitTransition(1, "seek");

      expect(sequencer.currentIndex).toBe(1);
    });

    it("falls back to the recovery delay when playback fails", async () => {
      const entries: LogEntry[] = [];
      const player = new FakeAudioPlayer();
      const { sequencer } = createSequencer({
        player,
        errorRecoveryDelayMs: 1000,
        logger: new SpotlightLogger({ console: false, handler: (entry) => entries.push(entry) }),
        messages: [
          createSpotlightMessage("a", { audioUri: "a.mp3" }),
          createSpotlightMessage("b", { audioUri: "b.mp3" }),
        ],
      });
      sequencer.start();

      player.fail("decode error");
      await vi.advanceTimersByTimeAsync(999);
      expect(sequencer.currentIndex).toBe(0);
      await vi.advanceTimersByTimeAsync(1);

      expect(sequencer.currentIndex).toBe(1);
      expect(player.calls.slice(-2)).toEqual(["seek:1:0", "play"]);
      expect(entries).toHaveLength(1);
      expect(entries[0].message).toBe("Degraded: playback failed, falling back to a timed delay");
      expect(entries[0].data).toEqual({
        reason: "playback failed, falling back to a timed delay",
        messageIndex: 0,
        recoveryDelayMs: 1000,
      });
      expect(entries[0].error?.message).toBe("decode error");
    });

    it("pauses in the background and resumes without restarting the item", () => {
      const player = new FakeAudioPlayer();
      const { sequencer } = createSequencer({
        player,
        messages: [createSpotlightMessage("a", { audioUri: "a.mp3" })],
      });
      sequencer.start();

      sequencer.setForeground(false);
      sequencer.setForeground(true);

      expect(player.calls).toEqual(["setItems", "seek:0:0", "play", "pause", "play"]);
      expect(sequencer.currentIndex).toBe(0);
    });

    it("waits for the foreground before playing", () => {
      const player = new FakeAudioPlayer();
      const { sequencer } = createSequencer({
        player,
        foreground: false,
        messages: [createSpotlightMessage("a", { audioUri: "a.mp3" })],
      });

      sequencer.start();
      expect(player.calls).toEqual(["setItems"]);

      sequencer.setForeground(true);
      expect(player.calls).toEqual(["setItems", "seek:0:0", "play"]);
    });
  });

  describe("dispose", () => {
    it("releases the player, its listener and pending timers", () => {
      const player = new FakeAudioPlayer();
      const { sequencer, onFinish } = createSequencer({
        player,
        messages: [createSpotlightMessage("a", { audioUri: "a.mp3" }), createSpotlightMessage("b", { delayMs: 100 })],
      });
      sequencer.start();
      player.completeItem();

      sequencer.dispose();
      player.completeItem();

      expect(player.listenerCount).toBe(0);
      expect(player.calls.at(-1)).toBe("stop");
      expect(vi.getTimerCount()).toBe(0);
      expect(sequencer.isInputBlocked).toBe(false);
      expect(onFinish).not.toHaveBeenCalled();
    });
  });
});
