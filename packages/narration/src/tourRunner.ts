/**
 * Tour Runner
 *
 * Binds a MessageSequencer to whichever zone the controller spotlights.
 * Exactly one sequencer exists at a time; it is disposed as soon as its
 * zone stops being current.
 */

import type { ISpotlightController } from "@tourlight/controller";
import { getLogger, type SpotlightLogger, type Unsubscribe } from "@tourlight/core";
import { MessageSequencer } from "./messageSequencer";
import type { SpotlightMessage } from "./types";

/** Messages and finish hook of one zone */
export type TourStep<TContent = unknown> = {
  messages: readonly SpotlightMessage<TContent>[];
  onFinish?: () => void;
};

export type TourController = Pick<
  ISpotlightController,
  "currentZone" | "currentAudioPlayer" | "dequeueAndSpotlight"
>;

export type TourRunnerOptions<TContent = unknown> = {
  /** Spotlight the next queued zone when a zone finishes (default true) */
  autoAdvance?: boolean;
  /** groundDimming passed when advancing; the controller default when omitted */
  groundDimming?: boolean;
  errorRecoveryDelayMs?: number;
  logger?: SpotlightLogger;
  onMessageChange?: (zoneKey: string, index: number, message: SpotlightMessage<TContent> | null) => void;
  onInputBlockedChange?: (blocked: boolean) => void;
};

export class TourRunner<TContent = unknown> {
  private readonly controller: TourController;
  private readonly steps: ReadonlyMap<string, TourStep<TContent>>;
  private readonly options: TourRunnerOptions<TContent>;
  private readonly logger: SpotlightLogger;
  private sequencer: MessageSequencer<TContent> | null = null;
  private activeZone: string | null = null;
  private foreground = true;
  private unsubscribe: Unsubscribe | null = null;

  constructor(
    controller: TourController,
    steps: Readonly<Record<string, TourStep<TContent>>>,
    options: TourRunnerOptions<TContent> = {}
  ) {
    this.controller = controller;
    this.steps = new Map(Object.entries(steps));
    this.options = options;
    this.logger = options.logger ?? getLogger();
  }

  get currentZone(): string | null {
    return this.activeZone;
  }

  get currentSequencer(): MessageSequencer<TContent> | null {
    return this.sequencer;
  }

  /** Follow the controller's current zone; idempotent */
  start(): void {
    if (this.unsubscribe) {
      return;
    }
    this.unsubscribe = this.controller.currentZone.subscribe((zoneKey) => this.activate(zoneKey));
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.release();
  }

  setForeground(foreground: boolean): void {
    this.foreground = foreground;
    this.sequencer?.setForeground(foreground);
  }

  /** Skip the current message of the current zone */
  skip(): boolean {
    return this.sequencer?.advance() ?? false;
  }

  private activate(zoneKey: string | null): void {
    if (zoneKey === this.activeZone && this.sequencer) {
      return;
    }
    this.release();
    if (zoneKey === null) {
      return;
    }

    const step = this.steps.get(zoneKey);
    if (!step) {
      this.logger.debug("sequencer", "Zone has no messages", { zoneKey });
    }
    this.activeZone = zoneKey;
    const sequencer = new MessageSequencer<TContent>({
      messages: step?.messages ?? [],
      player: this.controller.currentAudioPlayer,
      foreground: this.foreground,
      errorRecoveryDelayMs: this.options.errorRecoveryDelayMs,
      logger: this.logger.child({ zoneKey }),
      onMessageChange: (index, message) => this.options.onMessageChange?.(zoneKey, index, message),
      onInputBlockedChange: this.options.onInputBlockedChange,
      onFinish: () => this.handleFinish(zoneKey, step),
    });
    this.sequencer = sequencer;
    sequencer.start();
  }

  private handleFinish(zoneKey: string, step: TourStep<TContent> | undefined): void {
    step?.onFinish?.();
    if (this.options.autoAdvance === false || this.activeZone !== zoneKey) {
      return;
    }
    this.controller.dequeueAndSpotlight(this.options.groundDimming).catch((error: unknown) => {
      this.logger.error(
        "sequencer",
        "Advancing the tour failed",
        error instanceof Error ? error : new Error(String(error)),
        { zoneKey }
      );
    });
  }

  private release(): void {
    this.sequencer?.dispose();
    this.sequencer = null;
    this.activeZone = null;
  }
}

export function createTourRunner<TContent>(
  controller: TourController,
  steps: Readonly<Record<string, TourStep<TContent>>>,
  options?: TourRunnerOptions<TContent>
): TourRunner<TContent> {
  return new TourRunner(controller, steps, options);
}
