/**
 * Spotlight Message Builder
 */

import { SpotlightError } from "@tourlight/core";
import { z } from "zod";
import { type AudioSource, type ResourceResolver, resolveAudioSource } from "./audioSource";
import { DEFAULT_BUILDER_DELAY_MS, DEFAULT_MESSAGE_DELAY_MS, type SpotlightMessage } from "./types";

const MessageTimingSchema = z.object({
  audioUri: z.string().min(1).nullable(),
  delayMs: z.number().finite().nonnegative(),
});

function validateTiming(audioUri: string | null, delayMs: number): void {
  const parsed = MessageTimingSchema.safeParse({ audioUri, delayMs });
  if (!parsed.success) {
    throw new SpotlightError("INVALID_MESSAGE", "Invalid spotlight message", {
      context: { issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`) },
    });
  }
}

/**
 * Create a message directly. Without audio it shows for `delayMs`
 * (1000ms unless given).
 */
export function createSpotlightMessage<TContent>(
  content: TContent,
  options: { audioUri?: string | null; delayMs?: number } = {}
): SpotlightMessage<TContent> {
  const audioUri = options.audioUri ?? null;
  const delayMs = options.delayMs ?? DEFAULT_MESSAGE_DELAY_MS;
  validateTiming(audioUri, delayMs);
  return Object.freeze({ content, audioUri, delayMs });
}

/**
 * Fluent message builder. Starts with a 3000ms delay and audio enabled.
 */
export class SpotlightMessageBuilder<TContent> {
  private contentSlot: { value: TContent } | null = null;
  private audioUriValue: string | null = null;
  private audioEnabled = true;
  private delayValue = DEFAULT_BUILDER_DELAY_MS;
  private readonly resolveResource?: ResourceResolver;

  constructor(options: { resolveResource?: ResourceResolver } = {}) {
    this.resolveResource = options.resolveResource;
  }

  content(content: TContent): this {
    this.contentSlot = { value: content };
    return this;
  }

  audioUri(uri: string): this {
    this.audioUriValue = uri;
    this.audioEnabled = true;
    return this;
  }

  audio(source: AudioSource): this {
    const uri = resolveAudioSource(source, this.resolveResource);
    return uri === null ? this.disableAudio() : this.audioUri(uri);
  }

  delay(ms: number): this {
    this.delayValue = ms;
    return this;
  }

  disableAudio(): this {
    this.audioEnabled = false;
    this.audioUriValue = null;
    return this;
  }

  /** @throws SpotlightError INVALID_MESSAGE when content was never set */
  build(): SpotlightMessage<TContent> {
    if (!this.contentSlot) {
      throw new SpotlightError("INVALID_MESSAGE", "Content must be set before building a message");
    }
    return createSpotlightMessage(this.contentSlot.value, {
      audioUri: this.audioEnabled ? this.audioUriValue : null,
      delayMs: this.delayValue,
    });
  }
}

export function spotlightMessage<TContent>(
  configure: (builder: SpotlightMessageBuilder<TContent>) => void,
  options?: { resolveResource?: ResourceResolver }
): SpotlightMessage<TContent> {
  const builder = new SpotlightMessageBuilder<TContent>(options);
  configure(builder);
  return builder.build();
}
