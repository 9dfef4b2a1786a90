import { SpotlightError } from "@tourlight/core";
import type { z } from "zod";
import {
  type OverlayConfig,
  type OverlayConfigInput,
  OverlayConfigSchema,
  type RippleEffect,
  type RippleEffectInput,
  RippleEffectSchema,
} from "./types";

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/** Validate and fill defaults; intensity is clamped into [0, 1] */
export function parseRippleEffect(input: RippleEffectInput = {}): RippleEffect {
  const parsed = RippleEffectSchema.safeParse(input);
  if (!parsed.success) {
    throw new SpotlightError("INVALID_CONFIG", "Invalid ripple effect", {
      context: { issues: describeIssues(parsed.error) },
    });
  }
  return parsed.data;
}

export function parseOverlayConfig(input: OverlayConfigInput = {}): OverlayConfig {
  const parsed = OverlayConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new SpotlightError("INVALID_CONFIG", "Invalid overlay config", {
      context: { issues: describeIssues(parsed.error) },
    });
  }
  return parsed.data;
}
