import { SpotlightError } from "@tourlight/core";
import { z } from "zod";
import type { SpotlightControllerOptions } from "./types";

export const DEFAULT_CONTROLLER_OPTIONS: Omit<SpotlightControllerOptions, "logger"> = {
  registrationTimeoutMs: 3000,
  registrationPollMs: 50,
  audioPollMs: 100,
  defaultGroundDimming: true,
};

const ControllerTimingSchema = z.object({
  registrationTimeoutMs: z.number().int().nonnegative(),
  registrationPollMs: z.number().int().positive(),
  audioPollMs: z.number().int().positive(),
  defaultGroundDimming: z.boolean(),
});

export function resolveControllerOptions(
  options: Partial<SpotlightControllerOptions>
): SpotlightControllerOptions {
  const { logger, ...timing } = options;
  const parsed = ControllerTimingSchema.safeParse({ ...DEFAULT_CONTROLLER_OPTIONS, ...timing });
  if (!parsed.success) {
    throw new SpotlightError("INVALID_CONFIG", "Invalid spotlight controller options", {
      context: { issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`) },
    });
  }
  return { ...parsed.data, logger };
}
