import { SpotlightError } from "@tourlight/core";
import { z } from "zod";
import type { EnqueueOptions, ISpotlightController } from "./types";

export const SpotlightSetupSchema = z.object({
  id: z.string().trim().min(1),
  persistent: z.boolean().default(false),
  initialQueue: z.array(z.string().min(1)).default([]),
});

export type SpotlightSetup = z.input<typeof SpotlightSetupSchema>;

/**
 * One-call setup: bind the namespace, queue the initial zones, then mark
 * the queue persistent. Queuing happens first because a persistent queue
 * ignores enqueue calls.
 */
export async function setupWith(
  controller: ISpotlightController,
  setup: SpotlightSetup,
  options: EnqueueOptions = {}
): Promise<void> {
  const parsed = SpotlightSetupSchema.safeParse(setup);
  if (!parsed.success) {
    throw new SpotlightError("INVALID_CONFIG", "Invalid spotlight setup", {
      context: { issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`) },
    });
  }
  const { id, persistent, initialQueue } = parsed.data;
  await controller.setup(id);
  if (initialQueue.length > 0) {
    await controller.enqueueAll(initialQueue, options);
  }
  if (persistent) {
    await controller.setPersistent();
  }
}

export function configure(
  controller: ISpotlightController,
  id: string,
  setup: Omit<SpotlightSetup, "id"> = {}
): Promise<void> {
  return setupWith(controller, { ...setup, id });
}
