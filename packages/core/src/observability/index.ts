/**
 * Observability
 *
 * Structured logging for controller, sequencer and storage events.
 */

export * from "./logger";
export * from "./types";
