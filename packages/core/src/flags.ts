/**
 * Spotlight Flags
 *
 * Process-wide defaults read from the environment once at load time.
 */

import type { LogLevel } from "./observability/types";

/**
 * Read a boolean flag from an environment variable or string value.
 */
function readBooleanFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  return value === "true" || value === "1";
}

function readLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return fallback;
}

function readEnvValue(key: string): string | undefined {
  if (typeof process === "undefined") {
    return undefined;
  }
  return process.env[key];
}

export const SPOTLIGHT_FLAGS = {
  /**
   * Minimum level written by the default logger.
   * Default: info
   */
  log_level: readLogLevel(readEnvValue("SPOTLIGHT_LOG_LEVEL"), "info"),
  /**
   * Initial value of the manager's "spotlight enabled" signal.
   * Default: true
   */
  spotlight_enabled: readBooleanFlag(readEnvValue("SPOTLIGHT_ENABLED"), true),
  /**
   * Initial value of the manager's "onboarding enabled" signal.
   * Default: false (onboarding tours are opt-in)
   */
  onboarding_enabled: readBooleanFlag(readEnvValue("SPOTLIGHT_ONBOARDING_ENABLED"), false),
} as const;

export function getDefaultLogLevel(): LogLevel {
  return SPOTLIGHT_FLAGS.log_level;
}

export function isSpotlightEnabledByDefault(): boolean {
  return SPOTLIGHT_FLAGS.spotlight_enabled;
}

export function isOnboardingEnabledByDefault(): boolean {
  return SPOTLIGHT_FLAGS.onboarding_enabled;
}
