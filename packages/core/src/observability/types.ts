/**
 * Observability Types
 *
 * Structured log entries for spotlight orchestration.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogCategory =
  | "registry"
  | "queue"
  | "persistence"
  | "sequencer"
  | "overlay"
  | "audio"
  | "manager";

/** Correlation context attached to every entry of a logger */
export type LogContext = {
  /** Controller namespace passed to setup() */
  controllerId: string;
  /** Zone the entry concerns */
  zoneKey: string;
};

/** Structured log entry */
export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  context: Partial<LogContext>;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
};
