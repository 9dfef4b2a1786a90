import { getDefaultLogLevel } from "../flags";
import type { LogCategory, LogContext, LogEntry, LogLevel } from "./types";

export type LoggerConfig = {
  minLevel: LogLevel;
  /** Write each entry as one line to stdout (debug/info) or stderr (warn/error) */
  console: boolean;
  handler?: (entry: LogEntry) => void;
  defaultContext?: Partial<LogContext>;
};

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function stringifyData(data: Record<string, unknown>): string {
  try {
    return JSON.stringify(data);
  } catch {
    // circular structures
    return String(data);
  }
}

/**
 * Console form of an entry:
 * `[time] [LEVEL] [category] (controllerId) <zoneKey> message {data} error`
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}]`, `[${entry.level.toUpperCase()}]`, `[${entry.category}]`];
  if (entry.context.controllerId) {
    parts.push(`(${entry.context.controllerId})`);
  }
  if (entry.context.zoneKey) {
    parts.push(`<${entry.context.zoneKey}>`);
  }
  parts.push(entry.message);
  if (entry.data) {
    parts.push(stringifyData(entry.data));
  }
  if (entry.error) {
    parts.push(entry.error.stack ?? `${entry.error.name}: ${entry.error.message}`);
  }
  return parts.join(" ");
}

export class SpotlightLogger {
  private readonly config: LoggerConfig;
  private readonly context: Partial<LogContext>;

  constructor(config: Partial<LoggerConfig> = {}, context: Partial<LogContext> = {}) {
    this.config = {
      minLevel: config.minLevel ?? getDefaultLogLevel(),
      console: config.console ?? true,
      handler: config.handler,
      defaultContext: config.defaultContext ?? {},
    };
    this.context = { ...this.config.defaultContext, ...context };
  }

  /** Logger sharing this one's sinks, with extra correlation context */
  child(ctx: Partial<LogContext>): SpotlightLogger {
    return new SpotlightLogger(this.config, { ...this.context, ...ctx });
  }

  getContext(): Partial<LogContext> {
    return { ...this.context };
  }

  debug(cat: LogCategory, msg: string, data?: Record<string, unknown>): void {
    this.log("debug", cat, msg, data);
  }

  info(cat: LogCategory, msg: string, data?: Record<string, unknown>): void {
    this.log("info", cat, msg, data);
  }

  warn(cat: LogCategory, msg: string, data?: Record<string, unknown>): void {
    this.log("warn", cat, msg, data);
  }

  error(cat: LogCategory, msg: string, err?: Error, data?: Record<string, unknown>): void {
    this.log("error", cat, msg, data, err);
  }

  /** Log a failure the tour recovers from by skipping or falling back */
  logDegraded(cat: LogCategory, reason: string, details: Record<string, unknown>, err?: Error): void {
    this.log("warn", cat, `Degraded: ${reason}`, { reason, ...details }, err);
  }

  private log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>,
    err?: Error
  ): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.config.minLevel]) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      context: this.context,
      data,
      error: err ? { name: err.name, message: err.message, stack: err.stack } : undefined,
    };
    this.config.handler?.(entry);
    if (this.config.console && typeof process !== "undefined") {
      const stream = LEVEL_RANK[level] >= LEVEL_RANK.warn ? process.stderr : process.stdout;
      stream.write(`${formatLogEntry(entry)}\n`);
    }
  }
}

let defaultLogger: SpotlightLogger | null = null;

/** Process-wide logger used when a component is given none */
export function getLogger(): SpotlightLogger {
  if (!defaultLogger) {
    defaultLogger = new SpotlightLogger();
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: SpotlightLogger): void {
  defaultLogger = logger;
}
