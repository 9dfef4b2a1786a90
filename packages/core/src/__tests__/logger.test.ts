import { describe, expect, it } from "vitest";
import { SpotlightLogger, formatLogEntry, getLogger, setDefaultLogger } from "../observability/logger";
import type { LogEntry } from "../observability/types";

function createCapturingLogger(): { logger: SpotlightLogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new SpotlightLogger({
    minLevel: "info",
    console: false,
    handler: (entry) => entries.push(entry),
  });
  return { logger, entries };
}

describe("SpotlightLogger", () => {
  it("drops entries below the minimum level", () => {
    const { logger, entries } = createCapturingLogger();

    logger.debug("queue", "hidden");
    logger.info("queue", "shown", { size: 2 });

    expect(entries).toHaveLength(1);
    expect(entries[0].message).toBe("shown");
    expect(entries[0].data).toEqual({ size: 2 });
  });

  it("merges child context", () => {
    const { logger, entries } = createCapturingLogger();

    const child = logger.child({ controllerId: "onboarding" }).child({ zoneKey: "profile" });
    child.warn("registry", "late");

    expect(entries[0].level).toBe("warn");
    expect(entries[0].context).toEqual({ controllerId: "onboarding", zoneKey: "profile" });
    expect(logger.getContext()).toEqual({});
  });

  it("serialises errors", () => {
    const { logger, entries } = createCapturingLogger();

    logger.error("audio", "playback failed", new Error("decode"));

    expect(entries[0].error?.name).toBe("Error");
    expect(entries[0].error?.message).toBe("decode");
  });

  it("prefixes degraded-path warnings", () => {
    const { logger, entries } = createCapturingLogger();

    logger.logDegraded("queue", "registration timeout", { zoneKey: "b" });

    expect(entries[0].message).toBe("Degraded: registration timeout");
    expect(entries[0].data).toEqual({ reason: "registration timeout", zoneKey: "b" });
  });

  it("replaces the process-wide default", () => {
    const previous = getLogger();
    const { logger } = createCapturingLogger();

    setDefaultLogger(logger);
    expect(getLogger()).toBe(logger);
    setDefaultLogger(previous);
  });
});

describe("formatLogEntry", () => {
  it("writes context, data and error on one line", () => {
    const line = formatLogEntry({
      timestamp: "2024-05-01T10:00:00.000Z",
      level: "warn",
      category: "registry",
      message: "Degraded: zone not registered in time",
      context: { controllerId: "onboarding", zoneKey: "profile" },
      data: { timeoutMs: 3000 },
      error: { name: "Error", message: "late" },
    });

    expect(line).toBe(
      '[2024-05-01T10:00:00.000Z] [WARN] [registry] (onboarding) <profile> Degraded: zone not registered in time {"timeoutMs":3000} Error: late'
    );
  });

  it("omits absent parts", () => {
    const line = formatLogEntry({
      timestamp: "2024-05-01T10:00:00.000Z",
      level: "info",
      category: "manager",
      message: "Tour reset",
      context: {},
    });

    expect(line).toBe("[2024-05-01T10:00:00.000Z] [INFO] [manager] Tour reset");
  });
});
