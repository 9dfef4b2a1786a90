/**
 * Spotlight Preferences Tests
 */

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SpotlightLogger } from "../observability/logger";
import type { LogEntry } from "../observability/types";
import { FilePreferenceBackend } from "../persistence/fileBackend";
import { MemoryPreferenceBackend } from "../persistence/memoryBackend";
import { SpotlightPreferences } from "../persistence/preferences";
import type { PreferenceValue } from "../persistence/types";

class SlowBackend extends MemoryPreferenceBackend {
  inFlight = 0;
  maxInFlight = 0;

  override async write(key: string, value: PreferenceValue): Promise<void> {
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, 5));
    await super.write(key, value);
    this.inFlight -= 1;
  }
}

describe("SpotlightPreferences", () => {
  it("stores string lists joined by semicolons", async () => {
    const prefs = new SpotlightPreferences();

    await prefs.setStringList("tour_persistent_queue", ["a", "b", "c"]);

    expect(await prefs.getValue("tour_persistent_queue")).toBe("a;b;c");
    expect(await prefs.getStringList("tour_persistent_queue")).toEqual(["a", "b", "c"]);
  });

  it("returns the default for blank or missing lists", async () => {
    const prefs = new SpotlightPreferences();

    await prefs.setStringList("empty", []);

    expect(await prefs.getStringList("empty", ["fallback"])).toEqual(["fallback"]);
    expect(await prefs.getStringList("missing")).toEqual([]);
  });

  it("falls back to the default when the stored type differs", async () => {
    const prefs = new SpotlightPreferences();

    await prefs.setValue("flag", "yes");
    await prefs.setValue("count", 3);

    expect(await prefs.getBoolean("flag", false)).toBe(false);
    expect(await prefs.getString("flag", "")).toBe("yes");
    expect(await prefs.getNumber("count", 0)).toBe(3);
  });

  it("clears every key except the kept ones", async () => {
    const prefs = new SpotlightPreferences();
    await prefs.setValue("a", 1);
    await prefs.setValue("b", 2);
    await prefs.setValue("c", 3);

    await prefs.clear(["b"]);

    expect(await prefs.getAll()).toEqual({ b: 2 });
  });

  it("never runs two storage operations at once", async () => {
    const backend = new SlowBackend();
    const prefs = new SpotlightPreferences(backend);

    await Promise.all([prefs.setValue("a", 1), prefs.setValue("b", 2), prefs.getValue("a")]);

    expect(backend.maxInFlight).toBe(1);
    expect(await prefs.getAll()).toEqual({ a: 1, b: 2 });
  });
});

describe("FilePreferenceBackend", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tourlight-prefs-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("persists values across instances", async () => {
    const filePath = join(dir, "nested", "prefs.json");
    const prefs = new SpotlightPreferences(new FilePreferenceBackend(filePath));

    await prefs.setValue("tour_persistence", true);
    await prefs.setStringList("tour_persistent_queue", ["a", "b"]);

    const reopened = new SpotlightPreferences(new FilePreferenceBackend(filePath));
    expect(await reopened.getBoolean("tour_persistence", false)).toBe(true);
    expect(await reopened.getStringList("tour_persistent_queue")).toEqual(["a", "b"]);

    const raw: unknown = JSON.parse(await readFile(filePath, "utf-8"));
    expect(raw).toEqual({
      version: 1,
      values: { tour_persistence: true, tour_persistent_queue: "a;b" },
    });
  });

  it("keeps reads on the stored values when a write fails", async () => {
    const filePath = join(dir, "nested", "prefs.json");
    const backend = new FilePreferenceBackend(filePath, { logger: new SpotlightLogger({ console: false }) });
    await backend.write("tour_persistent_queue", "a;b");
    await rm(join(dir, "nested"), { recursive: true });
    await writeFile(join(dir, "nested"), "not a directory", "utf-8");

    await expect(backend.write("tour_persistence", true)).rejects.toMatchObject({ code: "STORAGE_IO" });
    await expect(backend.delete("tour_persistent_queue")).rejects.toMatchObject({ code: "STORAGE_IO" });

    expect(await backend.read("tour_persistence")).toBeUndefined();
    expect(await backend.entries()).toEqual({ tour_persistent_queue: "a;b" });
  });

  it("treats a malformed file as empty and logs it", async () => {
    const filePath = join(dir, "prefs.json");
    await writeFile(filePath, "{not json", "utf-8");
    const entries: LogEntry[] = [];
    const logger = new SpotlightLogger({ console: false, handler: (entry) => entries.push(entry) });

    const backend = new FilePreferenceBackend(filePath, { logger });

    expect(await backend.read("tour_persistence")).toBeUndefined();
    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe("warn");
    expect(entries[0].message).toBe("Degraded: preference file is not valid JSON");
  });

  it("rejects files with an unexpected shape", async () => {
    const filePath = join(dir, "prefs.json");
    await writeFile(filePath, JSON.stringify({ version: 2, values: {} }), "utf-8");
    const entries: LogEntry[] = [];
    const logger = new SpotlightLogger({ console: false, handler: (entry) => entries.push(entry) });

    const backend = new FilePreferenceBackend(filePath, { logger });

    expect(await backend.entries()).toEqual({});
    expect(entries[0].message).toBe("Degraded: preference file has an unexpected shape");
  });
});
