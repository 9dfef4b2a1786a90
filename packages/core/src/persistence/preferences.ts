/**
 * Spotlight Preferences
 *
 * Typed async access to a PreferenceBackend. Every call is queued on one
 * serial executor, so reads and writes never interleave.
 */

import { SerialExecutor } from "../concurrency/serialExecutor";
import { MemoryPreferenceBackend } from "./memoryBackend";
import type { PreferenceBackend, PreferenceValue } from "./types";

/** Separator of persisted string lists; list items must not contain it */
export const STRING_LIST_SEPARATOR = ";";

export class SpotlightPreferences {
  private readonly backend: PreferenceBackend;
  private readonly executor = new SerialExecutor();

  constructor(backend: PreferenceBackend = new MemoryPreferenceBackend()) {
    this.backend = backend;
  }

  getValue(key: string): Promise<PreferenceValue | undefined> {
    return this.executor.run(() => this.backend.read(key));
  }

  async getBoolean(key: string, defaultValue: boolean): Promise<boolean> {
    const value = await this.getValue(key);
    return typeof value === "boolean" ? value : defaultValue;
  }

  async getString(key: string, defaultValue: string): Promise<string> {
    const value = await this.getValue(key);
    return typeof value === "string" ? value : defaultValue;
  }

  async getNumber(key: string, defaultValue: number): Promise<number> {
    const value = await this.getValue(key);
    return typeof value === "number" ? value : defaultValue;
  }

  setValue(key: string, value: PreferenceValue): Promise<void> {
    return this.executor.run(() => this.backend.write(key, value));
  }

  setStringList(key: string, list: readonly string[]): Promise<void> {
    return this.setValue(key, list.join(STRING_LIST_SEPARATOR));
  }

  async getStringList(key: string, defaultValue: string[] = []): Promise<string[]> {
    const value = await this.getValue(key);
    if (typeof value !== "string" || value.trim() === "") {
      return defaultValue;
    }
    return value.split(STRING_LIST_SEPARATOR);
  }

  getAll(): Promise<Record<string, PreferenceValue>> {
    return this.executor.run(() => this.backend.entries());
  }

  remove(key: string): Promise<void> {
    return this.executor.run(() => this.backend.delete(key));
  }

  /** Remove every key not listed in `except` */
  clear(except: readonly string[] = []): Promise<void> {
    return this.executor.run(async () => {
      const keep = new Set(except);
      const entries = await this.backend.entries();
      for (const key of Object.keys(entries)) {
        if (!keep.has(key)) {
          await this.backend.delete(key);
        }
      }
    });
  }

  /** Resolves once all queued storage operations have settled */
  flush(): Promise<void> {
    return this.executor.idle();
  }
}
