import type { PreferenceBackend, PreferenceValue } from "./types";

/** Process-local backend, used by default and in tests */
export class MemoryPreferenceBackend implements PreferenceBackend {
  private readonly values: Map<string, PreferenceValue>;

  constructor(initial: Record<string, PreferenceValue> = {}) {
    this.values = new Map(Object.entries(initial));
  }

  async read(key: string): Promise<PreferenceValue | undefined> {
    return this.values.get(key);
  }

  async write(key: string, value: PreferenceValue): Promise<void> {
    this.values.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
  }

  async entries(): Promise<Record<string, PreferenceValue>> {
    return Object.fromEntries(this.values);
  }
}
