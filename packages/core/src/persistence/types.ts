export type PreferenceValue = boolean | number | string;

/**
 * Durable key-value storage behind SpotlightPreferences.
 * Implementations need not be safe under concurrent calls; the
 * preferences wrapper never issues more than one at a time.
 */
export interface PreferenceBackend {
  read(key: string): Promise<PreferenceValue | undefined>;
  write(key: string, value: PreferenceValue): Promise<void>;
  delete(key: string): Promise<void>;
  entries(): Promise<Record<string, PreferenceValue>>;
}
