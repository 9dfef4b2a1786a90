export { FilePreferenceBackend } from "./fileBackend";
export { MemoryPreferenceBackend } from "./memoryBackend";
export { STRING_LIST_SEPARATOR, SpotlightPreferences } from "./preferences";
export type { PreferenceBackend, PreferenceValue } from "./types";
