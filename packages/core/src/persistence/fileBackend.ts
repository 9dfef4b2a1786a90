import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { SpotlightError } from "../errors";
import { type SpotlightLogger, getLogger } from "../observability/logger";
import type { PreferenceBackend, PreferenceValue } from "./types";

const PreferenceFileSchema = z.object({
  version: z.literal(1),
  values: z.record(z.union([z.boolean(), z.number(), z.string()])),
});

type PreferenceFile = z.infer<typeof PreferenceFileSchema>;

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * JSON file backend.
 *
 * The whole file is loaded once and rewritten on every mutation through a
 * temp file + rename. A malformed file is logged and treated as empty.
 */
export class FilePreferenceBackend implements PreferenceBackend {
  private readonly filePath: string;
  private readonly logger: SpotlightLogger;
  private cache: Map<string, PreferenceValue> | null = null;

  constructor(filePath: string, options: { logger?: SpotlightLogger } = {}) {
    this.filePath = filePath;
    this.logger = options.logger ?? getLogger();
  }

  async read(key: string): Promise<PreferenceValue | undefined> {
    const values = await this.load();
    return values.get(key);
  }

  async write(key: string, value: PreferenceValue): Promise<void> {
    const next = new Map(await this.load());
    next.set(key, value);
    await this.commit(next);
  }

  async delete(key: string): Promise<void> {
    const next = new Map(await this.load());
    if (!next.delete(key)) {
      return;
    }
    await this.commit(next);
  }

  async entries(): Promise<Record<string, PreferenceValue>> {
    const values = await this.load();
    return Object.fromEntries(values);
  }

  private async load(): Promise<Map<string, PreferenceValue>> {
    if (this.cache) {
      return this.cache;
    }
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFileError(error)) {
        this.cache = new Map();
        return this.cache;
      }
      throw new SpotlightError("STORAGE_IO", `Failed to read ${this.filePath}`, { cause: error });
    }

    const parsed = this.parse(raw);
    this.cache = new Map(Object.entries(parsed?.values ?? {}));
    return this.cache;
  }

  private parse(raw: string): PreferenceFile | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.logDegraded(
        "persistence",
        "preference file is not valid JSON",
        { filePath: this.filePath },
        error instanceof Error ? error : undefined
      );
      return null;
    }
    const result = PreferenceFileSchema.safeParse(json);
    if (!result.success) {
      this.logger.logDegraded("persistence", "preference file has an unexpected shape", {
        filePath: this.filePath,
        issues: result.error.issues.map((issue) => issue.message),
      });
      return null;
    }
    return result.data;
  }

  /** The cache only takes `values` once they are on disk */
  private async commit(values: Map<string, PreferenceValue>): Promise<void> {
    const payload: PreferenceFile = { version: 1, values: Object.fromEntries(values) };
    const tempPath = `${this.filePath}.${Date.now()}-${Math.random().toString(36).slice(2, 8)}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(payload, null, 2), "utf-8");
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn("persistence", "Failed to remove temporary preference file", {
          tempPath,
          error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        });
      });
      throw new SpotlightError("STORAGE_IO", `Failed to write ${this.filePath}`, { cause: error });
    }
    this.cache = values;
  }
}
