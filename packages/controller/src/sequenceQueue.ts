/**
 * Sequence Queue
 *
 * FIFO of zone keys bound to a durable namespace. Mutations run under a
 * mutex and, once the namespace is persistent, write the whole list
 * through to preferences before the lock is released.
 */

import { Mutex, SpotlightError, type SpotlightLogger, type SpotlightPreferences } from "@tourlight/core";

export function persistenceFlagKey(id: string): string {
  return `${id}_persistence`;
}

export function persistentQueueKey(id: string): string {
  return `${id}_persistent_queue`;
}

export class SequenceQueue {
  private items: string[] = [];
  private namespace: string | null = null;
  private readonly mutex = new Mutex();
  private readonly preferences: SpotlightPreferences;
  private readonly logger: () => SpotlightLogger;

  constructor(preferences: SpotlightPreferences, logger: () => SpotlightLogger) {
    this.preferences = preferences;
    this.logger = logger;
  }

  get id(): string | null {
    return this.namespace;
  }

  get length(): number {
    return this.items.length;
  }

  snapshot(): readonly string[] {
    return [...this.items];
  }

  /** Bind to `id`, reloading the stored queue when it is persistent */
  bind(id: string): Promise<void> {
    return this.mutex.runExclusive(async () => {
      this.namespace = id;
      if (!(await this.readPersistent(id))) {
        return;
      }
      this.items = await this.preferences.getStringList(persistentQueueKey(id));
      this.logger().info("persistence", "Restored persistent queue", { length: this.items.length });
    });
  }

  async isPersistent(): Promise<boolean> {
    return this.readPersistent(this.requireNamespace());
  }

  /**
   * Mark the namespace persistent and store the current queue.
   * @returns false when it already was persistent
   */
  async setPersistent(): Promise<boolean> {
    const id = this.requireNamespace();
    return this.mutex.runExclusive(async () => {
      if (await this.readPersistent(id)) {
        return false;
      }
      await this.preferences.setValue(persistenceFlagKey(id), true);
      await this.preferences.setStringList(persistentQueueKey(id), this.items);
      return true;
    });
  }

  /**
   * Append unless the namespace is persistent.
   * @returns whether the key was appended
   */
  async append(key: string): Promise<boolean> {
    const id = this.requireNamespace();
    return this.mutex.runExclusive(async () => {
      if (await this.readPersistent(id)) {
        return false;
      }
      this.items.push(key);
      return true;
    });
  }

  /**
   * Run `block` against the live list under the lock, then write the list
   * through when persistent, also when `block` throws. `block` must not yield.
   */
  async transaction<T>(block: (items: string[]) => T): Promise<T> {
    const id = this.requireNamespace();
    return this.mutex.runExclusive(async () => {
      try {
        return block(this.items);
      } finally {
        if (await this.readPersistent(id)) {
          await this.preferences.setStringList(persistentQueueKey(id), this.items);
        }
      }
    });
  }

  /** Drop the in-memory queue; stored state is untouched */
  reset(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      this.items = [];
    });
  }

  private readPersistent(id: string): Promise<boolean> {
    return this.preferences.getBoolean(persistenceFlagKey(id), false);
  }

  private requireNamespace(): string {
    if (this.namespace === null) {
      throw new SpotlightError("SETUP_REQUIRED", "setup(id) must be called before using the queue");
    }
    return this.namespace;
  }
}
