import type { IEntityStorage, StorageEntryOptions } from '../interfaces/entity-storage.js';

interface Entry {
  value: unknown;
  absoluteExpiresAt?: number;
  slidingSeconds?: number;
  lastAccessedAt: number;
}

/**
 * In-memory entity storage
 *
 * Values are structured-cloned on the way in and out, so callers never
 * share state with the store. Expired entries are purged on access.
 */
export class MemoryEntityStorage implements IEntityStorage {
  private entries = new Map<string, Entry>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async set<T>(key: string, value: T, options: StorageEntryOptions = {}): Promise<void> {
    const now = this.clock().getTime();
    const deadlines: number[] = [];

    if (options.absoluteExpiration) {
      deadlines.push(options.absoluteExpiration.getTime());
    }
    if (options.absoluteExpirationRelativeToNow !== undefined) {
      deadlines.push(now + options.absoluteExpirationRelativeToNow * 1000);
    }

    this.entries.set(key, {
      value: structuredClone(value),
      absoluteExpiresAt: deadlines.length > 0 ? Math.min(...deadlines) : undefined,
      slidingSeconds: options.slidingExpiration,
      lastAccessedAt: now,
    });
  }

  async get<T>(key: string, removeOnRetrieval = false): Promise<T | null> {
    const entry = this.live(key);
    if (!entry) {
      return null;
    }

    if (removeOnRetrieval) {
      this.entries.delete(key);
    } else {
      entry.lastAccessedAt = this.clock().getTime();
    }

    // Callers state the stored type; the store keeps whatever was set under the key
    return structuredClone(entry.value) as T;
  }

  async remove(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async tryRemove(key: string): Promise<boolean> {
    // Synchronous check-and-delete: no await between the read and the delete
    if (!this.live(key)) {
      return false;
    }
    return this.entries.delete(key);
  }

  /**
   * Number of live entries
   */
  get size(): number {
    for (const key of [...this.entries.keys()]) {
      this.live(key);
    }
    return this.entries.size;
  }

  private live(key: string): Entry | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    const now = this.clock().getTime();
    const absoluteExpired = entry.absoluteExpiresAt !== undefined && now >= entry.absoluteExpiresAt;
    const slidingExpired =
      entry.slidingSeconds !== undefined && now >= entry.lastAccessedAt + entry.slidingSeconds * 1000;

    if (absoluteExpired || slidingExpired) {
      this.entries.delete(key);
      return null;
    }

    return entry;
  }
}
