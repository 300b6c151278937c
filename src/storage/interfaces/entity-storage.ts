/**
 * Expiration policy for a stored entity
 *
 * Absolute and sliding expiration can be combined; the entry expires at
 * whichever deadline comes first.
 */
export interface StorageEntryOptions {
  /** Expire at this instant */
  absoluteExpiration?: Date;
  /** Expire this many seconds after being stored */
  absoluteExpirationRelativeToNow?: number;
  /** Expire after this many seconds without a read */
  slidingExpiration?: number;
}

/**
 * Key/value storage for short-lived protocol state
 * (authorization codes, CIBA and device requests, replay markers)
 */
export interface IEntityStorage {
  /**
   * Store or overwrite an entry
   */
  set<T>(key: string, value: T, options?: StorageEntryOptions): Promise<void>;

  /**
   * Read an entry, optionally removing it in the same step
   * Returns null when absent or expired
   */
  get<T>(key: string, removeOnRetrieval?: boolean): Promise<T | null>;

  /**
   * Remove an entry if present
   */
  remove(key: string): Promise<void>;

  /**
   * Atomically remove a live entry
   * Returns true only for the caller that actually removed it
   */
  tryRemove(key: string): Promise<boolean>;
}
