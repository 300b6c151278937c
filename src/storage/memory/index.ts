import type { IStorage } from '../interfaces/index.js';
import { MemoryEntityStorage } from './entity-storage.js';
import { MemoryClientStorage } from './client-storage.js';
import { MemoryUserStorage } from './user-storage.js';

export { MemoryEntityStorage } from './entity-storage.js';
export { MemoryClientStorage } from './client-storage.js';
export { MemoryUserStorage } from './user-storage.js';

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(options: { clock?: () => Date } = {}): IStorage {
  return {
    entities: new MemoryEntityStorage(options.clock),
    clients: new MemoryClientStorage(),
    users: new MemoryUserStorage(),
  };
}
