export * from './entity-storage.js';
export * from './client-storage.js';
export * from './user-storage.js';

import type { IEntityStorage } from './entity-storage.js';
import type { IClientStorage } from './client-storage.js';
import type { IUserStorage } from './user-storage.js';

/**
 * Complete storage interface for the authorization server
 */
export interface IStorage {
  entities: IEntityStorage;
  clients: IClientStorage;
  users: IUserStorage;
}
