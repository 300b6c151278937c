import type { IUserStorage, UserAccount } from '../interfaces/user-storage.js';
import { generateRandomBase64Url } from '../../crypto/random.js';
import { hashSecret } from '../../crypto/hash.js';

/**
 * In-memory resource owner account storage
 */
export class MemoryUserStorage implements IUserStorage {
  private users = new Map<string, UserAccount>(); // lowercased username -> account

  async create(input: { id?: string; username: string; password: string }): Promise<UserAccount> {
    const account: UserAccount = {
      id: input.id ?? generateRandomBase64Url(16),
      username: input.username,
      passwordHash: await hashSecret(input.password),
    };

    this.users.set(input.username.toLowerCase(), account);
    return account;
  }

  async findByUsername(username: string): Promise<UserAccount | null> {
    return this.users.get(username.toLowerCase()) ?? null;
  }
}
