/**
 * Resource owner account used by the password grant
 */
export interface UserAccount {
  id: string;
  username: string;
  passwordHash: string;
  disabled?: boolean;
}

/**
 * Storage interface for resource owner accounts
 */
export interface IUserStorage {
  /**
   * Create an account, hashing the plaintext password
   */
  create(input: { id?: string; username: string; password: string }): Promise<UserAccount>;

  /**
   * Find an account by username (case-insensitive)
   */
  findByUsername(username: string): Promise<UserAccount | null>;
}
