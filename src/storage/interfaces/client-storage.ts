import type { ClientInfo, CreateClientInput } from '../../types/client.js';

/**
 * Storage interface for OAuth client records
 */
export interface IClientStorage {
  /**
   * Create a new OAuth client
   * Returns the client and, for confidential clients, the plaintext secret
   */
  create(input: CreateClientInput): Promise<{ client: ClientInfo; clientSecret?: string }>;

  /**
   * Find a client by client_id
   */
  findByClientId(clientId: string): Promise<ClientInfo | null>;

  /**
   * Delete a client
   */
  delete(clientId: string): Promise<void>;
}
