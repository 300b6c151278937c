import type { ClientInfo, CreateClientInput } from '../../types/client.js';
import type { IClientStorage } from '../interfaces/client-storage.js';
import { generateRandomBase64Url } from '../../crypto/random.js';
import { hashSecret } from '../../crypto/hash.js';

/**
 * In-memory OAuth client storage implementation
 */
export class MemoryClientStorage implements IClientStorage {
  private clients = new Map<string, ClientInfo>();

  async create(input: CreateClientInput): Promise<{ client: ClientInfo; clientSecret?: string }> {
    const clientId = input.clientId ?? generateRandomBase64Url(16);

    let clientSecretHash: string | undefined;
    let clientSecret: string | undefined;

    // Generate secret for confidential clients
    if (input.clientType === 'confidential') {
      clientSecret = input.clientSecret ?? generateRandomBase64Url(32);
      clientSecretHash = await hashSecret(clientSecret);
    }

    const client: ClientInfo = {
      clientId,
      clientSecretHash,
      clientType: input.clientType,
      authMethod: input.authMethod,
      name: input.name,
      allowedGrantTypes: input.allowedGrantTypes,
      allowedScopes: input.allowedScopes,
      backChannelTokenDeliveryMode: input.backChannelTokenDeliveryMode,
      offlineAccessAllowed: input.offlineAccessAllowed ?? false,
      accessTokenTtl: input.accessTokenTtl,
      refreshTokenTtl: input.refreshTokenTtl,
    };

    this.clients.set(clientId, client);

    return { client, clientSecret };
  }

  async findByClientId(clientId: string): Promise<ClientInfo | null> {
    return this.clients.get(clientId) ?? null;
  }

  async delete(clientId: string): Promise<void> {
    this.clients.delete(clientId);
  }
}
