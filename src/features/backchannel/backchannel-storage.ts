import type { BackChannelAuthenticationRequest } from '../../types/backchannel.js';
import type { IEntityStorage } from '../../storage/interfaces/index.js';
import { generateRandomBase64Url } from '../../crypto/random.js';
import { AUTH_REQUEST_ID_LENGTH } from '../../config/constants.js';

const KEY_PREFIX = 'ciba:';

/**
 * Storage for CIBA authentication requests, keyed by auth_req_id
 */
export interface IBackChannelAuthenticationStorage {
  /**
   * Persist a new request and return its auth_req_id
   */
  store(request: BackChannelAuthenticationRequest, expiresIn: number): Promise<string>;

  tryGet(authReqId: string): Promise<BackChannelAuthenticationRequest | null>;

  /**
   * Overwrite a request, keeping it alive for `expiresIn` seconds
   */
  update(authReqId: string, request: BackChannelAuthenticationRequest, expiresIn: number): Promise<void>;

  remove(authReqId: string): Promise<void>;

  /**
   * Atomically remove a request; true only for the caller that removed it
   */
  tryRemove(authReqId: string): Promise<boolean>;
}

export class BackChannelAuthenticationStorage implements IBackChannelAuthenticationStorage {
  constructor(private readonly storage: IEntityStorage) {}

  async store(request: BackChannelAuthenticationRequest, expiresIn: number): Promise<string> {
    const authReqId = generateRandomBase64Url(AUTH_REQUEST_ID_LENGTH);
    await this.update(authReqId, request, expiresIn);
    return authReqId;
  }

  tryGet(authReqId: string): Promise<BackChannelAuthenticationRequest | null> {
    return this.storage.get<BackChannelAuthenticationRequest>(KEY_PREFIX + authReqId);
  }

  update(authReqId: string, request: BackChannelAuthenticationRequest, expiresIn: number): Promise<void> {
    return this.storage.set(KEY_PREFIX + authReqId, request, { absoluteExpirationRelativeToNow: expiresIn });
  }

  remove(authReqId: string): Promise<void> {
    return this.storage.remove(KEY_PREFIX + authReqId);
  }

  tryRemove(authReqId: string): Promise<boolean> {
    return this.storage.tryRemove(KEY_PREFIX + authReqId);
  }
}
