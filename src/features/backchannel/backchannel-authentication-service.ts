import type { BackChannelAuthenticationRequest } from '../../types/backchannel.js';
import type { AuthSession } from '../../types/grant.js';
import type { RequestResult } from '../../errors/request-error.js';
import { fail } from '../../errors/request-error.js';
import { ok } from '../../common/result.js';
import { createLogger, type Logger } from '../../logging/logger.js';
import { DEFAULT_CIBA_POLLING_INTERVAL, DEFAULT_CIBA_REQUEST_EXPIRY } from '../../config/constants.js';
import type { IBackChannelAuthenticationStorage } from './backchannel-storage.js';
import type { IStatusNotifier } from './status-notifier.js';

export interface BackChannelAuthenticationServiceOptions {
  storage: IBackChannelAuthenticationStorage;
  notifier?: IStatusNotifier;
  defaultExpiry?: number; // seconds
  pollingInterval?: number; // seconds
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Backchannel authentication response
 * OpenID Connect CIBA Core Section 7.3
 */
export interface BackChannelAuthenticationResponse {
  auth_req_id: string;
  expires_in: number;
  interval: number;
}

/**
 * Authentication-device side of CIBA: starts requests and records the
 * end user's decision, waking any long-polling token request.
 */
export class BackChannelAuthenticationService {
  private readonly storage: IBackChannelAuthenticationStorage;
  private readonly notifier?: IStatusNotifier;
  private readonly defaultExpiry: number;
  private readonly pollingInterval: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: BackChannelAuthenticationServiceOptions) {
    this.storage = options.storage;
    this.notifier = options.notifier;
    this.defaultExpiry = options.defaultExpiry ?? DEFAULT_CIBA_REQUEST_EXPIRY;
    this.pollingInterval = options.pollingInterval ?? DEFAULT_CIBA_POLLING_INTERVAL;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger('ciba');
  }

  async initiate(
    clientId: string,
    scope: string[],
    expiresIn: number = this.defaultExpiry
  ): Promise<BackChannelAuthenticationResponse> {
    const now = this.clock();
    const request: BackChannelAuthenticationRequest = {
      clientId,
      scope,
      status: 'pending',
      createdAt: now,
      expiresAt: new Date(now.getTime() + expiresIn * 1000),
    };

    const authReqId = await this.storage.store(request, expiresIn);
    this.logger.debug('Backchannel authentication initiated', { clientId });

    return { auth_req_id: authReqId, expires_in: expiresIn, interval: this.pollingInterval };
  }

  /**
   * Record a successful end-user authentication
   */
  async complete(authReqId: string, session: AuthSession): Promise<RequestResult<void>> {
    return this.transition(authReqId, (request) => ({
      ...request,
      status: 'authenticated',
      authorizedGrant: {
        session,
        context: { clientId: request.clientId, scope: request.scope },
      },
    }));
  }

  /**
   * Record that the end user refused the request
   */
  async deny(authReqId: string): Promise<RequestResult<void>> {
    return this.transition(authReqId, (request) => ({ ...request, status: 'denied' }));
  }

  private async transition(
    authReqId: string,
    apply: (request: BackChannelAuthenticationRequest) => BackChannelAuthenticationRequest
  ): Promise<RequestResult<void>> {
    const request = await this.storage.tryGet(authReqId);
    if (!request) {
      return fail.expiredToken('The authentication request has expired');
    }
    if (request.status !== 'pending') {
      return fail.invalidRequest('The authentication request was already completed');
    }

    const updated = apply(request);
    const remaining = (request.expiresAt.getTime() - this.clock().getTime()) / 1000;
    await this.storage.update(authReqId, updated, remaining);
    await this.notifier?.notifyStatusChange(authReqId, updated.status);

    this.logger.info('Backchannel authentication completed', {
      clientId: request.clientId,
      status: updated.status,
    });
    return ok(undefined);
  }
}
