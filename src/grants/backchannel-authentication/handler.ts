import type { IGrantHandler, GrantContext } from '../grant-handler.js';
import type { ClientInfo } from '../../types/client.js';
import type { AuthorizedGrant } from '../../types/grant.js';
import type { BackChannelAuthenticationRequest } from '../../types/backchannel.js';
import type { IBackChannelAuthenticationStorage } from '../../features/backchannel/backchannel-storage.js';
import type { IStatusNotifier } from '../../features/backchannel/status-notifier.js';
import {
  createBackChannelGrantProcessors,
  type BackChannelGrantProcessors,
} from '../../features/backchannel/grant-processors.js';
import { required } from '../../common/parameter-validator.js';
import { fail, type RequestResult } from '../../errors/request-error.js';
import { createLogger, type Logger } from '../../logging/logger.js';
import {
  DEFAULT_CIBA_LONG_POLLING_TIMEOUT,
  DEFAULT_CIBA_POLLING_INTERVAL,
  DELIVERY_MODE_POLL,
  GRANT_TYPE_CIBA,
} from '../../config/constants.js';

export interface BackChannelAuthenticationHandlerOptions {
  storage: IBackChannelAuthenticationStorage;
  processors?: BackChannelGrantProcessors;
  notifier?: IStatusNotifier;
  pollingInterval?: number; // seconds
  useLongPolling?: boolean;
  longPollingTimeout?: number; // seconds
  clock?: () => Date;
  logger?: Logger;
}

/**
 * CIBA grant: token requests polling for a backchannel authentication
 *
 * OpenID Connect CIBA Core Section 10-11
 *
 * pending -> authenticated | denied; a missing record is expired or consumed.
 */
export function createBackChannelAuthenticationHandler(
  options: BackChannelAuthenticationHandlerOptions
): IGrantHandler {
  const {
    storage,
    processors = createBackChannelGrantProcessors(storage),
    notifier,
    pollingInterval = DEFAULT_CIBA_POLLING_INTERVAL,
    useLongPolling = false,
    longPollingTimeout = DEFAULT_CIBA_LONG_POLLING_TIMEOUT,
    clock = () => new Date(),
    logger = createLogger('ciba'),
  } = options;

  const expired = () => fail.expiredToken('The authentication request has expired');
  const denied = () => fail.accessDenied('The end user denied the authentication request');
  const pending = () =>
    fail.authorizationPending(
      `The authentication request is still pending, retry in ${pollingInterval} seconds`
    );

  const finalize = (
    authReqId: string,
    request: BackChannelAuthenticationRequest,
    client: ClientInfo
  ): Promise<RequestResult<AuthorizedGrant>> => {
    const mode = client.backChannelTokenDeliveryMode ?? DELIVERY_MODE_POLL;
    return processors[mode].process(authReqId, request);
  };

  const poll = async (
    authReqId: string,
    request: BackChannelAuthenticationRequest,
    client: ClientInfo,
    context: GrantContext
  ): Promise<RequestResult<AuthorizedGrant>> => {
    const now = clock();
    if (request.nextPollAt && now.getTime() < request.nextPollAt.getTime()) {
      logger.debug('Client polling too fast', { clientId: client.clientId });
      return fail.slowDown(`Wait at least ${pollingInterval} seconds between polls`);
    }

    // Unlocked read-modify-write. Concurrent polls may both pass the check
    // above. A completion stored between our read and this write is
    // overwritten with the stale pending record, so the end user's decision
    // is lost and the request stays pending until it expires.
    const updated: BackChannelAuthenticationRequest = {
      ...request,
      nextPollAt: new Date(now.getTime() + pollingInterval * 1000),
    };
    await storage.update(authReqId, updated, (request.expiresAt.getTime() - now.getTime()) / 1000);

    if (!useLongPolling || !notifier) {
      return pending();
    }

    const notified = await notifier.waitForStatusChange(authReqId, longPollingTimeout * 1000, context.signal);
    if (!notified) {
      return pending();
    }

    const current = await storage.tryGet(authReqId);
    if (!current) {
      return expired();
    }

    switch (current.status) {
      case 'authenticated':
        return finalize(authReqId, current, client);
      case 'denied':
        await storage.remove(authReqId);
        return denied();
      default:
        return pending();
    }
  };

  return {
    grantTypesSupported: [GRANT_TYPE_CIBA],

    async authorize(request, client, context = {}) {
      required(request.authenticationRequestId, 'auth_req_id');
      const authReqId = request.authenticationRequestId;

      const record = await storage.tryGet(authReqId);
      if (!record) {
        return expired();
      }

      // Ownership before status, so other clients learn nothing about the request
      if (record.clientId !== client.clientId) {
        logger.warn('Backchannel request polled by another client', {
          clientId: client.clientId,
          ownerClientId: record.clientId,
          remoteIp: context.remoteIp,
        });
        return fail.invalidGrant('The authentication request was issued to another client');
      }

      switch (record.status) {
        case 'authenticated':
          return finalize(authReqId, record, client);
        case 'pending':
          return poll(authReqId, record, client, context);
        case 'denied':
          await storage.remove(authReqId);
          return denied();
        default: {
          const status: never = record.status;
          throw new Error(`Unexpected backchannel authentication status: ${String(status)}`);
        }
      }
    },
  };
}
