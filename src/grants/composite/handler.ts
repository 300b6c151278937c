import type { IGrantHandler } from '../grant-handler.js';
import { fail } from '../../errors/request-error.js';

/**
 * Routes a token request to the handler registered for its grant_type
 *
 * Grant types are matched case-insensitively. Registering one grant
 * type twice fails at construction.
 */
export function createCompositeGrantHandler(handlers: readonly IGrantHandler[]): IGrantHandler {
  const registry = new Map<string, IGrantHandler>();

  for (const handler of handlers) {
    for (const grantType of handler.grantTypesSupported) {
      const key = grantType.toLowerCase();
      if (registry.has(key)) {
        throw new Error(`Grant type ${grantType} is registered by more than one handler`);
      }
      registry.set(key, handler);
    }
  }

  return {
    grantTypesSupported: [...registry.keys()],

    async authorize(request, client, context) {
      const grantType = request.grantType.toLowerCase();
      const handler = registry.get(grantType);
      if (!handler) {
        return fail.unsupportedGrantType('The grant type is not supported');
      }

      if (!client.allowedGrantTypes.some((allowed) => allowed.toLowerCase() === grantType)) {
        return fail.unauthorizedClient('The grant type is not allowed for this client');
      }

      return handler.authorize(request, client, context);
    },
  };
}
