import type { OAuthContext } from '../../types/hono.js';
import { z } from 'zod';
import { OAuthError } from '../../errors/oauth-error.js';

/**
 * Parse and validate a form-encoded body
 *
 * Parameters sent more than once arrive as arrays and fail a string
 * schema, as RFC 6749 Section 3.2 forbids repeats.
 */
export async function parseForm<T>(c: OAuthContext, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const body = await c.req.parseBody({ all: true });
  const parsed = schema.safeParse(body);

  if (!parsed.success) {
    const messages = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw OAuthError.invalidRequest(messages);
  }

  return parsed.data;
}

/**
 * Optional single-valued parameter
 */
export const singleParam = () => z.string().min(1).optional();
