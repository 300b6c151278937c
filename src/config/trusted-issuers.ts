import { readFileSync } from 'node:fs';
import { z } from 'zod';

const jwkSchema = z.object({
  kty: z.string(),
  kid: z.string().optional(),
  alg: z.string().optional(),
  use: z.string().optional(),
  crv: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional(),
  n: z.string().optional(),
  e: z.string().optional(),
});

/**
 * Issuer whose JWT assertions may be exchanged for tokens (RFC 7523)
 */
export const trustedIssuerSchema = z
  .object({
    issuer: z.string().min(1),
    jwksUri: z.string().url().optional(),
    jwks: z.object({ keys: z.array(jwkSchema) }).optional(),
    allowedAlgorithms: z.array(z.string()).optional(),
    allowedScopes: z.array(z.string()).optional(),
  })
  .refine((value) => value.jwks !== undefined || value.jwksUri !== undefined, {
    message: 'Either jwks or jwksUri is required',
  });

export const trustedIssuersSchema = z.array(trustedIssuerSchema);

export type TrustedIssuer = z.infer<typeof trustedIssuerSchema>;

/**
 * Load and validate a trusted issuer list from a JSON file
 */
export function loadTrustedIssuers(path: string): TrustedIssuer[] {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const parsed = trustedIssuersSchema.safeParse(raw);

  if (!parsed.success) {
    const messages = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid trusted issuers file ${path}: ${messages}`);
  }

  return parsed.data;
}
