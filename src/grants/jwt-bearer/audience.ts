/**
 * Normalize an absolute URI for audience comparison (RFC 3986 Section 6.2.2)
 *
 * Only scheme, host, port and path take part. The URL parser lowercases
 * scheme and host and drops default ports; trailing slashes are removed
 * from the path. Returns null for relative or malformed values.
 */
export function normalizeAudience(value: string): string | null {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return null;
  }

  const path = url.pathname.replace(/\/+$/, '');
  return `${url.protocol}//${url.host}${path}`;
}

/**
 * Build the audience predicate for JWT bearer assertions
 *
 * Strict mode accepts only the token endpoint; otherwise the
 * application base URI is accepted as well.
 */
export function createAudienceValidator(options: {
  tokenEndpoint: string;
  applicationUri: string;
  strict: boolean;
}): (audiences: string[]) => boolean {
  const accepted = new Set<string>();
  for (const uri of options.strict ? [options.tokenEndpoint] : [options.tokenEndpoint, options.applicationUri]) {
    const normalized = normalizeAudience(uri);
    if (normalized !== null) {
      accepted.add(normalized);
    }
  }

  return (audiences) =>
    audiences.some((audience) => {
      const normalized = normalizeAudience(audience);
      return normalized !== null && accepted.has(normalized);
    });
}
