import type { CodeChallengeMethod } from '../types/oauth.js';
import { sha256Base64Url, sha512Base64Url } from './hash.js';

/**
 * Compute the code challenge for a verifier
 * RFC 7636 Section 4.2
 *
 * plain: code_challenge = code_verifier
 * S256:  code_challenge = BASE64URL(SHA256(ASCII(code_verifier)))
 * S512:  code_challenge = BASE64URL(SHA512(ASCII(code_verifier)))
 */
export function computeCodeChallenge(codeVerifier: string, method: CodeChallengeMethod): string {
  switch (method) {
    case 'plain':
      return codeVerifier;
    case 'S256':
      return sha256Base64Url(codeVerifier);
    case 'S512':
      return sha512Base64Url(codeVerifier);
    default: {
      const unknownMethod: never = method;
      throw new Error(`Unsupported code challenge method: ${String(unknownMethod)}`);
    }
  }
}

/**
 * Verify a code verifier against a stored code challenge
 * RFC 7636 Section 4.6
 *
 * The comparison ignores case.
 */
export function verifyCodeChallenge(
  codeVerifier: string,
  codeChallenge: string,
  method: CodeChallengeMethod
): boolean {
  const computed = computeCodeChallenge(codeVerifier, method);
  return computed.toLowerCase() === codeChallenge.toLowerCase();
}
