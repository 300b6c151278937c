import { randomBytes, randomUUID } from 'node:crypto';
import { USER_CODE_CHARSET, USER_CODE_LENGTH } from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate a user-friendly user code for device authorization
 * Format: XXXX-XXXX (easy to type, no ambiguous characters)
 */
export function generateUserCode(length: number = USER_CODE_LENGTH): string {
  const bytes = randomBytes(length);
  let code = '';

  bytes.forEach((byte, i) => {
    code += USER_CODE_CHARSET.charAt(byte % USER_CODE_CHARSET.length);
    // Add hyphen in the middle
    if (i === length / 2 - 1) {
      code += '-';
    }
  });

  return code;
}

/**
 * Normalize a user-entered user code: uppercase, no separators
 */
export function normalizeUserCode(userCode: string): string {
  return userCode.replace(/[^A-Za-z]/g, '').toUpperCase();
}

/**
 * Generate a unique JWT ID (jti)
 */
export function generateJti(): string {
  return generateRandomBase64Url(16);
}

/**
 * Generate a unique key ID (kid) for signing keys
 */
export function generateKid(): string {
  return generateRandomBase64Url(12);
}

/**
 * Generate a session identifier
 */
export function generateSessionId(): string {
  return randomUUID();
}
