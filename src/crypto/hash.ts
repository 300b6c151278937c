import { createHash, timingSafeEqual, randomBytes, scrypt as scryptCallback } from 'node:crypto';

/**
 * Promisified scrypt function
 */
function scryptAsync(
  password: string,
  salt: Buffer,
  keyLength: number,
  options: { N: number; r: number; p: number }
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scryptCallback(password, salt, keyLength, options, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

/**
 * Hash a value using SHA-256 and return as base64url
 */
export function sha256Base64Url(value: string): string {
  return createHash('sha256').update(value, 'ascii').digest('base64url');
}

/**
 * Hash a value using SHA-512 and return as base64url
 */
export function sha512Base64Url(value: string): string {
  return createHash('sha512').update(value, 'ascii').digest('base64url');
}

/**
 * Hash a secret (client secret or user password) using scrypt
 * Returns format: $scrypt$N$r$p$salt$hash
 */
export async function hashSecret(secret: string): Promise<string> {
  const salt = randomBytes(16);
  const N = 16384; // CPU/memory cost
  const r = 8; // Block size
  const p = 1; // Parallelization
  const keyLength = 64;

  const hash = await scryptAsync(secret, salt, keyLength, { N, r, p });

  return `$scrypt$${N}$${r}$${p}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

/**
 * Verify a secret against its scrypt hash
 */
export async function verifySecret(secret: string, hash: string): Promise<boolean> {
  // Expected format: $scrypt$N$r$p$salt$hash
  const [, scheme, n, r, p, salt, stored] = hash.split('$');

  if (scheme !== 'scrypt' || !n || !r || !p || !salt || !stored) {
    return false;
  }

  const storedHash = Buffer.from(stored, 'base64');
  const derivedHash = await scryptAsync(secret, Buffer.from(salt, 'base64'), storedHash.length, {
    N: parseInt(n, 10),
    r: parseInt(r, 10),
    p: parseInt(p, 10),
  });

  return timingSafeEqual(storedHash, derivedHash);
}
