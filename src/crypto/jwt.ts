import { createPrivateKey, createPublicKey } from 'node:crypto';
import * as jose from 'jose';
import type { Result } from '../common/result.js';
import { ok, err } from '../common/result.js';
import type { SUPPORTED_SIGNING_ALGORITHMS } from '../config/constants.js';
import { ERROR_INVALID_TOKEN } from '../errors/error-codes.js';
import { generateJti, generateKid } from './random.js';

/**
 * JWT signing and validation utilities using jose library
 */

export type SigningAlgorithm = (typeof SUPPORTED_SIGNING_ALGORITHMS)[number];

/**
 * Key pair used to sign issued tokens
 */
export interface SigningKey {
  kid: string;
  algorithm: SigningAlgorithm;
  privateKey: jose.KeyLike;
  publicKey: jose.KeyLike;
}

/**
 * Generate a new signing key pair
 */
export async function generateSigningKey(algorithm: SigningAlgorithm = 'ES256'): Promise<SigningKey> {
  const { publicKey, privateKey } = await jose.generateKeyPair(algorithm, {
    modulusLength: algorithm.endsWith('512') && !algorithm.startsWith('ES') ? 4096 : 2048,
  });

  return { kid: generateKid(), algorithm, privateKey, publicKey };
}

/**
 * Load a signing key from a PKCS#8 PEM private key
 */
export function importSigningKey(pem: string, algorithm: SigningAlgorithm, kid: string = generateKid()): SigningKey {
  const privateKey = createPrivateKey(pem);
  return { kid, algorithm, privateKey, publicKey: createPublicKey(privateKey) };
}

/**
 * Sign a JWT with the given "typ" header
 */
export async function signJwt(
  payload: jose.JWTPayload,
  signingKey: SigningKey,
  typ: string
): Promise<string> {
  return new jose.SignJWT({ jti: generateJti(), ...payload })
    .setProtectedHeader({
      alg: signingKey.algorithm,
      kid: signingKey.kid,
      typ,
    })
    .sign(signingKey.privateKey);
}

/**
 * A token whose signature and claims passed validation
 */
export interface ValidJsonWebToken {
  token: string;
  header: jose.ProtectedHeaderParameters;
  payload: jose.JWTPayload;
}

export interface JwtValidationError {
  error: typeof ERROR_INVALID_TOKEN;
  description: string;
}

/**
 * Resolves the verification key for a token, or null when none is known
 */
export type SigningKeyResolver = (
  payload: jose.JWTPayload,
  header: jose.ProtectedHeaderParameters
) => Promise<jose.JWTVerifyGetKey | null> | jose.JWTVerifyGetKey | null;

export interface JwtValidationParameters {
  validateLifetime?: boolean;
  validateIssuer?: boolean;
  validateAudience?: boolean;
  issuerValidator?: (issuer: string) => boolean | Promise<boolean>;
  audienceValidator?: (audiences: string[]) => boolean;
  signingKeyResolver: SigningKeyResolver;
  /** Allowed clock skew in seconds */
  clockSkew?: number;
  currentDate?: Date;
}

export interface IJsonWebTokenValidator {
  validate(token: string, parameters: JwtValidationParameters): Promise<Result<ValidJsonWebToken, JwtValidationError>>;
}

function invalidToken(description: string): Result<never, JwtValidationError> {
  return err({ error: ERROR_INVALID_TOKEN, description });
}

function describeJoseError(error: jose.errors.JOSEError): string {
  if (error instanceof jose.errors.JWTExpired) {
    return 'The token has expired';
  }
  if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
    return 'The token signature is invalid';
  }
  if (error instanceof jose.errors.JWKSNoMatchingKey) {
    return 'No matching signing key was found';
  }
  return error.message;
}

/**
 * Validates signed JWTs
 *
 * Order: decode, issuer, key resolution, signature and lifetime, audience.
 * The issuer is checked before any key is fetched.
 */
export class JsonWebTokenValidator implements IJsonWebTokenValidator {
  async validate(
    token: string,
    parameters: JwtValidationParameters
  ): Promise<Result<ValidJsonWebToken, JwtValidationError>> {
    const {
      validateLifetime = true,
      validateIssuer = true,
      validateAudience = true,
      issuerValidator,
      audienceValidator,
      signingKeyResolver,
      clockSkew = 0,
      currentDate,
    } = parameters;

    let header: jose.ProtectedHeaderParameters;
    let unverified: jose.JWTPayload;
    try {
      header = jose.decodeProtectedHeader(token);
      unverified = jose.decodeJwt(token);
    } catch {
      return invalidToken('The token is malformed');
    }

    if (validateIssuer) {
      const issuer = unverified.iss;
      if (!issuer) {
        return invalidToken('The token has no issuer');
      }
      if (issuerValidator && !(await issuerValidator(issuer))) {
        return invalidToken(`The issuer ${issuer} is not trusted`);
      }
    }

    const getKey = await signingKeyResolver(unverified, header);
    if (!getKey) {
      return invalidToken('No signing key is available for this token');
    }

    const verifyOptions: jose.JWTVerifyOptions = {
      clockTolerance: clockSkew,
    };
    if (!validateLifetime) {
      // exp and nbf can never fail with an unbounded tolerance
      verifyOptions.clockTolerance = Number.MAX_SAFE_INTEGER;
    }
    if (currentDate) {
      verifyOptions.currentDate = currentDate;
    }

    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(token, getKey, verifyOptions));
    } catch (error) {
      if (error instanceof jose.errors.JOSEError) {
        return invalidToken(describeJoseError(error));
      }
      throw error;
    }

    if (validateAudience) {
      const audiences = typeof payload.aud === 'string' ? [payload.aud] : payload.aud ?? [];
      if (audiences.length === 0) {
        return invalidToken('The token has no audience');
      }
      if (audienceValidator && !audienceValidator(audiences)) {
        return invalidToken('The token audience is not accepted');
      }
    }

    return ok({ token, header, payload });
  }
}

/**
 * Key resolver for tokens signed with one known key
 */
export function staticKeyResolver(key: jose.KeyLike): SigningKeyResolver {
  return () => () => key;
}
