/**
 * ID Site callback verifier
 *
 * Verifies `jwtResponse` tokens returned by the hosted login page:
 * audience pre-read, key resolution, HS256 signature and expiry check,
 * required claims, then single-use enforcement.
 */

import jwt, { type JwtPayload } from 'jsonwebtoken';
import { parseVerifiedClaims } from './claims.js';
import { failure, IdSiteError, success, type Result } from './errors.js';
import { buildNonceKey, DEFAULT_NONCE_TTL, nonceTtlFor, type NonceStore } from './nonce-store.js';
import { SIGNING_ALGORITHM } from './redirect-builder.js';
import type {
  ApiKeyRecord,
  ApiKeyResolver,
  CallbackVerifierOptions,
  VerifiedAssertion,
} from './types.js';

export class CallbackVerifier {
  private readonly acceptedIssuers: string[];
  private readonly clockToleranceSec: number;
  private readonly defaultNonceTtlSec: number;
  private readonly now: () => number;

  constructor(
    private apiKeys: ApiKeyResolver,
    private nonces: NonceStore,
    options: CallbackVerifierOptions = {}
  ) {
    if (!apiKeys) {
      throw new IdSiteError('missing_collaborator', 'CallbackVerifier requires an ApiKeyResolver');
    }
    if (!nonces) {
      throw new IdSiteError('missing_collaborator', 'CallbackVerifier requires a NonceStore');
    }
    this.acceptedIssuers = options.acceptedIssuers ?? [];
    this.clockToleranceSec = options.clockToleranceSec ?? 0;
    this.defaultNonceTtlSec = options.defaultNonceTtlSec ?? DEFAULT_NONCE_TTL;
    this.now = options.now ?? Date.now;
  }

  /**
   * Verify a raw response token
   */
  async verify(rawToken: string): Promise<Result<VerifiedAssertion>> {
    // 1-2. Find out which key signed the token
    const audience = readUntrustedAudience(rawToken);
    if (!audience.ok) {
      return audience;
    }

    // 3. Resolve the key
    let apiKey: ApiKeyRecord | null;
    try {
      apiKey = await this.apiKeys.lookup(audience.value);
    } catch (error) {
      console.error('API key lookup failed:', error);
      return failure('signer_lookup_failed', 'API key lookup failed', { cause: error });
    }
    if (!apiKey) {
      return failure('unknown_signer', `No API key found for audience ${audience.value}`);
    }

    // 4. Signature and time claims
    if (!hasWellFormedSignature(rawToken)) {
      return failure('bad_signature', 'Token signature verification failed');
    }
    const nowSec = Math.floor(this.now() / 1000);
    let payload: JwtPayload;
    try {
      const decoded = jwt.verify(rawToken, apiKey.secret, {
        algorithms: [SIGNING_ALGORITHM],
        clockTimestamp: nowSec,
        clockTolerance: this.clockToleranceSec,
      });
      if (typeof decoded === 'string') {
        return failure('malformed', 'Token payload is not a claim set');
      }
      payload = decoded;
    } catch (error) {
      return classifyVerifyError(error);
    }

    // 5. Required claims
    const claims = parseVerifiedClaims(payload);
    if (!claims.ok) {
      return claims;
    }
    const assertion = claims.value;

    if (this.acceptedIssuers.length > 0 && !this.acceptedIssuers.includes(assertion.iss)) {
      return failure('untrusted_issuer', `Issuer ${assertion.iss} is not accepted`);
    }

    // Without exp, acceptance ends when the nonce would lapse
    let expiresAt = assertion.exp;
    if (expiresAt === undefined) {
      if (assertion.iat === undefined) {
        return failure('missing_claim', 'Required claim "iat" is missing', { claim: 'iat' });
      }
      expiresAt = assertion.iat + this.defaultNonceTtlSec;
      if (nowSec >= expiresAt + this.clockToleranceSec) {
        return failure('expired', `Token expired at ${new Date(expiresAt * 1000).toISOString()}`);
      }
    }

    // 6. Single use
    const ttl = nonceTtlFor(expiresAt, nowSec, this.clockToleranceSec, this.defaultNonceTtlSec);
    let fresh: boolean;
    try {
      fresh = await this.nonces.checkAndSet(buildNonceKey(assertion.irt), assertion.irt, ttl);
    } catch (error) {
      console.error('Nonce store error:', error);
      return failure('nonce_store_failed', 'Nonce store is unavailable', { cause: error });
    }
    if (!fresh) {
      console.warn(`Replay detected: response token ${assertion.irt} already used`);
      return failure('replayed', 'Response token has already been used');
    }

    return success(assertion);
  }
}

const BASE64URL = /^[A-Za-z0-9_-]*$/;

/**
 * Read `aud` from a token whose signature has not been checked yet.
 * Only the audience string leaves this function; it selects the key and
 * nothing else. The signature segment is not looked at, so a damaged
 * signature is reported once the key is known.
 */
export function readUntrustedAudience(rawToken: string): Result<string> {
  const segments = rawToken.split('.');
  if (segments.length !== 3) {
    return failure('malformed', 'Token could not be decoded');
  }
  let unverified: JwtPayload | null;
  try {
    unverified = jwt.decode(`${segments[0]}.${segments[1]}.`, { json: true });
  } catch {
    return failure('malformed', 'Token could not be decoded');
  }
  if (!unverified || typeof unverified !== 'object') {
    return failure('malformed', 'Token could not be decoded');
  }

  const aud = unverified.aud;
  if (typeof aud !== 'string' || aud.length === 0) {
    return failure('missing_audience', 'Token has no audience');
  }
  return success(aud);
}

function hasWellFormedSignature(rawToken: string): boolean {
  const signature = rawToken.slice(rawToken.lastIndexOf('.') + 1);
  return BASE64URL.test(signature);
}

function classifyVerifyError(error: unknown): Result<VerifiedAssertion> {
  if (error instanceof jwt.TokenExpiredError) {
    return failure('expired', `Token expired at ${error.expiredAt.toISOString()}`);
  }
  if (error instanceof jwt.NotBeforeError) {
    return failure('not_yet_valid', `Token is not valid before ${error.date.toISOString()}`);
  }
  if (error instanceof jwt.JsonWebTokenError) {
    switch (error.message) {
      case 'invalid signature':
      case 'invalid algorithm':
      case 'jwt signature is required':
      // header and payload already decoded, so only the signature is left
      case 'invalid token':
        return failure('bad_signature', 'Token signature verification failed');
      default:
        return failure('malformed', `Token is malformed: ${error.message}`);
    }
  }
  throw error;
}
