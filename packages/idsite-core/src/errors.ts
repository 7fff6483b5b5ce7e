/**
 * Failure taxonomy for callback handling
 *
 * Every expected failure is returned as a typed result. IdSiteError is thrown
 * only for caller mistakes (missing collaborators, empty required inputs).
 */

export type FailureCode =
  | 'malformed'
  | 'missing_audience'
  | 'unknown_signer'
  | 'signer_lookup_failed'
  | 'bad_signature'
  | 'expired'
  | 'not_yet_valid'
  | 'missing_claim'
  | 'invalid_claim'
  | 'untrusted_issuer'
  | 'replayed'
  | 'nonce_store_failed'
  | 'account_resolution_failed';

export interface IdSiteFailure {
  code: FailureCode;
  message: string;
  /** Claim name for missing_claim / invalid_claim */
  claim?: string;
  /** Underlying error for lookup and store failures */
  cause?: unknown;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: IdSiteFailure };

export function success<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function failure<T>(
  code: FailureCode,
  message: string,
  extra: Pick<IdSiteFailure, 'claim' | 'cause'> = {},
): Result<T> {
  return { ok: false, error: { code, message, ...extra } };
}

export type IdSiteErrorCode = 'invalid_input' | 'missing_collaborator';

export class IdSiteError extends Error {
  constructor(
    public readonly code: IdSiteErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'IdSiteError';
  }
}
