/**
 * End-to-end handling of an ID Site callback URL
 */

import { extractToken, RESPONSE_PARAM } from './callback-parser.js';
import type { CallbackVerifier } from './callback-verifier.js';
import { IdSiteError, type Result } from './errors.js';
import { finalizeCallback } from './result-factory.js';
import type { AccountRef, AccountResolver, CallbackOutcome } from './types.js';

export class IdSiteCallbackHandler<TAccount extends AccountRef = AccountRef> {
  constructor(
    private verifier: CallbackVerifier,
    private resolveAccount: AccountResolver<TAccount>,
    private paramName: string = RESPONSE_PARAM
  ) {
    if (!verifier || !resolveAccount) {
      throw new IdSiteError('missing_collaborator', 'IdSiteCallbackHandler requires a verifier and an account resolver');
    }
  }

  /**
   * Parse, verify and resolve the account for the URL the hosted page
   * redirected the browser to
   */
  async handle(callbackUrl: string): Promise<Result<CallbackOutcome<TAccount>>> {
    const token = extractToken(callbackUrl, this.paramName);
    if (!token.ok) {
      return token;
    }

    const verified = await this.verifier.verify(token.value);
    if (!verified.ok) {
      return verified;
    }

    return finalizeCallback(verified.value, this.resolveAccount);
  }
}
