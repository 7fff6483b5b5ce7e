/**
 * Builds the final callback outcome from a verified assertion
 */

import { failure, success, type Result } from './errors.js';
import type {
  AccountRef,
  AccountResolver,
  CallbackOutcome,
  CallbackStatus,
  VerifiedAssertion,
} from './types.js';

export async function finalizeCallback<TAccount extends AccountRef>(
  verified: VerifiedAssertion,
  resolveAccount: AccountResolver<TAccount>,
): Promise<Result<CallbackOutcome<TAccount>>> {
  let account: TAccount | null;
  try {
    account = await resolveAccount(verified.sub);
  } catch (error) {
    console.error(`Account lookup failed for ${verified.sub}:`, error);
    return failure('account_resolution_failed', 'Account lookup failed', { cause: error });
  }

  if (!account) {
    return failure('account_resolution_failed', `Account ${verified.sub} not found`);
  }

  const outcome: {
    account: TAccount;
    isNewAccount: boolean;
    state?: string;
    status?: CallbackStatus;
  } = {
    account,
    isNewAccount: verified.isNewSub,
  };
  if (verified.state !== undefined) outcome.state = verified.state;
  if (verified.status !== undefined) outcome.status = verified.status;

  return success<CallbackOutcome<TAccount>>(Object.freeze(outcome));
}
