/**
 * Inspect Command
 *
 * Verify a callback URL against a single API key and print its claims
 */

import chalk from 'chalk';
import {
  CallbackVerifier,
  MemoryNonceStore,
  extractToken,
  type ApiKeyRecord,
  type Result,
  type VerifiedAssertion,
} from '@hosted-sso/idsite-core';

export interface InspectCommandOptions {
  keyId: string;
  secret: string;
  issuer?: string[];
  clockTolerance?: number;
  param?: string;
}

export async function inspectCallback(
  callbackUrl: string,
  options: InspectCommandOptions
): Promise<Result<VerifiedAssertion>> {
  const token = extractToken(callbackUrl, options.param);
  if (!token.ok) {
    return token;
  }

  const key: ApiKeyRecord = { id: options.keyId, secret: options.secret };
  const verifier = new CallbackVerifier(
    { lookup: async (clientId) => (clientId === key.id ? key : null) },
    new MemoryNonceStore(),
    {
      acceptedIssuers: options.issuer,
      clockToleranceSec: options.clockTolerance,
    }
  );

  return verifier.verify(token.value);
}

export async function inspectCommand(callbackUrl: string, options: InspectCommandOptions): Promise<number> {
  const result = await inspectCallback(callbackUrl, options);

  if (!result.ok) {
    const { code, message, claim } = result.error;
    console.error(chalk.red(`❌ ${code}: ${message}`));
    if (claim) {
      console.error(chalk.yellow(`   Claim: ${claim}`));
    }
    return 1;
  }

  const claims = result.value;
  console.log(chalk.green.bold('\n✅ Callback verified\n'));
  console.log(`  Account:     ${claims.sub}`);
  console.log(`  New account: ${claims.isNewSub ? 'yes' : 'no'}`);
  console.log(`  Issuer:      ${claims.iss}`);
  console.log(`  Request id:  ${claims.irt}`);
  if (claims.status) console.log(`  Status:      ${claims.status}`);
  if (claims.state !== undefined) console.log(`  State:       ${claims.state}`);
  if (claims.exp !== undefined) console.log(`  Expires:     ${new Date(claims.exp * 1000).toISOString()}`);
  console.log();
  return 0;
}
