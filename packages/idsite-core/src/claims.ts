/**
 * Claim schema for verified `jwtResponse` tokens
 */

import { z } from 'zod';
import { failure, success, type Result } from './errors.js';
import type { VerifiedAssertion } from './types.js';

// The hosted page sends `null` for claims it has no value for; treat that as absent.
const optional = <T extends z.ZodTypeAny>(schema: T) => schema.nullish();

export const verifiedAssertionSchema = z.object({
  aud: z.string().min(1),
  irt: z.string().min(1),
  iss: z.string().min(1),
  sub: z.string().min(1),
  isNewSub: z.boolean(),
  iat: optional(z.number()),
  exp: optional(z.number()),
  cb_uri: optional(z.string()),
  path: optional(z.string()),
  state: optional(z.string()),
  // Unrecognised values are dropped rather than failing the callback
  status: optional(z.enum(['AUTHENTICATED', 'REGISTERED', 'LOGOUT'])).catch(undefined),
});

/**
 * Validate a signature-checked payload. Optional claims that are missing or
 * null are left off the result rather than set to undefined.
 */
export function parseVerifiedClaims(payload: unknown): Result<VerifiedAssertion> {
  const parsed = verifiedAssertionSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const claim = issue.path.length > 0 ? String(issue.path[0]) : undefined;
    if (!claim) {
      return failure('malformed', 'Token payload is not a claim set');
    }
    if (issue.code === 'invalid_type' && issue.received === 'undefined') {
      return failure('missing_claim', `Required claim "${claim}" is missing`, { claim });
    }
    return failure('invalid_claim', `Claim "${claim}" is invalid: ${issue.message}`, { claim });
  }

  const { aud, irt, iss, sub, isNewSub, ...rest } = parsed.data;
  const assertion: VerifiedAssertion = { aud, irt, iss, sub, isNewSub };
  if (rest.iat != null) assertion.iat = rest.iat;
  if (rest.exp != null) assertion.exp = rest.exp;
  if (rest.cb_uri != null) assertion.cb_uri = rest.cb_uri;
  if (rest.path != null) assertion.path = rest.path;
  if (rest.state != null) assertion.state = rest.state;
  if (rest.status != null) assertion.status = rest.status;

  return success(assertion);
}
