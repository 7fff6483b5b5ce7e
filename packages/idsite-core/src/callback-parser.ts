/**
 * Callback URL parsing
 */

import { failure, success, type Result } from './errors.js';

export const RESPONSE_PARAM = 'jwtResponse';

/**
 * Extract the response token from the URL the hosted page redirected to.
 * The URL must be absolute and carry the parameter exactly once.
 */
export function extractToken(callbackUrl: string, paramName: string = RESPONSE_PARAM): Result<string> {
  let url: URL;
  try {
    url = new URL(callbackUrl);
  } catch {
    return failure('malformed', 'Callback URL could not be parsed');
  }

  const values = url.searchParams.getAll(paramName);
  if (values.length === 0) {
    return failure('malformed', `Callback URL has no ${paramName} parameter`);
  }
  if (values.length > 1) {
    return failure('malformed', `Callback URL has more than one ${paramName} parameter`);
  }

  const token = values[0].trim();
  if (!token) {
    return failure('malformed', `Callback URL has an empty ${paramName} parameter`);
  }

  return success(token);
}
