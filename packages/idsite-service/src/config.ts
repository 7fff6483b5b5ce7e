import type { IdSiteServiceConfig } from './types.js';

function requireEnv(name: string): string {
  const value = process.env[name]?.trim();
  if (!value) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
}

function parseSeconds(name: string, fallback: string): number {
  const raw = process.env[name] || fallback;
  const value = parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid ${name}: ${raw}. Must be a non-negative integer`);
  }
  return value;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): IdSiteServiceConfig {
  const port = parseInt(process.env.PORT || '8085', 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${process.env.PORT}`);
  }

  const callbackUri = requireEnv('IDSITE_CALLBACK_URI');
  try {
    new URL(callbackUri);
  } catch {
    throw new Error(`Invalid IDSITE_CALLBACK_URI: ${callbackUri}. Must be an absolute URL`);
  }

  const acceptedIssuers = (process.env.IDSITE_ACCEPTED_ISSUERS || '')
    .split(',')
    .map((issuer) => issuer.trim())
    .filter(Boolean);

  const nonceTtlSec = parseSeconds('IDSITE_NONCE_TTL_SEC', '600');
  if (nonceTtlSec === 0) {
    throw new Error('Invalid IDSITE_NONCE_TTL_SEC: 0. Must be at least 1');
  }

  return {
    port,
    databaseUrl: requireEnv('DATABASE_URL'),
    redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
    ssoBaseUrl: process.env.IDSITE_BASE_URL || 'https://login.example.com',
    applicationHref: requireEnv('IDSITE_APPLICATION_HREF'),
    apiKeyId: requireEnv('IDSITE_API_KEY_ID'),
    apiKeySecret: process.env.IDSITE_API_KEY_SECRET || undefined,
    callbackUri,
    samlIdpUrl: process.env.IDSITE_SAML_IDP_URL || undefined,
    acceptedIssuers,
    nonceTtlSec,
    clockToleranceSec: parseSeconds('IDSITE_CLOCK_TOLERANCE_SEC', '0'),
  };
}
