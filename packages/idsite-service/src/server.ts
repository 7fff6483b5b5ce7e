/**
 * ID Site Service
 *
 * Issues signed redirects to the hosted login page and verifies its callbacks
 */

import 'dotenv/config';
import { createClient } from 'redis';
import { Pool } from 'pg';
import {
  CallbackVerifier,
  IdSiteCallbackHandler,
  RedirectUrlBuilder,
  RedisNonceStore,
  type ApiKeyRecord,
} from '@hosted-sso/idsite-core';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { Database } from './db.js';
import type { Account } from './types.js';

const config = loadConfig();

// Initialize Redis
const redisClient = createClient({ url: config.redisUrl });

redisClient.on('error', (err) => {
  console.error('Redis error:', err);
});

redisClient.on('connect', () => {
  console.log('✅ Connected to Redis');
});

await redisClient.connect();

// Initialize PostgreSQL pool
const dbPool = new Pool({ connectionString: config.databaseUrl });

dbPool.on('error', (err: Error) => {
  console.error('PostgreSQL pool error:', err);
});

const db = new Database(dbPool);

async function loadSigningKey(): Promise<ApiKeyRecord> {
  if (config.apiKeySecret) {
    return { id: config.apiKeyId, secret: config.apiKeySecret };
  }
  const key = await db.findApiKeyById(config.apiKeyId);
  if (!key) {
    throw new Error(`API key ${config.apiKeyId} not found or disabled`);
  }
  return key;
}

const signingKey = await loadSigningKey();

// Initialize services
const builder = new RedirectUrlBuilder({
  applicationHref: config.applicationHref,
  ssoBaseUrl: config.ssoBaseUrl,
});

const verifier = new CallbackVerifier(
  { lookup: (clientId) => db.findApiKeyById(clientId) },
  new RedisNonceStore(redisClient),
  {
    acceptedIssuers: config.acceptedIssuers,
    clockToleranceSec: config.clockToleranceSec,
    defaultNonceTtlSec: config.nonceTtlSec,
  }
);

const callbackHandler = new IdSiteCallbackHandler<Account>(verifier, (href) => db.findAccountByHref(href));

const app = createApp({
  builder,
  callbackHandler,
  signingKey,
  callbackUri: config.callbackUri,
  samlIdpUrl: config.samlIdpUrl,
  redisConnected: () => redisClient.isOpen,
});

// Start server
const server = app.listen(config.port, () => {
  console.log(`🔐 ID Site Service running on port ${config.port}`);
  console.log(`   Hosted login: ${config.ssoBaseUrl}`);
  console.log(`   Callback URI: ${config.callbackUri}`);
  console.log(`   Accepted issuers: ${config.acceptedIssuers.length > 0 ? config.acceptedIssuers.join(', ') : 'any'}`);
  console.log(`   Nonce TTL (no exp): ${config.nonceTtlSec}s`);
});

// Graceful shutdown
process.on('SIGTERM', () => {
  console.log('SIGTERM received, closing server...');
  server.close(() => {
    Promise.all([redisClient.quit(), dbPool.end()])
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('Shutdown error:', err);
        process.exit(1);
      });
  });
});
