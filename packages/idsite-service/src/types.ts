/**
 * Type definitions for the ID Site service
 */

import type { AccountRef } from '@hosted-sso/idsite-core';

export interface IdSiteServiceConfig {
  port: number;
  databaseUrl: string;
  redisUrl: string;
  ssoBaseUrl: string;
  applicationHref: string;
  apiKeyId: string;
  /** When unset the secret is loaded from the api_keys table at startup */
  apiKeySecret?: string;
  callbackUri: string;
  samlIdpUrl?: string;
  acceptedIssuers: string[];
  nonceTtlSec: number;
  clockToleranceSec: number;
}

export type AccountStatus = 'ENABLED' | 'DISABLED' | 'UNVERIFIED';

export interface Account extends AccountRef {
  href: string;
  username: string;
  email: string;
  given_name: string | null;
  surname: string | null;
  status: AccountStatus;
  created_at: Date;
}

export interface ApiKeyRow {
  id: string;
  secret: string;
  status: 'ENABLED' | 'DISABLED';
}
