/**
 * Database lookups for API keys and accounts
 */

import type { Pool } from 'pg';
import type { ApiKeyRecord } from '@hosted-sso/idsite-core';
import type { Account, ApiKeyRow } from './types.js';

export class Database {
  constructor(private pool: Pool) {}

  /**
   * Find an enabled API key by id. Disabled keys are treated as unknown.
   */
  async findApiKeyById(id: string): Promise<ApiKeyRecord | null> {
    const result = await this.pool.query<ApiKeyRow>(
      `SELECT id, secret, status FROM api_keys WHERE id = $1 AND status = 'ENABLED'`,
      [id]
    );
    const row = result.rows[0];
    return row ? { id: row.id, secret: row.secret } : null;
  }

  /**
   * Find account by href
   */
  async findAccountByHref(href: string): Promise<Account | null> {
    const result = await this.pool.query<Account>(
      `SELECT href, username, email, given_name, surname, status, created_at
       FROM accounts WHERE href = $1`,
      [href]
    );
    return result.rows[0] || null;
  }
}
