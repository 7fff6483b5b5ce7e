import { describe, it, expect, vi } from 'vitest';
import type { Pool } from 'pg';
import { Database } from './db.js';

function mockPool(rows: unknown[]) {
  const query = vi.fn().mockResolvedValue({ rows });
  return { pool: { query } as unknown as Pool, query };
}

describe('Database.findApiKeyById', () => {
  it('returns the id and secret of an enabled key', async () => {
    const { pool, query } = mockPool([{ id: 'test-key-id', secret: 'test-secret', status: 'ENABLED' }]);
    const db = new Database(pool);

    await expect(db.findApiKeyById('test-key-id')).resolves.toEqual({ id: 'test-key-id', secret: 'test-secret' });
    expect(query).toHaveBeenCalledWith(expect.stringContaining("status = 'ENABLED'"), ['test-key-id']);
  });

  it('returns null when no key matches', async () => {
    const { pool } = mockPool([]);
    const db = new Database(pool);

    await expect(db.findApiKeyById('missing')).resolves.toBeNull();
  });

  it('propagates query errors', async () => {
    const query = vi.fn().mockRejectedValue(new Error('connection terminated'));
    const db = new Database({ query } as unknown as Pool);

    await expect(db.findApiKeyById('test-key-id')).rejects.toThrow('connection terminated');
  });
});

describe('Database.findAccountByHref', () => {
  it('returns the account row', async () => {
    const account = {
      href: 'https://api.example.com/v1/accounts/acc-1',
      username: 'jdoe',
      email: 'jdoe@example.com',
      given_name: 'Jane',
      surname: 'Doe',
      status: 'ENABLED',
      created_at: new Date('2024-01-01T00:00:00Z'),
    };
    const { pool, query } = mockPool([account]);
    const db = new Database(pool);

    await expect(db.findAccountByHref(account.href)).resolves.toEqual(account);
    expect(query).toHaveBeenCalledWith(expect.stringContaining('FROM accounts WHERE href = $1'), [account.href]);
  });

  it('returns null for an unknown href', async () => {
    const { pool } = mockPool([]);
    const db = new Database(pool);

    await expect(db.findAccountByHref('https://api.example.com/v1/accounts/none')).resolves.toBeNull();
  });
});
