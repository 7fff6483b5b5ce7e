/**
 * Nonce stores for replay protection
 *
 * A nonce is written once per successfully verified response token. The
 * check and the write happen in a single atomic operation: a separate
 * exists() followed by set() lets two concurrent callbacks both pass.
 */

export const NONCE_PREFIX = 'nonce:idsite:';
export const DEFAULT_NONCE_TTL = 600; // 10 minutes
const MEMORY_SWEEP_INTERVAL = 100; // writes between expiry sweeps

export interface NonceStore {
  /**
   * Set `key` if it is not already present.
   * Resolves true when the key was newly set, false when it already existed.
   */
  checkAndSet(key: string, value: string, ttlSec: number): Promise<boolean>;
}

/**
 * The subset of the node-redis client the Redis store needs
 */
export interface NonceRedisClient {
  set(key: string, value: string, options: { NX: true; EX: number }): Promise<unknown>;
}

/**
 * Redis-backed store. `SET key value NX EX ttl` is one command, so it is atomic
 * across every process sharing the Redis instance.
 */
export class RedisNonceStore implements NonceStore {
  constructor(private redis: NonceRedisClient) {}

  async checkAndSet(key: string, value: string, ttlSec: number): Promise<boolean> {
    const reply = await this.redis.set(key, value, {
      NX: true,
      EX: normalizeTtl(ttlSec),
    });
    return reply === 'OK';
  }
}

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

/**
 * In-process store for single-instance deployments, tests and the CLI.
 * The check and the write run synchronously, so no other caller can
 * interleave between them.
 */
export class MemoryNonceStore implements NonceStore {
  private entries = new Map<string, MemoryEntry>();
  private writes = 0;

  constructor(private now: () => number = Date.now) {}

  checkAndSet(key: string, value: string, ttlSec: number): Promise<boolean> {
    const now = this.now();
    const existing = this.entries.get(key);
    if (existing && existing.expiresAt > now) {
      return Promise.resolve(false);
    }

    this.entries.set(key, { value, expiresAt: now + normalizeTtl(ttlSec) * 1000 });
    if (++this.writes % MEMORY_SWEEP_INTERVAL === 0) {
      this.sweep();
    }
    return Promise.resolve(true);
  }

  /**
   * Drop expired entries
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}

export function buildNonceKey(irt: string): string {
  return `${NONCE_PREFIX}${irt}`;
}

/**
 * Nonce lifetime for a response token: the rest of its validity window,
 * or the fixed default when it carries no `exp`.
 */
export function nonceTtlFor(
  exp: number | undefined,
  nowSec: number,
  clockToleranceSec: number = 0,
  defaultTtlSec: number = DEFAULT_NONCE_TTL,
): number {
  if (exp === undefined) {
    return normalizeTtl(defaultTtlSec);
  }
  return normalizeTtl(exp - nowSec + clockToleranceSec);
}

function normalizeTtl(ttlSec: number): number {
  return Math.max(1, Math.ceil(ttlSec));
}
