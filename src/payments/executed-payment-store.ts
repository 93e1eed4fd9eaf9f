/**
 * Executed-Payment Store
 *
 * Remembers which payment ids already triggered a success notification, so
 * replaying the provider's return URL notifies at most once.
 * Redis SET NX with a 24h TTL; in-memory fallback with oldest-first eviction.
 */

import Redis from 'ioredis';
import { logger } from '../observability/logger';

const CLAIM_PREFIX = 'executed:';
export const DEFAULT_TTL_SECONDS = 24 * 60 * 60;

export interface ExecutedPaymentStore {
  /** Returns true only for the first claim of a payment id */
  claim(paymentId: string): Promise<boolean>;
}

// ───── Redis Implementation ─────────────────────────────────────

export class RedisExecutedPaymentStore implements ExecutedPaymentStore {
  constructor(
    private readonly redis: Redis,
    private readonly keyPrefix: string,
    private readonly ttlSeconds: number = DEFAULT_TTL_SECONDS,
  ) {}

  async claim(paymentId: string): Promise<boolean> {
    try {
      // SET NX returns 'OK' if key was set (first claim), null if it exists
      const result = await this.redis.set(
        `${this.keyPrefix}${CLAIM_PREFIX}${paymentId}`,
        '1',
        'EX',
        this.ttlSeconds,
        'NX',
      );
      return result === 'OK';
    } catch (err) {
      logger.warn({ err, paymentId }, 'Executed-payment claim failed; allowing notification');
      return true; // Fail open
    }
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryExecutedPaymentStore implements ExecutedPaymentStore {
  private readonly claimed = new Map<string, number>();

  constructor(
    private readonly ttlSeconds: number = DEFAULT_TTL_SECONDS,
    private readonly maxSize: number = 50_000,
    private readonly now: () => number = Date.now,
  ) {}

  async claim(paymentId: string): Promise<boolean> {
    const now = this.now();
    const existing = this.claimed.get(paymentId);

    if (existing !== undefined && now - existing < this.ttlSeconds * 1000) {
      return false;
    }

    // Re-insert so iteration order stays oldest-first
    this.claimed.delete(paymentId);
    if (this.claimed.size >= this.maxSize) {
      const oldest = this.claimed.keys().next().value;
      if (oldest !== undefined) this.claimed.delete(oldest);
    }

    this.claimed.set(paymentId, now);
    return true;
  }

  get size(): number {
    return this.claimed.size;
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createExecutedPaymentStore(redis?: Redis, keyPrefix = ''): ExecutedPaymentStore {
  if (redis) {
    logger.info('Executed-payment store: Redis-backed (SET NX, 24h TTL)');
    return new RedisExecutedPaymentStore(redis, keyPrefix);
  }
  logger.info('Executed-payment store: In-memory');
  return new InMemoryExecutedPaymentStore();
}
