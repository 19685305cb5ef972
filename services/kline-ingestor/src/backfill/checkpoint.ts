import { Redis } from 'ioredis';
import type { KlineInterval } from '../domain/intervals.js';
import { logger } from '../utils/logger.js';

/**
 * Last fully persisted backfill cursor per (symbol, interval). An optimization
 * only: every write is an idempotent upsert, so losing a checkpoint costs time,
 * not correctness.
 */
export interface CursorCheckpoint {
  load(symbol: string, interval: KlineInterval): Promise<number | null>;
  save(symbol: string, interval: KlineInterval, cursor: number): Promise<void>;
  close(): Promise<void>;
}

export class NoopCursorCheckpoint implements CursorCheckpoint {
  async load(): Promise<number | null> {
    return null;
  }
  async save(): Promise<void> {}
  async close(): Promise<void> {}
}

export function checkpointKey(symbol: string, interval: KlineInterval): string {
  return `backfill:cursor:${symbol}:${interval}`;
}

export class RedisCursorCheckpoint implements CursorCheckpoint {
  constructor(private readonly redis: Redis) {}

  static fromUrl(url: string): RedisCursorCheckpoint {
    const client = new Redis(url, { maxRetriesPerRequest: 3, lazyConnect: true });
    client.on('error', (err) => logger.error({ err }, 'checkpoint redis error'));
    client.on('reconnecting', (delay: number) => logger.warn({ delay }, 'checkpoint redis reconnecting'));
    return new RedisCursorCheckpoint(client);
  }

  async load(symbol: string, interval: KlineInterval): Promise<number | null> {
    const raw = await this.redis.get(checkpointKey(symbol, interval));
    if (raw === null) return null;
    const cursor = Number(raw);
    return Number.isSafeInteger(cursor) ? cursor : null;
  }

  async save(symbol: string, interval: KlineInterval, cursor: number): Promise<void> {
    await this.redis.set(checkpointKey(symbol, interval), String(cursor));
  }

  async close(): Promise<void> {
    await this.redis.quit().catch((err: unknown) => {
      logger.warn({ err }, 'checkpoint redis quit failed; disconnecting');
      this.redis.disconnect();
    });
  }
}
