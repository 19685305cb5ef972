import type { Candle } from '../domain/candle.js';
import { ConstraintViolation, StoreUnavailable } from '../errors.js';
import { candlesDropped, candlesWritten } from '../metrics/metrics.js';
import type { CandleStore, UpsertOutcome } from '../repositories/candles.repo.js';
import { backoffDelay, sleep } from '../utils/backoff.js';
import { logger } from '../utils/logger.js';

export type CandleSource = 'stream' | 'backfill';

/** `dropped`: the store rejected the candle. `unavailable`: the store could not be reached in time. */
export type WriteResult = UpsertOutcome | 'dropped' | 'unavailable';

export type WriteOptions = {
  source: CandleSource;
  /** Retries after the first attempt for StoreUnavailable. */
  attempts: number;
  baseMs: number;
  maxMs: number;
  signal?: AbortSignal;
};

function keyFields(c: Candle) {
  return { symbol: c.symbol, interval: c.interval, startTime: new Date(c.startTime).toISOString() };
}

/**
 * Upserts one candle, absorbing transient store failures with bounded backoff.
 * A candle that cannot be written is logged and counted as dropped, never lost silently;
 * callers that can replay it later tell the two drop reasons apart by the result.
 */
export async function writeCandle(store: CandleStore, candle: Candle, opts: WriteOptions): Promise<WriteResult> {
  for (let attempt = 0; ; attempt++) {
    try {
      const { outcome } = await store.upsert(candle);
      candlesWritten.inc({ source: opts.source, outcome });
      if (outcome === 'stale') {
        logger.debug({ ...keyFields(candle), lastTradeId: candle.lastTradeId }, 'stale candle ignored by store');
      }
      return outcome;
    } catch (err) {
      if (err instanceof ConstraintViolation) {
        candlesDropped.inc({ source: opts.source, reason: 'constraint_violation' });
        logger.error({ err, ...keyFields(candle), source: opts.source }, 'candle rejected by store; dropped');
        return 'dropped';
      }
      if (!(err instanceof StoreUnavailable)) throw err;

      if (attempt >= opts.attempts || opts.signal?.aborted) {
        candlesDropped.inc({ source: opts.source, reason: 'store_unavailable' });
        logger.error(
          { err, ...keyFields(candle), source: opts.source, attempts: attempt + 1 },
          'store unavailable; candle dropped'
        );
        return 'unavailable';
      }

      const waitMs = backoffDelay(attempt, { baseMs: opts.baseMs, maxMs: opts.maxMs });
      logger.warn({ err, ...keyFields(candle), attempt: attempt + 1, waitMs }, 'store unavailable; retrying');
      await sleep(waitMs, opts.signal);
    }
  }
}
