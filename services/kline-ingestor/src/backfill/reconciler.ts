import { fromBackfillEntry, type Candle } from '../domain/candle.js';
import { floorToInterval, intervalMs, type KlineInterval } from '../domain/intervals.js';
import { BackfillFailed, ConnectionLost, InvariantViolation, MalformedPayload, RateLimited } from '../errors.js';
import { backfillPages, malformedMessages } from '../metrics/metrics.js';
import type { CandleStore } from '../repositories/candles.repo.js';
import { writeCandle } from '../services/candle-writer.js';
import { backoffDelay, sleep, type BackoffOptions } from '../utils/backoff.js';
import { logger, type Logger } from '../utils/logger.js';
import type { CursorCheckpoint } from './checkpoint.js';
import type { KlineHistorySource, KlinePageRequest } from './rest-client.js';

export type BackfillRequest = {
  symbol: string;
  interval: KlineInterval;
  from: number;   // epoch ms
  to?: number;    // epoch ms, exclusive; defaults to now
  resume?: boolean;
};

export type BackfillStopReason = 'range-end' | 'end-of-history' | 'no-progress' | 'aborted';

export type BackfillSummary = {
  symbol: string;
  interval: KlineInterval;
  from: number;
  to: number;
  pages: number;
  inserted: number;
  updated: number;
  stale: number;
  dropped: number;
  skipped: number;
  cursor: number;
  reason: BackfillStopReason;
};

export type BackfillReconcilerOptions = {
  source: KlineHistorySource;
  store: CandleStore;
  checkpoint: CursorCheckpoint;
  pageSize: number;
  pageDelayMs: number;
  /**
   * Transient page failures tolerated before the run fails; rate limits do not count.
   * Also bounds how often a page is replayed after the store could not take all of it.
   */
  pageRetry: number;
  pageBackoff?: BackoffOptions;
  storeRetry: { attempts: number; baseMs: number; maxMs: number };
  now?: () => number;
};

const DEFAULT_PAGE_BACKOFF: BackoffOptions = { baseMs: 500, maxMs: 60_000 };

function openTimeOf(entry: unknown): number | null {
  if (!Array.isArray(entry)) return null;
  const t: unknown = entry[0];
  return typeof t === 'number' && Number.isSafeInteger(t) ? t : null;
}

const iso = (ms: number) => new Date(ms).toISOString();

export class BackfillReconciler {
  constructor(private readonly opts: BackfillReconcilerOptions) {}

  async run(req: BackfillRequest, signal: AbortSignal): Promise<BackfillSummary> {
    const { symbol, interval } = req;
    const duration = intervalMs(interval);
    const now = this.opts.now ?? Date.now;
    // only closed buckets: stop at the start of the bucket still in progress
    const closedUntil = floorToInterval(now(), interval);
    const to = Math.min(req.to ?? closedUntil, closedUntil);
    const from = floorToInterval(req.from, interval);
    const log = logger.child({ symbol, interval });

    let cursor = from;
    if (req.resume) cursor = await this.resumeCursor(req, from, to, log);

    const summary: BackfillSummary = {
      symbol, interval, from, to,
      pages: 0, inserted: 0, updated: 0, stale: 0, dropped: 0, skipped: 0,
      cursor, reason: 'range-end',
    };
    log.info({ from: iso(from), to: iso(to), cursor: iso(cursor) }, 'backfill starting');

    let replays = 0;
    while (cursor < to) {
      const page = await this.fetchWithRetry(
        { symbol, interval, startTime: cursor, endTime: to - 1, limit: this.opts.pageSize },
        signal,
        log
      );
      if (page === null) { summary.reason = 'aborted'; break; }
      summary.pages += 1;

      if (page.length === 0) {
        log.info({ cursor: iso(cursor) }, 'empty page; end of available history');
        summary.reason = 'end-of-history';
        break;
      }

      let lastOpen: number | null = null;
      let unwritten = 0;
      for (const entry of page) {
        const openTime = openTimeOf(entry);
        if (openTime !== null && (lastOpen === null || openTime > lastOpen)) lastOpen = openTime;

        const candle = this.parseEntry(entry, symbol, interval, log);
        if (!candle) { summary.skipped += 1; continue; }
        if (candle.startTime < cursor || candle.startTime >= to) continue;

        const result = await writeCandle(this.opts.store, candle, { source: 'backfill', ...this.opts.storeRetry, signal });
        if (result === 'unavailable') unwritten += 1;
        else summary[result] += 1;
      }

      // a page cut short by cancellation is not committed; a rerun repeats it
      if (signal.aborted) { summary.reason = 'aborted'; break; }

      // the cursor only moves past a page the store fully took
      if (unwritten > 0) {
        replays += 1;
        if (replays > this.opts.pageRetry) {
          throw new BackfillFailed(
            `page at ${iso(cursor)} left ${unwritten} candles unwritten after ${replays} attempts: store unavailable`
          );
        }
        const waitMs = backoffDelay(replays - 1, this.opts.pageBackoff ?? DEFAULT_PAGE_BACKOFF);
        log.warn({ unwritten, attempt: replays, waitMs, cursor: iso(cursor) }, 'store unavailable during page; replaying it');
        if (!(await sleep(waitMs, signal))) { summary.reason = 'aborted'; break; }
        continue;
      }
      replays = 0;

      if (lastOpen === null) {
        throw new BackfillFailed(`page at ${iso(cursor)} carried no readable open times`);
      }

      const next = floorToInterval(lastOpen, interval) + duration;
      if (next <= cursor) {
        log.warn({ cursor: iso(cursor), lastOpen: iso(lastOpen) }, 'page made no forward progress; stopping');
        summary.reason = 'no-progress';
        break;
      }
      cursor = next;
      summary.cursor = cursor;
      await this.saveCursor(symbol, interval, cursor, log);
      log.debug({ cursor: iso(cursor), entries: page.length }, 'backfill page committed');

      if (cursor < to && this.opts.pageDelayMs > 0 && !(await sleep(this.opts.pageDelayMs, signal))) {
        summary.reason = 'aborted';
        break;
      }
    }

    log.info(
      { ...summary, from: iso(summary.from), to: iso(summary.to), cursor: iso(summary.cursor) },
      'backfill finished'
    );
    return summary;
  }

  private parseEntry(entry: unknown, symbol: string, interval: KlineInterval, log: Logger): Candle | null {
    try {
      return fromBackfillEntry(entry, symbol, interval);
    } catch (err) {
      if (err instanceof MalformedPayload || err instanceof InvariantViolation) {
        malformedMessages.inc({ source: 'backfill', code: err.code });
        log.warn({ err, entry }, 'skipping backfill entry');
        return null;
      }
      throw err;
    }
  }

  /** Fetches one page, retrying it in place. Resolves null once the signal aborts. */
  private async fetchWithRetry(req: KlinePageRequest, signal: AbortSignal, log: Logger): Promise<unknown[] | null> {
    const labels = { symbol: req.symbol, interval: req.interval };
    let failures = 0;
    for (;;) {
      if (signal.aborted) return null;
      try {
        const page = await this.opts.source.fetchPage(req, signal);
        backfillPages.inc({ ...labels, result: 'ok' });
        return page;
      } catch (err) {
        if (signal.aborted) return null;

        if (err instanceof RateLimited) {
          backfillPages.inc({ ...labels, result: 'rate_limited' });
          log.warn({ waitMs: err.retryAfterMs, cursor: iso(req.startTime) }, 'rate limited; retrying same page');
          await sleep(err.retryAfterMs, signal);
          continue;
        }
        if (!(err instanceof ConnectionLost || err instanceof MalformedPayload)) throw err;

        backfillPages.inc({ ...labels, result: 'error' });
        failures += 1;
        if (failures > this.opts.pageRetry) {
          throw new BackfillFailed(`page at ${iso(req.startTime)} failed after ${failures} attempts`, { cause: err });
        }
        const waitMs = backoffDelay(failures - 1, this.opts.pageBackoff ?? DEFAULT_PAGE_BACKOFF);
        log.warn({ err, attempt: failures, waitMs, cursor: iso(req.startTime) }, 'page request failed; retrying');
        await sleep(waitMs, signal);
      }
    }
  }

  private async resumeCursor(req: BackfillRequest, from: number, to: number, log: Logger): Promise<number> {
    let saved: number | null;
    try {
      saved = await this.opts.checkpoint.load(req.symbol, req.interval);
    } catch (err) {
      log.warn({ err }, 'checkpoint unavailable; starting from range start');
      return from;
    }
    if (saved === null || saved <= from || saved > to) return from;
    log.info({ checkpoint: iso(saved) }, 'resuming from checkpoint');
    return saved;
  }

  private async saveCursor(symbol: string, interval: KlineInterval, cursor: number, log: Logger): Promise<void> {
    try {
      await this.opts.checkpoint.save(symbol, interval, cursor);
    } catch (err) {
      log.warn({ err, cursor: iso(cursor) }, 'checkpoint save failed; continuing');
    }
  }
}
