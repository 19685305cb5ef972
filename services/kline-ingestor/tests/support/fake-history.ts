import type { CursorCheckpoint } from '../../src/backfill/checkpoint.js';
import type { KlineHistorySource, KlinePageRequest } from '../../src/backfill/rest-client.js';
import type { KlineInterval } from '../../src/domain/intervals.js';
import { MINUTE, historyRow } from './fixtures.js';

/** Serves 1m history rows for the given open times, honouring startTime/endTime/limit. */
export class FakeHistory implements KlineHistorySource {
  readonly requests: KlinePageRequest[] = [];
  readonly failures: Error[] = [];
  onFetch: (req: KlinePageRequest) => void = () => {};

  constructor(private readonly openTimes: number[]) {}

  static minutes(start: number, count: number): FakeHistory {
    return new FakeHistory(Array.from({ length: count }, (_, i) => start + i * MINUTE));
  }

  async fetchPage(req: KlinePageRequest): Promise<unknown[]> {
    this.requests.push({ ...req });
    this.onFetch(req);
    const failure = this.failures.shift();
    if (failure) throw failure;
    return this.openTimes
      .filter((t) => t >= req.startTime && t <= req.endTime)
      .slice(0, req.limit)
      .map((t) => historyRow(t));
  }
}

export class MemoryCheckpoint implements CursorCheckpoint {
  readonly cursors = new Map<string, number>();
  readonly saved: number[] = [];

  async load(symbol: string, interval: KlineInterval): Promise<number | null> {
    return this.cursors.get(`${symbol}:${interval}`) ?? null;
  }

  async save(symbol: string, interval: KlineInterval, cursor: number): Promise<void> {
    this.saved.push(cursor);
    this.cursors.set(`${symbol}:${interval}`, cursor);
  }

  async close(): Promise<void> {}
}
