import { candleKey, type Candle, type StoredCandle } from '../../src/domain/candle.js';
import type { CandleStore, UpsertResult } from '../../src/repositories/candles.repo.js';

/** Mirrors the WHERE clause of UPSERT_KLINE. */
export function refines(prev: StoredCandle, next: Candle): boolean {
  if (next.lastTradeId > 0 && prev.lastTradeId > 0) return next.lastTradeId >= prev.lastTradeId;
  if (next.tradeCount !== null && prev.tradeCount !== null) return next.tradeCount >= prev.tradeCount;
  return true;
}

/** In-process CandleStore applying the same refinement policy as the SQL upsert. */
export class MemoryCandleStore implements CandleStore {
  readonly rows = new Map<string, StoredCandle>();
  readonly failures: Error[] = [];
  /** Consulted when the failure queue is empty. */
  failWhen: (candle: Candle) => Error | undefined = () => undefined;
  calls = 0;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async upsert(candle: Candle): Promise<UpsertResult> {
    this.calls += 1;
    const failure = this.failures.shift() ?? this.failWhen(candle);
    if (failure) throw failure;

    const key = candleKey(candle);
    const prev = this.rows.get(key);
    const now = this.clock();
    const { closed: _closed, ...fields } = candle;

    if (!prev) {
      const row: StoredCandle = { ...fields, createdAt: now, updatedAt: now };
      this.rows.set(key, row);
      return { outcome: 'inserted', row };
    }
    if (!refines(prev, candle)) return { outcome: 'stale', row: prev };

    const keepIds = candle.lastTradeId === 0;
    const row: StoredCandle = {
      ...fields,
      firstTradeId: keepIds ? prev.firstTradeId : candle.firstTradeId,
      lastTradeId: keepIds ? prev.lastTradeId : candle.lastTradeId,
      createdAt: prev.createdAt,
      updatedAt: now,
    };
    this.rows.set(key, row);
    return { outcome: 'updated', row };
  }

  get(symbol: string, interval: Candle['interval'], startTime: number): StoredCandle | undefined {
    return this.rows.get(candleKey({ symbol, interval, startTime }));
  }

  /** Rows ordered by start time, without server timestamps. */
  snapshot(): Omit<StoredCandle, 'createdAt' | 'updatedAt'>[] {
    return [...this.rows.values()]
      .sort((a, b) => a.startTime - b.startTime)
      .map(({ createdAt: _c, updatedAt: _u, ...rest }) => rest);
  }
}
