import type { Candle, StoredCandle } from '../../src/domain/candle.js';

// 2024-01-01T00:00:00Z
export const T0 = 1704067200000;
export const MINUTE = 60_000;

export function makeCandle(overrides: Partial<Candle> = {}): Candle {
  return {
    symbol: 'BTCUSDT',
    interval: '1m',
    startTime: T0,
    endTime: T0 + MINUTE,
    open: '42000.00000000',
    high: '42010.00000000',
    low: '41995.00000000',
    close: '42005.00000000',
    volume: '12.34560000',
    firstTradeId: 100,
    lastTradeId: 150,
    tradeCount: 51,
    quoteVolume: '518500.00000000',
    closed: false,
    ...overrides,
  };
}

export function storedFrom(c: Candle, at = new Date(T0 + MINUTE)): StoredCandle {
  const { closed: _closed, ...fields } = c;
  return { ...fields, createdAt: at, updatedAt: at };
}

export type StreamKlineFields = {
  t: number;
  T: number;
  s: string;
  i: string;
  f: number;
  L: number;
  o: string;
  c: string;
  h: string;
  l: string;
  v: string;
  n: number;
  x: boolean;
  q: string;
};

export function klineEvent(k: Partial<StreamKlineFields> = {}) {
  return {
    e: 'kline',
    E: T0 + 30_000,
    s: 'BTCUSDT',
    k: {
      t: T0,
      T: T0 + MINUTE - 1,
      s: 'BTCUSDT',
      i: '1m',
      f: 100,
      L: 150,
      o: '42000',
      c: '42005',
      h: '42010',
      l: '41995',
      v: '12.3456',
      n: 51,
      x: false,
      q: '518500',
      ...k,
    },
  };
}

export function combined(event: ReturnType<typeof klineEvent>) {
  return { stream: `${event.k.s.toLowerCase()}@kline_${event.k.i}`, data: event };
}

/** Positional REST history row for a 1m bucket starting at `openTime`. */
export function historyRow(openTime: number, close = '42005', trades = 51): unknown[] {
  return [openTime, '42000', '42010', '41995', close, '12.3456', openTime + MINUTE - 1, '518500', trades, '6', '250000', '0'];
}
