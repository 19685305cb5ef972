const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

// Fixed-duration buckets only; weekly/monthly candles have no constant span.
export const KLINE_INTERVALS = ['1m', '3m', '5m', '15m', '30m', '1h', '2h', '4h', '6h', '8h', '12h', '1d'] as const;

export type KlineInterval = (typeof KLINE_INTERVALS)[number];

export const INTERVAL_MS: Readonly<Record<KlineInterval, number>> = {
  '1m': MINUTE_MS,
  '3m': 3 * MINUTE_MS,
  '5m': 5 * MINUTE_MS,
  '15m': 15 * MINUTE_MS,
  '30m': 30 * MINUTE_MS,
  '1h': HOUR_MS,
  '2h': 2 * HOUR_MS,
  '4h': 4 * HOUR_MS,
  '6h': 6 * HOUR_MS,
  '8h': 8 * HOUR_MS,
  '12h': 12 * HOUR_MS,
  '1d': 24 * HOUR_MS,
};

export function isKlineInterval(value: string): value is KlineInterval {
  return KLINE_INTERVALS.some((i) => i === value);
}

export function intervalMs(interval: KlineInterval): number {
  return INTERVAL_MS[interval];
}

export function floorToInterval(epochMs: number, interval: KlineInterval): number {
  const d = INTERVAL_MS[interval];
  return Math.floor(epochMs / d) * d;
}

export function streamName(symbol: string, interval: KlineInterval): string {
  return `${symbol.toLowerCase()}@kline_${interval}`;
}
