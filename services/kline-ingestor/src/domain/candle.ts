import { z } from 'zod';
import { InvariantViolation, MalformedPayload } from '../errors.js';
import { formatUnits, parseUnits } from './decimal.js';
import { intervalMs, isKlineInterval, type KlineInterval } from './intervals.js';

export type Candle = {
  symbol: string;
  interval: KlineInterval;
  startTime: number; // epoch ms, inclusive
  endTime: number;   // epoch ms, exclusive
  open: string;
  high: string;
  low: string;
  close: string;
  volume: string;
  firstTradeId: number; // 0 = unknown
  lastTradeId: number;
  tradeCount: number | null;
  quoteVolume: string | null;
  closed: boolean;
};

export type StoredCandle = Omit<Candle, 'closed'> & {
  createdAt: Date;
  updatedAt: Date;
};

export type CandleKey = Pick<Candle, 'startTime' | 'symbol' | 'interval'>;

export function candleKey(c: CandleKey): string {
  return `${c.symbol}|${c.interval}|${c.startTime}`;
}

// ---- wire shapes ----

const Millis = z.number().int().nonnegative();
const Decimal = z.string().min(1);
const TradeId = z.number().int().min(-1); // -1 = no trades in bucket

export const StreamKline = z.object({
  t: Millis,
  T: Millis,
  s: z.string().min(1),
  i: z.string().min(1),
  f: TradeId,
  L: TradeId,
  o: Decimal,
  c: Decimal,
  h: Decimal,
  l: Decimal,
  v: Decimal,
  n: z.number().int().nonnegative().optional(),
  x: z.boolean(),
  q: Decimal.optional(),
});

export const StreamKlineEvent = z.object({
  e: z.literal('kline'),
  E: z.number().optional(),
  s: z.string().optional(),
  k: StreamKline,
});

const CombinedEnvelope = z.object({
  stream: z.string(),
  data: z.unknown(),
});

// [openTime, open, high, low, close, volume, closeTime, quoteVolume, trades, takerBase, takerQuote, ignore]
export const BackfillEntry = z
  .tuple([Millis, Decimal, Decimal, Decimal, Decimal, Decimal, Millis, Decimal, z.number().int().nonnegative()])
  .rest(z.unknown());

const SubscriptionAck = z.object({ result: z.null(), id: z.number() });
const ExchangeErrorReply = z.object({
  error: z.object({ code: z.number(), msg: z.string() }),
  id: z.number().nullish(),
});

export type StreamControl =
  | { kind: 'ack'; id: number }
  | { kind: 'error'; id: number | null; code: number; msg: string };

function describeIssues(err: z.ZodError): string {
  const first = err.issues[0];
  if (!first) return 'invalid payload';
  const at = first.path.length ? first.path.join('.') : '(root)';
  return `${at}: ${first.message}`;
}

// ---- normalization boundary ----

type RawCandleFields = {
  symbol: string;
  interval: string;
  startTime: number;
  closeTimeInclusive: number;
  open: string;
  high: string;
  low: string;
  close: string;
  volume: string;
  firstTradeId: number;
  lastTradeId: number;
  tradeCount: number | null;
  quoteVolume: string | null;
  closed: boolean;
};

function normalizeSymbol(raw: string): string {
  const symbol = raw.trim().toUpperCase();
  if (!/^[A-Z0-9]+$/.test(symbol)) throw new MalformedPayload(`invalid symbol: ${JSON.stringify(raw)}`);
  return symbol;
}

function normalizeTradeId(id: number): number {
  return id < 0 ? 0 : id;
}

function buildCandle(raw: RawCandleFields): Candle {
  const symbol = normalizeSymbol(raw.symbol);
  if (!isKlineInterval(raw.interval)) throw new MalformedPayload(`unsupported interval: ${raw.interval}`);
  const interval = raw.interval;

  const duration = intervalMs(interval);
  const endTime = raw.closeTimeInclusive + 1;
  if (raw.startTime % duration !== 0) {
    throw new InvariantViolation(`start_time ${raw.startTime} is not aligned to ${interval}`);
  }
  if (endTime - raw.startTime !== duration) {
    throw new InvariantViolation(`span ${endTime - raw.startTime}ms does not match ${interval} (${duration}ms)`);
  }

  const open = parseUnits(raw.open, 'open');
  const high = parseUnits(raw.high, 'high');
  const low = parseUnits(raw.low, 'low');
  const close = parseUnits(raw.close, 'close');
  const volume = parseUnits(raw.volume, 'volume');
  const quoteVolume = raw.quoteVolume === null ? null : parseUnits(raw.quoteVolume, 'quote_volume');

  if (open <= 0n || high <= 0n || low <= 0n || close <= 0n) {
    throw new InvariantViolation('prices must be strictly positive');
  }
  if (high < low) throw new InvariantViolation(`high ${formatUnits(high)} < low ${formatUnits(low)}`);
  const bodyLow = open < close ? open : close;
  const bodyHigh = open > close ? open : close;
  if (low > bodyLow || bodyHigh > high) {
    throw new InvariantViolation('expected low <= min(open, close) <= max(open, close) <= high');
  }
  if (volume < 0n) throw new InvariantViolation('volume must be >= 0');
  if (quoteVolume !== null && quoteVolume < 0n) throw new InvariantViolation('quote_volume must be >= 0');

  const firstTradeId = normalizeTradeId(raw.firstTradeId);
  const lastTradeId = normalizeTradeId(raw.lastTradeId);
  if (lastTradeId < firstTradeId) {
    throw new InvariantViolation(`last_trade_id ${lastTradeId} < first_trade_id ${firstTradeId}`);
  }

  return {
    symbol,
    interval,
    startTime: raw.startTime,
    endTime,
    open: formatUnits(open),
    high: formatUnits(high),
    low: formatUnits(low),
    close: formatUnits(close),
    volume: formatUnits(volume),
    firstTradeId,
    lastTradeId,
    tradeCount: raw.tradeCount,
    quoteVolume: quoteVolume === null ? null : formatUnits(quoteVolume),
    closed: raw.closed,
  };
}

/** Parses one kline event, bare or wrapped in a combined-stream envelope. */
export function fromStreamEvent(payload: unknown): Candle {
  const envelope = CombinedEnvelope.safeParse(payload);
  const body = envelope.success ? envelope.data.data : payload;

  const parsed = StreamKlineEvent.safeParse(body);
  if (!parsed.success) throw new MalformedPayload(`kline event ${describeIssues(parsed.error)}`);

  const k = parsed.data.k;
  return buildCandle({
    symbol: k.s,
    interval: k.i,
    startTime: k.t,
    closeTimeInclusive: k.T,
    open: k.o,
    high: k.h,
    low: k.l,
    close: k.c,
    volume: k.v,
    firstTradeId: k.f,
    lastTradeId: k.L,
    tradeCount: k.n ?? null,
    quoteVolume: k.q ?? null,
    closed: k.x,
  });
}

const SnapshotRef = z.object({ k: z.object({ s: z.string(), i: z.string(), t: z.number() }) });

/** Names the bucket a raw stream frame snapshots, or undefined for any other frame. */
export function snapshotKey(frame: string): string | undefined {
  let payload: unknown;
  try {
    payload = JSON.parse(frame);
  } catch {
    return undefined;
  }
  const envelope = CombinedEnvelope.safeParse(payload);
  const ref = SnapshotRef.safeParse(envelope.success ? envelope.data.data : payload);
  return ref.success ? `${ref.data.k.s}:${ref.data.k.i}:${ref.data.k.t}` : undefined;
}

/**
 * Parses one positional REST history entry. History carries no trade ids, so
 * both ids are 0 (unknown) and the row's trade coverage is judged by trade count.
 */
export function fromBackfillEntry(entry: unknown, symbol: string, interval: KlineInterval): Candle {
  const parsed = BackfillEntry.safeParse(entry);
  if (!parsed.success) throw new MalformedPayload(`backfill entry ${describeIssues(parsed.error)}`);

  const [openTime, open, high, low, close, volume, closeTime, quoteVolume, trades] = parsed.data;
  return buildCandle({
    symbol,
    interval,
    startTime: openTime,
    closeTimeInclusive: closeTime,
    open,
    high,
    low,
    close,
    volume,
    firstTradeId: 0,
    lastTradeId: 0,
    tradeCount: trades,
    quoteVolume,
    closed: true,
  });
}

/** Recognises subscription acks and exchange error replies; null for anything else. */
export function parseStreamControl(payload: unknown): StreamControl | null {
  const ack = SubscriptionAck.safeParse(payload);
  if (ack.success) return { kind: 'ack', id: ack.data.id };
  const err = ExchangeErrorReply.safeParse(payload);
  if (err.success) {
    return { kind: 'error', id: err.data.id ?? null, code: err.data.error.code, msg: err.data.error.msg };
  }
  return null;
}
