import type pg from 'pg';
import { UPSERT_KLINE } from '../db/sql.js';
import { dbHealth } from '../db/pool.js';
import type { Candle, StoredCandle } from '../domain/candle.js';
import { isKlineInterval } from '../domain/intervals.js';
import { ConfigurationError, ConstraintViolation, StoreUnavailable } from '../errors.js';

export type UpsertOutcome = 'inserted' | 'updated' | 'stale';

export type UpsertResult = {
  outcome: UpsertOutcome;
  row: StoredCandle;
};

/** Persistence boundary: one idempotent write per candle, conflict resolution inside the store. */
export interface CandleStore {
  upsert(candle: Candle): Promise<UpsertResult>;
}

export type KlineRow = {
  start_time: Date;
  end_time: Date;
  symbol: string;
  interval: string;
  first_trade_id: number;
  last_trade_id: number;
  open: string;
  high: string;
  low: string;
  close: string;
  volume: string;
  trade_count: number | null;
  quote_volume: string | null;
  created_at: Date;
  updated_at: Date;
  outcome: UpsertOutcome;
};

// SQLSTATEs worth retrying: admin/crash shutdown, statement timeout, too many connections, serialization, deadlock
const TRANSIENT_SQLSTATE = new Set(['57P01', '57P02', '57P03', '57014', '53300', '40001', '40P01']);
// schema, privilege, auth or catalog problems: no write succeeds until the deployment changes
const MISCONFIGURED_CLASS = new Set(['42', '28', '3D', '3F']);
const TRANSIENT_SOCKET = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN']);
const TRANSIENT_MESSAGE = /connection terminated|timeout exceeded when trying to connect|Connection terminated unexpectedly/i;

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

export function classifyStoreError(err: unknown): StoreUnavailable | ConstraintViolation | ConfigurationError {
  if (err instanceof StoreUnavailable || err instanceof ConstraintViolation || err instanceof ConfigurationError) return err;
  const code = errorCode(err);
  const message = err instanceof Error ? err.message : String(err);

  if (code && (code.startsWith('08') || TRANSIENT_SQLSTATE.has(code) || TRANSIENT_SOCKET.has(code))) {
    return new StoreUnavailable(`store unavailable (${code}): ${message}`, { cause: err });
  }
  if (code && MISCONFIGURED_CLASS.has(code.slice(0, 2))) {
    return new ConfigurationError(`store misconfigured (${code}): ${message}`, { cause: err });
  }
  if (!code && TRANSIENT_MESSAGE.test(message)) {
    return new StoreUnavailable(`store unavailable: ${message}`, { cause: err });
  }
  return new ConstraintViolation(`store rejected candle${code ? ` (${code})` : ''}: ${message}`, { cause: err });
}

export function toStoredCandle(r: KlineRow): StoredCandle {
  if (!isKlineInterval(r.interval)) throw new ConstraintViolation(`stored row has unknown interval ${r.interval}`);
  return {
    symbol: r.symbol,
    interval: r.interval,
    startTime: r.start_time.getTime(),
    endTime: r.end_time.getTime(),
    open: r.open,
    high: r.high,
    low: r.low,
    close: r.close,
    volume: r.volume,
    firstTradeId: r.first_trade_id,
    lastTradeId: r.last_trade_id,
    tradeCount: r.trade_count,
    quoteVolume: r.quote_volume,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

export function upsertParams(c: Candle): unknown[] {
  return [
    c.startTime,
    c.endTime,
    c.symbol,
    c.interval,
    c.firstTradeId,
    c.lastTradeId,
    c.open,
    c.high,
    c.low,
    c.close,
    c.volume,
    c.tradeCount,
    c.quoteVolume,
  ];
}

export class PgCandleStore implements CandleStore {
  constructor(private readonly pool: pg.Pool) {}

  async upsert(candle: Candle): Promise<UpsertResult> {
    let rows: KlineRow[];
    try {
      ({ rows } = await this.pool.query<KlineRow>(UPSERT_KLINE, upsertParams(candle)));
    } catch (err) {
      throw classifyStoreError(err);
    }
    const row = rows[0];
    // a concurrent insert committed after our snapshot can hide the row from the stale branch
    if (!row) throw new StoreUnavailable('upsert returned no row (concurrent insert); retry');
    return { outcome: row.outcome, row: toStoredCandle(row) };
  }

  health(): Promise<boolean> {
    return dbHealth(this.pool);
  }
}
