// src/config/index.ts
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { isKlineInterval, type KlineInterval } from '../domain/intervals.js';

const csv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((s) => s.split(',').map((p) => p.trim()).filter(Boolean));

const isoInstant = z
  .string()
  .refine((s) => Number.isFinite(Date.parse(s)), { message: 'expected an ISO-8601 instant' })
  .transform((s) => Date.parse(s));

const Env = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  MODE: z.enum(['stream', 'backfill', 'both']).default('stream'),

  DATABASE_URL: z.string().min(1),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  REDIS_URL: z.string().optional(),

  SYMBOLS: csv('BTCUSDT'),
  INTERVALS: csv('1m'),

  STREAM_WS_URL: z.string().url().default('wss://stream.binance.com:9443/stream'),
  STREAM_HANDSHAKE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  STREAM_SUBSCRIBE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  STREAM_HEARTBEAT_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  STREAM_MAX_BUFFERED_FRAMES: z.coerce.number().int().positive().default(1_000),
  RECONNECT_BASE_MS: z.coerce.number().int().positive().default(1_000),
  RECONNECT_MAX_MS: z.coerce.number().int().positive().default(30_000),

  STORE_RETRY: z.coerce.number().int().nonnegative().default(5),
  STORE_RETRY_BASE_MS: z.coerce.number().int().positive().default(200),
  STORE_RETRY_MAX_MS: z.coerce.number().int().positive().default(5_000),

  REST_BASE_URL: z.string().url().default('https://api.binance.com'),
  BACKFILL_FROM: isoInstant.optional(),
  BACKFILL_TO: isoInstant.optional(),
  BACKFILL_BACK_SECONDS: z.coerce.number().int().positive().optional(),
  BACKFILL_RESUME: z.union([z.literal('1'), z.literal('0')]).default('0'),
  BACKFILL_PAGE_SIZE: z.coerce.number().int().min(1).max(1000).default(1000),
  BACKFILL_PAGE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  BACKFILL_PAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  BACKFILL_PAGE_RETRY: z.coerce.number().int().nonnegative().default(5),
  RATE_LIMIT_DEFAULT_WAIT_MS: z.coerce.number().int().positive().default(60_000),

  MAX_RESTARTS: z.coerce.number().int().nonnegative().optional(),
  RESTART_DELAY_MS: z.coerce.number().int().nonnegative().default(5_000),
  RESTART_RESET_MS: z.coerce.number().int().positive().default(600_000),

  OPS_PORT: z.coerce.number().int().nonnegative().default(0),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: z.union([z.literal('1'), z.literal('0')]).default('0'),
});

function resolveIntervals(values: string[]): KlineInterval[] {
  const out: KlineInterval[] = [];
  for (const v of values) {
    if (!isKlineInterval(v)) throw new ConfigurationError(`INTERVALS: unsupported interval "${v}"`);
    out.push(v);
  }
  return out;
}

function resolveSymbols(values: string[]): string[] {
  return values.map((raw) => {
    const s = raw.toUpperCase();
    if (!/^[A-Z0-9]+$/.test(s)) throw new ConfigurationError(`SYMBOLS: invalid symbol "${raw}"`);
    return s;
  });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, now = Date.now()) {
  const parsed = Env.safeParse(env);
  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([k, msgs]) => `${k}: ${(msgs ?? []).join(', ')}`)
      .join('; ');
    throw new ConfigurationError(`invalid environment: ${fields}`, { cause: parsed.error });
  }
  const e = parsed.data;

  const symbols = resolveSymbols(e.SYMBOLS);
  const intervals = resolveIntervals(e.INTERVALS);
  if (!symbols.length) throw new ConfigurationError('SYMBOLS must name at least one symbol');
  if (!intervals.length) throw new ConfigurationError('INTERVALS must name at least one interval');
  if (e.RECONNECT_BASE_MS > e.RECONNECT_MAX_MS) {
    throw new ConfigurationError('RECONNECT_BASE_MS must not exceed RECONNECT_MAX_MS');
  }

  const backfillFrom =
    e.BACKFILL_FROM ?? (e.BACKFILL_BACK_SECONDS !== undefined ? now - e.BACKFILL_BACK_SECONDS * 1000 : undefined);
  if (e.MODE !== 'stream' && backfillFrom === undefined) {
    throw new ConfigurationError(`MODE=${e.MODE} needs BACKFILL_FROM or BACKFILL_BACK_SECONDS`);
  }
  if (backfillFrom !== undefined && e.BACKFILL_TO !== undefined && e.BACKFILL_TO <= backfillFrom) {
    throw new ConfigurationError('BACKFILL_TO must be later than the backfill start');
  }

  return {
    env: e.NODE_ENV,
    mode: e.MODE,

    databaseUrl: e.DATABASE_URL,
    db: { poolMax: e.DB_POOL_MAX, connectTimeoutMs: e.DB_CONNECT_TIMEOUT_MS },
    redisUrl: e.REDIS_URL,

    symbols,
    intervals,

    stream: {
      url: e.STREAM_WS_URL,
      handshakeTimeoutMs: e.STREAM_HANDSHAKE_TIMEOUT_MS,
      subscribeTimeoutMs: e.STREAM_SUBSCRIBE_TIMEOUT_MS,
      heartbeatTimeoutMs: e.STREAM_HEARTBEAT_TIMEOUT_MS,
      maxBufferedFrames: e.STREAM_MAX_BUFFERED_FRAMES,
      reconnect: { baseMs: e.RECONNECT_BASE_MS, maxMs: e.RECONNECT_MAX_MS },
    },

    storeRetry: { attempts: e.STORE_RETRY, baseMs: e.STORE_RETRY_BASE_MS, maxMs: e.STORE_RETRY_MAX_MS },

    backfill: {
      restBaseUrl: e.REST_BASE_URL,
      from: backfillFrom,
      to: e.BACKFILL_TO,
      resume: e.BACKFILL_RESUME === '1',
      pageSize: e.BACKFILL_PAGE_SIZE,
      pageDelayMs: e.BACKFILL_PAGE_DELAY_MS,
      pageTimeoutMs: e.BACKFILL_PAGE_TIMEOUT_MS,
      pageRetry: e.BACKFILL_PAGE_RETRY,
      rateLimitDefaultWaitMs: e.RATE_LIMIT_DEFAULT_WAIT_MS,
    },

    restart: { maxRestarts: e.MAX_RESTARTS, delayMs: e.RESTART_DELAY_MS, resetAfterMs: e.RESTART_RESET_MS },

    opsPort: e.OPS_PORT,
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY === '1',
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;
