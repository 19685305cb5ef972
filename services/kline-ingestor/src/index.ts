import type http from 'node:http';
import { NoopCursorCheckpoint, RedisCursorCheckpoint, type CursorCheckpoint } from './backfill/checkpoint.js';
import { BackfillReconciler, type BackfillRequest } from './backfill/reconciler.js';
import { BinanceRestClient } from './backfill/rest-client.js';
import { loadConfig, type AppConfig } from './config/index.js';
import { createPool } from './db/pool.js';
import type { KlineInterval } from './domain/intervals.js';
import { ConfigurationError } from './errors.js';
import { PgCandleStore } from './repositories/candles.repo.js';
import { startOpsServer } from './server/ops.js';
import { StreamIngestor } from './stream/ingestor.js';
import { WsStreamTransport } from './stream/ws-transport.js';
import { Supervisor, backfillCompleted } from './supervisor/supervisor.js';
import { logger } from './utils/logger.js';

let cfg: AppConfig;
try {
  cfg = loadConfig();
} catch (err) {
  logger.fatal({ err }, 'invalid configuration');
  process.exit(1);
}

const pairs: [string, KlineInterval][] = cfg.symbols.flatMap((s) => cfg.intervals.map((i): [string, KlineInterval] => [s, i]));

const pool = createPool({ connectionString: cfg.databaseUrl, max: cfg.db.poolMax, connectTimeoutMs: cfg.db.connectTimeoutMs });
const store = new PgCandleStore(pool);
const checkpoint: CursorCheckpoint = cfg.redisUrl ? RedisCursorCheckpoint.fromUrl(cfg.redisUrl) : new NoopCursorCheckpoint();
const transport = new WsStreamTransport();

const reconciler = new BackfillReconciler({
  source: new BinanceRestClient({
    baseUrl: cfg.backfill.restBaseUrl,
    timeoutMs: cfg.backfill.pageTimeoutMs,
    defaultRetryAfterMs: cfg.backfill.rateLimitDefaultWaitMs,
  }),
  store,
  checkpoint,
  pageSize: cfg.backfill.pageSize,
  pageDelayMs: cfg.backfill.pageDelayMs,
  pageRetry: cfg.backfill.pageRetry,
  storeRetry: cfg.storeRetry,
});

const ingestors =
  cfg.mode === 'backfill'
    ? []
    : pairs.map(
        ([symbol, interval]) =>
          new StreamIngestor({
            symbol,
            interval,
            url: cfg.stream.url,
            transport,
            store,
            handshakeTimeoutMs: cfg.stream.handshakeTimeoutMs,
            subscribeTimeoutMs: cfg.stream.subscribeTimeoutMs,
            heartbeatTimeoutMs: cfg.stream.heartbeatTimeoutMs,
            maxBufferedFrames: cfg.stream.maxBufferedFrames,
            reconnect: cfg.stream.reconnect,
            storeRetry: cfg.storeRetry,
          })
      );

const supervisor = new Supervisor({
  ingestors,
  backfill: reconciler,
  restart: cfg.restart,
  resources: [
    { name: 'pg', close: () => pool.end() },
    { name: 'checkpoint', close: () => checkpoint.close() },
  ],
});

const opsServer: http.Server | null =
  cfg.opsPort > 0 ? startOpsServer(cfg.opsPort, { supervisor, dbCheck: () => store.health() }) : null;

let stopping: Promise<void> | null = null;

function closeOps(): Promise<void> {
  if (!opsServer?.listening) return Promise.resolve();
  return new Promise<void>((res) => opsServer.close(() => res()));
}

// every caller waits for the same shutdown, so nobody exits before the pool is closed
function shutdown(sig: string): Promise<void> {
  if (!stopping) {
    logger.warn({ sig }, 'kline ingestor shutting down');
    stopping = closeOps().then(() => supervisor.stop());
  }
  return stopping;
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

function backfillRequests(): BackfillRequest[] {
  const { from, to, resume } = cfg.backfill;
  if (from === undefined) throw new ConfigurationError(`MODE=${cfg.mode} needs a backfill start`);
  return pairs.map(([symbol, interval]) => ({ symbol, interval, from, to, resume }));
}

async function runBackfillOnce(): Promise<number> {
  let failed = 0;
  for (const req of backfillRequests()) {
    if (stopping) break;
    const outcome = await supervisor.runBackfill(req);
    if (!backfillCompleted(outcome)) failed += 1;
  }
  await shutdown('backfill-done');
  return failed > 0 ? 1 : 0;
}

async function main() {
  logger.info(
    {
      env: cfg.env,
      mode: cfg.mode,
      symbols: cfg.symbols,
      intervals: cfg.intervals,
      checkpoint: cfg.redisUrl ? 'redis' : 'none',
      opsPort: cfg.opsPort || undefined,
    },
    'kline ingestor starting'
  );

  if (cfg.mode === 'backfill') {
    process.exit(await runBackfillOnce());
  }

  supervisor.start();
  if (cfg.mode === 'both') {
    for (const req of backfillRequests()) void supervisor.runBackfill(req);
  }

  try {
    await supervisor.wait();
  } catch (err) {
    logger.fatal({ err }, 'supervisor failed');
    await closeOps();
    process.exit(1);
  }
  logger.info('bye');
  process.exit(0);
}

main().catch((err) => {
  logger.fatal({ err }, 'kline ingestor fatal');
  process.exit(1);
});
