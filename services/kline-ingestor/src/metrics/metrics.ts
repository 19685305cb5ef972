import { Registry, collectDefaultMetrics, Counter, Gauge } from 'prom-client';
export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const candlesWritten = new Counter({
  name: 'candles_written_total',
  help: 'Candle upserts by source and outcome',
  labelNames: ['source', 'outcome'] as const,
  registers: [registry],
});
export const candlesDropped = new Counter({
  name: 'candles_dropped_total',
  help: 'Candles abandoned after a store failure',
  labelNames: ['source', 'reason'] as const,
  registers: [registry],
});
export const malformedMessages = new Counter({
  name: 'malformed_messages_total',
  help: 'Stream frames or backfill entries discarded by validation',
  labelNames: ['source', 'code'] as const,
  registers: [registry],
});
export const streamReconnects = new Counter({
  name: 'stream_reconnects_total',
  help: 'Stream sessions ended by a transport failure',
  labelNames: ['symbol', 'interval', 'code'] as const,
  registers: [registry],
});
// 0 Disconnected, 1 Connecting, 2 Subscribed, 3 Streaming, -1 Stopped
export const streamState = new Gauge({
  name: 'stream_state',
  help: 'Current stream ingestor state',
  labelNames: ['symbol', 'interval'] as const,
  registers: [registry],
});
export const backfillPages = new Counter({
  name: 'backfill_pages_total',
  help: 'Backfill pages fetched, by result',
  labelNames: ['symbol', 'interval', 'result'] as const,
  registers: [registry],
});
export const componentRestarts = new Counter({
  name: 'supervisor_restarts_total',
  help: 'Supervised component restarts',
  labelNames: ['component'] as const,
  registers: [registry],
});
