import { describe, it, expect, vi } from 'vitest';
import type { BackfillRequest, BackfillSummary } from '../../src/backfill/reconciler.js';
import { BackfillFailed, SupervisorFatal } from '../../src/errors.js';
import type { KlineInterval } from '../../src/domain/intervals.js';
import type { IngestorState } from '../../src/stream/ingestor.js';
import { Supervisor, backfillCompleted, type BackfillRunner, type SupervisedIngestor } from '../../src/supervisor/supervisor.js';
import { T0 } from '../support/fixtures.js';

function untilAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
}

class FakeIngestor implements SupervisedIngestor {
  state: IngestorState = 'Disconnected';
  runs = 0;

  constructor(
    readonly symbol: string,
    readonly interval: KlineInterval,
    private readonly behave: (run: number, signal: AbortSignal) => Promise<void> = (_run, signal) => untilAborted(signal)
  ) {}

  async run(signal: AbortSignal): Promise<void> {
    this.runs += 1;
    this.state = 'Streaming';
    try {
      await this.behave(this.runs, signal);
    } finally {
      this.state = 'Stopped';
    }
  }
}

function summaryFor(req: BackfillRequest, reason: BackfillSummary['reason'] = 'range-end'): BackfillSummary {
  return {
    symbol: req.symbol,
    interval: req.interval,
    from: req.from,
    to: req.to ?? req.from,
    pages: 1,
    inserted: 1,
    updated: 0,
    stale: 0,
    dropped: 0,
    skipped: 0,
    cursor: req.to ?? req.from,
    reason,
  };
}

const idleBackfill: BackfillRunner = { run: async (req) => summaryFor(req) };
const request: BackfillRequest = { symbol: 'BTCUSDT', interval: '1m', from: T0, to: T0 + 60_000 };

describe('supervisor', () => {
  it('reports readiness and shuts down cleanly', async () => {
    const closed: string[] = [];
    const ingestors = [new FakeIngestor('BTCUSDT', '1m'), new FakeIngestor('ETHUSDT', '1m')];
    const sup = new Supervisor({
      ingestors,
      backfill: idleBackfill,
      restart: { delayMs: 1, resetAfterMs: 1000 },
      resources: [
        { name: 'pg', close: async () => void closed.push('pg') },
        { name: 'checkpoint', close: async () => void closed.push('checkpoint') },
      ],
    });

    sup.start();
    expect(sup.health()).toEqual({
      status: 'ready',
      ingestors: [
        { symbol: 'BTCUSDT', interval: '1m', state: 'Streaming' },
        { symbol: 'ETHUSDT', interval: '1m', state: 'Streaming' },
      ],
      backfills: 0,
    });

    await sup.stop();
    await expect(sup.wait()).resolves.toBeUndefined();
    expect(closed).toEqual(['pg', 'checkpoint']);
    expect(ingestors.every((i) => i.state === 'Stopped')).toBe(true);
    expect(sup.health().status).toBe('not_ready');
  });

  it('restarts an ingestor that fails', async () => {
    const ing = new FakeIngestor('BTCUSDT', '1m', async (run, signal) => {
      if (run < 3) throw new Error(`boom ${run}`);
      await untilAborted(signal);
    });
    const sup = new Supervisor({ ingestors: [ing], backfill: idleBackfill, restart: { maxRestarts: 5, delayMs: 1, resetAfterMs: 60_000 } });

    sup.start();
    await vi.waitFor(() => expect(ing.runs).toBe(3));
    expect(sup.health().status).toBe('ready');

    await sup.stop();
    await expect(sup.wait()).resolves.toBeUndefined();
  });

  it('gives up once the restart budget is spent', async () => {
    const closed: string[] = [];
    const failing = new FakeIngestor('BTCUSDT', '1m', async () => {
      throw new Error('exchange unreachable');
    });
    const healthy = new FakeIngestor('ETHUSDT', '1m');
    const sup = new Supervisor({
      ingestors: [failing, healthy],
      backfill: idleBackfill,
      restart: { maxRestarts: 2, delayMs: 1, resetAfterMs: 60_000 },
      resources: [{ name: 'pg', close: async () => void closed.push('pg') }],
    });

    sup.start();
    await expect(sup.wait()).rejects.toBeInstanceOf(SupervisorFatal);
    expect(failing.runs).toBe(3);
    expect(healthy.state).toBe('Stopped');
    expect(closed).toEqual(['pg']);
  });

  it('runs backfills beside the ingestors and refuses duplicates', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const backfill: BackfillRunner = {
      run: async (req) => {
        await gate;
        return summaryFor(req);
      },
    };
    const ing = new FakeIngestor('BTCUSDT', '1m');
    const sup = new Supervisor({ ingestors: [ing], backfill, restart: { delayMs: 1, resetAfterMs: 1000 } });
    sup.start();

    const first = sup.runBackfill(request);
    expect(sup.isBackfillRunning('BTCUSDT', '1m')).toBe(true);
    expect(sup.health().backfills).toBe(1);
    await expect(sup.runBackfill(request)).resolves.toEqual({
      status: 'refused',
      reason: 'backfill already running for BTCUSDT:1m',
    });

    release();
    await expect(first).resolves.toEqual({ status: 'completed', summary: summaryFor(request) });
    expect(sup.isBackfillRunning('BTCUSDT', '1m')).toBe(false);
    expect(ing.runs).toBe(1);

    await sup.stop();
  });

  it('reports a failed backfill without touching the ingestors', async () => {
    const error = new BackfillFailed('page failed after 6 attempts');
    const ing = new FakeIngestor('BTCUSDT', '1m');
    const sup = new Supervisor({
      ingestors: [ing],
      backfill: { run: async () => Promise.reject(error) },
      restart: { delayMs: 1, resetAfterMs: 1000 },
    });
    sup.start();

    await expect(sup.runBackfill(request)).resolves.toEqual({ status: 'failed', error });
    expect(ing.state).toBe('Streaming');
    expect(ing.runs).toBe(1);

    await sup.stop();
  });

  it('cancels running backfills on stop and refuses new ones', async () => {
    const backfill: BackfillRunner = {
      run: async (req, signal) => {
        await untilAborted(signal);
        return summaryFor(req, 'aborted');
      },
    };
    const sup = new Supervisor({ ingestors: [], backfill, restart: { delayMs: 1, resetAfterMs: 1000 } });

    const running = sup.runBackfill(request);
    await sup.stop();

    const outcome = await running;
    expect(outcome).toEqual({ status: 'completed', summary: summaryFor(request, 'aborted') });
    expect(backfillCompleted(outcome)).toBe(false);
    await expect(sup.runBackfill(request)).resolves.toEqual({ status: 'refused', reason: 'supervisor is stopping' });
  });

  it('counts only uncancelled runs as completed backfills', () => {
    expect(backfillCompleted({ status: 'completed', summary: summaryFor(request) })).toBe(true);
    expect(backfillCompleted({ status: 'completed', summary: summaryFor(request, 'end-of-history') })).toBe(true);
    expect(backfillCompleted({ status: 'completed', summary: summaryFor(request, 'aborted') })).toBe(false);
    expect(backfillCompleted({ status: 'failed', error: new BackfillFailed('x') })).toBe(false);
    expect(backfillCompleted({ status: 'refused', reason: 'busy' })).toBe(false);
  });

  it('lets a late stop caller wait for resources to close', async () => {
    const closed: string[] = [];
    const releasePool: (() => void)[] = [];
    const sup = new Supervisor({
      ingestors: [new FakeIngestor('BTCUSDT', '1m')],
      backfill: idleBackfill,
      restart: { delayMs: 1, resetAfterMs: 1000 },
      resources: [
        {
          name: 'pg',
          close: () =>
            new Promise<void>((resolve) => {
              releasePool.push(() => {
                closed.push('pg');
                resolve();
              });
            }),
        },
      ],
    });
    sup.start();

    const first = sup.stop();
    const second = sup.stop();
    expect(second).toBe(first);

    let secondDone = false;
    void second.then(() => {
      secondDone = true;
    });
    await vi.waitFor(() => expect(releasePool).toHaveLength(1));
    expect(secondDone).toBe(false);

    releasePool[0]?.();
    await second;
    expect(closed).toEqual(['pg']);
  });
});
