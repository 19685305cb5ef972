import type { BackfillRequest, BackfillSummary } from '../backfill/reconciler.js';
import type { KlineInterval } from '../domain/intervals.js';
import { SupervisorFatal } from '../errors.js';
import { componentRestarts } from '../metrics/metrics.js';
import type { IngestorState, StreamIngestor } from '../stream/ingestor.js';
import { sleep } from '../utils/backoff.js';
import { logger } from '../utils/logger.js';
import { RestartPolicy, type RestartPolicyOptions } from './restart-policy.js';

export type SupervisedIngestor = Pick<StreamIngestor, 'symbol' | 'interval' | 'state' | 'run'>;

export interface BackfillRunner {
  run(req: BackfillRequest, signal: AbortSignal): Promise<BackfillSummary>;
}

export type SharedResource = { name: string; close(): Promise<void> };

export type BackfillOutcome =
  | { status: 'completed'; summary: BackfillSummary }
  | { status: 'failed'; error: unknown }
  | { status: 'refused'; reason: string };

/** A cancelled run resolves with a summary but left part of its range unfilled. */
export function backfillCompleted(outcome: BackfillOutcome): boolean {
  return outcome.status === 'completed' && outcome.summary.reason !== 'aborted';
}

export type HealthReport = {
  status: 'ready' | 'not_ready';
  ingestors: { symbol: string; interval: KlineInterval; state: IngestorState }[];
  backfills: number;
};

export type SupervisorOptions = {
  ingestors: SupervisedIngestor[];
  backfill: BackfillRunner;
  restart: Omit<RestartPolicyOptions, 'now'>;
  /** Closed in order once every task has ended. */
  resources?: SharedResource[];
  now?: () => number;
};

const backfillKey = (symbol: string, interval: KlineInterval) => `${symbol}:${interval}`;

/**
 * Owns the lifecycle of stream ingestors and backfill runs. Ingestors are
 * restarted under a per-task RestartPolicy; a backfill's outcome is logged and
 * never touches the ingestors.
 */
export class Supervisor {
  private readonly ac = new AbortController();
  private readonly tasks = new Set<Promise<void>>();
  private readonly backfills = new Map<string, Promise<BackfillOutcome>>();
  private readonly log = logger.child({ component: 'supervisor' });
  private started = false;
  private stopping: Promise<void> | null = null;
  private fatal: SupervisorFatal | null = null;
  private resolveStopped: () => void = () => {};
  private readonly stopped = new Promise<void>((resolve) => {
    this.resolveStopped = resolve;
  });

  constructor(private readonly opts: SupervisorOptions) {}

  start(): void {
    if (this.started) return;
    this.started = true;
    for (const ing of this.opts.ingestors) this.track(this.supervise(ing));
    this.log.info({ ingestors: this.opts.ingestors.length }, 'supervisor started');
  }

  isBackfillRunning(symbol: string, interval: KlineInterval): boolean {
    return this.backfills.has(backfillKey(symbol, interval));
  }

  /** Runs one backfill as a supervised task. Never rejects. */
  runBackfill(req: BackfillRequest): Promise<BackfillOutcome> {
    const key = backfillKey(req.symbol, req.interval);
    if (this.ac.signal.aborted) {
      return Promise.resolve({ status: 'refused', reason: 'supervisor is stopping' });
    }
    if (this.backfills.has(key)) {
      this.log.warn({ symbol: req.symbol, interval: req.interval }, 'backfill already running; refused');
      return Promise.resolve({ status: 'refused', reason: `backfill already running for ${key}` });
    }

    const run = this.opts.backfill.run(req, this.ac.signal).then(
      (summary): BackfillOutcome => {
        this.log.info({ symbol: req.symbol, interval: req.interval, reason: summary.reason, pages: summary.pages }, 'backfill completed');
        return { status: 'completed', summary };
      },
      (error: unknown): BackfillOutcome => {
        this.log.error({ err: error, symbol: req.symbol, interval: req.interval }, 'backfill failed');
        return { status: 'failed', error };
      }
    );
    const outcome = run.finally(() => this.backfills.delete(key));
    this.backfills.set(key, outcome);
    this.track(outcome.then(() => undefined));
    return outcome;
  }

  health(): HealthReport {
    const ingestors = this.opts.ingestors.map((i) => ({ symbol: i.symbol, interval: i.interval, state: i.state }));
    const ready = !this.ac.signal.aborted && ingestors.every((i) => i.state === 'Streaming');
    return { status: ready ? 'ready' : 'not_ready', ingestors, backfills: this.backfills.size };
  }

  /** Aborts every task, waits for all of them, then releases shared resources. */
  stop(): Promise<void> {
    if (!this.stopping) this.stopping = this.shutdown();
    return this.stopping;
  }

  /** Resolves once stopped; rejects with SupervisorFatal when a restart budget ran out. */
  async wait(): Promise<void> {
    await this.stopped;
    if (this.fatal) throw this.fatal;
  }

  private async shutdown(): Promise<void> {
    this.ac.abort();
    this.log.info({ tasks: this.tasks.size }, 'supervisor stopping');
    await Promise.allSettled([...this.tasks]);

    for (const r of this.opts.resources ?? []) {
      try {
        await r.close();
      } catch (err) {
        this.log.error({ err, resource: r.name }, 'error closing resource');
      }
    }
    this.log.info('supervisor stopped');
    this.resolveStopped();
  }

  private async supervise(ing: SupervisedIngestor): Promise<void> {
    const component = `stream:${ing.symbol}:${ing.interval}`;
    const policy = new RestartPolicy({ ...this.opts.restart, now: this.opts.now });
    const signal = this.ac.signal;

    while (!signal.aborted) {
      policy.markStarted();
      try {
        await ing.run(signal);
        if (signal.aborted) return;
        this.log.warn({ component }, 'ingestor exited');
      } catch (err) {
        if (signal.aborted) return;
        this.log.error({ err, component }, 'ingestor failed');
      }

      const decision = policy.onExit();
      if (!decision.restart) {
        this.escalate(new SupervisorFatal(`${component} exhausted its restart budget (${decision.attempts} restarts)`));
        return;
      }
      componentRestarts.inc({ component });
      this.log.warn({ component, attempt: decision.attempt, delayMs: decision.delayMs }, 'restarting ingestor');
      if (!(await sleep(decision.delayMs, signal))) return;
    }
  }

  private escalate(err: SupervisorFatal) {
    if (this.fatal) return;
    this.fatal = err;
    this.log.fatal({ err }, 'supervisor giving up');
    void this.stop();
  }

  private track(task: Promise<void>) {
    this.tasks.add(task);
    void task.finally(() => this.tasks.delete(task));
  }
}
