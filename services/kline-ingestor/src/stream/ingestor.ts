import { fromStreamEvent, parseStreamControl, snapshotKey, type Candle } from '../domain/candle.js';
import { streamName, type KlineInterval } from '../domain/intervals.js';
import {
  ConfigurationError,
  ConnectionLost,
  FrameTimeout,
  InvariantViolation,
  MalformedPayload,
  SubscriptionTimeout,
} from '../errors.js';
import { malformedMessages, streamReconnects, streamState } from '../metrics/metrics.js';
import type { CandleStore } from '../repositories/candles.repo.js';
import { writeCandle } from '../services/candle-writer.js';
import { backoffDelay, sleep, type BackoffOptions } from '../utils/backoff.js';
import { logger, type Logger } from '../utils/logger.js';
import type { StreamConnection, StreamTransport } from './transport.js';

export type IngestorState = 'Disconnected' | 'Connecting' | 'Subscribed' | 'Streaming' | 'Stopped';

const STATE_GAUGE: Record<IngestorState, number> = {
  Stopped: -1,
  Disconnected: 0,
  Connecting: 1,
  Subscribed: 2,
  Streaming: 3,
};

export type StreamIngestorOptions = {
  symbol: string;
  interval: KlineInterval;
  url: string;
  transport: StreamTransport;
  store: CandleStore;
  handshakeTimeoutMs: number;
  subscribeTimeoutMs: number;
  heartbeatTimeoutMs: number;
  /** Unread frames held while the store is slow; older snapshots of a bucket are superseded. */
  maxBufferedFrames?: number;
  reconnect: BackoffOptions;
  storeRetry: { attempts: number; baseMs: number; maxMs: number };
  random?: () => number;
};

/**
 * Keeps one live kline subscription for a (symbol, interval) and forwards every
 * snapshot to the store. Transport failures never escape `run`: the session is
 * torn down and reopened after a capped, jittered backoff. Only an exchange
 * rejecting the subscription (ConfigurationError) ends `run` with an error.
 */
export class StreamIngestor {
  readonly symbol: string;
  readonly interval: KlineInterval;
  readonly stream: string;

  private current: IngestorState = 'Disconnected';
  private attempt = 0;
  private requestId = 0;
  private readonly listeners = new Set<(state: IngestorState) => void>();
  private readonly log: Logger;

  constructor(private readonly opts: StreamIngestorOptions) {
    this.symbol = opts.symbol;
    this.interval = opts.interval;
    this.stream = streamName(opts.symbol, opts.interval);
    this.log = logger.child({ stream: this.stream });
    streamState.set({ symbol: this.symbol, interval: this.interval }, STATE_GAUGE.Disconnected);
  }

  get state(): IngestorState {
    return this.current;
  }

  onStateChange(listener: (state: IngestorState) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  async run(signal: AbortSignal): Promise<void> {
    this.attempt = 0;
    try {
      while (!signal.aborted) {
        try {
          await this.session(signal);
        } catch (err) {
          if (signal.aborted) break;
          if (!(err instanceof ConnectionLost || err instanceof SubscriptionTimeout)) throw err;
          streamReconnects.inc({ symbol: this.symbol, interval: this.interval, code: err.code });
          this.log.warn({ err, code: err.code }, 'stream session ended');
        }
        this.setState('Disconnected');
        if (signal.aborted) break;

        const delayMs = backoffDelay(this.attempt, this.opts.reconnect, this.opts.random);
        this.attempt += 1;
        this.log.info({ attempt: this.attempt, delayMs }, 'reconnecting');
        await sleep(delayMs, signal);
      }
    } finally {
      this.setState('Stopped');
    }
  }

  private async session(signal: AbortSignal): Promise<void> {
    this.setState('Connecting');
    const conn = await this.opts.transport.connect(this.opts.url, {
      handshakeTimeoutMs: this.opts.handshakeTimeoutMs,
      signal,
      maxBufferedFrames: this.opts.maxBufferedFrames,
      coalesceKey: snapshotKey,
    });

    const onAbort = () => conn.close();
    signal.addEventListener('abort', onAbort, { once: true });
    if (signal.aborted) onAbort();

    try {
      const id = ++this.requestId;
      conn.send(JSON.stringify({ method: 'SUBSCRIBE', params: [this.stream], id }));
      this.setState('Subscribed');
      await this.awaitAck(conn, id, signal);

      this.attempt = 0;
      this.setState('Streaming');
      this.log.info('stream subscribed');

      for (;;) {
        const frame = await conn.next(this.opts.heartbeatTimeoutMs);
        await this.handleFrame(frame, signal);
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
      conn.close();
    }
  }

  private async awaitAck(conn: StreamConnection, id: number, signal: AbortSignal): Promise<void> {
    const deadline = Date.now() + this.opts.subscribeTimeoutMs;
    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) throw new SubscriptionTimeout(`no ack for ${this.stream} within ${this.opts.subscribeTimeoutMs}ms`);

      let frame: string;
      try {
        frame = await conn.next(remaining);
      } catch (err) {
        if (err instanceof FrameTimeout) {
          throw new SubscriptionTimeout(`no ack for ${this.stream} within ${this.opts.subscribeTimeoutMs}ms`, { cause: err });
        }
        throw err;
      }

      const payload = this.decode(frame);
      if (payload === undefined) continue;
      const control = parseStreamControl(payload);
      if (control?.kind === 'ack' && control.id === id) return;
      if (control?.kind === 'error') {
        throw new ConfigurationError(`exchange rejected subscription ${this.stream}: [${control.code}] ${control.msg}`);
      }
      if (!control) await this.forward(payload, signal);
    }
  }

  private async handleFrame(frame: string, signal: AbortSignal): Promise<void> {
    const payload = this.decode(frame);
    if (payload === undefined) return;

    const control = parseStreamControl(payload);
    if (control) {
      if (control.kind === 'error') this.log.warn({ code: control.code, msg: control.msg }, 'exchange error reply');
      return;
    }
    await this.forward(payload, signal);
  }

  private decode(frame: string): unknown {
    try {
      return JSON.parse(frame);
    } catch (err) {
      this.discard(new MalformedPayload('frame is not valid JSON', { cause: err }), frame);
      return undefined;
    }
  }

  private async forward(payload: unknown, signal: AbortSignal): Promise<void> {
    let candle: Candle;
    try {
      candle = fromStreamEvent(payload);
    } catch (err) {
      if (err instanceof MalformedPayload || err instanceof InvariantViolation) {
        this.discard(err, payload);
        return;
      }
      throw err;
    }

    if (candle.symbol !== this.symbol || candle.interval !== this.interval) {
      this.log.warn({ symbol: candle.symbol, interval: candle.interval }, 'kline for another stream ignored');
      return;
    }

    await writeCandle(this.opts.store, candle, { source: 'stream', ...this.opts.storeRetry, signal });
    if (candle.closed) this.log.debug({ startTime: candle.startTime }, 'candle closed');
  }

  private discard(err: MalformedPayload | InvariantViolation, payload: unknown) {
    malformedMessages.inc({ source: 'stream', code: err.code });
    this.log.warn({ err, code: err.code, payload }, 'discarding stream message');
  }

  private setState(next: IngestorState) {
    if (next === this.current) return;
    this.current = next;
    streamState.set({ symbol: this.symbol, interval: this.interval }, STATE_GAUGE[next]);
    for (const l of this.listeners) l(next);
  }
}
