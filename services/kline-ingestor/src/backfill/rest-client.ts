import { fetch, type Response } from 'undici';
import type { KlineInterval } from '../domain/intervals.js';
import { ConfigurationError, ConnectionLost, MalformedPayload, RateLimited } from '../errors.js';

export type KlinePageRequest = {
  symbol: string;
  interval: KlineInterval;
  startTime: number; // epoch ms, inclusive
  endTime: number;   // epoch ms, inclusive
  limit: number;
};

/** Paged, time-ascending history of closed candles. Entries are raw positional arrays. */
export interface KlineHistorySource {
  fetchPage(req: KlinePageRequest, signal: AbortSignal): Promise<unknown[]>;
}

export type RestClientOptions = {
  baseUrl: string;
  timeoutMs: number;
  defaultRetryAfterMs: number;
};

export function parseRetryAfterMs(header: string | null, fallbackMs: number): number {
  if (header) {
    const sec = Number(header);
    if (Number.isFinite(sec) && sec >= 0) return Math.ceil(sec * 1000);
  }
  return fallbackMs;
}

/**
 * GET /api/v3/klines. Failures surface as:
 *  - RateLimited (429 / 418 ban) with the server's Retry-After
 *  - ConnectionLost for timeouts, network errors, broken bodies and 5xx (retry the page)
 *  - ConfigurationError for any other 4xx (unknown symbol, bad interval)
 */
export class BinanceRestClient implements KlineHistorySource {
  constructor(private readonly opts: RestClientOptions) {}

  pageUrl(req: KlinePageRequest): string {
    const qs = new URLSearchParams({
      symbol: req.symbol,
      interval: req.interval,
      startTime: String(req.startTime),
      endTime: String(req.endTime),
      limit: String(req.limit),
    });
    return `${this.opts.baseUrl.replace(/\/$/, '')}/api/v3/klines?${qs.toString()}`;
  }

  async fetchPage(req: KlinePageRequest, signal: AbortSignal): Promise<unknown[]> {
    const url = this.pageUrl(req);
    const ac = new AbortController();
    const to = setTimeout(() => ac.abort(), this.opts.timeoutMs);
    const onAbort = () => ac.abort();
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      let res: Response;
      try {
        res = await fetch(url, { method: 'GET', headers: { accept: 'application/json' }, signal: ac.signal });
      } catch (err) {
        throw new ConnectionLost(`GET ${url} ${this.failureReason(signal, ac.signal, 'network error')}`, { cause: err });
      }

      if (res.status === 429 || res.status === 418) {
        const waitMs = parseRetryAfterMs(res.headers.get('retry-after'), this.opts.defaultRetryAfterMs);
        const message = `rate limited (HTTP ${res.status})`;
        try {
          await res.body?.cancel();
        } catch (err) {
          throw new RateLimited(message, waitMs, { cause: err });
        }
        throw new RateLimited(message, waitMs);
      }

      const body = await this.readBody(res, url, signal, ac.signal);
      if (res.status >= 500) {
        throw new ConnectionLost(`HTTP ${res.status} from history endpoint: ${body.slice(0, 200)}`);
      }
      if (!res.ok) {
        throw new ConfigurationError(`history request rejected (HTTP ${res.status}): ${body.slice(0, 300)}`);
      }

      let data: unknown;
      try {
        data = JSON.parse(body);
      } catch (err) {
        throw new MalformedPayload('history response is not valid JSON', { cause: err });
      }
      if (!Array.isArray(data)) throw new MalformedPayload('history response is not an array');
      return data;
    } finally {
      clearTimeout(to);
      signal.removeEventListener('abort', onAbort);
    }
  }

  /** A body that breaks off mid-read is a lost connection, whatever the status said. */
  private async readBody(res: Response, url: string, signal: AbortSignal, attempt: AbortSignal): Promise<string> {
    try {
      return await res.text();
    } catch (err) {
      const why = this.failureReason(signal, attempt, 'body read failed');
      throw new ConnectionLost(`GET ${url} (HTTP ${res.status}) ${why}`, { cause: err });
    }
  }

  private failureReason(signal: AbortSignal, attempt: AbortSignal, otherwise: string): string {
    if (signal.aborted) return 'aborted';
    if (attempt.aborted) return `timed out after ${this.opts.timeoutMs}ms`;
    return otherwise;
  }
}
