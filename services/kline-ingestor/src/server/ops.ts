import http from 'node:http';
import { z } from 'zod';
import { isKlineInterval } from '../domain/intervals.js';
import { registry } from '../metrics/metrics.js';
import type { Supervisor } from '../supervisor/supervisor.js';
import { logger } from '../utils/logger.js';

export type OpsDeps = {
  supervisor: Pick<Supervisor, 'health' | 'runBackfill' | 'isBackfillRunning'>;
  dbCheck: () => Promise<boolean>;
};

const instant = z
  .string()
  .refine((s) => Number.isFinite(Date.parse(s)), { message: 'expected an ISO-8601 instant' })
  .transform((s) => Date.parse(s));

const BackfillQuery = z
  .object({
    symbol: z.string().regex(/^[A-Za-z0-9]+$/).transform((s) => s.toUpperCase()),
    interval: z.string().refine(isKlineInterval, { message: 'unsupported interval' }),
    from: instant,
    to: instant.optional(),
    resume: z.enum(['0', '1']).optional(),
  })
  .refine((q) => q.to === undefined || q.to > q.from, { message: 'to must be later than from', path: ['to'] });

function sendJson(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { 'content-type': 'application/json' });
  res.end(JSON.stringify(body));
}

export function createOpsServer(deps: OpsDeps): http.Server {
  return http.createServer(async (req, res) => {
    try {
      const url = new URL(req.url || '/', 'http://localhost');
      const method = req.method ?? 'GET';

      if (method === 'GET' && url.pathname === '/ops/health/liveness') {
        sendJson(res, 200, { ok: true });
        return;
      }
      if (method === 'GET' && url.pathname === '/ops/health/readiness') {
        let db: 'ok' | 'fail' = 'ok';
        try {
          if (!(await deps.dbCheck())) db = 'fail';
        } catch (err) {
          logger.warn({ err }, 'readiness db check failed');
          db = 'fail';
        }
        const health = deps.supervisor.health();
        const status = db === 'ok' && health.status === 'ready' ? 'ready' : 'not_ready';
        sendJson(res, status === 'ready' ? 200 : 503, {
          status,
          checks: { db },
          ingestors: health.ingestors,
          backfills: health.backfills,
        });
        return;
      }
      if (method === 'GET' && url.pathname === '/ops/metrics') {
        res.writeHead(200, { 'content-type': registry.contentType });
        res.end(await registry.metrics());
        return;
      }
      if (method === 'POST' && url.pathname === '/ops/backfill') {
        const parsed = BackfillQuery.safeParse(Object.fromEntries(url.searchParams));
        if (!parsed.success) {
          sendJson(res, 400, { error: { code: 'BAD_REQUEST', message: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') } });
          return;
        }
        const q = parsed.data;
        if (deps.supervisor.isBackfillRunning(q.symbol, q.interval)) {
          sendJson(res, 409, { error: { code: 'CONFLICT', message: `backfill already running for ${q.symbol} ${q.interval}` } });
          return;
        }
        const request = { symbol: q.symbol, interval: q.interval, from: q.from, to: q.to, resume: q.resume === '1' };
        void deps.supervisor.runBackfill(request);
        logger.info({ ...request, from: new Date(q.from).toISOString() }, 'on-demand backfill accepted');
        sendJson(res, 202, { accepted: true, symbol: q.symbol, interval: q.interval });
        return;
      }

      sendJson(res, 404, { error: { code: 'NOT_FOUND', message: 'unknown path' } });
    } catch (err) {
      logger.error({ err, url: req.url }, 'ops request failed');
      sendJson(res, 500, { error: { code: 'INTERNAL', message: 'unexpected error' } });
    }
  });
}

export function startOpsServer(port: number, deps: OpsDeps): http.Server {
  const server = createOpsServer(deps);
  server.listen(port, () => {
    logger.info({ port }, 'ops server listening');
  });
  return server;
}
