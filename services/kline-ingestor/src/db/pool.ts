import pg from 'pg';
import { logger } from '../utils/logger.js';

export type PoolOptions = {
  connectionString: string;
  max: number;
  connectTimeoutMs: number;
};

// NUMERIC(20,8) comes back as text ("42000.00000000"); BIGINT (OID 20) is parsed
// into a number, trade ids stay well below 2^53.
pg.types.setTypeParser(20, (v: string) => Number(v));

export function createPool(opts: PoolOptions): pg.Pool {
  const pool = new pg.Pool({
    connectionString: opts.connectionString,
    max: opts.max,
    connectionTimeoutMillis: opts.connectTimeoutMs,
  });
  // idle client errors would otherwise crash the process
  pool.on('error', (err) => logger.error({ err }, 'pg pool idle client error'));
  return pool;
}

export async function dbHealth(pool: pg.Pool): Promise<boolean> {
  const c = await pool.connect();
  try { await c.query('SELECT 1'); return true; }
  finally { c.release(); }
}
