import { Pool } from 'pg';
import type { OrderResult, RawDecision } from './core/types';

let pool: Pool | null = null;

export function initPg(url: string): boolean {
  if (pool) return true;
  if (!url) return false;
  pool = new Pool({ connectionString: url, ssl: { rejectUnauthorized: false } });
  return true;
}

function getPool(): Pool | null {
  return pool;
}

export async function ensureSchema(): Promise<void> {
  const p = getPool();
  if (!p) return;
  await p.query(`
    CREATE TABLE IF NOT EXISTS cycles (
      ts BIGINT NOT NULL,
      model TEXT NOT NULL,
      mode TEXT NOT NULL,
      decision JSONB NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_cycles_ts ON cycles(ts);

    CREATE TABLE IF NOT EXISTS order_results (
      ts BIGINT NOT NULL,
      model TEXT NOT NULL,
      mode TEXT NOT NULL,
      symbol TEXT NOT NULL,
      side TEXT NOT NULL,
      status TEXT NOT NULL,
      quantity DOUBLE PRECISION,
      notional DOUBLE PRECISION,
      filled_qty DOUBLE PRECISION,
      order_id TEXT,
      reason TEXT,
      detail TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_order_results_symbol_ts ON order_results(symbol, ts);
  `);
}

export async function pgInsertCycle(ts: number, model: string, mode: string, decision: RawDecision): Promise<void> {
  const p = getPool();
  if (!p) return;
  await p.query(`INSERT INTO cycles (ts, model, mode, decision) VALUES ($1, $2, $3, $4)`, [
    ts,
    model,
    mode,
    JSON.stringify(decision),
  ]);
}

export async function pgInsertOrderResult(ts: number, model: string, mode: string, r: OrderResult): Promise<void> {
  const p = getPool();
  if (!p) return;
  await p.query(
    `INSERT INTO order_results (ts, model, mode, symbol, side, status, quantity, notional, filled_qty, order_id, reason, detail)
     VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12)`,
    [ts, model, mode, r.symbol, r.side, r.status, r.quantity, r.notional, r.filledQuantity, r.orderId, r.reason ?? null, r.detail ?? null],
  );
}

export async function closePg(): Promise<void> {
  if (!pool) return;
  await pool.end();
  pool = null;
}
