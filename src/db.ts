import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import pino from 'pino';
import { initPg, ensureSchema, pgInsertCycle, pgInsertOrderResult } from './pg';
import type { CycleJournal, JournalEntry } from './core/collaborators';
import type { OrderResult, RawDecision } from './core/types';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

export interface OrderResultRow {
  ts: number;
  model: string;
  mode: string;
  symbol: string;
  side: string;
  status: string;
  quantity: number | null;
  notional: number | null;
  filled_qty: number | null;
  order_id: string | null;
  reason: string | null;
  detail: string | null;
}

const SCHEMA = `
  PRAGMA journal_mode = WAL;
  CREATE TABLE IF NOT EXISTS cycles (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    ts INTEGER NOT NULL,
    model TEXT NOT NULL,
    mode TEXT NOT NULL,
    decision_json TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_cycles_ts ON cycles(ts);

  CREATE TABLE IF NOT EXISTS order_results (
    cycle_id INTEGER NOT NULL REFERENCES cycles(id),
    seq INTEGER NOT NULL,
    symbol TEXT NOT NULL,
    side TEXT NOT NULL,
    status TEXT NOT NULL,
    requested_json TEXT,
    quantity REAL,
    notional REAL,
    filled_qty REAL,
    order_id TEXT,
    reason TEXT,
    detail TEXT,
    PRIMARY KEY (cycle_id, seq)
  );
  CREATE INDEX IF NOT EXISTS idx_order_results_symbol ON order_results(symbol);
`;

function parseJson<T>(json: string | null, fallback: T): T {
  if (!json) return fallback;
  try {
    return JSON.parse(json) as T;
  } catch {
    return fallback;
  }
}

/** SQLite-backed cycle journal; mirrors to Postgres when a connection URL is given. */
export class SqliteJournal implements CycleJournal {
  private readonly db: Database.Database;
  private readonly mirror: boolean;
  private readonly mirrorReady: Promise<void>;
  private readonly pendingMirrors = new Set<Promise<void>>();

  constructor(dbPath: string, pgUrl?: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.exec(SCHEMA);
    this.mirror = pgUrl ? initPg(pgUrl) : false;
    this.mirrorReady = this.mirror
      ? ensureSchema().catch((err: unknown) => logger.warn({ err }, 'pg mirror schema failed'))
      : Promise.resolve();
  }

  record(entry: JournalEntry): void {
    const insertCycle = this.db.prepare(
      `INSERT INTO cycles (ts, model, mode, decision_json) VALUES (?, ?, ?, ?)`,
    );
    const insertResult = this.db.prepare(
      `INSERT INTO order_results
         (cycle_id, seq, symbol, side, status, requested_json, quantity, notional, filled_qty, order_id, reason, detail)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    const write = this.db.transaction((e: JournalEntry) => {
      const info = insertCycle.run(e.ts, e.model, e.mode, JSON.stringify(e.decision));
      const cycleId = Number(info.lastInsertRowid);
      e.results.forEach((r, seq) => {
        insertResult.run(
          cycleId,
          seq,
          r.symbol,
          r.side,
          r.status,
          r.requested ? JSON.stringify(r.requested) : null,
          r.quantity,
          r.notional,
          r.filledQuantity,
          r.orderId,
          r.reason ?? null,
          r.detail ?? null,
        );
      });
      return cycleId;
    });
    write(entry);

    if (this.mirror) this.track(this.mirrorToPg(entry));
  }

  private async mirrorToPg(entry: JournalEntry): Promise<void> {
    await this.mirrorReady;
    try {
      await pgInsertCycle(entry.ts, entry.model, entry.mode, entry.decision);
      for (const r of entry.results) await pgInsertOrderResult(entry.ts, entry.model, entry.mode, r);
    } catch (err) {
      logger.warn({ err }, 'pg mirror write failed');
    }
  }

  private track(task: Promise<void>): void {
    this.pendingMirrors.add(task);
    void task.finally(() => this.pendingMirrors.delete(task));
  }

  /** Resolves once every mirror write started so far has settled. */
  async flush(): Promise<void> {
    await this.mirrorReady;
    await Promise.all([...this.pendingMirrors]);
  }

  /** Most recent cycles, oldest first. */
  recent(limit: number): JournalEntry[] {
    const cycles = this.db
      .prepare(`SELECT id, ts, model, mode, decision_json FROM cycles ORDER BY ts DESC, id DESC LIMIT ?`)
      .all(limit) as Array<{ id: number; ts: number; model: string; mode: string; decision_json: string }>;
    const selectResults = this.db.prepare(
      `SELECT symbol, side, status, requested_json, quantity, notional, filled_qty, order_id, reason, detail
       FROM order_results WHERE cycle_id = ? ORDER BY seq ASC`,
    );
    return cycles.reverse().map((c) => {
      const rows = selectResults.all(c.id) as Array<{
        symbol: string;
        side: OrderResult['side'];
        status: OrderResult['status'];
        requested_json: string | null;
        quantity: number | null;
        notional: number | null;
        filled_qty: number | null;
        order_id: string | null;
        reason: OrderResult['reason'] | null;
        detail: string | null;
      }>;
      const results: OrderResult[] = rows.map((row) => ({
        symbol: row.symbol,
        side: row.side,
        status: row.status,
        requested: parseJson<OrderResult['requested']>(row.requested_json, null),
        quantity: row.quantity,
        notional: row.notional,
        filledQuantity: row.filled_qty,
        orderId: row.order_id,
        ...(row.reason ? { reason: row.reason } : {}),
        ...(row.detail ? { detail: row.detail } : {}),
      }));
      const decision = parseJson<RawDecision>(c.decision_json, { kind: 'none', reason: 'unreadable journal entry' });
      return { ts: c.ts, model: c.model, mode: c.mode, decision, results };
    });
  }

  recentOrderResults(limit = 50): OrderResultRow[] {
    return this.db
      .prepare(
        `SELECT c.ts, c.model, c.mode, r.symbol, r.side, r.status, r.quantity, r.notional,
                r.filled_qty, r.order_id, r.reason, r.detail
         FROM order_results r JOIN cycles c ON c.id = r.cycle_id
         ORDER BY c.ts DESC, c.id DESC, r.seq ASC
         LIMIT ?`,
      )
      .all(limit) as OrderResultRow[];
  }

  close(): void {
    this.db.close();
  }
}
