import { afterEach, describe, expect, it, vi } from 'vitest';
import { SqliteJournal } from './db';
import { ensureSchema, pgInsertCycle, pgInsertOrderResult } from './pg';
import type { JournalEntry } from './core/collaborators';

vi.mock('./pg', () => ({
  initPg: vi.fn(() => true),
  ensureSchema: vi.fn(async () => undefined),
  pgInsertCycle: vi.fn(async () => undefined),
  pgInsertOrderResult: vi.fn(async () => undefined),
}));

function entry(ts: number, symbol: string): JournalEntry {
  return {
    ts,
    model: 'mock',
    mode: 'MONITOR',
    decision: { kind: 'combo', buys: [{ symbol, quote_usdt: 10 }], sells: [], confidence: 0.8, rationale: '', fallback: null },
    results: [
      {
        symbol,
        side: 'BUY',
        requested: { kind: 'notional', value: 10 },
        quantity: 0.1,
        notional: 10,
        filledQuantity: 0.1,
        orderId: null,
        status: 'SIMULATED',
      },
      {
        symbol: 'DOGEUSDT',
        side: 'SELL',
        requested: null,
        quantity: null,
        notional: null,
        filledQuantity: null,
        orderId: null,
        status: 'SKIPPED',
        reason: 'INPUT_MALFORMED',
        detail: 'symbol not tradable',
      },
    ],
  };
}

describe('SqliteJournal', () => {
  let journal: SqliteJournal;

  afterEach(() => journal.close());

  it('round-trips entries and returns the latest ones oldest first', () => {
    journal = new SqliteJournal(':memory:');
    journal.record(entry(1000, 'BTCUSDT'));
    journal.record(entry(2000, 'ETHUSDT'));
    journal.record(entry(3000, 'SOLUSDT'));

    const recent = journal.recent(2);
    expect(recent.map((e) => e.ts)).toEqual([2000, 3000]);
    expect(recent[1]).toEqual(entry(3000, 'SOLUSDT'));
  });

  it('lists order results newest cycle first', () => {
    journal = new SqliteJournal(':memory:');
    journal.record(entry(1000, 'BTCUSDT'));
    journal.record(entry(2000, 'ETHUSDT'));

    const rows = journal.recentOrderResults(3);
    expect(rows.map((r) => [r.ts, r.symbol, r.status])).toEqual([
      [2000, 'ETHUSDT', 'SIMULATED'],
      [2000, 'DOGEUSDT', 'SKIPPED'],
      [1000, 'BTCUSDT', 'SIMULATED'],
    ]);
    expect(rows[1]).toMatchObject({ reason: 'INPUT_MALFORMED', detail: 'symbol not tradable', quantity: null });
  });

  it('starts empty', () => {
    journal = new SqliteJournal(':memory:');
    expect(journal.recent(5)).toEqual([]);
    expect(journal.recentOrderResults()).toEqual([]);
  });
});

describe('SqliteJournal postgres mirror', () => {
  let journal: SqliteJournal;

  afterEach(() => {
    journal.close();
    vi.clearAllMocks();
  });

  it('waits for the schema and every order result before flush resolves', async () => {
    const calls: string[] = [];
    let schemaDone: () => void = () => undefined;
    vi.mocked(ensureSchema).mockImplementationOnce(
      () =>
        new Promise<void>((resolve) => {
          schemaDone = () => {
            calls.push('schema');
            resolve();
          };
        }),
    );
    vi.mocked(pgInsertCycle).mockImplementation(async (ts) => {
      calls.push(`cycle ${ts}`);
    });
    vi.mocked(pgInsertOrderResult).mockImplementation(async (ts, _model, _mode, r) => {
      calls.push(`order ${ts} ${r.symbol}`);
    });

    journal = new SqliteJournal(':memory:', 'postgres://localhost/test');
    journal.record(entry(1000, 'BTCUSDT'));
    await new Promise((resolve) => setImmediate(resolve));
    expect(calls).toEqual([]);

    const flushing = journal.flush();
    schemaDone();
    await flushing;
    expect(calls).toEqual(['schema', 'cycle 1000', 'order 1000 BTCUSDT', 'order 1000 DOGEUSDT']);
  });

  it('settles flush when a mirror write fails', async () => {
    vi.mocked(pgInsertCycle).mockRejectedValueOnce(new Error('connection refused'));

    journal = new SqliteJournal(':memory:', 'postgres://localhost/test');
    journal.record(entry(1000, 'BTCUSDT'));
    await journal.flush();

    expect(pgInsertOrderResult).not.toHaveBeenCalled();
    expect(journal.recent(1)).toHaveLength(1);
  });

  it('has nothing to flush without a connection url', async () => {
    journal = new SqliteJournal(':memory:');
    journal.record(entry(1000, 'BTCUSDT'));
    await journal.flush();
    expect(pgInsertCycle).not.toHaveBeenCalled();
  });
});
