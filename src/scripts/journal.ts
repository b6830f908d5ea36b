import 'dotenv/config';
import { loadConfig } from '../config';
import { SqliteJournal } from '../db';

function main(): void {
  const cfg = loadConfig();
  const journal = new SqliteJournal(cfg.DB_PATH);
  const limit = Number(process.argv.find((v) => v.startsWith('--limit='))?.slice('--limit='.length) ?? 30);
  const rows = journal.recentOrderResults(limit);
  journal.close();
  if (!rows.length) {
    console.log('No order results yet. Run a tick first.');
    return;
  }
  console.table(
    rows.map((r) => ({
      TS: new Date(r.ts).toISOString(),
      Mode: r.mode,
      Symbol: r.symbol,
      Side: r.side,
      Qty: r.quantity ?? '-',
      Notional: r.notional !== null ? r.notional.toFixed(2) : '-',
      Status: r.status,
      Detail: r.detail ?? '',
    })),
  );
}

main();
