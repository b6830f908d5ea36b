import 'dotenv/config';
import pino from 'pino';
import { Orchestrator } from '../orchestrator';
import { loadConfig } from '../config';
import { loadDecisionModel } from '../modelLoader';
import { SqliteJournal } from '../db';
import { closePg } from '../pg';
import { createBinanceServices } from '../exchanges/binanceServices';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

function getArg(name: string, fallback?: string): string | undefined {
  const p = process.argv.find((v) => v.startsWith(name + '='));
  return p ? p.slice(name.length + 1) : fallback;
}

async function main(): Promise<void> {
  const count = Number(getArg('--count', '2'));
  const delayMs = Number(getArg('--delay', '10000'));
  const cfg = loadConfig();
  const journal = new SqliteJournal(cfg.DB_PATH, cfg.DATABASE_URL);
  const orch = new Orchestrator(loadDecisionModel(cfg), { ...createBinanceServices(cfg), journal }, cfg);

  for (let i = 0; i < count; i++) {
    logger.info({ tick: i + 1, of: count }, 'running tick');
    const report = await orch.tick();
    if (report.skipped) logger.warn({ reason: report.reason }, 'tick skipped');
    else logger.info({ results: report.results.map((r) => `${r.side} ${r.symbol} ${r.status}`) }, 'tick done');
    if (i < count - 1) {
      await new Promise((r) => setTimeout(r, delayMs));
    }
  }
  await journal.flush();
  journal.close();
  await closePg();
  logger.info('runNTicks completed');
}

main().catch((err) => {
  logger.error({ err }, 'runNTicks failed');
  process.exit(1);
});
