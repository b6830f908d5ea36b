import 'dotenv/config';
import pino from 'pino';
import { Orchestrator } from '../orchestrator';
import { loadConfig } from '../config';
import { loadDecisionModel } from '../modelLoader';
import { SqliteJournal } from '../db';
import { closePg } from '../pg';
import { createBinanceServices } from '../exchanges/binanceServices';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

async function main(): Promise<void> {
  const cfg = loadConfig();
  const journal = new SqliteJournal(cfg.DB_PATH, cfg.DATABASE_URL);
  const orch = new Orchestrator(loadDecisionModel(cfg), { ...createBinanceServices(cfg), journal }, cfg);
  const report = await orch.tick();
  logger.info({ report }, 'one tick completed');
  await journal.flush();
  journal.close();
  await closePg();
}

main().catch((err) => {
  logger.error({ err }, 'oneTick failed');
  process.exit(1);
});
