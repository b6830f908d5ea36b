import 'dotenv/config';
import pino from 'pino';
import { Orchestrator } from './orchestrator';
import { loadConfig } from './config';
import { loadDecisionModel } from './modelLoader';
import { SqliteJournal } from './db';
import { closePg } from './pg';
import { createBinanceServices } from './exchanges/binanceServices';
import { createStatusServer } from './status';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

async function main(): Promise<void> {
  const cfg = loadConfig();
  logger.info({ mode: cfg.executionMode, model: cfg.DECISION_MODEL, symbols: cfg.symbolList }, 'spot-sentinel starting');
  if (cfg.executionMode === 'LIVE') logger.warn('LIVE mode: orders will be placed on the exchange');

  const journal = new SqliteJournal(cfg.DB_PATH, cfg.DATABASE_URL);
  const orch = new Orchestrator(loadDecisionModel(cfg), { ...createBinanceServices(cfg), journal }, cfg);

  if (!cfg.autoRun) {
    const report = await orch.tick();
    logger.info({ report }, 'single cycle completed');
    await journal.flush();
    journal.close();
    await closePg();
    return;
  }

  const server = createStatusServer(journal);
  server.listen(cfg.PORT, () => logger.info({ port: cfg.PORT }, 'status server listening'));
  orch.start();

  let stopping: Promise<void> | null = null;
  const shutdown = async (): Promise<void> => {
    logger.info('shutting down');
    server.close();
    // a cycle already submitting orders runs to completion
    await orch.stop();
    await journal.flush();
    journal.close();
    await closePg();
  };
  const onSignal = (): void => {
    if (stopping) return;
    stopping = shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'shutdown failed');
        process.exit(1);
      });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  logger.error({ err }, 'fatal error');
  process.exit(1);
});
