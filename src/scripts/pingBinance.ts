import 'dotenv/config';
import pino from 'pino';
import { loadConfig } from '../config';
import { createBinanceClient, createBinanceServices } from '../exchanges/binanceServices';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

async function main(): Promise<void> {
  const cfg = loadConfig();
  const client = createBinanceClient(cfg);
  await client.ping();
  const offsetMs = await client.syncTime();
  const prices = await client.getPrices(cfg.symbolList);
  logger.info({ baseUrl: cfg.BINANCE_BASE_URL, offsetMs, prices }, 'binance reachable');

  if (!cfg.BINANCE_API_KEY || !cfg.BINANCE_API_SECRET) {
    logger.warn('No Binance keys in env; skipping account check');
    return;
  }
  const balances = await createBinanceServices(cfg, client).account.getBalances();
  logger.info({ balances }, 'binance account reachable');
}

main().catch((err) => {
  logger.error({ err }, 'binance ping failed');
  process.exit(1);
});
