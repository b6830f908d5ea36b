import 'dotenv/config';
import pino from 'pino';
import { loadConfig } from './config';
import { SqliteJournal } from './db';
import { createStatusServer } from './status';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

const cfg = loadConfig();
const server = createStatusServer(new SqliteJournal(cfg.DB_PATH));
server.listen(cfg.PORT, () => {
  logger.info({ port: cfg.PORT }, 'status server listening');
});
