import { z } from 'zod';
import { resolveSymbolList } from './core/symbols';
import type { CycleConfig, ExecutionMode } from './core/types';

const flag = z.string().optional();

const configSchema = z.object({
  SYMBOLS: z.string().min(1).default('BTC,ETH,BNB,SOL,XRP'),
  QUOTE_ASSET: z.string().min(1).default('USDT'),
  EXECUTION_MODE: z.enum(['monitor', 'test', 'live']).default('monitor'),
  DECISION_MODEL: z.enum(['deepseek', 'qwen', 'mock']).default('deepseek'),
  DEEPSEEK_API_KEY: z.string().optional(),
  DEEPSEEK_MODEL: z.string().default('deepseek-chat'),
  DEEPSEEK_BASE_URL: z.string().url().default('https://api.deepseek.com'),
  DASHSCOPE_API_KEY: z.string().optional(),
  QWEN_MODEL: z.string().default('qwen-max'),
  QWEN_BASE_URL: z.string().url().default('https://dashscope.aliyuncs.com/compatible-mode/v1'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  LLM_TOP_P: z.coerce.number().gt(0).max(1).default(0.9),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(400),
  LLM_MIN_CONF: z.coerce.number().min(0).max(1).default(0.65),
  BINANCE_API_KEY: z.string().default(''),
  BINANCE_API_SECRET: z.string().default(''),
  BINANCE_BASE_URL: z.string().url().default('https://api.binance.com'),
  BINANCE_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  BINANCE_RECV_WINDOW: z.coerce
    .number()
    .int()
    .positive()
    .default(60000)
    .transform((v) => Math.min(v, 60000)),
  BINANCE_RETRY_ATTEMPTS: z.coerce.number().int().positive().default(2),
  RSI_BUY_MAX: z.coerce.number().min(0).max(100).default(65),
  RSI_SELL_MIN: z.coerce.number().min(0).max(100).default(35),
  RSI_PERIOD: z.coerce.number().int().positive().default(14),
  MAX_VOLATILITY: z.coerce.number().nonnegative().default(0.12),
  TRADE_COOLDOWN_SEC: z.coerce.number().int().nonnegative().default(300),
  MIN_CONFIDENCE_BUY: z.coerce.number().min(0).max(1).default(0.65),
  MIN_CONFIDENCE_SELL: z.coerce.number().min(0).max(1).default(0.65),
  MAX_TRADE_USDT: z.coerce.number().positive().default(20),
  MAX_POSITION_USDT_PER_SYMBOL: z.coerce.number().positive().default(50),
  HIST_INTERVAL: z.enum(['1m', '3m', '5m', '15m', '30m', '1h', '4h', '1d']).default('3m'),
  HIST_LIMIT: z.coerce.number().int().min(2).max(1000).default(20),
  AUTO_RUN: flag,
  AUTO_RUN_INTERVAL_SEC: z.coerce.number().int().positive().default(60),
  ENABLE_MEMORY: flag,
  MEMORY_MAX_ITEMS: z.coerce.number().int().positive().default(10),
  DB_PATH: z.string().default('data/sentinel.sqlite'),
  DATABASE_URL: z.string().optional(),
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.string().default('info'),
});

export type AppConfig = z.infer<typeof configSchema> & {
  symbolList: string[];
  executionMode: ExecutionMode;
  autoRun: boolean;
  enableMemory: boolean;
};

const truthy = (v: string | undefined) => ['1', 'true', 'yes'].includes((v ?? '').trim().toLowerCase());

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.toString()}`);
  }
  const cfg = parsed.data;
  const quote = cfg.QUOTE_ASSET.trim().toUpperCase();
  const symbolList = resolveSymbolList(cfg.SYMBOLS, quote);
  if (!symbolList.length) {
    throw new Error('Invalid configuration: SYMBOLS resolves to no trading pair');
  }
  return {
    ...cfg,
    QUOTE_ASSET: quote,
    symbolList,
    executionMode: cfg.EXECUTION_MODE === 'live' ? 'LIVE' : cfg.EXECUTION_MODE === 'test' ? 'TEST' : 'MONITOR',
    autoRun: truthy(cfg.AUTO_RUN),
    enableMemory: truthy(cfg.ENABLE_MEMORY),
  };
}

export function toCycleConfig(cfg: AppConfig): CycleConfig {
  return {
    mode: cfg.executionMode,
    quoteAsset: cfg.QUOTE_ASSET,
    tradingSymbols: cfg.symbolList,
    rsiBuyMax: cfg.RSI_BUY_MAX,
    rsiSellMin: cfg.RSI_SELL_MIN,
    maxVolatility: cfg.MAX_VOLATILITY,
    cooldownSec: cfg.TRADE_COOLDOWN_SEC,
    minConfidenceBuy: cfg.MIN_CONFIDENCE_BUY,
    minConfidenceSell: cfg.MIN_CONFIDENCE_SELL,
    maxTradeQuote: cfg.MAX_TRADE_USDT,
    maxPositionQuotePerSymbol: cfg.MAX_POSITION_USDT_PER_SYMBOL,
  };
}
