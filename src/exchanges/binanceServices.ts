import pino from 'pino';
import { baseAsset } from '../core/symbols';
import { computeRsi, computeVolatility } from '../market/indicators';
import { BinanceSpotClient } from './binance';
import type { AppConfig } from '../config';
import type {
  AccountSource,
  FilterSource,
  MarketData,
  MarketDataSource,
  OrderGateway,
} from '../core/collaborators';
import type { AccountState, MarketSnapshot } from '../core/types';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

export interface ExchangeServices {
  market: MarketDataSource;
  account: AccountSource;
  filters: FilterSource;
  gateway: OrderGateway;
}

export function createBinanceClient(cfg: AppConfig): BinanceSpotClient {
  return new BinanceSpotClient({
    baseUrl: cfg.BINANCE_BASE_URL,
    apiKey: cfg.BINANCE_API_KEY,
    apiSecret: cfg.BINANCE_API_SECRET,
    timeoutMs: cfg.BINANCE_HTTP_TIMEOUT_MS,
    recvWindow: cfg.BINANCE_RECV_WINDOW,
    retryAttempts: cfg.BINANCE_RETRY_ATTEMPTS,
  });
}

export function buildSnapshot(
  prices: Record<string, number>,
  history: Record<string, number[]>,
  rsiPeriod: number,
): MarketSnapshot {
  const snapshot: MarketSnapshot = {};
  for (const [symbol, price] of Object.entries(prices)) {
    if (!(price > 0)) continue;
    const closes = history[symbol] ?? [];
    snapshot[symbol] = { price, rsi: computeRsi(closes, rsiPeriod), volatility: computeVolatility(closes) };
  }
  return snapshot;
}

export function toAccountState(
  balances: Record<string, number>,
  symbols: readonly string[],
  quoteAsset: string,
): AccountState {
  const holdings: Record<string, number> = {};
  for (const symbol of symbols) holdings[symbol] = balances[baseAsset(symbol, quoteAsset)] ?? 0;
  return { quoteAsset, quoteFree: balances[quoteAsset] ?? 0, holdings };
}

export function createBinanceServices(cfg: AppConfig, client = createBinanceClient(cfg)): ExchangeServices {
  const freeBalances = async (): Promise<Record<string, number>> => {
    const out: Record<string, number> = {};
    for (const b of await client.getBalances()) {
      if (b.free > 0) out[b.asset] = b.free;
    }
    return out;
  };

  const market: MarketDataSource = {
    async getSnapshot(symbols): Promise<MarketData> {
      const prices = await client.getPrices(symbols);
      const history: Record<string, number[]> = {};
      for (const symbol of Object.keys(prices)) {
        history[symbol] = await client.getCloses(symbol, cfg.HIST_INTERVAL, cfg.HIST_LIMIT).catch((err: unknown) => {
          logger.warn({ err, symbol }, 'kline fetch failed; indicators unavailable');
          return [];
        });
      }
      return { snapshot: buildSnapshot(prices, history, cfg.RSI_PERIOD), history };
    },
  };

  return {
    market,
    account: {
      getBalances: freeBalances,
      async getAccountState(symbols) {
        return toAccountState(await freeBalances(), symbols, cfg.QUOTE_ASSET);
      },
    },
    filters: {
      getFilters: (symbols) => client.getSymbolFilters(symbols),
    },
    gateway: {
      async submit(order) {
        const placed = await client.placeMarketOrder({
          symbol: order.symbol,
          side: order.side,
          quantity: order.quantity,
          test: order.mode === 'TEST',
        });
        return { filledQuantity: placed.executedQty, orderId: placed.orderId };
      },
    },
  };
}
