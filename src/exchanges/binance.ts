import crypto from 'node:crypto';
import axios from 'axios';
import type { AxiosInstance, Method } from 'axios';
import pino from 'pino';
import type { ExchangeFilter, Side } from '../core/types';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

export const DEFAULT_MIN_NOTIONAL = 5;

export interface BinanceOptions {
  baseUrl: string;
  apiKey: string;
  apiSecret: string;
  timeoutMs: number;
  recvWindow: number;
  retryAttempts: number;
}

export class BinanceApiError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    readonly code: number | null,
  ) {
    super(message);
    this.name = 'BinanceApiError';
  }

  get isTimestampError(): boolean {
    return this.code === -1021 || /ahead of the server|outside of the recvWindow/i.test(this.message);
  }

  get isNetworkError(): boolean {
    return this.status === null;
  }
}

export interface BinanceBalance {
  asset: string;
  free: number;
  locked: number;
}

export interface PlaceOrderParams {
  symbol: string;
  side: Side;
  quantity: number;
  test: boolean;
}

export interface PlacedOrder {
  orderId: string | null;
  executedQty: number;
  status: string;
}

type RawFilter = Record<string, unknown>;

function toNumber(v: unknown, fallback = 0): number {
  const n = typeof v === 'string' || typeof v === 'number' ? Number(v) : NaN;
  return Number.isFinite(n) ? n : fallback;
}

/** LOT_SIZE gives stepSize/minQty; NOTIONAL (or legacy MIN_NOTIONAL) gives minNotional. */
export function parseSymbolFilters(filters: readonly RawFilter[]): ExchangeFilter {
  const out: ExchangeFilter = { minNotional: DEFAULT_MIN_NOTIONAL, minQty: 0, stepSize: 0 };
  for (const f of filters) {
    const type = f.filterType;
    if (type === 'LOT_SIZE') {
      out.stepSize = toNumber(f.stepSize);
      out.minQty = toNumber(f.minQty);
    } else if (type === 'MIN_NOTIONAL' || type === 'NOTIONAL') {
      out.minNotional = toNumber(f.minNotional, DEFAULT_MIN_NOTIONAL);
    }
  }
  return out;
}

/** Plain decimal string for the order API, which rejects exponent notation. */
export function formatQuantity(quantity: number): string {
  return quantity.toFixed(8).replace(/\.?0+$/, '');
}

function toApiError(err: unknown): BinanceApiError {
  if (err instanceof BinanceApiError) return err;
  if (axios.isAxiosError(err)) {
    const data: unknown = err.response?.data;
    const body: object = data !== null && typeof data === 'object' ? data : {};
    const code = 'code' in body && typeof body.code === 'number' ? body.code : null;
    const msg = 'msg' in body && typeof body.msg === 'string' ? body.msg : err.message;
    return new BinanceApiError(msg, err.response?.status ?? null, code);
  }
  return new BinanceApiError(err instanceof Error ? err.message : String(err), null, null);
}

export class BinanceSpotClient {
  private readonly http: AxiosInstance;
  private timeOffsetMs = 0;

  constructor(private readonly opts: BinanceOptions) {
    this.http = axios.create({
      baseURL: opts.baseUrl.replace(/\/+$/, ''),
      headers: opts.apiKey ? { 'X-MBX-APIKEY': opts.apiKey } : {},
      timeout: opts.timeoutMs,
    });
  }

  async ping(): Promise<void> {
    await this.publicGet('/api/v3/ping');
  }

  async syncTime(): Promise<number> {
    const data = await this.publicGet<{ serverTime: number }>('/api/v3/time');
    this.timeOffsetMs = Number(data.serverTime) - Date.now();
    logger.debug({ offsetMs: this.timeOffsetMs }, 'binance time offset');
    return this.timeOffsetMs;
  }

  async getPrices(symbols: readonly string[]): Promise<Record<string, number>> {
    const rows = await this.publicGet<Array<{ symbol: string; price: string }>>('/api/v3/ticker/price');
    const wanted = new Set(symbols);
    const out: Record<string, number> = {};
    for (const row of rows) {
      if (!wanted.has(row.symbol)) continue;
      const price = Number(row.price);
      if (Number.isFinite(price) && price > 0) out[row.symbol] = price;
    }
    return out;
  }

  /** Close prices, oldest first. Kline row index 4 is the close. */
  async getCloses(symbol: string, interval: string, limit: number): Promise<number[]> {
    const rows = await this.publicGet<unknown[][]>('/api/v3/klines', { symbol, interval, limit });
    return rows.map((k) => Number(k[4])).filter((c) => Number.isFinite(c));
  }

  async getSymbolFilters(symbols: readonly string[]): Promise<Record<string, ExchangeFilter>> {
    if (!symbols.length) return {};
    const data = await this.publicGet<{ symbols?: Array<{ symbol: string; filters?: RawFilter[] }> }>(
      '/api/v3/exchangeInfo',
      { symbols: JSON.stringify(symbols) },
    );
    const out: Record<string, ExchangeFilter> = {};
    for (const s of data.symbols ?? []) out[s.symbol] = parseSymbolFilters(s.filters ?? []);
    return out;
  }

  async getBalances(): Promise<BinanceBalance[]> {
    const data = await this.signed<{ balances?: Array<{ asset: string; free: string; locked: string }> }>(
      'GET',
      '/api/v3/account',
      {},
    );
    return (data.balances ?? []).map((b) => ({ asset: b.asset, free: toNumber(b.free), locked: toNumber(b.locked) }));
  }

  async placeMarketOrder(params: PlaceOrderParams): Promise<PlacedOrder> {
    const query = {
      symbol: params.symbol,
      side: params.side,
      type: 'MARKET',
      quantity: formatQuantity(params.quantity),
      newOrderRespType: 'RESULT',
    };
    if (params.test) {
      await this.signed('POST', '/api/v3/order/test', query);
      return { orderId: null, executedQty: params.quantity, status: 'TEST' };
    }
    const order = await this.signed<{ orderId?: number; executedQty?: string; status?: string }>(
      'POST',
      '/api/v3/order',
      query,
    );
    return {
      orderId: order.orderId !== undefined ? String(order.orderId) : null,
      executedQty: toNumber(order.executedQty),
      status: order.status ?? 'UNKNOWN',
    };
  }

  private async publicGet<T>(path: string, params?: Record<string, string | number>): Promise<T> {
    try {
      const res = await this.http.get<T>(path, { params });
      return res.data;
    } catch (err) {
      throw toApiError(err);
    }
  }

  private sign(query: string): string {
    if (!this.opts.apiSecret) {
      throw new BinanceApiError('Missing Binance API secret for signed request', null, null);
    }
    return crypto.createHmac('sha256', this.opts.apiSecret).update(query).digest('hex');
  }

  private async signed<T>(method: Method, path: string, params: Record<string, string>): Promise<T> {
    const attempts = Math.max(1, this.opts.retryAttempts);
    let lastError: BinanceApiError | null = null;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      const query = new URLSearchParams(params);
      query.set('recvWindow', String(this.opts.recvWindow));
      query.set('timestamp', String(Date.now() + this.timeOffsetMs));
      query.set('signature', this.sign(query.toString()));
      try {
        const res = await this.http.request<T>({ method, url: `${path}?${query.toString()}` });
        return res.data;
      } catch (err) {
        const apiErr = toApiError(err);
        lastError = apiErr;
        if (apiErr.isTimestampError) {
          logger.warn({ path, attempt, code: apiErr.code }, 'timestamp rejected, resyncing server time');
          await this.syncTime().catch((syncErr: unknown) => {
            logger.warn({ err: syncErr }, 'time resync failed');
          });
          continue;
        }
        if (apiErr.isNetworkError) {
          logger.warn({ path, attempt, err: apiErr.message }, 'network error, retrying');
          continue;
        }
        throw apiErr;
      }
    }
    throw lastError ?? new BinanceApiError('retry attempts exhausted', null, null);
  }
}
