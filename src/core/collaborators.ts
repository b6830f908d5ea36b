import type { AccountState, ExchangeFilter, MarketSnapshot, OrderResult, RawDecision, Side } from './types';

export interface MarketData {
  snapshot: MarketSnapshot;
  history: Record<string, number[]>; // closes, oldest first
}

export interface MarketDataSource {
  getSnapshot(symbols: readonly string[]): Promise<MarketData>;
}

export interface AccountSource {
  getAccountState(symbols: readonly string[]): Promise<AccountState>;
  getBalances(): Promise<Record<string, number>>;
}

export interface FilterSource {
  getFilters(symbols: readonly string[]): Promise<Record<string, ExchangeFilter>>;
}

export interface OrderRequest {
  symbol: string;
  side: Side;
  quantity: number;
  mode: 'TEST' | 'LIVE';
}

export interface OrderAck {
  filledQuantity: number;
  orderId: string | null;
}

/** Throws when the exchange refuses or the request cannot be delivered. */
export interface OrderGateway {
  submit(order: OrderRequest): Promise<OrderAck>;
}

export interface JournalEntry {
  ts: number;
  model: string;
  mode: string;
  decision: RawDecision;
  results: OrderResult[];
}

export interface CycleJournal {
  record(entry: JournalEntry): void;
  recent(limit: number): JournalEntry[];
}

export interface DecisionContext {
  prices: Record<string, number>;
  history: Record<string, number[]>;
  balances: Record<string, number>;
  quoteAsset: string;
  quoteFree: number;
  maxTradeQuote: number;
  maxPositionQuotePerSymbol: number;
  minConfidence: number;
  memory: JournalEntry[];
}

export interface DecisionModel {
  id: string;
  decide(context: DecisionContext): Promise<RawDecision>;
}
