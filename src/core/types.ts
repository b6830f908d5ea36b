export type Side = 'BUY' | 'SELL';

export type ExecutionMode = 'MONITOR' | 'TEST' | 'LIVE';

export type OrderStatus = 'SKIPPED' | 'SIMULATED' | 'SUBMITTED' | 'FAILED';

export type FailureReason =
  | 'INPUT_MALFORMED'
  | 'GATE_REJECTED'
  | 'FILTER_REJECTED'
  | 'QUOTA_EXHAUSTED'
  | 'SUBMIT_FAILED';

export interface MarketEntry {
  price: number;
  rsi: number | null;
  volatility: number | null;
}

export type MarketSnapshot = Record<string, MarketEntry>;

export interface AccountState {
  quoteAsset: string;
  quoteFree: number;
  holdings: Record<string, number>; // free base quantity per symbol
}

export interface ExchangeFilter {
  minNotional: number;
  minQty: number;
  stepSize: number;
}

export type IntentSize = { kind: 'notional'; value: number } | { kind: 'quantity'; value: number };

export interface Intent {
  symbol: string;
  side: Side;
  size: IntentSize;
  confidence: number | null;
}

/** Intent after exchange filters: price and step-rounded quantity attached. */
export interface ValidIntent extends Intent {
  price: number;
  quantity: number;
  notional: number;
}

export type BoundedIntent = ValidIntent;

export type CooldownState = ReadonlyMap<string, number>;

export interface SingleForm {
  symbol: string | null;
  action: string;
  confidence: number | null;
  rationale: string;
}

/** Model output before any validation. Entry fields are untrusted. */
export type RawDecision =
  | {
      kind: 'combo';
      buys: unknown[];
      sells: unknown[];
      confidence: number | null;
      rationale: string;
      fallback: SingleForm | null;
    }
  | ({ kind: 'single' } & SingleForm)
  | { kind: 'none'; reason: string };

export interface OrderResult {
  symbol: string;
  side: Side;
  requested: IntentSize | null;
  quantity: number | null;
  notional: number | null;
  filledQuantity: number | null;
  orderId: string | null;
  status: OrderStatus;
  reason?: FailureReason;
  detail?: string;
}

export interface RiskThresholds {
  rsiBuyMax: number;
  rsiSellMin: number;
  maxVolatility: number;
  cooldownSec: number;
  minConfidenceBuy: number;
  minConfidenceSell: number;
}

export interface QuotaLimits {
  maxTradeQuote: number;
  maxPositionQuotePerSymbol: number;
}

export interface CycleConfig extends RiskThresholds, QuotaLimits {
  mode: ExecutionMode;
  quoteAsset: string;
  tradingSymbols: readonly string[];
}

export function skipped(
  symbol: string,
  side: Side,
  requested: IntentSize | null,
  reason: FailureReason,
  detail: string,
): OrderResult {
  return {
    symbol,
    side,
    requested,
    quantity: null,
    notional: null,
    filledQuantity: null,
    orderId: null,
    status: 'SKIPPED',
    reason,
    detail,
  };
}
