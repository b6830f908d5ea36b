import { resolveSymbol } from './symbols';
import { skipped } from './types';
import type { Intent, IntentSize, OrderResult, RawDecision, Side, SingleForm } from './types';

export interface SanitizeContext {
  validSymbols: ReadonlySet<string>;
  tradingSymbols: ReadonlySet<string>;
  quoteAsset: string;
  /** Notional a single-form BUY asks for; the quota clamp bounds it further. */
  singleBuyNotional: number;
  heldQuantity: (symbol: string) => number;
}

export interface SanitizeResult {
  intents: Intent[];
  rejected: OrderResult[];
}

type Candidate = { symbol: string; side: Side; size: IntentSize };

export function toPositiveNumber(value: unknown): number | null {
  let n: number;
  if (typeof value === 'number') n = value;
  else if (typeof value === 'string' && value.trim() !== '') n = Number(value);
  else return null;
  return Number.isFinite(n) && n > 0 ? n : null;
}

function asRecord(v: unknown): Record<string, unknown> | null {
  if (!v || typeof v !== 'object' || Array.isArray(v)) return null;
  return v as Record<string, unknown>;
}

function readSize(entry: Record<string, unknown>, side: Side): IntentSize | null {
  const notional = toPositiveNumber(entry.quote_usdt ?? entry.quoteUsdt ?? entry.amount);
  const quantity = toPositiveNumber(entry.quantity ?? entry.qty);
  if (side === 'BUY') {
    if (notional !== null) return { kind: 'notional', value: notional };
    if (quantity !== null) return { kind: 'quantity', value: quantity };
  } else {
    if (quantity !== null) return { kind: 'quantity', value: quantity };
    if (notional !== null) return { kind: 'notional', value: notional };
  }
  return null;
}

function cleanSide(
  entries: unknown[],
  side: Side,
  ctx: SanitizeContext,
  rejected: OrderResult[],
): Candidate[] {
  const out: Candidate[] = [];
  const seen = new Set<string>();
  for (const raw of entries) {
    const entry = asRecord(raw);
    if (!entry) continue;
    const symbol = resolveSymbol(entry.symbol, ctx.quoteAsset);
    if (!symbol) continue;
    const size = readSize(entry, side);
    if (!ctx.validSymbols.has(symbol) || !ctx.tradingSymbols.has(symbol)) {
      rejected.push(skipped(symbol, side, size, 'INPUT_MALFORMED', 'symbol not tradable'));
      continue;
    }
    if (!size) {
      rejected.push(skipped(symbol, side, null, 'INPUT_MALFORMED', 'invalid size'));
      continue;
    }
    if (seen.has(symbol)) {
      rejected.push(skipped(symbol, side, size, 'INPUT_MALFORMED', 'duplicate entry'));
      continue;
    }
    seen.add(symbol);
    out.push({ symbol, side, size });
  }
  return out;
}

function sanitizeCombo(
  buys: unknown[],
  sells: unknown[],
  confidence: number | null,
  ctx: SanitizeContext,
): SanitizeResult {
  const rejected: OrderResult[] = [];
  const cleanBuys = cleanSide(buys, 'BUY', ctx, rejected);
  const cleanSells = cleanSide(sells, 'SELL', ctx, rejected);

  const sellSymbols = new Set(cleanSells.map((c) => c.symbol));
  const conflict = new Set(cleanBuys.filter((c) => sellSymbols.has(c.symbol)).map((c) => c.symbol));

  const intents: Intent[] = [];
  for (const c of [...cleanBuys, ...cleanSells]) {
    if (conflict.has(c.symbol)) {
      rejected.push(skipped(c.symbol, c.side, c.size, 'INPUT_MALFORMED', 'conflicting BUY and SELL'));
      continue;
    }
    intents.push({ ...c, confidence });
  }
  return { intents, rejected };
}

function sanitizeSingle(single: SingleForm, ctx: SanitizeContext): SanitizeResult {
  const symbol = resolveSymbol(single.symbol, ctx.quoteAsset);
  if (!symbol || !ctx.validSymbols.has(symbol)) return { intents: [], rejected: [] };

  const action = single.action.trim().toUpperCase();
  if (action === 'BUY') {
    const size: IntentSize = { kind: 'notional', value: ctx.singleBuyNotional };
    return { intents: [{ symbol, side: 'BUY', size, confidence: single.confidence }], rejected: [] };
  }
  if (action === 'SELL') {
    const held = ctx.heldQuantity(symbol);
    if (!(held > 0)) {
      return { intents: [], rejected: [skipped(symbol, 'SELL', null, 'INPUT_MALFORMED', 'nothing held to sell')] };
    }
    const size: IntentSize = { kind: 'quantity', value: held };
    return { intents: [{ symbol, side: 'SELL', size, confidence: single.confidence }], rejected: [] };
  }
  // anything else reads as HOLD
  return { intents: [], rejected: [] };
}

/**
 * Turns untrusted model output into at most one intent per (symbol, side),
 * never both sides for one symbol. Only a combo written with no entries at
 * all falls back to the single form carried in the same response; a combo
 * whose entries were all dropped yields nothing.
 */
export function sanitizeDecision(decision: RawDecision, ctx: SanitizeContext): SanitizeResult {
  switch (decision.kind) {
    case 'none':
      return { intents: [], rejected: [] };
    case 'single':
      return sanitizeSingle(decision, ctx);
    case 'combo': {
      const writtenEmpty = decision.buys.length === 0 && decision.sells.length === 0;
      if (writtenEmpty && decision.fallback) return sanitizeSingle(decision.fallback, ctx);
      return sanitizeCombo(decision.buys, decision.sells, decision.confidence, ctx);
    }
  }
}
