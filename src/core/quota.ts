import { filterViolation, roundDownToStep } from './filters';
import type { AccountState, BoundedIntent, ExchangeFilter, QuotaLimits, ValidIntent } from './types';

export type QuotaVerdict =
  | { ok: true; intent: BoundedIntent }
  | { ok: false; reason: 'QUOTA_EXHAUSTED' | 'FILTER_REJECTED'; detail: string };

/**
 * Balance view for one cycle, opened once from the account snapshot.
 * Accepted buys reserve their notional so later buys cannot spend it again.
 */
export class QuotaLedger {
  private remaining: number;
  private readonly holdings: Readonly<Record<string, number>>;

  constructor(account: AccountState) {
    this.remaining = Math.max(0, account.quoteFree);
    this.holdings = account.holdings;
  }

  get remainingQuote(): number {
    return this.remaining;
  }

  heldQuantity(symbol: string): number {
    const qty = this.holdings[symbol] ?? 0;
    return Number.isFinite(qty) && qty > 0 ? qty : 0;
  }

  reserve(notional: number): void {
    this.remaining = Math.max(0, this.remaining - notional);
  }
}

function clampBuy(intent: ValidIntent, ledger: QuotaLedger, limits: QuotaLimits, filter: ExchangeFilter): QuotaVerdict {
  const heldNotional = ledger.heldQuantity(intent.symbol) * intent.price;
  const target = Math.min(
    intent.notional,
    limits.maxTradeQuote,
    limits.maxPositionQuotePerSymbol - heldNotional,
    ledger.remainingQuote,
  );
  if (!(target > 0)) {
    return {
      ok: false,
      reason: 'QUOTA_EXHAUSTED',
      detail: `no room: held ${heldNotional.toFixed(4)}, balance ${ledger.remainingQuote.toFixed(4)}`,
    };
  }

  let quantity = intent.quantity;
  if (target < intent.notional) {
    quantity = roundDownToStep(target / intent.price, filter.stepSize);
    const violation = filterViolation(quantity, intent.price, filter);
    if (violation) return { ok: false, reason: 'FILTER_REJECTED', detail: `after clamp: ${violation}` };
  }

  const notional = quantity * intent.price;
  ledger.reserve(notional);
  return { ok: true, intent: { ...intent, quantity, notional } };
}

function clampSell(intent: ValidIntent, ledger: QuotaLedger, filter: ExchangeFilter): QuotaVerdict {
  const held = ledger.heldQuantity(intent.symbol);
  if (held <= 0) return { ok: false, reason: 'QUOTA_EXHAUSTED', detail: 'nothing held to sell' };
  if (intent.quantity <= held) return { ok: true, intent };

  const quantity = roundDownToStep(held, filter.stepSize);
  const violation = filterViolation(quantity, intent.price, filter);
  if (violation) return { ok: false, reason: 'FILTER_REJECTED', detail: `after clamp: ${violation}` };
  return { ok: true, intent: { ...intent, quantity, notional: quantity * intent.price } };
}

export function clampToQuota(
  intent: ValidIntent,
  ledger: QuotaLedger,
  limits: QuotaLimits,
  filter: ExchangeFilter,
): QuotaVerdict {
  return intent.side === 'BUY' ? clampBuy(intent, ledger, limits, filter) : clampSell(intent, ledger, filter);
}
