import type { ExchangeFilter, Intent, ValidIntent } from './types';

export type FilterVerdict =
  | { ok: true; intent: ValidIntent; filter: ExchangeFilter }
  | { ok: false; detail: string };

export function stepDecimals(stepSize: number): number {
  const s = stepSize.toString();
  const exp = /e-(\d+)$/.exec(s);
  if (exp) {
    const frac = s.split('e')[0].split('.')[1] ?? '';
    return Number(exp[1]) + frac.length;
  }
  return s.split('.')[1]?.length ?? 0;
}

/** Floors to a whole number of steps; never rounds up. stepSize <= 0 disables rounding. */
export function roundDownToStep(quantity: number, stepSize: number): number {
  if (!(quantity > 0)) return 0;
  if (!(stepSize > 0)) return quantity;
  const decimals = stepDecimals(stepSize);
  // 1e-9 absorbs binary noise such as 0.3 / 0.1 = 2.9999999999999996
  let steps = Math.floor(quantity / stepSize + 1e-9);
  let rounded = Number((steps * stepSize).toFixed(decimals));
  // the nudge must never carry the result past the input
  while (steps > 0 && rounded > quantity) {
    steps -= 1;
    rounded = Number((steps * stepSize).toFixed(decimals));
  }
  return rounded;
}

export function filterViolation(quantity: number, price: number, filter: ExchangeFilter): string | null {
  if (!(quantity > 0)) return 'quantity rounds to zero';
  if (quantity < filter.minQty) return `quantity ${quantity} < minQty ${filter.minQty}`;
  const notional = quantity * price;
  if (notional < filter.minNotional) {
    return `notional ${notional.toFixed(4)} < minNotional ${filter.minNotional}`;
  }
  return null;
}

export function applyExchangeFilter(
  intent: Intent,
  price: number,
  filter: ExchangeFilter | undefined,
): FilterVerdict {
  if (!filter) return { ok: false, detail: 'no exchange filter for symbol' };
  if (!(price > 0)) return { ok: false, detail: 'no price' };

  const rawQty = intent.size.kind === 'notional' ? intent.size.value / price : intent.size.value;
  const quantity = roundDownToStep(rawQty, filter.stepSize);
  const violation = filterViolation(quantity, price, filter);
  if (violation) return { ok: false, detail: violation };

  return { ok: true, intent: { ...intent, price, quantity, notional: quantity * price }, filter };
}
