import { describe, expect, it } from 'vitest';
import { applyExchangeFilter, roundDownToStep, stepDecimals } from './filters';
import type { ExchangeFilter, Intent } from './types';

const btcFilter: ExchangeFilter = { minNotional: 5, minQty: 0.00001, stepSize: 0.00001 };
const buy = (value: number): Intent => ({
  symbol: 'BTCUSDT',
  side: 'BUY',
  size: { kind: 'notional', value },
  confidence: 0.8,
});

describe('stepDecimals', () => {
  it('counts decimals in plain and exponent notation', () => {
    expect(stepDecimals(1)).toBe(0);
    expect(stepDecimals(0.001)).toBe(3);
    expect(stepDecimals(0.00001)).toBe(5);
    expect(stepDecimals(1e-8)).toBe(8);
  });
});

describe('roundDownToStep', () => {
  it('floors to the step', () => {
    expect(roundDownToStep(0.123456, 0.001)).toBe(0.123);
    expect(roundDownToStep(1.99, 1)).toBe(1);
  });

  it('does not lose a step to floating point noise', () => {
    expect(roundDownToStep(0.3, 0.1)).toBe(0.3);
  });

  it('never rounds a quantity just under a step boundary up', () => {
    const quantity = 0.0029999999995;
    expect(roundDownToStep(quantity, 0.001)).toBe(0.002);
    expect(roundDownToStep(quantity, 0.001)).toBeLessThanOrEqual(quantity);
  });

  it('returns zero for non-positive quantities and passes through without a step', () => {
    expect(roundDownToStep(-1, 0.1)).toBe(0);
    expect(roundDownToStep(0, 0.1)).toBe(0);
    expect(roundDownToStep(5, 0)).toBe(5);
  });
});

describe('applyExchangeFilter', () => {
  it('converts a notional into a step-rounded quantity', () => {
    const verdict = applyExchangeFilter(buy(20), 40_000, btcFilter);
    expect(verdict.ok).toBe(true);
    if (!verdict.ok) return;
    expect(verdict.intent.quantity).toBe(0.0005);
    expect(verdict.intent.notional).toBeCloseTo(20, 8);
    expect(verdict.intent.price).toBe(40_000);
    expect(verdict.filter).toBe(btcFilter);
  });

  it('rejects an order under the minimum notional', () => {
    const filter = { minNotional: 5, minQty: 0.01, stepSize: 0.01 };
    expect(applyExchangeFilter(buy(3), 100, filter)).toEqual({ ok: false, detail: 'notional 3.0000 < minNotional 5' });
  });

  it('rejects an order under the minimum quantity', () => {
    const sell: Intent = { symbol: 'BTCUSDT', side: 'SELL', size: { kind: 'quantity', value: 0.5 }, confidence: null };
    expect(applyExchangeFilter(sell, 100, { minNotional: 5, minQty: 1, stepSize: 0.1 })).toEqual({
      ok: false,
      detail: 'quantity 0.5 < minQty 1',
    });
  });

  it('rejects a quantity that rounds to zero', () => {
    const sell: Intent = { symbol: 'BTCUSDT', side: 'SELL', size: { kind: 'quantity', value: 0.0004 }, confidence: null };
    expect(applyExchangeFilter(sell, 100, { minNotional: 0, minQty: 0, stepSize: 0.001 })).toEqual({
      ok: false,
      detail: 'quantity rounds to zero',
    });
  });

  it('rejects when the filter or price is missing', () => {
    expect(applyExchangeFilter(buy(20), 100, undefined)).toEqual({ ok: false, detail: 'no exchange filter for symbol' });
    expect(applyExchangeFilter(buy(20), 0, btcFilter)).toEqual({ ok: false, detail: 'no price' });
  });
});
