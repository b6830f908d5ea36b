import { describe, expect, it } from 'vitest';
import { QuotaLedger, clampToQuota } from './quota';
import type { AccountState, ExchangeFilter, QuotaLimits, ValidIntent } from './types';

const limits: QuotaLimits = { maxTradeQuote: 20, maxPositionQuotePerSymbol: 50 };
const filter: ExchangeFilter = { minNotional: 5, minQty: 0.001, stepSize: 0.001 };

function account(quoteFree: number, holdings: Record<string, number> = {}): AccountState {
  return { quoteAsset: 'USDT', quoteFree, holdings };
}

function buyAt10(symbol: string, notional: number): ValidIntent {
  return {
    symbol,
    side: 'BUY',
    size: { kind: 'notional', value: notional },
    confidence: 0.8,
    price: 10,
    quantity: notional / 10,
    notional,
  };
}

function sellAt10(symbol: string, quantity: number): ValidIntent {
  return {
    symbol,
    side: 'SELL',
    size: { kind: 'quantity', value: quantity },
    confidence: 0.8,
    price: 10,
    quantity,
    notional: quantity * 10,
  };
}

describe('QuotaLedger', () => {
  it('treats missing or invalid holdings as zero', () => {
    const ledger = new QuotaLedger(account(10, { BTCUSDT: Number.NaN, ETHUSDT: -1, SOLUSDT: 2 }));
    expect(ledger.heldQuantity('BTCUSDT')).toBe(0);
    expect(ledger.heldQuantity('ETHUSDT')).toBe(0);
    expect(ledger.heldQuantity('XRPUSDT')).toBe(0);
    expect(ledger.heldQuantity('SOLUSDT')).toBe(2);
  });

  it('never reserves below zero', () => {
    const ledger = new QuotaLedger(account(10));
    ledger.reserve(25);
    expect(ledger.remainingQuote).toBe(0);
  });
});

describe('clampToQuota: BUY', () => {
  it('clamps to the remaining per-symbol room', () => {
    const ledger = new QuotaLedger(account(100, { BTCUSDT: 4.5 }));
    const verdict = clampToQuota(buyAt10('BTCUSDT', 30), ledger, limits, filter);
    expect(verdict).toMatchObject({ ok: true, intent: { quantity: 0.5, notional: 5 } });
    expect(ledger.remainingQuote).toBe(95);
  });

  it('caps a single buy at the per-trade limit', () => {
    const ledger = new QuotaLedger(account(100));
    const verdict = clampToQuota(buyAt10('BTCUSDT', 30), ledger, limits, filter);
    expect(verdict).toMatchObject({ ok: true, intent: { quantity: 2, notional: 20 } });
  });

  it('lets later buys spend only what earlier buys left', () => {
    const ledger = new QuotaLedger(account(25));
    const first = clampToQuota(buyAt10('BTCUSDT', 20), ledger, limits, filter);
    const second = clampToQuota(buyAt10('ETHUSDT', 20), ledger, limits, filter);
    const third = clampToQuota(buyAt10('SOLUSDT', 20), ledger, limits, filter);
    expect(first).toMatchObject({ ok: true, intent: { notional: 20 } });
    expect(second).toMatchObject({ ok: true, intent: { quantity: 0.5, notional: 5 } });
    expect(third).toEqual({ ok: false, reason: 'QUOTA_EXHAUSTED', detail: 'no room: held 0.0000, balance 0.0000' });
  });

  it('reports a full position as exhausted', () => {
    const ledger = new QuotaLedger(account(100, { BTCUSDT: 5 }));
    expect(clampToQuota(buyAt10('BTCUSDT', 10), ledger, limits, filter)).toEqual({
      ok: false,
      reason: 'QUOTA_EXHAUSTED',
      detail: 'no room: held 50.0000, balance 100.0000',
    });
  });

  it('rejects a clamp that lands under the exchange minimum', () => {
    const ledger = new QuotaLedger(account(100, { BTCUSDT: 4.8 }));
    expect(clampToQuota(buyAt10('BTCUSDT', 10), ledger, limits, filter)).toEqual({
      ok: false,
      reason: 'FILTER_REJECTED',
      detail: 'after clamp: notional 2.0000 < minNotional 5',
    });
    expect(ledger.remainingQuote).toBe(100);
  });
});

describe('clampToQuota: SELL', () => {
  it('requires a holding', () => {
    const ledger = new QuotaLedger(account(100));
    expect(clampToQuota(sellAt10('BTCUSDT', 1), ledger, limits, filter)).toEqual({
      ok: false,
      reason: 'QUOTA_EXHAUSTED',
      detail: 'nothing held to sell',
    });
  });

  it('keeps a sell within the holding unchanged', () => {
    const intent = sellAt10('BTCUSDT', 1);
    const ledger = new QuotaLedger(account(0, { BTCUSDT: 2 }));
    expect(clampToQuota(intent, ledger, limits, filter)).toEqual({ ok: true, intent });
  });

  it('clamps an oversized sell down to the step-rounded holding', () => {
    const ledger = new QuotaLedger(account(0, { BTCUSDT: 1.2345 }));
    const verdict = clampToQuota(sellAt10('BTCUSDT', 2), ledger, limits, { ...filter, stepSize: 0.01 });
    expect(verdict).toMatchObject({ ok: true, intent: { quantity: 1.23 } });
    expect(ledger.remainingQuote).toBe(0);
  });

  it('never sells more than is held when the holding sits just under a step', () => {
    const held = 0.0029999999995;
    const ledger = new QuotaLedger(account(0, { BTCUSDT: held }));
    const verdict = clampToQuota(sellAt10('BTCUSDT', 1), ledger, limits, { ...filter, minNotional: 0 });
    expect(verdict).toMatchObject({ ok: true, intent: { quantity: 0.002 } });
  });
});
