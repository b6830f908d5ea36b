import { describe, expect, it } from 'vitest';
import { BinanceApiError, formatQuantity, parseSymbolFilters } from './binance';

describe('parseSymbolFilters', () => {
  it('reads lot size and notional filters', () => {
    expect(
      parseSymbolFilters([
        { filterType: 'PRICE_FILTER', tickSize: '0.01000000' },
        { filterType: 'LOT_SIZE', stepSize: '0.00001000', minQty: '0.00001000', maxQty: '9000.00000000' },
        { filterType: 'NOTIONAL', minNotional: '10.00000000' },
      ]),
    ).toEqual({ minNotional: 10, minQty: 0.00001, stepSize: 0.00001 });
  });

  it('accepts the legacy MIN_NOTIONAL filter', () => {
    expect(parseSymbolFilters([{ filterType: 'MIN_NOTIONAL', minNotional: '7' }]).minNotional).toBe(7);
  });

  it('falls back to a minimum notional of 5', () => {
    expect(parseSymbolFilters([])).toEqual({ minNotional: 5, minQty: 0, stepSize: 0 });
    expect(parseSymbolFilters([{ filterType: 'NOTIONAL' }]).minNotional).toBe(5);
  });
});

describe('formatQuantity', () => {
  it('prints plain decimals without trailing zeros', () => {
    expect(formatQuantity(0.5)).toBe('0.5');
    expect(formatQuantity(100)).toBe('100');
    expect(formatQuantity(1e-7)).toBe('0.0000001');
    expect(formatQuantity(0.123456789)).toBe('0.12345679');
  });
});

describe('BinanceApiError', () => {
  it('classifies timestamp and network failures', () => {
    expect(new BinanceApiError('Timestamp for this request is outside of the recvWindow.', 400, -1021).isTimestampError).toBe(true);
    expect(new BinanceApiError('x', 400, -1021).isTimestampError).toBe(true);
    expect(new BinanceApiError('Account has insufficient balance', 400, -2010).isTimestampError).toBe(false);
    expect(new BinanceApiError('socket hang up', null, null).isNetworkError).toBe(true);
    expect(new BinanceApiError('bad request', 400, -1100).isNetworkError).toBe(false);
  });
});
