import { describe, expect, it } from 'vitest';
import { cooldownRemainingMs, emptyCooldowns, withTrade } from './cooldown';

describe('cooldown state', () => {
  it('returns a new state and leaves the old one alone', () => {
    const before = emptyCooldowns();
    const after = withTrade(before, 'BTCUSDT', 1000);
    expect(before.size).toBe(0);
    expect(after.get('BTCUSDT')).toBe(1000);
  });

  it('counts down to zero at the boundary', () => {
    const state = withTrade(emptyCooldowns(), 'BTCUSDT', 1000);
    expect(cooldownRemainingMs(state, 'BTCUSDT', 1000, 60)).toBe(60_000);
    expect(cooldownRemainingMs(state, 'BTCUSDT', 60_999, 60)).toBe(1);
    expect(cooldownRemainingMs(state, 'BTCUSDT', 61_000, 60)).toBe(0);
    expect(cooldownRemainingMs(state, 'ETHUSDT', 1000, 60)).toBe(0);
  });
});
