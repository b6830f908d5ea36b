import type { CooldownState } from './types';

export function emptyCooldowns(): CooldownState {
  return new Map<string, number>();
}

export function cooldownRemainingMs(
  state: CooldownState,
  symbol: string,
  now: number,
  cooldownSec: number,
): number {
  const last = state.get(symbol);
  if (last === undefined) return 0;
  return Math.max(0, cooldownSec * 1000 - (now - last));
}

export function withTrade(state: CooldownState, symbol: string, at: number): CooldownState {
  const next = new Map(state);
  next.set(symbol, at);
  return next;
}
