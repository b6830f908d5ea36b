import pino from 'pino';
import { loadConfig, toCycleConfig } from './config';
import type { AppConfig } from './config';
import { emptyCooldowns } from './core/cooldown';
import { runCycle } from './core/pipeline';
import { baseAsset } from './core/symbols';
import { describeDecision } from './llm/parse';
import type { CycleJournal, DecisionContext, DecisionModel, MarketData } from './core/collaborators';
import type { ExchangeServices } from './exchanges/binanceServices';
import type {
  AccountState,
  CooldownState,
  ExchangeFilter,
  ExecutionMode,
  OrderResult,
  RawDecision,
} from './core/types';

export interface OrchestratorDeps extends ExchangeServices {
  journal: CycleJournal;
  clock?: () => number;
}

export type TickReport =
  | { ts: number; skipped: true; reason: string }
  | { ts: number; skipped: false; model: string; mode: ExecutionMode; decision: RawDecision; results: OrderResult[] };

export class Orchestrator {
  private readonly logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });
  private readonly clock: () => number;
  private cooldowns: CooldownState = emptyCooldowns();
  private backoffUntil = 0;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly model: DecisionModel,
    private readonly deps: OrchestratorDeps,
    private readonly cfg: AppConfig = loadConfig(),
  ) {
    this.clock = deps.clock ?? Date.now;
  }

  get cooldownState(): CooldownState {
    return this.cooldowns;
  }

  async tick(): Promise<TickReport> {
    const now = this.clock();
    const symbols = this.cfg.symbolList;

    let market: MarketData;
    let account: AccountState;
    let filters: Record<string, ExchangeFilter>;
    try {
      market = await this.deps.market.getSnapshot(symbols);
      account = await this.deps.account.getAccountState(symbols);
      filters = await this.deps.filters.getFilters(symbols);
    } catch (err) {
      this.logger.warn({ err }, 'skip cycle: collaborator unavailable');
      return { ts: now, skipped: true, reason: err instanceof Error ? err.message : String(err) };
    }

    const balances: Record<string, number> = { [account.quoteAsset]: account.quoteFree };
    for (const [symbol, qty] of Object.entries(account.holdings)) {
      balances[baseAsset(symbol, account.quoteAsset)] = qty;
    }
    const prices: Record<string, number> = {};
    for (const [symbol, entry] of Object.entries(market.snapshot)) prices[symbol] = entry.price;

    const context: DecisionContext = {
      prices,
      history: market.history,
      balances,
      quoteAsset: account.quoteAsset,
      quoteFree: account.quoteFree,
      maxTradeQuote: this.cfg.MAX_TRADE_USDT,
      maxPositionQuotePerSymbol: this.cfg.MAX_POSITION_USDT_PER_SYMBOL,
      minConfidence: this.cfg.LLM_MIN_CONF,
      memory: this.cfg.enableMemory ? this.deps.journal.recent(this.cfg.MEMORY_MAX_ITEMS) : [],
    };
    const decision = await this.decide(context, now);
    this.logger.info({ model: this.model.id, decision: describeDecision(decision) }, 'decision');

    const outcome = await runCycle({
      decision,
      market: market.snapshot,
      account,
      filters,
      cooldowns: this.cooldowns,
      config: toCycleConfig(this.cfg),
      gateway: this.deps.gateway,
      clock: this.clock,
    });
    this.cooldowns = outcome.cooldowns;

    const mode = this.cfg.executionMode;
    try {
      this.deps.journal.record({ ts: now, model: this.model.id, mode, decision, results: outcome.results });
    } catch (err) {
      this.logger.error({ err }, 'journal write failed');
    }
    return { ts: now, skipped: false, model: this.model.id, mode, decision, results: outcome.results };
  }

  private async decide(context: DecisionContext, now: number): Promise<RawDecision> {
    if (now < this.backoffUntil) {
      this.logger.warn({ model: this.model.id, until: this.backoffUntil }, 'model in backoff');
      return { kind: 'none', reason: 'model in backoff' };
    }
    try {
      return await this.model.decide(context);
    } catch (err) {
      this.logger.error({ err, model: this.model.id }, 'model decision failed');
      this.applyBackoff(err, now);
      return { kind: 'none', reason: err instanceof Error ? err.message : String(err) };
    }
  }

  private applyBackoff(err: unknown, now: number): void {
    const status = typeof err === 'object' && err !== null && 'status' in err ? String(err.status) : '';
    const msg = err instanceof Error ? err.message : '';
    let ms = 0;
    if (status === '429' || /rate limit/i.test(msg)) {
      ms = 10 * 60 * 1000;
    } else if (status === '401' || status === '403') {
      ms = 30 * 60 * 1000;
    }
    if (ms > 0) {
      this.backoffUntil = now + ms;
      this.logger.warn({ model: this.model.id, backoffMs: ms }, 'applied backoff');
    }
  }

  /** Cycles run back to back; the next is scheduled only after the previous settles. */
  start(): void {
    if (this.running) return;
    this.running = true;
    const interval = Math.max(this.cfg.AUTO_RUN_INTERVAL_SEC, 5) * 1000;
    this.logger.info({ intervalMs: interval, symbols: this.cfg.symbolList, mode: this.cfg.executionMode }, 'orchestrator start');
    const loop = (): void => {
      this.timer = null;
      this.inFlight = this.runLoopCycle().finally(() => {
        this.inFlight = null;
        if (this.running) this.timer = setTimeout(loop, interval);
      });
    };
    loop();
  }

  private async runLoopCycle(): Promise<void> {
    try {
      await this.tick();
    } catch (err) {
      this.logger.error({ err }, 'cycle failed');
    }
  }

  /** Stops scheduling and resolves once the cycle in flight, if any, has settled. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    if (this.inFlight) {
      this.logger.info('waiting for the running cycle to finish');
      await this.inFlight;
    }
    this.logger.info('orchestrator stopped');
  }
}
