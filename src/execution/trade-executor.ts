/**
 * Trade Executor
 *
 * Works down a ranked pick list against a fixed budget, one order at a time:
 * - A pick that cannot be traded (not listed, no price, rejected) is recorded
 *   as failed and the next pick is tried immediately. No retries.
 * - Spend per pick is capped at what is left of the budget
 * - The remainder drops by what the venue actually filled, and later orders
 *   are shrunk by the worst overfill seen so far in the run
 * - Stops when the remainder drops below the minimum trade unit or the
 *   attempt cap is reached
 * - Every successful fill puts the ticker on cooldown
 *
 * No order is sized above the remainder. An overfill on the very first order
 * of a run is the venue's doing; it is reported at its real amount.
 */

import { logger, logTrade } from '../utils/logger';
import { TradabilityUnresolvedError, getErrorMessage } from '../utils/errors';
import { CycleAbortedError, raceAbort } from '../utils/abort';
import type { BrokerClient, OrderFill, TradableInstrument } from './broker-client';
import type { CooldownTracker } from '../safety/cooldown-tracker';
import type {
  ExecutionReport,
  IsoDate,
  SkipReason,
  SkippedPick,
  StrategyConfig,
  TradePick,
  TradeResult,
} from '../types';

export interface ExecuteOptions {
  strategy: Pick<StrategyConfig, 'name' | 'accountId' | 'minTradeUnit'>;
  budget: number;
  today: IsoDate;
  attemptCap?: number;
  signal?: AbortSignal;
}

interface ExecutionMetrics {
  totalRuns: number;
  totalAttempts: number;
  successfulOrders: number;
  failedOrders: number;
  totalSpent: number;
}

const ABORTED_PENDING = 'aborted while order pending';
const ABORTED_BEFORE_ORDER = 'aborted before the order was sent';

export class TradeExecutor {
  private metrics: ExecutionMetrics = {
    totalRuns: 0,
    totalAttempts: 0,
    successfulOrders: 0,
    failedOrders: 0,
    totalSpent: 0,
  };

  constructor(
    private broker: BrokerClient,
    private cooldown: CooldownTracker
  ) {}

  async execute(picks: TradePick[], options: ExecuteOptions): Promise<ExecutionReport> {
    const { strategy, today, signal } = options;
    const budget = Math.max(0, options.budget);
    const minUnit = strategy.minTradeUnit;
    const attemptCap = options.attemptCap ?? Infinity;

    const ordered = picks
      .map((pick, index) => ({ pick, index }))
      .sort((a, b) => a.pick.rank - b.pick.rank || a.index - b.index)
      .map(({ pick }) => pick);

    const effectiveBudget = await this.resolveEffectiveBudget(budget, strategy.accountId, minUnit);

    logger.info(`🛒 Executing ${ordered.length} picks for strategy ${strategy.name}`, {
      budget,
      effectiveBudget,
      attemptCap: Number.isFinite(attemptCap) ? attemptCap : null,
    });

    const bought: TradeResult[] = [];
    const failed: TradeResult[] = [];
    const skipped: SkippedPick[] = [];
    const handled = new Set<string>();
    let remaining = effectiveBudget;
    let attempts = 0;
    // filled / ordered, never below 1
    let worstFillRatio = 1;

    const skipRest = (from: number, reason: SkipReason): void => {
      for (const pick of ordered.slice(from)) {
        skipped.push({ ticker: normalize(pick.ticker), rank: pick.rank, reason });
      }
    };

    for (let i = 0; i < ordered.length; i++) {
      const pick = ordered[i];
      const ticker = normalize(pick.ticker);

      if (signal?.aborted) {
        skipRest(i, 'cycle aborted');
        break;
      }
      if (remaining < minUnit) {
        skipRest(i, 'budget exhausted');
        break;
      }
      if (attempts >= attemptCap) {
        skipRest(i, 'attempt cap reached');
        break;
      }
      if (handled.has(ticker)) {
        skipped.push({ ticker, rank: pick.rank, reason: 'duplicate' });
        continue;
      }
      handled.add(ticker);

      const requested = allocationAmount(pick, budget);
      const spend = Math.min(remaining / worstFillRatio, requested);
      if (spend < minUnit) {
        skipped.push({ ticker, rank: pick.rank, reason: 'below minimum trade unit' });
        continue;
      }

      attempts++;
      this.metrics.totalAttempts++;

      const result: TradeResult = {
        ticker,
        rank: pick.rank,
        success: false,
        requestedAmount: requested,
        amountSpent: 0,
        quantity: 0,
        venueSymbol: null,
        error: null,
      };

      try {
        const fill = await this.attempt(ticker, spend, strategy.accountId, result, signal);
        const spent = fill.filledAmount;
        if (spent > spend) {
          worstFillRatio = Math.max(worstFillRatio, spent / spend);
          logger.warn(`Overfill on ${ticker}: filled ${spent} against ${spend}`, {
            strategy: strategy.name,
            overBudget: spent > remaining,
          });
        }

        remaining -= spent;
        result.success = true;
        result.amountSpent = spent;
        result.quantity = fill.filledQuantity;
        bought.push(result);
        this.metrics.successfulOrders++;
        this.metrics.totalSpent += spent;

        logTrade('BUY filled', {
          strategy: strategy.name,
          ticker,
          venueSymbol: result.venueSymbol,
          amount: spent,
          quantity: fill.filledQuantity,
          price: fill.averagePrice,
          remaining,
        });

        await this.cooldown.record(ticker, today);
      } catch (error: unknown) {
        if (error instanceof CycleAbortedError) {
          // the pick already counts as attempted, so it is reported as failed
          result.error = result.error ?? ABORTED_BEFORE_ORDER;
          failed.push(result);
          this.metrics.failedOrders++;
          skipRest(i + 1, 'cycle aborted');
          logger.warn(`Execution for ${strategy.name} aborted at ${ticker}`, { reason: result.error });
          break;
        }

        result.error = getErrorMessage(error);
        failed.push(result);
        this.metrics.failedOrders++;
        logger.warn(`❌ ${ticker} failed, falling back to next pick`, { reason: result.error });
      }
    }

    const totalSpent = bought.reduce((sum, r) => sum + r.amountSpent, 0);
    this.metrics.totalRuns++;

    const report: ExecutionReport = {
      strategy: strategy.name,
      budget,
      effectiveBudget,
      totalSpent,
      attempts,
      bought,
      failed,
      skipped,
      budgetUtilisationPct: effectiveBudget > 0 ? round2((totalSpent / effectiveBudget) * 100) : 0,
    };

    logger.info(`✅ Execution finished for ${strategy.name}`, {
      bought: bought.map(r => r.ticker),
      failed: failed.map(r => r.ticker),
      skipped: skipped.length,
      totalSpent,
      utilisation: `${report.budgetUtilisationPct}%`,
    });

    return report;
  }

  getStats(): ExecutionMetrics {
    return { ...this.metrics };
  }

  /**
   * Resolve, price and submit one pick. Fills `result` with venue details as
   * it goes; throws on any failure.
   */
  private async attempt(
    ticker: string,
    spend: number,
    accountId: string,
    result: TradeResult,
    signal?: AbortSignal
  ): Promise<OrderFill> {
    let instrument: TradableInstrument | null;
    try {
      instrument = await raceAbort(this.broker.resolveTradable(ticker, signal), signal);
    } catch (error: unknown) {
      if (signal?.aborted) throw new CycleAbortedError();
      throw new TradabilityUnresolvedError(ticker, getErrorMessage(error));
    }
    if (!instrument) {
      throw new Error('not tradable');
    }
    result.venueSymbol = instrument.venueSymbol;

    let price: number | null;
    try {
      price = await raceAbort(this.broker.getPrice(instrument.venueSymbol, signal), signal);
    } catch (error: unknown) {
      if (signal?.aborted) throw new CycleAbortedError();
      throw error;
    }
    if (price === null || !Number.isFinite(price) || price <= 0) {
      throw new Error('no valid price');
    }

    if (signal?.aborted) throw new CycleAbortedError();

    let fill: OrderFill;
    try {
      fill = await raceAbort(
        this.broker.submitBuyOrder({ accountId, venueSymbol: instrument.venueSymbol, quantity: spend / price }, signal),
        signal
      );
    } catch (error: unknown) {
      if (signal?.aborted) {
        result.error = ABORTED_PENDING;
        throw new CycleAbortedError();
      }
      throw error;
    }

    if (!(fill.filledAmount > 0)) {
      throw new Error('nothing filled');
    }
    return fill;
  }

  private async resolveEffectiveBudget(budget: number, accountId: string, minUnit: number): Promise<number> {
    if (budget < minUnit || !this.broker.getAvailableCash) {
      return budget;
    }
    try {
      const cash = await this.broker.getAvailableCash(accountId);
      if (cash < budget) {
        logger.info(`Available cash ${cash} below budget ${budget}, capping`, { accountId });
      }
      return Math.max(0, Math.min(budget, cash));
    } catch (error: unknown) {
      logger.warn('Could not read available cash, using configured budget', {
        accountId,
        error: getErrorMessage(error),
      });
      return budget;
    }
  }
}

/**
 * Scale fraction allocations down proportionally when they add up to more
 * than the whole budget. Amount allocations are left alone.
 */
export function normalizeAllocations(picks: TradePick[]): TradePick[] {
  const fractionTotal = picks.reduce(
    (sum, p) => (p.allocation.kind === 'fraction' ? sum + Math.max(0, p.allocation.value) : sum),
    0
  );
  const scale = fractionTotal > 1 ? 1 / fractionTotal : 1;

  return picks.map((p): TradePick => {
    if (p.allocation.kind !== 'fraction') return p;
    return { ...p, allocation: { kind: 'fraction', value: Math.max(0, p.allocation.value) * scale } };
  });
}

function allocationAmount(pick: TradePick, budget: number): number {
  const value = Number.isFinite(pick.allocation.value) ? Math.max(0, pick.allocation.value) : 0;
  return pick.allocation.kind === 'fraction' ? value * budget : value;
}

function normalize(ticker: string): string {
  return ticker.trim().toUpperCase();
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
