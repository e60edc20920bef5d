/**
 * Sell Rule Engine
 *
 * Exit rules, checked in priority order (first match wins):
 * 1. STOP-LOSS: return at or below -stopLossPct
 * 2. TAKE-PROFIT: return at or above +takeProfitPct
 * 3. HOLD-PERIOD: held for maxHoldDays calendar days or more
 *
 * At most one signal per position per evaluation.
 */

import { logger, logSellSignal } from '../utils/logger';
import { daysBetween } from '../utils/dates';
import type { IsoDate, Position, SellRule, SellSignal, StrategyConfig } from '../types';

export type SellThresholds = Pick<StrategyConfig, 'stopLossPct' | 'takeProfitPct' | 'maxHoldDays'>;

interface RuleInput {
  position: Position;
  returnPct: number;
  daysHeld: number;
}

interface RuleHit {
  rule: SellRule;
  reasoning: string;
}

export class SellRuleEngine {
  constructor(private thresholds: SellThresholds) {}

  evaluatePosition(position: Position, currentPrice: number, today: IsoDate): SellSignal | null {
    if (!(currentPrice > 0) || !(position.quantity > 0) || !(position.averagePrice > 0)) {
      return null;
    }

    const input: RuleInput = {
      position,
      returnPct: ((currentPrice - position.averagePrice) / position.averagePrice) * 100,
      daysHeld: Math.max(0, daysBetween(position.openDate, today)),
    };

    const hit = this.checkStopLoss(input) ?? this.checkTakeProfit(input) ?? this.checkHoldPeriod(input);
    if (!hit) {
      return null;
    }

    const signal: SellSignal = {
      ticker: position.ticker,
      accountId: position.accountId,
      rule: hit.rule,
      reasoning: hit.reasoning,
      metrics: {
        returnPct: round2(input.returnPct),
        daysHeld: input.daysHeld,
        currentPrice,
        averagePrice: position.averagePrice,
        quantity: position.quantity,
      },
    };

    logSellSignal(`${hit.rule} on ${position.ticker}`, { ...signal.metrics, reasoning: hit.reasoning });
    return signal;
  }

  /**
   * Evaluate every position against a ticker -> price map. Positions without
   * a price are skipped.
   */
  evaluatePositions(positions: Position[], prices: Map<string, number>, today: IsoDate): SellSignal[] {
    const signals: SellSignal[] = [];
    for (const position of positions) {
      const price = prices.get(position.ticker);
      if (price === undefined) {
        logger.debug(`No price for ${position.ticker}, skipping sell checks`);
        continue;
      }
      const signal = this.evaluatePosition(position, price, today);
      if (signal) {
        signals.push(signal);
      }
    }
    return signals;
  }

  private checkStopLoss({ returnPct }: RuleInput): RuleHit | null {
    if (returnPct > -this.thresholds.stopLossPct) return null;
    return {
      rule: 'stop_loss',
      reasoning: `Stop-loss: ${returnPct.toFixed(1)}% (threshold: -${this.thresholds.stopLossPct}%)`,
    };
  }

  private checkTakeProfit({ returnPct }: RuleInput): RuleHit | null {
    if (returnPct < this.thresholds.takeProfitPct) return null;
    return {
      rule: 'take_profit',
      reasoning: `Take-profit: +${returnPct.toFixed(1)}% (threshold: +${this.thresholds.takeProfitPct}%)`,
    };
  }

  private checkHoldPeriod({ daysHeld }: RuleInput): RuleHit | null {
    if (daysHeld < this.thresholds.maxHoldDays) return null;
    return {
      rule: 'hold_period',
      reasoning: `Hold-period: ${daysHeld} days (max: ${this.thresholds.maxHoldDays})`,
    };
  }
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
