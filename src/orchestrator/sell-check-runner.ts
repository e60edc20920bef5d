import { logger, logTrade } from '../utils/logger';
import { getErrorMessage } from '../utils/errors';
import { todayIso } from '../utils/dates';
import { SellRuleEngine } from '../positions/sell-rule-engine';
import type { BrokerClient } from '../execution/broker-client';
import type { IsoDate, Position, SellCheckResult, SellExecution, SellSignal, StrategyConfig } from '../types';

export interface SellCheckOptions {
  today?: IsoDate;
  /** Submit sell orders for every signal; otherwise only report them. */
  execute?: boolean;
}

interface PricedPositions {
  prices: Map<string, number>;
  venueSymbols: Map<string, string>;
}

/**
 * Runs the exit rules over each strategy's live positions.
 */
export class SellCheckRunner {
  private lastResult: SellCheckResult | null = null;

  constructor(
    private broker: BrokerClient,
    private strategies: StrategyConfig[]
  ) {}

  async run(options: SellCheckOptions = {}): Promise<SellCheckResult> {
    const today = options.today ?? todayIso();
    const signals: SellSignal[] = [];
    const executions: SellExecution[] = [];

    for (const strategy of this.strategies) {
      let positions: Position[];
      try {
        positions = await this.broker.getPositions(strategy.accountId);
      } catch (error: unknown) {
        logger.error(`Could not load positions for ${strategy.name}`, { error: getErrorMessage(error) });
        continue;
      }

      const { prices, venueSymbols } = await this.pricePositions(positions);
      const engine = new SellRuleEngine(strategy);
      const found = engine.evaluatePositions(positions, prices, today);
      signals.push(...found);

      for (const signal of found) {
        const venueSymbol = venueSymbols.get(signal.ticker);
        if (!options.execute || venueSymbol === undefined) {
          executions.push({ signal, status: 'not_executed', error: null });
          continue;
        }
        executions.push(await this.sell(signal, venueSymbol));
      }
    }

    logger.info(`🔎 Sell checks complete: ${signals.length} signals`, {
      date: today,
      executed: options.execute === true,
      byRule: countBy(signals.map(s => s.rule)),
    });

    this.lastResult = { status: 'ok', date: today, signals, executions };
    return this.lastResult;
  }

  getLastResult(): SellCheckResult | null {
    return this.lastResult;
  }

  private async pricePositions(positions: Position[]): Promise<PricedPositions> {
    const prices = new Map<string, number>();
    const venueSymbols = new Map<string, string>();

    for (const position of positions) {
      try {
        const instrument = await this.broker.resolveTradable(position.ticker);
        if (!instrument) {
          logger.warn(`${position.ticker} is no longer tradable, skipping sell checks`);
          continue;
        }
        const price = await this.broker.getPrice(instrument.venueSymbol);
        if (price === null) continue;
        prices.set(position.ticker, price);
        venueSymbols.set(position.ticker, instrument.venueSymbol);
      } catch (error: unknown) {
        logger.warn(`Could not price ${position.ticker}`, { error: getErrorMessage(error) });
      }
    }

    return { prices, venueSymbols };
  }

  private async sell(signal: SellSignal, venueSymbol: string): Promise<SellExecution> {
    try {
      const fill = await this.broker.submitSellOrder({
        accountId: signal.accountId,
        venueSymbol,
        quantity: signal.metrics.quantity,
      });
      logTrade('SELL filled', {
        ticker: signal.ticker,
        rule: signal.rule,
        quantity: fill.filledQuantity,
        price: fill.averagePrice,
        amount: fill.filledAmount,
      });
      return { signal, status: 'submitted', error: null };
    } catch (error: unknown) {
      const message = getErrorMessage(error);
      logger.error(`Sell order for ${signal.ticker} failed`, { error: message });
      return { signal, status: 'failed', error: message };
    }
  }
}

function countBy(values: string[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const value of values) {
    counts[value] = (counts[value] ?? 0) + 1;
  }
  return counts;
}
