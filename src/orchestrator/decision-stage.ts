import type { Candidate, IsoDate, Position, StrategyConfig, TradePick } from '../types';

export interface DecisionInput {
  candidates: Candidate[];
  portfolio: Position[];
  budget: number;
  strategy: StrategyConfig;
  today: IsoDate;
  signal?: AbortSignal;
}

/**
 * Turns merged candidates into a ranked pick list. The production stage is an
 * external model pipeline; anything with this shape can be plugged in.
 */
export type DecisionStage = (input: DecisionInput) => Promise<TradePick[]>;

/**
 * Deterministic stage for dry runs: top candidates by score that are not
 * already held, with the budget split evenly.
 */
export function rankByScoreDecisionStage(maxPicks?: number): DecisionStage {
  return async ({ candidates, portfolio, strategy }) => {
    const held = new Set(portfolio.filter(p => p.quantity > 0).map(p => p.ticker.toUpperCase()));
    const limit = Math.min(maxPicks ?? Infinity, strategy.maxPicksPerRun);

    const chosen = candidates
      .filter(c => !held.has(c.ticker.toUpperCase()))
      .sort((a, b) => b.score - a.score || (a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0))
      .slice(0, limit);

    return chosen.map((c, i): TradePick => ({
      ticker: c.ticker,
      rank: i + 1,
      allocation: { kind: 'fraction', value: 1 / chosen.length },
      reasoning: `score ${c.score.toFixed(2)} from ${c.sources.map(s => s.source).join(', ')}`,
    }));
  };
}
