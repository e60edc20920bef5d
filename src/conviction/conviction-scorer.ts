/**
 * Conviction Scorer
 *
 * Turns discrete insider buy events into per-ticker conviction:
 *
 *   event score = Δown% × title multiplier × e^(−decay × days since trade)
 *
 * - Δown% is in percent units (5 = 5 %); a newly opened position counts as 100
 * - C-suite insiders weigh 3×, everyone else 1×
 * - Older trades decay exponentially (default rate 0.2/day)
 *
 * A ticker qualifies as a cluster (enough distinct insiders) or as a single
 * C-suite insider with a large enough stake increase. Everything else is
 * discarded.
 */

import { logger } from '../utils/logger';
import { daysBetween } from '../utils/dates';
import type { BuyEvent, IsoDate, ScoredEvent, ScoredTicker } from '../types';

export interface ConvictionScorerConfig {
  lookbackDays: number;
  topN: number;
  decayRate: number;
  minInsidersForCluster: number;
  csuiteStakeThresholdPct: number;
}

export const DEFAULT_CONVICTION_CONFIG: ConvictionScorerConfig = {
  lookbackDays: 7,
  topN: 25,
  decayRate: 0.2,
  minInsidersForCluster: 2,
  csuiteStakeThresholdPct: 3.0,
};

const CSUITE_MULTIPLIER = 3.0;
const DEFAULT_MULTIPLIER = 1.0;
const NEW_POSITION_PCT = 100;

const CSUITE_TITLES = new Set(['ceo', 'cfo', 'coo', 'cto', 'president', 'pres', 'chairman', 'cob']);

/**
 * Filing titles look like "CEO, Director" or "Pres & COO"; any part naming a
 * C-suite role counts.
 */
export function isCsuiteTitle(title: string): boolean {
  return title
    .split(/[,/&]/)
    .map(part => part.trim().toLowerCase().replace(/\.$/, ''))
    .some(part => CSUITE_TITLES.has(part));
}

export function titleMultiplier(title: string): number {
  return isCsuiteTitle(title) ? CSUITE_MULTIPLIER : DEFAULT_MULTIPLIER;
}

export function deltaOwnValue(delta: BuyEvent['deltaOwnPct']): number {
  if (delta === 'new') return NEW_POSITION_PCT;
  if (!Number.isFinite(delta)) return 0;
  return Math.max(0, delta);
}

export class ConvictionScorer {
  private config: ConvictionScorerConfig;

  constructor(config: Partial<ConvictionScorerConfig> = {}) {
    this.config = { ...DEFAULT_CONVICTION_CONFIG, ...config };
  }

  getConfig(): ConvictionScorerConfig {
    return { ...this.config };
  }

  scoreEvent(event: BuyEvent, asOf: IsoDate): ScoredEvent {
    const daysSinceTrade = Math.max(0, daysBetween(event.tradeDate, asOf));
    const multiplier = titleMultiplier(event.insiderTitle);
    const score =
      deltaOwnValue(event.deltaOwnPct) * multiplier * Math.exp(-this.config.decayRate * daysSinceTrade);

    return { ...event, daysSinceTrade, titleMultiplier: multiplier, score };
  }

  /**
   * Score, group, filter and rank. Output is sorted by aggregate score
   * descending, then most recent trade, then ticker.
   */
  scoreEvents(events: BuyEvent[], asOf: IsoDate): ScoredTicker[] {
    const byTicker = new Map<string, ScoredEvent[]>();
    let outOfWindow = 0;

    for (const event of events) {
      const ticker = event.ticker.trim().toUpperCase();
      if (!ticker) continue;

      if (daysBetween(event.tradeDate, asOf) > this.config.lookbackDays) {
        outOfWindow++;
        continue;
      }

      const scored = this.scoreEvent({ ...event, ticker }, asOf);
      const bucket = byTicker.get(ticker);
      if (bucket) {
        bucket.push(scored);
      } else {
        byTicker.set(ticker, [scored]);
      }
    }

    const qualified: ScoredTicker[] = [];
    for (const [ticker, scoredEvents] of byTicker) {
      const aggregate = this.aggregate(ticker, scoredEvents);
      if (this.qualifies(aggregate)) {
        qualified.push(aggregate);
      }
    }

    qualified.sort(compareScoredTickers);
    const ranked = qualified.slice(0, this.config.topN);

    logger.info(`📊 Conviction scored ${events.length} buy events`, {
      tickers: byTicker.size,
      qualified: qualified.length,
      returned: ranked.length,
      outOfWindow,
    });

    return ranked;
  }

  private aggregate(ticker: string, events: ScoredEvent[]): ScoredTicker {
    const insiders = [...new Set(events.map(e => e.insiderId))].sort();
    const lastTradeDate = events.reduce(
      (latest, e) => (e.tradeDate > latest ? e.tradeDate : latest),
      events[0].tradeDate
    );

    return {
      ticker,
      score: events.reduce((sum, e) => sum + e.score, 0),
      insiderCount: insiders.length,
      insiders,
      isCluster: insiders.length >= this.config.minInsidersForCluster,
      isCsuitePresent: events.some(e => e.titleMultiplier === CSUITE_MULTIPLIER),
      maxDeltaOwnPct: Math.max(...events.map(e => deltaOwnValue(e.deltaOwnPct))),
      totalValueUsd: events.reduce((sum, e) => sum + e.valueUsd, 0),
      lastTradeDate,
      events,
    };
  }

  private qualifies(ticker: ScoredTicker): boolean {
    if (ticker.isCluster) return true;
    return (
      ticker.insiderCount === 1 &&
      ticker.isCsuitePresent &&
      ticker.maxDeltaOwnPct >= this.config.csuiteStakeThresholdPct
    );
  }
}

export function compareScoredTickers(a: ScoredTicker, b: ScoredTicker): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.lastTradeDate !== b.lastTradeDate) return a.lastTradeDate < b.lastTradeDate ? 1 : -1;
  return a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0;
}
