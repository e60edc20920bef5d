import { logger } from '../utils/logger';
import { ConvictionScorer } from './conviction-scorer';
import type { BuyEvent, IsoDate, SourceFeed, SourceHit } from '../types';

/**
 * Anything that yields insider buy events for the last N days.
 * Filing retrieval and parsing live behind this boundary.
 */
export interface BuyEventCollector {
  collect(lookbackDays: number): Promise<BuyEvent[]>;
}

/**
 * Exposes scored insider conviction as a named signal source.
 */
export class ConvictionFeed implements SourceFeed {
  readonly name: string;
  readonly filterNoise = true;

  constructor(
    private collector: BuyEventCollector,
    private scorer: ConvictionScorer,
    name: string = 'insider'
  ) {
    this.name = name;
  }

  async fetch(today: IsoDate): Promise<SourceHit[]> {
    const { lookbackDays } = this.scorer.getConfig();
    const events = await this.collector.collect(lookbackDays);
    const scored = this.scorer.scoreEvents(events, today);

    logger.debug(`Conviction feed produced ${scored.length} tickers`);

    return scored.map(t => ({
      ticker: t.ticker,
      score: t.score,
      evidence: {
        insiderCount: t.insiderCount,
        isCluster: t.isCluster,
        isCsuitePresent: t.isCsuitePresent,
        maxDeltaOwnPct: t.maxDeltaOwnPct,
        totalValueUsd: t.totalValueUsd,
        lastTradeDate: t.lastTradeDate,
      },
    }));
  }
}

/** Fixed list of events, for dry runs and tests. */
export class StaticBuyEventCollector implements BuyEventCollector {
  constructor(private events: BuyEvent[]) {}

  async collect(): Promise<BuyEvent[]> {
    return [...this.events];
  }
}
