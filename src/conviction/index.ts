/**
 * Conviction Module
 *
 * Exports:
 * - ConvictionScorer: insider buy events -> ranked per-ticker conviction
 * - ConvictionFeed: the scorer as an `insider` signal source
 */

export {
  ConvictionScorer,
  DEFAULT_CONVICTION_CONFIG,
  compareScoredTickers,
  deltaOwnValue,
  isCsuiteTitle,
  titleMultiplier,
} from './conviction-scorer';
export type { ConvictionScorerConfig } from './conviction-scorer';

export { ConvictionFeed, StaticBuyEventCollector } from './conviction-feed';
export type { BuyEventCollector } from './conviction-feed';

export { HttpBuyEventCollector } from './http-buy-event-collector';
export type { HttpBuyEventCollectorOptions } from './http-buy-event-collector';
