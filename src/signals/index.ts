export { SignalMerger, selectCandidates } from './signal-merger';
export type { Enricher, MergeResult, SignalMergerConfig, SourceList } from './signal-merger';
export { isNoiseTicker, normalizeTicker } from './ticker-filter';
export { HttpSourceFeed, parseSourceFeeds } from './http-source-feed';
export type { HttpSourceFeedOptions } from './http-source-feed';
