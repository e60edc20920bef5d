/**
 * Signal Merger
 *
 * Combines candidate lists from independent sources into one ranked, capped
 * list:
 *
 * 1. Multi-source tickers first (confirmed by 2+ independent signals)
 * 2. Then each source in priority order, up to its optional quota
 * 3. Then each source again, without quotas, until the target is reached
 *
 * Cooled-down tickers are removed after selection, so the result can be
 * shorter than the target. Survivors get best-effort headline enrichment.
 */

import { logger } from '../utils/logger';
import { TaskPool, withTimeout } from '../utils/task-pool';
import { EnrichmentTimeoutError, SourceUnavailableError, getErrorMessage } from '../utils/errors';
import { isNoiseTicker, normalizeTicker } from './ticker-filter';
import type { CooldownTracker } from '../safety/cooldown-tracker';
import type {
  Candidate,
  Enrichment,
  IsoDate,
  SourceError,
  SourceEvidence,
  SourceFeed,
  SourceHit,
  SourceTag,
} from '../types';

export interface Enricher {
  enrich(ticker: string, signal: AbortSignal): Promise<Enrichment>;
}

export interface SignalMergerConfig {
  targetCount: number;
  sourcePriority: SourceTag[];
  sourceQuotas?: Record<SourceTag, number>;
  enrichmentConcurrency: number;
  enrichmentTimeoutMs: number;
  sourceTimeoutMs: number;
}

export interface MergeResult {
  candidates: Candidate[];
  excludedByCooldown: string[];
  sourceErrors: SourceError[];
  sourceCounts: Record<SourceTag, number>;
}

/** A source's hits after normalisation, in its own rank order. */
export interface SourceList {
  source: SourceTag;
  hits: SourceHit[];
}

interface TickerEntry {
  ticker: string;
  evidence: SourceEvidence[];
}

const EMPTY_ENRICHMENT: Enrichment = { headlines: [] };

export class SignalMerger {
  private config: SignalMergerConfig;
  private cooldown: CooldownTracker;
  private enricher: Enricher | null;

  constructor(config: SignalMergerConfig, cooldown: CooldownTracker, enricher: Enricher | null = null) {
    this.config = config;
    this.cooldown = cooldown;
    this.enricher = enricher;
  }

  async merge(feeds: SourceFeed[], today: IsoDate, signal?: AbortSignal): Promise<MergeResult> {
    logger.info(`🔀 Merging signals from ${feeds.length} sources...`);

    const { lists, errors } = await this.collect(feeds, today);
    await this.cooldown.refresh();
    const selected = selectCandidates(lists, this.config);

    const excludedByCooldown: string[] = [];
    const eligible: Candidate[] = [];
    for (const candidate of selected) {
      if (this.cooldown.isBlocked(candidate.ticker, today)) {
        excludedByCooldown.push(candidate.ticker);
      } else {
        eligible.push(candidate);
      }
    }

    if (excludedByCooldown.length > 0) {
      logger.info(`Removed ${excludedByCooldown.length} cooled-down tickers`, { tickers: excludedByCooldown });
    }

    const candidates = await this.enrich(eligible, signal);

    const sourceCounts: Record<SourceTag, number> = {};
    for (const list of lists) {
      sourceCounts[list.source] = list.hits.length;
    }

    logger.info('✅ Signal merge complete', {
      candidates: candidates.length,
      multiSource: candidates.filter(c => c.sources.length >= 2).length,
      excludedByCooldown: excludedByCooldown.length,
      failedSources: errors.map(e => e.source),
    });

    return { candidates, excludedByCooldown, sourceErrors: errors, sourceCounts };
  }

  /**
   * Fetch every source concurrently. A failing source is reported and skipped.
   */
  private async collect(feeds: SourceFeed[], today: IsoDate): Promise<{ lists: SourceList[]; errors: SourceError[] }> {
    const settled = await Promise.allSettled(
      feeds.map(feed => withTimeout(feed.fetch(today), this.config.sourceTimeoutMs, `source ${feed.name}`))
    );

    const lists: SourceList[] = [];
    const errors: SourceError[] = [];

    settled.forEach((outcome, i) => {
      const feed = feeds[i];
      if (outcome.status === 'fulfilled') {
        lists.push({ source: feed.name, hits: normalizeHits(outcome.value, feed.filterNoise === true) });
        return;
      }
      const error = new SourceUnavailableError(feed.name, getErrorMessage(outcome.reason));
      logger.warn(error.message, error.context);
      errors.push({ source: feed.name, error: error.message });
    });

    return { lists, errors };
  }

  private async enrich(candidates: Candidate[], signal?: AbortSignal): Promise<Candidate[]> {
    const enricher = this.enricher;
    if (!enricher || candidates.length === 0) {
      return candidates;
    }

    const timeoutMs = this.config.enrichmentTimeoutMs;
    const pool = new TaskPool({
      name: 'enrichment',
      concurrency: this.config.enrichmentConcurrency,
      taskTimeoutMs: timeoutMs,
    });

    const outcomes = await pool.runAll(
      candidates.map(c => async () => {
        const controller = new AbortController();
        const onAbort = () => controller.abort();
        signal?.addEventListener('abort', onAbort, { once: true });
        const timer = setTimeout(onAbort, timeoutMs);
        try {
          return await enricher.enrich(c.ticker, controller.signal);
        } finally {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        }
      })
    );

    return candidates.map((candidate, i) => {
      const outcome = outcomes[i];
      if (outcome.ok) {
        return { ...candidate, enrichment: outcome.value };
      }
      const error = new EnrichmentTimeoutError(candidate.ticker, outcome.error.message);
      logger.debug(error.message, error.context);
      return { ...candidate, enrichment: EMPTY_ENRICHMENT };
    });
  }
}

function normalizeHits(hits: SourceHit[], filterNoise: boolean): SourceHit[] {
  const seen = new Set<string>();
  const result: SourceHit[] = [];
  for (const hit of hits) {
    const ticker = normalizeTicker(hit.ticker);
    if (!ticker || seen.has(ticker)) continue;
    if (filterNoise && isNoiseTicker(ticker)) continue;
    seen.add(ticker);
    result.push({ ...hit, ticker });
  }
  return result;
}

/**
 * Pure three-pass selection. Returns unenriched candidates (`enrichment: null`).
 */
export function selectCandidates(
  lists: SourceList[],
  config: Pick<SignalMergerConfig, 'targetCount' | 'sourcePriority' | 'sourceQuotas'>
): Candidate[] {
  const ordered = orderSources(lists, config.sourcePriority);
  const priorityOf = new Map(ordered.map((list, i) => [list.source, i]));

  const byTicker = new Map<string, TickerEntry>();
  for (const list of ordered) {
    list.hits.forEach((hit, rank) => {
      const evidence: SourceEvidence = {
        source: list.source,
        rank,
        score: hit.score ?? 0,
        evidence: hit.evidence,
      };
      const entry = byTicker.get(hit.ticker);
      if (entry) {
        entry.evidence.push(evidence);
      } else {
        byTicker.set(hit.ticker, { ticker: hit.ticker, evidence: [evidence] });
      }
    });
  }

  const target = Math.max(0, config.targetCount);
  const admitted: string[] = [];
  const admittedSet = new Set<string>();
  const admit = (ticker: string): void => {
    admitted.push(ticker);
    admittedSet.add(ticker);
  };

  // Pass 1: multi-source
  const bestPriority = (e: TickerEntry) => Math.min(...e.evidence.map(ev => priorityOf.get(ev.source) ?? Infinity));
  const bestRank = (e: TickerEntry) => Math.min(...e.evidence.map(ev => ev.rank));
  const multiSource = [...byTicker.values()]
    .filter(e => e.evidence.length >= 2)
    .sort(
      (a, b) =>
        b.evidence.length - a.evidence.length ||
        bestPriority(a) - bestPriority(b) ||
        bestRank(a) - bestRank(b) ||
        (a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0)
    );
  for (const entry of multiSource) {
    if (admitted.length >= target) break;
    admit(entry.ticker);
  }

  // Pass 2: per-source quotas; pass 3: fill without quotas
  const fill = (quotas: Record<SourceTag, number> | undefined): void => {
    for (const list of ordered) {
      let taken = 0;
      const quota = quotas?.[list.source] ?? Infinity;
      for (const hit of list.hits) {
        if (admitted.length >= target || taken >= quota) break;
        if (admittedSet.has(hit.ticker)) continue;
        admit(hit.ticker);
        taken++;
      }
    }
  };
  if (config.sourceQuotas) {
    fill(config.sourceQuotas);
  }
  fill(undefined);

  return admitted.map(ticker => {
    const entry = byTicker.get(ticker);
    const sources = entry ? entry.evidence : [];
    return {
      ticker,
      score: sources.reduce((sum, s) => sum + Math.max(0, s.score), 0),
      sources,
      enrichment: null,
    };
  });
}

/** Declared priority first, undeclared sources afterwards in their given order. */
function orderSources(lists: SourceList[], priority: SourceTag[]): SourceList[] {
  const declared = priority
    .map(source => lists.find(l => l.source === source))
    .filter((l): l is SourceList => l !== undefined);
  const undeclared = lists.filter(l => !priority.includes(l.source));
  return [...declared, ...undeclared];
}
