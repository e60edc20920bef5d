/**
 * Service wiring shared by the API server and the CLI scripts.
 */

import { logger } from './utils/logger';
import type { Settings } from './config/settings';
import { ConvictionFeed, ConvictionScorer, HttpBuyEventCollector } from './conviction';
import { HttpSourceFeed, SignalMerger } from './signals';
import { HeadlineEnricher } from './enrichment';
import { CooldownTracker, FileCooldownStore } from './safety';
import { HttpBrokerClient, TradeExecutor } from './execution';
import type { BrokerClient } from './execution';
import {
  CadenceGate,
  DecisionCycle,
  FileRunMarkerStore,
  SellCheckRunner,
  rankByScoreDecisionStage,
} from './orchestrator';
import type { ApprovalGate, DecisionStage } from './orchestrator';
import type { SourceFeed } from './types';

export interface TraderServices {
  settings: Settings;
  broker: BrokerClient;
  cooldown: CooldownTracker;
  gate: CadenceGate;
  cycle: DecisionCycle;
  sellChecks: SellCheckRunner;
}

export interface BuildOverrides {
  broker?: BrokerClient;
  feeds?: SourceFeed[];
  decide?: DecisionStage;
  approve?: ApprovalGate;
}

export function buildFeeds(settings: Settings): SourceFeed[] {
  const feeds: SourceFeed[] = [];

  if (settings.filings.url) {
    const collector = new HttpBuyEventCollector({ baseUrl: settings.filings.url, apiKey: settings.filings.apiKey });
    feeds.push(new ConvictionFeed(collector, new ConvictionScorer(settings.conviction)));
  } else {
    logger.warn('⚠️ FILINGS_API_URL not set - insider conviction source disabled');
  }

  for (const { name, url } of settings.sourceFeeds.feeds) {
    feeds.push(new HttpSourceFeed({ name, url, apiKey: settings.sourceFeeds.apiKey }));
  }

  return feeds;
}

function buildBroker(settings: Settings): BrokerClient {
  if (!settings.broker.url) {
    throw new Error('BROKER_API_URL is required');
  }
  return new HttpBrokerClient({ baseUrl: settings.broker.url, apiKey: settings.broker.apiKey });
}

export async function buildServices(settings: Settings, overrides: BuildOverrides = {}): Promise<TraderServices> {
  // Persistent state first: both stores must be readable before a cycle can run
  const cooldown = new CooldownTracker(new FileCooldownStore(settings.cooldown.file), settings.cooldown.days);
  await cooldown.initialize();

  const gate = new CadenceGate(
    // a lock outliving two cycle timeouts belongs to a dead process
    new FileRunMarkerStore(settings.cadence.markerFile, settings.cadence.cycleTimeoutMs * 2),
    settings.cadence.minTradingDaysBetweenRuns
  );
  await gate.initialize();

  const broker = overrides.broker ?? buildBroker(settings);

  const enricher = settings.news.url
    ? new HeadlineEnricher({ baseUrl: settings.news.url, apiKey: settings.news.apiKey })
    : null;
  const merger = new SignalMerger(settings.merger, cooldown, enricher);

  const feeds = overrides.feeds ?? buildFeeds(settings);
  if (feeds.length === 0) {
    logger.warn('⚠️ No signal sources configured - every cycle will be skipped');
  }

  const cycle = new DecisionCycle({
    feeds,
    merger,
    decide: overrides.decide ?? rankByScoreDecisionStage(),
    approve: overrides.approve,
    executor: new TradeExecutor(broker, cooldown),
    broker,
    gate,
    strategies: settings.strategies,
    cycleTimeoutMs: settings.cadence.cycleTimeoutMs,
  });

  const sellChecks = new SellCheckRunner(broker, settings.strategies);

  logger.info('✅ Services ready', {
    sources: feeds.map(f => f.name),
    strategies: settings.strategies.map(s => s.name),
    enrichment: enricher !== null,
  });

  return { settings, broker, cooldown, gate, cycle, sellChecks };
}
