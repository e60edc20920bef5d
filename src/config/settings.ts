import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { parseSourceFeeds } from '../signals/http-source-feed';
import type { StrategyConfig } from '../types';

/**
 * Runtime settings, parsed from the environment (dotenv is loaded by the
 * entry points before this module is used).
 */

const positiveNumber = z.coerce.number().positive();
const nonNegativeInt = z.coerce.number().int().min(0);
const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  LOOKBACK_DAYS: positiveInt.default(7),
  TOP_N: positiveInt.default(25),
  DECAY_RATE: z.coerce.number().min(0).default(0.2),
  COOLDOWN_DAYS: nonNegativeInt.default(3),
  MIN_INSIDERS_FOR_CLUSTER: positiveInt.default(2),
  CSUITE_STAKE_THRESHOLD_PCT: z.coerce.number().min(0).default(3.0),

  STOP_LOSS_PCT: positiveNumber.default(10.0),
  TAKE_PROFIT_PCT: positiveNumber.default(15.0),
  MAX_HOLD_DAYS: positiveInt.default(5),
  BUDGET_PER_RUN: z.coerce.number().min(0).default(10),
  MAX_PICKS_PER_RUN: positiveInt.default(5),
  MIN_TRADE_UNIT: positiveNumber.default(1),
  DEFAULT_ACCOUNT_ID: z.string().min(1).default('default'),

  CANDIDATE_LIMIT: positiveInt.default(25),
  SOURCE_PRIORITY: z.string().default('insider,screener,earnings,social'),
  SOURCE_QUOTAS: z.string().optional(),
  ENRICHMENT_CONCURRENCY: positiveInt.default(5),
  ENRICHMENT_TIMEOUT_MS: positiveInt.default(10_000),
  SOURCE_TIMEOUT_MS: positiveInt.default(60_000),
  CYCLE_TIMEOUT_MS: positiveInt.default(600_000),
  MIN_TRADING_DAYS_BETWEEN_RUNS: nonNegativeInt.default(1),
  APPROVAL_TIMEOUT_MS: positiveInt.default(120_000),
  APPROVAL_TIMEOUT_ACTION: z.enum(['approve_all', 'reject_all']).default('approve_all'),

  COOLDOWN_FILE: z.string().default('data/recently-traded.json'),
  RUN_MARKER_FILE: z.string().default('data/last-run.json'),
  STRATEGIES_FILE: z.string().optional(),

  FILINGS_API_URL: z.string().url().optional(),
  FILINGS_API_KEY: z.string().optional(),
  SOURCE_FEEDS: z.string().optional(),
  SOURCE_FEEDS_API_KEY: z.string().optional(),

  BROKER_API_URL: z.string().url().optional(),
  BROKER_API_KEY: z.string().optional(),
  NEWS_API_URL: z.string().url().optional(),
  NEWS_API_KEY: z.string().optional(),

  API_PORT: positiveInt.default(3001),
});

export type Env = z.infer<typeof envSchema>;

export const strategySchema = z.object({
  name: z.string().min(1),
  accountId: z.string().min(1),
  budgetPerRun: z.number().min(0),
  maxPicksPerRun: z.number().int().positive(),
  minTradeUnit: z.number().positive(),
  stopLossPct: z.number().positive(),
  takeProfitPct: z.number().positive(),
  maxHoldDays: z.number().int().positive(),
});

const strategiesFileSchema = z.array(strategySchema).min(1);

export interface Settings {
  conviction: {
    lookbackDays: number;
    topN: number;
    decayRate: number;
    minInsidersForCluster: number;
    csuiteStakeThresholdPct: number;
  };
  merger: {
    targetCount: number;
    sourcePriority: string[];
    sourceQuotas?: Record<string, number>;
    enrichmentConcurrency: number;
    enrichmentTimeoutMs: number;
    sourceTimeoutMs: number;
  };
  cooldown: {
    days: number;
    file: string;
  };
  cadence: {
    minTradingDaysBetweenRuns: number;
    cycleTimeoutMs: number;
    markerFile: string;
  };
  approval: {
    timeoutMs: number;
    timeoutAction: 'approve_all' | 'reject_all';
  };
  strategies: StrategyConfig[];
  filings: { url?: string; apiKey?: string };
  sourceFeeds: { feeds: Array<{ name: string; url: string }>; apiKey?: string };
  broker: { url?: string; apiKey?: string };
  news: { url?: string; apiKey?: string };
  api: { port: number };
}

function defaultStrategy(env: Env): StrategyConfig {
  return {
    name: 'default',
    accountId: env.DEFAULT_ACCOUNT_ID,
    budgetPerRun: env.BUDGET_PER_RUN,
    maxPicksPerRun: env.MAX_PICKS_PER_RUN,
    minTradeUnit: env.MIN_TRADE_UNIT,
    stopLossPct: env.STOP_LOSS_PCT,
    takeProfitPct: env.TAKE_PROFIT_PCT,
    maxHoldDays: env.MAX_HOLD_DAYS,
  };
}

/** `screener:8,earnings:2` -> { screener: 8, earnings: 2 } */
export function parseQuotas(value: string): Record<string, number> {
  const quotas: Record<string, number> = {};
  for (const part of value.split(',')) {
    const item = part.trim();
    if (!item) continue;
    const [source, count] = item.split(':').map(s => s.trim());
    const parsed = Number(count);
    if (!source || !count || !Number.isInteger(parsed) || parsed < 0) {
      throw new Error(`Invalid configuration: SOURCE_QUOTAS entry "${item}" must look like source:count`);
    }
    quotas[source] = parsed;
  }
  return quotas;
}

export function loadStrategies(file: string): StrategyConfig[] {
  const resolved = path.resolve(process.cwd(), file);
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  const parsed = strategiesFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new Error(`Invalid strategies file ${resolved}: ${issues}`);
  }

  const names = new Set<string>();
  for (const strategy of parsed.data) {
    if (names.has(strategy.name)) {
      throw new Error(`Duplicate strategy name in ${resolved}: ${strategy.name}`);
    }
    names.add(strategy.name);
  }
  return parsed.data;
}

/**
 * Build settings from an env record. Throws with every invalid variable named.
 */
export function loadSettings(source: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const env = parsed.data;

  return {
    conviction: {
      lookbackDays: env.LOOKBACK_DAYS,
      topN: env.TOP_N,
      decayRate: env.DECAY_RATE,
      minInsidersForCluster: env.MIN_INSIDERS_FOR_CLUSTER,
      csuiteStakeThresholdPct: env.CSUITE_STAKE_THRESHOLD_PCT,
    },
    merger: {
      targetCount: env.CANDIDATE_LIMIT,
      sourcePriority: env.SOURCE_PRIORITY.split(',').map(s => s.trim()).filter(s => s.length > 0),
      sourceQuotas: env.SOURCE_QUOTAS ? parseQuotas(env.SOURCE_QUOTAS) : undefined,
      enrichmentConcurrency: env.ENRICHMENT_CONCURRENCY,
      enrichmentTimeoutMs: env.ENRICHMENT_TIMEOUT_MS,
      sourceTimeoutMs: env.SOURCE_TIMEOUT_MS,
    },
    cooldown: {
      days: env.COOLDOWN_DAYS,
      file: env.COOLDOWN_FILE,
    },
    cadence: {
      minTradingDaysBetweenRuns: env.MIN_TRADING_DAYS_BETWEEN_RUNS,
      cycleTimeoutMs: env.CYCLE_TIMEOUT_MS,
      markerFile: env.RUN_MARKER_FILE,
    },
    approval: {
      timeoutMs: env.APPROVAL_TIMEOUT_MS,
      timeoutAction: env.APPROVAL_TIMEOUT_ACTION,
    },
    strategies: env.STRATEGIES_FILE ? loadStrategies(env.STRATEGIES_FILE) : [defaultStrategy(env)],
    filings: { url: env.FILINGS_API_URL, apiKey: env.FILINGS_API_KEY },
    sourceFeeds: {
      feeds: env.SOURCE_FEEDS ? parseSourceFeeds(env.SOURCE_FEEDS) : [],
      apiKey: env.SOURCE_FEEDS_API_KEY,
    },
    broker: { url: env.BROKER_API_URL, apiKey: env.BROKER_API_KEY },
    news: { url: env.NEWS_API_URL, apiKey: env.NEWS_API_KEY },
    api: { port: env.API_PORT },
  };
}
