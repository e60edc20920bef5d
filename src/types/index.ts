// Core Types for the Insider Signal Trader

/** ISO calendar date, `YYYY-MM-DD`. */
export type IsoDate = string;

export interface BuyEvent {
  ticker: string;
  insiderId: string;
  insiderTitle: string;
  deltaOwnPct: number | 'new'; // percent units; 'new' = newly opened position (100%)
  tradeDate: IsoDate;
  valueUsd: number;
}

export interface ScoredEvent extends BuyEvent {
  daysSinceTrade: number;
  titleMultiplier: number;
  score: number;
}

export interface ScoredTicker {
  ticker: string;
  score: number;
  insiderCount: number;
  insiders: string[];
  isCluster: boolean;
  isCsuitePresent: boolean;
  maxDeltaOwnPct: number;
  totalValueUsd: number;
  lastTradeDate: IsoDate;
  events: ScoredEvent[];
}

export type SourceTag = string;

export interface SourceHit {
  ticker: string;
  score?: number;
  evidence: Record<string, unknown>;
}

export interface SourceFeed {
  name: SourceTag;
  /** Ranked hits as of `today`. */
  fetch(today: IsoDate): Promise<SourceHit[]>;
  filterNoise?: boolean;
}

export interface SourceEvidence {
  source: SourceTag;
  rank: number; // 0-based position in the source's own list
  score: number;
  evidence: Record<string, unknown>;
}

export interface Headline {
  title: string;
  url?: string;
  publishedAt?: string;
  source?: string;
}

export interface Enrichment {
  headlines: Headline[];
}

export interface Candidate {
  ticker: string;
  score: number;
  sources: SourceEvidence[];
  enrichment: Enrichment | null;
}

export type Allocation =
  | { kind: 'fraction'; value: number } // of the input budget, 0..1
  | { kind: 'amount'; value: number };

export interface TradePick {
  ticker: string;
  allocation: Allocation;
  rank: number;
  reasoning?: string;
}

export interface Position {
  ticker: string;
  quantity: number;
  averagePrice: number;
  openDate: IsoDate;
  accountId: string;
}

export type SellRule = 'stop_loss' | 'take_profit' | 'hold_period';

export interface SellSignal {
  ticker: string;
  accountId: string;
  rule: SellRule;
  reasoning: string;
  metrics: {
    returnPct: number;
    daysHeld: number;
    currentPrice: number;
    averagePrice: number;
    quantity: number;
  };
}

/**
 * One parameterised trading strategy. Variants that differ only in budget,
 * thresholds and target account share every code path.
 */
export interface StrategyConfig {
  name: string;
  accountId: string;
  budgetPerRun: number;
  maxPicksPerRun: number;
  minTradeUnit: number;
  stopLossPct: number;
  takeProfitPct: number;
  maxHoldDays: number;
}

export interface TradeResult {
  ticker: string;
  rank: number;
  success: boolean;
  requestedAmount: number;
  amountSpent: number;
  quantity: number;
  venueSymbol: string | null;
  error: string | null;
}

export type SkipReason =
  | 'duplicate'
  | 'budget exhausted'
  | 'attempt cap reached'
  | 'below minimum trade unit'
  | 'cycle aborted';

export interface SkippedPick {
  ticker: string;
  rank: number;
  reason: SkipReason;
}

export interface ExecutionReport {
  strategy: string;
  budget: number;
  effectiveBudget: number;
  totalSpent: number;
  attempts: number;
  bought: TradeResult[];
  failed: TradeResult[];
  skipped: SkippedPick[];
  budgetUtilisationPct: number;
}

export interface SourceError {
  source: SourceTag;
  error: string;
}

export type CycleStatus = 'ok' | 'skipped' | 'aborted';

export interface ApprovalRecord {
  strategy: string;
  action: 'approve_all' | 'reject_all' | 'approve_subset';
  approved: string[];
  rejected: string[];
  timedOut: boolean;
}

export interface CycleResult {
  status: CycleStatus;
  date: IsoDate;
  reason: string | null;
  candidates: Candidate[];
  excludedByCooldown: string[];
  sourceErrors: SourceError[];
  approvals: ApprovalRecord[];
  executions: ExecutionReport[];
  startedAt: string;
  finishedAt: string;
}

export interface SellExecution {
  signal: SellSignal;
  status: 'submitted' | 'failed' | 'not_executed';
  error: string | null;
}

export interface SellCheckResult {
  status: 'ok';
  date: IsoDate;
  signals: SellSignal[];
  executions: SellExecution[];
}
