/**
 * Decision Cycle
 *
 * One end-to-end run:
 *   gate -> merge signals -> per strategy: decide -> approve -> execute
 *
 * Guarded by the cadence gate and bounded by a hard wall-clock timeout. A
 * timeout aborts whatever is in progress and returns status 'aborted' with the
 * execution reports completed so far.
 */

import { logger, logCycle } from '../utils/logger';
import { CadenceViolationError, getErrorMessage } from '../utils/errors';
import { CycleAbortedError, raceAbort } from '../utils/abort';
import { todayIso } from '../utils/dates';
import { normalizeAllocations } from '../execution/trade-executor';
import type { TradeExecutor } from '../execution/trade-executor';
import type { BrokerClient } from '../execution/broker-client';
import type { SignalMerger } from '../signals/signal-merger';
import type { CadenceGate, GateLease } from './cadence-gate';
import type { DecisionStage } from './decision-stage';
import { autoApprove, selectApprovedPicks } from './approval';
import type { ApprovalDecision, ApprovalGate, ApprovalRequest } from './approval';
import type {
  ApprovalRecord,
  Candidate,
  CycleResult,
  CycleStatus,
  ExecutionReport,
  IsoDate,
  Position,
  SourceError,
  SourceFeed,
  StrategyConfig,
  TradePick,
} from '../types';

export interface DecisionCycleDeps {
  feeds: SourceFeed[];
  merger: SignalMerger;
  decide: DecisionStage;
  /** Defaults to approving every pick. */
  approve?: ApprovalGate;
  executor: TradeExecutor;
  broker: BrokerClient;
  gate: CadenceGate;
  strategies: StrategyConfig[];
  cycleTimeoutMs: number;
}

const defaultApproval = autoApprove();

export interface RunOptions {
  today?: IsoDate;
  force?: boolean;
}

interface CycleProgress {
  candidates: Candidate[];
  excludedByCooldown: string[];
  sourceErrors: SourceError[];
  approvals: ApprovalRecord[];
  executions: ExecutionReport[];
}

export class DecisionCycle {
  private lastResult: CycleResult | null = null;

  constructor(private deps: DecisionCycleDeps) {}

  async run(options: RunOptions = {}): Promise<CycleResult> {
    const today = options.today ?? todayIso();
    const startedAt = new Date().toISOString();
    const progress: CycleProgress = {
      candidates: [],
      excludedByCooldown: [],
      sourceErrors: [],
      approvals: [],
      executions: [],
    };

    const finish = (status: CycleStatus, reason: string | null): CycleResult => {
      const result: CycleResult = {
        status,
        date: today,
        reason,
        ...progress,
        startedAt,
        finishedAt: new Date().toISOString(),
      };
      this.lastResult = result;
      logCycle(`finished: ${status}`, {
        date: today,
        reason,
        candidates: progress.candidates.length,
        strategies: progress.executions.length,
        spent: progress.executions.reduce((sum, e) => sum + e.totalSpent, 0),
      });
      return result;
    };

    let lease: GateLease;
    try {
      lease = await this.deps.gate.tryAcquire(today, { force: options.force });
    } catch (error: unknown) {
      if (error instanceof CadenceViolationError) {
        logger.info(`⏭️ Decision cycle skipped: ${error.message}`);
        return finish('skipped', error.message);
      }
      throw error;
    }

    logCycle('started', { date: today, force: options.force === true });

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.deps.cycleTimeoutMs);

    try {
      const status = await this.execute(today, lease, controller.signal, progress);
      if (status === 'skipped') {
        return finish('skipped', 'no qualifying candidates');
      }
      return finish('ok', null);
    } catch (error: unknown) {
      if (error instanceof CycleAbortedError || controller.signal.aborted) {
        logger.error(`⏱️ Decision cycle exceeded ${this.deps.cycleTimeoutMs}ms, aborted`);
        return finish('aborted', `cycle exceeded ${this.deps.cycleTimeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timer);
      await lease.release();
    }
  }

  getLastResult(): CycleResult | null {
    return this.lastResult;
  }

  private async execute(
    today: IsoDate,
    lease: GateLease,
    signal: AbortSignal,
    progress: CycleProgress
  ): Promise<'ok' | 'skipped'> {
    const merged = await raceAbort(this.deps.merger.merge(this.deps.feeds, today, signal), signal);
    progress.candidates = merged.candidates;
    progress.excludedByCooldown = merged.excludedByCooldown;
    progress.sourceErrors = merged.sourceErrors;

    if (merged.candidates.length === 0) {
      logger.warn('No qualifying candidates, nothing to decide');
      return 'skipped';
    }

    for (const strategy of this.deps.strategies) {
      if (signal.aborted) throw new CycleAbortedError();

      const portfolio = await this.loadPortfolio(strategy);

      let picks: TradePick[];
      try {
        picks = await raceAbort(
          this.deps.decide({
            candidates: merged.candidates,
            portfolio,
            budget: strategy.budgetPerRun,
            strategy,
            today,
            signal,
          }),
          signal
        );
      } catch (error: unknown) {
        if (error instanceof CycleAbortedError) throw error;
        logger.error(`Decision stage failed for ${strategy.name}, skipping strategy`, {
          error: getErrorMessage(error),
        });
        continue;
      }

      let decision: ApprovalDecision;
      try {
        decision = await raceAbort(
          this.approve({ strategy: strategy.name, date: today, picks, signal }),
          signal
        );
      } catch (error: unknown) {
        if (error instanceof CycleAbortedError) throw error;
        logger.error(`Approval failed for ${strategy.name}, skipping strategy`, {
          error: getErrorMessage(error),
        });
        continue;
      }
      const approved = selectApprovedPicks(picks, decision);
      progress.approvals.push(toApprovalRecord(strategy.name, picks, approved, decision));
      logCycle('picks approved', {
        strategy: strategy.name,
        action: decision.action,
        approved: approved.map(p => p.ticker),
        timedOut: decision.timedOut,
      });

      // a rejection is still this run's decision, so the marker is committed
      await lease.commit();

      const report = await this.deps.executor.execute(normalizeAllocations(approved), {
        strategy,
        budget: strategy.budgetPerRun,
        attemptCap: strategy.maxPicksPerRun,
        today,
        signal,
      });
      progress.executions.push(report);
    }

    if (signal.aborted) throw new CycleAbortedError();
    return 'ok';
  }

  private approve(request: ApprovalRequest): Promise<ApprovalDecision> {
    return (this.deps.approve ?? defaultApproval)(request);
  }

  private async loadPortfolio(strategy: StrategyConfig): Promise<Position[]> {
    try {
      return await this.deps.broker.getPositions(strategy.accountId);
    } catch (error: unknown) {
      logger.warn(`Could not load portfolio for ${strategy.name}, deciding without it`, {
        error: getErrorMessage(error),
      });
      return [];
    }
  }
}

function toApprovalRecord(
  strategy: string,
  picks: TradePick[],
  approved: TradePick[],
  decision: ApprovalDecision
): ApprovalRecord {
  const approvedSet = new Set(approved);
  return {
    strategy,
    action: decision.action,
    approved: approved.map(p => p.ticker),
    rejected: picks.filter(p => !approvedSet.has(p)).map(p => p.ticker),
    timedOut: decision.timedOut,
  };
}
