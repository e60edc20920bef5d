/**
 * Pick Approval
 *
 * Sits between the decision stage and execution. A strategy's picks can be
 * approved whole, rejected whole, or approved by 1-based position. When
 * nobody answers in time the configured timeout action applies.
 */

import { logger } from '../utils/logger';
import { raceAbort } from '../utils/abort';
import type { IsoDate, TradePick } from '../types';

export type ApprovalAction = 'approve_all' | 'reject_all' | 'approve_subset';
export type ApprovalTimeoutAction = 'approve_all' | 'reject_all';

export interface ApprovalDecision {
  action: ApprovalAction;
  approvedIndices: number[]; // 0-based
  timedOut: boolean;
  rawInput: string | null;
}

export interface ApprovalRequest {
  strategy: string;
  date: IsoDate;
  picks: TradePick[];
  signal?: AbortSignal;
}

export type ApprovalGate = (request: ApprovalRequest) => Promise<ApprovalDecision>;

const allIndices = (count: number): number[] => Array.from({ length: count }, (_, i) => i);

/**
 * Unattended runs: everything the decision stage chose goes through.
 */
export function autoApprove(): ApprovalGate {
  return async ({ picks }) => ({
    action: 'approve_all',
    approvedIndices: allIndices(picks.length),
    timedOut: false,
    rawInput: null,
  });
}

export function timeoutDecision(action: ApprovalTimeoutAction, pickCount: number): ApprovalDecision {
  return {
    action,
    approvedIndices: action === 'approve_all' ? allIndices(pickCount) : [],
    timedOut: true,
    rawInput: null,
  };
}

/**
 * "", "a", "approve" approve everything; "r", "reject" reject everything;
 * "1,3" approves those picks. Out-of-range and non-numeric parts are ignored,
 * and an answer that approves nothing counts as a rejection.
 */
export function parseApprovalInput(raw: string, pickCount: number): ApprovalDecision {
  const value = raw.trim().toLowerCase();

  if (['', 'a', 'approve', 'approve_all'].includes(value)) {
    return { action: 'approve_all', approvedIndices: allIndices(pickCount), timedOut: false, rawInput: raw };
  }
  if (['r', 'reject', 'reject_all'].includes(value)) {
    return { action: 'reject_all', approvedIndices: [], timedOut: false, rawInput: raw };
  }

  const chosen = new Set<number>();
  for (const part of value.split(',')) {
    const trimmed = part.trim();
    if (!/^\d+$/.test(trimmed)) continue;
    const choice = Number(trimmed);
    if (choice >= 1 && choice <= pickCount) {
      chosen.add(choice - 1);
    }
  }

  const approvedIndices = [...chosen].sort((a, b) => a - b);
  if (approvedIndices.length === 0) {
    return { action: 'reject_all', approvedIndices: [], timedOut: false, rawInput: raw };
  }
  return { action: 'approve_subset', approvedIndices, timedOut: false, rawInput: raw };
}

export function selectApprovedPicks(picks: TradePick[], decision: ApprovalDecision): TradePick[] {
  if (decision.action === 'approve_all') return picks;
  return decision.approvedIndices.filter(i => i < picks.length).map(i => picks[i]);
}

export interface PromptApprovalOptions {
  timeoutMs: number;
  timeoutAction: ApprovalTimeoutAction;
  /** Ask one question and resolve with the answer. Must stop on `signal`. */
  ask: (question: string, signal: AbortSignal) => Promise<string>;
  print?: (line: string) => void;
}

/**
 * Interactive gate for the CLI. Lists the picks, asks once, and falls back to
 * `timeoutAction` when the answer does not arrive within `timeoutMs`.
 */
export function promptApprovalGate(options: PromptApprovalOptions): ApprovalGate {
  const print = options.print ?? ((line: string) => console.log(line));

  return async ({ strategy, picks, signal }) => {
    if (picks.length === 0) {
      return { action: 'approve_all', approvedIndices: [], timedOut: false, rawInput: null };
    }

    print(`\nRecommendations for ${strategy}:`);
    picks.forEach((pick, i) => {
      const allocation =
        pick.allocation.kind === 'fraction'
          ? `${(pick.allocation.value * 100).toFixed(1)}%`
          : pick.allocation.value.toFixed(2);
      print(`  ${i + 1}. ${pick.ticker} (${allocation}) - ${(pick.reasoning ?? '').slice(0, 100)}`);
    });
    print('Approve options: [A]pprove all, [R]eject all, or pick numbers like 1,3');

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);
    const onCycleAbort = () => controller.abort();
    signal?.addEventListener('abort', onCycleAbort, { once: true });

    try {
      const answer = await raceAbort(options.ask('Your decision: ', controller.signal), controller.signal);
      return parseApprovalInput(answer, picks.length);
    } catch (error: unknown) {
      if (!timedOut) throw error;
      logger.warn(`No approval answer within ${options.timeoutMs}ms, applying ${options.timeoutAction}`, {
        strategy,
      });
      return timeoutDecision(options.timeoutAction, picks.length);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCycleAbort);
    }
  };
}
