import { describe, it, expect, vi } from 'vitest';
import {
  autoApprove,
  parseApprovalInput,
  promptApprovalGate,
  selectApprovedPicks,
  timeoutDecision,
} from './approval';
import { CycleAbortedError } from '../utils/abort';
import type { TradePick } from '../types';

const PICKS: TradePick[] = [
  { ticker: 'AAA', rank: 1, allocation: { kind: 'fraction', value: 0.5 }, reasoning: 'score 3.00 from screener' },
  { ticker: 'BBB', rank: 2, allocation: { kind: 'amount', value: 250 } },
  { ticker: 'CCC', rank: 3, allocation: { kind: 'fraction', value: 0.25 }, reasoning: 'cluster buy' },
];

describe('parseApprovalInput', () => {
  it('approves everything on an empty answer or "a"', () => {
    for (const raw of ['', 'a', ' Approve ']) {
      expect(parseApprovalInput(raw, 3)).toEqual({
        action: 'approve_all',
        approvedIndices: [0, 1, 2],
        timedOut: false,
        rawInput: raw,
      });
    }
  });

  it('rejects everything on "r"', () => {
    expect(parseApprovalInput(' R ', 3)).toMatchObject({ action: 'reject_all', approvedIndices: [] });
  });

  it('approves listed positions, ignoring junk and out-of-range numbers', () => {
    expect(parseApprovalInput('3, x, 1, 9, 1', 3)).toMatchObject({
      action: 'approve_subset',
      approvedIndices: [0, 2],
    });
  });

  it('treats an answer that approves nothing as a rejection', () => {
    expect(parseApprovalInput('0,7', 3)).toMatchObject({ action: 'reject_all', approvedIndices: [] });
  });
});

describe('selectApprovedPicks', () => {
  it('keeps the approved picks in order', () => {
    const decision = parseApprovalInput('3,1', 3);
    expect(selectApprovedPicks(PICKS, decision).map(p => p.ticker)).toEqual(['AAA', 'CCC']);
    expect(selectApprovedPicks(PICKS, timeoutDecision('reject_all', 3))).toEqual([]);
    expect(selectApprovedPicks(PICKS, timeoutDecision('approve_all', 3))).toEqual(PICKS);
  });
});

describe('autoApprove', () => {
  it('approves every pick', async () => {
    const decision = await autoApprove()({ strategy: 'main', date: '2024-03-15', picks: PICKS });
    expect(decision).toEqual({ action: 'approve_all', approvedIndices: [0, 1, 2], timedOut: false, rawInput: null });
  });
});

describe('promptApprovalGate', () => {
  it('lists the picks and applies the answer', async () => {
    const lines: string[] = [];
    const ask = vi.fn(async () => '2');
    const gate = promptApprovalGate({ timeoutMs: 1000, timeoutAction: 'approve_all', ask, print: l => lines.push(l) });

    const decision = await gate({ strategy: 'main', date: '2024-03-15', picks: PICKS });

    expect(decision).toEqual({ action: 'approve_subset', approvedIndices: [1], timedOut: false, rawInput: '2' });
    expect(ask).toHaveBeenCalledTimes(1);
    expect(lines.slice(1, 4)).toEqual([
      '  1. AAA (50.0%) - score 3.00 from screener',
      '  2. BBB (250.00) - ',
      '  3. CCC (25.0%) - cluster buy',
    ]);
  });

  it('applies the timeout action when nobody answers', async () => {
    const gate = promptApprovalGate({
      timeoutMs: 20,
      timeoutAction: 'reject_all',
      ask: () => new Promise<string>(() => undefined),
      print: () => undefined,
    });

    const decision = await gate({ strategy: 'main', date: '2024-03-15', picks: PICKS });

    expect(decision).toEqual({ action: 'reject_all', approvedIndices: [], timedOut: true, rawInput: null });
  });

  it('gives up when the cycle is aborted', async () => {
    const controller = new AbortController();
    const gate = promptApprovalGate({
      timeoutMs: 1000,
      timeoutAction: 'approve_all',
      ask: () => new Promise<string>(() => undefined),
      print: () => undefined,
    });
    setTimeout(() => controller.abort(), 10);

    await expect(
      gate({ strategy: 'main', date: '2024-03-15', picks: PICKS, signal: controller.signal })
    ).rejects.toBeInstanceOf(CycleAbortedError);
  });

  it('does not ask about an empty pick list', async () => {
    const ask = vi.fn(async () => 'r');
    const gate = promptApprovalGate({ timeoutMs: 1000, timeoutAction: 'reject_all', ask, print: () => undefined });

    const decision = await gate({ strategy: 'main', date: '2024-03-15', picks: [] });

    expect(decision.action).toBe('approve_all');
    expect(ask).not.toHaveBeenCalled();
  });
});
