import { describe, it, expect, beforeEach } from 'vitest';
import { DecisionCycle } from './decision-cycle';
import type { DecisionCycleDeps } from './decision-cycle';
import { CadenceGate, MemoryRunMarkerStore } from './cadence-gate';
import { rankByScoreDecisionStage } from './decision-stage';
import type { DecisionStage } from './decision-stage';
import { parseApprovalInput } from './approval';
import type { ApprovalGate } from './approval';
import { ConvictionFeed, ConvictionScorer, StaticBuyEventCollector } from '../conviction';
import { SignalMerger } from '../signals/signal-merger';
import { CooldownTracker } from '../safety/cooldown-tracker';
import { MemoryCooldownStore } from '../safety/cooldown-store';
import { TradeExecutor } from '../execution/trade-executor';
import { FakeBroker } from '../testing/fake-broker';
import type { SourceFeed, StrategyConfig, TradePick } from '../types';

const TODAY = '2024-03-15';

const strategy = (overrides: Partial<StrategyConfig> = {}): StrategyConfig => ({
  name: 'main',
  accountId: 'acct-1',
  budgetPerRun: 10,
  maxPicksPerRun: 2,
  minTradeUnit: 1,
  stopLossPct: 10,
  takeProfitPct: 15,
  maxHoldDays: 5,
  ...overrides,
});

const insiderFeed = new ConvictionFeed(
  new StaticBuyEventCollector([
    {
      ticker: 'XYZ',
      insiderId: 'ceo',
      insiderTitle: 'CEO',
      deltaOwnPct: 'new',
      tradeDate: '2024-03-13',
      valueUsd: 250_000,
    },
    {
      ticker: 'XYZ',
      insiderId: 'cfo',
      insiderTitle: 'CFO',
      deltaOwnPct: 5,
      tradeDate: '2024-03-14',
      valueUsd: 80_000,
    },
  ]),
  new ConvictionScorer()
);

const screenerFeed: SourceFeed = {
  name: 'screener',
  fetch: async () => ['AAA', 'XYZ', 'BBB'].map(ticker => ({ ticker, evidence: {} })),
};

describe('DecisionCycle', () => {
  let broker: FakeBroker;
  let cooldown: CooldownTracker;
  let gate: CadenceGate;

  const build = (overrides: Partial<DecisionCycleDeps> = {}): DecisionCycle => {
    const merger = new SignalMerger(
      {
        targetCount: 25,
        sourcePriority: ['insider', 'screener'],
        enrichmentConcurrency: 2,
        enrichmentTimeoutMs: 1000,
        sourceTimeoutMs: 1000,
      },
      cooldown
    );
    return new DecisionCycle({
      feeds: [insiderFeed, screenerFeed],
      merger,
      decide: rankByScoreDecisionStage(),
      executor: new TradeExecutor(broker, cooldown),
      broker,
      gate,
      strategies: [strategy()],
      cycleTimeoutMs: 5000,
      ...overrides,
    });
  };

  beforeEach(async () => {
    broker = new FakeBroker();
    cooldown = new CooldownTracker(new MemoryCooldownStore(), 3);
    await cooldown.initialize();
    gate = new CadenceGate(new MemoryRunMarkerStore(), 1);
    await gate.initialize();
  });

  it('merges, decides and executes within budget', async () => {
    const result = await build().run({ today: TODAY });

    expect(result.status).toBe('ok');
    expect(result.candidates.map(c => c.ticker)).toEqual(['XYZ', 'AAA', 'BBB']);
    expect(result.candidates[0].score).toBeCloseTo(300 * Math.exp(-0.4) + 15 * Math.exp(-0.2), 9);

    const [report] = result.executions;
    expect(report.bought.map(r => [r.ticker, r.amountSpent])).toEqual([
      ['XYZ', 5],
      ['AAA', 5],
    ]);
    expect(report.totalSpent).toBe(10);
    expect(cooldown.getBlocked(TODAY)).toEqual(['AAA', 'XYZ']);
    expect(gate.getState()).toMatchObject({ inFlight: false, lastRunDate: TODAY });
    expect(result.approvals).toEqual([
      { strategy: 'main', action: 'approve_all', approved: ['XYZ', 'AAA'], rejected: [], timedOut: false },
    ]);
  });

  it('buys only the picks that were approved', async () => {
    const approve: ApprovalGate = async ({ picks }) => parseApprovalInput('2', picks.length);

    const result = await build({ approve }).run({ today: TODAY });

    expect(result.approvals).toEqual([
      { strategy: 'main', action: 'approve_subset', approved: ['AAA'], rejected: ['XYZ'], timedOut: false },
    ]);
    expect(result.executions[0].bought.map(r => [r.ticker, r.amountSpent])).toEqual([['AAA', 5]]);
    expect(cooldown.getBlocked(TODAY)).toEqual(['AAA']);
  });

  it('buys nothing on a rejection but still counts the run', async () => {
    const approve: ApprovalGate = async ({ picks }) => parseApprovalInput('r', picks.length);

    const result = await build({ approve }).run({ today: TODAY });

    expect(result.status).toBe('ok');
    expect(result.approvals[0]).toMatchObject({ action: 'reject_all', approved: [], rejected: ['XYZ', 'AAA'] });
    expect(result.executions[0].bought).toEqual([]);
    expect(broker.orders).toEqual([]);
    expect(gate.getState().lastRunDate).toBe(TODAY);
  });

  it('skips a strategy whose approval step fails', async () => {
    const approve: ApprovalGate = async () => {
      throw new Error('terminal closed');
    };

    const result = await build({ approve }).run({ today: TODAY });

    expect(result.status).toBe('ok');
    expect(result.approvals).toEqual([]);
    expect(result.executions).toEqual([]);
    expect(gate.getState().lastRunDate).toBeNull();
  });

  it('skips a second run on the same day and keeps cooled-down tickers out', async () => {
    const cycle = build();
    await cycle.run({ today: TODAY });

    const again = await cycle.run({ today: TODAY });
    expect(again.status).toBe('skipped');
    expect(again.reason).toBe('Only 0 trading days since last run on 2024-03-15 (minimum 1)');

    const forced = await cycle.run({ today: TODAY, force: true });
    expect(forced.status).toBe('ok');
    expect(forced.excludedByCooldown).toEqual(['XYZ', 'AAA']);
    expect(forced.executions[0].bought.map(r => r.ticker)).toEqual(['BBB']);
    expect(cycle.getLastResult()).toBe(forced);
  });

  it('reports weekends as skipped', async () => {
    const result = await build().run({ today: '2024-03-16' });

    expect(result.status).toBe('skipped');
    expect(result.reason).toBe('2024-03-16 is not a trading day');
    expect(result.executions).toEqual([]);
  });

  it('skips without committing the marker when nothing qualifies', async () => {
    const result = await build({ feeds: [] }).run({ today: TODAY });

    expect(result.status).toBe('skipped');
    expect(result.reason).toBe('no qualifying candidates');
    expect(gate.getState().lastRunDate).toBeNull();
  });

  it('reports failing sources and continues with the rest', async () => {
    const broken: SourceFeed = {
      name: 'earnings',
      fetch: async () => {
        throw new Error('calendar offline');
      },
    };

    const result = await build({ feeds: [insiderFeed, broken] }).run({ today: TODAY });

    expect(result.status).toBe('ok');
    expect(result.sourceErrors).toEqual([{ source: 'earnings', error: 'Source earnings unavailable: calendar offline' }]);
    expect(result.candidates.map(c => c.ticker)).toEqual(['XYZ']);
  });

  it('runs every strategy and skips one whose decision stage fails', async () => {
    const decide: DecisionStage = async ({ strategy: s, candidates }) => {
      if (s.name === 'broken') throw new Error('model unavailable');
      return candidates.slice(0, 1).map(
        (c, i): TradePick => ({ ticker: c.ticker, rank: i + 1, allocation: { kind: 'amount', value: 3 } })
      );
    };

    const result = await build({
      decide,
      strategies: [strategy({ name: 'broken' }), strategy({ name: 'alt', accountId: 'acct-2' })],
    }).run({ today: TODAY });

    expect(result.executions.map(e => [e.strategy, e.totalSpent])).toEqual([['alt', 3]]);
  });

  it('aborts on the hard timeout before execution without committing', async () => {
    const decide: DecisionStage = () => new Promise<TradePick[]>(() => undefined);

    const result = await build({ decide, cycleTimeoutMs: 20 }).run({ today: TODAY });

    expect(result.status).toBe('aborted');
    expect(result.reason).toBe('cycle exceeded 20ms');
    expect(result.executions).toEqual([]);
    expect(gate.getState()).toMatchObject({ inFlight: false, lastRunDate: null });
  });

  it('keeps partial execution results and the marker when aborted mid-order', async () => {
    broker.hangOnSubmit = true;

    const result = await build({ cycleTimeoutMs: 20 }).run({ today: TODAY });

    expect(result.status).toBe('aborted');
    expect(result.executions).toHaveLength(1);
    expect(result.executions[0].failed.map(r => r.error)).toEqual(['aborted while order pending']);
    expect(cooldown.getBlocked(TODAY)).toEqual([]);
    expect(gate.getState().lastRunDate).toBe(TODAY);
  });
});
