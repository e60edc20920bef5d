import { describe, it, expect, beforeEach } from 'vitest';
import { SellCheckRunner } from './sell-check-runner';
import { FakeBroker } from '../testing/fake-broker';
import type { Position, StrategyConfig } from '../types';

const TODAY = '2024-03-15';

const STRATEGY: StrategyConfig = {
  name: 'main',
  accountId: 'acct-1',
  budgetPerRun: 100,
  maxPicksPerRun: 3,
  minTradeUnit: 1,
  stopLossPct: 10,
  takeProfitPct: 15,
  maxHoldDays: 5,
};

const position = (ticker: string, averagePrice: number, quantity: number, openDate: string): Position => ({
  ticker,
  averagePrice,
  quantity,
  openDate,
  accountId: 'acct-1',
});

describe('SellCheckRunner', () => {
  let broker: FakeBroker;

  beforeEach(() => {
    broker = new FakeBroker();
    broker.untradable.add('DDD');
    broker.positions.set('acct-1', [
      position('AAA', 12, 3, '2024-03-14'),
      position('BBB', 10, 5, '2024-03-13'),
      position('CCC', 8, 2, '2024-03-14'),
      position('DDD', 20, 1, '2024-03-01'),
      position('EEE', 10, 1, '2024-03-01'),
    ]);
  });

  it('reports one signal per triggered position without trading', async () => {
    const result = await new SellCheckRunner(broker, [STRATEGY]).run({ today: TODAY });

    expect(result.signals.map(s => [s.ticker, s.rule, s.reasoning])).toEqual([
      ['AAA', 'stop_loss', 'Stop-loss: -16.7% (threshold: -10%)'],
      ['CCC', 'take_profit', 'Take-profit: +25.0% (threshold: +15%)'],
      ['EEE', 'hold_period', 'Hold-period: 14 days (max: 5)'],
    ]);
    expect(result.signals[0].metrics.returnPct).toBe(-16.67);
    expect(result.executions.map(e => e.status)).toEqual(['not_executed', 'not_executed', 'not_executed']);
    expect(broker.sells).toEqual([]);
  });

  it('submits sells for the full position when asked to execute', async () => {
    broker.rejected.add('CCC.X');

    const runner = new SellCheckRunner(broker, [STRATEGY]);
    const result = await runner.run({ today: TODAY, execute: true });

    expect(result.executions.map(e => [e.signal.ticker, e.status, e.error])).toEqual([
      ['AAA', 'submitted', null],
      ['CCC', 'failed', 'Order for CCC.X rejected: market closed'],
      ['EEE', 'submitted', null],
    ]);
    expect(broker.sells.map(o => [o.venueSymbol, o.quantity])).toEqual([
      ['AAA.X', 3],
      ['CCC.X', 2],
      ['EEE.X', 1],
    ]);
    expect(runner.getLastResult()).toBe(result);
  });

  it('keeps checking other strategies when one account is unreachable', async () => {
    class FlakyBroker extends FakeBroker {
      async getPositions(accountId: string): Promise<Position[]> {
        if (accountId === 'acct-down') throw new Error('account service unavailable');
        return super.getPositions(accountId);
      }
    }
    const flaky = new FlakyBroker();
    flaky.positions.set('acct-1', [position('AAA', 12, 3, '2024-03-14')]);

    const result = await new SellCheckRunner(flaky, [
      { ...STRATEGY, name: 'down', accountId: 'acct-down' },
      STRATEGY,
    ]).run({ today: TODAY });

    expect(result.signals.map(s => s.ticker)).toEqual(['AAA']);
  });
});
