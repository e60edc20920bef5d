import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import axios, { AxiosInstance } from 'axios';
import { APIServer } from './server';
import { traderContextManager } from './services/trader-context';
import { loadSettings } from '../config/settings';
import { CooldownTracker, MemoryCooldownStore } from '../safety';
import { SignalMerger } from '../signals';
import { TradeExecutor } from '../execution';
import {
  CadenceGate,
  DecisionCycle,
  MemoryRunMarkerStore,
  SellCheckRunner,
  rankByScoreDecisionStage,
} from '../orchestrator';
import { FakeBroker } from '../testing/fake-broker';
import type { SourceFeed } from '../types';

const TODAY = '2024-03-15';

describe('APIServer', () => {
  let server: APIServer;
  let client: AxiosInstance;
  let cooldown: CooldownTracker;

  beforeAll(async () => {
    process.env.API_KEY = 'test-secret';

    const settings = loadSettings({});
    const broker = new FakeBroker();
    broker.positions.set('default', [
      { ticker: 'AAA', quantity: 2, averagePrice: 12, openDate: '2024-03-14', accountId: 'default' },
    ]);

    cooldown = new CooldownTracker(new MemoryCooldownStore(), 3);
    await cooldown.initialize();
    const gate = new CadenceGate(new MemoryRunMarkerStore(), 1);
    await gate.initialize();

    const screener: SourceFeed = {
      name: 'screener',
      fetch: async () => [
        { ticker: 'ACME', evidence: {} },
        { ticker: 'BOLT', evidence: {} },
      ],
    };

    traderContextManager.initialize({
      settings,
      broker,
      cooldown,
      gate,
      cycle: new DecisionCycle({
        feeds: [screener],
        merger: new SignalMerger(settings.merger, cooldown),
        decide: rankByScoreDecisionStage(),
        executor: new TradeExecutor(broker, cooldown),
        broker,
        gate,
        strategies: settings.strategies,
        cycleTimeoutMs: 5000,
      }),
      sellChecks: new SellCheckRunner(broker, settings.strategies),
      startTime: new Date(),
    });

    server = new APIServer(0);
    await server.start();
    client = axios.create({
      baseURL: `http://127.0.0.1:${server.getPort()}`,
      validateStatus: () => true,
    });
  });

  afterAll(async () => {
    await server.stop();
    delete process.env.API_KEY;
  });

  const auth = { headers: { 'X-API-Key': 'test-secret' } };

  it('answers health checks', async () => {
    const res = await client.get('/health');

    expect(res.status).toBe(200);
    expect(res.data).toMatchObject({ success: true, status: 'healthy' });
  });

  it('requires an API key to run a cycle', async () => {
    const missing = await client.post('/api/cycle/run', { date: TODAY });
    expect(missing.status).toBe(401);
    expect(missing.data.code).toBe('AUTH_REQUIRED');

    const wrong = await client.post('/api/cycle/run', { date: TODAY }, { headers: { Authorization: 'Bearer nope' } });
    expect(wrong.status).toBe(401);
    expect(wrong.data.code).toBe('INVALID_API_KEY');
  });

  it('ignores keys in the query string and closes routes when no key is configured', async () => {
    const inQuery = await client.post('/api/cycle/run?apiKey=test-secret', { date: TODAY });
    expect(inQuery.status).toBe(401);
    expect(inQuery.data.code).toBe('AUTH_REQUIRED');

    delete process.env.API_KEY;
    try {
      const closed = await client.post('/api/cycle/run', { date: TODAY }, auth);
      expect(closed.status).toBe(401);
      expect(closed.data.code).toBe('INVALID_API_KEY');
    } finally {
      process.env.API_KEY = 'test-secret';
    }
  });

  it('rejects malformed input', async () => {
    const res = await client.post('/api/cycle/run', { date: '15/03/2024' }, auth);

    expect(res.status).toBe(400);
    expect(res.data).toMatchObject({
      success: false,
      code: 'VALIDATION_ERROR',
      error: 'date: Expected a date as YYYY-MM-DD',
    });
  });

  it('runs a cycle and exposes the resulting cooldowns', async () => {
    const run = await client.post('/api/cycle/run', { date: TODAY }, auth);

    expect(run.status).toBe(200);
    expect(run.data.data.status).toBe('ok');
    expect(run.data.data.executions[0].totalSpent).toBe(10);

    const list = await client.get('/api/cooldown', { params: { date: TODAY, blockedOnly: 'true' } });
    expect(list.status).toBe(200);
    expect(list.data.data.entries.map((e: { ticker: string }) => e.ticker)).toEqual(['ACME', 'BOLT']);

    const status = await client.get('/api/status');
    expect(status.data.data.gate.lastRunDate).toBe(TODAY);
    expect(status.data.data.lastCycle).toMatchObject({ status: 'ok', date: TODAY, candidates: 2, totalSpent: 10 });
  });

  it('records manual cooldown entries', async () => {
    const res = await client.post('/api/cooldown', { ticker: ' $cove ', date: TODAY }, auth);

    expect(res.status).toBe(201);
    expect(res.data.data).toEqual({ ticker: 'COVE', lastBuyDate: TODAY, blocked: true, daysRemaining: 3 });
    expect(cooldown.isBlocked('COVE', TODAY)).toBe(true);
  });

  it('reports sell signals without trading by default', async () => {
    const res = await client.post('/api/sell-checks/run', { date: TODAY }, auth);

    expect(res.status).toBe(200);
    expect(res.data.data.signals).toHaveLength(1);
    expect(res.data.data.signals[0]).toMatchObject({ ticker: 'AAA', rule: 'stop_loss' });
    expect(res.data.data.executions[0].status).toBe('not_executed');
  });

  it('answers unknown routes with 404', async () => {
    const res = await client.get('/api/unknown');

    expect(res.status).toBe(404);
    expect(res.data.code).toBe('ROUTE_NOT_FOUND');
  });
});
