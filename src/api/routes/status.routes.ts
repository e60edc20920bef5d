import { Router } from 'express';
import { asyncHandler } from '../middleware';
import { traderContextManager } from '../services/trader-context';
import { todayIso } from '../../utils/dates';

const router = Router();

/**
 * GET /api/status
 * Cadence gate, last results and cooldown summary
 */
router.get(
  '/',
  asyncHandler(async (req, res) => {
    const ctx = traderContextManager.getContext();
    const today = todayIso();
    const lastCycle = ctx.cycle.getLastResult();
    const lastSellCheck = ctx.sellChecks.getLastResult();

    res.json({
      success: true,
      data: {
        uptime: Math.floor((Date.now() - ctx.startTime.getTime()) / 1000), // seconds
        today,
        gate: ctx.gate.getState(),
        cooldown: ctx.cooldown.getStats(today),
        strategies: ctx.settings.strategies.map(s => ({
          name: s.name,
          accountId: s.accountId,
          budgetPerRun: s.budgetPerRun,
          maxPicksPerRun: s.maxPicksPerRun,
        })),
        lastCycle: lastCycle
          ? {
              status: lastCycle.status,
              date: lastCycle.date,
              reason: lastCycle.reason,
              candidates: lastCycle.candidates.length,
              totalSpent: lastCycle.executions.reduce((sum, e) => sum + e.totalSpent, 0),
              finishedAt: lastCycle.finishedAt,
            }
          : null,
        lastSellCheck: lastSellCheck
          ? { date: lastSellCheck.date, signals: lastSellCheck.signals.length }
          : null,
      },
    });
  })
);

export default router;
