import { Router } from 'express';
import { asyncHandler, controlLimiter, requireAuth, schemas, validate } from '../middleware';
import { traderContextManager } from '../services/trader-context';
import { todayIso } from '../../utils/dates';

const router = Router();

/**
 * GET /api/cooldown?date=YYYY-MM-DD&blockedOnly=true
 */
router.get(
  '/',
  asyncHandler(async (req, res) => {
    const query = validate(schemas.dateQuery, req.query);
    const today = query.date ?? todayIso();
    const ctx = traderContextManager.getContext();

    // the CLI may have bought since this process last looked
    await ctx.cooldown.refresh();
    const entries = ctx.cooldown.getEntries(today);

    res.json({
      success: true,
      data: {
        date: today,
        entries: query.blockedOnly ? entries.filter(e => e.blocked) : entries,
        stats: ctx.cooldown.getStats(today),
      },
    });
  })
);

/**
 * POST /api/cooldown
 * Record a buy made outside the executor so the ticker cools down too
 */
router.post(
  '/',
  controlLimiter,
  requireAuth,
  asyncHandler(async (req, res) => {
    const { ticker, date } = validate(schemas.cooldownCreate, req.body);
    const today = date ?? todayIso();
    const ctx = traderContextManager.getContext();

    await ctx.cooldown.record(ticker, today);
    const entry = ctx.cooldown.getEntries(today).find(e => e.ticker === ticker) ?? null;

    res.status(201).json({ success: true, data: entry });
  })
);

export default router;
