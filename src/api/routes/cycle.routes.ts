import { Router } from 'express';
import { asyncHandler, controlLimiter, requireAuth, schemas, validate } from '../middleware';
import { traderContextManager } from '../services/trader-context';

const router = Router();

/**
 * POST /api/cycle/run
 * Run one decision cycle now. Skips and timeouts are reported in the body,
 * not as HTTP errors.
 */
router.post(
  '/run',
  controlLimiter,
  requireAuth,
  asyncHandler(async (req, res) => {
    const { date, force } = validate(schemas.cycleRun, req.body);
    const ctx = traderContextManager.getContext();

    const result = await ctx.cycle.run({ today: date, force });

    res.json({ success: true, data: result });
  })
);

/**
 * GET /api/cycle/last
 * Full result of the most recent cycle in this process
 */
router.get(
  '/last',
  asyncHandler(async (req, res) => {
    const ctx = traderContextManager.getContext();
    res.json({ success: true, data: ctx.cycle.getLastResult() });
  })
);

export default router;
