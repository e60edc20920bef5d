import { Router } from 'express';
import { asyncHandler, controlLimiter, requireAuth, schemas, validate } from '../middleware';
import { traderContextManager } from '../services/trader-context';

const router = Router();

/**
 * POST /api/sell-checks/run
 * Evaluate exit rules; `execute: true` also submits the sells
 */
router.post(
  '/run',
  controlLimiter,
  requireAuth,
  asyncHandler(async (req, res) => {
    const { date, execute } = validate(schemas.sellChecksRun, req.body);
    const ctx = traderContextManager.getContext();

    const result = await ctx.sellChecks.run({ today: date, execute });

    res.json({ success: true, data: result });
  })
);

export default router;
