import { Router } from 'express';
import statusRoutes from './status.routes';
import cycleRoutes from './cycle.routes';
import sellChecksRoutes from './sell-checks.routes';
import cooldownRoutes from './cooldown.routes';

const router = Router();

router.use('/status', statusRoutes);
router.use('/cycle', cycleRoutes);
router.use('/sell-checks', sellChecksRoutes);
router.use('/cooldown', cooldownRoutes);

export default router;
