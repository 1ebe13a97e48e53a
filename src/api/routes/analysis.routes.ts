import { Router } from 'express';
import * as analysisController from '@/controllers/analysis.controller';
import { analysisRunRateLimiter } from '@/middlewares/rateLimiter';

const router = Router();

/**
 * POST /api/v1/analysis/runs
 * Trigger an analysis run (stricter rate limiting)
 */
router.post('/runs', analysisRunRateLimiter, analysisController.createRun);

/**
 * GET /api/v1/analysis/runs/latest
 */
router.get('/runs/latest', analysisController.getLatestRun);

/**
 * GET /api/v1/analysis/runs/latest/alerts?tier=
 */
router.get('/runs/latest/alerts', analysisController.getLatestAlerts);

/**
 * GET /api/v1/analysis/runs/latest/rebalance
 */
router.get('/runs/latest/rebalance', analysisController.getLatestRebalance);

export default router;
