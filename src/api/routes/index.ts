import { Router } from 'express';
import analysisRoutes from './analysis.routes';
import { getMetrics } from '@/api/controllers/metrics.controller';

const router = Router();

/**
 * API Routes
 * Base path: /api
 *
 * Versioned under /api/v1/*; health and metrics stay unversioned (infrastructure, not API)
 */

router.get('/health', (_req, res) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    service: 'asset-valuation-api',
    version: 'v1',
  });
});

// Prometheus-format metrics for monitoring tools
router.get('/metrics', getMetrics);

const v1Router = Router();

v1Router.use('/analysis', analysisRoutes);

router.use('/v1', v1Router);

export default router;
