import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { env } from '@/config/env';
import { requestLogger } from '@/middlewares/requestLogger';
import { logger } from '@/adapters/logging/LoggerFactory';
import { metrics } from '@/adapters/metrics/MetricsFactory';
import { errorHandler } from '@/middlewares/errorHandler';
import { notFoundHandler } from '@/middlewares/notFound';
import { globalRateLimiter } from '@/middlewares/rateLimiter';
import { createMetricsMiddleware } from '@/api/middlewares/metricsMiddleware';
import apiRoutes from '@/api/routes';

/**
 * Express Application Setup
 * Configures middleware, routes, and error handlers
 */

const app: Application = express();

// ============================================
// Middleware Configuration
// ============================================

// One reverse proxy hop (ALB / Nginx) in front of the API
app.set('trust proxy', 1);

app.use(helmet());

// API is not meant to be called from browsers in production
app.use(
  cors({
    origin: env.NODE_ENV === 'production' ? false : '*',
    credentials: false,
  })
);

// Override bodies are small; the limit leaves room for custom periods and ranges
app.use(express.json({ limit: '32kb' }));

app.use(createMetricsMiddleware(metrics));

app.use(globalRateLimiter);

app.use(requestLogger);

// ============================================
// Routes
// ============================================

function isOpenApiDocument(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && 'openapi' in value;
}

try {
  const openapiPath = join(__dirname, '../docs/openapi.yaml');
  const openapiDocument = yaml.load(readFileSync(openapiPath, 'utf8'));
  if (isOpenApiDocument(openapiDocument)) {
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(openapiDocument));
  } else {
    logger.warn({ path: openapiPath }, 'OpenAPI file is not an OpenAPI document');
  }
} catch (error) {
  logger.warn({ error }, 'Could not load OpenAPI documentation');
}

app.use('/api', apiRoutes);

app.get('/', (_req, res) => {
  res.json({
    name: 'Asset Valuation API',
    version: '1.0.0',
    description: 'Multi-currency valuation analytics: returns, Z-score alerts and rebalancing',
    documentation: '/api-docs',
    endpoints: {
      health: '/api/health',
      metrics: '/api/metrics',
      runs: 'POST /api/v1/analysis/runs',
      latest: '/api/v1/analysis/runs/latest',
      alerts: '/api/v1/analysis/runs/latest/alerts?tier=',
      rebalance: '/api/v1/analysis/runs/latest/rebalance',
    },
  });
});

// ============================================
// Error Handlers
// ============================================

// 404 handler (must be after all routes)
app.use(notFoundHandler);

// Global error handler (must be last)
app.use(errorHandler);

export default app;
