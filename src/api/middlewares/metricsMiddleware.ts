/**
 * HTTP Metrics Middleware
 *
 * Tracks per request:
 * - http.requests{method,path,status} (counter)
 * - http.request_duration{method,path} (timing, ms)
 */

import { Request, Response, NextFunction } from 'express';
import { IMetrics } from '@/interfaces/IMetrics';

/**
 * Normalize path to avoid cardinality explosion
 * - /api/v1/analysis/runs/3f2c...-uuid -> /api/v1/analysis/runs/:uuid
 */
export function normalizePath(path: string): string {
  return path
    .replace(/\/[a-f0-9]{8}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{12}/gi, '/:uuid')
    .replace(/\/\d+/g, '/:id');
}

export function createMetricsMiddleware(metrics: IMetrics) {
  return function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
    const path = normalizePath(req.path || req.url);

    // Skip infrastructure endpoints to avoid noise
    if (path === '/api/metrics' || path === '/api/health') {
      next();
      return;
    }

    const startTime = Date.now();

    res.on('finish', () => {
      metrics.incrementCounter('http.requests', 1, {
        method: req.method,
        path,
        status: res.statusCode,
      });
      metrics.recordHistogram('http.request_duration', Date.now() - startTime, {
        method: req.method,
        path,
      });
    });

    next();
  };
}
