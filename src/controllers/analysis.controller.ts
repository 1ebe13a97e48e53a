import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { analysisService } from '@/config/dependencies';
import { ALERT_TIERS } from '@/constants/analysis';
import { parseAnalysisOverrides } from '@/validators/analysisConfig.validator';
import { ValidationError } from '@/errors';

/**
 * Analysis Controller
 * Handles HTTP requests for analysis run endpoints
 */

const alertsQuerySchema = z.object({
  tier: z.nativeEnum(ALERT_TIERS).optional(),
});

/**
 * POST /api/v1/analysis/runs
 * Trigger a run; the body holds optional configuration overrides
 */
export async function createRun(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const overrides = parseAnalysisOverrides(req.body);
    const run = await analysisService.runAnalysis(overrides);

    res.status(201).json({ success: true, run });
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/analysis/runs/latest
 */
export async function getLatestRun(_req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const run = await analysisService.getLatestRun();
    res.json({ success: true, run });
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/analysis/runs/latest/alerts?tier=STRONG_SELL
 * Actionable alerts of the latest run, or only the requested tier
 */
export async function getLatestAlerts(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const validationResult = alertsQuerySchema.safeParse(req.query);
    if (!validationResult.success) {
      throw new ValidationError('Invalid alert filter', validationResult.error.flatten());
    }

    const response = await analysisService.getLatestAlerts(validationResult.data.tier);
    res.json({ success: true, ...response });
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/analysis/runs/latest/rebalance
 */
export async function getLatestRebalance(_req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const response = await analysisService.getLatestRebalance();
    res.json({ success: true, ...response });
  } catch (error) {
    next(error);
  }
}
