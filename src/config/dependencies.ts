/**
 * Dependency Container
 * Instantiates and wires all repositories and services
 *
 * This is the single source of truth for dependency injection.
 * All concrete implementations are created here and injected into services.
 */

import { env } from '@/config/env';
import { metrics } from '@/adapters/metrics/MetricsFactory';

// Repository implementations
import { PriceHistoryRepository } from '@/repositories/priceHistory.repository';
import { AnalysisRunRepository } from '@/repositories/analysisRun.repository';

// Service implementations
import { AnalysisService } from '@/services/analysis.service';

// ============================================================================
// REPOSITORIES
// ============================================================================

export const priceHistoryRepository = new PriceHistoryRepository();
export const analysisRunRepository = new AnalysisRunRepository();

// ============================================================================
// SERVICES
// ============================================================================

/**
 * Analysis Service
 * Runs the valuation pipeline and serves the latest run
 */
export const analysisService = new AnalysisService(
  priceHistoryRepository,
  analysisRunRepository,
  metrics,
  {
    reportingCurrency: env.REPORTING_CURRENCY,
    benchmarkTicker: env.BENCHMARK_TICKER,
    benchmarkCurrency: env.BENCHMARK_CURRENCY,
    historyLookbackDays: env.HISTORY_LOOKBACK_DAYS,
    topN: env.REBALANCE_TOP_N,
  }
);
