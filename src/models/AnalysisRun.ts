import type { AnalysisConfig } from '@/validators/analysisConfig.validator';
import { AlertTier, AssetClass, SkipScope } from '@/constants/analysis';
import { AlertRecord } from './Alert';
import { TechnicalIndicators } from './Indicators';
import { PerformanceRecord } from './Performance';
import { RebalanceResult } from './Rebalance';
import { ZScoreRecord } from './ZScore';

/**
 * One output row per analyzed asset, handed to renderers as plain data
 */
export interface AssetRow {
  ticker: string;
  assetClass: AssetClass;
  currency: string;
  latestPrice: number;
  latestTimestamp: Date;
  performance: PerformanceRecord[];
  zScore: ZScoreRecord;
  indicators: TechnicalIndicators;
  alertTier: AlertTier;
}

/**
 * Manifest entry describing something the run had to leave out
 */
export interface SkipEntry {
  ticker: string;
  scope: SkipScope;
  code: string;
  message: string;
  period?: string;
  timestamp?: Date;
}

/**
 * Everything the synchronous pipeline produces
 */
export interface AnalysisResult {
  rows: AssetRow[];
  alerts: AlertRecord[];
  rebalance: RebalanceResult;
  manifest: SkipEntry[];
}

/**
 * A completed run as stored and served by the API
 * Replaced wholesale by the next run
 */
export interface AnalysisRun extends AnalysisResult {
  runId: string;
  startedAt: Date;
  completedAt: Date;
  reportingCurrency: string;
  benchmarkTicker: string;
  config: Readonly<AnalysisConfig>;
}
