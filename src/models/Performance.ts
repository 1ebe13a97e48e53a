import { PeriodUnit } from '@/constants/analysis';

/**
 * Calendar lookback, e.g. { label: '3m', unit: 'month', count: 3 }
 */
export interface PeriodDefinition {
  label: string;
  unit: PeriodUnit;
  count: number;
}

/**
 * Simple returns as fractions (0.05 = +5%)
 * Null when the series does not reach back to the period boundary
 */
export interface PerformanceRecord {
  ticker: string;
  period: string;
  assetReturn: number | null;
  benchmarkReturn: number | null;
  relativeReturn: number | null;
  startDate: Date | null;
  endDate: Date;
}
