import { AlertTier } from '@/constants/analysis';

/**
 * Classifier output for one asset
 * metricValue is the z that was evaluated (null for no-signal),
 * threshold the boundary that fired (null for NONE)
 */
export interface AlertRecord {
  ticker: string;
  tier: AlertTier;
  metricValue: number | null;
  threshold: number | null;
}
