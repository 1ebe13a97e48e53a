import { NoSignalReason, ZSCORE_STATUS } from '@/constants/analysis';

interface ZScoreBase {
  ticker: string;
  asOf: Date;
  sampleSize: number;
}

export interface ZScoreSignal extends ZScoreBase {
  status: typeof ZSCORE_STATUS.SIGNAL;
  z: number;
  mean: number;
  standardDeviation: number;
}

/**
 * Degenerate or too-short window: reported instead of a numeric z
 * mean/standardDeviation are still filled when at least one sample exists
 */
export interface ZScoreNoSignal extends ZScoreBase {
  status: typeof ZSCORE_STATUS.NO_SIGNAL;
  z: null;
  mean: number | null;
  standardDeviation: number | null;
  reason: NoSignalReason;
}

export type ZScoreRecord = ZScoreSignal | ZScoreNoSignal;
