import { AssetClass, RebalanceAction } from '@/constants/analysis';

/**
 * Per-asset inputs to the rebalance ranking
 */
export interface AssetMetrics {
  ticker: string;
  assetClass: AssetClass;
  zScore: number | null;
  relativeReturn: number | null;
}

/**
 * rank 1 = most attractive (lowest composite score)
 * rank and compositeScore are null for assets left out of the ranking
 */
export interface RebalanceRecommendation {
  ticker: string;
  action: RebalanceAction;
  rank: number | null;
  compositeScore: number | null;
  targetWeightDelta: number;
}

/**
 * Sell-the-expensive / buy-the-cheap pairing
 */
export interface RebalancePair {
  decrease: string;
  increase: string;
  spread: number;
}

export interface RebalanceResult {
  requestedTopN: number;
  effectiveTopN: number;
  recommendations: RebalanceRecommendation[];
  pairs: RebalancePair[];
}
