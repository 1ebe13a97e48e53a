import Decimal from 'decimal.js';
import { REBALANCE_ACTIONS } from '@/constants/analysis';
import {
  AssetMetrics,
  RebalancePair,
  RebalanceRecommendation,
  RebalanceResult,
} from '@/models';
import type { RebalanceConstraints } from '@/validators/analysisConfig.validator';

interface RankedAsset {
  ticker: string;
  compositeScore: number;
}

/**
 * Rebalance Selector
 * Ranks assets by a weighted composite and picks Top-N increase / decrease candidates
 */
export class RebalanceSelector {
  /**
   * Composite = weights.zScore * z + weights.relativePerformance * relativeReturn
   * Higher composite = more overvalued.
   *
   * Eligible assets (class not excluded, every weighted input present) are ranked by
   * ascending composite, ties broken by ticker; rank 1 is the most attractive.
   * Ranks 1..N become INCREASE, the last N DECREASE, everything else HOLD.
   * N shrinks to floor(eligible / 2) when there are not enough eligible assets.
   */
  select(
    metrics: readonly AssetMetrics[],
    topN: number,
    constraints: RebalanceConstraints
  ): RebalanceResult {
    const ranked: RankedAsset[] = [];
    const excluded: string[] = [];

    for (const asset of metrics) {
      const score = this.compositeScore(asset, constraints);
      if (score === null || constraints.excludedAssetClasses.includes(asset.assetClass)) {
        excluded.push(asset.ticker);
      } else {
        ranked.push({ ticker: asset.ticker, compositeScore: score });
      }
    }

    ranked.sort(
      (a, b) =>
        a.compositeScore - b.compositeScore || (a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0)
    );

    const effectiveTopN = Math.max(0, Math.min(Math.floor(topN), Math.floor(ranked.length / 2)));
    const step = new Decimal(constraints.weightStep);

    const recommendations: RebalanceRecommendation[] = ranked.map((asset, index) => {
      const rank = index + 1;
      if (index < effectiveTopN) {
        return this.recommendation(asset, REBALANCE_ACTIONS.INCREASE, rank, step.toNumber());
      }
      if (index >= ranked.length - effectiveTopN) {
        return this.recommendation(asset, REBALANCE_ACTIONS.DECREASE, rank, step.negated().toNumber());
      }
      return this.recommendation(asset, REBALANCE_ACTIONS.HOLD, rank, 0);
    });

    for (const ticker of [...excluded].sort()) {
      recommendations.push({
        ticker,
        action: REBALANCE_ACTIONS.HOLD,
        rank: null,
        compositeScore: null,
        targetWeightDelta: 0,
      });
    }

    return {
      requestedTopN: topN,
      effectiveTopN,
      recommendations,
      pairs: this.pairTrades(ranked, effectiveTopN),
    };
  }

  /**
   * i-th most overvalued paired with i-th most undervalued
   */
  private pairTrades(ranked: readonly RankedAsset[], count: number): RebalancePair[] {
    const pairs: RebalancePair[] = [];

    for (let i = 0; i < count; i++) {
      const expensive = ranked[ranked.length - 1 - i];
      const cheap = ranked[i];
      if (!expensive || !cheap) break;

      pairs.push({
        decrease: expensive.ticker,
        increase: cheap.ticker,
        spread: new Decimal(expensive.compositeScore).minus(cheap.compositeScore).toNumber(),
      });
    }

    return pairs;
  }

  /**
   * Null when a weighted input is missing (no-signal z, no relative return)
   */
  private compositeScore(asset: AssetMetrics, constraints: RebalanceConstraints): number | null {
    const { zScore: zWeight, relativePerformance: performanceWeight } = constraints.weights;

    if (asset.zScore === null) return null;
    if (performanceWeight !== 0 && asset.relativeReturn === null) return null;

    let score = new Decimal(zWeight).times(asset.zScore);
    if (performanceWeight !== 0 && asset.relativeReturn !== null) {
      score = score.plus(new Decimal(performanceWeight).times(asset.relativeReturn));
    }
    return score.toNumber();
  }

  private recommendation(
    asset: RankedAsset,
    action: RebalanceRecommendation['action'],
    rank: number,
    targetWeightDelta: number
  ): RebalanceRecommendation {
    return {
      ticker: asset.ticker,
      action,
      rank,
      compositeScore: asset.compositeScore,
      targetWeightDelta,
    };
  }
}
