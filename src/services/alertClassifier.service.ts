import { ALERT_TIERS, AlertTier, ZSCORE_STATUS } from '@/constants/analysis';
import { AlertRecord, PerformanceRecord, TechnicalIndicators, ZScoreRecord } from '@/models';
import { ConfigRangeError } from '@/errors';
import type {
  AlertFilters,
  AlertRules,
  AlertThresholds,
} from '@/validators/analysisConfig.validator';

type Side = 'SELL' | 'BUY';

export interface ClassificationInput {
  ticker: string;
  zScore: ZScoreRecord;
  performance: readonly PerformanceRecord[];
  indicators?: TechnicalIndicators | null;
}

/**
 * Enforce strongSell >= weakSell >= 0 >= weakBuy >= strongBuy
 *
 * @throws ConfigRangeError listing every violated rule
 */
export function assertThresholds(thresholds: AlertThresholds): void {
  const issues: string[] = [];

  for (const [name, value] of Object.entries(thresholds)) {
    if (!Number.isFinite(value)) {
      issues.push(`${name} must be a finite number`);
    }
  }

  const { strongSell, weakSell, weakBuy, strongBuy } = thresholds;
  if (!(strongSell >= weakSell)) issues.push(`strongSell (${strongSell}) must be >= weakSell (${weakSell})`);
  if (!(weakSell >= 0)) issues.push(`weakSell (${weakSell}) must be >= 0`);
  if (!(weakBuy <= 0)) issues.push(`weakBuy (${weakBuy}) must be <= 0`);
  if (!(weakBuy >= strongBuy)) issues.push(`weakBuy (${weakBuy}) must be >= strongBuy (${strongBuy})`);

  if (issues.length > 0) {
    throw new ConfigRangeError('Alert thresholds out of order', issues);
  }
}

/**
 * Alert Classifier
 * Pure, total mapping from a Z-score (plus optional confirmations) to an alert tier
 */
export class AlertClassifier {
  /**
   * Tiers are tried strongest first:
   * z >= strongSell → STRONG_SELL, z <= strongBuy → STRONG_BUY,
   * z >= weakSell → WEAK_SELL, z <= weakBuy → WEAK_BUY, otherwise NONE.
   * No-signal always maps to NONE. When filters are configured a tier also needs
   * its confirmations; a trend confirms when any of the side's periods reaches
   * the bound. Missing confirming data counts as not confirmed.
   */
  classify(input: ClassificationInput, rules: AlertRules): AlertRecord {
    const { zScore } = input;

    if (zScore.status === ZSCORE_STATUS.NO_SIGNAL) {
      return this.record(input.ticker, ALERT_TIERS.NONE, null, null);
    }

    const { z } = zScore;
    const { thresholds, filters } = rules;
    const sellConfirmed = () => this.confirms('SELL', input, filters);
    const buyConfirmed = () => this.confirms('BUY', input, filters);

    if (z >= thresholds.strongSell && sellConfirmed()) {
      return this.record(input.ticker, ALERT_TIERS.STRONG_SELL, z, thresholds.strongSell);
    }
    if (z <= thresholds.strongBuy && buyConfirmed()) {
      return this.record(input.ticker, ALERT_TIERS.STRONG_BUY, z, thresholds.strongBuy);
    }
    if (z >= thresholds.weakSell && sellConfirmed()) {
      return this.record(input.ticker, ALERT_TIERS.WEAK_SELL, z, thresholds.weakSell);
    }
    if (z <= thresholds.weakBuy && buyConfirmed()) {
      return this.record(input.ticker, ALERT_TIERS.WEAK_BUY, z, thresholds.weakBuy);
    }

    return this.record(input.ticker, ALERT_TIERS.NONE, z, null);
  }

  private confirms(side: Side, input: ClassificationInput, filters: AlertFilters | undefined): boolean {
    if (!filters) return true;

    if (filters.rsi) {
      const rsi = input.indicators?.rsi ?? null;
      if (rsi === null) return false;
      if (side === 'SELL' && rsi < filters.rsi.overbought) return false;
      if (side === 'BUY' && rsi > filters.rsi.oversold) return false;
    }

    if (filters.ma200) {
      const distance = input.indicators?.pctFromMa200 ?? null;
      if (distance === null) return false;
      if (side === 'SELL' && distance < filters.ma200.sellMin) return false;
      if (side === 'BUY' && distance > filters.ma200.buyMax) return false;
    }

    const sellTrend = filters.trend?.sell;
    if (side === 'SELL' && sellTrend) {
      return this.periodReturns(input, sellTrend.periods).some((r) => r >= sellTrend.minReturn);
    }

    const buyTrend = filters.trend?.buy;
    if (side === 'BUY' && buyTrend) {
      return this.periodReturns(input, buyTrend.periods).some((r) => r <= buyTrend.maxReturn);
    }

    return true;
  }

  /**
   * Asset returns of the listed periods that could be computed
   */
  private periodReturns(input: ClassificationInput, periods: readonly string[]): number[] {
    const returns: number[] = [];
    for (const period of periods) {
      const value = input.performance.find((p) => p.period === period)?.assetReturn ?? null;
      if (value !== null) returns.push(value);
    }
    return returns;
  }

  private record(
    ticker: string,
    tier: AlertTier,
    metricValue: number | null,
    threshold: number | null
  ): AlertRecord {
    return { ticker, tier, metricValue, threshold };
  }
}
