import {
  ASSET_CLASSES,
  FX_FAILURE_POLICIES,
  SKIP_SCOPES,
  SkipScope,
  ZSCORE_STATUS,
} from '@/constants/analysis';
import {
  AlertRecord,
  AnalysisResult,
  Asset,
  AssetMetrics,
  AssetRow,
  FxRateBook,
  FxRateSeries,
  NormalizedObservation,
  SkipEntry,
  ZScoreRecord,
} from '@/models';
import { AppError, InsufficientHistoryError, InvalidSeriesError } from '@/errors';
import { ILogger } from '@/interfaces/ILogger';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { findOrderingViolation } from '@/utils/timeSeries';
import type { AnalysisConfig } from '@/validators/analysisConfig.validator';
import { CurrencyConverter } from './currencyConverter.service';
import { PerformanceCalculator } from './performance.service';
import { ZScoreEngine } from './zscore.service';
import { IndicatorCalculator } from './indicators.service';
import { AlertClassifier, assertThresholds } from './alertClassifier.service';
import { RebalanceSelector } from './rebalanceSelector.service';

export interface PipelineInput {
  assets: readonly Asset[];
  fxRates: readonly FxRateSeries[];
  benchmark: Asset | null;
}

interface AssetAnalysis {
  row: AssetRow;
  alert: AlertRecord;
  metrics: AssetMetrics;
}

/**
 * Result slot for one asset: the analysis (null when skipped) and what was left out
 */
interface AssetOutcome {
  analysis: AssetAnalysis | null;
  skips: SkipEntry[];
}

export interface PipelineComponents {
  converter: CurrencyConverter;
  performance: PerformanceCalculator;
  zScores: ZScoreEngine;
  indicators: IndicatorCalculator;
  classifier: AlertClassifier;
  selector: RebalanceSelector;
}

function skipEntry(
  ticker: string,
  scope: SkipScope,
  error: AppError,
  extra: Pick<SkipEntry, 'period' | 'timestamp'> = {}
): SkipEntry {
  return { ticker, scope, code: error.code, message: error.message, ...extra };
}

/**
 * Analysis Pipeline
 *
 * Synchronous run over fully loaded inputs:
 * FX validation → normalization → performance → Z-score → indicators → alert → rebalance.
 * Each asset is analyzed in isolation into its own pre-allocated slot; per-asset
 * data problems end up in the manifest and never abort the run.
 */
export class AnalysisPipeline {
  private readonly components: PipelineComponents;

  constructor(
    components: Partial<PipelineComponents> = {},
    private readonly logger: ILogger = createLogger('AnalysisPipeline')
  ) {
    this.components = {
      converter: components.converter ?? new CurrencyConverter(),
      performance: components.performance ?? new PerformanceCalculator(),
      zScores: components.zScores ?? new ZScoreEngine(),
      indicators: components.indicators ?? new IndicatorCalculator(),
      classifier: components.classifier ?? new AlertClassifier(),
      selector: components.selector ?? new RebalanceSelector(),
    };
  }

  /**
   * @throws ConfigRangeError before any asset is touched when thresholds are out of order
   */
  run(input: PipelineInput, config: Readonly<AnalysisConfig>): AnalysisResult {
    assertThresholds(config.alerts.thresholds);

    const book = this.components.converter.buildRateBook(input.fxRates, config.fx);
    const benchmark = this.normalizeBenchmark(input.benchmark, book, config);

    // One slot per asset, filled by index
    const slots: AssetOutcome[] = new Array<AssetOutcome>(input.assets.length);
    input.assets.forEach((asset, index) => {
      slots[index] = this.analyzeAsset(asset, book, benchmark.series, config);
    });

    const analyses: AssetAnalysis[] = [];
    const manifest: SkipEntry[] = [...benchmark.skips];
    for (const slot of slots) {
      if (slot.analysis) analyses.push(slot.analysis);
      manifest.push(...slot.skips);
    }

    analyses.sort((a, b) => this.compareRows(a.row, b.row));

    const rebalance = this.components.selector.select(
      analyses.map((a) => a.metrics),
      config.rebalance.topN,
      config.rebalance
    );

    this.logger.debug(
      {
        assets: input.assets.length,
        analyzed: analyses.length,
        manifestEntries: manifest.length,
        effectiveTopN: rebalance.effectiveTopN,
      },
      'Analysis pipeline completed'
    );

    return {
      rows: analyses.map((a) => a.row),
      alerts: analyses.map((a) => a.alert),
      rebalance,
      manifest,
    };
  }

  private analyzeAsset(
    asset: Asset,
    book: FxRateBook,
    benchmark: readonly NormalizedObservation[],
    config: Readonly<AnalysisConfig>
  ): AssetOutcome {
    const { ticker } = asset;

    const integrityError = this.checkIntegrity(asset);
    if (integrityError) {
      return this.skipAsset(ticker, integrityError);
    }

    if (asset.observations.length < config.minObservations) {
      return this.skipAsset(
        ticker,
        new InsufficientHistoryError(
          ticker,
          null,
          `${ticker} has ${asset.observations.length} observations, at least ${config.minObservations} required`
        )
      );
    }

    // FX pairs are scored on their raw quote, never converted by their own rate
    const targetCurrency =
      asset.assetClass === ASSET_CLASSES.FX ? asset.currency : config.reportingCurrency;
    const conversion = this.components.converter.convert(asset, book, targetCurrency);
    const skips: SkipEntry[] = [];
    const [firstRejection] = conversion.rejections;

    if (firstRejection) {
      if (config.fx.failurePolicy === FX_FAILURE_POLICIES.SKIP_ASSET) {
        return this.skipAsset(ticker, firstRejection);
      }
      for (const rejection of conversion.rejections) {
        skips.push(skipEntry(ticker, SKIP_SCOPES.OBSERVATION, rejection, { timestamp: rejection.timestamp }));
      }
    }

    const normalized = conversion.observations;
    const latest = normalized[normalized.length - 1];
    if (!latest || normalized.length < config.minObservations) {
      const outcome = this.skipAsset(
        ticker,
        firstRejection ??
          new InsufficientHistoryError(ticker, null, `${ticker} has no convertible observations`)
      );
      return { analysis: null, skips: [...skips, ...outcome.skips] };
    }

    const performance = this.components.performance.compute(
      ticker,
      normalized,
      benchmark,
      config.periods
    );
    for (const failure of performance.failures) {
      skips.push(skipEntry(ticker, SKIP_SCOPES.PERIOD, failure, { period: failure.period ?? undefined }));
    }

    let zScore: ZScoreRecord = this.components.zScores.score(
      ticker,
      normalized.map((o) => ({ timestamp: o.timestamp, value: o.price })),
      config.zScore.window,
      config.zScore.minSamples
    );
    if (config.zScore.invertFx && asset.assetClass === ASSET_CLASSES.FX) {
      zScore = this.components.zScores.invert(zScore);
    }

    const indicators = this.components.indicators.compute(normalized.map((o) => o.price));

    const alert = this.components.classifier.classify(
      { ticker, zScore, performance: performance.records, indicators },
      config.alerts
    );

    const rebalancePeriod = performance.records.find(
      (r) => r.period === config.rebalance.performancePeriod
    );

    return {
      analysis: {
        row: {
          ticker,
          assetClass: asset.assetClass,
          currency: asset.currency,
          latestPrice: latest.price,
          latestTimestamp: latest.timestamp,
          performance: performance.records,
          zScore,
          indicators,
          alertTier: alert.tier,
        },
        alert,
        metrics: {
          ticker,
          assetClass: asset.assetClass,
          zScore: zScore.z,
          relativeReturn: rebalancePeriod?.relativeReturn ?? null,
        },
      },
      skips,
    };
  }

  /**
   * Benchmark in the reporting currency; unusable days are dropped, never fatal
   */
  private normalizeBenchmark(
    benchmark: Asset | null,
    book: FxRateBook,
    config: Readonly<AnalysisConfig>
  ): { series: NormalizedObservation[]; skips: SkipEntry[] } {
    if (!benchmark) {
      return {
        series: [],
        skips: [
          {
            ticker: '',
            scope: SKIP_SCOPES.BENCHMARK,
            code: 'BENCHMARK_UNAVAILABLE',
            message: 'No benchmark series; relative returns are null',
          },
        ],
      };
    }

    const integrityError = this.checkIntegrity(benchmark);
    if (integrityError) {
      this.logger.warn({ ticker: benchmark.ticker, reason: integrityError.message }, 'Benchmark series rejected');
      return { series: [], skips: [skipEntry(benchmark.ticker, SKIP_SCOPES.BENCHMARK, integrityError)] };
    }

    const conversion = this.components.converter.convert(benchmark, book, config.reportingCurrency);
    return {
      series: conversion.observations,
      skips: conversion.rejections.map((rejection) =>
        skipEntry(benchmark.ticker, SKIP_SCOPES.BENCHMARK, rejection, { timestamp: rejection.timestamp })
      ),
    };
  }

  private checkIntegrity(asset: Asset): InvalidSeriesError | null {
    const violation = findOrderingViolation(asset.observations);
    if (violation) {
      return new InvalidSeriesError(asset.ticker, `${asset.ticker}: ${violation}`);
    }

    const bad = asset.observations.find((o) => !Number.isFinite(o.price) || o.price <= 0);
    if (bad) {
      return new InvalidSeriesError(
        asset.ticker,
        `${asset.ticker}: non-positive price ${bad.price} at ${bad.timestamp.toISOString()}`
      );
    }

    return null;
  }

  private skipAsset(ticker: string, error: AppError): AssetOutcome {
    this.logger.warn({ ticker, code: error.code, reason: error.message }, 'Asset skipped');
    return { analysis: null, skips: [skipEntry(ticker, SKIP_SCOPES.ASSET, error)] };
  }

  /**
   * Most overvalued first; no-signal rows last; ties by ticker
   */
  private compareRows(a: AssetRow, b: AssetRow): number {
    const aSignal = a.zScore.status === ZSCORE_STATUS.SIGNAL;
    const bSignal = b.zScore.status === ZSCORE_STATUS.SIGNAL;

    if (aSignal && bSignal && a.zScore.z !== null && b.zScore.z !== null && a.zScore.z !== b.zScore.z) {
      return b.zScore.z - a.zScore.z;
    }
    if (aSignal !== bSignal) {
      return aSignal ? -1 : 1;
    }
    return a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0;
  }
}
