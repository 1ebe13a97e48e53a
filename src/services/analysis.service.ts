import { randomUUID } from 'crypto';
import { ALERT_TIERS, AlertTier } from '@/constants/analysis';
import { AlertRecord, AnalysisRun, Asset, AssetDescriptor, RebalanceResult } from '@/models';
import { NotFoundError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';
import { IMetrics } from '@/interfaces/IMetrics';
import { IAnalysisRunRepository, IPriceHistoryRepository } from '@/repositories/interfaces';
import { inferAssetClass, pairKey } from '@/utils/assetClassification';
import { daysToMs } from '@/utils/timeSeries';
import {
  AnalysisConfigOverrides,
  createDefaultAnalysisConfig,
  resolveAnalysisConfig,
} from '@/validators/analysisConfig.validator';
import { AnalysisPipeline } from './analysisPipeline';

/**
 * Deployment-level settings (from env)
 */
export interface AnalysisSettings {
  reportingCurrency: string;
  benchmarkTicker: string;
  benchmarkCurrency: string;
  historyLookbackDays: number;
  topN: number;
}

/**
 * Analysis Service
 * Loads market data once per run, runs the pipeline and keeps the latest result
 */
export class AnalysisService {
  constructor(
    private priceRepo: IPriceHistoryRepository,
    private runRepo: IAnalysisRunRepository,
    private metrics: IMetrics,
    private settings: AnalysisSettings,
    private pipeline: AnalysisPipeline = new AnalysisPipeline(),
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Execute a full analysis run
   *
   * 1. Resolve and validate the configuration (env defaults + request overrides)
   * 2. Load the universe, price histories, benchmark and FX rates
   * 3. Run the pipeline and store the run as the latest
   *
   * @throws ConfigRangeError before any data is loaded when the configuration is invalid
   */
  async runAnalysis(overrides: AnalysisConfigOverrides = {}): Promise<AnalysisRun> {
    const config = resolveAnalysisConfig(
      createDefaultAnalysisConfig({
        reportingCurrency: this.settings.reportingCurrency,
        topN: this.settings.topN,
      }),
      overrides
    );

    const startedAt = this.clock();
    const endTimer = this.metrics.startTimer('analysis.run_duration');

    try {
      const since = new Date(startedAt.getTime() - daysToMs(this.settings.historyLookbackDays));
      const universe = await this.priceRepo.getAssetUniverse();
      const { benchmarkTicker } = this.settings;

      const histories = await this.priceRepo.getPriceHistories(
        [...new Set([...universe.map((a) => a.ticker), benchmarkTicker])],
        since
      );
      const fxRates = await this.priceRepo.getFxHistories(
        this.requiredPairs(universe, config.reportingCurrency),
        since
      );

      const assets: Asset[] = universe.map((descriptor) => ({
        ...descriptor,
        observations: histories.get(descriptor.ticker) ?? [],
      }));
      const benchmarkHistory = histories.get(benchmarkTicker);
      const benchmark: Asset | null = benchmarkHistory
        ? {
            ticker: benchmarkTicker,
            currency: this.settings.benchmarkCurrency,
            assetClass: inferAssetClass(benchmarkTicker),
            observations: benchmarkHistory,
          }
        : null;

      const result = this.pipeline.run({ assets, fxRates, benchmark }, config);

      const run: AnalysisRun = {
        runId: randomUUID(),
        startedAt,
        completedAt: this.clock(),
        reportingCurrency: config.reportingCurrency,
        benchmarkTicker,
        config,
        ...result,
      };

      await this.runRepo.save(run);
      this.recordRunMetrics(run, universe.length);

      logger.info(
        {
          runId: run.runId,
          assets: universe.length,
          analyzed: run.rows.length,
          manifestEntries: run.manifest.length,
          actionableAlerts: this.actionable(run.alerts).length,
          effectiveTopN: run.rebalance.effectiveTopN,
        },
        'Analysis run completed'
      );

      return run;
    } catch (error) {
      this.metrics.incrementCounter('analysis.runs_failed');
      logger.error({ error }, 'Analysis run failed');
      throw error;
    } finally {
      endTimer();
    }
  }

  /**
   * @throws NotFoundError until a run has completed
   */
  async getLatestRun(): Promise<AnalysisRun> {
    const run = await this.runRepo.findLatest();
    if (!run) {
      throw new NotFoundError('No analysis run has completed yet');
    }
    return run;
  }

  /**
   * Actionable alerts of the latest run, optionally a single tier
   */
  async getLatestAlerts(tier?: AlertTier): Promise<{ runId: string; alerts: AlertRecord[] }> {
    const run = await this.getLatestRun();
    const alerts = tier ? run.alerts.filter((a) => a.tier === tier) : this.actionable(run.alerts);
    return { runId: run.runId, alerts };
  }

  async getLatestRebalance(): Promise<{ runId: string; rebalance: RebalanceResult }> {
    const run = await this.getLatestRun();
    return { runId: run.runId, rebalance: run.rebalance };
  }

  /**
   * Both directions of every foreign currency against the reporting currency;
   * the converter uses whichever exists
   */
  private requiredPairs(universe: readonly AssetDescriptor[], reportingCurrency: string): string[] {
    const currencies = new Set(universe.map((a) => a.currency));
    currencies.add(this.settings.benchmarkCurrency);
    currencies.delete(reportingCurrency);

    return [...currencies]
      .sort()
      .flatMap((currency) => [pairKey(currency, reportingCurrency), pairKey(reportingCurrency, currency)]);
  }

  private actionable(alerts: readonly AlertRecord[]): AlertRecord[] {
    return alerts.filter((a) => a.tier !== ALERT_TIERS.NONE);
  }

  private recordRunMetrics(run: AnalysisRun, universeSize: number): void {
    this.metrics.incrementCounter('analysis.runs_completed');
    this.metrics.recordGauge('analysis.assets_analyzed', run.rows.length);
    this.metrics.recordGauge('analysis.assets_skipped', universeSize - run.rows.length);
    this.metrics.recordGauge('analysis.manifest_entries', run.manifest.length);

    for (const tier of Object.values(ALERT_TIERS)) {
      this.metrics.recordGauge(
        'analysis.alerts',
        run.alerts.filter((a) => a.tier === tier).length,
        { tier }
      );
    }
  }
}
