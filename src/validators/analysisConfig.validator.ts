import { z } from 'zod';
import {
  ASSET_CLASSES,
  FX_FAILURE_POLICIES,
  PERIOD_UNITS,
} from '@/constants/analysis';
import {
  ALERT_THRESHOLDS,
  DEFAULT_PERIODS,
  FX_EXPECTED_RANGES,
  FX_SANITY,
  MIN_OBSERVATIONS,
  REBALANCE_DEFAULTS,
  ZSCORE_DEFAULTS,
} from '@/config/analysisRules';
import { ConfigRangeError, ValidationError } from '@/errors';
import { assertThresholds } from '@/services/alertClassifier.service';

/**
 * Analysis configuration schema
 *
 * Shape and per-field ranges are enforced here; cross-field rules
 * (threshold ordering, period references, minSamples <= window) are checked
 * in resolveAnalysisConfig. Any violation is fatal for the run.
 */
const periodSchema = z
  .object({
    label: z.string().trim().min(1),
    unit: z.enum([PERIOD_UNITS.DAY, PERIOD_UNITS.WEEK, PERIOD_UNITS.MONTH, PERIOD_UNITS.YEAR]),
    count: z.number().int().positive(),
  })
  .strict();

const currencyCodeSchema = z
  .string()
  .regex(/^[A-Z]{3}$/, { message: 'Currency must be a 3-letter ISO code' });

// Every object is strict so a misspelled key fails instead of being dropped
export const analysisConfigSchema = z
  .object({
    reportingCurrency: currencyCodeSchema,
    minObservations: z.number().int().min(2),
    periods: z.array(periodSchema).min(1),
    zScore: z
      .object({
        window: z.number().int().min(2),
        // Sample standard deviation needs at least two values
        minSamples: z.number().int().min(2),
        invertFx: z.boolean(),
      })
      .strict(),
    alerts: z
      .object({
        thresholds: z
          .object({
            strongSell: z.number().finite(),
            weakSell: z.number().finite(),
            weakBuy: z.number().finite(),
            strongBuy: z.number().finite(),
          })
          .strict(),
        filters: z
          .object({
            rsi: z
              .object({
                overbought: z.number().min(0).max(100),
                oversold: z.number().min(0).max(100),
              })
              .strict()
              .optional(),
            // Percent distance from the 200-observation moving average
            ma200: z
              .object({
                sellMin: z.number().finite(),
                buyMax: z.number().finite(),
              })
              .strict()
              .optional(),
            // A side is confirmed when any of its periods reaches the bound
            trend: z
              .object({
                sell: z
                  .object({
                    periods: z.array(z.string().min(1)).min(1),
                    minReturn: z.number().finite(),
                  })
                  .strict()
                  .optional(),
                buy: z
                  .object({
                    periods: z.array(z.string().min(1)).min(1),
                    maxReturn: z.number().finite(),
                  })
                  .strict()
                  .optional(),
              })
              .strict()
              .optional(),
          })
          .strict()
          .optional(),
      })
      .strict(),
    rebalance: z
      .object({
        topN: z.number().int().min(0),
        weights: z
          .object({
            zScore: z.number().finite(),
            relativePerformance: z.number().finite(),
          })
          .strict(),
        performancePeriod: z.string().min(1),
        weightStep: z.number().min(0).max(1),
        excludedAssetClasses: z.array(
          z.enum([
            ASSET_CLASSES.CURRENCY,
            ASSET_CLASSES.FX,
            ASSET_CLASSES.EQUITY_INDEX,
            ASSET_CLASSES.CRYPTO,
            ASSET_CLASSES.COMMODITY,
            ASSET_CLASSES.STOCK,
          ])
        ),
      })
      .strict(),
    fx: z
      .object({
        sanityWindow: z.number().int().min(1),
        maxDeviation: z.number().positive(),
        maxStalenessDays: z.number().min(0),
        expectedRanges: z.record(
          z.string(),
          z.object({ min: z.number().positive(), max: z.number().positive() }).strict()
        ),
        failurePolicy: z.enum([FX_FAILURE_POLICIES.DROP_OBSERVATION, FX_FAILURE_POLICIES.SKIP_ASSET]),
      })
      .strict(),
  })
  .strict();

/**
 * Request overrides: any subset of the configuration
 * deepPartial keeps every object strict; arrays (periods, excludedAssetClasses,
 * trend periods) replace the default wholesale
 */
export const analysisConfigOverridesSchema = analysisConfigSchema.deepPartial();

export type AnalysisConfig = z.infer<typeof analysisConfigSchema>;
export type AnalysisConfigOverrides = z.infer<typeof analysisConfigOverridesSchema>;
export type AlertThresholds = AnalysisConfig['alerts']['thresholds'];
export type AlertFilters = NonNullable<AnalysisConfig['alerts']['filters']>;
export type AlertRules = AnalysisConfig['alerts'];
export type RebalanceConstraints = Omit<AnalysisConfig['rebalance'], 'topN'>;

/**
 * Defaults from analysisRules.ts plus the deployment-level values
 */
export function createDefaultAnalysisConfig(options: {
  reportingCurrency: string;
  topN: number;
}): AnalysisConfig {
  return {
    reportingCurrency: options.reportingCurrency,
    minObservations: MIN_OBSERVATIONS,
    periods: DEFAULT_PERIODS.map((period) => ({ ...period })),
    zScore: {
      window: ZSCORE_DEFAULTS.WINDOW,
      minSamples: ZSCORE_DEFAULTS.MIN_SAMPLES,
      invertFx: ZSCORE_DEFAULTS.INVERT_FX,
    },
    alerts: {
      thresholds: {
        strongSell: ALERT_THRESHOLDS.STRONG_SELL,
        weakSell: ALERT_THRESHOLDS.WEAK_SELL,
        weakBuy: ALERT_THRESHOLDS.WEAK_BUY,
        strongBuy: ALERT_THRESHOLDS.STRONG_BUY,
      },
    },
    rebalance: {
      topN: options.topN,
      weights: { ...REBALANCE_DEFAULTS.WEIGHTS },
      performancePeriod: REBALANCE_DEFAULTS.PERFORMANCE_PERIOD,
      weightStep: REBALANCE_DEFAULTS.WEIGHT_STEP,
      excludedAssetClasses: [...REBALANCE_DEFAULTS.EXCLUDED_ASSET_CLASSES],
    },
    fx: {
      sanityWindow: FX_SANITY.SANITY_WINDOW,
      maxDeviation: FX_SANITY.MAX_DEVIATION,
      maxStalenessDays: FX_SANITY.MAX_STALENESS_DAYS,
      expectedRanges: { ...FX_EXPECTED_RANGES },
      failurePolicy: FX_SANITY.FAILURE_POLICY,
    },
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursive merge: objects merge key by key, everything else (arrays included) replaces
 */
function mergeValues(base: unknown, override: unknown): unknown {
  if (override === undefined) {
    return base;
  }
  if (isPlainObject(base) && isPlainObject(override)) {
    const merged: Record<string, unknown> = { ...base };
    for (const [key, value] of Object.entries(override)) {
      merged[key] = mergeValues(base[key], value);
    }
    return merged;
  }
  return override;
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Cross-field rules zod cannot express per field
 */
function collectRangeIssues(config: AnalysisConfig): string[] {
  const issues: string[] = [];
  const labels = config.periods.map((p) => p.label);

  const duplicates = labels.filter((label, i) => labels.indexOf(label) !== i);
  if (duplicates.length > 0) {
    issues.push(`periods: duplicate labels ${[...new Set(duplicates)].join(', ')}`);
  }

  if (config.zScore.minSamples > config.zScore.window) {
    issues.push(
      `zScore.minSamples (${config.zScore.minSamples}) cannot exceed zScore.window (${config.zScore.window})`
    );
  }

  if (!labels.includes(config.rebalance.performancePeriod)) {
    issues.push(
      `rebalance.performancePeriod '${config.rebalance.performancePeriod}' is not a configured period`
    );
  }

  const trend = config.alerts.filters?.trend;
  for (const [side, rule] of [['sell', trend?.sell], ['buy', trend?.buy]] as const) {
    for (const period of rule?.periods ?? []) {
      if (!labels.includes(period)) {
        issues.push(`alerts.filters.trend.${side}.periods: '${period}' is not a configured period`);
      }
    }
  }

  const rsi = config.alerts.filters?.rsi;
  if (rsi && rsi.oversold >= rsi.overbought) {
    issues.push('alerts.filters.rsi.oversold must be below overbought');
  }

  for (const [pair, range] of Object.entries(config.fx.expectedRanges)) {
    if (range.min >= range.max) {
      issues.push(`fx.expectedRanges.${pair}: min must be below max`);
    }
  }

  return issues;
}

const RANGE_ISSUE_CODES: readonly z.ZodIssueCode[] = [
  z.ZodIssueCode.too_small,
  z.ZodIssueCode.too_big,
  z.ZodIssueCode.not_finite,
];

function formatIssue(issue: z.ZodIssue): string {
  return `${issue.path.join('.') || '(root)'}: ${issue.message}`;
}

/**
 * Parse a request body into configuration overrides
 *
 * @throws ValidationError (400) when the body is not a partial configuration
 * @throws ConfigRangeError (422) when it is well-formed but some value is out of range
 */
export function parseAnalysisOverrides(body: unknown): AnalysisConfigOverrides {
  if (body === undefined || body === null || (isPlainObject(body) && Object.keys(body).length === 0)) {
    return {};
  }

  const result = analysisConfigOverridesSchema.safeParse(body);
  if (!result.success) {
    const { issues } = result.error;
    if (issues.every((issue) => RANGE_ISSUE_CODES.includes(issue.code))) {
      throw new ConfigRangeError('Analysis configuration out of range', issues.map(formatIssue));
    }
    throw new ValidationError('Invalid analysis configuration overrides', result.error.flatten());
  }
  return result.data;
}

/**
 * Merge overrides into the base configuration and validate the result
 *
 * @returns Deep-frozen configuration, safe to share across components
 * @throws ConfigRangeError when any rule is violated
 */
export function resolveAnalysisConfig(
  base: AnalysisConfig,
  overrides: AnalysisConfigOverrides = {}
): Readonly<AnalysisConfig> {
  const parsed = analysisConfigSchema.safeParse(mergeValues(base, overrides));

  if (!parsed.success) {
    const issues = parsed.error.issues.map(formatIssue);
    throw new ConfigRangeError('Analysis configuration out of range', issues);
  }

  const config = parsed.data;
  const issues = collectRangeIssues(config);
  if (issues.length > 0) {
    throw new ConfigRangeError('Analysis configuration out of range', issues);
  }

  assertThresholds(config.alerts.thresholds);

  return deepFreeze(config);
}
