import {
  createDefaultAnalysisConfig,
  parseAnalysisOverrides,
  resolveAnalysisConfig,
} from '@/validators/analysisConfig.validator';
import { ConfigRangeError, ValidationError } from '@/errors';
import { defaultConfig } from '@/tests/utils/fixtures';

function rangeIssues(action: () => unknown): string[] {
  try {
    action();
  } catch (error) {
    if (error instanceof ConfigRangeError) return error.issues;
    throw error;
  }
  throw new Error('expected a ConfigRangeError');
}

describe('analysisConfig validator', () => {
  describe('createDefaultAnalysisConfig', () => {
    it('should build the defaults around the deployment settings', () => {
      const config = createDefaultAnalysisConfig({ reportingCurrency: 'EUR', topN: 5 });

      expect(config.reportingCurrency).toBe('EUR');
      expect(config.rebalance.topN).toBe(5);
      expect(config.periods.map((p) => p.label)).toEqual(['24h', '7d', '1m', '3m', '1y']);
      expect(config.alerts.thresholds).toEqual({ strongSell: 2, weakSell: 1.5, weakBuy: -1.5, strongBuy: -2 });
      expect(config.zScore).toEqual({ window: 252, minSamples: 20, invertFx: true });
      expect(config.fx.failurePolicy).toBe('DROP_OBSERVATION');
    });
  });

  describe('resolveAnalysisConfig', () => {
    it('should return a deep-frozen copy of a valid configuration', () => {
      const config = resolveAnalysisConfig(defaultConfig());

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.alerts.thresholds)).toBe(true);
      expect(Object.isFrozen(config.periods[0])).toBe(true);
    });

    it('should merge partial overrides key by key', () => {
      const config = resolveAnalysisConfig(defaultConfig(), { alerts: { thresholds: { strongSell: 3 } } });

      expect(config.alerts.thresholds).toEqual({ strongSell: 3, weakSell: 1.5, weakBuy: -1.5, strongBuy: -2 });
    });

    it('should replace arrays wholesale', () => {
      const config = resolveAnalysisConfig(defaultConfig(), {
        periods: [{ label: '1m', unit: 'month', count: 1 }],
      });

      expect(config.periods).toEqual([{ label: '1m', unit: 'month', count: 1 }]);
    });

    it('should reject thresholds out of order', () => {
      const issues = rangeIssues(() =>
        resolveAnalysisConfig(defaultConfig(), { alerts: { thresholds: { weakSell: 2.5 } } })
      );

      expect(issues).toEqual(['strongSell (2) must be >= weakSell (2.5)']);
    });

    it('should reject minSamples above the window', () => {
      const issues = rangeIssues(() => resolveAnalysisConfig(defaultConfig(), { zScore: { window: 10 } }));

      expect(issues).toEqual(['zScore.minSamples (20) cannot exceed zScore.window (10)']);
    });

    it('should reject references to periods that are not configured', () => {
      const issues = rangeIssues(() =>
        resolveAnalysisConfig(defaultConfig(), {
          rebalance: { performancePeriod: '2y' },
          alerts: {
            filters: {
              trend: {
                sell: { periods: ['1m', '6m'], minReturn: 0.1 },
                buy: { periods: ['2y'], maxReturn: -0.2 },
              },
            },
          },
        })
      );

      expect(issues).toEqual([
        "rebalance.performancePeriod '2y' is not a configured period",
        "alerts.filters.trend.sell.periods: '6m' is not a configured period",
        "alerts.filters.trend.buy.periods: '2y' is not a configured period",
      ]);
    });

    it('should reject duplicate period labels and inverted ranges', () => {
      const issues = rangeIssues(() =>
        resolveAnalysisConfig(defaultConfig(), {
          periods: [
            { label: '1m', unit: 'month', count: 1 },
            { label: '1m', unit: 'day', count: 30 },
          ],
          alerts: { filters: { rsi: { overbought: 30, oversold: 70 } } },
          fx: { expectedRanges: { 'EUR/USD': { min: 2, max: 1 } } },
        })
      );

      expect(issues).toEqual([
        'periods: duplicate labels 1m',
        'alerts.filters.rsi.oversold must be below overbought',
        'fx.expectedRanges.EUR/USD: min must be below max',
      ]);
    });
  });

  describe('parseAnalysisOverrides', () => {
    it('should treat a missing or empty body as no overrides', () => {
      expect(parseAnalysisOverrides(undefined)).toEqual({});
      expect(parseAnalysisOverrides({})).toEqual({});
    });

    it('should accept a partial configuration', () => {
      expect(parseAnalysisOverrides({ rebalance: { topN: 5 } })).toEqual({ rebalance: { topN: 5 } });
    });

    it('should reject unknown top-level keys', () => {
      expect(() => parseAnalysisOverrides({ thresholds: { strongSell: 3 } })).toThrow(ValidationError);
    });

    it('should reject misspelled nested keys instead of dropping them', () => {
      expect(() => parseAnalysisOverrides({ alerts: { thresholds: { strongsell: 0.5 } } })).toThrow(
        ValidationError
      );
      expect(() => parseAnalysisOverrides({ fx: { expectedRanges: { 'EUR/USD': { minimum: 1 } } } })).toThrow(
        ValidationError
      );
      expect(() => parseAnalysisOverrides({ alerts: { filters: { trend: { period: '1m' } } } })).toThrow(
        ValidationError
      );
    });

    it('should accept the alert confirmation filters', () => {
      const filters = {
        rsi: { overbought: 70, oversold: 35 },
        ma200: { sellMin: 20, buyMax: -20 },
        trend: {
          sell: { periods: ['1m', '3m'], minReturn: 0.1 },
          buy: { periods: ['1y'], maxReturn: -0.2 },
        },
      };

      const config = resolveAnalysisConfig(defaultConfig(), parseAnalysisOverrides({ alerts: { filters } }));

      expect(config.alerts.filters).toEqual(filters);
    });

    it('should reject values of the wrong type', () => {
      expect(() => parseAnalysisOverrides({ zScore: { window: 'long' } })).toThrow(ValidationError);
      expect(() => parseAnalysisOverrides({ reportingCurrency: 'usd' })).toThrow(ValidationError);
    });

    it('should report well-formed values outside their range as a configuration range error', () => {
      const issues = rangeIssues(() => parseAnalysisOverrides({ zScore: { window: 0 } }));

      expect(issues).toEqual(['zScore.window: Number must be greater than or equal to 2']);
    });
  });
});
