import { IndicatorCalculator } from '@/services/indicators.service';

describe('IndicatorCalculator', () => {
  let calculator: IndicatorCalculator;

  beforeEach(() => {
    calculator = new IndicatorCalculator();
  });

  describe('rsi', () => {
    it('should apply Wilder smoothing after the simple-average seed', () => {
      // Seed: gain 0.5, loss 0.5; next step: gain 0.75, loss 0.25
      expect(calculator.rsi([1, 2, 1, 2], 2)).toBe(75);
    });

    it('should return 100 for a series that only rises', () => {
      expect(calculator.rsi([1, 2, 3, 4, 5], 3)).toBe(100);
    });

    it('should return 0 for a series that only falls', () => {
      expect(calculator.rsi([5, 4, 3, 2, 1], 3)).toBe(0);
    });

    it('should return 50 for a flat series', () => {
      expect(calculator.rsi([3, 3, 3, 3], 3)).toBe(50);
    });

    it('should need period + 1 prices', () => {
      expect(calculator.rsi([1, 2, 3], 3)).toBeNull();
    });
  });

  describe('bollinger', () => {
    it('should place bands at width population deviations around the mean', () => {
      const bands = calculator.bollinger([9, 1, 2, 3, 4], 4, 2);

      expect(bands?.upper).toBeCloseTo(2.5 + 2 * Math.sqrt(1.25), 12);
      expect(bands?.lower).toBeCloseTo(2.5 - 2 * Math.sqrt(1.25), 12);
    });

    it('should return null for a short series', () => {
      expect(calculator.bollinger([1, 2], 4, 2)).toBeNull();
    });
  });

  describe('pctFromMovingAverage', () => {
    it('should express the distance of the last price from its average in percent', () => {
      expect(calculator.pctFromMovingAverage([50, 10, 10, 10, 13], 4)).toBeCloseTo(225 / 10.75, 10);
    });

    it('should return null for a short series', () => {
      expect(calculator.pctFromMovingAverage([10, 13], 4)).toBeNull();
    });
  });

  describe('compute', () => {
    it('should leave every indicator null for a short history', () => {
      expect(calculator.compute([1, 2, 3, 4, 5, 6, 7, 8, 9, 10])).toEqual({
        rsi: null,
        bollingerUpper: null,
        bollingerLower: null,
        pctFromMa50: null,
        pctFromMa200: null,
      });
    });

    it('should fill RSI and bands once 20 prices are available', () => {
      const prices = Array.from({ length: 20 }, (_, i) => 100 + i);
      const result = calculator.compute(prices);

      expect(result.rsi).toBe(100);
      expect(result.bollingerUpper).not.toBeNull();
      expect(result.pctFromMa50).toBeNull();
    });
  });
});
