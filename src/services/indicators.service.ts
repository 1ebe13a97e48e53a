import { TechnicalIndicators } from '@/models';
import { mean, populationStandardDeviation } from '@/utils/statistics';

const RSI_PERIOD = 14;
const BOLLINGER_PERIOD = 20;
const BOLLINGER_WIDTH = 2;
const SHORT_MA = 50;
const LONG_MA = 200;

/**
 * Technical Indicator Calculator
 * Supporting context for alerts: momentum (RSI), volatility bands, trend distance
 */
export class IndicatorCalculator {
  compute(prices: readonly number[]): TechnicalIndicators {
    const bands = this.bollinger(prices, BOLLINGER_PERIOD, BOLLINGER_WIDTH);

    return {
      rsi: this.rsi(prices, RSI_PERIOD),
      bollingerUpper: bands?.upper ?? null,
      bollingerLower: bands?.lower ?? null,
      pctFromMa50: this.pctFromMovingAverage(prices, SHORT_MA),
      pctFromMa200: this.pctFromMovingAverage(prices, LONG_MA),
    };
  }

  /**
   * Relative Strength Index with Wilder smoothing
   * Seeded with the simple average of the first `period` changes; needs period + 1 prices
   */
  rsi(prices: readonly number[], period: number): number | null {
    if (prices.length < period + 1) return null;

    let avgGain = 0;
    let avgLoss = 0;

    for (let i = 1; i < prices.length; i++) {
      const current = prices[i];
      const previous = prices[i - 1];
      if (current === undefined || previous === undefined) continue;

      const change = current - previous;
      const gain = Math.max(change, 0);
      const loss = Math.max(-change, 0);

      if (i <= period) {
        avgGain += gain / period;
        avgLoss += loss / period;
      } else {
        avgGain = (avgGain * (period - 1) + gain) / period;
        avgLoss = (avgLoss * (period - 1) + loss) / period;
      }
    }

    if (avgLoss === 0) {
      return avgGain === 0 ? 50 : 100;
    }
    const relativeStrength = avgGain / avgLoss;
    return 100 - 100 / (1 + relativeStrength);
  }

  /**
   * Bollinger bands on the last `period` prices (population standard deviation)
   */
  bollinger(
    prices: readonly number[],
    period: number,
    width: number
  ): { upper: number; lower: number } | null {
    if (prices.length < period) return null;

    const window = prices.slice(-period);
    const middle = mean(window);
    const deviation = populationStandardDeviation(window);
    if (middle === null || deviation === null) return null;

    return {
      upper: middle + width * deviation,
      lower: middle - width * deviation,
    };
  }

  /**
   * Percentage distance of the latest price from its simple moving average
   */
  pctFromMovingAverage(prices: readonly number[], period: number): number | null {
    if (prices.length < period) return null;

    const average = mean(prices.slice(-period));
    const last = prices[prices.length - 1];
    if (average === null || average === 0 || last === undefined) return null;

    return (100 * (last - average)) / average;
  }
}
