import { CurrencyConverter } from '@/services/currencyConverter.service';
import { FxSanityOptions } from '@/models';
import { InvalidRateError, MissingRateError } from '@/errors';
import { dailyPrices, dailyRates, day, makeAsset } from '@/tests/utils/fixtures';

describe('CurrencyConverter', () => {
  let converter: CurrencyConverter;

  const options: FxSanityOptions = {
    sanityWindow: 20,
    maxDeviation: 0.5,
    maxStalenessDays: 5,
    expectedRanges: {},
  };

  beforeEach(() => {
    converter = new CurrencyConverter();
  });

  describe('buildRateBook', () => {
    it('should flag a rate deviating more than maxDeviation from the trailing median', () => {
      const book = converter.buildRateBook(
        [dailyRates('CHF', 'USD', [1.1, 1.1, 1.1, 1.1, 1.1, 1.98, 1.1, 1.1])],
        options
      );

      const points = book.pairs.get('CHF/USD') ?? [];
      expect(points).toHaveLength(8);
      expect(points[5]?.valid).toBe(false);
      expect(points[5]?.rejectionReason).toBe('MEDIAN_DEVIATION');
      expect(points[5]?.trailingMedian).toBe(1.1);
      // Rejected rates stay out of the median
      expect(points[6]?.valid).toBe(true);
      expect(points[6]?.trailingMedian).toBe(1.1);
    });

    it('should reject every day of a multi-day spike even with a one-rate window', () => {
      const book = converter.buildRateBook(
        [dailyRates('CHF', 'USD', [1.1, 1.1, 1.98, 1.98, 1.1])],
        { ...options, sanityWindow: 1 }
      );

      const points = book.pairs.get('CHF/USD') ?? [];
      expect(points.map((p) => p.valid)).toEqual([true, true, false, false, true]);
      expect(points[3]?.trailingMedian).toBe(1.1);

      const result = converter.convert(
        makeAsset('NESN.SW', dailyPrices([100, 100, 100, 100, 100]), { currency: 'CHF' }),
        book,
        'USD'
      );
      expect(result.observations.map((o) => o.timestamp)).toEqual([day(0), day(1), day(4)]);
      expect(result.rejections.map((r) => r.message)).toEqual([
        'Rejected CHF/USD rate 1.98 at 2024-01-03T00:00:00.000Z: MEDIAN_DEVIATION',
        'Rejected CHF/USD rate 1.98 at 2024-01-04T00:00:00.000Z: MEDIAN_DEVIATION',
      ]);
    });

    it('should only check positivity and range for the first rate of a series', () => {
      const book = converter.buildRateBook([dailyRates('CHF', 'USD', [7.5, 1.1])], options);

      const points = book.pairs.get('CHF/USD') ?? [];
      expect(points[0]?.valid).toBe(true);
      expect(points[0]?.trailingMedian).toBeNull();
    });

    it('should reject rates outside the expected range for the pair', () => {
      const book = converter.buildRateBook([dailyRates('EUR', 'USD', [1.7, 1.1])], {
        ...options,
        expectedRanges: { 'EUR/USD': { min: 0.8, max: 1.6 } },
      });

      const points = book.pairs.get('EUR/USD') ?? [];
      expect(points[0]?.rejectionReason).toBe('OUT_OF_EXPECTED_RANGE');
      expect(points[1]?.valid).toBe(true);
    });

    it('should reject non-positive rates', () => {
      const book = converter.buildRateBook([dailyRates('CHF', 'USD', [1.1, 0, -1])], options);

      const points = book.pairs.get('CHF/USD') ?? [];
      expect(points[1]?.rejectionReason).toBe('NON_POSITIVE');
      expect(points[2]?.rejectionReason).toBe('NON_POSITIVE');
    });

    it('should sort unordered rate observations', () => {
      const book = converter.buildRateBook(
        [
          {
            base: 'CHF',
            quote: 'USD',
            observations: [
              { timestamp: day(2), rate: 1.2 },
              { timestamp: day(0), rate: 1.1 },
            ],
          },
        ],
        options
      );

      expect(book.pairs.get('CHF/USD')?.map((p) => p.rate)).toEqual([1.1, 1.2]);
      expect(book.maxStalenessMs).toBe(5 * 86_400_000);
    });
  });

  describe('convert', () => {
    it('should drop only the day of a rejected spike and convert the rest', () => {
      const book = converter.buildRateBook(
        [dailyRates('CHF', 'USD', [1.1, 1.1, 1.1, 1.1, 1.1, 1.98, 1.1, 1.1, 1.1, 1.1])],
        options
      );
      const asset = makeAsset('NESN.SW', dailyPrices(new Array<number>(10).fill(100)), { currency: 'CHF' });

      const result = converter.convert(asset, book, 'USD');

      expect(result.observations).toHaveLength(9);
      expect(result.observations.map((o) => o.price)).toEqual(new Array<number>(9).fill(110));
      expect(result.observations.some((o) => o.timestamp.getTime() === day(5).getTime())).toBe(false);

      expect(result.rejections).toHaveLength(1);
      const [rejection] = result.rejections;
      expect(rejection).toBeInstanceOf(InvalidRateError);
      expect(rejection?.code).toBe('INVALID_RATE');
      expect(rejection?.timestamp).toEqual(day(5));
      expect(rejection?.message).toBe(
        'Rejected CHF/USD rate 1.98 at 2024-01-06T00:00:00.000Z: MEDIAN_DEVIATION'
      );
    });

    it('should never fall back to an earlier rate when the current one is invalid', () => {
      const book = converter.buildRateBook([dailyRates('CHF', 'USD', [1.1, 5])], options);
      const asset = makeAsset('NESN.SW', dailyPrices([100, 100]), { currency: 'CHF' });

      const result = converter.convert(asset, book, 'USD');

      expect(result.observations.map((o) => o.rate)).toEqual([1.1]);
      expect(result.rejections).toHaveLength(1);
    });

    it('should leave prices untouched when already in the target currency', () => {
      const book = converter.buildRateBook([], options);
      const asset = makeAsset('AAPL', dailyPrices([187.5]));

      const result = converter.convert(asset, book, 'USD');

      expect(result.rejections).toEqual([]);
      expect(result.observations).toEqual([
        { ticker: 'AAPL', timestamp: day(0), price: 187.5, nativePrice: 187.5, rate: 1 },
      ]);
    });

    it('should divide by the rate of the inverse pair', () => {
      const book = converter.buildRateBook([dailyRates('EUR', 'USD', [1.25])], options);
      const asset = makeAsset('AAPL', dailyPrices([100]));

      const result = converter.convert(asset, book, 'EUR');

      expect(result.observations).toEqual([
        { ticker: 'AAPL', timestamp: day(0), price: 80, nativePrice: 100, rate: 0.8 },
      ]);
    });

    it('should use the latest rate at or before the observation within the staleness window', () => {
      const book = converter.buildRateBook([dailyRates('CHF', 'USD', [1.1])], options);
      const asset = makeAsset(
        'NESN.SW',
        [
          { timestamp: day(3), price: 100 },
          { timestamp: day(10), price: 100 },
        ],
        { currency: 'CHF' }
      );

      const result = converter.convert(asset, book, 'USD');

      expect(result.observations.map((o) => o.price)).toEqual([110]);
      expect(result.rejections).toHaveLength(1);
      expect(result.rejections[0]).toBeInstanceOf(MissingRateError);
      expect(result.rejections[0]?.message).toBe(
        'No usable CHF/USD rate for 2024-01-11T00:00:00.000Z (latest rate from 2024-01-01T00:00:00.000Z is stale)'
      );
    });

    it('should report a missing rate for observations before the first rate', () => {
      const book = converter.buildRateBook([dailyRates('CHF', 'USD', [1.1], 1)], options);
      const asset = makeAsset('NESN.SW', dailyPrices([100]), { currency: 'CHF' });

      const result = converter.convert(asset, book, 'USD');

      expect(result.observations).toEqual([]);
      expect(result.rejections[0]?.message).toBe(
        'No usable CHF/USD rate for 2024-01-01T00:00:00.000Z'
      );
    });

    it('should reject every observation when no route to the target exists', () => {
      const book = converter.buildRateBook([dailyRates('EUR', 'USD', [1.1])], options);
      const asset = makeAsset('7203.T', dailyPrices([2500, 2510]), { currency: 'JPY' });

      const result = converter.convert(asset, book, 'USD');

      expect(result.observations).toEqual([]);
      expect(result.rejections).toHaveLength(2);
      expect(result.rejections.every((r) => r.code === 'MISSING_RATE')).toBe(true);
      expect(result.rejections[0]?.message).toBe(
        'No usable JPY/USD rate for 2024-01-01T00:00:00.000Z (pair not available)'
      );
    });
  });
});
