import request from 'supertest';
import app from '@/app';
import { priceHistoryRepository } from '@/config/dependencies';
import { ASSET_CLASSES } from '@/constants/analysis';
import { LINEAR_MONTHLY, monthlyPrices } from '@/tests/utils/fixtures';

/**
 * The analysis run limiter allows 6 POSTs per minute; this file stays within it.
 * Repository reads are stubbed, so no database is needed.
 */
describe('Analysis API', () => {
  beforeEach(() => {
    jest.spyOn(priceHistoryRepository, 'getAssetUniverse').mockResolvedValue([
      { ticker: 'FLAT', currency: 'USD', assetClass: ASSET_CLASSES.STOCK },
      { ticker: 'LIN', currency: 'USD', assetClass: ASSET_CLASSES.STOCK },
    ]);
    jest.spyOn(priceHistoryRepository, 'getPriceHistories').mockResolvedValue(
      new Map([
        ['FLAT', monthlyPrices(new Array<number>(12).fill(40))],
        ['LIN', monthlyPrices(LINEAR_MONTHLY)],
        ['^GSPC', monthlyPrices(new Array<number>(12).fill(100))],
      ])
    );
    jest.spyOn(priceHistoryRepository, 'getFxHistories').mockResolvedValue([]);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('GET /api/health', () => {
    it('should report the service as up', async () => {
      const response = await request(app).get('/api/health').expect(200);

      expect(response.body.status).toBe('ok');
      expect(response.body.service).toBe('asset-valuation-api');
    });
  });

  describe('before the first run', () => {
    it('should return 404 for the latest run', async () => {
      const response = await request(app).get('/api/v1/analysis/runs/latest').expect(404);

      expect(response.body).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'No analysis run has completed yet' },
      });
    });
  });

  describe('POST /api/v1/analysis/runs', () => {
    it('should return 400 for a malformed JSON body', async () => {
      const response = await request(app)
        .post('/api/v1/analysis/runs')
        .set('Content-Type', 'application/json')
        .send('{"zScore":')
        .expect(400);

      expect(response.body.error).toEqual({ code: 'VALIDATION', message: 'Malformed JSON body' });
    });

    it('should return 400 for unknown configuration keys', async () => {
      const response = await request(app)
        .post('/api/v1/analysis/runs')
        .send({ thresholds: { strongSell: 3 } })
        .expect(400);

      expect(response.body.error.code).toBe('VALIDATION');
      expect(response.body.error.message).toBe('Invalid analysis configuration overrides');
    });

    it('should return 422 for an out-of-range value', async () => {
      const response = await request(app)
        .post('/api/v1/analysis/runs')
        .send({ zScore: { window: 0 } })
        .expect(422);

      expect(response.body.error).toEqual({
        code: 'CONFIG_RANGE',
        message: 'Analysis configuration out of range',
        issues: ['zScore.window: Number must be greater than or equal to 2'],
      });
    });

    it('should return 422 when minSamples exceeds the window', async () => {
      const response = await request(app)
        .post('/api/v1/analysis/runs')
        .send({ zScore: { window: 5, minSamples: 10 } })
        .expect(422);

      expect(response.body.error.issues).toEqual([
        'zScore.minSamples (10) cannot exceed zScore.window (5)',
      ]);
      expect(priceHistoryRepository.getAssetUniverse).not.toHaveBeenCalled();
    });

    it('should return 500 without leaking database errors', async () => {
      jest
        .spyOn(priceHistoryRepository, 'getAssetUniverse')
        .mockRejectedValue(new Error('relation "assets" does not exist'));

      const response = await request(app).post('/api/v1/analysis/runs').send({}).expect(500);

      expect(response.body.error).toEqual({ code: 'INTERNAL', message: 'Internal server error' });
    });

    it('should run the analysis and return the run', async () => {
      const response = await request(app)
        .post('/api/v1/analysis/runs')
        .send({ zScore: { window: 12, minSamples: 12 } })
        .expect(201);

      const { run } = response.body;
      expect(response.body.success).toBe(true);
      expect(run.reportingCurrency).toBe('USD');
      expect(run.benchmarkTicker).toBe('^GSPC');
      expect(run.rows.map((r: { ticker: string }) => r.ticker)).toEqual(['LIN', 'FLAT']);
      expect(run.rows[0].alertTier).toBe('WEAK_SELL');
      expect(run.rows[0].latestTimestamp).toBe('2024-12-15T00:00:00.000Z');
    });
  });

  describe('after a run', () => {
    it('should return the latest run', async () => {
      const response = await request(app).get('/api/v1/analysis/runs/latest').expect(200);

      expect(response.body.run.config.zScore).toEqual({ window: 12, minSamples: 12, invertFx: true });
    });

    it('should return actionable alerts', async () => {
      const response = await request(app).get('/api/v1/analysis/runs/latest/alerts').expect(200);

      expect(response.body.alerts).toEqual([
        { ticker: 'LIN', tier: 'WEAK_SELL', metricValue: response.body.alerts[0].metricValue, threshold: 1.5 },
      ]);
      expect(response.body.alerts[0].metricValue).toBeCloseTo(5.5 / Math.sqrt(13), 12);
    });

    it('should filter alerts by tier', async () => {
      const response = await request(app)
        .get('/api/v1/analysis/runs/latest/alerts')
        .query({ tier: 'NONE' })
        .expect(200);

      expect(response.body.alerts.map((a: { ticker: string }) => a.ticker)).toEqual(['FLAT']);
    });

    it('should return 400 for an unknown tier', async () => {
      const response = await request(app)
        .get('/api/v1/analysis/runs/latest/alerts')
        .query({ tier: 'SELL_EVERYTHING' })
        .expect(400);

      expect(response.body.error.message).toBe('Invalid alert filter');
    });

    it('should return the rebalance recommendations', async () => {
      const response = await request(app).get('/api/v1/analysis/runs/latest/rebalance').expect(200);

      expect(response.body.rebalance.requestedTopN).toBe(3);
      expect(response.body.rebalance.effectiveTopN).toBe(0);
      expect(response.body.rebalance.pairs).toEqual([]);
    });
  });

  describe('GET /api/metrics', () => {
    it('should expose run counters in Prometheus format', async () => {
      const response = await request(app).get('/api/metrics').expect(200);
      const lines = response.text.split('\n');

      expect(response.headers['content-type']).toMatch(/^text\/plain/);
      expect(response.headers['content-type']).toContain('version=0.0.4');
      expect(lines).toContain('analysis_runs_completed_total 1');
      expect(lines).toContain('analysis_runs_failed_total 1');
    });
  });

  describe('unknown routes', () => {
    it('should return 404 with the route', async () => {
      const response = await request(app).get('/api/v1/portfolio').expect(404);

      expect(response.body.error).toEqual({
        code: 'NOT_FOUND',
        message: 'Route GET /api/v1/portfolio not found',
      });
    });
  });
});
