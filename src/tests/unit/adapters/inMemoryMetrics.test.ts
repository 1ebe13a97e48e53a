import { InMemoryMetrics } from '@/adapters/metrics/InMemoryMetrics';
import { MetricsFactory } from '@/adapters/metrics/MetricsFactory';
import { NoOpMetrics } from '@/adapters/metrics/NoOpMetrics';
import { escapeLabelValue, renderSnapshot, toPrometheusName } from '@/api/controllers/metrics.controller';

describe('InMemoryMetrics', () => {
  let metrics: InMemoryMetrics;

  beforeEach(() => {
    metrics = new InMemoryMetrics();
  });

  it('should accumulate counters per dimension set regardless of key order', () => {
    metrics.incrementCounter('http.requests', 1, { method: 'GET', status: 200 });
    metrics.incrementCounter('http.requests', 1, { status: 200, method: 'GET' });
    metrics.incrementCounter('http.requests', 3, { method: 'POST', status: 201 });

    expect(metrics.snapshot().counters).toEqual([
      { name: 'http.requests', dimensions: { method: 'GET', status: '200' }, value: 2 },
      { name: 'http.requests', dimensions: { method: 'POST', status: '201' }, value: 3 },
    ]);
  });

  it('should keep the last gauge value', () => {
    metrics.recordGauge('analysis.assets_analyzed', 4);
    metrics.recordGauge('analysis.assets_analyzed', 7);

    expect(metrics.snapshot().gauges).toEqual([
      { name: 'analysis.assets_analyzed', dimensions: {}, value: 7 },
    ]);
  });

  it('should summarize timings with percentiles', () => {
    for (const value of [30, 10, 20]) {
      metrics.recordHistogram('analysis.run_duration', value);
    }

    expect(metrics.snapshot().timings).toEqual([
      {
        name: 'analysis.run_duration',
        dimensions: {},
        count: 3,
        sum: 60,
        p50: 20,
        p95: 30,
        p99: 30,
      },
    ]);
  });

  it('should cap the samples kept per timing series', () => {
    for (let i = 1; i <= 1001; i++) {
      metrics.recordHistogram('http.request_duration', i);
    }

    const [timing] = metrics.snapshot().timings;
    expect(timing?.count).toBe(1000);
    expect(timing?.sum).toBe((1001 * 1002) / 2 - 1);
  });

  it('should record a timer on completion', () => {
    const endTimer = metrics.startTimer('analysis.run_duration', { source: 'test' });
    endTimer();

    const [timing] = metrics.snapshot().timings;
    expect(timing?.count).toBe(1);
    expect(timing?.dimensions).toEqual({ source: 'test' });
  });

  it('should clear everything on reset', () => {
    metrics.incrementCounter('analysis.runs_completed');
    metrics.reset();

    expect(metrics.snapshot()).toEqual({ counters: [], gauges: [], timings: [] });
  });
});

describe('renderSnapshot', () => {
  it('should render counters, gauges and timings in Prometheus text format', () => {
    const metrics = new InMemoryMetrics();
    metrics.incrementCounter('http.requests', 1, { path: '/api/v1/analysis/runs', method: 'POST' });
    metrics.incrementCounter('http.requests', 1, { path: '/api/v1/analysis/runs', method: 'POST' });
    metrics.recordGauge('analysis.alerts', 2, { tier: 'WEAK_SELL' });
    metrics.recordHistogram('analysis.run_duration', 10);
    metrics.recordHistogram('analysis.run_duration', 20);

    expect(renderSnapshot(metrics.snapshot())).toEqual([
      '# TYPE http_requests_total counter',
      'http_requests_total{method="POST",path="/api/v1/analysis/runs"} 2',
      '# TYPE analysis_alerts gauge',
      'analysis_alerts{tier="WEAK_SELL"} 2',
      '# TYPE analysis_run_duration_ms summary',
      'analysis_run_duration_ms{quantile="0.5"} 20',
      'analysis_run_duration_ms{quantile="0.95"} 20',
      'analysis_run_duration_ms{quantile="0.99"} 20',
      'analysis_run_duration_ms_sum 30',
      'analysis_run_duration_ms_count 2',
    ]);
  });

  it('should declare each metric type once', () => {
    const metrics = new InMemoryMetrics();
    metrics.recordGauge('analysis.alerts', 1, { tier: 'STRONG_SELL' });
    metrics.recordGauge('analysis.alerts', 0, { tier: 'NONE' });

    const lines = renderSnapshot(metrics.snapshot());
    expect(lines.filter((line) => line.startsWith('# TYPE'))).toEqual(['# TYPE analysis_alerts gauge']);
  });

  it('should escape label values', () => {
    const metrics = new InMemoryMetrics();
    metrics.recordGauge('x', 1, { reason: 'say "hi"' });

    expect(renderSnapshot(metrics.snapshot())[1]).toBe('x{reason="say \\"hi\\""} 1');
  });

  it('should escape backslashes and line feeds in label values', () => {
    expect(escapeLabelValue('C:\\tmp')).toBe('C:\\\\tmp');
    expect(escapeLabelValue('line one\nline two')).toBe('line one\\nline two');
  });

  it('should map dotted names to Prometheus names', () => {
    expect(toPrometheusName('analysis.run-duration')).toBe('analysis_run_duration');
  });
});

describe('MetricsFactory', () => {
  it('should build the requested adapter', () => {
    expect(new MetricsFactory('noop').createMetrics()).toBeInstanceOf(NoOpMetrics);
    expect(new MetricsFactory('memory').createMetrics()).toBeInstanceOf(InMemoryMetrics);
  });

  it('should default to in-memory metrics for unknown types', () => {
    expect(new MetricsFactory('statsd').createMetrics()).toBeInstanceOf(InMemoryMetrics);
  });
});
