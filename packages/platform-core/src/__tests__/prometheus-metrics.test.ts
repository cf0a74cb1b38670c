import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../logging/logger.js', () => ({
  getLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { PrometheusMetrics } from '../metrics/prometheus-metrics.js';

describe('PrometheusMetrics', () => {
  let metrics: PrometheusMetrics;

  beforeEach(() => {
    metrics = new PrometheusMetrics({ serviceName: 'metrics-reporter', collectDefaultMetrics: false });
  });

  it('sums a counter across label sets', async () => {
    metrics.incrementCounter('sent_total', { topic: 'a' });
    metrics.incrementCounter('sent_total', { topic: 'b' }, 2);

    await expect(metrics.getCounterValue('sent_total')).resolves.toBe(3);
  });

  it('reports zero for an unknown counter', async () => {
    await expect(metrics.getCounterValue('missing_total')).resolves.toBe(0);
  });

  it('counts histogram observations', async () => {
    metrics.recordHistogram('duration_seconds', 0.01);
    metrics.recordHistogram('duration_seconds', 0.2);
    metrics.recordHistogram('duration_seconds', NaN);

    await expect(metrics.getHistogramCount('duration_seconds')).resolves.toBe(2);
  });

  it('exposes prefixed metrics with the service label', async () => {
    metrics.incrementCounter('sent_total', undefined, 4);

    const text = await metrics.getMetrics();

    expect(text).toContain('metrics_reporter_sent_total{service="metrics-reporter"} 4');
  });

  it('never throws when prom-client refuses a value', async () => {
    expect(() => metrics.incrementCounter('sent_total', undefined, -1)).not.toThrow();

    await expect(metrics.getCounterValue('sent_total')).resolves.toBe(0);
  });
});
