import { describe, it, expect } from 'vitest';
import { MetricsCollector } from '../../src/utils/metrics.js';

describe('MetricsCollector', () => {
  it('should render labelled counters in Prometheus format', () => {
    const collector = new MetricsCollector();
    collector.counter('items_total', 'Items by status');

    collector.incrementCounter('items_total', { status: 'cached' });
    collector.incrementCounter('items_total', { status: 'cached' });
    collector.incrementCounter('items_total', { status: 'started' });

    expect(collector.getPrometheusMetrics()).toBe(
      '# HELP items_total Items by status\n' +
      '# TYPE items_total counter\n' +
      'items_total{status="cached"} 2\n' +
      'items_total{status="started"} 1\n'
    );
  });

  it('should sort label keys', () => {
    const collector = new MetricsCollector();

    collector.incrementCounter('requests_total', { path: '/health', method: 'GET' });

    expect(collector.getPrometheusMetrics()).toContain('requests_total{method="GET",path="/health"} 1\n');
  });

  it('should track gauges up and down', () => {
    const collector = new MetricsCollector();

    collector.incrementGauge('in_flight');
    collector.incrementGauge('in_flight');
    collector.decrementGauge('in_flight');
    collector.setGauge('tasks', 4);

    const json = collector.getJsonMetrics();
    expect(json.gauges.in_flight?.values).toEqual({ '': 1 });
    expect(json.gauges.tasks?.values).toEqual({ '': 4 });
  });

  it('should bucket histogram observations', () => {
    const collector = new MetricsCollector();
    collector.histogram('batch_size', 'Batch sizes', [1, 10, 100]);

    collector.observeHistogram('batch_size', 5);
    collector.observeHistogram('batch_size', 50);
    collector.observeHistogram('batch_size', 500);

    expect(collector.getJsonMetrics().histograms.batch_size?.values['']).toEqual({
      counts: [0, 1, 2, 3],
      sum: 555,
      count: 3,
    });
    expect(collector.getPrometheusMetrics()).toContain('batch_size_bucket{le="+Inf"} 3\n');
  });
});
