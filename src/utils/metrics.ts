/**
 * In-process metrics for the search gateway
 * Exposed in Prometheus text format and as JSON
 */

export interface CounterMetric {
  name: string;
  help: string;
  values: Map<string, number>;
}

export interface GaugeMetric {
  name: string;
  help: string;
  values: Map<string, number>;
}

export interface HistogramMetric {
  name: string;
  help: string;
  buckets: number[];
  counts: Map<string, number[]>;
  sums: Map<string, number>;
  totalCounts: Map<string, number>;
}

export interface JsonMetrics {
  timestamp: number;
  uptime: number;
  counters: Record<string, { help: string; values: Record<string, number> }>;
  gauges: Record<string, { help: string; values: Record<string, number> }>;
  histograms: Record<string, {
    help: string;
    buckets: number[];
    values: Record<string, { counts: number[]; sum: number; count: number }>;
  }>;
}

export interface SystemMetrics {
  memory: { rss: number; heapUsed: number; heapTotal: number };
  uptime: number;
  pid: number;
  version: string;
}

const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

class MetricsCollector {
  private counters = new Map<string, CounterMetric>();
  private gauges = new Map<string, GaugeMetric>();
  private histograms = new Map<string, HistogramMetric>();
  private startTime = Date.now();

  /**
   * Create or get a counter metric
   */
  counter(name: string, help: string = ''): CounterMetric {
    let counter = this.counters.get(name);
    if (!counter) {
      counter = { name, help, values: new Map() };
      this.counters.set(name, counter);
    }
    return counter;
  }

  /**
   * Create or get a gauge metric
   */
  gauge(name: string, help: string = ''): GaugeMetric {
    let gauge = this.gauges.get(name);
    if (!gauge) {
      gauge = { name, help, values: new Map() };
      this.gauges.set(name, gauge);
    }
    return gauge;
  }

  /**
   * Create or get a histogram metric
   */
  histogram(name: string, help: string = '', buckets: number[] = DEFAULT_BUCKETS): HistogramMetric {
    let histogram = this.histograms.get(name);
    if (!histogram) {
      histogram = {
        name,
        help,
        buckets,
        counts: new Map(),
        sums: new Map(),
        totalCounts: new Map()
      };
      this.histograms.set(name, histogram);
    }
    return histogram;
  }

  incrementCounter(name: string, labels?: Record<string, string>, value: number = 1): void {
    const counter = this.counter(name);
    const labelKey = this.getLabelKey(labels);
    counter.values.set(labelKey, (counter.values.get(labelKey) || 0) + value);
  }

  setGauge(name: string, value: number, labels?: Record<string, string>): void {
    this.gauge(name).values.set(this.getLabelKey(labels), value);
  }

  incrementGauge(name: string, value: number = 1, labels?: Record<string, string>): void {
    const gauge = this.gauge(name);
    const labelKey = this.getLabelKey(labels);
    gauge.values.set(labelKey, (gauge.values.get(labelKey) || 0) + value);
  }

  decrementGauge(name: string, value: number = 1, labels?: Record<string, string>): void {
    this.incrementGauge(name, -value, labels);
  }

  /**
   * Observe a value in a histogram
   */
  observeHistogram(name: string, value: number, labels?: Record<string, string>): void {
    const histogram = this.histogram(name);
    const labelKey = this.getLabelKey(labels);

    const counts = histogram.counts.get(labelKey) ?? new Array<number>(histogram.buckets.length + 1).fill(0);
    histogram.counts.set(labelKey, counts);

    histogram.buckets.forEach((bucket, i) => {
      if (value <= bucket) {
        counts[i] = (counts[i] ?? 0) + 1;
      }
    });
    // +Inf bucket
    counts[counts.length - 1] = (counts[counts.length - 1] ?? 0) + 1;

    histogram.sums.set(labelKey, (histogram.sums.get(labelKey) || 0) + value);
    histogram.totalCounts.set(labelKey, (histogram.totalCounts.get(labelKey) || 0) + 1);
  }

  /**
   * Get all metrics in Prometheus format
   */
  getPrometheusMetrics(): string {
    let output = '';

    for (const counter of this.counters.values()) {
      output += this.header(counter.name, counter.help, 'counter');
      for (const [labelKey, value] of counter.values) {
        output += `${counter.name}${labelKey ? `{${labelKey}}` : ''} ${value}\n`;
      }
    }

    for (const gauge of this.gauges.values()) {
      output += this.header(gauge.name, gauge.help, 'gauge');
      for (const [labelKey, value] of gauge.values) {
        output += `${gauge.name}${labelKey ? `{${labelKey}}` : ''} ${value}\n`;
      }
    }

    for (const histogram of this.histograms.values()) {
      output += this.header(histogram.name, histogram.help, 'histogram');
      for (const [labelKey, counts] of histogram.counts) {
        const baseLabels = labelKey ? labelKey + ',' : '';

        histogram.buckets.forEach((bucket, i) => {
          output += `${histogram.name}_bucket{${baseLabels}le="${bucket}"} ${counts[i]}\n`;
        });
        output += `${histogram.name}_bucket{${baseLabels}le="+Inf"} ${counts[counts.length - 1]}\n`;

        const labels = labelKey ? `{${labelKey}}` : '';
        output += `${histogram.name}_sum${labels} ${histogram.sums.get(labelKey) ?? 0}\n`;
        output += `${histogram.name}_count${labels} ${histogram.totalCounts.get(labelKey) ?? 0}\n`;
      }
    }

    return output;
  }

  getJsonMetrics(): JsonMetrics {
    return {
      timestamp: Date.now(),
      uptime: Date.now() - this.startTime,
      counters: Object.fromEntries(
        Array.from(this.counters.entries()).map(([name, metric]) => [
          name,
          { help: metric.help, values: Object.fromEntries(metric.values) }
        ])
      ),
      gauges: Object.fromEntries(
        Array.from(this.gauges.entries()).map(([name, metric]) => [
          name,
          { help: metric.help, values: Object.fromEntries(metric.values) }
        ])
      ),
      histograms: Object.fromEntries(
        Array.from(this.histograms.entries()).map(([name, metric]) => [
          name,
          {
            help: metric.help,
            buckets: metric.buckets,
            values: Object.fromEntries(
              Array.from(metric.counts.entries()).map(([labelKey, counts]) => [
                labelKey,
                {
                  counts,
                  sum: metric.sums.get(labelKey) ?? 0,
                  count: metric.totalCounts.get(labelKey) ?? 0
                }
              ])
            )
          }
        ])
      )
    };
  }

  getSystemMetrics(): SystemMetrics {
    const memUsage = process.memoryUsage();
    return {
      memory: {
        rss: memUsage.rss,
        heapUsed: memUsage.heapUsed,
        heapTotal: memUsage.heapTotal
      },
      uptime: process.uptime(),
      pid: process.pid,
      version: process.version
    };
  }

  private header(name: string, help: string, type: string): string {
    return (help ? `# HELP ${name} ${help}\n` : '') + `# TYPE ${name} ${type}\n`;
  }

  private getLabelKey(labels?: Record<string, string>): string {
    if (!labels || Object.keys(labels).length === 0) {
      return '';
    }

    return Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([key, value]) => `${key}="${value}"`)
      .join(',');
  }
}

// Default metrics instance
export const metrics = new MetricsCollector();

export { MetricsCollector };

/**
 * Metric names used across the gateway
 */
export const GatewayMetrics = {
  httpRequestsTotal: 'gateway_http_requests_total',
  httpRequestDuration: 'gateway_http_request_duration_seconds',
  httpRequestsInFlight: 'gateway_http_requests_in_flight',
  httpErrorsTotal: 'gateway_http_errors_total',
  batchRequestsTotal: 'gateway_batch_requests_total',
  batchRejectedTotal: 'gateway_batch_rejected_total',
  batchSize: 'gateway_batch_size',
  batchItemsTotal: 'gateway_batch_items_total',
  tasksInFlight: 'gateway_tasks_in_flight',
  tasksCompletedTotal: 'gateway_tasks_completed_total',
  cacheLookupsTotal: 'gateway_cache_lookups_total',
} as const;

metrics.counter(GatewayMetrics.httpRequestsTotal, 'Total HTTP requests');
metrics.histogram(GatewayMetrics.httpRequestDuration, 'HTTP request duration');
metrics.gauge(GatewayMetrics.httpRequestsInFlight, 'HTTP requests currently being processed');
metrics.counter(GatewayMetrics.httpErrorsTotal, 'Unhandled HTTP errors');
metrics.counter(GatewayMetrics.batchRequestsTotal, 'Batches that passed the precondition gate');
metrics.counter(GatewayMetrics.batchRejectedTotal, 'Batches rejected before any item was processed');
metrics.histogram(GatewayMetrics.batchSize, 'Queries per accepted batch', [1, 5, 10, 25, 50, 100, 200]);
metrics.counter(GatewayMetrics.batchItemsTotal, 'Batch items by terminal status');
metrics.gauge(GatewayMetrics.tasksInFlight, 'Search tasks currently running');
metrics.counter(GatewayMetrics.tasksCompletedTotal, 'Search tasks finished, by outcome');
metrics.counter(GatewayMetrics.cacheLookupsTotal, 'Profile cache lookups, by result');
