import { performance } from 'perf_hooks';

/**
 * In-process metrics collection, exposed as Prometheus text and JSON
 */

export type Labels = Record<string, string>;

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

export interface TimerResult {
  stop: () => number;
}

interface MetricSeries {
  help: string;
  values: Record<string, number>;
}

interface HistogramSeries {
  help: string;
  buckets: number[];
  values: Record<string, { counts: number[]; sum: number; count: number }>;
}

export interface JsonMetrics {
  timestamp: number;
  uptime: number;
  counters: Record<string, MetricSeries>;
  gauges: Record<string, MetricSeries>;
  histograms: Record<string, HistogramSeries>;
}

export interface SystemMetrics {
  memory: NodeJS.MemoryUsage;
  cpu: NodeJS.CpuUsage;
  uptime: number;
  pid: number;
  version: string;
  platform: string;
  arch: string;
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
    let metric = this.counters.get(name);
    if (!metric) {
      metric = { name, help, values: new Map() };
      this.counters.set(name, metric);
    }
    return metric;
  }

  /**
   * Create or get a gauge metric
   */
  gauge(name: string, help: string = ''): GaugeMetric {
    let metric = this.gauges.get(name);
    if (!metric) {
      metric = { name, help, values: new Map() };
      this.gauges.set(name, metric);
    }
    return metric;
  }

  /**
   * Create or get a histogram metric
   */
  histogram(name: string, help: string = '', buckets: number[] = DEFAULT_BUCKETS): HistogramMetric {
    let metric = this.histograms.get(name);
    if (!metric) {
      metric = {
        name,
        help,
        buckets,
        counts: new Map(),
        sums: new Map(),
        totalCounts: new Map()
      };
      this.histograms.set(name, metric);
    }
    return metric;
  }

  incrementCounter(name: string, labels?: Labels, value: number = 1): void {
    const counter = this.counter(name);
    const labelKey = this.getLabelKey(labels);
    counter.values.set(labelKey, (counter.values.get(labelKey) || 0) + value);
  }

  setGauge(name: string, value: number, labels?: Labels): void {
    this.gauge(name).values.set(this.getLabelKey(labels), value);
  }

  incrementGauge(name: string, value: number = 1, labels?: Labels): void {
    const gauge = this.gauge(name);
    const labelKey = this.getLabelKey(labels);
    gauge.values.set(labelKey, (gauge.values.get(labelKey) || 0) + value);
  }

  decrementGauge(name: string, value: number = 1, labels?: Labels): void {
    this.incrementGauge(name, -value, labels);
  }

  /**
   * Observe a value in a histogram
   */
  observeHistogram(name: string, value: number, labels?: Labels): void {
    const histogram = this.histogram(name);
    const labelKey = this.getLabelKey(labels);

    const counts = histogram.counts.get(labelKey) ?? new Array<number>(histogram.buckets.length + 1).fill(0);
    histogram.counts.set(labelKey, counts);

    histogram.buckets.forEach((bucket, i) => {
      if (value <= bucket) {
        counts[i] = (counts[i] ?? 0) + 1;
      }
    });
    const last = counts.length - 1;
    counts[last] = (counts[last] ?? 0) + 1; // +Inf bucket

    histogram.sums.set(labelKey, (histogram.sums.get(labelKey) || 0) + value);
    histogram.totalCounts.set(labelKey, (histogram.totalCounts.get(labelKey) || 0) + 1);
  }

  /**
   * Start a timer; stop() records the elapsed seconds
   */
  startTimer(name: string, labels?: Labels): TimerResult {
    const startTime = performance.now();

    return {
      stop: (): number => {
        const duration = (performance.now() - startTime) / 1000;
        this.observeHistogram(name, duration, labels);
        return duration;
      }
    };
  }

  /**
   * Get all metrics in Prometheus format
   */
  getPrometheusMetrics(): string {
    let output = '';

    for (const counter of this.counters.values()) {
      output += this.header(counter.name, counter.help, 'counter');
      for (const [labelKey, value] of counter.values) {
        output += `${counter.name}${this.wrap(labelKey)} ${value}\n`;
      }
    }

    for (const gauge of this.gauges.values()) {
      output += this.header(gauge.name, gauge.help, 'gauge');
      for (const [labelKey, value] of gauge.values) {
        output += `${gauge.name}${this.wrap(labelKey)} ${value}\n`;
      }
    }

    for (const histogram of this.histograms.values()) {
      output += this.header(histogram.name, histogram.help, 'histogram');

      for (const [labelKey, counts] of histogram.counts) {
        const baseLabels = labelKey ? labelKey + ',' : '';

        histogram.buckets.forEach((bucket, i) => {
          output += `${histogram.name}_bucket{${baseLabels}le="${bucket}"} ${counts[i] ?? 0}\n`;
        });
        output += `${histogram.name}_bucket{${baseLabels}le="+Inf"} ${counts[counts.length - 1] ?? 0}\n`;

        output += `${histogram.name}_sum${this.wrap(labelKey)} ${histogram.sums.get(labelKey) ?? 0}\n`;
        output += `${histogram.name}_count${this.wrap(labelKey)} ${histogram.totalCounts.get(labelKey) ?? 0}\n`;
      }
    }

    return output;
  }

  /**
   * Get all metrics as JSON
   */
  getJsonMetrics(): JsonMetrics {
    const series = (metric: CounterMetric | GaugeMetric): MetricSeries => ({
      help: metric.help,
      values: Object.fromEntries(metric.values)
    });

    return {
      timestamp: Date.now(),
      uptime: Date.now() - this.startTime,
      counters: Object.fromEntries(
        Array.from(this.counters.entries()).map(([name, metric]) => [name, series(metric)])
      ),
      gauges: Object.fromEntries(
        Array.from(this.gauges.entries()).map(([name, metric]) => [name, series(metric)])
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

  /**
   * Clear recorded values, keeping registered metrics and their help text
   */
  reset(): void {
    for (const metric of [...this.counters.values(), ...this.gauges.values()]) {
      metric.values.clear();
    }
    for (const histogram of this.histograms.values()) {
      histogram.counts.clear();
      histogram.sums.clear();
      histogram.totalCounts.clear();
    }
    this.startTime = Date.now();
  }

  getSystemMetrics(): SystemMetrics {
    return {
      memory: process.memoryUsage(),
      cpu: process.cpuUsage(),
      uptime: process.uptime(),
      pid: process.pid,
      version: process.version,
      platform: process.platform,
      arch: process.arch
    };
  }

  private header(name: string, help: string, type: string): string {
    return (help ? `# HELP ${name} ${help}\n` : '') + `# TYPE ${name} ${type}\n`;
  }

  private wrap(labelKey: string): string {
    return labelKey ? `{${labelKey}}` : '';
  }

  private getLabelKey(labels?: Labels): string {
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

// Export MetricsCollector class for custom instances
export { MetricsCollector };

/**
 * Metrics recorded by the queue and its servers
 */
export const QueueMetrics = {
  // HTTP metrics
  httpRequestsTotal: metrics.counter('opsqueue_http_requests_total', 'Total HTTP requests'),
  httpRequestDuration: metrics.histogram('opsqueue_http_request_duration_seconds', 'HTTP request duration'),
  httpRequestsInFlight: metrics.gauge('opsqueue_http_requests_in_flight', 'HTTP requests currently being processed'),
  httpErrors: metrics.counter('opsqueue_http_errors_total', 'Total HTTP errors'),
  serverStarted: metrics.gauge('opsqueue_server_started', 'Whether the HTTP server is listening'),

  // Task metrics
  tasksSubmitted: metrics.counter('opsqueue_tasks_submitted_total', 'Total tasks admitted'),
  tasksFinished: metrics.counter('opsqueue_tasks_finished_total', 'Tasks reaching a terminal state'),
  taskRetries: metrics.counter('opsqueue_task_retries_total', 'Attempts rescheduled after a retryable failure'),
  tasksPending: metrics.gauge('opsqueue_tasks_pending', 'Tasks waiting in key buckets'),
  tasksRunning: metrics.gauge('opsqueue_tasks_running', 'Attempts currently executing'),
  tasksEvicted: metrics.counter('opsqueue_tasks_evicted_total', 'Finished tasks removed by retention'),
  attemptDuration: metrics.histogram(
    'opsqueue_attempt_duration_seconds',
    'Executor attempt duration',
    [0.1, 0.5, 1, 5, 10, 30, 60, 300, 900, 1800]
  ),
};
