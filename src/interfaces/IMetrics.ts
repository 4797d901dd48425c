/**
 * Metrics Interface
 *
 * Abstraction for application and business metrics.
 * Application code depends on this interface, MetricsFactory picks the backend.
 */

/**
 * Metric dimensions - tags for filtering and grouping
 */
export type MetricDimensions = Record<string, string | number | boolean>;

export interface IMetrics {
  /**
   * Increment a counter metric
   *
   * @param value - Amount to increment by (default: 1)
   *
   * @example
   * metrics.incrementCounter("portfolio.equities.added", 1, { merged: false });
   */
  incrementCounter(name: string, value?: number, dimensions?: MetricDimensions): void;

  /**
   * Record a point-in-time value
   *
   * @example
   * metrics.recordGauge("workflow.drafts.open", 12);
   */
  recordGauge(name: string, value: number, dimensions?: MetricDimensions): void;

  /**
   * Record a duration in milliseconds
   */
  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void;

  /**
   * Start a timer; the returned function records the elapsed time as a histogram
   *
   * @example
   * const endTimer = metrics.startTimer("directory.lookup");
   * await directory.findByTicker(ticker);
   * endTimer();
   */
  startTimer(name: string, dimensions?: MetricDimensions): () => void;

  /**
   * Send buffered metrics to the backend (called on shutdown)
   */
  flush(): Promise<void>;
}

export interface IMetricsFactory {
  createMetrics(namespace?: string): IMetrics;
}
