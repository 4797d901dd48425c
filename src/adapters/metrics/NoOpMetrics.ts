/**
 * No-Op Metrics Adapter
 *
 * Default backend for development and tests.
 */

import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';

export class NoOpMetrics implements IMetrics {
  incrementCounter(_name: string, _value?: number, _dimensions?: MetricDimensions): void {
    // No-op
  }

  recordGauge(_name: string, _value: number, _dimensions?: MetricDimensions): void {
    // No-op
  }

  recordHistogram(_name: string, _value: number, _dimensions?: MetricDimensions): void {
    // No-op
  }

  startTimer(_name: string, _dimensions?: MetricDimensions): () => void {
    return () => {};
  }

  async flush(): Promise<void> {
    // No-op
  }
}
