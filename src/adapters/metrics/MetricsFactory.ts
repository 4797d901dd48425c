/**
 * Metrics Factory
 *
 * Selection Logic:
 * - METRICS_TYPE=cloudwatch → CloudWatchMetrics
 * - METRICS_TYPE=noop (default) → NoOpMetrics
 */

import { IMetrics, IMetricsFactory } from '@/interfaces/IMetrics';
import { env } from '@/config/env';
import { NoOpMetrics } from './NoOpMetrics';
import { CloudWatchMetrics } from './CloudWatchMetrics';

export class MetricsFactory implements IMetricsFactory {
  createMetrics(namespace?: string): IMetrics {
    switch (env.METRICS_TYPE) {
      case 'cloudwatch':
        return new CloudWatchMetrics(namespace);

      case 'noop':
      default:
        return new NoOpMetrics();
    }
  }
}

/**
 * Default metrics instance for application use
 */
const factory = new MetricsFactory();
export const metrics = factory.createMetrics(env.CLOUDWATCH_METRICS_NAMESPACE);
