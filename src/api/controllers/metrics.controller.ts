/**
 * Metrics Controller
 *
 * Exposes application metrics in Prometheus text format
 * Format: https://prometheus.io/docs/instrumenting/exposition_formats/
 */

import { Request, Response } from 'express';
import { getHttpMetrics } from '@/api/middlewares/metricsMiddleware';
import { env } from '@/config/env';

function gauge(name: string, help: string, value: number): string[] {
  return [`# HELP ${name} ${help}`, `# TYPE ${name} gauge`, `${name} ${value}`, ''];
}

function counter(name: string, help: string, value: number): string[] {
  return [`# HELP ${name} ${help}`, `# TYPE ${name} counter`, `${name} ${value}`, ''];
}

/**
 * GET /api/metrics
 * HTTP metrics from the middleware plus process uptime, memory and CPU
 */
export function getMetrics(_req: Request, res: Response): void {
  const memUsage = process.memoryUsage();
  const cpuUsage = process.cpuUsage();

  const metrics: string[] = [
    ...getHttpMetrics(),
    ...gauge('process_uptime_seconds', 'Process uptime in seconds', process.uptime()),
    ...gauge('process_heap_used_bytes', 'Process heap memory used in bytes', memUsage.heapUsed),
    ...gauge('process_heap_total_bytes', 'Process heap memory total in bytes', memUsage.heapTotal),
    ...gauge('process_rss_bytes', 'Process resident set size in bytes', memUsage.rss),
    // cpuUsage is in microseconds
    ...counter('process_cpu_user_seconds_total', 'Total user CPU time in seconds', cpuUsage.user / 1e6),
    ...counter('process_cpu_system_seconds_total', 'Total system CPU time in seconds', cpuUsage.system / 1e6),
    '# HELP app_info Application information',
    '# TYPE app_info gauge',
    `app_info{version="1.0.0",node_version="${process.version}",env="${env.NODE_ENV}",storage="${env.STORAGE_DRIVER}"} 1`,
    '',
  ];

  res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
  res.send(metrics.join('\n'));
}
