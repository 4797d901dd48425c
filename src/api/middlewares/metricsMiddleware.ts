/**
 * HTTP Metrics Middleware
 *
 * In-process request counters and latency samples, exposed by GET /api/metrics:
 * - http_requests_total{method,path,status}
 * - http_request_duration_seconds{method,path}
 */

import { Request, Response, NextFunction } from 'express';

// Keep only the last N durations per endpoint
const MAX_SAMPLES_PER_ROUTE = 1000;

// Requests no route matched share one series, whatever their path
const UNMATCHED_PATH = 'unmatched';

const requestCounts = new Map<string, { method: string; path: string; status: number; count: number }>();
const requestDurations = new Map<string, { method: string; path: string; samples: number[] }>();

/**
 * Collapse path parameters so each route is one series:
 * - /api/v1/portfolios/7/equities/MSFT -> /api/v1/portfolios/:id/equities/:ticker
 * - /api/v1/drafts/<uuid>/ticker -> /api/v1/drafts/:uuid/ticker
 * - /api/v1/equities/lookup/AAPL -> /api/v1/equities/lookup/:ticker
 */
export function normalizePath(path: string): string {
  return path
    .replace(/\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, '/:uuid')
    .replace(/\/\d+(?=\/|$)/g, '/:id')
    .replace(/\/(equities\/lookup|:id\/equities|quotes)\/[^/]+/g, '/$1/:ticker');
}

/**
 * Middleware to track HTTP request metrics
 */
export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestPath = normalizePath(req.path);

  if (requestPath === '/api/metrics' || requestPath === '/api/health') {
    next();
    return;
  }

  const startTime = process.hrtime.bigint();

  res.on('finish', () => {
    const duration = Number(process.hrtime.bigint() - startTime) / 1e9;
    const method = req.method;
    const status = res.statusCode;
    const path = req.route ? requestPath : UNMATCHED_PATH;

    const countKey = `${method} ${path} ${status}`;
    const counter = requestCounts.get(countKey) ?? { method, path, status, count: 0 };
    counter.count += 1;
    requestCounts.set(countKey, counter);

    const durationKey = `${method} ${path}`;
    const series = requestDurations.get(durationKey) ?? { method, path, samples: [] };
    series.samples.push(duration);
    if (series.samples.length > MAX_SAMPLES_PER_ROUTE) {
      series.samples.shift();
    }
    requestDurations.set(durationKey, series);
  });

  next();
}

/**
 * All HTTP request metrics in Prometheus text format
 */
export function getHttpMetrics(): string[] {
  const lines: string[] = [];

  lines.push('# HELP http_requests_total Total HTTP requests');
  lines.push('# TYPE http_requests_total counter');
  for (const { method, path, status, count } of requestCounts.values()) {
    lines.push(`http_requests_total{method="${method}",path="${path}",status="${status}"} ${count}`);
  }
  lines.push('');

  lines.push('# HELP http_request_duration_seconds HTTP request duration in seconds');
  lines.push('# TYPE http_request_duration_seconds summary');
  for (const { method, path, samples } of requestDurations.values()) {
    if (samples.length === 0) continue;

    const labels = `method="${method}",path="${path}"`;
    const sorted = [...samples].sort((a, b) => a - b);
    const quantile = (q: number): number => sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * q))] ?? 0;
    const sum = samples.reduce((a, b) => a + b, 0);

    for (const q of [0.5, 0.95, 0.99]) {
      lines.push(`http_request_duration_seconds{${labels},quantile="${q}"} ${quantile(q).toFixed(4)}`);
    }
    lines.push(`http_request_duration_seconds_sum{${labels}} ${sum.toFixed(4)}`);
    lines.push(`http_request_duration_seconds_count{${labels}} ${samples.length}`);
  }
  lines.push('');

  return lines;
}
