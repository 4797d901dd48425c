import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { env } from '@/config/env';
import { requestLogger } from '@/middlewares/requestLogger';
import { logger } from '@/adapters/logging/LoggerFactory';
import { errorHandler } from '@/middlewares/errorHandler';
import { notFoundHandler } from '@/middlewares/notFound';
import { globalRateLimiter } from '@/middlewares/rateLimiter';
import { metricsMiddleware } from '@/api/middlewares/metricsMiddleware';
import apiRoutes from '@/api/routes';

/**
 * Express Application Setup
 * Configures middleware, routes, and error handlers
 */

const app: Application = express();

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================
// Middleware Configuration
// ============================================

// Number of reverse proxies whose X-Forwarded-For entries are believed;
// req.ip (and so the rate limiter key) is the first address beyond them
app.set('trust proxy', env.TRUST_PROXY_HOPS);

// Security headers
app.use(helmet());

// CORS - Disable in production (API should not be called from browsers)
// In development, allow any origin but without credentials
app.use(
  cors({
    origin: env.NODE_ENV === 'production' ? false : '*',
    credentials: false,
  })
);

// Request bodies are a ticker, a share count or two prices
app.use(express.json({ limit: '10kb' }));

// HTTP metrics tracking (tracks all requests except /health and /metrics)
app.use(metricsMiddleware);

// Global rate limiting (all routes except /api/health)
app.use(globalRateLimiter);

// Request logging (pino-http)
app.use(requestLogger);

// ============================================
// Routes
// ============================================

// Swagger API Documentation
try {
  const openapiPath = join(__dirname, '../docs/openapi.yaml');
  const openapiDocument = yaml.load(readFileSync(openapiPath, 'utf8'));
  if (isJsonObject(openapiDocument)) {
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(openapiDocument));
  } else {
    logger.warn({ path: openapiPath }, 'OpenAPI document is not a YAML mapping');
  }
} catch (error) {
  logger.warn({ error }, 'Could not load OpenAPI documentation');
}

// API routes (mounted at /api)
app.use('/api', apiRoutes);

// Root endpoint
app.get('/', (_req, res) => {
  res.json({
    name: 'Equity Portfolio API',
    version: '1.0.0',
    description: 'Track equities by ticker and share count',
    documentation: '/api-docs',
    endpoints: {
      health: '/api/health',
      lookup: '/api/v1/equities/lookup/:ticker',
      search: '/api/v1/equities/search?q=query',
      portfolio: '/api/v1/portfolios/:portfolioId',
      equities: '/api/v1/portfolios/:portfolioId/equities',
      performance: '/api/v1/portfolios/:portfolioId/performance',
      drafts: '/api/v1/portfolios/:portfolioId/drafts',
    },
  });
});

// ============================================
// Error Handlers
// ============================================

// 404 handler (must be after all routes)
app.use(notFoundHandler);

// Global error handler (must be last)
app.use(errorHandler);

export default app;
