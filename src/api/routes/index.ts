import { Router } from 'express';
import equitiesRoutes from './equities.routes';
import portfoliosRoutes from './portfolios.routes';
import draftsRoutes from './drafts.routes';
import quotesRoutes from './quotes.routes';
import { getMetrics } from '@/api/controllers/metrics.controller';

const router = Router();

/**
 * API Routes
 * Base path: /api
 *
 * Versioned routes live under /api/v1; health and metrics stay unversioned.
 */

router.get('/health', (_req, res) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    service: 'equity-portfolio-api',
    version: 'v1',
  });
});

// Prometheus text format
router.get('/metrics', getMetrics);

const v1Router = Router();

// No authentication: portfolio IDs are trusted as given
v1Router.use('/equities', equitiesRoutes);
v1Router.use('/portfolios', portfoliosRoutes);
v1Router.use('/drafts', draftsRoutes);
v1Router.use('/quotes', quotesRoutes);

router.use('/v1', v1Router);

export default router;
