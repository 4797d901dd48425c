import { Router } from 'express';
import * as equitiesController from '@/controllers/equities.controller';
import { searchRateLimiter } from '@/middlewares/rateLimiter';

const router = Router();

/**
 * GET /api/v1/equities/lookup/:ticker
 * Resolve a ticker to its directory entry
 */
router.get('/lookup/:ticker', equitiesController.lookupEquity);

/**
 * GET /api/v1/equities/search?q=query
 * Search the directory by ticker or company name (max 50 results, no pagination)
 */
router.get('/search', searchRateLimiter, equitiesController.searchEquities);

export default router;
