import { Router } from 'express';
import * as quotesController from '@/controllers/quotes.controller';
import { mutationRateLimiter } from '@/middlewares/rateLimiter';

const router = Router();

/**
 * PUT /api/v1/quotes/:ticker
 * Record the previous close and current price used by the daily performance report
 */
router.put('/:ticker', mutationRateLimiter, quotesController.recordQuote);

export default router;
