import { Router } from 'express';
import * as portfoliosController from '@/controllers/portfolios.controller';
import { mutationRateLimiter } from '@/middlewares/rateLimiter';

const router = Router();

router.get('/:portfolioId', portfoliosController.getPortfolioListing);

router.get('/:portfolioId/equities', portfoliosController.getEquities);
router.post('/:portfolioId/equities', mutationRateLimiter, portfoliosController.addEquity);
router.patch(
  '/:portfolioId/equities/:ticker',
  mutationRateLimiter,
  portfoliosController.updateShareCount
);
router.delete('/:portfolioId/equities/:ticker', mutationRateLimiter, portfoliosController.removeEquity);

/**
 * Daily change snapshot and the Live Activity payload derived from it
 */
router.get('/:portfolioId/performance', portfoliosController.getPerformance);
router.get('/:portfolioId/live-activity', portfoliosController.getLiveActivity);

/**
 * POST /api/v1/portfolios/:portfolioId/drafts
 * Open an add-equity form; the rest of the flow lives under /drafts
 */
router.post('/:portfolioId/drafts', mutationRateLimiter, portfoliosController.startDraft);

export default router;
