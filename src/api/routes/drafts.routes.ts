import { Router } from 'express';
import * as draftsController from '@/controllers/drafts.controller';
import { mutationRateLimiter } from '@/middlewares/rateLimiter';

const router = Router();

/**
 * Add-equity form
 *
 * PUT /ticker        -> pending lookup -> resolved | back to editing
 * PUT /share-count   -> submitted
 * POST /commit       -> appends the equity and closes the draft
 * DELETE /           -> cancel
 */
router.get('/:draftId', draftsController.getDraft);
router.put('/:draftId/ticker', mutationRateLimiter, draftsController.submitTicker);
router.put('/:draftId/share-count', mutationRateLimiter, draftsController.submitShareCount);
router.post('/:draftId/commit', mutationRateLimiter, draftsController.commitDraft);
router.delete('/:draftId', mutationRateLimiter, draftsController.cancelDraft);

export default router;
