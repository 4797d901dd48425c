import { Request, Response, NextFunction } from 'express';
import { addEquityWorkflowService } from '@/config/dependencies';
import { parseDraftId } from './params';

/**
 * Drafts Controller
 * One open add-equity form per draft
 */

export async function getDraft(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const draftId = parseDraftId(req.params.draftId);

    res.json(await addEquityWorkflowService.getDraft(draftId));
  } catch (error) {
    next(error);
  }
}

/**
 * PUT /api/v1/drafts/:draftId/ticker
 * Body: { ticker }
 */
export async function submitTicker(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const draftId = parseDraftId(req.params.draftId);
    const body: { ticker?: unknown } = req.body ?? {};

    res.json(await addEquityWorkflowService.submitTicker(draftId, body.ticker));
  } catch (error) {
    next(error);
  }
}

/**
 * PUT /api/v1/drafts/:draftId/share-count
 * Body: { shareCount } as a number or numeric string
 */
export async function submitShareCount(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const draftId = parseDraftId(req.params.draftId);
    const body: { shareCount?: unknown } = req.body ?? {};

    res.json(await addEquityWorkflowService.submitShareCount(draftId, body.shareCount));
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/drafts/:draftId/commit
 */
export async function commitDraft(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const draftId = parseDraftId(req.params.draftId);

    res.status(201).json(await addEquityWorkflowService.commitDraft(draftId));
  } catch (error) {
    next(error);
  }
}

/**
 * DELETE /api/v1/drafts/:draftId
 */
export async function cancelDraft(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const draftId = parseDraftId(req.params.draftId);

    await addEquityWorkflowService.cancelDraft(draftId);

    res.status(204).end();
  } catch (error) {
    next(error);
  }
}
