import { Request, Response, NextFunction } from 'express';
import { performanceService } from '@/config/dependencies';
import { parseOrThrow, recordQuoteSchema } from '@/validators/equity.validator';

/**
 * PUT /api/v1/quotes/:ticker
 * Body: { previousClose, currentPrice }
 */
export async function recordQuote(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const prices = parseOrThrow(recordQuoteSchema, req.body);

    res.json(await performanceService.recordQuote(req.params.ticker, prices));
  } catch (error) {
    next(error);
  }
}
