import { Request, Response, NextFunction } from 'express';
import { directoryService } from '@/config/dependencies';
import { ValidationError } from '@/errors';

/**
 * Equities Controller
 * Handles HTTP requests for the equity directory
 */

/**
 * GET /api/v1/equities/lookup/:ticker
 * Resolve a ticker to its company name
 */
export async function lookupEquity(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const entry = await directoryService.lookupTicker(req.params.ticker);

    res.json(entry);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/equities/search?q=query
 * Search the directory by ticker or company name
 */
export async function searchEquities(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const searchQuery = typeof req.query.q === 'string' ? req.query.q : '';

    if (searchQuery.trim().length === 0) {
      throw new ValidationError('Search query "q" is required');
    }

    const response = await directoryService.searchDirectory(searchQuery);

    res.json(response);
  } catch (error) {
    next(error);
  }
}
