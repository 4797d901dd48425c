import { Request, Response, NextFunction } from 'express';
import {
  addEquityWorkflowService,
  performanceService,
  portfolioService,
} from '@/config/dependencies';
import {
  addEquitySchema,
  parseOrThrow,
  updateShareCountSchema,
} from '@/validators/equity.validator';
import { parsePortfolioId, parseTickerParam } from './params';

/**
 * Portfolios Controller
 * Handles HTTP requests for a portfolio and its equities
 */

/**
 * GET /api/v1/portfolios/:portfolioId
 * Portfolio grouped for display
 */
export async function getPortfolioListing(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const portfolioId = parsePortfolioId(req.params.portfolioId);

    res.json(await portfolioService.getPortfolioListing(portfolioId));
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/portfolios/:portfolioId/equities
 */
export async function getEquities(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const portfolioId = parsePortfolioId(req.params.portfolioId);

    res.json(await portfolioService.getPortfolio(portfolioId));
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/portfolios/:portfolioId/equities
 * Add an equity by ticker and share count in one request
 */
export async function addEquity(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const portfolioId = parsePortfolioId(req.params.portfolioId);
    const input = parseOrThrow(addEquitySchema, req.body);

    const result = await portfolioService.addEquity(portfolioId, input);

    res.status(201).json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * PATCH /api/v1/portfolios/:portfolioId/equities/:ticker
 */
export async function updateShareCount(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const portfolioId = parsePortfolioId(req.params.portfolioId);
    const ticker = parseTickerParam(req.params.ticker);
    const { shareCount } = parseOrThrow(updateShareCountSchema, req.body);

    res.json(await portfolioService.updateShareCount(portfolioId, ticker, shareCount));
  } catch (error) {
    next(error);
  }
}

/**
 * DELETE /api/v1/portfolios/:portfolioId/equities/:ticker
 */
export async function removeEquity(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const portfolioId = parsePortfolioId(req.params.portfolioId);
    const ticker = parseTickerParam(req.params.ticker);

    await portfolioService.removeEquity(portfolioId, ticker);

    res.status(204).end();
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/portfolios/:portfolioId/performance
 */
export async function getPerformance(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const portfolioId = parsePortfolioId(req.params.portfolioId);

    res.json(await performanceService.getDailyPerformance(portfolioId));
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/portfolios/:portfolioId/live-activity
 */
export async function getLiveActivity(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const portfolioId = parsePortfolioId(req.params.portfolioId);

    res.json(await performanceService.getLiveActivity(portfolioId));
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/portfolios/:portfolioId/drafts
 * Open an add-equity form
 */
export async function startDraft(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const portfolioId = parsePortfolioId(req.params.portfolioId);

    res.status(201).json(await addEquityWorkflowService.startDraft(portfolioId));
  } catch (error) {
    next(error);
  }
}
