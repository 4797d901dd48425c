import { ValidationError } from '@/errors';
import { draftIdSchema, parseOrThrow, tickerSchema } from '@/validators/equity.validator';

// portfolio_id is a PostgreSQL INTEGER
const MAX_PORTFOLIO_ID = 2_147_483_647;

export function parsePortfolioId(raw: string | undefined): number {
  if (!raw || !/^\d+$/.test(raw)) {
    throw new ValidationError('Invalid portfolio ID');
  }

  const portfolioId = parseInt(raw, 10);
  if (portfolioId <= 0 || portfolioId > MAX_PORTFOLIO_ID) {
    throw new ValidationError('Invalid portfolio ID');
  }

  return portfolioId;
}

export function parseTickerParam(raw: string | undefined): string {
  return parseOrThrow(tickerSchema, raw);
}

export function parseDraftId(raw: string | undefined): string {
  return parseOrThrow(draftIdSchema, raw);
}
