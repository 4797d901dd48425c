import { query } from '@/config/database';
import { Quote } from '@/models';
import { IQuoteRepository } from './interfaces/IQuoteRepository';

interface QuoteRow {
  ticker: string;
  previousClose: string; // NUMERIC comes back as string
  currentPrice: string;
  asOf: Date;
}

const QUOTE_COLUMNS =
  'ticker, previous_close AS "previousClose", current_price AS "currentPrice", as_of AS "asOf"';

function toQuote(row: QuoteRow): Quote {
  return {
    ticker: row.ticker,
    previousClose: row.previousClose,
    currentPrice: row.currentPrice,
    asOf: row.asOf.toISOString(),
  };
}

/**
 * Quote Repository (PostgreSQL)
 * One row per ticker in 'quotes', overwritten on every update
 */
export class QuoteRepository implements IQuoteRepository {
  async upsertQuote(quote: Quote): Promise<Quote> {
    const result = await query<QuoteRow>(
      `
      INSERT INTO quotes (ticker, previous_close, current_price, as_of)
      VALUES ($1, $2, $3, $4)
      ON CONFLICT (ticker)
      DO UPDATE SET previous_close = EXCLUDED.previous_close,
                    current_price = EXCLUDED.current_price,
                    as_of = EXCLUDED.as_of
      RETURNING ${QUOTE_COLUMNS}
      `,
      [quote.ticker, quote.previousClose, quote.currentPrice, quote.asOf]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('Upsert into quotes returned no row');
    }

    return toQuote(row);
  }

  async findQuotes(tickers: string[]): Promise<Map<string, Quote>> {
    if (tickers.length === 0) {
      return new Map();
    }

    const result = await query<QuoteRow>(
      `SELECT ${QUOTE_COLUMNS} FROM quotes WHERE ticker = ANY($1)`,
      [tickers]
    );

    return new Map(result.rows.map((row) => [row.ticker, toQuote(row)]));
  }
}
