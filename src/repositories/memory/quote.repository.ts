import { Quote } from '@/models';
import { IQuoteRepository } from '../interfaces/IQuoteRepository';

/**
 * Quote Repository (in-memory)
 */
export class MemoryQuoteRepository implements IQuoteRepository {
  private quotes = new Map<string, Quote>();

  async upsertQuote(quote: Quote): Promise<Quote> {
    this.quotes.set(quote.ticker, { ...quote });
    return { ...quote };
  }

  async findQuotes(tickers: string[]): Promise<Map<string, Quote>> {
    const found = new Map<string, Quote>();

    for (const ticker of tickers) {
      const quote = this.quotes.get(ticker);
      if (quote) {
        found.set(ticker, { ...quote });
      }
    }

    return found;
  }
}
