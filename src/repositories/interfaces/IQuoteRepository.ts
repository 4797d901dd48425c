import { Quote } from '@/models';

/**
 * Quote Repository Interface
 * Latest previous-close / current price per ticker
 */
export interface IQuoteRepository {
  upsertQuote(quote: Quote): Promise<Quote>;

  /**
   * @returns Map keyed by ticker; tickers without a quote are absent
   */
  findQuotes(tickers: string[]): Promise<Map<string, Quote>>;
}
