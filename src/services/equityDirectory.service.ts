import { DirectoryEntry, DirectorySearchResult } from '@/models';
import { IEquityDirectoryRepository } from '@/repositories/interfaces';
import { PAGINATION_LIMITS } from '@/config/businessRules';
import { NotFoundError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';
import { metrics } from '@/adapters/metrics/MetricsFactory';
import { parseOrThrow, tickerSchema } from '@/validators/equity.validator';

/**
 * Equity Directory Service
 * Resolves tickers to company names and powers the ticker picker search
 */
export class EquityDirectoryService {
  constructor(private directoryRepo: IEquityDirectoryRepository) {}

  /**
   * Resolve a ticker to its directory entry
   *
   * @param rawTicker - Ticker as typed; trimmed and uppercased here
   * @throws ValidationError for empty or malformed input
   * @throws NotFoundError when the directory has no such ticker
   */
  async lookupTicker(rawTicker: unknown): Promise<DirectoryEntry> {
    const ticker = parseOrThrow(tickerSchema, rawTicker);

    const endTimer = metrics.startTimer('directory.lookup.duration');
    const entry = await this.directoryRepo.findByTicker(ticker);
    endTimer();

    metrics.incrementCounter('directory.lookup', 1, { found: entry !== null });

    if (!entry) {
      logger.warn({ ticker }, 'Ticker lookup failed: not in directory');
      throw new NotFoundError(`Ticker ${ticker} not found`);
    }

    logger.debug({ ticker, companyName: entry.companyName }, 'Ticker resolved');
    return entry;
  }

  /**
   * Search the directory by ticker or company name
   *
   * @returns Formatted response with the original query, count, and results
   */
  async searchDirectory(searchQuery: string): Promise<DirectorySearchResult> {
    const trimmedQuery = searchQuery.trim();

    if (trimmedQuery.length === 0) {
      logger.debug({ originalQuery: searchQuery }, 'Search skipped: empty query');
      return {
        query: searchQuery,
        count: 0,
        results: [],
      };
    }

    const results = await this.directoryRepo.search(
      trimmedQuery,
      PAGINATION_LIMITS.MAX_SEARCH_RESULTS
    );

    logger.info({ query: trimmedQuery, resultCount: results.length }, 'Directory search completed');

    return {
      query: searchQuery,
      count: results.length,
      results,
    };
  }
}
