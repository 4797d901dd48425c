import { DirectoryEntry } from '@/models';

/**
 * Equity Directory Repository Interface
 * Read-only access to the ticker → company name directory
 */
export interface IEquityDirectoryRepository {
  /**
   * @param ticker - Normalized (uppercase) ticker
   * @returns Promise resolving to the entry or null if the ticker is unknown
   */
  findByTicker(ticker: string): Promise<DirectoryEntry | null>;

  /**
   * Case-insensitive match on ticker or company name
   * Tickers starting with the query come first, then by ticker
   * @param searchQuery - Trimmed, non-empty search term
   * @param limit - Maximum number of entries
   */
  search(searchQuery: string, limit: number): Promise<DirectoryEntry[]>;
}
