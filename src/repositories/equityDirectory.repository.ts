import { query } from '@/config/database';
import { DirectoryEntry } from '@/models';
import { IEquityDirectoryRepository } from './interfaces/IEquityDirectoryRepository';

/**
 * Equity Directory Repository (PostgreSQL)
 * Reads the 'equity_directory' table
 */
export class EquityDirectoryRepository implements IEquityDirectoryRepository {
  async findByTicker(ticker: string): Promise<DirectoryEntry | null> {
    const result = await query<DirectoryEntry>(
      'SELECT ticker, company_name AS "companyName", exchange FROM equity_directory WHERE ticker = $1',
      [ticker]
    );

    return result.rows[0] ?? null;
  }

  async search(searchQuery: string, limit: number): Promise<DirectoryEntry[]> {
    // Escape LIKE special characters so "100%" matches literally
    const escapedQuery = searchQuery.toUpperCase().replace(/[%_\\]/g, '\\$&');

    const result = await query<DirectoryEntry>(
      `
      SELECT ticker, company_name AS "companyName", exchange
      FROM equity_directory
      WHERE ticker LIKE $1 ESCAPE '\\'
         OR UPPER(company_name) LIKE $1 ESCAPE '\\'
      ORDER BY (ticker LIKE $2 ESCAPE '\\') DESC, ticker
      LIMIT $3
      `,
      [`%${escapedQuery}%`, `${escapedQuery}%`, limit]
    );

    return result.rows;
  }
}
