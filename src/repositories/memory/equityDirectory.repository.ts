import { DirectoryEntry } from '@/models';
import { IEquityDirectoryRepository } from '../interfaces/IEquityDirectoryRepository';

/**
 * Equity Directory Repository (in-memory)
 * Same matching and ordering rules as the PostgreSQL query
 */
export class MemoryEquityDirectoryRepository implements IEquityDirectoryRepository {
  private entries: Map<string, DirectoryEntry>;

  constructor(entries: DirectoryEntry[]) {
    this.entries = new Map(entries.map((entry) => [entry.ticker, entry]));
  }

  async findByTicker(ticker: string): Promise<DirectoryEntry | null> {
    const entry = this.entries.get(ticker);
    return entry ? { ...entry } : null;
  }

  async search(searchQuery: string, limit: number): Promise<DirectoryEntry[]> {
    const term = searchQuery.toUpperCase();

    return Array.from(this.entries.values())
      .filter(
        (entry) => entry.ticker.includes(term) || entry.companyName.toUpperCase().includes(term)
      )
      .sort((a, b) => {
        const aPrefix = a.ticker.startsWith(term) ? 0 : 1;
        const bPrefix = b.ticker.startsWith(term) ? 0 : 1;
        return aPrefix - bPrefix || a.ticker.localeCompare(b.ticker);
      })
      .slice(0, limit)
      .map((entry) => ({ ...entry }));
  }
}
