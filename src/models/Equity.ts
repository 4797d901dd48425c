/**
 * One holding in a portfolio
 * Unique per portfolio by ticker
 */
export interface Equity {
  ticker: string; // Uppercase symbol
  companyName: string; // Resolved from the directory when added
  shareCount: number; // Positive whole shares
  addedAt: string; // ISO timestamp, defines list order
}

/**
 * Equity about to be written, before the store stamps addedAt
 */
export type NewEquity = Omit<Equity, 'addedAt'>;

/**
 * Result of adding an equity
 * merged = true when the ticker was already held and share counts were summed
 */
export interface AddEquityResult {
  portfolioId: number;
  equity: Equity;
  merged: boolean;
}
