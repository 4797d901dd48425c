/**
 * Latest known prices for a ticker
 *
 * Prices are strings to preserve precision
 * Convert to Decimal for calculations
 */
export interface Quote {
  ticker: string;
  previousClose: string;
  currentPrice: string;
  asOf: string; // ISO timestamp
}
