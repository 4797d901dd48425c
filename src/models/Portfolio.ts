import { Equity } from './Equity';

/**
 * Portfolio as stored: equities in insertion order
 * Returned by GET /portfolios/:portfolioId/equities
 */
export interface Portfolio {
  portfolioId: number;
  count: number;
  equities: Equity[];
}

export interface PortfolioListItem {
  ticker: string;
  companyName: string;
  shareCount: number;
  label: string; // "MSFT · Microsoft Corporation · 12 shares"
}

export interface PortfolioSection {
  header: string;
  items: PortfolioListItem[];
}

/**
 * Portfolio grouped for display
 * Returned by GET /portfolios/:portfolioId
 */
export interface PortfolioListing {
  portfolioId: number;
  title: string;
  equityCount: number;
  totalShares: number;
  sections: PortfolioSection[];
}
