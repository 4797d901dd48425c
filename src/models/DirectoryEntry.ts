/**
 * Equity directory entry
 * Matches the 'equity_directory' table schema and data/equity-directory.json
 */
export interface DirectoryEntry {
  ticker: string;
  companyName: string;
  exchange: string;
}

export interface DirectorySearchResult {
  query: string;
  count: number;
  results: DirectoryEntry[];
}
