/**
 * Repository Interfaces
 * Barrel export for all repository interface contracts
 */

export * from './IEquityDirectoryRepository';
export * from './IPortfolioRepository';
export * from './IQuoteRepository';
export * from './IDraftRepository';
