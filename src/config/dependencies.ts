/**
 * Dependency Container
 * Instantiates and wires all repositories and services
 *
 * STORAGE_DRIVER picks the repository implementations. Drafts are form
 * state and stay in memory with either driver.
 */

import { env } from '@/config/env';
import {
  IEquityDirectoryRepository,
  IPortfolioRepository,
  IQuoteRepository,
} from '@/repositories/interfaces';

// PostgreSQL repositories
import { EquityDirectoryRepository } from '@/repositories/equityDirectory.repository';
import { PortfolioRepository } from '@/repositories/portfolio.repository';
import { QuoteRepository } from '@/repositories/quote.repository';

// In-memory repositories
import { MemoryEquityDirectoryRepository } from '@/repositories/memory/equityDirectory.repository';
import { MemoryPortfolioRepository } from '@/repositories/memory/portfolio.repository';
import { MemoryQuoteRepository } from '@/repositories/memory/quote.repository';
import { MemoryDraftRepository } from '@/repositories/memory/draft.repository';
import { loadDirectorySeed } from '@/repositories/memory/directorySeed';

// Service implementations
import { EquityDirectoryService } from '@/services/equityDirectory.service';
import { PortfolioService } from '@/services/portfolio.service';
import { AddEquityWorkflowService } from '@/services/addEquityWorkflow.service';
import { PerformanceService } from '@/services/performance.service';

// ============================================================================
// REPOSITORIES
// ============================================================================

interface StorageRepositories {
  directoryRepository: IEquityDirectoryRepository;
  portfolioRepository: IPortfolioRepository;
  quoteRepository: IQuoteRepository;
}

function createRepositories(): StorageRepositories {
  if (env.STORAGE_DRIVER === 'postgres') {
    return {
      directoryRepository: new EquityDirectoryRepository(),
      portfolioRepository: new PortfolioRepository(),
      quoteRepository: new QuoteRepository(),
    };
  }

  return {
    directoryRepository: new MemoryEquityDirectoryRepository(
      loadDirectorySeed(env.DIRECTORY_SEED_PATH)
    ),
    portfolioRepository: new MemoryPortfolioRepository(),
    quoteRepository: new MemoryQuoteRepository(),
  };
}

export const { directoryRepository, portfolioRepository, quoteRepository } = createRepositories();
export const draftRepository = new MemoryDraftRepository();

// ============================================================================
// SERVICES
// ============================================================================

/**
 * Equity Directory Service
 * Ticker lookup and search
 */
export const directoryService = new EquityDirectoryService(directoryRepository);

/**
 * Portfolio Service
 * Holdings: list, add (with merge), update, remove
 */
export const portfolioService = new PortfolioService(portfolioRepository, directoryService);

/**
 * Add-Equity Workflow Service
 * Two-step form: ticker lookup + share count, then commit
 */
export const addEquityWorkflowService = new AddEquityWorkflowService(
  draftRepository,
  directoryService,
  portfolioService
);

/**
 * Performance Service
 * Daily change and Live Activity payload
 */
export const performanceService = new PerformanceService(
  portfolioRepository,
  quoteRepository,
  directoryService
);
