import {
  AddEquityResult,
  Equity,
  NewEquity,
  Portfolio,
  PortfolioListItem,
  PortfolioListing,
} from '@/models';
import { IPortfolioRepository } from '@/repositories/interfaces';
import { PORTFOLIO_LIMITS, SHARE_LIMITS } from '@/config/businessRules';
import { PORTFOLIO_DISPLAY } from '@/constants/portfolio';
import { BusinessRuleError, NotFoundError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { metrics } from '@/adapters/metrics/MetricsFactory';
import { AddEquityDTO } from '@/validators/equity.validator';
import { EquityDirectoryService } from './equityDirectory.service';

const logger = createLogger('PortfolioService');

/**
 * Portfolio Service
 * Business logic for the equities a user holds
 */
export class PortfolioService {
  constructor(
    private portfolioRepo: IPortfolioRepository,
    private directoryService: EquityDirectoryService
  ) {}

  /**
   * Equities in the order they were added
   * An unknown portfolio is simply empty
   */
  async getPortfolio(portfolioId: number): Promise<Portfolio> {
    const equities = await this.portfolioRepo.findEquities(portfolioId);

    return {
      portfolioId,
      count: equities.length,
      equities,
    };
  }

  /**
   * Portfolio grouped under a single "My Equities" section
   */
  async getPortfolioListing(portfolioId: number): Promise<PortfolioListing> {
    const equities = await this.portfolioRepo.findEquities(portfolioId);

    return {
      portfolioId,
      title: PORTFOLIO_DISPLAY.TITLE,
      equityCount: equities.length,
      totalShares: equities.reduce((sum, equity) => sum + equity.shareCount, 0),
      sections: [
        {
          header: PORTFOLIO_DISPLAY.EQUITIES_SECTION_HEADER,
          items: equities.map(toListItem),
        },
      ],
    };
  }

  /**
   * Resolve the ticker and add the equity in one step
   *
   * @throws NotFoundError when the ticker is not in the directory
   */
  async addEquity(portfolioId: number, input: AddEquityDTO): Promise<AddEquityResult> {
    const entry = await this.directoryService.lookupTicker(input.ticker);

    return this.addResolvedEquity(portfolioId, {
      ticker: entry.ticker,
      companyName: entry.companyName,
      shareCount: input.shareCount,
    });
  }

  /**
   * Add an equity whose ticker is already resolved
   *
   * A ticker that is already held is merged: share counts are summed and the
   * equity keeps its place in the list.
   *
   * @throws BusinessRuleError when the merged count exceeds the share limit
   *         or the portfolio is full
   */
  async addResolvedEquity(portfolioId: number, equity: NewEquity): Promise<AddEquityResult> {
    const result = await this.portfolioRepo.addOrAccumulate(portfolioId, equity, {
      maxShareCount: SHARE_LIMITS.MAX_SHARE_COUNT,
      maxEquities: PORTFOLIO_LIMITS.MAX_EQUITIES,
    });

    if (result.outcome === 'shareLimitExceeded') {
      const mergedCount = result.heldShareCount + equity.shareCount;
      logger.warn(
        { portfolioId, ticker: equity.ticker, held: result.heldShareCount, adding: equity.shareCount },
        'Add rejected: share limit exceeded'
      );
      throw new BusinessRuleError(
        `Holding ${mergedCount} shares of ${equity.ticker} exceeds the limit of ${SHARE_LIMITS.MAX_SHARE_COUNT} shares`
      );
    }

    if (result.outcome === 'portfolioFull') {
      throw new BusinessRuleError(
        `Portfolio ${portfolioId} already holds the maximum of ${PORTFOLIO_LIMITS.MAX_EQUITIES} equities`
      );
    }

    const stored = result.equity;
    const merged = result.outcome === 'merged';

    logger.info(
      { portfolioId, ticker: stored.ticker, shareCount: stored.shareCount, merged },
      merged ? 'Equity merged into existing holding' : 'Equity added to portfolio'
    );
    metrics.incrementCounter('portfolio.equities.added', 1, { merged });

    return { portfolioId, equity: stored, merged };
  }

  /**
   * Replace the share count of a held equity
   */
  async updateShareCount(portfolioId: number, ticker: string, shareCount: number): Promise<Equity> {
    const updated = await this.portfolioRepo.updateShareCount(portfolioId, ticker, shareCount);

    if (!updated) {
      throw new NotFoundError(`Ticker ${ticker} is not in portfolio ${portfolioId}`);
    }

    logger.info({ portfolioId, ticker, shareCount }, 'Share count updated');
    return updated;
  }

  async removeEquity(portfolioId: number, ticker: string): Promise<void> {
    const deleted = await this.portfolioRepo.deleteEquity(portfolioId, ticker);

    if (!deleted) {
      throw new NotFoundError(`Ticker ${ticker} is not in portfolio ${portfolioId}`);
    }

    logger.info({ portfolioId, ticker }, 'Equity removed from portfolio');
    metrics.incrementCounter('portfolio.equities.removed');
  }
}

function toListItem(equity: Equity): PortfolioListItem {
  const shares = `${equity.shareCount} ${equity.shareCount === 1 ? 'share' : 'shares'}`;

  return {
    ticker: equity.ticker,
    companyName: equity.companyName,
    shareCount: equity.shareCount,
    label: [equity.ticker, equity.companyName, shares].join(PORTFOLIO_DISPLAY.LABEL_SEPARATOR),
  };
}
