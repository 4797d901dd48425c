import { Equity, NewEquity } from '@/models';
import {
  AddOrAccumulateResult,
  HoldingLimits,
  IPortfolioRepository,
} from '../interfaces/IPortfolioRepository';

/**
 * Portfolio Repository (in-memory)
 * Arrays keep insertion order; callers only ever get copies.
 * Writes never await between checking limits and mutating.
 */
export class MemoryPortfolioRepository implements IPortfolioRepository {
  private portfolios = new Map<number, Equity[]>();

  constructor(private now: () => Date = () => new Date()) {}

  async findEquities(portfolioId: number): Promise<Equity[]> {
    return this.equitiesOf(portfolioId).map((equity) => ({ ...equity }));
  }

  async findEquity(portfolioId: number, ticker: string): Promise<Equity | null> {
    const equity = this.equitiesOf(portfolioId).find((e) => e.ticker === ticker);
    return equity ? { ...equity } : null;
  }

  async addOrAccumulate(
    portfolioId: number,
    equity: NewEquity,
    limits: HoldingLimits
  ): Promise<AddOrAccumulateResult> {
    const equities = this.equitiesOf(portfolioId);
    const existing = equities.find((e) => e.ticker === equity.ticker);

    if (existing) {
      if (existing.shareCount + equity.shareCount > limits.maxShareCount) {
        return { outcome: 'shareLimitExceeded', heldShareCount: existing.shareCount };
      }
      existing.shareCount += equity.shareCount;
      return { outcome: 'merged', equity: { ...existing } };
    }

    if (equities.length >= limits.maxEquities) {
      return { outcome: 'portfolioFull' };
    }

    const stored: Equity = { ...equity, addedAt: this.now().toISOString() };
    equities.push(stored);
    this.portfolios.set(portfolioId, equities);

    return { outcome: 'added', equity: { ...stored } };
  }

  async updateShareCount(
    portfolioId: number,
    ticker: string,
    shareCount: number
  ): Promise<Equity | null> {
    const equity = this.equitiesOf(portfolioId).find((e) => e.ticker === ticker);
    if (!equity) {
      return null;
    }

    equity.shareCount = shareCount;
    return { ...equity };
  }

  async deleteEquity(portfolioId: number, ticker: string): Promise<boolean> {
    const equities = this.equitiesOf(portfolioId);
    const index = equities.findIndex((e) => e.ticker === ticker);
    if (index === -1) {
      return false;
    }

    equities.splice(index, 1);
    return true;
  }

  private equitiesOf(portfolioId: number): Equity[] {
    return this.portfolios.get(portfolioId) ?? [];
  }
}
