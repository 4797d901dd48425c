import { Equity, NewEquity } from '@/models';

/**
 * Limits enforced inside the write, so concurrent adds cannot overshoot them
 */
export interface HoldingLimits {
  maxShareCount: number;
  maxEquities: number;
}

export type AddOrAccumulateResult =
  | { outcome: 'added' | 'merged'; equity: Equity }
  | { outcome: 'shareLimitExceeded'; heldShareCount: number }
  | { outcome: 'portfolioFull' };

/**
 * Portfolio Repository Interface
 * Equities per portfolio, unique by ticker, ordered by insertion
 */
export interface IPortfolioRepository {
  findEquities(portfolioId: number): Promise<Equity[]>;

  findEquity(portfolioId: number, ticker: string): Promise<Equity | null>;

  /**
   * Append the equity, or add its shares to the one already held
   *
   * Atomic per portfolio: the limits are checked and the write made in one
   * step. Nothing is written when a limit would be exceeded.
   */
  addOrAccumulate(
    portfolioId: number,
    equity: NewEquity,
    limits: HoldingLimits
  ): Promise<AddOrAccumulateResult>;

  /**
   * @returns The updated equity, or null if the ticker is not held
   */
  updateShareCount(portfolioId: number, ticker: string, shareCount: number): Promise<Equity | null>;

  /**
   * @returns false if the ticker was not held
   */
  deleteEquity(portfolioId: number, ticker: string): Promise<boolean>;
}
