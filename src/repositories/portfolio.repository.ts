import { query } from '@/config/database';
import { Equity, NewEquity } from '@/models';
import {
  AddOrAccumulateResult,
  HoldingLimits,
  IPortfolioRepository,
} from './interfaces/IPortfolioRepository';

interface EquityRow {
  ticker: string;
  companyName: string;
  shareCount: number;
  addedAt: Date;
}

const EQUITY_COLUMNS =
  'ticker, company_name AS "companyName", share_count AS "shareCount", added_at AS "addedAt"';

function toEquity(row: EquityRow): Equity {
  return {
    ticker: row.ticker,
    companyName: row.companyName,
    shareCount: row.shareCount,
    addedAt: row.addedAt.toISOString(),
  };
}

/**
 * Portfolio Repository (PostgreSQL)
 * Handles all database operations for 'portfolio_equities'
 */
export class PortfolioRepository implements IPortfolioRepository {
  async findEquities(portfolioId: number): Promise<Equity[]> {
    const result = await query<EquityRow>(
      `SELECT ${EQUITY_COLUMNS} FROM portfolio_equities WHERE portfolio_id = $1 ORDER BY added_at, id`,
      [portfolioId]
    );

    return result.rows.map(toEquity);
  }

  async findEquity(portfolioId: number, ticker: string): Promise<Equity | null> {
    const result = await query<EquityRow>(
      `SELECT ${EQUITY_COLUMNS} FROM portfolio_equities WHERE portfolio_id = $1 AND ticker = $2`,
      [portfolioId, ticker]
    );

    const row = result.rows[0];
    return row ? toEquity(row) : null;
  }

  /**
   * Single statement upsert, so two concurrent adds of the same ticker
   * end up as one row with both share counts.
   * The conflict WHERE is evaluated against the latest committed row, so the
   * share limit holds under concurrency. No row back means a limit refused it.
   * xmax is 0 for a freshly inserted row and non-zero for an updated one.
   */
  async addOrAccumulate(
    portfolioId: number,
    equity: NewEquity,
    limits: HoldingLimits
  ): Promise<AddOrAccumulateResult> {
    const result = await query<EquityRow & { merged: boolean }>(
      `
      INSERT INTO portfolio_equities (portfolio_id, ticker, company_name, share_count)
      SELECT $1, $2, $3, $4
      WHERE EXISTS (SELECT 1 FROM portfolio_equities WHERE portfolio_id = $1 AND ticker = $2)
         OR (SELECT COUNT(*) FROM portfolio_equities WHERE portfolio_id = $1) < $6
      ON CONFLICT (portfolio_id, ticker)
      DO UPDATE SET share_count = portfolio_equities.share_count + EXCLUDED.share_count
      WHERE portfolio_equities.share_count + EXCLUDED.share_count <= $5
      RETURNING ${EQUITY_COLUMNS}, (xmax <> 0) AS merged
      `,
      [
        portfolioId,
        equity.ticker,
        equity.companyName,
        equity.shareCount,
        limits.maxShareCount,
        limits.maxEquities,
      ]
    );

    const row = result.rows[0];
    if (row) {
      return { outcome: row.merged ? 'merged' : 'added', equity: toEquity(row) };
    }

    const held = await this.findEquity(portfolioId, equity.ticker);
    return held
      ? { outcome: 'shareLimitExceeded', heldShareCount: held.shareCount }
      : { outcome: 'portfolioFull' };
  }

  async updateShareCount(
    portfolioId: number,
    ticker: string,
    shareCount: number
  ): Promise<Equity | null> {
    const result = await query<EquityRow>(
      `
      UPDATE portfolio_equities SET share_count = $3
      WHERE portfolio_id = $1 AND ticker = $2
      RETURNING ${EQUITY_COLUMNS}
      `,
      [portfolioId, ticker, shareCount]
    );

    const row = result.rows[0];
    return row ? toEquity(row) : null;
  }

  async deleteEquity(portfolioId: number, ticker: string): Promise<boolean> {
    const result = await query(
      'DELETE FROM portfolio_equities WHERE portfolio_id = $1 AND ticker = $2',
      [portfolioId, ticker]
    );

    return (result.rowCount ?? 0) > 0;
  }
}
