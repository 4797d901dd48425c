import { QueryResult, QueryResultRow } from 'pg';
import { query } from '@/config/database';
import { PortfolioRepository } from '@/repositories/portfolio.repository';

jest.mock('@/config/database', () => ({ query: jest.fn() }));

const mockQuery = jest.mocked(query);

function rows<T extends QueryResultRow>(list: T[]): QueryResult<T> {
  return { rows: list, rowCount: list.length, command: 'SELECT', oid: 0, fields: [] };
}

const msftRow = (shareCount: number) => ({
  ticker: 'MSFT',
  companyName: 'Microsoft Corporation',
  shareCount,
  addedAt: new Date('2024-03-01T14:30:00.000Z'),
});

describe('PortfolioRepository', () => {
  const repo = new PortfolioRepository();
  const limits = { maxShareCount: 1_000_000, maxEquities: 500 };
  const msft = { ticker: 'MSFT', companyName: 'Microsoft Corporation', shareCount: 300_000 };

  beforeEach(() => {
    mockQuery.mockReset();
  });

  describe('addOrAccumulate', () => {
    it('should pass both limits into the upsert', async () => {
      mockQuery.mockResolvedValueOnce(rows([{ ...msftRow(300_000), merged: false }]));

      const result = await repo.addOrAccumulate(4, msft, limits);

      expect(result).toEqual({
        outcome: 'added',
        equity: {
          ticker: 'MSFT',
          companyName: 'Microsoft Corporation',
          shareCount: 300_000,
          addedAt: '2024-03-01T14:30:00.000Z',
        },
      });
      const [sql, params] = mockQuery.mock.calls[0] ?? [];
      expect(sql).toContain('WHERE portfolio_equities.share_count + EXCLUDED.share_count <= $5');
      expect(params).toEqual([4, 'MSFT', 'Microsoft Corporation', 300_000, 1_000_000, 500]);
    });

    it('should report a merge from the xmax flag', async () => {
      mockQuery.mockResolvedValueOnce(rows([{ ...msftRow(900_000), merged: true }]));

      const result = await repo.addOrAccumulate(4, msft, limits);

      expect(result.outcome).toBe('merged');
    });

    it('should report the held count when the upsert is refused for a held ticker', async () => {
      mockQuery
        .mockResolvedValueOnce(rows([]))
        .mockResolvedValueOnce(rows([msftRow(900_000)]));

      expect(await repo.addOrAccumulate(4, msft, limits)).toEqual({
        outcome: 'shareLimitExceeded',
        heldShareCount: 900_000,
      });
    });

    it('should report a full portfolio when the refused ticker is not held', async () => {
      mockQuery.mockResolvedValueOnce(rows([])).mockResolvedValueOnce(rows([]));

      expect(await repo.addOrAccumulate(4, msft, limits)).toEqual({ outcome: 'portfolioFull' });
    });
  });
});
