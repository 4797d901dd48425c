import request from 'supertest';
import app from '@/app';

/**
 * Each test uses its own portfolio ID: the in-memory store lives for the whole file
 */
describe('Portfolios API', () => {
  describe('GET /api/v1/portfolios/:portfolioId', () => {
    it('should return an empty listing for a new portfolio', async () => {
      const response = await request(app).get('/api/v1/portfolios/1').expect(200);

      expect(response.body).toEqual({
        portfolioId: 1,
        title: 'My Portfolio',
        equityCount: 0,
        totalShares: 0,
        sections: [{ header: 'My Equities', items: [] }],
      });
    });

    it('should return 400 for an invalid portfolio ID', async () => {
      const invalid = await request(app).get('/api/v1/portfolios/abc').expect(400);
      const zero = await request(app).get('/api/v1/portfolios/0').expect(400);

      expect(invalid.body.error.message).toBe('Invalid portfolio ID');
      expect(zero.body.error.message).toBe('Invalid portfolio ID');
    });
  });

  describe('POST /api/v1/portfolios/:portfolioId/equities', () => {
    it('should add an equity and show it in the listing', async () => {
      const created = await request(app)
        .post('/api/v1/portfolios/2/equities')
        .send({ ticker: 'msft', shareCount: 12 })
        .expect(201);

      expect(created.body.portfolioId).toBe(2);
      expect(created.body.merged).toBe(false);
      expect(created.body.equity).toEqual({
        ticker: 'MSFT',
        companyName: 'Microsoft Corporation',
        shareCount: 12,
        addedAt: expect.any(String),
      });

      const listing = await request(app).get('/api/v1/portfolios/2').expect(200);

      expect(listing.body.equityCount).toBe(1);
      expect(listing.body.totalShares).toBe(12);
      expect(listing.body.sections[0].items).toEqual([
        {
          ticker: 'MSFT',
          companyName: 'Microsoft Corporation',
          shareCount: 12,
          label: 'MSFT · Microsoft Corporation · 12 shares',
        },
      ]);
    });

    it('should merge a ticker added twice into one entry', async () => {
      await request(app)
        .post('/api/v1/portfolios/3/equities')
        .send({ ticker: 'AAPL', shareCount: 5 })
        .expect(201);
      const second = await request(app)
        .post('/api/v1/portfolios/3/equities')
        .send({ ticker: 'aapl', shareCount: '3' })
        .expect(201);

      expect(second.body.merged).toBe(true);
      expect(second.body.equity.shareCount).toBe(8);

      const portfolio = await request(app).get('/api/v1/portfolios/3/equities').expect(200);

      expect(portfolio.body.count).toBe(1);
      expect(portfolio.body.equities[0].ticker).toBe('AAPL');
    });

    it('should keep the order in which equities were added', async () => {
      for (const ticker of ['TSLA', 'KO', 'V']) {
        await request(app)
          .post('/api/v1/portfolios/4/equities')
          .send({ ticker, shareCount: 1 })
          .expect(201);
      }

      const listing = await request(app).get('/api/v1/portfolios/4').expect(200);

      expect(
        listing.body.sections[0].items.map((item: { label: string }) => item.label)
      ).toEqual([
        'TSLA · Tesla, Inc. · 1 share',
        'KO · The Coca-Cola Company · 1 share',
        'V · Visa Inc. · 1 share',
      ]);
    });

    it('should reject an empty ticker', async () => {
      const response = await request(app)
        .post('/api/v1/portfolios/5/equities')
        .send({ ticker: '', shareCount: 1 })
        .expect(400);

      expect(response.body.error.message).toBe('Ticker is required');
      expect(response.body.error.details.fieldErrors.ticker).toContain('Ticker is required');
    });

    it.each([0, -4])('should reject a share count of %p', async (shareCount) => {
      const response = await request(app)
        .post('/api/v1/portfolios/5/equities')
        .send({ ticker: 'MSFT', shareCount })
        .expect(400);

      expect(response.body.error.message).toBe('Share count must be at least 1');
    });

    it('should reject a fractional share count', async () => {
      const response = await request(app)
        .post('/api/v1/portfolios/5/equities')
        .send({ ticker: 'MSFT', shareCount: 2.5 })
        .expect(400);

      expect(response.body.error.message).toBe('Share count must be a whole number');
    });

    it('should return 404 for an unknown ticker', async () => {
      const response = await request(app)
        .post('/api/v1/portfolios/5/equities')
        .send({ ticker: 'ZZZZ', shareCount: 1 })
        .expect(404);

      expect(response.body.error.message).toBe('Ticker ZZZZ not found');

      const portfolio = await request(app).get('/api/v1/portfolios/5/equities').expect(200);
      expect(portfolio.body.equities).toEqual([]);
    });

    it('should return 422 when a merge exceeds the share limit', async () => {
      await request(app)
        .post('/api/v1/portfolios/6/equities')
        .send({ ticker: 'NVDA', shareCount: 1_000_000 })
        .expect(201);

      const response = await request(app)
        .post('/api/v1/portfolios/6/equities')
        .send({ ticker: 'NVDA', shareCount: 1 })
        .expect(422);

      expect(response.body.error.message).toBe(
        'Holding 1000001 shares of NVDA exceeds the limit of 1000000 shares'
      );
    });
  });

  describe('PATCH /api/v1/portfolios/:portfolioId/equities/:ticker', () => {
    it('should replace the share count', async () => {
      await request(app)
        .post('/api/v1/portfolios/7/equities')
        .send({ ticker: 'MSFT', shareCount: 2 })
        .expect(201);

      const response = await request(app)
        .patch('/api/v1/portfolios/7/equities/msft')
        .send({ shareCount: 30 })
        .expect(200);

      expect(response.body.ticker).toBe('MSFT');
      expect(response.body.shareCount).toBe(30);
    });

    it('should return 404 for a ticker that is not held', async () => {
      const response = await request(app)
        .patch('/api/v1/portfolios/7/equities/TSLA')
        .send({ shareCount: 3 })
        .expect(404);

      expect(response.body.error.message).toBe('Ticker TSLA is not in portfolio 7');
    });
  });

  describe('DELETE /api/v1/portfolios/:portfolioId/equities/:ticker', () => {
    it('should remove the equity', async () => {
      await request(app)
        .post('/api/v1/portfolios/8/equities')
        .send({ ticker: 'KO', shareCount: 4 })
        .expect(201);

      await request(app).delete('/api/v1/portfolios/8/equities/KO').expect(204);

      const portfolio = await request(app).get('/api/v1/portfolios/8/equities').expect(200);
      expect(portfolio.body).toEqual({ portfolioId: 8, count: 0, equities: [] });

      await request(app).delete('/api/v1/portfolios/8/equities/KO').expect(404);
    });
  });
});
