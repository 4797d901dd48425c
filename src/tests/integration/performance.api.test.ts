import request from 'supertest';
import app from '@/app';

async function addEquity(portfolioId: number, ticker: string, shareCount: number): Promise<void> {
  await request(app)
    .post(`/api/v1/portfolios/${portfolioId}/equities`)
    .send({ ticker, shareCount })
    .expect(201);
}

describe('Performance API', () => {
  beforeAll(async () => {
    await request(app)
      .put('/api/v1/quotes/MSFT')
      .send({ previousClose: '400.00', currentPrice: '410.50' })
      .expect(200);
    await request(app)
      .put('/api/v1/quotes/aapl')
      .send({ previousClose: 200, currentPrice: 190 })
      .expect(200);
  });

  describe('PUT /api/v1/quotes/:ticker', () => {
    it('should store the prices as given', async () => {
      const response = await request(app)
        .put('/api/v1/quotes/KO')
        .send({ previousClose: '60.10', currentPrice: '60.25' })
        .expect(200);

      expect(response.body).toEqual({
        ticker: 'KO',
        previousClose: '60.10',
        currentPrice: '60.25',
        asOf: expect.any(String),
      });
    });

    it('should reject prices that are not positive decimals', async () => {
      const zero = await request(app)
        .put('/api/v1/quotes/KO')
        .send({ previousClose: '0', currentPrice: '1' })
        .expect(400);
      const text = await request(app)
        .put('/api/v1/quotes/KO')
        .send({ previousClose: 'abc', currentPrice: '1' })
        .expect(400);

      expect(zero.body.error.message).toBe('Price must be greater than 0');
      expect(text.body.error.message).toBe('Price must be a decimal number with up to 6 decimals');
    });

    it('should return 404 for a ticker missing from the directory', async () => {
      const response = await request(app)
        .put('/api/v1/quotes/ZZZZ')
        .send({ previousClose: '1', currentPrice: '1' })
        .expect(404);

      expect(response.body.error.message).toBe('Ticker ZZZZ not found');
    });
  });

  describe('GET /api/v1/portfolios/:portfolioId/performance', () => {
    it('should report the daily change of the whole portfolio', async () => {
      await addEquity(20, 'MSFT', 10);
      await addEquity(20, 'AAPL', 5);

      const response = await request(app).get('/api/v1/portfolios/20/performance').expect(200);

      expect(response.body).toMatchObject({
        portfolioId: 20,
        complete: true,
        missingTickers: [],
        valueAtPreviousClose: 5000,
        currentValue: 5055,
        dollarChange: 55,
        percentChange: 0.011,
        formatted: '+1.10% (+$55.00)',
      });
      expect(response.body.equities).toEqual([
        {
          ticker: 'MSFT',
          shareCount: 10,
          valueAtPreviousClose: 4000,
          currentValue: 4105,
          dollarChange: 105,
          percentChange: 0.0263,
          formatted: '+2.63% (+$105.00)',
        },
        {
          ticker: 'AAPL',
          shareCount: 5,
          valueAtPreviousClose: 1000,
          currentValue: 950,
          dollarChange: -50,
          percentChange: -0.05,
          formatted: '-5.00% (-$50.00)',
        },
      ]);
    });

    it('should report zero change while a held ticker has no quote', async () => {
      await addEquity(21, 'MSFT', 10);
      await addEquity(21, 'TSLA', 2);

      const response = await request(app).get('/api/v1/portfolios/21/performance').expect(200);

      expect(response.body).toMatchObject({
        complete: false,
        missingTickers: ['TSLA'],
        dollarChange: 0,
        percentChange: 0,
        formatted: '+0.00% (+$0.00)',
      });
    });
  });

  describe('GET /api/v1/portfolios/:portfolioId/live-activity', () => {
    it('should point up on a gain', async () => {
      await addEquity(22, 'MSFT', 1);

      const response = await request(app).get('/api/v1/portfolios/22/live-activity').expect(200);

      expect(response.body).toEqual({
        attributes: { name: 'My Portfolio' },
        contentState: { emoji: '📈' },
      });
    });

    it('should point down on a loss', async () => {
      await addEquity(23, 'AAPL', 1);

      const response = await request(app).get('/api/v1/portfolios/23/live-activity').expect(200);

      expect(response.body.contentState.emoji).toBe('📉');
    });

    it('should stay flat for an empty portfolio', async () => {
      const response = await request(app).get('/api/v1/portfolios/24/live-activity').expect(200);

      expect(response.body.contentState.emoji).toBe('➖');
    });
  });
});
