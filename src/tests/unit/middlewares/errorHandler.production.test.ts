import express from 'express';
import request from 'supertest';

type ErrorsModule = typeof import('@/errors');
type ErrorHandlerModule = typeof import('@/middlewares/errorHandler');

describe('errorHandler in production', () => {
  let errors: ErrorsModule;
  let handler: ErrorHandlerModule;

  beforeAll(async () => {
    process.env.NODE_ENV = 'production';
    jest.resetModules();
    errors = await import('@/errors');
    handler = await import('@/middlewares/errorHandler');
  });

  afterAll(() => {
    process.env.NODE_ENV = 'test';
  });

  function appThrowing(error: Error): express.Application {
    const app = express();
    app.get('/boom', () => {
      throw error;
    });
    app.use(handler.errorHandler);
    return app;
  }

  it('should keep validation messages that mention the search query', async () => {
    const response = await request(
      appThrowing(new errors.ValidationError('Search query "q" is required'))
    )
      .get('/boom')
      .expect(400);

    expect(response.body).toEqual({
      success: false,
      error: { message: 'Search query "q" is required' },
    });
  });

  it('should keep plain user-facing messages', async () => {
    const response = await request(appThrowing(new errors.NotFoundError('Ticker ZZZZ not found')))
      .get('/boom')
      .expect(404);

    expect(response.body.error.message).toBe('Ticker ZZZZ not found');
  });

  it('should replace messages that mention storage internals', async () => {
    const response = await request(
      appThrowing(new errors.BusinessRuleError('Violates constraint on table portfolio_equities'))
    )
      .get('/boom')
      .expect(422);

    expect(response.body.error.message).toBe('An error occurred while processing your request');
  });
});
