/**
 * Error Handler Tests
 */

import express, { Express } from 'express';
import request from 'supertest';

vi.mock('../../../src/utils/logger', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/utils/logger')>()),
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import {
  asyncHandler,
  errorHandler,
  notFoundHandler,
  CatalogNotFoundError,
  ConfigurationError,
  NotFoundError,
} from '../../../src/errors';
import { requestLogger } from '../../../src/middleware/requestLogger';

describe('Error Handler', () => {
  let app: Express;

  beforeEach(() => {
    app = express();
    app.use(requestLogger);
    app.get('/missing', () => {
      throw new NotFoundError('No such page');
    });
    app.get('/catalog', () => {
      throw new CatalogNotFoundError('fr', '/srv/locales/fr/messages.json');
    });
    app.get('/crash', () => {
      throw new TypeError('undefined is not a function');
    });
    app.get(
      '/async',
      asyncHandler(async () => {
        await Promise.resolve();
        throw new ConfigurationError('Bad setup', ['PORT: Expected number']);
      })
    );
    app.use(notFoundHandler);
    app.use(errorHandler);
  });

  it('should render ApiErrors with their status and code', async () => {
    const response = await request(app).get('/missing').set('X-Request-ID', 'req-1');

    expect(response.status).toBe(404);
    expect(response.body).toMatchObject({
      error: 'NotFound',
      code: 'NOT_FOUND',
      message: 'No such page',
      requestId: 'req-1',
    });
    expect(typeof response.body.timestamp).toBe('string');
  });

  it('should include error details', async () => {
    const response = await request(app).get('/catalog');

    expect(response.status).toBe(500);
    expect(response.body).toMatchObject({
      code: 'CATALOG_NOT_FOUND',
      message: "No translation catalog found for locale 'fr'",
      details: { locale: 'fr', path: '/srv/locales/fr/messages.json' },
    });
  });

  it('should hide unknown errors behind a generic 500', async () => {
    const response = await request(app).get('/crash');

    expect(response.status).toBe(500);
    expect(response.body).toMatchObject({
      error: 'Internal',
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
  });

  it('should forward async rejections', async () => {
    const response = await request(app).get('/async');

    expect(response.status).toBe(500);
    expect(response.body).toMatchObject({
      code: 'CONFIGURATION_ERROR',
      message: 'Bad setup',
      details: { issues: ['PORT: Expected number'] },
    });
  });

  it('should answer unmatched routes with a JSON 404', async () => {
    const response = await request(app).post('/nowhere');

    expect(response.status).toBe(404);
    expect(response.body).toMatchObject({
      code: 'NOT_FOUND',
      message: 'No route for POST /nowhere',
    });
  });
});
