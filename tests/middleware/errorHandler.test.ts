import express from 'express';
import request from 'supertest';
import { errorHandler, notFoundHandler } from '../../src/middleware/errorHandler.js';
import {
  ConfigurationError,
  RateLimitError,
  SchemaValidationError,
} from '../../src/errors/index.js';
import { JobNotFoundError } from '../../src/errors/jobErrors.js';

function appThrowing(error: Error): express.Application {
  const app = express();
  app.use(express.json());
  app.get('/boom', () => {
    throw error;
  });
  app.post('/echo', (req, res) => {
    res.json(req.body);
  });
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}

describe('errorHandler', () => {
  it('should answer with the status and code of application errors', async () => {
    const response = await request(appThrowing(new JobNotFoundError('abc123'))).get('/boom');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      error: { message: 'Job not found: abc123', status: 404, code: 'RESOURCE_NOT_FOUND' },
    });
  });

  it('should list field details for schema failures', async () => {
    const error = new SchemaValidationError(
      [{ path: 'body.items', message: 'At least one item is required' }],
      'Request body failed validation'
    );

    const response = await request(appThrowing(error)).get('/boom');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: {
        message: 'Request body failed validation',
        status: 400,
        code: 'VALIDATION_INPUT_INVALID',
        details: [{ field: 'body.items', message: 'At least one item is required' }],
      },
    });
  });

  it('should keep retryable provider errors visible to the client', async () => {
    const response = await request(appThrowing(new RateLimitError('RenderService', 5))).get('/boom');

    expect(response.status).toBe(429);
    expect(response.body.error.code).toBe('PROVIDER_RATE_LIMIT');
  });

  it('should hide the message of non-operational errors', async () => {
    const response = await request(appThrowing(new ConfigurationError('RENDER_API_KEY', 'secret detail'))).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body.error.message).toBe('Internal server error');
  });

  it('should hide unexpected errors', async () => {
    const response = await request(appThrowing(new Error('database password is test-secret'))).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: { message: 'Internal server error', status: 500 } });
  });

  it('should reject malformed JSON bodies', async () => {
    const response = await request(appThrowing(new Error('unused')))
      .post('/echo')
      .set('Content-Type', 'application/json')
      .send('{ "items": [');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: { message: 'Malformed JSON body', status: 400 } });
  });
});

describe('notFoundHandler', () => {
  it('should name the unknown route', async () => {
    const response = await request(appThrowing(new Error('unused'))).delete('/nowhere');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: { message: 'Route DELETE /nowhere not found', status: 404 } });
  });
});
