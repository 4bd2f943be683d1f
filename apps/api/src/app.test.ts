/**
 * Application Tests
 * Error mapping and CORS of the Fastify application
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { ModelRegistry } from '@kendb/api-fields';
import { ConfigurationError, DataError, UnknownFieldGroupError } from '@kendb/shared';
import { buildApp } from './app.js';

describe('buildApp()', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildApp({ registry: new ModelRegistry(), apiPrefix: '/api/v0' });

    app.get('/errors/data', async () => {
      throw new DataError('Could not decode id "x"');
    });
    app.get('/errors/group', async () => {
      throw new UnknownFieldGroupError('looks');
    });
    app.get('/errors/configuration', async () => {
      throw new ConfigurationError('Car is not an API model');
    });
    app.get('/errors/unexpected', async () => {
      throw new Error('connection reset');
    });
  });

  afterAll(async () => {
    await app.close();
  });

  it.each([
    ['/errors/data', 400, 'Could not decode id "x"'],
    ['/errors/group', 400, "No fields registered in group 'looks'"],
    ['/errors/configuration', 500, 'Car is not an API model'],
    ['/errors/unexpected', 500, 'Internal server error'],
  ])('should map errors of %s', async (url, statusCode, status) => {
    const response = await app.inject({ method: 'GET', url });

    expect(response.statusCode).toBe(statusCode);
    expect(response.json()).toEqual({ status, payload: null });
  });

  it('should answer 404 for unknown routes', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/v0/nothing-here' });

    expect(response.statusCode).toBe(404);
  });

  it('should answer cross-origin requests', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/api/v0/health',
      headers: { origin: 'http://localhost:3000' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['access-control-allow-origin']).toBe('http://localhost:3000');
    expect(response.json()).toMatchObject({ status: 'ok', models: 0 });
  });
});
