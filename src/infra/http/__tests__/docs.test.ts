import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createApp } from '../app.js';
import { CredentialIssuer } from '../../../application/auth/credentialIssuer.js';
import { InMemoryUserRepo } from '../../memory/userRepo.js';
import { InMemoryTaskRepo } from '../../memory/taskRepo.js';

describe('API docs', () => {
  const users = new InMemoryUserRepo();
  const app = createApp({
    users,
    tasks: new InMemoryTaskRepo(),
    issuer: new CredentialIssuer(users, { secret: 'test-secret', accessTtlSeconds: 900, refreshTtlSeconds: 3600 }),
    pageSize: 20,
    loginRateLimit: 10,
    apiRateLimit: 60,
    healthCheck: async () => undefined,
    docs: true,
    logRequests: false,
  });

  it('should serve the OpenAPI document built from the route comments', async () => {
    const response = await request(app).get('/docs.json');

    expect(response.status).toBe(200);
    expect(response.body.openapi).toBe('3.0.0');
    expect(Object.keys(response.body.paths).sort()).toEqual([
      '/api/auth/login',
      '/api/auth/profile',
      '/api/auth/refresh',
      '/api/auth/register',
      '/api/tasks',
      '/api/tasks/stats',
      '/api/tasks/{id}',
    ]);
  });

  it('should not be mounted unless enabled', async () => {
    const plain = createApp({
      users,
      tasks: new InMemoryTaskRepo(),
      issuer: new CredentialIssuer(users, { secret: 'test-secret', accessTtlSeconds: 900, refreshTtlSeconds: 3600 }),
      pageSize: 20,
      loginRateLimit: 10,
      apiRateLimit: 60,
      healthCheck: async () => undefined,
      logRequests: false,
    });

    expect((await request(plain).get('/docs.json')).status).toBe(404);
  });
});
