import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import express from 'express';
import { createApp } from '../app.js';
import { CredentialIssuer } from '../../../application/auth/credentialIssuer.js';
import { InMemoryUserRepo } from '../../memory/userRepo.js';
import { InMemoryTaskRepo } from '../../memory/taskRepo.js';

const JWT_SECRET = 'test-secret';

function buildApp(loginRateLimit = 100) {
  const users = new InMemoryUserRepo();
  const issuer = new CredentialIssuer(users, {
    secret: JWT_SECRET,
    accessTtlSeconds: 900,
    refreshTtlSeconds: 3600,
  });
  const app = createApp({
    users,
    tasks: new InMemoryTaskRepo(),
    issuer,
    pageSize: 20,
    loginRateLimit,
    apiRateLimit: 1000,
    healthCheck: async () => undefined,
    logRequests: false,
  });
  return { app, users, issuer };
}

const alice = {
  username: 'alice',
  email: 'alice@example.com',
  password: 'Secure-pass-42',
  passwordConfirm: 'Secure-pass-42',
};

describe('Auth API', () => {
  let app: express.Application;
  let issuer: CredentialIssuer;

  beforeEach(() => {
    ({ app, issuer } = buildApp());
  });

  describe('POST /api/auth/register', () => {
    it('should register a new user and return a token pair', async () => {
      const response = await request(app).post('/api/auth/register').send(alice);

      expect(response.status).toBe(201);
      expect(response.body.user).toMatchObject({
        username: 'alice',
        email: 'alice@example.com',
        role: 'user',
      });
      expect(response.body.user).not.toHaveProperty('passwordHash');
      expect(typeof response.body.accessToken).toBe('string');
      expect(typeof response.body.refreshToken).toBe('string');
      expect(issuer.verify(response.body.accessToken, 'access').userId).toBe(response.body.user.id);
    });

    it('should reject invalid email', async () => {
      const response = await request(app)
        .post('/api/auth/register')
        .send({ ...alice, email: 'invalid-email' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
      expect(response.body.details.issues).toEqual([{ path: 'email', message: 'Invalid email' }]);
    });

    it('should reject mismatched passwords', async () => {
      const response = await request(app)
        .post('/api/auth/register')
        .send({ ...alice, passwordConfirm: 'Other-pass-42' });

      expect(response.status).toBe(400);
      expect(response.body.details.issues).toEqual([
        { path: 'passwordConfirm', message: "Passwords don't match" },
      ]);
    });

    it('should reject duplicate email', async () => {
      await request(app).post('/api/auth/register').send(alice);

      const response = await request(app)
        .post('/api/auth/register')
        .send({ ...alice, username: 'alice2', email: 'ALICE@example.com' });

      expect(response.status).toBe(400);
      expect(response.body.details.issues).toEqual([
        { path: 'email', message: 'A user with this email already exists' },
      ]);
    });

    it('should reject malformed JSON', async () => {
      const response = await request(app)
        .post('/api/auth/register')
        .set('Content-Type', 'application/json')
        .send('{"username":');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ code: 'INVALID_JSON', message: 'Request body is not valid JSON' });
    });
  });

  describe('POST /api/auth/login', () => {
    beforeEach(async () => {
      await request(app).post('/api/auth/register').send(alice);
    });

    it('should login with valid credentials', async () => {
      const response = await request(app)
        .post('/api/auth/login')
        .send({ email: 'alice@example.com', password: 'Secure-pass-42' });

      expect(response.status).toBe(200);
      expect(response.body.user.username).toBe('alice');
      expect(issuer.verify(response.body.refreshToken, 'refresh').userId).toBe(response.body.user.id);
    });

    it('should reject a wrong password', async () => {
      const response = await request(app)
        .post('/api/auth/login')
        .send({ email: 'alice@example.com', password: 'Wrong-pass-42' });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ code: 'UNAUTHORIZED', message: 'Invalid email or password' });
    });

    it('should reject an unknown email the same way', async () => {
      const response = await request(app)
        .post('/api/auth/login')
        .send({ email: 'nobody@example.com', password: 'Secure-pass-42' });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ code: 'UNAUTHORIZED', message: 'Invalid email or password' });
    });
  });

  describe('POST /api/auth/refresh', () => {
    it('should exchange a refresh token for a new pair', async () => {
      const registered = await request(app).post('/api/auth/register').send(alice);

      const response = await request(app)
        .post('/api/auth/refresh')
        .send({ refreshToken: registered.body.refreshToken });

      expect(response.status).toBe(200);
      expect(Object.keys(response.body).sort()).toEqual(['accessToken', 'refreshToken']);
      expect(issuer.verify(response.body.accessToken, 'access').userId).toBe(registered.body.user.id);
    });

    it('should reject an access token', async () => {
      const registered = await request(app).post('/api/auth/register').send(alice);

      const response = await request(app)
        .post('/api/auth/refresh')
        .send({ refreshToken: registered.body.accessToken });

      expect(response.status).toBe(401);
      expect(response.body.code).toBe('UNAUTHORIZED');
    });
  });

  describe('GET /api/auth/profile', () => {
    it('should return the current user', async () => {
      const registered = await request(app).post('/api/auth/register').send(alice);

      const response = await request(app)
        .get('/api/auth/profile')
        .set('Authorization', `Bearer ${registered.body.accessToken}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual(registered.body.user);
    });

    it('should reject request without token', async () => {
      const response = await request(app).get('/api/auth/profile');

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        code: 'UNAUTHORIZED',
        message: 'Authentication credentials were not provided or are invalid',
      });
    });

    it('should reject a refresh token used as an access token', async () => {
      const registered = await request(app).post('/api/auth/register').send(alice);

      const response = await request(app)
        .get('/api/auth/profile')
        .set('Authorization', `Bearer ${registered.body.refreshToken}`);

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('Authentication credentials were not provided or are invalid');
    });

    it('should reject a token signed with another secret', async () => {
      const registered = await request(app).post('/api/auth/register').send(alice);
      const forged = new CredentialIssuer(new InMemoryUserRepo(), {
        secret: 'other-secret',
        accessTtlSeconds: 900,
        refreshTtlSeconds: 3600,
      }).issue(registered.body.user.id).accessToken;

      const response = await request(app).get('/api/auth/profile').set('Authorization', `Bearer ${forged}`);

      expect(response.status).toBe(401);
    });
  });

  it('should rate limit repeated login attempts', async () => {
    const limited = buildApp(2).app;
    const attempt = () =>
      request(limited).post('/api/auth/login').send({ email: 'nobody@example.com', password: 'x' });

    expect((await attempt()).status).toBe(401);
    expect((await attempt()).status).toBe(401);

    const response = await attempt();
    expect(response.status).toBe(429);
    expect(response.body.code).toBe('RATE_LIMITED');
  });

  it('should report health', async () => {
    const response = await request(app).get('/healthz');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok' });
  });

  it('should report an unavailable database', async () => {
    const users = new InMemoryUserRepo();
    const failing = createApp({
      users,
      tasks: new InMemoryTaskRepo(),
      issuer: new CredentialIssuer(users, { secret: JWT_SECRET, accessTtlSeconds: 900, refreshTtlSeconds: 3600 }),
      pageSize: 20,
      loginRateLimit: 10,
      apiRateLimit: 60,
      healthCheck: () => Promise.reject(new Error('connection refused')),
      logRequests: false,
    });

    const response = await request(failing).get('/healthz');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ code: 'DB_UNAVAILABLE', message: 'Database unavailable' });
  });
});
