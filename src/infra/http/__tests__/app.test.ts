import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import request from 'supertest';
import type express from 'express';
import { StorageError } from '../../../application/errors.js';
import { PasswordHasher } from '../../../domain/auth/password.js';
import { FAST_HASH_PARAMS, InMemoryUserRepo, createTestLogger } from '../../../test/fakes.js';
import { createApp } from '../app.js';

describe('HTTP API', () => {
  let app: express.Application;
  let userRepo: InMemoryUserRepo;
  let logger: ReturnType<typeof createTestLogger>;
  let checkHealth: Mock<() => Promise<void>>;

  const ana = { name: 'Ana', email: 'ana@example.com', password: 'longenough1' };

  beforeEach(() => {
    userRepo = new InMemoryUserRepo();
    logger = createTestLogger();
    checkHealth = vi.fn<() => Promise<void>>().mockResolvedValue(undefined);
    app = createApp({
      userRepo,
      hasher: new PasswordHasher(FAST_HASH_PARAMS),
      logger,
      checkHealth,
    });
  });

  describe('POST /register', () => {
    it('should register a new user', async () => {
      const response = await request(app).post('/register').send(ana);

      expect(response.status).toBe(201);
      expect(response.body).toEqual({
        message: 'User registered successfully',
        userId: expect.any(String),
        email: 'ana@example.com',
      });
    });

    it('should list every violated rule', async () => {
      const response = await request(app).post('/register').send({
        name: '',
        email: 'not-an-email',
        password: 'short1',
      });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: [
            { path: 'name', message: 'Name is required' },
            { path: 'email', message: 'Invalid email address' },
            { path: 'password', message: 'Password must be at least 8 characters long' },
          ],
        },
      });
      expect(userRepo.size).toBe(0);
    });

    it('should reject duplicate email', async () => {
      await request(app).post('/register').send(ana);

      const response = await request(app).post('/register').send(ana);

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        code: 'CONFLICT',
        message: 'User with this email already exists',
      });
    });

    it('should give one 201 and one 409 for concurrent duplicates', async () => {
      const responses = await Promise.all([
        request(app).post('/register').send(ana),
        request(app).post('/register').send(ana),
      ]);

      expect(responses.map((r) => r.status).sort()).toEqual([201, 409]);
    });

    it('should reject a body that is not JSON', async () => {
      const response = await request(app)
        .post('/register')
        .set('Content-Type', 'application/json')
        .send('{"name":');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        code: 'INVALID_JSON',
        message: 'Request body is not valid JSON',
      });
    });

    it('should answer an oversized body with 413 and no error log', async () => {
      const response = await request(app)
        .post('/register')
        .send({ ...ana, name: 'A'.repeat(20000) });

      expect(response.status).toBe(413);
      expect(response.body).toEqual({
        code: 'PAYLOAD_TOO_LARGE',
        message: 'Request body is too large',
      });
      expect(logger.error).not.toHaveBeenCalled();
      expect(userRepo.size).toBe(0);
    });

    it('should reject a name longer than the store column', async () => {
      const response = await request(app)
        .post('/register')
        .send({ ...ana, name: 'A'.repeat(256) });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: [{ path: 'name', message: 'Name must be at most 255 characters' }],
        },
      });
    });

    it('should hide storage failures behind a generic 500', async () => {
      userRepo.failWith = new StorageError('Failed to insert user', {
        cause: new Error('duplicate key value violates unique constraint "users_pkey"'),
      });

      const response = await request(app).post('/register').send(ana);

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
      });
      expect(logger.error).toHaveBeenCalledWith(userRepo.failWith, {
        method: 'POST',
        path: '/register',
        kind: 'storage',
      });
    });
  });

  describe('POST /login', () => {
    beforeEach(async () => {
      await request(app).post('/register').send(ana);
    });

    it('should login with valid credentials', async () => {
      const response = await request(app).post('/login').send({
        email: 'ana@example.com',
        password: 'longenough1',
      });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        message: 'Login successful',
        userId: expect.any(String),
      });
    });

    it('should answer a wrong password and an unknown email identically', async () => {
      const wrongPassword = await request(app).post('/login').send({
        email: 'ana@example.com',
        password: 'wrongpassword',
      });
      const unknownEmail = await request(app).post('/login').send({
        email: 'nobody@example.com',
        password: 'longenough1',
      });

      expect(wrongPassword.status).toBe(401);
      expect(unknownEmail.status).toBe(401);
      expect(wrongPassword.body).toEqual({
        code: 'INVALID_CREDENTIALS',
        message: 'Invalid email or password',
      });
      expect(unknownEmail.body).toEqual(wrongPassword.body);
    });

    it('should answer a malformed email like an unknown one', async () => {
      const response = await request(app).post('/login').send({
        email: 'not-an-email',
        password: 'longenough1',
      });

      expect(response.status).toBe(401);
    });

    it('should answer an empty password with 401', async () => {
      await request(app).post('/register').send(ana);

      const response = await request(app)
        .post('/login')
        .send({ email: 'ana@example.com', password: '' });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        code: 'INVALID_CREDENTIALS',
        message: 'Invalid email or password',
      });
    });

    it('should reject a body without a password', async () => {
      const response = await request(app).post('/login').send({ email: 'ana@example.com' });

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('code', 'VALIDATION_ERROR');
    });

    it('should hide storage failures behind a generic 500', async () => {
      userRepo.failWith = new StorageError('Failed to find user by email');

      const response = await request(app).post('/login').send({
        email: 'ana@example.com',
        password: 'longenough1',
      });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
      });
    });
  });

  describe('GET /users', () => {
    it('should list users in registration order without hashes', async () => {
      await request(app).post('/register').send(ana);
      await request(app)
        .post('/register')
        .send({ name: 'Bea', email: 'bea@example.com', password: 'longenough2' });

      const response = await request(app).get('/users');

      expect(response.status).toBe(200);
      expect(response.body.map((u: { email: string }) => u.email)).toEqual([
        'ana@example.com',
        'bea@example.com',
      ]);
      for (const user of response.body as Record<string, unknown>[]) {
        expect(Object.keys(user).sort()).toEqual(['email', 'id', 'name']);
      }
    });

    it('should return an empty list when nobody registered', async () => {
      const response = await request(app).get('/users');

      expect(response.status).toBe(200);
      expect(response.body).toEqual([]);
    });

    it('should hide storage failures behind a generic 500', async () => {
      userRepo.failWith = new StorageError('Failed to list users');

      const response = await request(app).get('/users');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
      });
    });
  });

  describe('GET /users/:id', () => {
    it('should return the user without the hash', async () => {
      const registered = await request(app).post('/register').send(ana);
      const userId: string = registered.body.userId;

      const response = await request(app).get(`/users/${userId}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ id: userId, name: 'Ana', email: 'ana@example.com' });
    });

    it('should return 404 for an unknown id', async () => {
      const response = await request(app).get('/users/6f1c2f43-63a4-4a53-9f3c-2f1b9a4f7d10');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ code: 'NOT_FOUND', message: 'User not found' });
    });

    it('should return 404 for an id that is not a UUID', async () => {
      const response = await request(app).get('/users/not-a-uuid');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ code: 'NOT_FOUND', message: 'User not found' });
    });
  });

  describe('GET /healthz', () => {
    it('returns 200 when the store answers', async () => {
      const response = await request(app).get('/healthz');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'ok' });
    });

    it('returns 500 when the store does not answer', async () => {
      checkHealth.mockRejectedValue(new Error('connect ECONNREFUSED'));

      const response = await request(app).get('/healthz');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        code: 'DB_UNAVAILABLE',
        message: 'Database unavailable',
      });
    });
  });

  it('documents every route in the OpenAPI document', async () => {
    const response = await request(app).get('/docs.json');

    expect(response.status).toBe(200);
    expect(Object.keys(response.body.paths).sort()).toEqual([
      '/login',
      '/register',
      '/users',
      '/users/{id}',
    ]);
  });

  it('answers unknown routes with 404', async () => {
    const response = await request(app).get('/nope');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ code: 'NOT_FOUND', message: 'Route not found' });
  });
});
