import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { TokenService } from '../../../application/auth/tokenService.js';
import type { InMemoryUserRepo } from '../../../test-utils/inMemoryRepos.js';
import { createTestApp, TEST_JWT_SECRET } from '../../../test-utils/testApp.js';

describe('Auth API', () => {
  let app: Express;
  let users: InMemoryUserRepo;
  let tokens: TokenService;

  const registration = {
    email: 'ada@example.com',
    username: 'ada',
    password: 'Valid1Pass!',
  };

  beforeEach(() => {
    ({ app, users, tokens } = createTestApp());
  });

  describe('POST /auth/register', () => {
    it('should register a new user without exposing the password', async () => {
      const response = await request(app).post('/auth/register').send(registration);

      expect(response.status).toBe(201);
      expect(response.body).toEqual({
        id: 1,
        email: 'ada@example.com',
        username: 'ada',
        is_active: true,
        created_at: expect.any(String),
      });
    });

    it('should reject a duplicate email with 400 CONFLICT', async () => {
      await request(app).post('/auth/register').send(registration);

      const response = await request(app)
        .post('/auth/register')
        .send({ ...registration, username: 'someone-else' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ code: 'CONFLICT', message: 'Email already registered' });
    });

    it('should reject a duplicate username with 400 CONFLICT', async () => {
      await request(app).post('/auth/register').send(registration);

      const response = await request(app)
        .post('/auth/register')
        .send({ ...registration, email: 'other@example.com' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ code: 'CONFLICT', message: 'Username already taken' });
    });

    it('should reject a weak password with per-field detail', async () => {
      const response = await request(app)
        .post('/auth/register')
        .send({ ...registration, password: 'NoSpecial1' });

      expect(response.status).toBe(422);
      expect(response.body).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: [
            {
              path: 'password',
              message: 'Password must contain at least one special character (!@#$%^&*(),.?":{}|<>)',
            },
          ],
        },
      });
    });

    it('should reject an invalid email', async () => {
      const response = await request(app)
        .post('/auth/register')
        .send({ ...registration, email: 'invalid-email' });

      expect(response.status).toBe(422);
      expect(response.body).toHaveProperty('code', 'VALIDATION_ERROR');
    });

    it('should reject a malformed JSON body', async () => {
      const response = await request(app)
        .post('/auth/register')
        .set('Content-Type', 'application/json')
        .send('{"email": ');

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('code', 'MALFORMED_BODY');
    });
  });

  describe('POST /auth/login', () => {
    beforeEach(async () => {
      await request(app).post('/auth/register').send(registration);
    });

    it('should login with form-encoded credentials', async () => {
      const response = await request(app)
        .post('/auth/login')
        .type('form')
        .send({ username: 'ada@example.com', password: 'Valid1Pass!' });

      expect(response.status).toBe(200);
      expect(response.body.token_type).toBe('bearer');
      expect(tokens.verify(response.body.access_token)).toEqual({
        userId: 1,
        email: 'ada@example.com',
      });
    });

    it('should login with JSON credentials', async () => {
      const response = await request(app)
        .post('/auth/login')
        .send({ username: 'ada@example.com', password: 'Valid1Pass!' });

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('access_token');
    });

    it('should not reveal whether the email or the password was wrong', async () => {
      const unknownEmail = await request(app)
        .post('/auth/login')
        .type('form')
        .send({ username: 'nobody@example.com', password: 'Valid1Pass!' });
      const wrongPassword = await request(app)
        .post('/auth/login')
        .type('form')
        .send({ username: 'ada@example.com', password: 'Wrong1Pass!' });

      for (const response of [unknownEmail, wrongPassword]) {
        expect(response.status).toBe(401);
        expect(response.headers['www-authenticate']).toBe('Bearer');
        expect(response.body).toEqual({
          code: 'UNAUTHORIZED',
          message: 'Incorrect email or password',
        });
      }
    });

    it('should reject an inactive user with the same 401', async () => {
      await users.setActive(1, false);

      const response = await request(app)
        .post('/auth/login')
        .type('form')
        .send({ username: 'ada@example.com', password: 'Valid1Pass!' });

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('Incorrect email or password');
    });

    it('should require both form fields', async () => {
      const response = await request(app).post('/auth/login').type('form').send({ username: 'ada@example.com' });

      expect(response.status).toBe(422);
    });
  });

  describe('GET /auth/me', () => {
    let token: string;

    beforeEach(async () => {
      await request(app).post('/auth/register').send(registration);
      const login = await request(app)
        .post('/auth/login')
        .type('form')
        .send({ username: 'ada@example.com', password: 'Valid1Pass!' });
      token = login.body.access_token;
    });

    it('should return the profile for a valid token', async () => {
      const response = await request(app).get('/auth/me').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ id: 1, email: 'ada@example.com', username: 'ada', is_active: true });
      expect(response.body).not.toHaveProperty('hashed_password');
    });

    it('should reject a request without a token', async () => {
      const response = await request(app).get('/auth/me');

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ code: 'UNAUTHORIZED', message: 'Could not validate credentials' });
    });

    it('should accept the bearer scheme in any case', async () => {
      const response = await request(app).get('/auth/me').set('Authorization', `bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body.username).toBe('ada');
    });

    it('should reject a non-bearer authorization header', async () => {
      const response = await request(app).get('/auth/me').set('Authorization', `Basic ${token}`);

      expect(response.status).toBe(401);
    });

    it('should reject an invalid token', async () => {
      const response = await request(app).get('/auth/me').set('Authorization', 'Bearer invalid-token');

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('Could not validate credentials');
    });

    it('should reject a valid token for a user that no longer exists, like any bad token', async () => {
      await users.delete(1);

      const response = await request(app).get('/auth/me').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ code: 'UNAUTHORIZED', message: 'Could not validate credentials' });
    });

    it('should reject a token signed with another secret', async () => {
      const forged = new TokenService({
        secret: `${TEST_JWT_SECRET}-other`,
        algorithm: 'HS256',
        expiresInMinutes: 30,
      }).issue({ userId: 1, email: 'ada@example.com' });

      const response = await request(app).get('/auth/me').set('Authorization', `Bearer ${forged}`);

      expect(response.status).toBe(401);
    });

    it('should forbid an inactive user holding a still-valid token', async () => {
      await users.setActive(1, false);

      const response = await request(app).get('/auth/me').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(403);
      expect(response.body).toEqual({ code: 'FORBIDDEN', message: 'Inactive user' });
    });
  });
});
