/**
 * Auth E2E Tests
 *
 * Tests for authentication endpoints:
 * - User and vendor registration
 * - Email/password login
 * - Own account read and update
 * - Unauthorized access returns 401
 */

import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { ErrorCode, MembershipStatus, UserRole, UserStatus } from '@event-hub/shared';
import {
  ADMIN_EMAIL,
  authGet,
  authPut,
  closeTestApp,
  createTestApp,
  createUser,
  login,
  loginAdmin,
  resetDatabase,
  TEST_PASSWORD,
} from './setup';

describe('Auth E2E Tests', () => {
  let app: INestApplication;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await closeTestApp();
  });

  beforeEach(async () => {
    await resetDatabase(app);
  });

  // ==========================================================================
  // REGISTRATION
  // ==========================================================================

  describe('POST /api/auth/register', () => {
    it('should register a user without exposing the password digest', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/auth/register')
        .send({ name: 'Uma', email: 'Uma@Example.com', password: TEST_PASSWORD })
        .expect(201);

      expect(response.body).toMatchObject({
        name: 'Uma',
        email: 'uma@example.com',
        role: UserRole.USER,
        status: UserStatus.ACTIVE,
      });
      expect(response.body).not.toHaveProperty('passwordHash');
    });

    it('should reject a registered email', async () => {
      await createUser(app, 'Uma');

      const response = await request(app.getHttpServer())
        .post('/api/auth/register')
        .send({ name: 'Other Uma', email: 'uma@example.com', password: TEST_PASSWORD })
        .expect(409);

      expect(response.body.code).toBe(ErrorCode.EMAIL_TAKEN);
      expect(response.body.message).toBe('Email already registered');
    });

    it('should reject self-registration as admin', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/auth/register')
        .send({ name: 'Eve', email: 'eve@example.com', password: TEST_PASSWORD, role: 'admin' })
        .expect(400);

      expect(response.body.code).toBe(ErrorCode.VALIDATION_FAILED);
    });

    it('should list every validation failure', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/auth/register')
        .send({ name: '', email: 'not-an-email', password: '123' })
        .expect(400);

      expect(response.body).toMatchObject({
        statusCode: 400,
        code: ErrorCode.VALIDATION_FAILED,
        message: 'Validation failed',
        path: '/api/auth/register',
      });
      expect(response.body.details).toHaveLength(3);
    });

    it('should give self-registered vendors a pending profile', async () => {
      await request(app.getHttpServer())
        .post('/api/auth/register')
        .send({ name: 'Val', email: 'val@example.com', password: TEST_PASSWORD, role: 'vendor' })
        .expect(201);
      const token = await login(app, 'val@example.com', TEST_PASSWORD);

      const profile = await authGet(app, '/api/vendor/profile', token).expect(200);

      expect(profile.body.companyName).toBe("Val's Company");
      expect(profile.body.membershipStatus).toBe(MembershipStatus.PENDING);
    });
  });

  describe('POST /api/auth/register-vendor', () => {
    it('should create a vendor with its company name', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/auth/register-vendor')
        .send({
          name: 'Bea',
          email: 'bea@example.com',
          password: TEST_PASSWORD,
          companyName: 'Bloom & Petal',
        })
        .expect(201);

      expect(response.body.role).toBe(UserRole.VENDOR);

      const token = await login(app, 'bea@example.com', TEST_PASSWORD);
      const profile = await authGet(app, '/api/vendor/profile', token).expect(200);
      expect(profile.body.companyName).toBe('Bloom & Petal');
    });
  });

  // ==========================================================================
  // LOGIN
  // ==========================================================================

  describe('POST /api/auth/login', () => {
    it('should log in the bootstrap administrator', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/auth/login')
        .send({ email: ADMIN_EMAIL, password: 'admin-password' })
        .expect(200);

      expect(response.body.accessToken).toEqual(expect.any(String));
      expect(new Date(response.body.expiresAt).getTime()).toBeGreaterThan(Date.now());
      expect(response.body.user.role).toBe(UserRole.ADMIN);
    });

    it('should reject a wrong password', async () => {
      await createUser(app, 'Uma');

      const response = await request(app.getHttpServer())
        .post('/api/auth/login')
        .send({ email: 'uma@example.com', password: 'wrong-password' })
        .expect(401);

      expect(response.body.code).toBe(ErrorCode.UNAUTHORIZED);
      expect(response.body.message).toBe('Invalid credentials');
    });

    it('should reject an unknown email with the same message', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/auth/login')
        .send({ email: 'nobody@example.com', password: TEST_PASSWORD })
        .expect(401);

      expect(response.body.message).toBe('Invalid credentials');
    });
  });

  // ==========================================================================
  // OWN ACCOUNT
  // ==========================================================================

  describe('GET /api/auth/me', () => {
    it('should return 401 without a token', async () => {
      const response = await request(app.getHttpServer()).get('/api/auth/me').expect(401);

      expect(response.body.code).toBe(ErrorCode.UNAUTHORIZED);
    });

    it('should return 401 for a malformed token', async () => {
      await authGet(app, '/api/auth/me', 'not-a-token').expect(401);
    });

    it('should return the caller', async () => {
      const uma = await createUser(app, 'Uma');

      const response = await authGet(app, '/api/auth/me', uma.accessToken).expect(200);

      expect(response.body.id).toBe(uma.id);
      expect(response.body.email).toBe('uma@example.com');
    });

    it('should reject the token of an account disabled after login', async () => {
      const uma = await createUser(app, 'Uma');
      const adminToken = await loginAdmin(app);

      await authPut(app, `/api/admin/users/${uma.id}`, adminToken)
        .send({ status: UserStatus.DISABLED })
        .expect(200);

      await authGet(app, '/api/auth/me', uma.accessToken).expect(401);
    });
  });

  describe('PUT /api/auth/me', () => {
    it('should change the password when the current one is given', async () => {
      const uma = await createUser(app, 'Uma');

      await authPut(app, '/api/auth/me', uma.accessToken)
        .send({ currentPassword: TEST_PASSWORD, newPassword: 'another-password' })
        .expect(200);

      await login(app, 'uma@example.com', 'another-password');
      await request(app.getHttpServer())
        .post('/api/auth/login')
        .send({ email: 'uma@example.com', password: TEST_PASSWORD })
        .expect(401);
    });

    it('should reject a wrong current password', async () => {
      const uma = await createUser(app, 'Uma');

      const response = await authPut(app, '/api/auth/me', uma.accessToken)
        .send({ currentPassword: 'wrong-password', newPassword: 'another-password' })
        .expect(401);

      expect(response.body.message).toBe('Current password is incorrect');
    });

    it('should update the name', async () => {
      const uma = await createUser(app, 'Uma');

      const response = await authPut(app, '/api/auth/me', uma.accessToken)
        .send({ name: 'Uma Updated' })
        .expect(200);

      expect(response.body.name).toBe('Uma Updated');
    });
  });

  describe('GET /api/health', () => {
    it('should answer without authentication', async () => {
      const response = await request(app.getHttpServer()).get('/api/health').expect(200);

      expect(response.body).toEqual({ status: 'ok' });
    });

    it('should allow any origin under the wildcard CORS setting', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/health')
        .set('Origin', 'https://party.example.com')
        .expect(200);

      expect(response.headers['access-control-allow-origin']).toBe('https://party.example.com');
    });
  });
});
