import request from 'supertest';
import { User } from '../src/entities/user.entity';
import { CredentialService } from '../src/services/credential.service';
import { OWNER_PASSWORD, bearer, registerTenant } from './support/fixtures';
import { createTestApp, TestApp } from './support/test-app';

describe('Auth (e2e)', () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  const http = () => request(ctx.app.getHttpServer());

  it('registers a tenant with its owner', async () => {
    const res = await http()
      .post('/api/v1/auth/register')
      .send({ tenant_name: 'acme', email: 'owner@acme.test', password: OWNER_PASSWORD, full_name: 'Ada' })
      .expect(201);

    expect(res.body.success).toBe(true);
    expect(res.body.data).toMatchObject({
      token_type: 'bearer',
      expires_in: 1800,
      tenant_name: 'acme',
      user: { email: 'owner@acme.test', full_name: 'Ada', role: 'owner', is_active: true },
    });
    expect(typeof res.body.data.access_token).toBe('string');
    expect(res.body.data.user.password_hash).toBeUndefined();
  });

  it('refuses a taken email or tenant name with 409', async () => {
    await registerTenant(ctx.app, 'acme');

    const email = await http()
      .post('/api/v1/auth/register')
      .send({ tenant_name: 'other', email: 'owner@acme.test', password: OWNER_PASSWORD })
      .expect(409);
    expect(email.body).toMatchObject({ code: 'CONFLICT', message: 'Email already registered' });

    const name = await http()
      .post('/api/v1/auth/register')
      .send({ tenant_name: 'acme', email: 'second@acme.test', password: OWNER_PASSWORD })
      .expect(409);
    expect(name.body.message).toBe('Tenant name already taken');
  });

  it('validates the registration body', async () => {
    const res = await http()
      .post('/api/v1/auth/register')
      .send({ tenant_name: 'acme', email: 'owner@acme.test', password: 'short', plan: 'gold' })
      .expect(400);

    expect(res.body.code).toBe('BAD_REQUEST');
    expect(res.body.details.errors).toEqual(
      expect.arrayContaining([
        'property plan should not exist',
        'password must be longer than or equal to 8 characters',
      ]),
    );
  });

  describe('login', () => {
    beforeEach(async () => {
      await registerTenant(ctx.app, 'acme');
    });

    it('issues tokens for the right password', async () => {
      const res = await http()
        .post('/api/v1/auth/login')
        .send({ email: 'owner@acme.test', password: OWNER_PASSWORD })
        .expect(200);
      expect(res.body.data.user.role).toBe('owner');
      expect(res.body.data.tenant_name).toBe('acme');
    });

    it('answers a wrong password and an unknown email the same way', async () => {
      const wrong = await http()
        .post('/api/v1/auth/login')
        .send({ email: 'owner@acme.test', password: 'not-the-password' })
        .expect(401);
      const unknown = await http()
        .post('/api/v1/auth/login')
        .send({ email: 'nobody@acme.test', password: OWNER_PASSWORD })
        .expect(401);

      for (const res of [wrong, unknown]) {
        expect(res.body).toMatchObject({
          success: false,
          statusCode: 401,
          code: 'UNAUTHENTICATED',
          message: 'Incorrect email or password',
        });
        expect(res.headers['www-authenticate']).toBe('Bearer');
      }
    });

    it('runs a password check even when the email is unknown', async () => {
      const verify = jest.spyOn(ctx.app.get(CredentialService), 'verifyPassword');
      await http()
        .post('/api/v1/auth/login')
        .send({ email: 'nobody@acme.test', password: OWNER_PASSWORD })
        .expect(401);
      expect(verify).toHaveBeenCalledTimes(1);
      expect(verify).toHaveBeenCalledWith(OWNER_PASSWORD, expect.any(String));
    });

    it('refuses inactive users with 403', async () => {
      await ctx.dataSource
        .getRepository(User)
        .update({ email: 'owner@acme.test' }, { is_active: false });
      const res = await http()
        .post('/api/v1/auth/login')
        .send({ email: 'owner@acme.test', password: OWNER_PASSWORD })
        .expect(403);
      expect(res.body.message).toBe('User account is inactive');
    });
  });

  describe('refresh', () => {
    it('exchanges a refresh token for a new pair', async () => {
      const { refreshToken, userId } = await registerTenant(ctx.app, 'acme');
      const res = await http()
        .post('/api/v1/auth/refresh')
        .send({ refresh_token: refreshToken })
        .expect(200);
      expect(res.body.data.user.id).toBe(userId);
    });

    it('does not accept an access token', async () => {
      const { token } = await registerTenant(ctx.app, 'acme');
      const res = await http().post('/api/v1/auth/refresh').send({ refresh_token: token }).expect(401);
      expect(res.body.message).toBe('Invalid refresh token');
    });
  });

  describe('me', () => {
    it('describes the bearer principal', async () => {
      const { token, tenantId } = await registerTenant(ctx.app, 'acme');
      const res = await http().get('/api/v1/auth/me').set(bearer(token)).expect(200);
      expect(res.body.data).toMatchObject({
        kind: 'user',
        tenant: { id: tenantId, name: 'acme' },
        user: { email: 'owner@acme.test' },
      });
    });

    it('requires a credential and echoes the request id on errors', async () => {
      const res = await http().get('/api/v1/auth/me').set('X-Request-Id', 'trace-42').expect(401);
      expect(res.body).toMatchObject({
        code: 'UNAUTHENTICATED',
        message: 'Authentication required',
        path: '/api/v1/auth/me',
        traceId: 'trace-42',
      });
    });
  });

  it('sets a request id on every response', async () => {
    const echoed = await http().get('/api/v1/health').set('X-Request-Id', 'abc-123').expect(200);
    expect(echoed.headers['x-request-id']).toBe('abc-123');

    const generated = await http().get('/api/v1/health').set('X-Request-Id', 'bad id with spaces');
    expect(generated.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });
});
