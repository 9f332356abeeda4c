import request from 'supertest';
import { bearer, registerTenant, RegisteredTenant } from './support/fixtures';
import { createTestApp, TestApp } from './support/test-app';

describe('Users and tenant (e2e)', () => {
  let ctx: TestApp;
  let owner: RegisteredTenant;

  beforeEach(async () => {
    ctx = await createTestApp();
    owner = await registerTenant(ctx.app, 'acme');
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  const http = () => request(ctx.app.getHttpServer());

  const addUser = async (email: string, role = 'member') => {
    const res = await http()
      .post('/api/v1/users')
      .set(bearer(owner.token))
      .send({ email, password: 'member-pass-1', role })
      .expect(201);
    return res.body.data.id as string;
  };

  const login = async (email: string) => {
    const res = await http()
      .post('/api/v1/auth/login')
      .send({ email, password: 'member-pass-1' })
      .expect(200);
    return res.body.data.access_token as string;
  };

  it('lets the owner add users who can then log in', async () => {
    const id = await addUser('member@acme.test');
    const memberToken = await login('member@acme.test');

    const me = await http().get('/api/v1/auth/me').set(bearer(memberToken)).expect(200);
    expect(me.body.data.user).toMatchObject({ id, role: 'member' });

    const list = await http().get('/api/v1/users').set(bearer(owner.token)).expect(200);
    expect(list.body.data.map((u: { email: string }) => u.email)).toEqual([
      'owner@acme.test',
      'member@acme.test',
    ]);
  });

  it('keeps members out of user administration', async () => {
    const memberId = await addUser('member@acme.test');
    const memberToken = await login('member@acme.test');

    const create = await http()
      .post('/api/v1/users')
      .set(bearer(memberToken))
      .send({ email: 'x@acme.test', password: 'member-pass-1' })
      .expect(403);
    expect(create.body.message).toBe('Requires admin role or higher');

    await http()
      .put(`/api/v1/users/${memberId}`)
      .set(bearer(memberToken))
      .send({ full_name: 'Mia' })
      .expect(200);
    const promote = await http()
      .put(`/api/v1/users/${memberId}`)
      .set(bearer(memberToken))
      .send({ role: 'owner' })
      .expect(403);
    expect(promote.body.message).toBe('Only owners can change user roles');
  });

  it('never leaves the tenant without an active owner', async () => {
    const self = await http().delete(`/api/v1/users/${owner.userId}`).set(bearer(owner.token)).expect(400);
    expect(self.body).toMatchObject({ code: 'POLICY_VIOLATION', message: 'You cannot delete yourself' });

    const demote = await http()
      .put(`/api/v1/users/${owner.userId}`)
      .set(bearer(owner.token))
      .send({ role: 'admin' })
      .expect(400);
    expect(demote.body.message).toBe(
      'Cannot demote or deactivate the last owner. Promote another user to owner first.',
    );

    const memberId = await addUser('second@acme.test');
    await http()
      .put(`/api/v1/users/${memberId}`)
      .set(bearer(owner.token))
      .send({ role: 'owner' })
      .expect(200);
    const stepDown = await http()
      .put(`/api/v1/users/${owner.userId}`)
      .set(bearer(owner.token))
      .send({ role: 'admin' })
      .expect(200);
    expect(stepDown.body.data.role).toBe('admin');
  });

  it('lets an owner remove other users', async () => {
    const memberId = await addUser('member@acme.test');
    await http().delete(`/api/v1/users/${memberId}`).set(bearer(owner.token)).expect(204);
    await http().get(`/api/v1/users/${memberId}`).set(bearer(owner.token)).expect(404);
  });

  it('refuses an email that is already registered', async () => {
    await addUser('member@acme.test');
    const res = await http()
      .post('/api/v1/users')
      .set(bearer(owner.token))
      .send({ email: 'member@acme.test', password: 'member-pass-1' })
      .expect(409);
    expect(res.body.message).toBe('Email already registered');
  });

  it('hides users of other tenants', async () => {
    const other = await registerTenant(ctx.app, 'globex');
    const res = await http().get(`/api/v1/users/${owner.userId}`).set(bearer(other.token)).expect(404);
    expect(res.body.message).toBe('User not found');
  });

  describe('tenant', () => {
    it('is readable by members and writable by owners only', async () => {
      await addUser('member@acme.test');
      const memberToken = await login('member@acme.test');

      const read = await http().get('/api/v1/tenant').set(bearer(memberToken)).expect(200);
      expect(read.body.data).toMatchObject({ id: owner.tenantId, name: 'acme', is_active: true });

      const denied = await http()
        .put('/api/v1/tenant')
        .set(bearer(memberToken))
        .send({ name: 'acme-renamed' })
        .expect(403);
      expect(denied.body.message).toBe('Requires owner role or higher');

      const renamed = await http()
        .put('/api/v1/tenant')
        .set(bearer(owner.token))
        .send({ name: 'acme-renamed', settings: { region: 'eu' } })
        .expect(200);
      expect(renamed.body.data).toMatchObject({ name: 'acme-renamed', settings: { region: 'eu' } });
    });

    it('refuses a name another tenant uses', async () => {
      await registerTenant(ctx.app, 'globex');
      const res = await http()
        .put('/api/v1/tenant')
        .set(bearer(owner.token))
        .send({ name: 'globex' })
        .expect(409);
      expect(res.body.message).toBe('Tenant name already taken');
    });
  });
});
