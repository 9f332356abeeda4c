import { JwtService } from '@nestjs/jwt';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { AuthenticationError } from '../common/errors/domain.errors';
import { SECURITY_SETTINGS } from '../config/security.config';
import { ApiKey } from '../entities/api-key.entity';
import { Tenant } from '../entities/tenant.entity';
import { User } from '../entities/user.entity';
import { ApiKeyService } from '../services/api-key.service';
import { CredentialService } from '../services/credential.service';
import { MetricsService } from '../services/metrics.service';
import { TenantService } from '../services/tenant.service';
import { TokenService } from '../services/token.service';
import { UserService } from '../services/user.service';
import { InMemoryDataSource } from '../../test/support/in-memory-data-source';
import { testSecuritySettings } from '../../test/support/security-settings';
import { AuthenticationGateway } from './authentication-gateway.service';
import { ApiKeyAuthenticator } from './authenticators/api-key.authenticator';
import { BearerTokenAuthenticator } from './authenticators/bearer-token.authenticator';
import { AuthorizationPolicyService } from './authorization-policy.service';
import { ApiKeyScope, UserRole } from './roles';

describe('AuthenticationGateway', () => {
  let gateway: AuthenticationGateway;
  let tokens: TokenService;
  let apiKeys: ApiKeyService;
  let metrics: MetricsService;
  let dataSource: InMemoryDataSource;
  let tenant: Tenant;
  let owner: User;

  beforeEach(async () => {
    dataSource = new InMemoryDataSource([Tenant, User, ApiKey]);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuthenticationGateway,
        ApiKeyAuthenticator,
        BearerTokenAuthenticator,
        ApiKeyService,
        AuthorizationPolicyService,
        CredentialService,
        MetricsService,
        TenantService,
        TokenService,
        UserService,
        { provide: JwtService, useValue: new JwtService({}) },
        { provide: SECURITY_SETTINGS, useValue: testSecuritySettings() },
        { provide: getRepositoryToken(Tenant), useValue: dataSource.getRepository(Tenant) },
        { provide: getRepositoryToken(User), useValue: dataSource.getRepository(User) },
        { provide: getRepositoryToken(ApiKey), useValue: dataSource.getRepository(ApiKey) },
      ],
    }).compile();

    gateway = module.get(AuthenticationGateway);
    tokens = module.get(TokenService);
    apiKeys = module.get(ApiKeyService);
    metrics = module.get(MetricsService);

    const tenants = dataSource.getRepository(Tenant);
    tenant = await tenants.save(tenants.create({ name: 'acme', settings: {} }));
    const users = dataSource.getRepository(User);
    owner = await users.save(
      users.create({
        tenant_id: tenant.id,
        email: 'owner@acme.test',
        password_hash: 'unused',
        full_name: null,
        role: UserRole.OWNER,
      }),
    );
  });

  const bearer = async (subject = owner.id) => ({
    authorization: `Bearer ${await tokens.issueAccessToken(subject)}`,
  });

  it('requires some credential', async () => {
    await expect(gateway.authenticate({})).rejects.toThrow(
      new AuthenticationError('Authentication required'),
    );
  });

  describe('bearer tokens', () => {
    it('resolves the user and tenant from an access token', async () => {
      const principal = await gateway.authenticate(await bearer());
      expect(principal.kind).toBe('user');
      expect(principal.tenant.id).toBe(tenant.id);
      if (principal.kind === 'user') {
        expect(principal.user.email).toBe('owner@acme.test');
      }
    });

    it('rejects refresh tokens, other schemes and garbage', async () => {
      const refresh = await tokens.issueRefreshToken(owner.id);
      await expect(gateway.authenticate({ authorization: `Bearer ${refresh}` })).rejects.toThrow(
        new AuthenticationError('Could not validate credentials'),
      );
      await expect(gateway.authenticate({ authorization: 'Basic abc' })).rejects.toThrow(
        new AuthenticationError('Authorization header must use the Bearer scheme'),
      );
      await expect(gateway.authenticate({ authorization: 'Bearer nope' })).rejects.toThrow(
        AuthenticationError,
      );
    });

    it('rejects inactive users and tenants', async () => {
      await dataSource.getRepository(User).update({ id: owner.id }, { is_active: false });
      await expect(gateway.authenticate(await bearer())).rejects.toThrow(
        new AuthenticationError('User not found or inactive'),
      );

      await dataSource.getRepository(User).update({ id: owner.id }, { is_active: true });
      await dataSource.getRepository(Tenant).update({ id: tenant.id }, { is_active: false });
      await expect(gateway.authenticate(await bearer())).rejects.toThrow(
        new AuthenticationError('Tenant not found or inactive'),
      );
    });

    it('is skipped when only API keys are allowed', async () => {
      await expect(gateway.authenticate(await bearer(), ['api_key'])).rejects.toThrow(
        new AuthenticationError('Authentication required'),
      );
    });
  });

  describe('API keys', () => {
    it('resolves the key and records its use', async () => {
      const created = await apiKeys.create(tenant.id, owner.id, {
        name: 'ci',
        scopes: [ApiKeyScope.WRITE],
      });

      const principal = await gateway.authenticate({ 'x-api-key': created.api_key });
      expect(principal.kind).toBe('api_key');
      if (principal.kind === 'api_key') {
        expect(principal.apiKey.id).toBe(created.id);
        expect(principal.apiKey.scopes).toEqual([ApiKeyScope.WRITE]);
      }
      const [stored] = dataSource.getRepository(ApiKey).all();
      expect(stored.last_used_at).toBeInstanceOf(Date);
    });

    it('takes precedence over a bearer token and does not fall through', async () => {
      const headers = { ...(await bearer()), 'x-api-key': 'konfig_not-a-real-key' };
      await expect(gateway.authenticate(headers)).rejects.toThrow(
        new AuthenticationError('Invalid API key'),
      );
    });

    it('rejects short, unknown, expired and revoked keys', async () => {
      await expect(gateway.authenticate({ 'x-api-key': 'short' })).rejects.toThrow(
        new AuthenticationError('Invalid API key'),
      );

      const expired = await apiKeys.create(tenant.id, owner.id, {
        name: 'old',
        expires_at: new Date(Date.now() - 1000),
      });
      await expect(gateway.authenticate({ 'x-api-key': expired.api_key })).rejects.toThrow(
        new AuthenticationError('Invalid API key'),
      );

      const revoked = await apiKeys.create(tenant.id, owner.id, { name: 'gone' });
      await apiKeys.revoke(tenant.id, revoked.id);
      await expect(gateway.authenticate({ 'x-api-key': revoked.api_key })).rejects.toThrow(
        new AuthenticationError('Invalid API key'),
      );
    });

    it('rejects keys of an inactive tenant', async () => {
      const created = await apiKeys.create(tenant.id, owner.id, { name: 'ci' });
      await dataSource.getRepository(Tenant).update({ id: tenant.id }, { is_active: false });
      await expect(gateway.authenticate({ 'x-api-key': created.api_key })).rejects.toThrow(
        new AuthenticationError('Tenant is inactive'),
      );
    });
  });

  it('counts outcomes per method', async () => {
    await gateway.authenticate(await bearer());
    await expect(gateway.authenticate({ 'x-api-key': 'short' })).rejects.toThrow();

    const { values } = await metrics.authAttemptsTotal.get();
    const counts = Object.fromEntries(
      values.map((v) => [`${String(v.labels.method)}:${String(v.labels.outcome)}`, v.value]),
    );
    expect(counts).toEqual({ 'user:success': 1, 'api_key:failure': 1 });
  });
});
