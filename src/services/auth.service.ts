import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { UserRole } from '../auth/roles';
import {
  AuthenticationError,
  AuthorizationError,
  ConflictError,
} from '../common/errors/domain.errors';
import { Tenant } from '../entities/tenant.entity';
import { User } from '../entities/user.entity';
import { isUniqueViolation } from '../utils/db-errors';
import { CredentialService } from './credential.service';
import { MetricsService } from './metrics.service';
import { TenantService } from './tenant.service';
import { TokenPair, TokenService } from './token.service';
import { toUserView, UserService, UserView } from './user.service';

export interface RegistrationInput {
  tenant_name: string;
  email: string;
  password: string;
  full_name?: string | null;
}

export interface AuthResult extends TokenPair {
  user: UserView;
  tenant_id: string;
  tenant_name: string;
}

const INVALID_LOGIN = 'Incorrect email or password';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly credentials: CredentialService,
    private readonly tokens: TokenService,
    private readonly users: UserService,
    private readonly tenants: TenantService,
    private readonly metrics: MetricsService,
  ) {}

  /** Creates a tenant and its first user, who is always an OWNER. */
  async register(input: RegistrationInput): Promise<AuthResult> {
    const passwordHash = await this.credentials.hashPassword(input.password);

    let created: { tenant: Tenant; user: User };
    try {
      created = await this.dataSource.transaction(async (manager) => {
        const userRepo = manager.getRepository(User);
        const tenantRepo = manager.getRepository(Tenant);

        if (await userRepo.findOne({ where: { email: input.email } })) {
          throw new ConflictError('Email already registered');
        }
        if (await tenantRepo.findOne({ where: { name: input.tenant_name } })) {
          throw new ConflictError('Tenant name already taken');
        }

        const tenant = await tenantRepo.save(
          tenantRepo.create({ name: input.tenant_name, is_active: true, settings: {} }),
        );
        const user = await userRepo.save(
          userRepo.create({
            tenant_id: tenant.id,
            email: input.email,
            password_hash: passwordHash,
            full_name: input.full_name ?? null,
            role: UserRole.OWNER,
            is_active: true,
          }),
        );
        return { tenant, user };
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Email or tenant name already registered');
      }
      throw error;
    }

    this.logger.log(`Tenant registered name=${created.tenant.name} id=${created.tenant.id}`);
    return this.buildResult(created.user, created.tenant);
  }

  async login(email: string, password: string): Promise<AuthResult> {
    const user = await this.users.findByEmail(email);
    const valid = user
      ? await this.credentials.verifyPassword(password, user.password_hash)
      : await this.credentials.verifyUnknownPassword(password);
    if (!user || !valid) {
      this.recordAttempt('password', 'failure');
      this.logger.warn(`Login failed for email=${email}`);
      throw new AuthenticationError(INVALID_LOGIN);
    }
    if (!user.is_active) {
      this.recordAttempt('password', 'failure');
      throw new AuthorizationError('User account is inactive');
    }
    const tenant = await this.tenants.findActive(user.tenant_id);
    if (!tenant) {
      this.recordAttempt('password', 'failure');
      throw new AuthorizationError('Tenant account is inactive');
    }

    this.recordAttempt('password', 'success');
    return this.buildResult(user, tenant);
  }

  /** Exchanges a refresh token for a new token pair. */
  async refresh(refreshToken: string): Promise<AuthResult> {
    const payload = await this.tokens.decode(refreshToken);
    const user =
      payload && payload.type === 'refresh'
        ? await this.users.findActive(payload.sub)
        : null;
    const tenant = user ? await this.tenants.findActive(user.tenant_id) : null;
    if (!user || !tenant) {
      this.recordAttempt('refresh', 'failure');
      throw new AuthenticationError('Invalid refresh token');
    }
    this.recordAttempt('refresh', 'success');
    return this.buildResult(user, tenant);
  }

  private async buildResult(user: User, tenant: Tenant): Promise<AuthResult> {
    const pair = await this.tokens.issueTokenPair(user.id);
    return {
      ...pair,
      user: toUserView(user),
      tenant_id: tenant.id,
      tenant_name: tenant.name,
    };
  }

  private recordAttempt(method: string, outcome: 'success' | 'failure'): void {
    this.metrics.authAttemptsTotal.labels(method, outcome).inc();
  }
}
