import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import {
  AuthorizationPolicyService,
  UserChange,
} from '../auth/authorization-policy.service';
import { UserRole } from '../auth/roles';
import { ConflictError, NotFoundError } from '../common/errors/domain.errors';
import { User } from '../entities/user.entity';
import { isUniqueViolation } from '../utils/db-errors';
import { CredentialService } from './credential.service';

export interface NewUserInput {
  email: string;
  password: string;
  full_name?: string | null;
  role?: UserRole;
}

export type UserView = Omit<User, 'password_hash' | 'tenant'>;

export function toUserView(user: User): UserView {
  return {
    id: user.id,
    tenant_id: user.tenant_id,
    email: user.email,
    full_name: user.full_name,
    role: user.role,
    is_active: user.is_active,
    created_at: user.created_at,
    updated_at: user.updated_at,
  };
}

/**
 * Tenant-scoped user management. Permission and ownership rules are decided
 * by AuthorizationPolicyService; this service supplies the facts (target
 * user, active owner count) and performs the writes.
 */
@Injectable()
export class UserService {
  private readonly logger = new Logger(UserService.name);

  constructor(
    @InjectRepository(User) private readonly userRepo: Repository<User>,
    private readonly credentials: CredentialService,
    private readonly policy: AuthorizationPolicyService,
  ) {}

  list(tenantId: string): Promise<User[]> {
    return this.userRepo.find({
      where: { tenant_id: tenantId },
      order: { created_at: 'ASC' },
    });
  }

  async get(tenantId: string, id: string): Promise<User> {
    const user = await this.userRepo.findOne({ where: { id, tenant_id: tenantId } });
    if (!user) {
      throw new NotFoundError('User');
    }
    return user;
  }

  async findActive(id: string): Promise<User | null> {
    const user = await this.userRepo.findOne({ where: { id } });
    return user && user.is_active ? user : null;
  }

  findByEmail(email: string): Promise<User | null> {
    return this.userRepo.findOne({ where: { email } });
  }

  async create(actor: User, input: NewUserInput): Promise<User> {
    const role = input.role ?? UserRole.MEMBER;
    this.policy.assertCanCreateUser(actor, role);
    await this.assertEmailFree(input.email);

    const user = this.userRepo.create({
      tenant_id: actor.tenant_id,
      email: input.email,
      password_hash: await this.credentials.hashPassword(input.password),
      full_name: input.full_name ?? null,
      role,
      is_active: true,
    });
    const saved = await this.persist(user);
    this.logger.log(`User created tenant=${saved.tenant_id} id=${saved.id} role=${role}`);
    return saved;
  }

  async update(actor: User, id: string, change: UserChange): Promise<User> {
    const target = await this.get(actor.tenant_id, id);
    const owners = await this.countActiveOwners(actor.tenant_id);
    this.policy.assertCanUpdateUser(actor, target, change, owners);

    if (change.email !== undefined && change.email !== target.email) {
      await this.assertEmailFree(change.email);
      target.email = change.email;
    }
    if (change.password !== undefined) {
      target.password_hash = await this.credentials.hashPassword(change.password);
    }
    if (change.full_name !== undefined) target.full_name = change.full_name;
    if (change.role !== undefined) target.role = change.role;
    if (change.is_active !== undefined) target.is_active = change.is_active;

    const saved = await this.persist(target);
    this.logger.log(`User updated tenant=${saved.tenant_id} id=${saved.id}`);
    return saved;
  }

  async delete(actor: User, id: string): Promise<void> {
    const target = await this.get(actor.tenant_id, id);
    const owners = await this.countActiveOwners(actor.tenant_id);
    this.policy.assertCanDeleteUser(actor, target, owners);
    await this.userRepo.delete({ id: target.id });
    this.logger.log(`User deleted tenant=${target.tenant_id} id=${target.id}`);
  }

  private countActiveOwners(tenantId: string): Promise<number> {
    return this.userRepo.count({
      where: { tenant_id: tenantId, role: UserRole.OWNER, is_active: true },
    });
  }

  private async assertEmailFree(email: string): Promise<void> {
    const existing = await this.userRepo.findOne({ where: { email } });
    if (existing) {
      throw new ConflictError('Email already registered');
    }
  }

  private async persist(user: User): Promise<User> {
    try {
      return await this.userRepo.save(user);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Email already registered');
      }
      throw error;
    }
  }
}
