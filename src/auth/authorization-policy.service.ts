import { Injectable } from '@nestjs/common';
import {
  AuthorizationError,
  PolicyViolationError,
} from '../common/errors/domain.errors';
import { User } from '../entities/user.entity';
import { Principal, UserPrincipal } from './principal';
import { ApiKeyScope, roleAtLeast, scopesGrant, UserRole } from './roles';

export interface UserChange {
  email?: string;
  password?: string;
  full_name?: string | null;
  role?: UserRole;
  is_active?: boolean;
}

/**
 * Role and scope decisions, plus the ownership invariants around user
 * management. Pure: callers pass in the active-owner count they observed.
 */
@Injectable()
export class AuthorizationPolicyService {
  requireRole(principal: Principal, minimum: UserRole): UserPrincipal {
    if (principal.kind !== 'user') {
      throw new AuthorizationError('This operation requires a user account');
    }
    if (!roleAtLeast(principal.user.role, minimum)) {
      throw new AuthorizationError(`Requires ${minimum} role or higher`);
    }
    return principal;
  }

  /** Users are governed by roles only; API keys need the scope or a wider one. */
  requireScope(principal: Principal, scope: ApiKeyScope): void {
    if (principal.kind === 'user') return;
    if (!scopesGrant(principal.apiKey.scopes, scope)) {
      throw new AuthorizationError(`API key lacks the '${scope}' scope`);
    }
  }

  assertCanCreateUser(actor: User, role: UserRole): void {
    if (!roleAtLeast(actor.role, UserRole.ADMIN)) {
      throw new AuthorizationError(`Requires ${UserRole.ADMIN} role or higher`);
    }
    if (role === UserRole.OWNER && actor.role !== UserRole.OWNER) {
      throw new AuthorizationError('Only owners can create other owners');
    }
  }

  assertCanUpdateUser(
    actor: User,
    target: User,
    change: UserChange,
    activeOwnerCount: number,
  ): void {
    const isSelf = actor.id === target.id;
    const isAdmin = roleAtLeast(actor.role, UserRole.ADMIN);
    const isOwner = actor.role === UserRole.OWNER;

    if (!isSelf && !isAdmin) {
      throw new AuthorizationError('Insufficient permissions to update this user');
    }
    if (change.role !== undefined && !isOwner) {
      throw new AuthorizationError('Only owners can change user roles');
    }
    if (change.is_active !== undefined && !isOwner) {
      throw new AuthorizationError('Only owners can activate or deactivate users');
    }
    if (isSelf && change.is_active === false) {
      throw new PolicyViolationError('You cannot deactivate yourself');
    }

    const losesOwnership =
      (change.role !== undefined && change.role !== UserRole.OWNER) ||
      change.is_active === false;
    if (
      losesOwnership &&
      this.isActiveOwner(target) &&
      activeOwnerCount <= 1
    ) {
      throw new PolicyViolationError(
        'Cannot demote or deactivate the last owner. Promote another user to owner first.',
      );
    }
  }

  assertCanDeleteUser(actor: User, target: User, activeOwnerCount: number): void {
    if (actor.role !== UserRole.OWNER) {
      throw new AuthorizationError(`Requires ${UserRole.OWNER} role or higher`);
    }
    if (actor.id === target.id) {
      throw new PolicyViolationError('You cannot delete yourself');
    }
    if (this.isActiveOwner(target) && activeOwnerCount <= 1) {
      throw new PolicyViolationError(
        'Cannot delete the last owner. Promote another user to owner first.',
      );
    }
  }

  private isActiveOwner(user: User): boolean {
    return user.role === UserRole.OWNER && user.is_active;
  }
}
