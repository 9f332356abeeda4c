import type { Request } from 'express';
import { ApiKey } from '../entities/api-key.entity';
import { Tenant } from '../entities/tenant.entity';
import { User } from '../entities/user.entity';

export type Principal =
  | { kind: 'user'; tenant: Tenant; user: User }
  | { kind: 'api_key'; tenant: Tenant; apiKey: ApiKey };

export type UserPrincipal = Extract<Principal, { kind: 'user' }>;

export type AuthMethod = Principal['kind'];

/** Id recorded as `created_by` / `changed_by` for mutations made by this principal. */
export function actorIdOf(principal: Principal): string {
  return principal.kind === 'user' ? principal.user.id : principal.apiKey.id;
}

export interface AuthenticatedRequest extends Request {
  principal?: Principal;
  requestId?: string;
}
