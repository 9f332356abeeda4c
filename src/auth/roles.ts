export enum UserRole {
  MEMBER = 'member',
  ADMIN = 'admin',
  OWNER = 'owner',
}

/** Lowest to highest. Position in this list is the role's rank. */
export const ROLE_ORDER: readonly UserRole[] = [
  UserRole.MEMBER,
  UserRole.ADMIN,
  UserRole.OWNER,
];

export function roleRank(role: UserRole): number {
  return ROLE_ORDER.indexOf(role) + 1;
}

export function roleAtLeast(role: UserRole, minimum: UserRole): boolean {
  return roleRank(role) >= roleRank(minimum);
}

export enum ApiKeyScope {
  READ = 'read',
  WRITE = 'write',
  ADMIN = 'admin',
}

// admin implies write, write implies read
const SCOPE_ORDER: readonly ApiKeyScope[] = [
  ApiKeyScope.READ,
  ApiKeyScope.WRITE,
  ApiKeyScope.ADMIN,
];

export function scopesGrant(
  granted: readonly ApiKeyScope[],
  required: ApiKeyScope,
): boolean {
  const needed = SCOPE_ORDER.indexOf(required);
  return granted.some((scope) => SCOPE_ORDER.indexOf(scope) >= needed);
}
