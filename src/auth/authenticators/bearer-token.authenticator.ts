import { Injectable } from '@nestjs/common';
import type { IncomingHttpHeaders } from 'http';
import { AuthenticationError } from '../../common/errors/domain.errors';
import { TenantService } from '../../services/tenant.service';
import { TokenService } from '../../services/token.service';
import { UserService } from '../../services/user.service';
import { Principal } from '../principal';
import { Authenticator, headerValue } from './authenticator';

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

@Injectable()
export class BearerTokenAuthenticator implements Authenticator {
  readonly method = 'user';

  constructor(
    private readonly tokens: TokenService,
    private readonly users: UserService,
    private readonly tenants: TenantService,
  ) {}

  async authenticate(headers: IncomingHttpHeaders): Promise<Principal | null> {
    const header = headerValue(headers, 'authorization');
    if (header === undefined) return null;

    const match = BEARER_PATTERN.exec(header.trim());
    if (!match) {
      throw new AuthenticationError('Authorization header must use the Bearer scheme');
    }
    const payload = await this.tokens.decode(match[1]);
    if (!payload || payload.type !== 'access') {
      throw new AuthenticationError('Could not validate credentials');
    }
    const user = await this.users.findActive(payload.sub);
    if (!user) {
      throw new AuthenticationError('User not found or inactive');
    }
    const tenant = await this.tenants.findActive(user.tenant_id);
    if (!tenant) {
      throw new AuthenticationError('Tenant not found or inactive');
    }
    return { kind: 'user', tenant, user };
  }
}
