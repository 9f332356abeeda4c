import { Injectable } from '@nestjs/common';
import type { IncomingHttpHeaders } from 'http';
import { AuthenticationError } from '../../common/errors/domain.errors';
import { ApiKeyService } from '../../services/api-key.service';
import {
  API_KEY_LOOKUP_LENGTH,
  apiKeyLookupPrefix,
  CredentialService,
} from '../../services/credential.service';
import { TenantService } from '../../services/tenant.service';
import { Principal } from '../principal';
import { Authenticator, headerValue } from './authenticator';

export const API_KEY_HEADER = 'x-api-key';

@Injectable()
export class ApiKeyAuthenticator implements Authenticator {
  readonly method = 'api_key';

  constructor(
    private readonly apiKeys: ApiKeyService,
    private readonly credentials: CredentialService,
    private readonly tenants: TenantService,
  ) {}

  async authenticate(headers: IncomingHttpHeaders): Promise<Principal | null> {
    const secret = headerValue(headers, API_KEY_HEADER);
    if (secret === undefined) return null;
    if (secret.length < API_KEY_LOOKUP_LENGTH) {
      throw new AuthenticationError('Invalid API key');
    }

    const now = new Date();
    const candidates = await this.apiKeys.findActiveByPrefix(apiKeyLookupPrefix(secret));
    for (const candidate of candidates) {
      if (candidate.expires_at && candidate.expires_at.getTime() <= now.getTime()) {
        continue;
      }
      if (!(await this.credentials.verifyApiKey(secret, candidate.key_hash))) {
        continue;
      }
      const tenant = await this.tenants.findActive(candidate.tenant_id);
      if (!tenant) {
        throw new AuthenticationError('Tenant is inactive');
      }
      await this.apiKeys.markUsed(candidate, now);
      return { kind: 'api_key', tenant, apiKey: candidate };
    }
    throw new AuthenticationError('Invalid API key');
  }
}
