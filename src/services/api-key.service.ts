import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ApiKeyScope } from '../auth/roles';
import { NotFoundError } from '../common/errors/domain.errors';
import { ApiKey } from '../entities/api-key.entity';
import { CredentialService } from './credential.service';

export interface NewApiKeyInput {
  name: string;
  scopes?: ApiKeyScope[];
  expires_at?: Date | null;
}

export type ApiKeyView = Omit<ApiKey, 'key_hash' | 'tenant'>;

/** Creation response: the only time the plaintext secret leaves the server. */
export interface CreatedApiKey extends ApiKeyView {
  api_key: string;
}

export function toApiKeyView(key: ApiKey): ApiKeyView {
  return {
    id: key.id,
    tenant_id: key.tenant_id,
    name: key.name,
    prefix: key.prefix,
    scopes: key.scopes,
    is_active: key.is_active,
    expires_at: key.expires_at,
    last_used_at: key.last_used_at,
    created_by: key.created_by,
    created_at: key.created_at,
  };
}

@Injectable()
export class ApiKeyService {
  private readonly logger = new Logger(ApiKeyService.name);

  constructor(
    @InjectRepository(ApiKey) private readonly apiKeyRepo: Repository<ApiKey>,
    private readonly credentials: CredentialService,
  ) {}

  async create(
    tenantId: string,
    createdBy: string,
    input: NewApiKeyInput,
  ): Promise<CreatedApiKey> {
    const { secret, prefix } = this.credentials.generateApiKey();
    const record = await this.apiKeyRepo.save(
      this.apiKeyRepo.create({
        tenant_id: tenantId,
        name: input.name,
        key_hash: await this.credentials.hashApiKey(secret),
        prefix,
        scopes: input.scopes && input.scopes.length > 0 ? input.scopes : [ApiKeyScope.READ],
        is_active: true,
        expires_at: input.expires_at ?? null,
        last_used_at: null,
        created_by: createdBy,
      }),
    );
    this.logger.log(`API key created tenant=${tenantId} id=${record.id} prefix=${prefix}`);
    return { ...toApiKeyView(record), api_key: secret };
  }

  list(tenantId: string): Promise<ApiKey[]> {
    return this.apiKeyRepo.find({
      where: { tenant_id: tenantId },
      order: { created_at: 'DESC' },
    });
  }

  async get(tenantId: string, id: string): Promise<ApiKey> {
    const key = await this.apiKeyRepo.findOne({ where: { id, tenant_id: tenantId } });
    if (!key) {
      throw new NotFoundError('API key');
    }
    return key;
  }

  /** Revocation deletes the key; it stops authenticating immediately. */
  async revoke(tenantId: string, id: string): Promise<void> {
    const key = await this.get(tenantId, id);
    await this.apiKeyRepo.delete({ id: key.id });
    this.logger.log(`API key revoked tenant=${tenantId} id=${key.id} prefix=${key.prefix}`);
  }

  /** Prefixes are not unique; every candidate has to be hash-checked. */
  findActiveByPrefix(prefix: string): Promise<ApiKey[]> {
    return this.apiKeyRepo.find({ where: { prefix, is_active: true } });
  }

  async markUsed(key: ApiKey, at: Date = new Date()): Promise<void> {
    await this.apiKeyRepo.update({ id: key.id }, { last_used_at: at });
    key.last_used_at = at;
  }
}
