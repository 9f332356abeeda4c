import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ConflictError, NotFoundError } from '../common/errors/domain.errors';
import { Tenant } from '../entities/tenant.entity';
import { isUniqueViolation } from '../utils/db-errors';

export interface TenantChange {
  name?: string;
  settings?: Record<string, unknown>;
}

@Injectable()
export class TenantService {
  private readonly logger = new Logger(TenantService.name);

  constructor(
    @InjectRepository(Tenant) private readonly tenantRepo: Repository<Tenant>,
  ) {}

  async findActive(id: string): Promise<Tenant | null> {
    const tenant = await this.tenantRepo.findOne({ where: { id } });
    return tenant && tenant.is_active ? tenant : null;
  }

  async get(id: string): Promise<Tenant> {
    const tenant = await this.tenantRepo.findOne({ where: { id } });
    if (!tenant) {
      throw new NotFoundError('Tenant');
    }
    return tenant;
  }

  async update(id: string, change: TenantChange): Promise<Tenant> {
    const tenant = await this.get(id);
    if (change.name !== undefined && change.name !== tenant.name) {
      const taken = await this.tenantRepo.findOne({ where: { name: change.name } });
      if (taken) {
        throw new ConflictError('Tenant name already taken');
      }
      tenant.name = change.name;
    }
    if (change.settings !== undefined) {
      tenant.settings = change.settings;
    }
    try {
      const saved = await this.tenantRepo.save(tenant);
      this.logger.log(`Tenant updated id=${saved.id}`);
      return saved;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Tenant name already taken');
      }
      throw error;
    }
  }
}
