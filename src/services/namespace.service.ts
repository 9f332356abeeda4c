import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ConflictError, NotFoundError } from '../common/errors/domain.errors';
import { Namespace } from '../entities/namespace.entity';
import { isUniqueViolation } from '../utils/db-errors';

export interface NamespaceInput {
  name: string;
  description?: string | null;
}

export interface NamespaceChange {
  name?: string;
  description?: string | null;
}

/**
 * Namespaces are always looked up together with the caller's tenant id, so a
 * namespace of another tenant is indistinguishable from a missing one.
 */
@Injectable()
export class NamespaceService {
  private readonly logger = new Logger(NamespaceService.name);

  constructor(
    @InjectRepository(Namespace)
    private readonly namespaceRepo: Repository<Namespace>,
  ) {}

  list(tenantId: string): Promise<Namespace[]> {
    return this.namespaceRepo.find({
      where: { tenant_id: tenantId },
      order: { name: 'ASC' },
    });
  }

  async resolve(tenantId: string, id: string): Promise<Namespace> {
    const namespace = await this.namespaceRepo.findOne({
      where: { id, tenant_id: tenantId },
    });
    if (!namespace) {
      throw new NotFoundError('Namespace');
    }
    return namespace;
  }

  async create(tenantId: string, input: NamespaceInput): Promise<Namespace> {
    await this.assertNameFree(tenantId, input.name);
    const saved = await this.persist(
      this.namespaceRepo.create({
        tenant_id: tenantId,
        name: input.name,
        description: input.description ?? null,
      }),
    );
    this.logger.log(`Namespace created tenant=${tenantId} name=${saved.name}`);
    return saved;
  }

  async update(
    tenantId: string,
    id: string,
    change: NamespaceChange,
  ): Promise<Namespace> {
    const namespace = await this.resolve(tenantId, id);
    if (change.name !== undefined && change.name !== namespace.name) {
      await this.assertNameFree(tenantId, change.name);
      namespace.name = change.name;
    }
    if (change.description !== undefined) {
      namespace.description = change.description;
    }
    return this.persist(namespace);
  }

  /** Cascades to the namespace's entries and their history. */
  async delete(tenantId: string, id: string): Promise<void> {
    const namespace = await this.resolve(tenantId, id);
    await this.namespaceRepo.delete({ id: namespace.id });
    this.logger.log(`Namespace deleted tenant=${tenantId} name=${namespace.name}`);
  }

  private async assertNameFree(tenantId: string, name: string): Promise<void> {
    const existing = await this.namespaceRepo.findOne({
      where: { tenant_id: tenantId, name },
    });
    if (existing) {
      throw new ConflictError('Namespace with this name already exists');
    }
  }

  private async persist(namespace: Namespace): Promise<Namespace> {
    try {
      return await this.namespaceRepo.save(namespace);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Namespace with this name already exists');
      }
      throw error;
    }
  }
}
