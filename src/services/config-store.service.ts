import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import {
  ConflictError,
  EncryptionError,
  NotFoundError,
} from '../common/errors/domain.errors';
import {
  ConfigEntry,
  ConfigValueType,
  ValidationSchema,
} from '../entities/config-entry.entity';
import {
  ConfigChangeType,
  ConfigHistory,
} from '../entities/config-history.entity';
import { Namespace } from '../entities/namespace.entity';
import { validateConfigValue } from '../utils/config-value-validation';
import { isUniqueViolation } from '../utils/db-errors';
import {
  ConfigValue,
  deserializeValue,
  serializeValue,
} from '../utils/value-codec';
import { ConfigHistoryService } from './config-history.service';
import { EncryptionService } from './encryption.service';
import { MetricsService } from './metrics.service';

export interface CreateConfigInput {
  key: string;
  value: unknown;
  value_type: ConfigValueType;
  validation_schema?: ValidationSchema | null;
  description?: string | null;
  is_secret?: boolean;
}

export interface UpdateConfigPatch {
  value?: unknown;
  value_type?: ConfigValueType;
  validation_schema?: ValidationSchema | null;
  description?: string | null;
  is_secret?: boolean;
}

export interface ConfigEntryView {
  id: string;
  namespace_id: string;
  key: string;
  value: ConfigValue;
  value_type: ConfigValueType;
  validation_schema: ValidationSchema | null;
  description: string | null;
  is_secret: boolean;
  version: number;
  created_by: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface ConfigHistoryView {
  id: string;
  config_entry_id: string;
  config_key: string;
  value: ConfigValue;
  value_type: ConfigValueType;
  version: number;
  change_type: ConfigChangeType;
  changed_by: string | null;
  changed_at: Date;
}

/**
 * ConfigStoreService
 *
 * Versioned, encrypted key/value entries inside a namespace. Every mutation
 * runs in one transaction together with its history record. Version bumps are
 * a compare-and-swap on the previous version, so two concurrent writers can
 * never both commit the same next version.
 *
 * Callers resolve the namespace (and thereby the tenant) before calling in.
 */
@Injectable()
export class ConfigStoreService {
  private readonly logger = new Logger(ConfigStoreService.name);

  constructor(
    @InjectRepository(ConfigEntry)
    private readonly entryRepo: Repository<ConfigEntry>,
    private readonly dataSource: DataSource,
    private readonly encryption: EncryptionService,
    private readonly history: ConfigHistoryService,
    private readonly metrics: MetricsService,
  ) {}

  async create(
    namespace: Namespace,
    input: CreateConfigInput,
    actorId: string | null,
  ): Promise<ConfigEntryView> {
    validateConfigValue(input.value, input.value_type, input.validation_schema);
    const ciphertext = this.encryption.encrypt(
      serializeValue(input.value, input.value_type),
    );

    let saved: ConfigEntry;
    try {
      saved = await this.dataSource.transaction(async (manager) => {
        const repo = manager.getRepository(ConfigEntry);
        const existing = await repo.findOne({
          where: { namespace_id: namespace.id, key: input.key },
        });
        if (existing) {
          throw new ConflictError('Configuration with this key already exists');
        }
        const row = await repo.save(
          repo.create({
            namespace_id: namespace.id,
            key: input.key,
            value: ciphertext,
            value_type: input.value_type,
            validation_schema: input.validation_schema ?? null,
            description: input.description ?? null,
            is_secret: input.is_secret ?? false,
            version: 1,
            created_by: actorId,
          }),
        );
        await this.history.append(manager, row, ConfigChangeType.CREATE, actorId);
        return row;
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Configuration with this key already exists');
      }
      throw error;
    }

    this.recordMutation(ConfigChangeType.CREATE);
    this.logger.log(`Config created ${namespace.name}/${input.key} v1`);
    return this.toView(saved);
  }

  async get(namespace: Namespace, key: string): Promise<ConfigEntryView> {
    return this.toView(await this.findEntryOrThrow(this.entryRepo, namespace.id, key));
  }

  async list(namespace: Namespace): Promise<ConfigEntryView[]> {
    const rows = await this.entryRepo.find({
      where: { namespace_id: namespace.id },
      order: { created_at: 'ASC' },
    });
    return rows.map((row) => this.toView(row));
  }

  /**
   * Applies a partial update. The version moves (and a history record is
   * written) only when the stored value or its type actually changes; edits
   * to description, is_secret or validation_schema alone keep the version.
   */
  async update(
    namespace: Namespace,
    key: string,
    patch: UpdateConfigPatch,
    actorId: string | null,
  ): Promise<ConfigEntryView> {
    const { entry, valueChanged } = await this.dataSource.transaction(
      async (manager) => {
        const repo = manager.getRepository(ConfigEntry);
        const current = await this.findEntryOrThrow(repo, namespace.id, key);

        const nextType = patch.value_type ?? current.value_type;
        const nextSchema =
          patch.validation_schema !== undefined
            ? patch.validation_schema
            : current.validation_schema;
        const typeChanged = nextType !== current.value_type;

        const changes: QueryDeepPartialEntity<ConfigEntry> = {};
        let changed = false;

        if (patch.value !== undefined) {
          validateConfigValue(patch.value, nextType, nextSchema);
          const nextPlain = serializeValue(patch.value, nextType);
          changed = typeChanged || !this.holdsPlaintext(current.value, nextPlain);
          if (changed) changes.value = this.encryption.encrypt(nextPlain);
        } else if (typeChanged) {
          // Reinterpret the stored text under the new type.
          const existing = deserializeValue(
            this.encryption.decrypt(current.value),
            nextType,
          );
          validateConfigValue(existing, nextType, nextSchema);
          changes.value = this.encryption.encrypt(
            serializeValue(existing, nextType),
          );
          changed = true;
        } else if (patch.validation_schema !== undefined) {
          validateConfigValue(
            deserializeValue(this.encryption.decrypt(current.value), nextType),
            nextType,
            nextSchema,
          );
        }

        if (changed) {
          changes.value_type = nextType;
          changes.version = current.version + 1;
        }
        if (patch.validation_schema !== undefined) {
          changes.validation_schema = patch.validation_schema;
        }
        if (patch.description !== undefined) changes.description = patch.description;
        if (patch.is_secret !== undefined) changes.is_secret = patch.is_secret;

        if (Object.keys(changes).length === 0) {
          return { entry: current, valueChanged: false };
        }

        const result = await repo.update(
          { id: current.id, version: current.version },
          changes,
        );
        if (!result.affected) {
          throw new ConflictError(
            'Configuration was modified concurrently; retry the update',
            'CONCURRENT_MODIFICATION',
          );
        }

        const updated = await this.findEntryOrThrow(repo, namespace.id, key);
        if (changed) {
          await this.history.append(
            manager,
            updated,
            ConfigChangeType.UPDATE,
            actorId,
          );
        }
        return { entry: updated, valueChanged: changed };
      },
    );

    if (valueChanged) {
      this.recordMutation(ConfigChangeType.UPDATE);
      this.logger.log(`Config updated ${namespace.name}/${key} v${entry.version}`);
    }
    return this.toView(entry);
  }

  /** Removes the entry; its history survives, ending in a DELETE record. */
  async delete(
    namespace: Namespace,
    key: string,
    actorId: string | null,
  ): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      const repo = manager.getRepository(ConfigEntry);
      const entry = await this.findEntryOrThrow(repo, namespace.id, key);
      await this.history.append(manager, entry, ConfigChangeType.DELETE, actorId);
      await repo.delete({ id: entry.id });
    });
    this.recordMutation(ConfigChangeType.DELETE);
    this.logger.log(`Config deleted ${namespace.name}/${key}`);
  }

  async getHistory(namespace: Namespace, key: string): Promise<ConfigHistoryView[]> {
    const entry = await this.findEntryOrThrow(this.entryRepo, namespace.id, key);
    const records = await this.history.listForEntry(entry.id);
    return records.map((record) => this.toHistoryView(record));
  }

  private async findEntryOrThrow(
    repo: Repository<ConfigEntry>,
    namespaceId: string,
    key: string,
  ): Promise<ConfigEntry> {
    const entry = await repo.findOne({ where: { namespace_id: namespaceId, key } });
    if (!entry) {
      throw new NotFoundError('Configuration');
    }
    return entry;
  }

  /**
   * Whether `ciphertext` decrypts to `plaintext`. An undecryptable stored
   * value counts as different so that writing a new value can replace it.
   */
  private holdsPlaintext(ciphertext: string, plaintext: string): boolean {
    try {
      return this.encryption.decrypt(ciphertext) === plaintext;
    } catch (error) {
      if (!(error instanceof EncryptionError)) throw error;
      this.logger.warn('Overwriting a stored value that could not be decrypted');
      return false;
    }
  }

  private recordMutation(changeType: ConfigChangeType): void {
    this.metrics.configMutationsTotal.labels(changeType).inc();
  }

  private toView(entry: ConfigEntry): ConfigEntryView {
    return {
      id: entry.id,
      namespace_id: entry.namespace_id,
      key: entry.key,
      value: deserializeValue(this.encryption.decrypt(entry.value), entry.value_type),
      value_type: entry.value_type,
      validation_schema: entry.validation_schema,
      description: entry.description,
      is_secret: entry.is_secret,
      version: entry.version,
      created_by: entry.created_by,
      created_at: entry.created_at,
      updated_at: entry.updated_at,
    };
  }

  private toHistoryView(record: ConfigHistory): ConfigHistoryView {
    return {
      id: record.id,
      config_entry_id: record.config_entry_id,
      config_key: record.config_key,
      value: deserializeValue(
        this.encryption.decrypt(record.value),
        record.value_type,
      ),
      value_type: record.value_type,
      version: record.version,
      change_type: record.change_type,
      changed_by: record.changed_by,
      changed_at: record.changed_at,
    };
  }
}
