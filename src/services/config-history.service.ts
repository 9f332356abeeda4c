import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { ConfigEntry } from '../entities/config-entry.entity';
import {
  ConfigChangeType,
  ConfigHistory,
} from '../entities/config-history.entity';

/**
 * ConfigHistoryService
 *
 * Append-only ledger of configuration mutations. append() only ever runs on
 * the EntityManager of the caller's transaction, so a history row commits or
 * rolls back together with the entry write it describes. There is no update
 * or delete path.
 */
@Injectable()
export class ConfigHistoryService {
  constructor(
    @InjectRepository(ConfigHistory)
    private readonly historyRepo: Repository<ConfigHistory>,
  ) {}

  async append(
    manager: EntityManager,
    entry: ConfigEntry,
    changeType: ConfigChangeType,
    actorId: string | null,
  ): Promise<ConfigHistory> {
    const repo = manager.getRepository(ConfigHistory);
    const record = repo.create({
      config_entry_id: entry.id,
      namespace_id: entry.namespace_id,
      config_key: entry.key,
      value: entry.value,
      value_type: entry.value_type,
      version: entry.version,
      change_type: changeType,
      changed_by: actorId,
    });
    return repo.save(record);
  }

  /** Most recent version first. */
  listForEntry(configEntryId: string): Promise<ConfigHistory[]> {
    return this.historyRepo.find({
      where: { config_entry_id: configEntryId },
      order: { version: 'DESC', changed_at: 'DESC' },
    });
  }
}
