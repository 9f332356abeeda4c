import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { ConfigValueType } from './config-entry.entity';
import { Namespace } from './namespace.entity';

export enum ConfigChangeType {
  CREATE = 'create',
  UPDATE = 'update',
  DELETE = 'delete',
}

/**
 * ConfigHistory
 *
 * Append-only. `config_entry_id` is deliberately not a foreign key so the
 * delete tombstone outlives its entry; rows go away only with their namespace.
 */
@Entity('config_history')
@Index(['config_entry_id', 'version', 'change_type'], { unique: true })
@Index(['config_entry_id'])
export class ConfigHistory {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  config_entry_id!: string;

  @Column({ type: 'uuid' })
  namespace_id!: string;

  @ManyToOne(() => Namespace, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'namespace_id' })
  namespace?: Namespace;

  @Column({ type: 'varchar', length: 255 })
  config_key!: string;

  @Column({ type: 'text' })
  value!: string;

  @Column({ type: 'varchar', length: 16 })
  value_type!: ConfigValueType;

  @Column({ type: 'int' })
  version!: number;

  @Column({ type: 'varchar', length: 16 })
  change_type!: ConfigChangeType;

  @Column({ type: 'uuid', nullable: true })
  changed_by!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  changed_at!: Date;
}
