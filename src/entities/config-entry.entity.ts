import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import type { SchemaObject } from 'ajv';
import { Namespace } from './namespace.entity';

export enum ConfigValueType {
  STRING = 'string',
  NUMBER = 'number',
  SELECT = 'select',
  JSON = 'json',
}

/**
 * Type-specific constraints attached to a configuration entry.
 * Only the fields relevant to the entry's value type are consulted.
 */
export interface ValidationSchema {
  min_length?: number;
  max_length?: number;
  pattern?: string;
  min_value?: number;
  max_value?: number;
  options?: string[];
  json_schema?: SchemaObject;
}

/**
 * ConfigEntry
 *
 * `value` always holds ciphertext of the canonical serialized form, whatever
 * `is_secret` says. Rows are written only by ConfigStoreService, which bumps
 * `version` with a conditional update on the previous version.
 */
@Entity('config_entries')
@Index(['namespace_id', 'key'], { unique: true })
@Index(['namespace_id'])
export class ConfigEntry {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  namespace_id!: string;

  @ManyToOne(() => Namespace, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'namespace_id' })
  namespace?: Namespace;

  @Column({ type: 'varchar', length: 255 })
  key!: string;

  @Column({ type: 'text' })
  value!: string;

  @Column({ type: 'varchar', length: 16, default: ConfigValueType.STRING })
  value_type!: ConfigValueType;

  @Column({ type: 'jsonb', nullable: true })
  validation_schema!: ValidationSchema | null;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ default: false })
  is_secret!: boolean;

  @Column({ type: 'int', default: 1 })
  version!: number;

  @Column({ type: 'uuid', nullable: true })
  created_by!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}
