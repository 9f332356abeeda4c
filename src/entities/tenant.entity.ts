import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';

/**
 * Tenant
 *
 * Isolation boundary for one organization. Users, API keys and namespaces
 * reference it with ON DELETE CASCADE, so removing a tenant removes everything
 * it owns.
 */
@Entity('tenants')
@Index(['name'], { unique: true })
export class Tenant {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ default: true })
  is_active!: boolean;

  // Free-form per-tenant settings, never interpreted by the core
  @Column({ type: 'jsonb', default: () => "'{}'" })
  settings!: Record<string, unknown>;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}
