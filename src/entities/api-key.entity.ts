import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { ApiKeyScope } from '../auth/roles';
import { Tenant } from './tenant.entity';

@Entity('api_keys')
@Index(['key_hash'], { unique: true })
@Index(['prefix'])
@Index(['tenant_id'])
export class ApiKey {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  tenant_id!: string;

  @ManyToOne(() => Tenant, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'tenant_id' })
  tenant?: Tenant;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  // bcrypt hash of the full secret; the secret itself is never stored
  @Column({ type: 'varchar', length: 255 })
  key_hash!: string;

  // First 12 characters of the secret, kept in clear for lookup
  @Column({ type: 'varchar', length: 20 })
  prefix!: string;

  @Column({ type: 'simple-array' })
  scopes!: ApiKeyScope[];

  @Column({ default: true })
  is_active!: boolean;

  @Column({ type: 'timestamptz', nullable: true })
  expires_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  last_used_at!: Date | null;

  @Column({ type: 'uuid', nullable: true })
  created_by!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;
}
