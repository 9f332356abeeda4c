import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { Tenant } from '../entities/tenant.entity';
import { User } from '../entities/user.entity';
import { ApiKey } from '../entities/api-key.entity';
import { Namespace } from '../entities/namespace.entity';
import { ConfigEntry } from '../entities/config-entry.entity';
import { ConfigHistory } from '../entities/config-history.entity';

export const DATABASE_ENTITIES = [
  Tenant,
  User,
  ApiKey,
  Namespace,
  ConfigEntry,
  ConfigHistory,
];

export const getDatabaseConfig = (
  configService: ConfigService,
): TypeOrmModuleOptions => ({
  type: 'postgres',
  host: configService.get('DB_HOST', 'localhost'),
  port: Number(configService.get('DB_PORT', 5432)),
  username: configService.get('DB_USERNAME', 'konfig'),
  password: configService.get('DB_PASSWORD', 'konfig'),
  database: configService.get('DB_DATABASE', 'konfig'),
  entities: DATABASE_ENTITIES,
  // No migrations ship with the service; enable only against a scratch database
  synchronize: configService.get('DB_SYNCHRONIZE', 'false') === 'true',
  logging:
    configService.get('NODE_ENV') === 'development' ||
    configService.get('DB_LOGGING', 'false') === 'true',
  ssl: configService.get('DB_SSL', 'false') === 'true',
});
