import { ConfigService } from '@nestjs/config';
import type { RedisClientOptions } from 'redis';

export const getRedisConfig = (
  configService: ConfigService,
): RedisClientOptions => {
  const password = configService.get<string>('REDIS_PASSWORD', '');
  return {
    socket: {
      host: configService.get<string>('REDIS_HOST', 'localhost'),
      port: Number(configService.get('REDIS_PORT', 6379)),
      connectTimeout: 10000,
      keepAlive: 30000,
      // Rate limiting fails open, so never spin on reconnects
      reconnectStrategy: false,
    },
    password: password || undefined,
    database: 0,
  };
};
