import { Controller, Get, Logger, Res } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import { DataSource } from 'typeorm';
import { MetricsService } from '../services/metrics.service';
import { RedisService } from '../services/redis.service';

export interface HealthReport {
  status: 'healthy' | 'degraded';
  timestamp: string;
  uptime: number;
  services: {
    database: 'connected' | 'error';
    redis: 'connected' | 'unavailable';
  };
}

@Controller('health')
@ApiTags('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly redisService: RedisService,
    private readonly metricsService: MetricsService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Basic health' })
  async getHealth(): Promise<HealthReport> {
    const database = await this.checkDatabase();
    const redis = (await this.redisService.ping()) ? 'connected' : 'unavailable';
    return {
      // Redis is optional; only the database decides overall health.
      status: database === 'connected' ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      services: { database, redis },
    };
  }

  @Get('metrics')
  @ApiOperation({ summary: 'Prometheus metrics' })
  async getMetrics(@Res() res: Response): Promise<void> {
    const reg = this.metricsService.getMetricsRegister();
    res.setHeader('Content-Type', reg.contentType);
    res.send(await reg.metrics());
  }

  private async checkDatabase(): Promise<'connected' | 'error'> {
    try {
      await this.dataSource.query('SELECT 1');
      return 'connected';
    } catch (error) {
      this.logger.error(
        'Database health check failed',
        error instanceof Error ? error.stack : String(error),
      );
      return 'error';
    }
  }
}
