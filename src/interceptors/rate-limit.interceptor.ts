import {
  CallHandler,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { from, Observable } from 'rxjs';
import { mergeMap } from 'rxjs/operators';
import { actorIdOf, AuthenticatedRequest } from '../auth/principal';
import { MetricsService } from '../services/metrics.service';
import { RedisService } from '../services/redis.service';

/**
 * Fixed-window request limits kept in Redis: one counter per principal
 * (API key or user) and route, one per client IP and route. A limit of 0
 * disables that counter. Redis failures never block a request.
 */
@Injectable()
export class RateLimitInterceptor implements NestInterceptor {
  private readonly logger = new Logger(RateLimitInterceptor.name);
  private readonly windowSec: number;
  private readonly perKeyLimit: number;
  private readonly perIpLimit: number;

  constructor(
    private readonly redis: RedisService,
    config: ConfigService,
    private readonly metrics: MetricsService,
  ) {
    this.windowSec = Number(config.get('RATE_LIMIT_WINDOW_SEC', 60));
    this.perKeyLimit = Number(config.get('RATE_LIMIT_PER_KEY', 100));
    this.perIpLimit = Number(config.get('RATE_LIMIT_PER_IP', 1000));
  }

  async guardRequest(req: AuthenticatedRequest): Promise<void> {
    const now = Math.floor(Date.now() / 1000);
    const windowStart = now - (now % this.windowSec);
    const routePath: unknown = req.route?.path;
    const route = (typeof routePath === 'string' ? routePath : req.url ?? 'unknown')
      .replace(/[^a-zA-Z0-9:_/-]/g, '');

    if (req.principal && this.perKeyLimit > 0) {
      const counter = `rate:principal:${actorIdOf(req.principal)}:${route}:${windowStart}`;
      if ((await this.hit(counter)) > this.perKeyLimit) {
        this.reject('principal', 'Too many requests for this credential', this.perKeyLimit);
      }
    }

    if (this.perIpLimit > 0) {
      const ip = req.ip ?? req.socket?.remoteAddress ?? 'unknown';
      const counter = `rate:ip:${ip}:${route}:${windowStart}`;
      if ((await this.hit(counter)) > this.perIpLimit) {
        this.reject('ip', 'Too many requests from this IP', this.perIpLimit);
      }
    }
  }

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const req = context.switchToHttp().getRequest<AuthenticatedRequest>();
    return from(this.guardRequest(req)).pipe(mergeMap(() => next.handle()));
  }

  private async hit(counter: string): Promise<number> {
    const count = await this.redis.incr(counter);
    if (count === 1) await this.redis.expire(counter, this.windowSec);
    return count;
  }

  private reject(scope: 'principal' | 'ip', message: string, limit: number): never {
    this.metrics.rateLimitRejectionsTotal.labels(scope).inc();
    this.logger.warn(`Rate limit exceeded scope=${scope} limit=${limit}/${this.windowSec}s`);
    throw new HttpException(
      {
        message,
        error: 'RATE_LIMITED',
        details: { limit, window_sec: this.windowSec },
      },
      HttpStatus.TOO_MANY_REQUESTS,
    );
  }
}
