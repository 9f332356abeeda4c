import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { DomainError } from '../common/errors/domain.errors';
import { MetricsService } from '../services/metrics.service';

@Injectable()
export class MetricsInterceptor implements NestInterceptor {
  constructor(private readonly metrics: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const req = context.switchToHttp().getRequest<Request>();
    const method = req.method;
    // Route template, not the raw url, to keep label cardinality bounded.
    const routePath: unknown = req.route?.path;
    const route = typeof routePath === 'string' ? routePath : 'unmatched';
    const start = process.hrtime.bigint();

    const record = (status: number) => {
      const duration = Number(process.hrtime.bigint() - start) / 1e9;
      this.metrics.httpRequestsTotal.labels(method, route, String(status)).inc();
      this.metrics.httpRequestDuration
        .labels(method, route, String(status))
        .observe(duration);
    };

    return next.handle().pipe(
      tap({
        next: () => {
          record(context.switchToHttp().getResponse<Response>().statusCode);
        },
        error: (err: unknown) => {
          record(statusOf(err));
        },
      }),
    );
  }
}

// The response status is not set yet when the handler throws.
function statusOf(err: unknown): number {
  if (err instanceof DomainError) return err.status;
  if (err instanceof HttpException) return err.getStatus();
  return 500;
}
