import { Injectable } from '@nestjs/common';
import {
  collectDefaultMetrics,
  Counter,
  Histogram,
  Registry,
} from 'prom-client';

@Injectable()
export class MetricsService {
  private readonly registry = new Registry();

  readonly httpRequestsTotal: Counter;
  readonly httpRequestDuration: Histogram;
  readonly configMutationsTotal: Counter;
  readonly authAttemptsTotal: Counter;
  readonly rateLimitRejectionsTotal: Counter;

  constructor() {
    this.httpRequestsTotal = new Counter({
      name: 'http_requests_total',
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'route', 'status'],
      registers: [this.registry],
    });
    this.httpRequestDuration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'Duration of HTTP requests in seconds',
      labelNames: ['method', 'route', 'status'],
      buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
      registers: [this.registry],
    });

    // Config store
    this.configMutationsTotal = new Counter({
      name: 'config_mutations_total',
      help: 'Committed configuration mutations by change type',
      labelNames: ['change_type'],
      registers: [this.registry],
    });

    // Auth
    this.authAttemptsTotal = new Counter({
      name: 'auth_attempts_total',
      help: 'Authentication attempts by credential kind and outcome',
      labelNames: ['method', 'outcome'],
      registers: [this.registry],
    });
    this.rateLimitRejectionsTotal = new Counter({
      name: 'rate_limit_rejections_total',
      help: 'Requests rejected by the rate limiter',
      labelNames: ['scope'],
      registers: [this.registry],
    });
  }

  /** Process-level collectors; enabled once by bootstrap, not per instance. */
  collectDefaults(): void {
    collectDefaultMetrics({ register: this.registry });
  }

  getMetricsRegister(): Registry {
    return this.registry;
  }
}
