import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import compression from 'compression';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { LoggingInterceptor } from './common/interceptors/logging.interceptor';
import { ResponseInterceptor } from './common/interceptors/response.interceptor';
import { MetricsInterceptor } from './interceptors/metrics.interceptor';
import { RateLimitInterceptor } from './interceptors/rate-limit.interceptor';
import { RequestIdInterceptor } from './interceptors/request-id.interceptor';

export const API_PREFIX = 'api/v1';

/** Pipes, filters, interceptors and prefix shared by the server and the e2e suites. */
export function configureApp(app: INestApplication): void {
  const configService = app.get(ConfigService);

  app.use(compression());

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(
    new RequestIdInterceptor(),
    new LoggingInterceptor(),
    app.get(MetricsInterceptor),
    app.get(RateLimitInterceptor),
    new ResponseInterceptor(),
  );

  app.enableCors({
    origin: configService.get('CORS_ORIGIN', '*'),
    methods: ['GET', 'POST', 'PUT', 'DELETE'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id'],
  });

  app.setGlobalPrefix(API_PREFIX);
}
