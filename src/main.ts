import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { API_PREFIX, configureApp } from './app.setup';
import { MetricsService } from './services/metrics.service';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  try {
    const app = await NestFactory.create<NestExpressApplication>(AppModule);
    const configService = app.get(ConfigService);

    configureApp(app);
    app.get(MetricsService).collectDefaults();
    app.enableShutdownHooks();

    // Swagger setup
    const swaggerConfig = new DocumentBuilder()
      .setTitle('Konfig API')
      .setDescription(
        'Multi-tenant configuration store. Authenticate with a bearer token from /auth/login or an X-API-Key header.',
      )
      .setVersion('1.0.0')
      .addApiKey({ type: 'apiKey', name: 'x-api-key', in: 'header' }, 'apiKey')
      .addBearerAuth()
      .build();
    const document = SwaggerModule.createDocument(app, swaggerConfig);
    SwaggerModule.setup(`${API_PREFIX}/docs`, app, document);

    const port = Number(configService.get('PORT', 3000));
    await app.listen(port);

    logger.log(`Konfig backend is running on port ${port}`);
    logger.log(`Health check available at http://localhost:${port}/${API_PREFIX}/health`);
    logger.log(`Swagger docs at http://localhost:${port}/${API_PREFIX}/docs`);
  } catch (error) {
    logger.error(
      'Failed to start application',
      error instanceof Error ? error.stack : String(error),
    );
    process.exit(1);
  }
}

void bootstrap();
