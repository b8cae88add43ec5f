import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import type { EnvironmentVariables } from './config/environment';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { rawBody: true });
  app.enableShutdownHooks();

  // Swagger configuration
  const config = new DocumentBuilder()
    .setTitle('Vending Relay Controller')
    .setDescription(
      'Turns completed Square payments into relay cycles that release items from the enclosure.',
    )
    .setVersion('0.1.0')
    .addTag('Ingest', 'Receive Square payment notifications')
    .addTag('Health', 'Liveness, readiness and counters')
    .addTag('Maintenance', 'Bench operations, enabled by MAINTENANCE_API_KEY')
    .addBearerAuth()
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const configService = app.get<ConfigService<EnvironmentVariables, true>>(ConfigService);
  const port = configService.get('PORT', { infer: true });
  await app.listen(port);
  logger.log(`Vending controller listening on http://localhost:${port}`);
  logger.log(`OpenAPI documentation available at http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  logger.error(
    `Startup failed: ${error instanceof Error ? error.message : String(error)}`,
    error instanceof Error ? error.stack : undefined,
  );
  process.exit(1);
});
