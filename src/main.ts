import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { errorMessage } from './common/utils/error-message';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);

  const configService = app.get(ConfigService);
  const port = configService.get<number>('PORT', 8080);

  app.useGlobalFilters(new HttpExceptionFilter());

  app.enableCors({
    origin: configService.get<string>('CORS_ORIGIN', '*'),
  });

  // Closes the database pool and the cache connection on SIGTERM/SIGINT
  app.enableShutdownHooks();

  await app.listen(port);
  logger.log(`API server running on http://localhost:${port}`);
  logger.log('API endpoints available at /api/*');
  logger.log('Health check available at /health (for platform probes)');
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`Failed to start: ${errorMessage(error)}`);
  process.exit(1);
});
