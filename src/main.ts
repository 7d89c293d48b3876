import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { Logger } from '@nestjs/common';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['error', 'warn', 'debug', 'log', 'verbose'],
    bufferLogs: true,
  });

  const logger = new Logger('Bootstrap');
  const configService = app.get(ConfigService);

  // All catalog routes live under /api/catalog, maintenance under /api/tasks
  app.setGlobalPrefix('api');
  app.enableCors();
  app.enableShutdownHooks();

  const portEnv = configService.get<string>('PORT');
  let port = 3000;
  if (portEnv) {
    const parsedPort = parseInt(portEnv, 10);
    if (isNaN(parsedPort)) {
      logger.warn(`Invalid PORT environment variable: "${portEnv}". Defaulting to port ${port}.`);
    } else {
      port = parsedPort;
    }
  } else {
    logger.log(`PORT environment variable not set. Defaulting to port ${port}.`);
  }

  const host = '0.0.0.0';

  await app.listen(port, host);

  logger.log(`Catalog service is listening on: ${await app.getUrl()}`);
  logger.log(
    `Catalog store: ${configService.get<string>('CATALOG_STORE', 'supabase')}, ` +
      `category maintenance: ${configService.get<string>('CATEGORY_MAINTENANCE_ENABLED') === 'false' ? 'off' : 'nightly'}`,
  );
  logger.debug('Debug logging is enabled');
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`Catalog service failed to start: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
  process.exit(1);
});
