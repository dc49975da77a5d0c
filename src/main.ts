import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { appConfig, AppConfig } from './config/configuration';

async function bootstrap(): Promise<void> {
  const app = configureApp(await NestFactory.create(AppModule));
  const logger = new Logger('Bootstrap');
  app.enableShutdownHooks();

  const config = app.get<AppConfig>(appConfig.KEY);
  await app.listen(config.port);
  logger.log(`Complaints API listening on port ${config.port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
