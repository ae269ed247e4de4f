import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { triageConfig } from './config/triage.config';

async function bootstrap() {
  const app = configureApp(await NestFactory.create(AppModule));
  const config = app.get<ConfigType<typeof triageConfig>>(triageConfig.KEY);

  app.enableShutdownHooks();
  await app.listen(config.port);
  new Logger('Bootstrap').log(`Symptom triage service listening on port ${config.port}`);
}

bootstrap().catch(error => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
});
