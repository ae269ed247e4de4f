import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { triageConfig } from './config/triage.config';

/** Shared by main.ts and the HTTP tests so both run the same pipeline. */
export function configureApp(app: INestApplication): INestApplication {
  const config = app.get<ConfigType<typeof triageConfig>>(triageConfig.KEY);

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableCors({
    origin: config.corsOrigin === '*' ? true : config.corsOrigin.split(',').map(o => o.trim()),
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Origin', 'Accept'],
    optionsSuccessStatus: 200,
  });
  return app;
}
