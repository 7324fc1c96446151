import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module.js';
import { AppConfigService } from './common/config/app-config.service.js';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const { port, nodeEnv } = app.get(AppConfigService).get();
  await app.listen(port);
  Logger.log(`Listening on ${port} (${nodeEnv})`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error('Failed to start', err instanceof Error ? err.stack : String(err), 'Bootstrap');
  process.exit(1);
});
