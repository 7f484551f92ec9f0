import 'reflect-metadata';
import type { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './modules/app/app.module';

/**
 * Boot the DI container without an HTTP server. The orchestration layer pulls
 * AutogroupService out of the returned context and closes it when done.
 */
export async function createAutogroupContext(): Promise<INestApplicationContext> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true
  });

  // OnModuleDestroy (pg pool drain) fires on SIGTERM/SIGINT
  app.enableShutdownHooks();
  return app;
}
