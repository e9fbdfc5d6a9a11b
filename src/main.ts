import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';

import { AppModule } from './modules/app/app.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true
  });

  // Behind a reverse proxy req.ip and req.protocol should reflect the original client.
  app.set('trust proxy', true);
  app.enableShutdownHooks();

  const globalPrefix = process.env.API_PREFIX ?? 'api';
  app.setGlobalPrefix(globalPrefix);

  app.useLogger(new Logger('GroupMembershipService'));

  const port = Number(process.env.PORT ?? 3000);
  await app.listen(port);
  Logger.log(`Group membership API is running on http://localhost:${port}/${globalPrefix}`);
  Logger.log(`Health: http://localhost:${port}/${globalPrefix}/health`);
  Logger.log(`Recent logs: http://localhost:${port}/${globalPrefix}/admin/log-config/recent?limit=25`);
}

void bootstrap();
