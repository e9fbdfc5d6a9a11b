import { Global, Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';

import { AppLogger } from './app-logger.service';
import { LogConfigController } from './log-config.controller';
import { RequestLoggingInterceptor } from './request-logging.interceptor';

@Global()
@Module({
  controllers: [LogConfigController],
  providers: [
    AppLogger,
    {
      provide: APP_INTERCEPTOR,
      useClass: RequestLoggingInterceptor
    }
  ],
  exports: [AppLogger]
})
export class LoggingModule {}
