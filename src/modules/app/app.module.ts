import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';

import { AuthModule } from '../auth/auth.module';
import { LoggingModule } from '../logging/logging.module';
import { MembershipModule } from '../membership/membership.module';
import { DirectoryExceptionFilter } from '../membership/filters/directory-exception.filter';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    LoggingModule,
    AuthModule,
    MembershipModule
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: DirectoryExceptionFilter
    }
  ]
})
export class AppModule {}
