import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AutogroupModule } from '../autogroup/autogroup.module';
import { LoggingModule } from '../logging/logging.module';
import { RepositoryModule } from '../../infrastructure/repositories/repository.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    LoggingModule,
    RepositoryModule.register(),
    AutogroupModule
  ]
})
export class AppModule {}
