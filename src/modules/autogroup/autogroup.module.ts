import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';

import { AUTOGROUP_SETTINGS } from '../../domain/repositories/repository.tokens';
import { buildAutogroupSettings } from '../config/autogroup-config';
import { AutogroupService } from './autogroup.service';

/**
 * Requires the ports from RepositoryModule.register() and AutogroupLogger
 * from LoggingModule to be available globally.
 */
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: AUTOGROUP_SETTINGS,
      inject: [ConfigService],
      useFactory: buildAutogroupSettings,
    },
    AutogroupService,
  ],
  exports: [AutogroupService, AUTOGROUP_SETTINGS],
})
export class AutogroupModule {}
