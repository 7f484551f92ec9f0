import { Global, Module } from '@nestjs/common';

import { AutogroupLogger } from './autogroup-logger.service';

@Global()
@Module({
  providers: [AutogroupLogger],
  exports: [AutogroupLogger]
})
export class LoggingModule {}
