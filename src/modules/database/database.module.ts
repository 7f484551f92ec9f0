import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { PgPoolService } from './pg-pool.service';

@Module({
  imports: [ConfigModule],
  providers: [PgPoolService],
  exports: [PgPoolService]
})
export class DatabaseModule {}
