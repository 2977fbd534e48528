import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LedgerDatabaseService } from './database.service';

@Module({
  imports: [ConfigModule],
  providers: [LedgerDatabaseService],
  exports: [LedgerDatabaseService],
})
export class LedgerDatabaseModule {}
