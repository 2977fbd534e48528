import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DatabaseService } from '@platform/infrastructure/database/database.service';
import type { LedgerDatabase } from './database.types';

@Injectable()
export class LedgerDatabaseService extends DatabaseService<LedgerDatabase> {
  constructor(@Inject(ConfigService) config: ConfigService) {
    super(config);
  }
}
