import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AccessModule } from '@access/presentation/access.module';
import { GroupAccessPolicy } from '../application/group-access.policy';
import { LedgerRoles } from '../application/ledger-roles';
import { LEDGER_SLOW_CALL_MS, LedgerSequencer, resolveSlowCallThreshold } from '../application/ledger-sequencer';
import { LedgerService } from '../application/ledger.service';
import { KeyGenerator, LedgerClock, LedgerRepository } from '../application/ports';
import { LedgerDatabaseModule } from '../infrastructure/database.module';
import { LedgerDatabaseService } from '../infrastructure/database.service';
import { InMemoryLedgerRepository } from '../infrastructure/in-memory-ledger.repository';
import { KyselyLedgerRepository } from '../infrastructure/kysely-ledger.repository';
import { RandomKeyGenerator } from '../infrastructure/random-key.generator';
import { SystemLedgerClock } from '../infrastructure/system-ledger.clock';
import { GroupController } from './controllers/group.controller';
import { TransactionController } from './controllers/transaction.controller';

@Module({
  imports: [ConfigModule, LedgerDatabaseModule, AccessModule],
  controllers: [GroupController, TransactionController],
  providers: [
    // Services
    LedgerService,
    LedgerSequencer,
    GroupAccessPolicy,
    { provide: LEDGER_SLOW_CALL_MS, useFactory: resolveSlowCallThreshold, inject: [ConfigService] },
    {
      provide: LedgerRoles,
      useFactory: (config: ConfigService) => LedgerRoles.fromConfig(config),
      inject: [ConfigService],
    },
    // Ports
    {
      provide: LedgerRepository,
      useFactory: (config: ConfigService, database: LedgerDatabaseService): LedgerRepository =>
        config.get<string>('LEDGER_STORAGE') === 'memory'
          ? new InMemoryLedgerRepository()
          : new KyselyLedgerRepository(database),
      inject: [ConfigService, LedgerDatabaseService],
    },
    { provide: KeyGenerator, useClass: RandomKeyGenerator },
    { provide: LedgerClock, useFactory: () => new SystemLedgerClock() },
  ],
  exports: [LedgerService],
})
export class LedgerModule {}
