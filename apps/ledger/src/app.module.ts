import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AccessModule } from '@access/presentation/access.module';
import { LedgerModule } from '@ledger/presentation/ledger.module';
import { HealthController } from '@platform/presentation/health.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    AccessModule,
    LedgerModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
