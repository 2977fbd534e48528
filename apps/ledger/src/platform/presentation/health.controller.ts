import { Controller, Get, Inject } from '@nestjs/common';
import { LedgerService } from '@ledger/application/ledger.service';

@Controller('health')
export class HealthController {
  constructor(@Inject(LedgerService) private readonly ledger: LedgerService) {}

  @Get()
  async check(): Promise<{ status: 'ok'; storage: boolean }> {
    await this.ledger.ping();
    return { status: 'ok', storage: true };
  }
}
