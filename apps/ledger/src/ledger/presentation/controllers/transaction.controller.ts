import { Body, Controller, Get, Inject, Param, Post, Query, UseFilters, UseGuards } from '@nestjs/common';
import type { ListTransactionsResponse, RecordTransactionResponse } from '@groupvault/contract';
import { AuthIdentity } from '@access/auth-identity.decorator';
import type { AuthenticatedIdentity } from '@access/application/authenticated-identity';
import { KratosSessionGuard } from '@access/presentation/guards/kratos-session.guard';
import { LedgerService } from '../../application/ledger.service';
import { GroupId } from '../../domain/value-objects/GroupId';
import { PrincipalId } from '../../domain/value-objects/PrincipalId';
import { requireCaller, toTransactionRecord } from '../caller';
import { ListTransactionsDto } from '../dto/ListTransactionsDto';
import { RecordTransactionDto } from '../dto/RecordTransactionDto';
import { LedgerFaultFilter } from '../filters/ledger-fault.filter';
import { ParseGroupIdPipe } from '../pipes/parse-id.pipes';
import { validated } from '../validation';

@Controller('groups/:groupId/transactions')
@UseGuards(KratosSessionGuard)
@UseFilters(LedgerFaultFilter)
export class TransactionController {
  constructor(@Inject(LedgerService) private readonly ledger: LedgerService) {}

  @Post()
  async record(
    @Param('groupId', ParseGroupIdPipe) groupId: GroupId,
    @Body(validated(RecordTransactionDto)) dto: RecordTransactionDto,
    @AuthIdentity() identity: AuthenticatedIdentity | undefined
  ): Promise<RecordTransactionResponse> {
    const transactionId = await this.ledger.recordTransaction(requireCaller(identity), {
      groupId: groupId,
      userId: PrincipalId.from(dto.userId),
      fileHash: dto.fileHash,
      contentId: dto.contentId,
    });
    return { transactionId };
  }

  @Get()
  async list(
    @Param('groupId', ParseGroupIdPipe) groupId: GroupId,
    @Query(validated(ListTransactionsDto)) dto: ListTransactionsDto,
    @AuthIdentity() identity: AuthenticatedIdentity | undefined
  ): Promise<ListTransactionsResponse> {
    const transactions = await this.ledger.listTransactions(
      requireCaller(identity),
      groupId,
      PrincipalId.from(dto.userId)
    );
    return { transactions: transactions.map(toTransactionRecord) };
  }
}
