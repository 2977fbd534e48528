import { BadRequestException } from '@nestjs/common';
import type { TransactionRecord } from '@groupvault/contract';
import type { AuthenticatedIdentity } from '@access/application/authenticated-identity';
import type { LedgerTransaction } from '../domain/entities/LedgerTransaction';
import { PrincipalId } from '../domain/value-objects/PrincipalId';

export const requireCaller = (identity: AuthenticatedIdentity | undefined): PrincipalId => {
  if (!identity) {
    throw new BadRequestException('Authenticated identity missing');
  }
  return PrincipalId.from(identity.id);
};

export const toTransactionRecord = (transaction: LedgerTransaction): TransactionRecord => ({
  id: transaction.id,
  groupId: transaction.groupId.unwrap(),
  userId: transaction.userId.unwrap(),
  fileHash: transaction.fileHash,
  contentId: transaction.contentId,
  ledgerTimestamp: transaction.ledgerTimestamp.toString(),
});
