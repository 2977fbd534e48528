import { createHash } from 'node:crypto';
import type { GroupId } from '../value-objects/GroupId';
import type { PrincipalId } from '../value-objects/PrincipalId';

/**
 * Append-only record of a file shared into a group. `fileHash` is the plaintext
 * SHA-256, `contentId` the store's id for the ciphertext.
 */
export type LedgerTransaction = Readonly<{
  id: string;
  groupId: GroupId;
  userId: PrincipalId;
  fileHash: string;
  contentId: string;
  /** Host commit time in nanoseconds. */
  ledgerTimestamp: bigint;
}>;

export type LedgerTransactionInput = Omit<LedgerTransaction, 'id'>;

export const deriveTransactionId = (input: LedgerTransactionInput): string =>
  createHash('sha256')
    .update(
      `${input.groupId.unwrap()}${input.userId.unwrap()}${input.fileHash}${input.contentId}${input.ledgerTimestamp.toString()}`
    )
    .digest('hex');
