import type { TransactionRecord } from '@groupvault/contract';
import type { RetrieveResult } from './FileVault';

/**
 * Caller-side provenance check: the retrieved plaintext hash must equal the
 * hash the ledger recorded for that content id.
 */
export const verifyProvenance = (
  retrieved: RetrieveResult,
  transaction: TransactionRecord,
  contentId: string
): boolean => transaction.contentId === contentId && transaction.fileHash === retrieved.fileHash;
