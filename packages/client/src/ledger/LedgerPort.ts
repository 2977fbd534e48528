import type { TransactionRecord } from '@groupvault/contract';

/**
 * Client view of the membership ledger. Every call acts as the principal the
 * underlying transport is authenticated as.
 */
export interface LedgerPort {
  registerGroup(groupId: string): Promise<void>;
  groupExists(groupId: string): Promise<boolean>;
  addMember(groupId: string, userId: string): Promise<void>;
  revokeMember(groupId: string, userId: string): Promise<void>;
  isAuthorized(groupId: string, userId: string): Promise<boolean>;
  storeKey(groupId: string, keyB64: string): Promise<void>;
  getKey(groupId: string): Promise<string>;
  recordTransaction(groupId: string, userId: string, fileHash: string, contentId: string): Promise<string>;
  listTransactions(groupId: string, userId: string): Promise<TransactionRecord[]>;
  /** Principal id the session is authenticated as. */
  whoAmI(): Promise<string>;
}
