import type { Group } from '../../domain/entities/Group';
import type { LedgerTransaction } from '../../domain/entities/LedgerTransaction';
import type { GroupId } from '../../domain/value-objects/GroupId';
import type { GroupKey } from '../../domain/value-objects/GroupKey';
import type { PrincipalId } from '../../domain/value-objects/PrincipalId';

/**
 * Persistence port for groups, memberships, keys and the transaction log.
 * Authorization happens before any of these calls; implementations only store.
 */
export abstract class LedgerRepository {
  abstract findGroup(groupId: GroupId): Promise<Group | null>;

  abstract groupExists(groupId: GroupId): Promise<boolean>;

  /** Creates a group with no members and no key. */
  abstract createGroup(groupId: GroupId, owner: PrincipalId): Promise<void>;

  abstract addMember(groupId: GroupId, user: PrincipalId): Promise<void>;

  /**
   * Removes `user` (swap-style) and replaces the group key with `nextKey` as a
   * single atomic change: no reader may observe one without the other.
   */
  abstract removeMemberAndRotateKey(groupId: GroupId, user: PrincipalId, nextKey: GroupKey): Promise<void>;

  abstract storeKey(groupId: GroupId, key: GroupKey): Promise<void>;

  abstract appendTransaction(transaction: LedgerTransaction): Promise<void>;

  /** Every transaction of the group, oldest ledger timestamp first. */
  abstract listTransactions(groupId: GroupId): Promise<LedgerTransaction[]>;

  /** Throws when the backing store is unreachable. */
  abstract ping(): Promise<void>;
}
