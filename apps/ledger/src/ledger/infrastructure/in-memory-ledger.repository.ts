import { Injectable } from '@nestjs/common';
import { LedgerRepository } from '../application/ports/ledger-repository';
import type { Group } from '../domain/entities/Group';
import type { LedgerTransaction } from '../domain/entities/LedgerTransaction';
import { MembershipSet } from '../domain/entities/MembershipSet';
import type { GroupId } from '../domain/value-objects/GroupId';
import type { GroupKey } from '../domain/value-objects/GroupKey';
import type { PrincipalId } from '../domain/value-objects/PrincipalId';

/**
 * Process-local ledger state, selected with LEDGER_STORAGE=memory. Lost on
 * restart.
 */
@Injectable()
export class InMemoryLedgerRepository extends LedgerRepository {
  private readonly groups = new Map<string, Group>();
  private readonly transactions: LedgerTransaction[] = [];

  async findGroup(groupId: GroupId): Promise<Group | null> {
    return this.groups.get(groupId.unwrap()) ?? null;
  }

  async groupExists(groupId: GroupId): Promise<boolean> {
    return this.groups.has(groupId.unwrap());
  }

  async createGroup(groupId: GroupId, owner: PrincipalId): Promise<void> {
    if (this.groups.has(groupId.unwrap())) {
      throw new Error(`Group ${groupId.unwrap()} already stored`);
    }
    this.groups.set(groupId.unwrap(), { groupId, owner, members: MembershipSet.empty(), key: null });
  }

  async addMember(groupId: GroupId, user: PrincipalId): Promise<void> {
    const group = this.require(groupId);
    this.groups.set(groupId.unwrap(), { ...group, members: group.members.add(user) });
  }

  async removeMemberAndRotateKey(groupId: GroupId, user: PrincipalId, nextKey: GroupKey): Promise<void> {
    const group = this.require(groupId);
    // Both fields change in one write.
    this.groups.set(groupId.unwrap(), { ...group, members: group.members.remove(user), key: nextKey });
  }

  async storeKey(groupId: GroupId, key: GroupKey): Promise<void> {
    const group = this.require(groupId);
    this.groups.set(groupId.unwrap(), { ...group, key });
  }

  async appendTransaction(transaction: LedgerTransaction): Promise<void> {
    if (this.transactions.some((existing) => existing.id === transaction.id)) {
      throw new Error(`Transaction ${transaction.id} already recorded`);
    }
    this.transactions.push(transaction);
  }

  async listTransactions(groupId: GroupId): Promise<LedgerTransaction[]> {
    return this.transactions
      .filter((transaction) => transaction.groupId.equals(groupId))
      .sort((a, b) => (a.ledgerTimestamp < b.ledgerTimestamp ? -1 : a.ledgerTimestamp > b.ledgerTimestamp ? 1 : 0));
  }

  async ping(): Promise<void> {}

  private require(groupId: GroupId): Group {
    const group = this.groups.get(groupId.unwrap());
    if (!group) {
      throw new Error(`Group ${groupId.unwrap()} is not stored`);
    }
    return group;
  }
}
