import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Group } from '../domain/entities/Group';
import { deriveTransactionId, type LedgerTransaction } from '../domain/entities/LedgerTransaction';
import { LedgerFault } from '../domain/errors/LedgerFault';
import type { GroupId } from '../domain/value-objects/GroupId';
import { GroupKey } from '../domain/value-objects/GroupKey';
import type { PrincipalId } from '../domain/value-objects/PrincipalId';
import { GroupAccessPolicy } from './group-access.policy';
import { LedgerSequencer } from './ledger-sequencer';
import { KeyGenerator, LedgerClock, LedgerRepository } from './ports';

export type RecordTransactionInput = Readonly<{
  groupId: GroupId;
  userId: PrincipalId;
  fileHash: string;
  contentId: string;
}>;

/**
 * Membership ledger state machine.
 *
 * Every operation runs through the sequencer, so checks and the mutation that
 * follows them see the same state. Checks run in a fixed order: group
 * existence, then caller permission, then membership.
 */
@Injectable()
export class LedgerService {
  private readonly logger = new Logger(LedgerService.name);

  constructor(
    @Inject(LedgerRepository) private readonly repository: LedgerRepository,
    @Inject(GroupAccessPolicy) private readonly policy: GroupAccessPolicy,
    @Inject(KeyGenerator) private readonly keyGenerator: KeyGenerator,
    @Inject(LedgerClock) private readonly clock: LedgerClock,
    @Inject(LedgerSequencer) private readonly sequencer: LedgerSequencer
  ) {}

  async registerGroup(caller: PrincipalId, groupId: GroupId): Promise<void> {
    await this.sequencer.run('registerGroup', async () => {
      if (await this.repository.groupExists(groupId)) {
        throw LedgerFault.alreadyExists(groupId);
      }
      this.policy.ensureRegistrar(caller);
      await this.repository.createGroup(groupId, caller);
      this.logger.log(`Registered group ${groupId.unwrap()} owned by ${caller.unwrap()}`);
    });
  }

  async groupExists(groupId: GroupId): Promise<boolean> {
    return this.sequencer.run('groupExists', () => this.repository.groupExists(groupId));
  }

  async addMember(caller: PrincipalId, groupId: GroupId, user: PrincipalId): Promise<void> {
    await this.sequencer.run('addMember', async () => {
      const group = await this.requireGroup(groupId);
      this.policy.ensureOwner(group, caller);
      if (this.policy.isMember(group, user)) {
        throw LedgerFault.alreadyMember(groupId, user);
      }
      await this.repository.addMember(groupId, user);
      this.logger.log(`Added ${user.unwrap()} to group ${groupId.unwrap()}`);
    });
  }

  /**
   * Removes the member and, in the same repository call, replaces the group
   * key with a freshly generated one.
   */
  async revokeMember(caller: PrincipalId, groupId: GroupId, user: PrincipalId): Promise<void> {
    await this.sequencer.run('revokeMember', async () => {
      const group = await this.requireGroup(groupId);
      this.policy.ensureOwner(group, caller);
      if (!this.policy.isMember(group, user)) {
        throw LedgerFault.notAMember(groupId, user);
      }
      await this.repository.removeMemberAndRotateKey(groupId, user, this.keyGenerator.generate());
      this.logger.log(`Revoked ${user.unwrap()} from group ${groupId.unwrap()} and rotated its key`);
    });
  }

  async isAuthorized(groupId: GroupId, user: PrincipalId): Promise<boolean> {
    return this.sequencer.run('isAuthorized', async () => {
      const group = await this.requireGroup(groupId);
      return this.policy.isMember(group, user);
    });
  }

  async storeKey(caller: PrincipalId, groupId: GroupId, keyB64: string): Promise<void> {
    await this.sequencer.run('storeKey', async () => {
      const group = await this.requireGroup(groupId);
      this.policy.ensureOwner(group, caller);
      await this.repository.storeKey(groupId, GroupKey.fromBase64(keyB64));
      this.logger.log(`Stored a new key for group ${groupId.unwrap()}`);
    });
  }

  async getKey(caller: PrincipalId, groupId: GroupId): Promise<string> {
    return this.sequencer.run('getKey', async () => {
      const group = await this.requireGroup(groupId);
      this.policy.ensureMember(group, caller);
      if (!group.key) {
        throw LedgerFault.noKeySet(groupId);
      }
      return group.key.toBase64();
    });
  }

  async recordTransaction(caller: PrincipalId, input: RecordTransactionInput): Promise<string> {
    return this.sequencer.run('recordTransaction', async () => {
      const group = await this.requireGroup(input.groupId);
      this.policy.ensureRecorder(caller);
      if (!this.policy.isMember(group, input.userId)) {
        throw LedgerFault.notAMember(input.groupId, input.userId);
      }

      const entry = { ...input, ledgerTimestamp: this.clock.now() };
      const transaction: LedgerTransaction = { id: deriveTransactionId(entry), ...entry };
      await this.repository.appendTransaction(transaction);
      return transaction.id;
    });
  }

  async listTransactions(caller: PrincipalId, groupId: GroupId, user: PrincipalId): Promise<LedgerTransaction[]> {
    return this.sequencer.run('listTransactions', async () => {
      const group = await this.requireGroup(groupId);
      this.policy.ensureCanListTransactions(group, caller, user);
      return this.repository.listTransactions(groupId);
    });
  }

  async ping(): Promise<void> {
    await this.repository.ping();
  }

  private async requireGroup(groupId: GroupId): Promise<Group> {
    const group = await this.repository.findGroup(groupId);
    if (!group) {
      throw LedgerFault.notFound(groupId);
    }
    return group;
  }
}
