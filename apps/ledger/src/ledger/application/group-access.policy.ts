import { Inject, Injectable } from '@nestjs/common';
import type { Group } from '../domain/entities/Group';
import { LedgerFault } from '../domain/errors/LedgerFault';
import type { PrincipalId } from '../domain/value-objects/PrincipalId';
import { LedgerRoles } from './ledger-roles';

/**
 * Authorization rules over a loaded group.
 *
 * Ownership allows managing members and keys and reading the transaction log,
 * but never reading the key: only current members may do that.
 */
@Injectable()
export class GroupAccessPolicy {
  constructor(@Inject(LedgerRoles) private readonly roles: LedgerRoles) {}

  isMember(group: Group, principal: PrincipalId): boolean {
    return group.members.has(principal);
  }

  ensureOwner(group: Group, caller: PrincipalId): void {
    if (!group.owner.equals(caller)) {
      throw LedgerFault.unauthorized(`Only the owner of group ${group.groupId.unwrap()} may do this`);
    }
  }

  ensureMember(group: Group, caller: PrincipalId): void {
    if (!this.isMember(group, caller)) {
      throw LedgerFault.unauthorized(`Caller is not a member of group ${group.groupId.unwrap()}`);
    }
  }

  ensureRegistrar(caller: PrincipalId): void {
    if (!this.roles.isRegistrar(caller)) {
      throw LedgerFault.unauthorized('Only the registrar may register groups');
    }
  }

  ensureRecorder(caller: PrincipalId): void {
    if (!this.roles.isRecorder(caller)) {
      throw LedgerFault.unauthorized('Caller may not record transactions');
    }
  }

  ensureCanListTransactions(group: Group, caller: PrincipalId, user: PrincipalId): void {
    if (this.isMember(group, user) || this.roles.isRegistrar(caller) || group.owner.equals(caller)) {
      return;
    }
    throw LedgerFault.unauthorized(`Transactions of group ${group.groupId.unwrap()} are not visible to this caller`);
  }
}
