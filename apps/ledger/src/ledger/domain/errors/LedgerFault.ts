import type { LedgerErrorKind } from '@groupvault/contract';
import type { GroupId } from '../value-objects/GroupId';
import type { PrincipalId } from '../value-objects/PrincipalId';

/**
 * Permission or state violation raised by the ledger. Never transient.
 */
export class LedgerFault extends Error {
  constructor(
    readonly kind: LedgerErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'LedgerFault';
  }

  static notFound(groupId: GroupId): LedgerFault {
    return new LedgerFault('NotFound', `Group ${groupId.unwrap()} does not exist`);
  }

  static alreadyExists(groupId: GroupId): LedgerFault {
    return new LedgerFault('AlreadyExists', `Group ${groupId.unwrap()} already exists`);
  }

  static unauthorized(reason: string): LedgerFault {
    return new LedgerFault('Unauthorized', reason);
  }

  static invalidKey(): LedgerFault {
    return new LedgerFault('InvalidKey', 'Key must be standard base64 of exactly 32 bytes');
  }

  static notAMember(groupId: GroupId, user: PrincipalId): LedgerFault {
    return new LedgerFault('NotAMember', `${user.unwrap()} is not a member of group ${groupId.unwrap()}`);
  }

  static alreadyMember(groupId: GroupId, user: PrincipalId): LedgerFault {
    return new LedgerFault('AlreadyMember', `${user.unwrap()} is already a member of group ${groupId.unwrap()}`);
  }

  static noKeySet(groupId: GroupId): LedgerFault {
    return new LedgerFault('NoKeySet', `No key has been set for group ${groupId.unwrap()}`);
  }
}
