import { GroupAccessPolicy } from '../../../src/ledger/application/group-access.policy';
import { LedgerRoles } from '../../../src/ledger/application/ledger-roles';
import { LedgerSequencer } from '../../../src/ledger/application/ledger-sequencer';
import { LedgerService } from '../../../src/ledger/application/ledger.service';
import { KeyGenerator } from '../../../src/ledger/application/ports/key-generator';
import { LedgerClock } from '../../../src/ledger/application/ports/ledger-clock';
import { GroupId } from '../../../src/ledger/domain/value-objects/GroupId';
import { GroupKey } from '../../../src/ledger/domain/value-objects/GroupKey';
import { PrincipalId } from '../../../src/ledger/domain/value-objects/PrincipalId';
import { InMemoryLedgerRepository } from '../../../src/ledger/infrastructure/in-memory-ledger.repository';

export const REGISTRAR = PrincipalId.from('registrar');
export const RECORDER = PrincipalId.from('recorder');

/** Base64 of 32 bytes all equal to `fill`. */
export const keyOf = (fill: number): string => Buffer.alloc(32, fill).toString('base64');

/** Hands out keys filled with 0xA0, 0xA1, ... in order. */
export class SequentialKeyGenerator extends KeyGenerator {
  issued = 0;

  generate(): GroupKey {
    const key = GroupKey.fromBase64(keyOf(0xa0 + this.issued));
    this.issued += 1;
    return key;
  }
}

/** Starts at `start` nanoseconds and advances by one per call. */
export class SteppingClock extends LedgerClock {
  constructor(private next: bigint) {
    super();
  }

  now(): bigint {
    const value = this.next;
    this.next += 1n;
    return value;
  }
}

export const makeRoles = (): LedgerRoles => new LedgerRoles(REGISTRAR, [REGISTRAR, RECORDER]);

export const makeLedger = (clockStart = 1_700_000_000_000_000_001n) => {
  const repository = new InMemoryLedgerRepository();
  const keys = new SequentialKeyGenerator();
  const clock = new SteppingClock(clockStart);
  const policy = new GroupAccessPolicy(makeRoles());
  const service = new LedgerService(repository, policy, keys, clock, new LedgerSequencer());
  return { service, repository, keys, clock, policy };
};

export const gid = (value: string): GroupId => GroupId.from(value);
export const pid = (value: string): PrincipalId => PrincipalId.from(value);
