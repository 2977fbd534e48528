import { describe, expect, it } from 'vitest';
import { GroupAccessPolicy } from '../../src/ledger/application/group-access.policy';
import type { Group } from '../../src/ledger/domain/entities/Group';
import { MembershipSet } from '../../src/ledger/domain/entities/MembershipSet';
import { RECORDER, REGISTRAR, gid, makeRoles, pid } from './support/ledger-test-kit';

const owner = pid('owner');
const member = pid('member');
const stranger = pid('stranger');

const group: Group = {
  groupId: gid('g1'),
  owner,
  members: MembershipSet.of([member]),
  key: null,
};

describe('GroupAccessPolicy', () => {
  const policy = new GroupAccessPolicy(makeRoles());

  it('answers membership', () => {
    expect(policy.isMember(group, member)).toBe(true);
    expect(policy.isMember(group, owner)).toBe(false);
  });

  it('gates management on ownership', () => {
    expect(() => policy.ensureOwner(group, owner)).not.toThrow();
    expect(() => policy.ensureOwner(group, member)).toThrow('Only the owner of group g1 may do this');
  });

  it('gates key reads on membership alone', () => {
    expect(() => policy.ensureMember(group, member)).not.toThrow();
    expect(() => policy.ensureMember(group, owner)).toThrow('Caller is not a member of group g1');
  });

  it('recognizes the registrar and recorders', () => {
    expect(() => policy.ensureRegistrar(REGISTRAR)).not.toThrow();
    expect(() => policy.ensureRegistrar(RECORDER)).toThrow('Only the registrar may register groups');
    expect(() => policy.ensureRecorder(RECORDER)).not.toThrow();
    expect(() => policy.ensureRecorder(REGISTRAR)).not.toThrow();
    expect(() => policy.ensureRecorder(member)).toThrow('Caller may not record transactions');
  });

  it('allows listing for members, the owner and the registrar', () => {
    expect(() => policy.ensureCanListTransactions(group, stranger, member)).not.toThrow();
    expect(() => policy.ensureCanListTransactions(group, owner, stranger)).not.toThrow();
    expect(() => policy.ensureCanListTransactions(group, REGISTRAR, stranger)).not.toThrow();
    expect(() => policy.ensureCanListTransactions(group, stranger, stranger)).toThrow(
      'Transactions of group g1 are not visible to this caller'
    );
  });
});
