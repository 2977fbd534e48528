import { beforeEach, describe, expect, it } from 'vitest';
import { LedgerFault } from '../../src/ledger/domain/errors/LedgerFault';
import { RECORDER, REGISTRAR, gid, keyOf, makeLedger, pid } from './support/ledger-test-kit';

const OWNER = REGISTRAR;
const g1 = gid('g1');
const m1 = pid('m1');
const m2 = pid('m2');
const outsider = pid('outsider');

describe('LedgerService', () => {
  let kit: ReturnType<typeof makeLedger>;

  beforeEach(() => {
    kit = makeLedger();
  });

  const registerWithMember = async (...members: ReturnType<typeof pid>[]) => {
    await kit.service.registerGroup(OWNER, g1);
    for (const member of members) {
      await kit.service.addMember(OWNER, g1, member);
    }
  };

  describe('registerGroup', () => {
    it('creates an empty, keyless group owned by the registrar', async () => {
      await kit.service.registerGroup(OWNER, g1);

      const group = await kit.repository.findGroup(g1);
      expect(group?.owner.equals(OWNER)).toBe(true);
      expect(group?.members.size).toBe(0);
      expect(group?.key).toBeNull();
      await expect(kit.service.groupExists(g1)).resolves.toBe(true);
    });

    it('rejects a duplicate registration', async () => {
      await kit.service.registerGroup(OWNER, g1);

      await expect(kit.service.registerGroup(OWNER, g1)).rejects.toMatchObject({ kind: 'AlreadyExists' });
    });

    it('rejects callers other than the registrar', async () => {
      await expect(kit.service.registerGroup(m1, g1)).rejects.toMatchObject({ kind: 'Unauthorized' });
      await expect(kit.service.groupExists(g1)).resolves.toBe(false);
    });

    it('reports an existing group before checking the caller', async () => {
      await kit.service.registerGroup(OWNER, g1);

      await expect(kit.service.registerGroup(m1, g1)).rejects.toMatchObject({ kind: 'AlreadyExists' });
    });
  });

  describe('membership', () => {
    it('toggles isAuthorized on add and revoke', async () => {
      await registerWithMember();
      await expect(kit.service.isAuthorized(g1, m1)).resolves.toBe(false);

      await kit.service.addMember(OWNER, g1, m1);
      await expect(kit.service.isAuthorized(g1, m1)).resolves.toBe(true);

      await kit.service.revokeMember(OWNER, g1, m1);
      await expect(kit.service.isAuthorized(g1, m1)).resolves.toBe(false);
    });

    it('reports a missing group from every group-scoped call', async () => {
      const missing = gid('missing');

      await expect(kit.service.addMember(OWNER, missing, m1)).rejects.toMatchObject({ kind: 'NotFound' });
      await expect(kit.service.revokeMember(OWNER, missing, m1)).rejects.toMatchObject({ kind: 'NotFound' });
      await expect(kit.service.isAuthorized(missing, m1)).rejects.toMatchObject({ kind: 'NotFound' });
      await expect(kit.service.storeKey(OWNER, missing, keyOf(0))).rejects.toMatchObject({ kind: 'NotFound' });
      await expect(kit.service.getKey(m1, missing)).rejects.toMatchObject({ kind: 'NotFound' });
      await expect(
        kit.service.recordTransaction(OWNER, { groupId: missing, userId: m1, fileHash: 'h', contentId: 'c' })
      ).rejects.toMatchObject({ kind: 'NotFound' });
      await expect(kit.service.listTransactions(OWNER, missing, m1)).rejects.toMatchObject({ kind: 'NotFound' });
    });

    it('only lets the owner add or revoke', async () => {
      await registerWithMember(m1);

      await expect(kit.service.addMember(m1, g1, m2)).rejects.toMatchObject({ kind: 'Unauthorized' });
      await expect(kit.service.revokeMember(m1, g1, m1)).rejects.toMatchObject({ kind: 'Unauthorized' });
    });

    it('rejects adding a current member', async () => {
      await registerWithMember(m1);

      await expect(kit.service.addMember(OWNER, g1, m1)).rejects.toMatchObject({ kind: 'AlreadyMember' });
    });

    it('rejects revoking a non-member without rotating', async () => {
      await registerWithMember(m1);
      await kit.service.storeKey(OWNER, g1, keyOf(1));

      await expect(kit.service.revokeMember(OWNER, g1, m2)).rejects.toMatchObject({ kind: 'NotAMember' });
      expect(kit.keys.issued).toBe(0);
      await expect(kit.service.getKey(m1, g1)).resolves.toBe(keyOf(1));
    });
  });

  describe('key lifecycle', () => {
    it('rotates the key when a member is revoked', async () => {
      await registerWithMember(m1, m2);
      await kit.service.storeKey(OWNER, g1, keyOf(1));

      await kit.service.revokeMember(OWNER, g1, m1);

      const rotated = await kit.service.getKey(m2, g1);
      expect(rotated).not.toBe(keyOf(1));
      expect(rotated).toBe(keyOf(0xa0));
      expect(Buffer.from(rotated, 'base64')).toHaveLength(32);
    });

    it('establishes a key by rotation when none was stored', async () => {
      await registerWithMember(m1, m2);

      await kit.service.revokeMember(OWNER, g1, m1);

      await expect(kit.service.getKey(m2, g1)).resolves.toBe(keyOf(0xa0));
    });

    it('leaves the revoked member without key access', async () => {
      await registerWithMember(m1);
      await kit.service.storeKey(OWNER, g1, keyOf(1));

      await kit.service.revokeMember(OWNER, g1, m1);

      await expect(kit.service.getKey(m1, g1)).rejects.toMatchObject({ kind: 'Unauthorized' });
    });

    it('rejects keys that do not decode to 32 bytes and keeps the old key', async () => {
      await registerWithMember(m1);
      await kit.service.storeKey(OWNER, g1, keyOf(1));

      const shortKey = Buffer.alloc(16, 7).toString('base64');
      await expect(kit.service.storeKey(OWNER, g1, shortKey)).rejects.toMatchObject({ kind: 'InvalidKey' });
      await expect(kit.service.storeKey(OWNER, g1, 'not base64!')).rejects.toMatchObject({ kind: 'InvalidKey' });

      await expect(kit.service.getKey(m1, g1)).resolves.toBe(keyOf(1));
    });

    it('only lets the owner store keys', async () => {
      await registerWithMember(m1);

      await expect(kit.service.storeKey(m1, g1, keyOf(2))).rejects.toMatchObject({ kind: 'Unauthorized' });
    });

    it('checks ownership before the key shape', async () => {
      await registerWithMember(m1);

      await expect(kit.service.storeKey(m1, g1, 'bad')).rejects.toMatchObject({ kind: 'Unauthorized' });
    });

    it('does not let ownership substitute for membership when reading the key', async () => {
      await registerWithMember(m1);
      await kit.service.storeKey(OWNER, g1, keyOf(1));

      await expect(kit.service.getKey(OWNER, g1)).rejects.toMatchObject({ kind: 'Unauthorized' });
    });

    it('reports a member read before any key exists', async () => {
      await registerWithMember(m1);

      await expect(kit.service.getKey(m1, g1)).rejects.toMatchObject({ kind: 'NoKeySet' });
    });

    it('overwrites the key on a later store', async () => {
      await registerWithMember(m1);
      await kit.service.storeKey(OWNER, g1, keyOf(1));
      await kit.service.storeKey(OWNER, g1, keyOf(2));

      await expect(kit.service.getKey(m1, g1)).resolves.toBe(keyOf(2));
    });
  });

  describe('transactions', () => {
    it('runs the register, key, record and list scenario end to end', async () => {
      await kit.service.registerGroup(OWNER, g1);
      await kit.service.addMember(OWNER, g1, m1);
      const zeroKey = Buffer.alloc(32).toString('base64');
      await kit.service.storeKey(OWNER, g1, zeroKey);

      await expect(kit.service.getKey(m1, g1)).resolves.toBe(zeroKey);

      const id = await kit.service.recordTransaction(OWNER, {
        groupId: g1,
        userId: m1,
        fileHash: 'filehash',
        contentId: 'ipfshash',
      });
      expect(id).toMatch(/^[0-9a-f]{64}$/);
      expect(id).toBe('6ff77ab935ad17ba462611b86714bea58c6964d9e799b616791de05c3d930568');

      const transactions = await kit.service.listTransactions(m1, g1, m1);
      expect(transactions).toHaveLength(1);
      const [entry] = transactions;
      expect(entry?.id).toBe(id);
      expect(entry?.groupId.unwrap()).toBe('g1');
      expect(entry?.userId.unwrap()).toBe('m1');
      expect(entry?.fileHash).toBe('filehash');
      expect(entry?.contentId).toBe('ipfshash');
    });

    it('refuses to record for a non-member and appends nothing', async () => {
      await registerWithMember(m1);

      await expect(
        kit.service.recordTransaction(OWNER, { groupId: g1, userId: m2, fileHash: 'h', contentId: 'c' })
      ).rejects.toMatchObject({ kind: 'NotAMember' });

      await expect(kit.service.listTransactions(OWNER, g1, m1)).resolves.toEqual([]);
    });

    it('only accepts records from recorders', async () => {
      await registerWithMember(m1);

      await expect(
        kit.service.recordTransaction(m1, { groupId: g1, userId: m1, fileHash: 'h', contentId: 'c' })
      ).rejects.toMatchObject({ kind: 'Unauthorized' });
      await expect(
        kit.service.recordTransaction(RECORDER, { groupId: g1, userId: m1, fileHash: 'h', contentId: 'c' })
      ).resolves.toMatch(/^[0-9a-f]{64}$/);
    });

    it('gives identical inputs distinct ids', async () => {
      await registerWithMember(m1);
      const input = { groupId: g1, userId: m1, fileHash: 'h', contentId: 'c' };

      const first = await kit.service.recordTransaction(OWNER, input);
      const second = await kit.service.recordTransaction(OWNER, input);

      expect(first).not.toBe(second);
      const listed = await kit.service.listTransactions(OWNER, g1, m1);
      expect(listed.map((transaction) => transaction.id)).toEqual([first, second]);
    });

    it('keeps history readable after the author is revoked', async () => {
      await registerWithMember(m1, m2);
      await kit.service.recordTransaction(OWNER, { groupId: g1, userId: m1, fileHash: 'h', contentId: 'c' });

      await kit.service.revokeMember(OWNER, g1, m1);

      await expect(kit.service.listTransactions(m2, g1, m2)).resolves.toHaveLength(1);
    });

    it('lets members, the owner and the registrar list, and nobody else', async () => {
      await registerWithMember(m1);

      await expect(kit.service.listTransactions(m1, g1, m1)).resolves.toEqual([]);
      await expect(kit.service.listTransactions(OWNER, g1, outsider)).resolves.toEqual([]);
      await expect(kit.service.listTransactions(outsider, g1, outsider)).rejects.toBeInstanceOf(LedgerFault);
      await expect(kit.service.listTransactions(outsider, g1, outsider)).rejects.toMatchObject({
        kind: 'Unauthorized',
      });
    });

    it('only lists the requested group', async () => {
      await registerWithMember(m1);
      await kit.service.registerGroup(OWNER, gid('g2'));
      await kit.service.addMember(OWNER, gid('g2'), m1);
      await kit.service.recordTransaction(OWNER, { groupId: gid('g2'), userId: m1, fileHash: 'h', contentId: 'c' });

      await expect(kit.service.listTransactions(m1, g1, m1)).resolves.toEqual([]);
      await expect(kit.service.listTransactions(m1, gid('g2'), m1)).resolves.toHaveLength(1);
    });
  });

  it('serializes concurrent calls so checks and writes see the same state', async () => {
    await registerWithMember();

    const results = await Promise.allSettled([
      kit.service.addMember(OWNER, g1, m1),
      kit.service.addMember(OWNER, g1, m1),
    ]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
    const group = await kit.repository.findGroup(g1);
    expect(group?.members.size).toBe(1);
  });
});
