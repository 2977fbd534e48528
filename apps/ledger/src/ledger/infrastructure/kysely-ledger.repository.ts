import { Inject, Injectable } from '@nestjs/common';
import { sql, type Transaction } from 'kysely';
import { LedgerRepository } from '../application/ports/ledger-repository';
import type { Group } from '../domain/entities/Group';
import type { LedgerTransaction } from '../domain/entities/LedgerTransaction';
import { MembershipSet } from '../domain/entities/MembershipSet';
import { GroupId } from '../domain/value-objects/GroupId';
import { GroupKey } from '../domain/value-objects/GroupKey';
import { PrincipalId } from '../domain/value-objects/PrincipalId';
import { LedgerDatabaseService } from './database.service';
import type { LedgerDatabase } from './database.types';

@Injectable()
export class KyselyLedgerRepository extends LedgerRepository {
  constructor(@Inject(LedgerDatabaseService) private readonly dbService: LedgerDatabaseService) {
    super();
  }

  async findGroup(groupId: GroupId): Promise<Group | null> {
    const db = this.dbService.getDb();
    const row = await db
      .selectFrom('ledger.groups')
      .select(['group_id', 'owner_id', 'group_key'])
      .where('group_id', '=', groupId.unwrap())
      .executeTakeFirst();

    if (!row) {
      return null;
    }

    const members = await db
      .selectFrom('ledger.group_members')
      .select('user_id')
      .where('group_id', '=', groupId.unwrap())
      .orderBy('position', 'asc')
      .execute();

    return {
      groupId: GroupId.from(row.group_id),
      owner: PrincipalId.from(row.owner_id),
      members: MembershipSet.of(members.map((member) => PrincipalId.from(member.user_id))),
      key: row.group_key ? GroupKey.fromBase64(row.group_key) : null,
    };
  }

  async groupExists(groupId: GroupId): Promise<boolean> {
    const row = await this.dbService
      .getDb()
      .selectFrom('ledger.groups')
      .select('group_id')
      .where('group_id', '=', groupId.unwrap())
      .executeTakeFirst();
    return row !== undefined;
  }

  async createGroup(groupId: GroupId, owner: PrincipalId): Promise<void> {
    await this.dbService
      .getDb()
      .insertInto('ledger.groups')
      .values({ group_id: groupId.unwrap(), owner_id: owner.unwrap(), group_key: null })
      .execute();
  }

  async addMember(groupId: GroupId, user: PrincipalId): Promise<void> {
    await this.dbService
      .getDb()
      .transaction()
      .execute(async (trx) => {
        await this.lockGroup(trx, groupId);
        const last = await this.lastPosition(trx, groupId);

        await trx
          .insertInto('ledger.group_members')
          .values({
            group_id: groupId.unwrap(),
            user_id: user.unwrap(),
            position: last === null ? 0 : last + 1,
          })
          .execute();
      });
  }

  async removeMemberAndRotateKey(groupId: GroupId, user: PrincipalId, nextKey: GroupKey): Promise<void> {
    await this.dbService
      .getDb()
      .transaction()
      .execute(async (trx) => {
        await this.lockGroup(trx, groupId);

        const removed = await trx
          .deleteFrom('ledger.group_members')
          .where('group_id', '=', groupId.unwrap())
          .where('user_id', '=', user.unwrap())
          .returning('position')
          .executeTakeFirstOrThrow();

        const last = await this.lastPosition(trx, groupId);

        // Move the last member into the freed position.
        if (last !== null && last > removed.position) {
          await trx
            .updateTable('ledger.group_members')
            .set({ position: removed.position })
            .where('group_id', '=', groupId.unwrap())
            .where('position', '=', last)
            .execute();
        }

        await trx
          .updateTable('ledger.groups')
          .set({ group_key: nextKey.toBase64(), updated_at: sql`NOW()` })
          .where('group_id', '=', groupId.unwrap())
          .execute();
      });
  }

  async storeKey(groupId: GroupId, key: GroupKey): Promise<void> {
    await this.dbService
      .getDb()
      .updateTable('ledger.groups')
      .set({ group_key: key.toBase64(), updated_at: sql`NOW()` })
      .where('group_id', '=', groupId.unwrap())
      .execute();
  }

  async appendTransaction(transaction: LedgerTransaction): Promise<void> {
    await this.dbService
      .getDb()
      .insertInto('ledger.transactions')
      .values({
        id: transaction.id,
        group_id: transaction.groupId.unwrap(),
        user_id: transaction.userId.unwrap(),
        file_hash: transaction.fileHash,
        content_id: transaction.contentId,
        ledger_timestamp: transaction.ledgerTimestamp.toString(),
      })
      .execute();
  }

  async listTransactions(groupId: GroupId): Promise<LedgerTransaction[]> {
    const rows = await this.dbService
      .getDb()
      .selectFrom('ledger.transactions')
      .select(['id', 'group_id', 'user_id', 'file_hash', 'content_id', 'ledger_timestamp'])
      .where('group_id', '=', groupId.unwrap())
      .orderBy('ledger_timestamp', 'asc')
      .execute();

    return rows.map((row) => ({
      id: row.id,
      groupId: GroupId.from(row.group_id),
      userId: PrincipalId.from(row.user_id),
      fileHash: row.file_hash,
      contentId: row.content_id,
      ledgerTimestamp: BigInt(row.ledger_timestamp),
    }));
  }

  async ping(): Promise<void> {
    await sql`select 1`.execute(this.dbService.getDb());
  }

  private async lockGroup(trx: Transaction<LedgerDatabase>, groupId: GroupId): Promise<void> {
    await trx
      .selectFrom('ledger.groups')
      .select('group_id')
      .where('group_id', '=', groupId.unwrap())
      .forUpdate()
      .executeTakeFirstOrThrow();
  }

  private async lastPosition(trx: Transaction<LedgerDatabase>, groupId: GroupId): Promise<number | null> {
    const row = await trx
      .selectFrom('ledger.group_members')
      .select('position')
      .where('group_id', '=', groupId.unwrap())
      .orderBy('position', 'desc')
      .limit(1)
      .executeTakeFirst();
    return row ? row.position : null;
  }
}
