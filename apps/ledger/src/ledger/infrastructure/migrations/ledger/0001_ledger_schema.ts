import { type Kysely, sql } from 'kysely';
import type { LedgerDatabase } from '../../database.types';

export async function up(db: Kysely<LedgerDatabase>): Promise<void> {
  await db.schema.createSchema('ledger').ifNotExists().execute();

  await db.schema
    .createTable('ledger.groups')
    .addColumn('group_id', 'varchar', (col) => col.primaryKey())
    .addColumn('owner_id', 'varchar', (col) => col.notNull())
    .addColumn('group_key', 'varchar')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createTable('ledger.group_members')
    .addColumn('group_id', 'varchar', (col) => col.notNull().references('ledger.groups.group_id'))
    .addColumn('user_id', 'varchar', (col) => col.notNull())
    .addColumn('position', 'integer', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addPrimaryKeyConstraint('group_members_pk', ['group_id', 'user_id'])
    .execute();

  await db.schema
    .createIndex('group_members_position_idx')
    .on('ledger.group_members')
    .columns(['group_id', 'position'])
    .unique()
    .execute();

  // Transactions: append-only; no update or delete path exists.
  await db.schema
    .createTable('ledger.transactions')
    .addColumn('id', 'varchar(64)', (col) => col.primaryKey())
    .addColumn('group_id', 'varchar', (col) => col.notNull().references('ledger.groups.group_id'))
    .addColumn('user_id', 'varchar', (col) => col.notNull())
    .addColumn('file_hash', 'varchar', (col) => col.notNull())
    .addColumn('content_id', 'varchar', (col) => col.notNull())
    .addColumn('ledger_timestamp', 'bigint', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('transactions_group_timestamp_idx')
    .on('ledger.transactions')
    .columns(['group_id', 'ledger_timestamp'])
    .execute();
}

export async function down(db: Kysely<LedgerDatabase>): Promise<void> {
  await db.schema.dropTable('ledger.transactions').ifExists().execute();
  await db.schema.dropTable('ledger.group_members').ifExists().execute();
  await db.schema.dropTable('ledger.groups').ifExists().execute();
  await db.schema.dropSchema('ledger').ifExists().execute();
}
