import type { ColumnType } from 'kysely';

type TimestampColumn = ColumnType<Date, Date | string | undefined, Date | string>;

/**
 * Groups table: owner and current key (base64, null until first set)
 */
export interface GroupsTable {
  group_id: string;
  owner_id: string;
  group_key: string | null;
  created_at: TimestampColumn;
  updated_at: TimestampColumn;
}

/**
 * GroupMembers table: dense 0-based positions per group; removal moves the
 * last member into the freed position
 */
export interface GroupMembersTable {
  group_id: string;
  user_id: string;
  position: number;
  created_at: TimestampColumn;
}

/**
 * Transactions table: append-only file sharing log
 */
export interface TransactionsTable {
  id: string;
  group_id: string;
  user_id: string;
  file_hash: string;
  content_id: string;
  ledger_timestamp: string; // bigint nanoseconds as string
  created_at: TimestampColumn;
}

export interface LedgerDatabase {
  'ledger.groups': GroupsTable;
  'ledger.group_members': GroupMembersTable;
  'ledger.transactions': TransactionsTable;
}
