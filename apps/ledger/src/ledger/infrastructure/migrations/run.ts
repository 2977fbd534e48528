import path from 'path';
import { config } from 'dotenv';
import {
  reportMigrations,
  resolveConnectionString,
  resolveDirection,
  runMigrations,
} from '@platform/infrastructure/migrations/migrator';
import { DEFAULT_DATABASE_URL } from '@platform/infrastructure/database/database.service';
import type { LedgerDatabase } from '../database.types';

config();

async function main(): Promise<void> {
  const direction = resolveDirection(process.argv[2]);
  const result = await runMigrations<LedgerDatabase>({
    migrationsPath: path.join(__dirname, 'ledger'),
    connectionString: resolveConnectionString('LEDGER_DATABASE_URL', process.env.DATABASE_URL ?? DEFAULT_DATABASE_URL),
    migrationTableName: 'ledger_migrations',
    direction,
  });

  if (!reportMigrations(result, direction)) {
    process.exit(1);
  }
}

void main().catch((error) => {
  console.error(error);
  process.exit(1);
});
