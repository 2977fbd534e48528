import { promises as fs } from 'fs';
import path from 'path';
import { FileMigrationProvider, Kysely, Migrator, PostgresDialect, type MigrationResultSet } from 'kysely';
import { Pool } from 'pg';

export type MigrationDirection = 'up' | 'down';

type MigratorConfig = {
  migrationsPath: string;
  connectionString: string;
  migrationTableName?: string;
  direction?: MigrationDirection;
};

export async function runMigrations<DB>({
  migrationsPath,
  connectionString,
  migrationTableName,
  direction = 'up',
}: MigratorConfig): Promise<MigrationResultSet> {
  const db = new Kysely<DB>({
    dialect: new PostgresDialect({
      pool: new Pool({ connectionString }),
    }),
  });

  const migrator = new Migrator({
    db,
    provider: new FileMigrationProvider({
      fs,
      path,
      migrationFolder: migrationsPath,
    }),
    migrationTableName,
  });

  try {
    return direction === 'down' ? await migrator.migrateDown() : await migrator.migrateToLatest();
  } finally {
    await db.destroy();
  }
}

export function reportMigrations(result: MigrationResultSet, direction: MigrationDirection): boolean {
  result.results?.forEach((migration) => {
    if (migration.status === 'Success') {
      console.log(`Migration ${migration.migrationName} ${direction} succeeded`);
    } else if (migration.status === 'Error') {
      console.error(`Migration ${migration.migrationName} failed`);
    }
  });

  if (result.error) {
    console.error('Migration failed', result.error);
    return false;
  }
  return true;
}

export function resolveDirection(argument: string | undefined): MigrationDirection {
  return argument === 'down' ? 'down' : 'up';
}

export function resolveConnectionString(envVar: string, fallback?: string): string {
  const value = process.env[envVar] ?? fallback;
  if (!value) {
    throw new Error(`Missing connection string for migrations (${envVar})`);
  }
  return value;
}
