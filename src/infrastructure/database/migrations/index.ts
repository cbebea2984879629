/**
 * Migration Source
 * Layer: Infrastructure (Database)
 *
 * Migrations are imported as modules and handed to Knex through a custom
 * `migrationSource` instead of a directory scan. That way the same list runs
 * under tsx, under Jest and from compiled output, with no file-extension
 * juggling. Add new migrations to the array in order.
 */
import type { Knex } from 'knex';

import * as createBanks from './001_create_banks';

interface NamedMigration {
  name: string;
  migration: Knex.Migration;
}

const migrations: NamedMigration[] = [{ name: '001_create_banks', migration: createBanks }];

export const migrationSource: Knex.MigrationSource<NamedMigration> = {
  getMigrations: async () => migrations,
  getMigrationName: (entry) => entry.name,
  getMigration: async (entry) => entry.migration,
};

/** Apply every pending migration. Returns the names that ran in this call. */
export async function runMigrations(db: Knex): Promise<string[]> {
  const [, applied]: [number, string[]] = await db.migrate.latest({ migrationSource });
  return applied;
}
