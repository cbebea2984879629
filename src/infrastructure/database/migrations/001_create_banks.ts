/**
 * Migration 001 — Create the `banks` Table
 * Layer: Infrastructure (Database)
 *
 * One row per bank. `increments` gives a serial id on Postgres and
 * INTEGER PRIMARY KEY AUTOINCREMENT on SQLite, so ids of deleted rows are
 * never handed out again. Both text columns are NOT NULL, 100 chars wide.
 *
 * A database that already has a `banks` table (created by hand before the
 * app managed its schema) is left as it is.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  if (await knex.schema.hasTable('banks')) return;

  await knex.schema.createTable('banks', (table) => {
    table.increments('id').primary();
    table.string('name', 100).notNullable();
    table.string('location', 100).notNullable();
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('banks');
}
