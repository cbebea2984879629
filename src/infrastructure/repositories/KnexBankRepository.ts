/**
 * Knex Bank Repository — Data Access Implementation
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements IBankRepository)
 *
 * Plain Knex queries against the `banks` table, portable across pg and
 * better-sqlite3. Rows coming back from the driver are checked against a Zod
 * row schema in toDomain() rather than cast. @injectable so tsyringe injects
 * Knex and Logger.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { Bank, NewBank } from '@domain/entities/Bank';
import type { IBankRepository } from '@domain/interfaces/IBankRepository';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';
import { z } from 'zod/v4';

const TABLE = 'banks';
const COLUMNS = ['id', 'name', 'location'];

const bankRowSchema = z.object({
  id: z.coerce.number().int(),
  name: z.string(),
  location: z.string(),
});

@injectable()
export class KnexBankRepository implements IBankRepository {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async findAll(): Promise<Bank[]> {
    const rows: unknown[] = await this.db(TABLE).select(COLUMNS).orderBy('id', 'asc');
    return rows.map((row) => this.toDomain(row));
  }

  async findById(id: number): Promise<Bank | null> {
    const row: unknown = await this.db(TABLE).select(COLUMNS).where('id', id).first();
    return row ? this.toDomain(row) : null;
  }

  async create(bank: NewBank): Promise<Bank> {
    const rows: unknown[] = await this.db(TABLE)
      .insert({ name: bank.name, location: bank.location })
      .returning(COLUMNS);

    const created = this.toDomain(rows[0]);
    this.log.debug({ id: created.id }, 'banks insert complete');
    return created;
  }

  async update(bank: Bank): Promise<Bank | null> {
    const affected = await this.db(TABLE)
      .where('id', bank.id)
      .update({ name: bank.name, location: bank.location });

    this.log.debug({ id: bank.id, affected }, 'banks update complete');
    return affected > 0 ? { ...bank } : null;
  }

  async delete(id: number): Promise<boolean> {
    const affected = await this.db(TABLE).where('id', id).del();
    this.log.debug({ id, affected }, 'banks delete complete');
    return affected > 0;
  }

  /** Validate a driver row and map it to a Bank (single place for this conversion). */
  private toDomain(row: unknown): Bank {
    return bankRowSchema.parse(row);
  }
}
