/**
 * Bank Repository Interface — The Data Access Contract
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * The domain says which operations it needs; the infrastructure layer
 * (KnexBankRepository) decides how. Lookups that miss return `null` / `false`
 * rather than throwing, so turning a miss into a 404 stays the service's call.
 */
import type { Bank, NewBank } from '@domain/entities/Bank';

export interface IBankRepository {
  /** All banks, oldest first. */
  findAll(): Promise<Bank[]>;

  findById(id: number): Promise<Bank | null>;

  /** Insert a bank and return it with its newly assigned id. */
  create(bank: NewBank): Promise<Bank>;

  /** Overwrite name and location of an existing row. `null` if the id is gone. */
  update(bank: Bank): Promise<Bank | null>;

  /** Returns false when there was no row to delete. */
  delete(id: number): Promise<boolean>;
}
