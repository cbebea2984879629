/**
 * Bank Service — The Orchestrator
 * Layer: Application
 * Pattern: Facade
 *
 * The JSON API and the HTML pages are two thin adapters over this one class,
 * so validation and persistence rules are written exactly once:
 *
 *   - Input arrives as `unknown` and is parsed by the Zod schemas in
 *     bankSchemas.ts; a failure throws ValidationError (400).
 *   - A repository miss becomes NotFoundError (404).
 *   - Updates look the record up first, so an unknown id is a 404 even when
 *     the body is also invalid, then write the merged record in one statement.
 */
import {
  bankPatchSchema,
  newBankSchema,
  parseInput,
} from '@application/validation/bankSchemas';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import { applyBankPatch, type Bank } from '@domain/entities/Bank';
import type { IBankRepository } from '@domain/interfaces/IBankRepository';
import { NotFoundError } from '@shared/errors/AppError';
import { inject, injectable } from 'tsyringe';

@injectable()
export class BankService {
  constructor(
    @inject(TOKENS.BankRepository) private repo: IBankRepository,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async list(): Promise<Bank[]> {
    return this.repo.findAll();
  }

  async get(id: number): Promise<Bank> {
    const bank = await this.repo.findById(id);
    if (!bank) throw new NotFoundError('Bank', String(id));
    return bank;
  }

  async create(input: unknown): Promise<Bank> {
    const newBank = parseInput(newBankSchema, input);
    const bank = await this.repo.create(newBank);
    this.log.info({ id: bank.id }, 'Bank created');
    return bank;
  }

  async update(id: number, input: unknown): Promise<Bank> {
    const existing = await this.get(id);
    const patch = parseInput(bankPatchSchema, input);

    const updated = await this.repo.update(applyBankPatch(existing, patch));
    if (!updated) throw new NotFoundError('Bank', String(id));

    this.log.info({ id, fields: Object.keys(patch) }, 'Bank updated');
    return updated;
  }

  async delete(id: number): Promise<void> {
    const deleted = await this.repo.delete(id);
    if (!deleted) throw new NotFoundError('Bank', String(id));
    this.log.info({ id }, 'Bank deleted');
  }
}
