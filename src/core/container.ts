/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The single place where tokens are mapped to implementations.
 *
 *   - `reflect-metadata` must load first: tsyringe reads constructor
 *     parameter metadata written by @injectable / @inject.
 *   - The Knex instance is built lazily through `instanceCachingFactory`, so
 *     nothing touches the database driver until a repository is resolved. Tests
 *     register their own Knex (in-memory SQLite) before that happens.
 *   - Repositories and services use `useClass`: a fresh instance per resolve,
 *     wired with whatever Knex is registered at that moment.
 */
import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { Knex } from 'knex';

import { TOKENS } from './types';
import { logger } from './logger';

import { getDbConnection } from '@infrastructure/database/connection';
import { KnexBankRepository } from '@infrastructure/repositories/KnexBankRepository';
import { BankService } from '@application/services/BankService';

container.register(TOKENS.Logger, { useValue: logger });
container.register<Knex>(TOKENS.Knex, {
  useFactory: instanceCachingFactory<Knex>(() => getDbConnection()),
});
container.register(TOKENS.BankRepository, { useClass: KnexBankRepository });
container.register(TOKENS.BankService, { useClass: BankService });

export { container };
