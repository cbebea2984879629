/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency is registered in the tsyringe container under one
 * of these Symbols. Grouped by architectural layer so it is easy to see what
 * exists at each level; a new repository or service gets its token here first.
 */
export const TOKENS = {
  // Infrastructure
  Knex: Symbol.for('Knex'),
  Logger: Symbol.for('Logger'),

  // Repositories
  BankRepository: Symbol.for('BankRepository'),

  // Services
  BankService: Symbol.for('BankService'),
} as const;
