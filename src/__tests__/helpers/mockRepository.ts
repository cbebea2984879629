/**
 * Mock Repository Factory
 * Layer: Test Helpers
 *
 * An IBankRepository where every method is a `jest.fn()`. A factory rather
 * than a shared object, so call counts and resolved values never leak between
 * tests.
 *
 *   const repo = createMockRepository();
 *   repo.findById.mockResolvedValue(sampleBank);
 */
import type { IBankRepository } from '@domain/interfaces/IBankRepository';

export type MockBankRepository = {
  [K in keyof IBankRepository]: jest.Mock;
};

export function createMockRepository(): MockBankRepository {
  return {
    findAll: jest.fn(),
    findById: jest.fn(),
    create: jest.fn(),
    update: jest.fn(),
    delete: jest.fn(),
  };
}
