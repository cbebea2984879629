/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 */
import type { Bank, NewBank } from '@domain/entities/Bank';

export const sampleBank: Bank = {
  id: 1,
  name: 'Old Name',
  location: 'Old City',
};

export const sampleNewBank: NewBank = {
  name: 'Test Bank',
  location: 'Test City',
};
