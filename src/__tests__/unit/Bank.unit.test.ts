/**
 * Unit Tests — applyBankPatch
 *
 * The merge behind partial updates: absent keys keep the stored value, the id
 * never changes, and the original record is not mutated.
 */
import { applyBankPatch } from '@domain/entities/Bank';

import { sampleBank } from '../helpers/fixtures';

describe('applyBankPatch()', () => {
  it('should change only the supplied location', () => {
    expect(applyBankPatch(sampleBank, { location: 'New City' })).toEqual({
      id: 1,
      name: 'Old Name',
      location: 'New City',
    });
  });

  it('should change only the supplied name', () => {
    expect(applyBankPatch(sampleBank, { name: 'New Name' })).toEqual({
      id: 1,
      name: 'New Name',
      location: 'Old City',
    });
  });

  it('should return an equal copy for an empty patch', () => {
    const result = applyBankPatch(sampleBank, {});

    expect(result).toEqual(sampleBank);
    expect(result).not.toBe(sampleBank);
  });

  it('should leave the input record untouched', () => {
    const before = { ...sampleBank };

    applyBankPatch(sampleBank, { name: 'Other', location: 'Elsewhere' });

    expect(sampleBank).toEqual(before);
  });
});
