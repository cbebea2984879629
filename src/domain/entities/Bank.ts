/**
 * Bank Entity
 * Layer: Domain
 *
 *   Bank       — a persisted record. `id` is assigned by the repository on
 *                insert and never changes afterwards.
 *   NewBank    — what a caller supplies on create (no id).
 *   BankPatch  — a partial update: every key is optional, and an absent key
 *                means "keep the stored value".
 *
 * Column names match the property names, so no row/domain renaming is needed
 * in the repository.
 */
export interface Bank {
  id: number;
  name: string;
  location: string;
}

export type NewBank = Omit<Bank, 'id'>;

export type BankPatch = Partial<NewBank>;

/** Merge a patch into an existing record. Pure: the input is left untouched. */
export function applyBankPatch(bank: Bank, patch: BankPatch): Bank {
  return {
    id: bank.id,
    name: patch.name ?? bank.name,
    location: patch.location ?? bank.location,
  };
}
