/**
 * Bank Input Schemas
 * Layer: Application
 *
 * Both adapters (JSON API and HTML forms) hand raw input to BankService, which
 * runs it through these schemas. Create and update share one rule per field:
 * a string, not blank, at most 100 characters (the column width, counted in
 * code points). Values are stored exactly as sent. On update a field may be
 * left out entirely; it may not be blanked.
 *
 * Bodies that are missing or not a plain object are read as `{}`, so a bad
 * body reports the missing fields instead of a type error.
 */
import { ValidationError } from '@shared/errors/AppError';
import { z } from 'zod/v4';

export const BANK_FIELD_MAX_LENGTH = 100;

/** Upper bound of the `integer` id column. */
export const BANK_ID_MAX = 2_147_483_647;

function bankText(field: string) {
  return z
    .string({
      error: (issue) =>
        issue.input === undefined ? `${field} is required` : `${field} must be a string`,
    })
    .refine((value) => value.trim().length > 0, { error: `${field} is required` })
    .refine((value) => [...value].length <= BANK_FIELD_MAX_LENGTH, {
      error: `${field} must be at most ${BANK_FIELD_MAX_LENGTH} characters`,
    });
}

function asObject(value: unknown): unknown {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? value : {};
}

export const newBankSchema = z.preprocess(
  asObject,
  z.object({
    name: bankText('name'),
    location: bankText('location'),
  }),
);

export const bankPatchSchema = z.preprocess(
  asObject,
  z.object({
    name: bankText('name').optional(),
    location: bankText('location').optional(),
  }),
);

/**
 * Route ids are positive decimal integers that fit the id column; "abc", "0",
 * "1.5" and "2147483648" never match a bank.
 */
export const bankIdSchema = z
  .string()
  .regex(/^[1-9]\d*$/)
  .transform(Number)
  .refine((id) => Number.isSafeInteger(id) && id <= BANK_ID_MAX);

/** Parse or throw a ValidationError listing every failing field. */
export function parseInput<T extends z.ZodType>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const messages = result.error.issues.map((issue) => issue.message).join('; ');
    throw new ValidationError(messages);
  }

  return result.data;
}
