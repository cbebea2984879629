import { bankIdSchema } from '@application/validation/bankSchemas';
import { NotFoundError } from '@shared/errors/AppError';

/** A path segment that is not a positive integer can never name a bank: 404, not 400. */
export function parseBankId(raw: unknown): number {
  const result = bankIdSchema.safeParse(raw);
  if (!result.success) throw new NotFoundError('Bank', String(raw));
  return result.data;
}
