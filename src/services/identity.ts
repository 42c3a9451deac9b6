import { ItemIdentitySchema, MarketContextSchema, type ItemIdentity, type MarketContext } from '../types';
import { InvalidContextError, InvalidIdentityError } from '../utils/errors';

/**
 * Parse an identity from the item parser. Requires a name or base type
 * after trimming.
 */
export function validateIdentity(input: unknown): ItemIdentity {
  const parsed = ItemIdentitySchema.safeParse(input);

  if (!parsed.success) {
    throw new InvalidIdentityError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'identity'}: ${issue.message}`)
    );
  }

  if (!parsed.data.name && !parsed.data.baseType) {
    throw new InvalidIdentityError(['name or baseType is required']);
  }

  return parsed.data;
}

export function validateContext(input: unknown): MarketContext {
  const parsed = MarketContextSchema.safeParse(input);

  if (!parsed.success) {
    throw new InvalidContextError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return Object.freeze(parsed.data);
}
