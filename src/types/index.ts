import { z } from 'zod';

/**
 * Domain types for price resolution.
 * Identity and market inputs are validated with zod; quotes and decisions
 * are produced internally and frozen on creation.
 */

export const RaritySchema = z.enum([
  'NORMAL',
  'MAGIC',
  'RARE',
  'UNIQUE',
  'CURRENCY',
  'GEM',
  'DIVINATION_CARD',
]);
export type Rarity = z.infer<typeof RaritySchema>;

export const GameSchema = z.enum(['GAME1', 'GAME2']);
export type Game = z.infer<typeof GameSchema>;

export const ConfidenceSchema = z.enum(['HIGH', 'MEDIUM', 'LOW', 'NONE']);
export type Confidence = z.infer<typeof ConfidenceSchema>;

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform(value => (value === '' ? undefined : value));

export const ItemIdentitySchema = z.object({
  name: optionalText,
  baseType: optionalText,
  rarity: RaritySchema,
  category: optionalText,
  stackSize: z.number().int().min(1).default(1),
  gemLevel: z.number().int().min(1).optional(),
  gemQuality: z.number().int().min(0).optional(),
  corrupted: z.boolean().optional(),
  links: z.number().int().min(0).max(6).optional(),
});

/** Identity after validation: trimmed, empty strings dropped, stackSize defaulted. */
export type ItemIdentity = z.infer<typeof ItemIdentitySchema>;
/** Identity as handed over by the item parser. */
export type ItemIdentityInput = z.input<typeof ItemIdentitySchema>;

export const MarketContextSchema = z.object({
  league: z.string().trim().min(1),
  game: GameSchema,
});
export type MarketContext = Readonly<z.infer<typeof MarketContextSchema>>;

export interface Quote {
  readonly sourceId: string;
  /** Value in the market's base currency unit (chaos for GAME1, exalted for GAME2). */
  readonly chaosValue: number;
  readonly sampleSize: number;
  readonly lowConfidence: boolean;
  readonly fetchedAt: Date;
}

export interface PriceDecision {
  readonly chaosValue: number;
  readonly confidence: Confidence;
  readonly decisionSource: string;
  readonly contributingQuotes: readonly Quote[];
}

export function createQuote(fields: {
  sourceId: string;
  chaosValue: number;
  sampleSize?: number;
  lowConfidence?: boolean;
  fetchedAt?: Date;
}): Quote {
  return Object.freeze({
    sourceId: fields.sourceId,
    chaosValue: fields.chaosValue,
    sampleSize: fields.sampleSize ?? 0,
    lowConfidence: fields.lowConfidence ?? false,
    fetchedAt: fields.fetchedAt ?? new Date(),
  });
}

export function createDecision(
  chaosValue: number,
  confidence: Confidence,
  decisionSource: string,
  contributingQuotes: readonly Quote[]
): PriceDecision {
  return Object.freeze({
    chaosValue,
    confidence,
    decisionSource,
    contributingQuotes: Object.freeze([...contributingQuotes]),
  });
}

export interface LeagueInfo {
  name: string;
  displayName: string;
}

/** Base currency label per game, as the trade site names it. */
export const BASE_CURRENCY: Record<Game, string> = {
  GAME1: 'chaos',
  GAME2: 'exalted',
};
