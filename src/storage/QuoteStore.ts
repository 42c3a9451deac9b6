import type { Confidence, Game } from '../types';

export interface QuoteRecord {
  /** Stable key for the priced item, see itemKey(). */
  itemKey: string;
  itemName: string;
  league: string;
  game: Game;
  sourceId: string;
  chaosValue: number;
  sampleSize: number;
  lowConfidence: boolean;
  fetchedAt: Date;
}

export interface DecisionRecord {
  itemKey: string;
  itemName: string;
  league: string;
  game: Game;
  chaosValue: number;
  confidence: Confidence;
  decisionSource: string;
  quoteCount: number;
  decidedAt: Date;
}

export interface StoredQuote extends QuoteRecord {
  id: number;
}

export interface QuoteQuery {
  itemKey: string;
  league: string;
  game: Game;
  limit: number;
  sourceId?: string;
}

/**
 * Persistence the ledger writes through. Calls are synchronous; a batch of
 * saves runs inside transaction().
 */
export interface QuoteStore {
  saveQuote(record: QuoteRecord): void;
  saveDecision(record: DecisionRecord): void;
  /** Newest first. */
  loadRecentQuotes(query: QuoteQuery): StoredQuote[];
  transaction(work: () => void): void;
  close(): void;
}
