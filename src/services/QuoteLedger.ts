import type { DecisionRecord, QuoteRecord, QuoteStore, StoredQuote } from '../storage/QuoteStore';
import type { ItemIdentity, MarketContext, PriceDecision, Quote } from '../types';
import { errorMessage } from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';
import { summarize, type PriceStats } from '../utils/stats';
import { normalizeName } from './sources/matching';

interface LedgerEntry {
  quotes: QuoteRecord[];
  decision: DecisionRecord;
}

export interface QuoteLedgerOptions {
  logger?: Logger;
}

/** Key an item is stored under: rarity plus normalized name and base type. */
export function itemKey(identity: ItemIdentity): string {
  return [identity.rarity, normalizeName(identity.name ?? ''), normalizeName(identity.baseType ?? '')].join('|');
}

/**
 * Write-behind recorder for quotes and decisions.
 *
 * record() only queues; the queue is written on the next macrotask in one
 * store transaction. A failed write is logged and dropped so it can never
 * reach a lookup's caller.
 */
export class QuoteLedger {
  private readonly store: QuoteStore;
  private readonly logger: Logger;
  private pending: LedgerEntry[] = [];
  private scheduled: Promise<void> | null = null;
  private written = 0;
  private failed = 0;

  constructor(store: QuoteStore, options: QuoteLedgerOptions = {}) {
    this.store = store;
    this.logger = options.logger ?? createLogger('quote-ledger');
  }

  record(identity: ItemIdentity, context: MarketContext, quotes: readonly Quote[], decision: PriceDecision): void {
    const key = itemKey(identity);
    const itemName = identity.name ?? identity.baseType ?? '';

    this.pending.push({
      quotes: quotes.map(quote => ({
        itemKey: key,
        itemName,
        league: context.league,
        game: context.game,
        sourceId: quote.sourceId,
        chaosValue: quote.chaosValue,
        sampleSize: quote.sampleSize,
        lowConfidence: quote.lowConfidence,
        fetchedAt: quote.fetchedAt,
      })),
      decision: {
        itemKey: key,
        itemName,
        league: context.league,
        game: context.game,
        chaosValue: decision.chaosValue,
        confidence: decision.confidence,
        decisionSource: decision.decisionSource,
        quoteCount: decision.contributingQuotes.length,
        decidedAt: new Date(),
      },
    });

    this.schedule();
  }

  /** Resolves once everything recorded so far has been written (or dropped). */
  async flush(): Promise<void> {
    while (this.scheduled) {
      await this.scheduled;
    }
  }

  async history(identity: ItemIdentity, context: MarketContext, limit = 20): Promise<StoredQuote[]> {
    await this.flush();
    return this.store.loadRecentQuotes({
      itemKey: itemKey(identity),
      league: context.league,
      game: context.game,
      limit,
    });
  }

  async stats(identity: ItemIdentity, context: MarketContext, limit = 20): Promise<PriceStats> {
    const quotes = await this.history(identity, context, limit);
    return summarize(quotes.map(quote => quote.chaosValue));
  }

  getCounts(): { written: number; failed: number; pending: number } {
    return { written: this.written, failed: this.failed, pending: this.pending.length };
  }

  private schedule(): void {
    if (this.scheduled) {
      return;
    }

    this.scheduled = new Promise<void>(resolve => {
      setImmediate(() => {
        this.scheduled = null;
        this.drain();
        resolve();
      });
    });
  }

  private drain(): void {
    const batch = this.pending;
    this.pending = [];

    if (batch.length === 0) {
      return;
    }

    try {
      this.store.transaction(() => {
        for (const entry of batch) {
          for (const quote of entry.quotes) {
            this.store.saveQuote(quote);
          }
          this.store.saveDecision(entry.decision);
        }
      });
      this.written += batch.length;
      this.logger.debug({ entries: batch.length }, 'Ledger batch written');
    } catch (error) {
      this.failed += batch.length;
      this.logger.error({ entries: batch.length, error: errorMessage(error) }, 'Failed to write ledger batch');
    }
  }
}
