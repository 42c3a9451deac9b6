import {
  createDecision,
  type ItemIdentity,
  type ItemIdentityInput,
  type MarketContext,
  type PriceDecision,
  type Quote,
} from '../types';
import { InvalidIdentityError, PermanentError, errorMessage } from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';
import { validateContext, validateIdentity } from './identity';
import type { QuoteLedger } from './QuoteLedger';
import type { SourceAdapter } from './sources/SourceAdapter';

export const DEFAULT_DIVERGENCE_THRESHOLD = 0.2;

export interface ArbitrationEngineOptions {
  /** Largest (max - min) / min at which quotes still agree. */
  divergenceThreshold?: number;
  /** Source whose value wins when quotes agree. */
  primarySource?: string;
  ledger?: QuoteLedger;
  /** Applied when resolvePrice is called without its own timeout. */
  defaultTimeoutMs?: number;
  logger?: Logger;
}

export interface ResolveOptions {
  timeoutMs?: number;
}

/**
 * Asks every registered source for a quote and reconciles the answers into
 * a single decision.
 */
export class ArbitrationEngine {
  private readonly adapters: readonly SourceAdapter[];
  private readonly divergenceThreshold: number;
  private readonly primarySource?: string;
  private readonly ledger?: QuoteLedger;
  private readonly defaultTimeoutMs?: number;
  private readonly logger: Logger;

  constructor(adapters: readonly SourceAdapter[], options: ArbitrationEngineOptions = {}) {
    const ids = adapters.map(adapter => adapter.sourceId);
    const duplicate = ids.find((id, index) => ids.indexOf(id) !== index);
    if (duplicate) {
      throw new RangeError(`Duplicate source id: ${duplicate}`);
    }

    const threshold = options.divergenceThreshold ?? DEFAULT_DIVERGENCE_THRESHOLD;
    if (!Number.isFinite(threshold) || threshold < 0) {
      throw new RangeError(`divergenceThreshold must be a non-negative number, got ${threshold}`);
    }

    this.adapters = [...adapters];
    this.divergenceThreshold = threshold;
    this.primarySource = options.primarySource;
    this.ledger = options.ledger;
    this.defaultTimeoutMs = options.defaultTimeoutMs;
    this.logger = options.logger ?? createLogger('arbitration-engine');

    this.logger.info(
      { sources: ids, divergenceThreshold: threshold, primarySource: this.primarySource },
      'Arbitration engine ready'
    );
  }

  get sourceIds(): string[] {
    return this.adapters.map(adapter => adapter.sourceId);
  }

  async resolvePrice(
    input: ItemIdentityInput,
    contextInput: MarketContext,
    options: ResolveOptions = {}
  ): Promise<PriceDecision> {
    const context = validateContext(contextInput);

    let identity: ItemIdentity;
    try {
      identity = validateIdentity(input);
    } catch (error) {
      if (!(error instanceof InvalidIdentityError)) {
        throw error;
      }
      this.logger.warn({ issues: error.issues }, 'Rejected invalid identity');
      return createDecision(0, 'NONE', 'invalid identity', []);
    }

    const started = Date.now();
    const quotes = await this.collectQuotes(identity, context, options.timeoutMs ?? this.defaultTimeoutMs);
    const decision = this.arbitrate(quotes);

    this.logger.info(
      {
        item: identity.name ?? identity.baseType,
        league: context.league,
        game: context.game,
        value: decision.chaosValue,
        confidence: decision.confidence,
        source: decision.decisionSource,
        quotes: quotes.length,
        durationMs: Date.now() - started,
      },
      'Price resolved'
    );

    this.ledger?.record(identity, context, quotes, decision);
    return decision;
  }

  /**
   * Consensus over quotes already in registration order. Pure.
   */
  arbitrate(quotes: readonly Quote[]): PriceDecision {
    if (quotes.length === 0) {
      return createDecision(0, 'NONE', 'not found', quotes);
    }

    if (quotes.length === 1) {
      const [only] = quotes;
      return createDecision(only.chaosValue, 'MEDIUM', `${only.sourceId} only`, quotes);
    }

    const values = quotes.map(quote => quote.chaosValue);
    const min = Math.min(...values);
    const max = Math.max(...values);
    const divergence = min === 0 ? Infinity : (max - min) / min;

    if (divergence > this.divergenceThreshold) {
      const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
      const ids = quotes.map(quote => quote.sourceId).join(',');
      return createDecision(mean, 'MEDIUM', `averaged(${ids})`, quotes);
    }

    const primary = quotes.find(quote => quote.sourceId === this.primarySource) ?? quotes[0];
    const others = quotes
      .filter(quote => quote !== primary)
      .map(quote => quote.sourceId)
      .join(', ');
    const label = `${primary.sourceId}, validated by ${others}`;

    if (quotes.some(quote => quote.lowConfidence)) {
      return createDecision(primary.chaosValue, 'MEDIUM', `${label} (low confidence)`, quotes);
    }

    return createDecision(primary.chaosValue, 'HIGH', label, quotes);
  }

  private async collectQuotes(
    identity: ItemIdentity,
    context: MarketContext,
    timeoutMs: number | undefined
  ): Promise<Quote[]> {
    const results: Array<Quote | null> = this.adapters.map(() => null);
    const settled: boolean[] = this.adapters.map(() => false);

    const calls = Promise.all(
      this.adapters.map(async (adapter, index) => {
        results[index] = await this.callAdapter(adapter, identity, context);
        settled[index] = true;
      })
    );

    if (timeoutMs === undefined) {
      await calls;
    } else {
      let timer: NodeJS.Timeout | undefined;
      const timedOut = new Promise<'timeout'>(resolve => {
        timer = setTimeout(() => resolve('timeout'), timeoutMs);
      });

      try {
        const outcome = await Promise.race([calls.then(() => 'done' as const), timedOut]);
        if (outcome === 'timeout') {
          const pending = this.adapters
            .filter((_, index) => !settled[index])
            .map(adapter => adapter.sourceId);
          this.logger.warn({ timeoutMs, pending }, 'Lookup timed out, arbitrating partial quotes');
        }
      } finally {
        clearTimeout(timer);
      }
    }

    // A fresh array: answers arriving after a timeout stay out of this lookup.
    return results.filter((quote): quote is Quote => quote !== null);
  }

  /** Never rejects: a failing source counts as no quote. */
  private async callAdapter(
    adapter: SourceAdapter,
    identity: ItemIdentity,
    context: MarketContext
  ): Promise<Quote | null> {
    try {
      const quote = await adapter.findQuote(identity, context);
      this.logger.debug({ sourceId: adapter.sourceId, value: quote?.chaosValue ?? null }, 'Source answered');
      return quote;
    } catch (error) {
      if (error instanceof PermanentError) {
        this.logger.warn({ sourceId: adapter.sourceId, code: error.code, reason: error.message }, 'Source failed');
      } else {
        this.logger.error({ sourceId: adapter.sourceId, err: error, reason: errorMessage(error) }, 'Source failed unexpectedly');
      }
      return null;
    }
  }
}
