import type { ItemIdentity, MarketContext, Quote } from '../../types';

/**
 * One external pricing service.
 *
 * `findQuote` resolves to null when the service has no price for the item.
 * It rejects with PermanentError when the service could not be reached or
 * answered with something unusable, and with AdapterConfigError when the
 * identity cannot be turned into a query for this service.
 */
export interface SourceAdapter {
  readonly sourceId: string;
  findQuote(identity: ItemIdentity, context: MarketContext): Promise<Quote | null>;
}
