import { z } from 'zod';
import type { RateLimitedCachingClient } from '../../clients/RateLimitedCachingClient';
import {
  BASE_CURRENCY,
  createQuote,
  type Game,
  type ItemIdentity,
  type LeagueInfo,
  type MarketContext,
  type Quote,
} from '../../types';
import { AdapterConfigError, PermanentError } from '../../utils/errors';
import { createLogger, type Logger } from '../../utils/logger';
import { median } from '../../utils/stats';
import type { SourceAdapter } from './SourceAdapter';
import { classifyIdentity, lookupName } from './matching';

const API_PREFIX: Record<Game, string> = {
  GAME1: 'trade',
  GAME2: 'trade2',
};

const MIN_CONFIDENT_LISTINGS = 5;

const SearchResponseSchema = z.object({
  id: z.string(),
  result: z.array(z.string()).default([]),
  total: z.number().optional(),
});

const ListingSchema = z.object({
  id: z.string(),
  listing: z.object({
    price: z
      .object({
        amount: z.number(),
        currency: z.string(),
      })
      .nullish(),
  }),
  item: z
    .object({ stackSize: z.number().int().positive().optional() })
    .partial()
    .default({}),
});

const FetchResponseSchema = z.object({
  result: z.array(ListingSchema.nullable()).default([]),
});

const LeaguesResponseSchema = z.object({
  result: z.array(z.object({ id: z.string(), text: z.string().optional() })).default([]),
});

export interface TradeQuery {
  query: {
    status: { option: 'online' };
    name?: string;
    type?: string;
    filters?: Record<string, { filters: Record<string, unknown> }>;
  };
  sort: { price: 'asc' };
}

export interface TradeSourceOptions {
  client: RateLimitedCachingClient;
  /** Listings fetched per search; the fetch endpoint takes at most 10. */
  maxListings?: number;
  logger?: Logger;
}

/**
 * Live listings from the official trade site: search for the cheapest
 * online offers, fetch the first page and take the median unit price of
 * those listed in the market's base currency.
 */
export class TradeSource implements SourceAdapter {
  readonly sourceId = 'trade';
  private readonly client: RateLimitedCachingClient;
  private readonly maxListings: number;
  private readonly logger: Logger;

  constructor(options: TradeSourceOptions) {
    this.client = options.client;
    this.maxListings = Math.min(options.maxListings ?? 10, 10);
    this.logger = options.logger ?? createLogger('trade-source');
  }

  async findQuote(identity: ItemIdentity, context: MarketContext): Promise<Quote | null> {
    const query = this.buildQuery(identity, context.game);
    if (!query) {
      return null;
    }

    const prefix = API_PREFIX[context.game];
    const search = parse(
      SearchResponseSchema,
      await this.client.post(`${prefix}/search/${encodeURIComponent(context.league)}`, query),
      'search'
    );

    const ids = search.result.slice(0, this.maxListings);
    if (ids.length === 0) {
      this.logger.debug({ league: context.league, query: query.query }, 'No listings');
      return null;
    }

    const fetched = parse(
      FetchResponseSchema,
      await this.client.get(`${prefix}/fetch/${ids.join(',')}`, { query: search.id }),
      'fetch'
    );

    const currency = BASE_CURRENCY[context.game];
    const unitPrices = fetched.result.flatMap(entry => {
      const price = entry?.listing.price;
      if (!entry || !price || price.currency !== currency) {
        return [];
      }
      return [price.amount / (entry.item.stackSize ?? 1)];
    });

    const value = median(unitPrices);
    if (value === null) {
      this.logger.debug({ fetched: fetched.result.length, currency }, 'No listings priced in base currency');
      return null;
    }

    return createQuote({
      sourceId: this.sourceId,
      chaosValue: value,
      sampleSize: unitPrices.length,
      lowConfidence: unitPrices.length < MIN_CONFIDENT_LISTINGS,
    });
  }

  /**
   * Build the search body for an identity, or null for items the trade
   * search cannot price by name.
   */
  buildQuery(identity: ItemIdentity, game: Game): TradeQuery | null {
    const kind = classifyIdentity(identity, game);
    const base: TradeQuery = { query: { status: { option: 'online' } }, sort: { price: 'asc' } };

    switch (kind) {
      case 'unsupported':
        return null;
      case 'unique': {
        if (!identity.name) {
          throw new AdapterConfigError(this.sourceId, 'unique lookup needs the item name');
        }
        base.query.name = identity.name;
        if (identity.baseType) {
          base.query.type = identity.baseType;
        }
        break;
      }
      default:
        base.query.type = lookupName(identity);
    }

    const filters: Record<string, { filters: Record<string, unknown> }> = {};

    if (kind === 'gem') {
      const misc: Record<string, unknown> = {};
      if (identity.gemLevel !== undefined) misc.gem_level = { min: identity.gemLevel };
      if (identity.gemQuality !== undefined) misc.quality = { min: identity.gemQuality };
      if (identity.corrupted !== undefined) misc.corrupted = { option: String(identity.corrupted) };
      if (Object.keys(misc).length > 0) {
        filters.misc_filters = { filters: misc };
      }
    }

    if (identity.links !== undefined && identity.links > 0) {
      filters.socket_filters = { filters: { links: { min: identity.links } } };
    }

    if (Object.keys(filters).length > 0) {
      base.query.filters = filters;
    }

    return base;
  }

  /** Leagues the trade site currently accepts, deduplicated by id. */
  async listLeagues(game: Game): Promise<LeagueInfo[]> {
    const response = parse(
      LeaguesResponseSchema,
      await this.client.get(`${API_PREFIX[game]}/data/leagues`),
      'leagues'
    );

    const seen = new Map<string, LeagueInfo>();
    for (const league of response.result) {
      if (!seen.has(league.id)) {
        seen.set(league.id, { name: league.id, displayName: league.text ?? league.id });
      }
    }
    return [...seen.values()];
  }
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, label: string): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new PermanentError(`trade: unexpected ${label} payload`, {
      code: 'MALFORMED_RESPONSE',
      cause: parsed.error,
    });
  }
  return parsed.data;
}
