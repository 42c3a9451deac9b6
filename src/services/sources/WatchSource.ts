import { z } from 'zod';
import type { RateLimitedCachingClient } from '../../clients/RateLimitedCachingClient';
import { createQuote, type ItemIdentity, type MarketContext, type Quote } from '../../types';
import { AdapterConfigError, PermanentError } from '../../utils/errors';
import { createLogger, type Logger } from '../../utils/logger';
import type { SourceAdapter } from './SourceAdapter';
import { classifyIdentity, highestBy, lookupName, narrow, normalizeName } from './matching';

const SearchResultSchema = z.object({
  name: z.string(),
  mean: z.number().nullish(),
  daily: z.number().nullish().transform(value => value ?? 0),
  lowConfidence: z.boolean().nullish().transform(value => value ?? false),
  gemLevel: z.number().nullish(),
  gemQuality: z.number().nullish(),
  gemIsCorrupted: z.boolean().nullish(),
  linkCount: z.number().nullish(),
});
type SearchResult = z.infer<typeof SearchResultSchema> & { mean: number };

const SearchResponseSchema = z.array(SearchResultSchema);

export interface WatchSourceOptions {
  client: RateLimitedCachingClient;
  logger?: Logger;
}

/**
 * Name search against the first game's listing statistics. The second
 * game is not covered by this service.
 */
export class WatchSource implements SourceAdapter {
  readonly sourceId = 'watch';
  private readonly client: RateLimitedCachingClient;
  private readonly logger: Logger;

  constructor(options: WatchSourceOptions) {
    this.client = options.client;
    this.logger = options.logger ?? createLogger('watch-source');
  }

  async findQuote(identity: ItemIdentity, context: MarketContext): Promise<Quote | null> {
    if (context.game !== 'GAME1') {
      return null;
    }

    const kind = classifyIdentity(identity, context.game);
    if (kind === 'unsupported') {
      return null;
    }
    if (kind === 'unique' && !identity.name) {
      throw new AdapterConfigError(this.sourceId, 'unique lookup needs the item name');
    }

    const query = lookupName(identity);
    const raw = await this.client.get('search', { league: context.league, q: query });
    const parsed = SearchResponseSchema.safeParse(raw);

    if (!parsed.success) {
      throw new PermanentError('watch: unexpected search payload', {
        code: 'MALFORMED_RESPONSE',
        cause: parsed.error,
      });
    }

    const wanted = normalizeName(query);
    const candidates: SearchResult[] = parsed.data.flatMap(result =>
      typeof result.mean === 'number' && normalizeName(result.name) === wanted ? [{ ...result, mean: result.mean }] : []
    );

    if (candidates.length === 0) {
      this.logger.debug({ query, results: parsed.data.length }, 'No exact match');
      return null;
    }

    const isGem = kind === 'gem';
    const { gemLevel, gemQuality, corrupted, links } = identity;
    const narrowed = narrow(candidates, [
      isGem && gemLevel !== undefined ? (result: SearchResult) => result.gemLevel === gemLevel : undefined,
      isGem && gemQuality !== undefined ? (result: SearchResult) => result.gemQuality === gemQuality : undefined,
      isGem && corrupted !== undefined
        ? (result: SearchResult) => (result.gemIsCorrupted ?? false) === corrupted
        : undefined,
      links !== undefined ? (result: SearchResult) => (result.linkCount ?? 0) === links : undefined,
    ]);

    const best = highestBy(narrowed, result => result.mean);
    if (!best) {
      return null;
    }

    this.logger.debug({ query, mean: best.mean, daily: best.daily }, 'Matched search result');

    return createQuote({
      sourceId: this.sourceId,
      chaosValue: best.mean,
      sampleSize: best.daily,
      lowConfidence: best.lowConfidence,
    });
  }
}
