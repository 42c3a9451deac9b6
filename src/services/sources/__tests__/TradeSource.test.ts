import { describe, it, expect } from 'vitest';
import { TradeSource } from '../TradeSource';
import { RateLimitedCachingClient } from '../../../clients/RateLimitedCachingClient';
import { validateIdentity } from '../../identity';
import type { ItemIdentityInput, MarketContext } from '../../../types';
import { AdapterConfigError } from '../../../utils/errors';
import { createFakeAdapter, silentLogger, type FakeHandler, type FakeReply } from '../../../__tests__/helpers/fakeHttp';

const context: MarketContext = { league: 'Settlers', game: 'GAME1' };

function setup(handler: FakeHandler, maxListings?: number) {
  const { adapter, calls } = createFakeAdapter(handler);
  const client = new RateLimitedCachingClient({
    name: 'trade',
    baseURL: 'https://trade.example.test/api',
    requestsPerSecond: 1000,
    cacheTtlSeconds: 60,
    maxCacheEntries: 50,
    maxRetries: 0,
    adapter,
    logger: silentLogger,
  });
  return { source: new TradeSource({ client, maxListings, logger: silentLogger }), calls };
}

function listing(id: string, amount: number, currency: string, stackSize?: number) {
  return {
    id,
    listing: { price: { amount, currency } },
    item: stackSize === undefined ? {} : { stackSize },
  };
}

/** Answers any search with the given ids and any fetch with the given listings. */
function market(ids: string[], listings: unknown[]): FakeHandler {
  return (request): FakeReply => {
    if (request.method === 'POST' && request.url.includes('/search/')) {
      return { body: { id: 'query-1', result: ids, total: ids.length } };
    }
    if (request.url.includes('/fetch/')) {
      return { body: { result: listings } };
    }
    return { status: 404 };
  };
}

const identity = (fields: ItemIdentityInput) => validateIdentity(fields);

describe('TradeSource', () => {
  it('should take the median of listings priced in the base currency', async () => {
    const { source, calls } = setup(
      market(
        ['a', 'b', 'c', 'd'],
        [listing('a', 10, 'chaos'), listing('b', 12, 'chaos'), listing('c', 1, 'divine'), listing('d', 30, 'chaos')]
      )
    );

    const quote = await source.findQuote(identity({ name: 'Divine Orb', rarity: 'CURRENCY' }), context);

    expect(quote).toMatchObject({ sourceId: 'trade', chaosValue: 12, sampleSize: 3, lowConfidence: true });
    expect(calls[0]).toMatchObject({
      method: 'POST',
      url: 'trade/search/Settlers',
      body: { query: { status: { option: 'online' }, type: 'Divine Orb' }, sort: { price: 'asc' } },
    });
    expect(calls[1]).toMatchObject({ method: 'GET', url: 'trade/fetch/a,b,c,d', params: { query: 'query-1' } });
  });

  it('should divide listed prices by stack size', async () => {
    const { source } = setup(market(['a'], [listing('a', 50, 'chaos', 10)]));

    const quote = await source.findQuote(identity({ name: 'Orb of Fusing', rarity: 'CURRENCY' }), context);

    expect(quote?.chaosValue).toBe(5);
  });

  it('should be confident from five listings', async () => {
    const ids = ['a', 'b', 'c', 'd', 'e'];
    const { source } = setup(market(ids, ids.map((id, index) => listing(id, 100 + index, 'chaos'))));

    const quote = await source.findQuote(identity({ name: 'Mageblood', rarity: 'UNIQUE' }), context);

    expect(quote).toMatchObject({ chaosValue: 102, sampleSize: 5, lowConfidence: false });
  });

  it('should return null without fetching when nothing is listed', async () => {
    const { source, calls } = setup(market([], []));

    await expect(source.findQuote(identity({ name: 'Mirror of Kalandra', rarity: 'CURRENCY' }), context)).resolves.toBeNull();
    expect(calls).toHaveLength(1);
  });

  it('should return null when no listing uses the base currency', async () => {
    const { source } = setup(market(['a', 'b'], [listing('a', 1, 'divine'), null]));

    await expect(source.findQuote(identity({ name: 'Mageblood', rarity: 'UNIQUE' }), context)).resolves.toBeNull();
  });

  it('should fetch at most the configured number of listings', async () => {
    const { source, calls } = setup(market(['a', 'b', 'c'], [listing('a', 1, 'chaos'), listing('b', 3, 'chaos')]), 2);

    const quote = await source.findQuote(identity({ name: 'Chromatic Orb', rarity: 'CURRENCY' }), context);

    expect(calls[1].url).toBe('trade/fetch/a,b');
    expect(quote?.chaosValue).toBe(2);
  });

  it('should use the second game endpoints and currency', async () => {
    const { source, calls } = setup(
      market(['a', 'b', 'c'], [listing('a', 4, 'exalted'), listing('b', 5, 'exalted'), listing('c', 9, 'chaos')])
    );

    const quote = await source.findQuote(identity({ name: 'Divine Orb', rarity: 'CURRENCY' }), {
      league: 'Dawn of the Hunt',
      game: 'GAME2',
    });

    expect(calls[0].url).toBe('trade2/search/Dawn%20of%20the%20Hunt');
    expect(quote?.chaosValue).toBe(4.5);
  });

  describe('buildQuery', () => {
    const { source } = setup(market([], []));

    it('should search uniques by name and base type', () => {
      const query = source.buildQuery(identity({ name: 'Headhunter', baseType: 'Leather Belt', rarity: 'UNIQUE' }), 'GAME1');

      expect(query?.query).toEqual({ status: { option: 'online' }, name: 'Headhunter', type: 'Leather Belt' });
    });

    it('should add gem and socket filters', () => {
      const query = source.buildQuery(
        identity({ name: 'Vaal Grace', rarity: 'GEM', gemLevel: 21, gemQuality: 20, corrupted: true, links: 4 }),
        'GAME1'
      );

      expect(query?.query.filters).toEqual({
        misc_filters: {
          filters: { gem_level: { min: 21 }, quality: { min: 20 }, corrupted: { option: 'true' } },
        },
        socket_filters: { filters: { links: { min: 4 } } },
      });
    });

    it('should leave filters out when there are none', () => {
      const query = source.buildQuery(identity({ name: 'Vaal Grace', rarity: 'GEM', links: 0 }), 'GAME1');

      expect(query?.query.filters).toBeUndefined();
    });

    it('should not build a query for rare items', () => {
      expect(source.buildQuery(identity({ baseType: 'Hubris Circlet', rarity: 'RARE' }), 'GAME1')).toBeNull();
    });

    it('should refuse a unique without a name', () => {
      expect(() => source.buildQuery(identity({ baseType: 'Leather Belt', rarity: 'UNIQUE' }), 'GAME1')).toThrow(
        AdapterConfigError
      );
    });
  });

  it('should list leagues once per id', async () => {
    const { source, calls } = setup(request =>
      request.url === 'trade/data/leagues'
        ? {
            body: {
              result: [
                { id: 'Settlers', text: 'Settlers' },
                { id: 'Settlers', text: 'Settlers (PL)' },
                { id: 'Standard', text: 'Standard' },
              ],
            },
          }
        : { status: 404 }
    );

    await expect(source.listLeagues('GAME1')).resolves.toEqual([
      { name: 'Settlers', displayName: 'Settlers' },
      { name: 'Standard', displayName: 'Standard' },
    ]);
    expect(calls).toHaveLength(1);
  });
});
