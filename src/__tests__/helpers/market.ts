import { loadConfig, type ResolverConfig } from '../../config';
import type { FakeHandler, FakeReply } from './fakeHttp';

export const NINJA_URL = 'https://ninja.example.test/api/data';
export const NINJA2_URL = 'https://ninja2.example.test/api/data';
export const WATCH_URL = 'https://watch.example.test';
export const TRADE_URL = 'https://trade.example.test/api';

/** Configuration pointing every source at the in-process market below. */
export function testConfig(overrides: Record<string, string> = {}): ResolverConfig {
  return loadConfig({
    PRICE_DB_PATH: ':memory:',
    DEFAULT_LEAGUE: 'Settlers',
    NINJA_BASE_URL: NINJA_URL,
    NINJA2_BASE_URL: NINJA2_URL,
    WATCH_BASE_URL: WATCH_URL,
    TRADE_BASE_URL: TRADE_URL,
    NINJA_REQUESTS_PER_SECOND: '1000',
    WATCH_REQUESTS_PER_SECOND: '1000',
    TRADE_REQUESTS_PER_SECOND: '1000',
    NINJA_MAX_RETRIES: '0',
    WATCH_MAX_RETRIES: '0',
    TRADE_MAX_RETRIES: '0',
    ...overrides,
  });
}

/**
 * A small first-game market: ninja prices Divine Orb at 180, watch at 184
 * and trade lists it at 170, 176 and 190.
 */
export const marketHandler: FakeHandler = (request): FakeReply => {
  if (request.baseURL === NINJA_URL) {
    switch (request.url) {
      case 'currencyoverview':
        return {
          body: {
            lines: [
              { currencyTypeName: 'Divine Orb', chaosEquivalent: 180, receive: { listing_count: 400 } },
              { currencyTypeName: 'Orb of Fusing', chaosEquivalent: 0.5, receive: { listing_count: 300 } },
            ],
          },
        };
      case 'economyleagues':
        return { body: [{ name: 'Standard' }, { name: 'Settlers', displayName: 'Settlers of Kalguur' }] };
      default:
        return { body: { lines: [] } };
    }
  }

  if (request.baseURL === WATCH_URL && request.url === 'search') {
    return request.params.q === 'Divine Orb'
      ? { body: [{ name: 'Divine Orb', mean: 184, daily: 500, lowConfidence: false }] }
      : { body: [] };
  }

  if (request.baseURL === TRADE_URL) {
    if (request.url.startsWith('trade/search/')) {
      return { body: { id: 'q1', result: ['a', 'b', 'c'] } };
    }
    if (request.url.startsWith('trade/fetch/')) {
      return {
        body: {
          result: [170, 176, 190].map((amount, index) => ({
            id: String(index),
            listing: { price: { amount, currency: 'chaos' } },
            item: {},
          })),
        },
      };
    }
  }

  return { status: 404 };
};
