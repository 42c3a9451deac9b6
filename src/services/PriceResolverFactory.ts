import type { AxiosAdapter } from 'axios';
import { RateLimitedCachingClient } from '../clients/RateLimitedCachingClient';
import type { ResolverConfig, SourceSettings } from '../config';
import type { QuoteStore } from '../storage/QuoteStore';
import { createLogger, type Logger } from '../utils/logger';
import { ArbitrationEngine } from './ArbitrationEngine';
import { CurrencyConverter } from './CurrencyConverter';
import { LeagueDirectory } from './leagues';
import { QuoteLedger } from './QuoteLedger';
import { NinjaSource } from './sources/NinjaSource';
import type { SourceAdapter } from './sources/SourceAdapter';
import { TradeSource } from './sources/TradeSource';
import { WatchSource } from './sources/WatchSource';

export interface PriceResolverDependencies {
  store?: QuoteStore;
  logger?: Logger;
  /** Shared network layer for every client; tests inject an in-process one. */
  httpAdapter?: AxiosAdapter;
}

export interface PriceResolver {
  engine: ArbitrationEngine;
  ledger?: QuoteLedger;
  converter: CurrencyConverter;
  leagues: LeagueDirectory;
  clients: RateLimitedCachingClient[];
  /** Waits for pending ledger writes and closes the store. */
  shutdown(): Promise<void>;
}

/**
 * Wire clients, sources, engine and ledger from configuration. Sources are
 * registered in the order ninja, watch, trade; the first one listed is the
 * fallback primary.
 */
export function createPriceResolver(config: ResolverConfig, deps: PriceResolverDependencies = {}): PriceResolver {
  const logger = deps.logger ?? createLogger('price-resolver');

  const client = (name: string, settings: SourceSettings, baseURL = settings.baseURL) =>
    new RateLimitedCachingClient({
      name,
      baseURL,
      requestsPerSecond: settings.requestsPerSecond,
      cacheTtlSeconds: settings.cacheTtlSeconds,
      maxCacheEntries: settings.maxCacheEntries,
      maxRetries: settings.maxRetries,
      timeoutMs: config.http.timeoutMs,
      userAgent: config.http.userAgent,
      adapter: deps.httpAdapter,
      logger: logger.child({ client: name }),
    });

  const ninjaClients = {
    GAME1: client('ninja', config.ninja),
    GAME2: client('ninja2', config.ninja, config.ninja.game2BaseURL),
  };
  const watchClient = client('watch', config.watch);
  const tradeClient = client('trade', config.trade);

  const ninja = new NinjaSource({ clients: ninjaClients, logger: logger.child({ source: 'ninja' }) });
  const watch = new WatchSource({ client: watchClient, logger: logger.child({ source: 'watch' }) });
  const trade = new TradeSource({
    client: tradeClient,
    maxListings: config.trade.maxListings,
    logger: logger.child({ source: 'trade' }),
  });

  const adapters: SourceAdapter[] = [];
  if (config.ninja.enabled) adapters.push(ninja);
  if (config.watch.enabled) adapters.push(watch);
  if (config.trade.enabled) adapters.push(trade);

  const ledger = deps.store ? new QuoteLedger(deps.store, { logger: logger.child({ component: 'ledger' }) }) : undefined;

  const engine = new ArbitrationEngine(adapters, {
    divergenceThreshold: config.divergenceThreshold,
    primarySource: config.primarySource,
    defaultTimeoutMs: config.lookupTimeoutMs,
    ledger,
    logger: logger.child({ component: 'engine' }),
  });

  const store = deps.store;

  return {
    engine,
    ledger,
    converter: new CurrencyConverter(ninja, logger.child({ component: 'converter' })),
    leagues: new LeagueDirectory({ GAME1: ninja, GAME2: trade }, logger.child({ component: 'leagues' })),
    clients: [ninjaClients.GAME1, ninjaClients.GAME2, watchClient, tradeClient],
    async shutdown() {
      await ledger?.flush();
      store?.close();
    },
  };
}
