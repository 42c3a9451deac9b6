export { RateLimitedCachingClient, classifyHttpError, parseRetryAfter } from './clients/RateLimitedCachingClient';
export type { ClientOptions, ClientStats, HttpMethod, QueryParams, RequestOptions } from './clients/RateLimitedCachingClient';
export { getConfig, loadConfig } from './config';
export type { ResolverConfig, SourceSettings } from './config';
export { ArbitrationEngine, DEFAULT_DIVERGENCE_THRESHOLD } from './services/ArbitrationEngine';
export type { ArbitrationEngineOptions, ResolveOptions } from './services/ArbitrationEngine';
export { CurrencyConverter } from './services/CurrencyConverter';
export { validateContext, validateIdentity } from './services/identity';
export { LeagueDirectory, detectCurrentLeague, isPermanentLeague } from './services/leagues';
export { createPriceResolver } from './services/PriceResolverFactory';
export type { PriceResolver, PriceResolverDependencies } from './services/PriceResolverFactory';
export { QuoteLedger, itemKey } from './services/QuoteLedger';
export { NinjaSource } from './services/sources/NinjaSource';
export type { SourceAdapter } from './services/sources/SourceAdapter';
export { TradeSource } from './services/sources/TradeSource';
export { WatchSource } from './services/sources/WatchSource';
export type { DecisionRecord, QuoteQuery, QuoteRecord, QuoteStore, StoredQuote } from './storage/QuoteStore';
export { SqliteQuoteStore } from './storage/SqliteQuoteStore';
export * from './types';
export * from './utils/errors';
export { createLogger, resolveLogLevel, setLogLevel } from './utils/logger';
export type { LogLevel, Logger } from './utils/logger';
