import { Command, InvalidArgumentError, Option } from 'commander';
import type { ResolverConfig } from '../config';
import { validateContext, validateIdentity } from '../services/identity';
import { detectCurrentLeague } from '../services/leagues';
import type { PriceResolver } from '../services/PriceResolverFactory';
import { GameSchema, RaritySchema, type Game, type ItemIdentityInput, type MarketContext } from '../types';

export interface CliDependencies {
  config: ResolverConfig;
  createResolver: (config: ResolverConfig) => PriceResolver;
  write: (line: string) => void;
}

interface ItemOptions {
  name?: string;
  baseType?: string;
  rarity: string;
  category?: string;
  stack: number;
  gemLevel?: number;
  gemQuality?: number;
  corrupted?: boolean;
  links?: number;
  league?: string;
  game?: string;
}

interface ResolveOptions extends ItemOptions {
  timeout?: number;
}

interface HistoryOptions extends ItemOptions {
  limit: number;
}

interface LeaguesOptions {
  game?: string;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function itemOptions(command: Command): Command {
  return command
    .option('-n, --name <name>', 'Item name (uniques, currency, cards)')
    .option('-b, --base-type <baseType>', 'Item base type')
    .addOption(new Option('-r, --rarity <rarity>', 'Item rarity').choices(RaritySchema.options).makeOptionMandatory())
    .option('-c, --category <category>', 'Item category, e.g. currency, fragment, essence')
    .option('-s, --stack <size>', 'Stack size', parseInteger, 1)
    .option('--gem-level <level>', 'Gem level', parseInteger)
    .option('--gem-quality <quality>', 'Gem quality', parseInteger)
    .option('--corrupted', 'Item is corrupted')
    .option('--links <links>', 'Linked sockets', parseInteger)
    .option('-l, --league <league>', 'League name')
    .addOption(new Option('-g, --game <game>', 'Game').choices(GameSchema.options));
}

function toIdentity(options: ItemOptions): ItemIdentityInput {
  return {
    name: options.name,
    baseType: options.baseType,
    rarity: RaritySchema.parse(options.rarity),
    category: options.category,
    stackSize: options.stack,
    gemLevel: options.gemLevel,
    gemQuality: options.gemQuality,
    corrupted: options.corrupted,
    links: options.links,
  };
}

function toContext(options: { league?: string; game?: string }, config: ResolverConfig): MarketContext {
  return validateContext({
    league: options.league ?? config.defaultLeague,
    game: options.game ?? config.defaultGame,
  });
}

export function buildProgram(deps: CliDependencies): Command {
  const { config, write } = deps;
  const print = (value: unknown) => write(JSON.stringify(value, null, 2));

  const program = new Command()
    .name('league-price')
    .description('Resolve item prices across several market data sources')
    .version('1.0.0');

  itemOptions(program.command('resolve').description('Resolve the price of one item'))
    .option('-t, --timeout <ms>', 'Lookup timeout in milliseconds', parseInteger)
    .action(async (options: ResolveOptions) => {
      const resolver = deps.createResolver(config);
      try {
        const context = toContext(options, config);
        const identity = toIdentity(options);
        const decision = await resolver.engine.resolvePrice(identity, context, {
          timeoutMs: options.timeout ?? config.lookupTimeoutMs,
        });

        const divineValue =
          decision.chaosValue > 0 ? await resolver.converter.toDivine(decision.chaosValue, context) : null;

        print({
          item: identity.name ?? identity.baseType ?? null,
          league: context.league,
          game: context.game,
          chaosValue: decision.chaosValue,
          divineValue,
          stackTotal: decision.chaosValue * options.stack,
          confidence: decision.confidence,
          decisionSource: decision.decisionSource,
          quotes: decision.contributingQuotes.map(quote => ({
            sourceId: quote.sourceId,
            chaosValue: quote.chaosValue,
            sampleSize: quote.sampleSize,
            lowConfidence: quote.lowConfidence,
          })),
        });
      } finally {
        await resolver.shutdown();
      }
    });

  itemOptions(program.command('history').description('Show recorded quotes and their statistics'))
    .option('--limit <count>', 'Number of quotes', parseInteger, 20)
    .action(async (options: HistoryOptions) => {
      const resolver = deps.createResolver(config);
      try {
        if (!resolver.ledger) {
          throw new Error('No quote store configured');
        }
        const context = toContext(options, config);
        const identity = validateIdentity(toIdentity(options));
        const quotes = await resolver.ledger.history(identity, context, options.limit);
        const stats = await resolver.ledger.stats(identity, context, options.limit);

        print({
          item: identity.name ?? identity.baseType,
          league: context.league,
          game: context.game,
          stats,
          quotes: quotes.map(quote => ({
            sourceId: quote.sourceId,
            chaosValue: quote.chaosValue,
            sampleSize: quote.sampleSize,
            fetchedAt: quote.fetchedAt.toISOString(),
          })),
        });
      } finally {
        await resolver.shutdown();
      }
    });

  program
    .command('leagues')
    .description('List leagues and detect the current challenge league')
    .addOption(new Option('-g, --game <game>', 'Game').choices(GameSchema.options))
    .action(async (options: LeaguesOptions) => {
      const resolver = deps.createResolver(config);
      try {
        const game: Game = options.game ? GameSchema.parse(options.game) : config.defaultGame;
        const leagues = await resolver.leagues.list(game);

        print({
          game,
          current: detectCurrentLeague(leagues),
          leagues,
        });
      } finally {
        await resolver.shutdown();
      }
    });

  return program;
}
