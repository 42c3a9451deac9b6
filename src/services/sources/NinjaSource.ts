import { z } from 'zod';
import type { RateLimitedCachingClient } from '../../clients/RateLimitedCachingClient';
import { createQuote, type Game, type ItemIdentity, type LeagueInfo, type MarketContext, type Quote } from '../../types';
import { AdapterConfigError, PermanentError } from '../../utils/errors';
import { createLogger, type Logger } from '../../utils/logger';
import type { SourceAdapter } from './SourceAdapter';
import { classifyIdentity, findByName, highestBy, lookupName, narrow, normalizeName, stackableOverview } from './matching';

const UNIQUE_OVERVIEWS = ['UniqueWeapon', 'UniqueArmour', 'UniqueAccessory', 'UniqueFlask', 'UniqueJewel'] as const;
type UniqueOverview = (typeof UNIQUE_OVERVIEWS)[number];

/** Item categories that pin a unique to one overview. */
const UNIQUE_OVERVIEW_BY_CATEGORY: Record<string, UniqueOverview> = {
  weapon: 'UniqueWeapon',
  weapons: 'UniqueWeapon',
  armour: 'UniqueArmour',
  armor: 'UniqueArmour',
  accessory: 'UniqueAccessory',
  accessories: 'UniqueAccessory',
  amulet: 'UniqueAccessory',
  ring: 'UniqueAccessory',
  belt: 'UniqueAccessory',
  flask: 'UniqueFlask',
  flasks: 'UniqueFlask',
  jewel: 'UniqueJewel',
  jewels: 'UniqueJewel',
};

/** Sample sizes below this mark a quote as low confidence. */
const MIN_CONFIDENT_SAMPLE = 5;

/** Currency each game prices in; worth exactly 1 by definition. */
const REFERENCE_CURRENCY: Record<Game, string> = {
  GAME1: 'chaos orb',
  GAME2: 'exalted orb',
};

const optionalNumber = z.number().nullish().transform(value => value ?? undefined);

const CurrencyLineSchema = z.object({
  currencyTypeName: z.string(),
  chaosEquivalent: optionalNumber,
  exaltedValue: optionalNumber,
  receive: z
    .object({ listing_count: optionalNumber, count: optionalNumber })
    .nullish()
    .transform(value => value ?? undefined),
});
type CurrencyLine = z.infer<typeof CurrencyLineSchema>;

const ItemLineSchema = z.object({
  name: z.string(),
  baseType: z.string().nullish().transform(value => value ?? undefined),
  chaosValue: optionalNumber,
  exaltedValue: optionalNumber,
  count: optionalNumber,
  listingCount: optionalNumber,
  gemLevel: optionalNumber,
  gemQuality: optionalNumber,
  corrupted: z.boolean().nullish().transform(value => value ?? undefined),
  links: optionalNumber,
});
type ItemLine = z.infer<typeof ItemLineSchema>;

const CurrencyOverviewSchema = z.object({ lines: z.array(CurrencyLineSchema).default([]) });
const ItemOverviewSchema = z.object({ lines: z.array(ItemLineSchema).default([]) });

const EconomyLeaguesSchema = z.array(
  z.object({
    name: z.string(),
    displayName: z.string().optional(),
    hardcore: z.boolean().optional(),
  })
);

export interface NinjaSourceOptions {
  /** One client per game; each site is rate limited separately. */
  clients: Record<Game, RateLimitedCachingClient>;
  logger?: Logger;
}

/**
 * Aggregated economy snapshots. Currency, stackables, uniques and gems are
 * each read from their own overview and matched by name.
 */
export class NinjaSource implements SourceAdapter {
  readonly sourceId = 'ninja';
  private readonly clients: Record<Game, RateLimitedCachingClient>;
  private readonly logger: Logger;

  constructor(options: NinjaSourceOptions) {
    this.clients = options.clients;
    this.logger = options.logger ?? createLogger('ninja-source');
  }

  async findQuote(identity: ItemIdentity, context: MarketContext): Promise<Quote | null> {
    const kind = classifyIdentity(identity, context.game);

    switch (kind) {
      case 'currency':
        return this.findCurrency(identity, context);
      case 'stackable':
        return this.findStackable(identity, context);
      case 'unique':
        return this.findUnique(identity, context);
      case 'gem':
        return this.findGem(identity, context);
      case 'unsupported':
        this.logger.debug({ rarity: identity.rarity, category: identity.category }, 'Identity not priced by ninja');
        return null;
    }
  }

  /** Divine Orb price in the base currency, or null when the overview lacks it. */
  async getDivineRate(context: MarketContext): Promise<number | null> {
    const lines = await this.currencyLines(context);
    const divine = lines.find(line => normalizeName(line.currencyTypeName) === 'divine orb');
    const rate = divine ? currencyValue(divine, context.game) : undefined;

    if (rate === undefined || rate <= 0) {
      this.logger.warn({ league: context.league, game: context.game }, 'Divine rate unavailable');
      return null;
    }

    this.logger.debug({ league: context.league, rate }, 'Divine rate loaded');
    return rate;
  }

  /** Leagues the first game's economy site tracks. */
  async listLeagues(): Promise<LeagueInfo[]> {
    const raw = await this.clients.GAME1.get('economyleagues');
    const parsed = EconomyLeaguesSchema.safeParse(raw);

    if (!parsed.success) {
      throw new PermanentError('ninja: unexpected economyleagues payload', {
        code: 'MALFORMED_RESPONSE',
        cause: parsed.error,
      });
    }

    return parsed.data.map(league => ({ name: league.name, displayName: league.displayName ?? league.name }));
  }

  private async findCurrency(identity: ItemIdentity, context: MarketContext): Promise<Quote | null> {
    const name = lookupName(identity);

    if (normalizeName(name) === REFERENCE_CURRENCY[context.game]) {
      return createQuote({ sourceId: this.sourceId, chaosValue: 1 });
    }

    const wanted = normalizeName(name);
    const lines = await this.currencyLines(context);
    const line = lines.find(entry => normalizeName(entry.currencyTypeName) === wanted);
    const value = line ? currencyValue(line, context.game) : undefined;

    if (!line || value === undefined) {
      return null;
    }

    const sampleSize = line.receive?.listing_count ?? line.receive?.count;
    return this.quote(value, sampleSize);
  }

  private async findStackable(identity: ItemIdentity, context: MarketContext): Promise<Quote | null> {
    const overview = stackableOverview(identity, context.game);
    if (!overview) {
      return null;
    }

    const lines = await this.itemLines(context, overview);
    const line = findByName(lines, lookupName(identity), entry => entry.name);

    return line ? this.itemQuote(line, context.game) : null;
  }

  private async findUnique(identity: ItemIdentity, context: MarketContext): Promise<Quote | null> {
    if (!identity.name) {
      throw new AdapterConfigError(this.sourceId, 'unique lookup needs the item name');
    }

    const wantedName = normalizeName(identity.name);
    const wantedBase = identity.baseType ? normalizeName(identity.baseType) : undefined;

    const pinned = identity.category ? UNIQUE_OVERVIEW_BY_CATEGORY[normalizeName(identity.category)] : undefined;
    const overviews: readonly UniqueOverview[] = pinned ? [pinned] : UNIQUE_OVERVIEWS;

    for (const overview of overviews) {
      const lines = await this.itemLines(context, overview);
      const matches = lines.filter(
        line =>
          normalizeName(line.name) === wantedName &&
          (wantedBase === undefined || line.baseType === undefined || normalizeName(line.baseType) === wantedBase)
      );

      if (matches.length === 0) {
        continue;
      }

      const links = identity.links;
      const [best] = narrow(matches, [
        links === undefined ? undefined : (line: ItemLine) => (line.links ?? 0) === links,
      ]);
      this.logger.debug({ name: identity.name, overview, candidates: matches.length }, 'Unique matched');
      return this.itemQuote(best, context.game);
    }

    return null;
  }

  private async findGem(identity: ItemIdentity, context: MarketContext): Promise<Quote | null> {
    const lines = await this.itemLines(context, 'SkillGem');
    const wanted = normalizeName(lookupName(identity));
    const candidates = lines.filter(line => normalizeName(line.name) === wanted);

    const { corrupted, gemLevel, gemQuality } = identity;
    const narrowed = narrow(candidates, [
      corrupted === undefined ? undefined : (line: ItemLine) => (line.corrupted ?? false) === corrupted,
      gemLevel === undefined ? undefined : (line: ItemLine) => line.gemLevel === gemLevel,
      gemQuality === undefined ? undefined : (line: ItemLine) => line.gemQuality === gemQuality,
    ]);

    const best = highestBy(narrowed, line => itemValue(line, context.game) ?? 0);
    return best ? this.itemQuote(best, context.game) : null;
  }

  private itemQuote(line: ItemLine, game: Game): Quote | null {
    const value = itemValue(line, game);
    return value === undefined ? null : this.quote(value, line.count ?? line.listingCount);
  }

  private quote(value: number, sampleSize: number | undefined): Quote {
    return createQuote({
      sourceId: this.sourceId,
      chaosValue: value,
      sampleSize: sampleSize ?? 0,
      lowConfidence: sampleSize !== undefined && sampleSize < MIN_CONFIDENT_SAMPLE,
    });
  }

  private async currencyLines(context: MarketContext): Promise<CurrencyLine[]> {
    const raw = await this.clients[context.game].get('currencyoverview', {
      league: context.league,
      type: 'Currency',
    });
    return parseOverview(CurrencyOverviewSchema, raw, 'currencyoverview').lines;
  }

  private async itemLines(context: MarketContext, type: string): Promise<ItemLine[]> {
    const raw = await this.clients[context.game].get('itemoverview', { league: context.league, type });
    return parseOverview(ItemOverviewSchema, raw, `itemoverview ${type}`).lines;
  }
}

function parseOverview<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, label: string): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new PermanentError(`ninja: unexpected ${label} payload`, {
      code: 'MALFORMED_RESPONSE',
      cause: parsed.error,
    });
  }
  return parsed.data;
}

function currencyValue(line: CurrencyLine, game: Game): number | undefined {
  return game === 'GAME2' ? line.exaltedValue ?? line.chaosEquivalent : line.chaosEquivalent;
}

function itemValue(line: ItemLine, game: Game): number | undefined {
  return game === 'GAME2' ? line.exaltedValue ?? line.chaosValue : line.chaosValue;
}
