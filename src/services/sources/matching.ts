import type { Game, ItemIdentity } from '../../types';

export type IdentityKind = 'currency' | 'stackable' | 'unique' | 'gem' | 'unsupported';

/** Stackable categories and the overview each game lists them under. */
const STACKABLE_OVERVIEWS: Record<Game, Record<string, string>> = {
  GAME1: {
    fragment: 'Fragment',
    'divination card': 'DivinationCard',
    divinationcard: 'DivinationCard',
    essence: 'Essence',
    fossil: 'Fossil',
    scarab: 'Scarab',
    oil: 'Oil',
    incubator: 'Incubator',
    vial: 'Vial',
  },
  GAME2: {
    rune: 'Rune',
    'soul core': 'SoulCore',
    soulcore: 'SoulCore',
  },
};

/**
 * Lowercase, drop apostrophes, collapse everything that is not a letter or
 * digit to single spaces.
 */
export function normalizeName(value: string): string {
  return value
    .toLowerCase()
    .replace(/['’]/g, '')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

/** The display name a service lists the item under. */
export function lookupName(identity: ItemIdentity): string {
  return identity.name ?? identity.baseType ?? '';
}

export function stackableOverview(identity: ItemIdentity, game: Game): string | undefined {
  if (identity.rarity === 'DIVINATION_CARD') {
    return game === 'GAME1' ? 'DivinationCard' : undefined;
  }
  if (!identity.category) {
    return undefined;
  }
  return STACKABLE_OVERVIEWS[game][normalizeName(identity.category)];
}

export function classifyIdentity(identity: ItemIdentity, game: Game): IdentityKind {
  if (identity.rarity === 'RARE' || identity.rarity === 'MAGIC') {
    return 'unsupported';
  }
  if (stackableOverview(identity, game)) {
    return 'stackable';
  }
  if (identity.rarity === 'CURRENCY' || (identity.category && normalizeName(identity.category) === 'currency')) {
    return 'currency';
  }
  if (identity.rarity === 'GEM') {
    return 'gem';
  }
  if (identity.rarity === 'UNIQUE') {
    return 'unique';
  }
  return 'unsupported';
}

/**
 * Exact normalized match first, then the first entry whose name contains
 * the query or is contained in it.
 */
export function findByName<T>(entries: readonly T[], query: string, nameOf: (entry: T) => string): T | undefined {
  const wanted = normalizeName(query);
  if (!wanted) {
    return undefined;
  }

  const exact = entries.find(entry => normalizeName(nameOf(entry)) === wanted);
  if (exact) {
    return exact;
  }

  return entries.find(entry => {
    const candidate = normalizeName(nameOf(entry));
    return candidate !== '' && (candidate.includes(wanted) || wanted.includes(candidate));
  });
}

/**
 * Apply each filter in turn, skipping any that would leave nothing.
 */
export function narrow<T>(candidates: readonly T[], filters: ReadonlyArray<((entry: T) => boolean) | undefined>): T[] {
  let remaining = [...candidates];
  for (const filter of filters) {
    if (!filter) continue;
    const kept = remaining.filter(filter);
    if (kept.length > 0) {
      remaining = kept;
    }
  }
  return remaining;
}

export function highestBy<T>(entries: readonly T[], valueOf: (entry: T) => number): T | undefined {
  let best: T | undefined;
  for (const entry of entries) {
    if (best === undefined || valueOf(entry) > valueOf(best)) {
      best = entry;
    }
  }
  return best;
}
