import { describe, it, expect } from 'vitest';
import { classifyIdentity, findByName, highestBy, narrow, normalizeName, stackableOverview } from '../matching';
import { validateIdentity } from '../../identity';
import type { ItemIdentityInput } from '../../../types';

const identity = (fields: ItemIdentityInput) => validateIdentity(fields);

describe('normalizeName', () => {
  it('should fold case, apostrophes and punctuation', () => {
    expect(normalizeName("  Atziri's   Disfavour ")).toBe('atziris disfavour');
    expect(normalizeName('The Wolf’s Shadow')).toBe('the wolfs shadow');
    expect(normalizeName('Orb of Alteration (Stack)')).toBe('orb of alteration stack');
  });
});

describe('classifyIdentity', () => {
  it('should route by rarity and category', () => {
    expect(classifyIdentity(identity({ name: 'Divine Orb', rarity: 'CURRENCY' }), 'GAME1')).toBe('currency');
    expect(classifyIdentity(identity({ name: 'Essence of Hatred', rarity: 'CURRENCY', category: 'essence' }), 'GAME1')).toBe(
      'stackable'
    );
    expect(classifyIdentity(identity({ name: 'The Doctor', rarity: 'DIVINATION_CARD' }), 'GAME1')).toBe('stackable');
    expect(classifyIdentity(identity({ name: 'Headhunter', rarity: 'UNIQUE' }), 'GAME1')).toBe('unique');
    expect(classifyIdentity(identity({ name: 'Cleave', rarity: 'GEM' }), 'GAME1')).toBe('gem');
  });

  it('should treat normal items in the currency category as currency', () => {
    expect(classifyIdentity(identity({ baseType: 'Scroll of Wisdom', rarity: 'NORMAL', category: 'Currency' }), 'GAME1')).toBe(
      'currency'
    );
  });

  it('should not price rare, magic or plain normal items', () => {
    expect(classifyIdentity(identity({ baseType: 'Hubris Circlet', rarity: 'RARE' }), 'GAME1')).toBe('unsupported');
    expect(classifyIdentity(identity({ baseType: 'Sapphire Ring', rarity: 'MAGIC' }), 'GAME1')).toBe('unsupported');
    expect(classifyIdentity(identity({ baseType: 'Iron Ring', rarity: 'NORMAL' }), 'GAME1')).toBe('unsupported');
  });

  it('should use each game its own stackable overviews', () => {
    const rune = identity({ name: 'Iron Rune', rarity: 'CURRENCY', category: 'Rune' });

    expect(stackableOverview(rune, 'GAME2')).toBe('Rune');
    expect(stackableOverview(rune, 'GAME1')).toBeUndefined();
    expect(stackableOverview(identity({ name: 'The Doctor', rarity: 'DIVINATION_CARD' }), 'GAME2')).toBeUndefined();
  });
});

describe('findByName', () => {
  const entries = [{ label: 'Orb of Alchemy' }, { label: 'Orb of Alteration' }, { label: 'Divine Orb' }];

  it('should prefer an exact match', () => {
    expect(findByName(entries, 'divine orb', entry => entry.label)).toEqual({ label: 'Divine Orb' });
  });

  it('should fall back to containment either way', () => {
    expect(findByName(entries, 'alteration', entry => entry.label)).toEqual({ label: 'Orb of Alteration' });
    expect(findByName(entries, 'Orb of Alchemy Shard', entry => entry.label)).toEqual({ label: 'Orb of Alchemy' });
  });

  it('should not match an empty query', () => {
    expect(findByName(entries, ' ', entry => entry.label)).toBeUndefined();
  });
});

describe('narrow', () => {
  it('should skip filters that would remove every candidate', () => {
    const result = narrow([1, 2, 3, 4], [value => value > 1, value => value > 10, undefined, value => value % 2 === 0]);

    expect(result).toEqual([2, 4]);
  });
});

describe('highestBy', () => {
  it('should keep the first of equal maxima', () => {
    const entries = [
      { id: 'a', value: 3 },
      { id: 'b', value: 7 },
      { id: 'c', value: 7 },
    ];

    expect(highestBy(entries, entry => entry.value)?.id).toBe('b');
    expect(highestBy([], () => 0)).toBeUndefined();
  });
});
