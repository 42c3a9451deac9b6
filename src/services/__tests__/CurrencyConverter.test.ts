import { describe, it, expect, vi } from 'vitest';
import { CurrencyConverter, type DivineRateSource } from '../CurrencyConverter';
import type { MarketContext } from '../../types';
import { PermanentError } from '../../utils/errors';
import { silentLogger } from '../../__tests__/helpers/fakeHttp';

const context: MarketContext = { league: 'Settlers', game: 'GAME1' };

function ratesOf(getDivineRate: DivineRateSource['getDivineRate']): DivineRateSource {
  return { getDivineRate };
}

describe('CurrencyConverter', () => {
  it('should divide by the divine rate', async () => {
    const getDivineRate = vi.fn<DivineRateSource['getDivineRate']>().mockResolvedValue(200);
    const converter = new CurrencyConverter(ratesOf(getDivineRate), silentLogger);

    await expect(converter.toDivine(500, context)).resolves.toBe(2.5);
    expect(getDivineRate).toHaveBeenCalledWith(context);
  });

  it('should return null when the rate is unknown', async () => {
    const converter = new CurrencyConverter(ratesOf(() => Promise.resolve(null)), silentLogger);

    await expect(converter.toDivine(500, context)).resolves.toBeNull();
  });

  it('should return null when the rate lookup fails', async () => {
    const converter = new CurrencyConverter(
      ratesOf(() => Promise.reject(new PermanentError('ninja: 404', { code: 'NOT_FOUND' }))),
      silentLogger
    );

    await expect(converter.toDivine(500, context)).resolves.toBeNull();
  });

  it('should rethrow unexpected errors', async () => {
    const converter = new CurrencyConverter(ratesOf(() => Promise.reject(new RangeError('bad'))), silentLogger);

    await expect(converter.divineRate(context)).rejects.toBeInstanceOf(RangeError);
  });
});
