import type { MarketContext } from '../types';
import { PermanentError } from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';

export interface DivineRateSource {
  getDivineRate(context: MarketContext): Promise<number | null>;
}

/**
 * Converts base-currency values to divine orbs using the current market
 * rate. Returns null when the rate is unknown.
 */
export class CurrencyConverter {
  private readonly logger: Logger;

  constructor(
    private readonly rates: DivineRateSource,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('currency-converter');
  }

  async toDivine(value: number, context: MarketContext): Promise<number | null> {
    const rate = await this.divineRate(context);
    return rate === null ? null : value / rate;
  }

  async divineRate(context: MarketContext): Promise<number | null> {
    try {
      return await this.rates.getDivineRate(context);
    } catch (error) {
      if (!(error instanceof PermanentError)) {
        throw error;
      }
      this.logger.warn({ league: context.league, error: error.message }, 'Divine rate lookup failed');
      return null;
    }
  }
}
