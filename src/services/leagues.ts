import type { Game, LeagueInfo } from '../types';
import { PermanentError } from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';

export const PERMANENT_LEAGUES = ['Standard', 'Hardcore'] as const;

const PERMANENT_NAMES = new Set(['standard', 'hardcore', 'ssf standard', 'ssf hardcore', 'hardcore ssf']);

const FALLBACK_LEAGUES: LeagueInfo[] = PERMANENT_LEAGUES.map(name => ({ name, displayName: name }));

export interface LeagueSource {
  listLeagues(game: Game): Promise<LeagueInfo[]>;
}

/**
 * The first challenge league in the list, or Standard when only permanent
 * leagues (including their SSF and hardcore variants) are running.
 */
export function detectCurrentLeague(leagues: readonly LeagueInfo[]): string {
  const challenge = leagues.find(league => !isPermanentLeague(league.name));
  return challenge?.name ?? 'Standard';
}

export function isPermanentLeague(name: string): boolean {
  return PERMANENT_NAMES.has(name.trim().toLowerCase());
}

/**
 * League listing per game. Falls back to the permanent leagues when the
 * listing service is unavailable.
 */
export class LeagueDirectory {
  private readonly logger: Logger;

  constructor(
    private readonly sources: Record<Game, LeagueSource>,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('leagues');
  }

  async list(game: Game): Promise<LeagueInfo[]> {
    try {
      const leagues = await this.sources[game].listLeagues(game);
      return leagues.length > 0 ? leagues : FALLBACK_LEAGUES;
    } catch (error) {
      if (!(error instanceof PermanentError)) {
        throw error;
      }
      this.logger.warn({ game, error: error.message }, 'League listing unavailable, using permanent leagues');
      return FALLBACK_LEAGUES;
    }
  }

  async current(game: Game): Promise<string> {
    const league = detectCurrentLeague(await this.list(game));
    this.logger.info({ game, league }, 'Detected current league');
    return league;
  }
}
