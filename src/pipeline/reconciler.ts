import type { Store } from '../db/store.js';
import type { Game } from '../types/match.js';
import type { ExternalEventRow } from '../types/provider.js';
import type { ApiSource } from '../types/source.js';
import { hoursApart, windowAround } from '../utils/date.js';
import { logger } from '../utils/logger.js';
import { BatchReport, runIsolated } from './batch.js';
import { TeamRefResolver } from './team-resolver.js';

export const DEFAULT_MATCH_WINDOW_HOURS = 12;

export interface GameMatch {
  game: Game;
  /** The source lists the teams the other way round. */
  swapped: boolean;
}

/** The candidate closest to `kickoff`, if any lies within the window. */
export function nearestWithinWindow(candidates: Game[], kickoff: Date, windowHours: number): Game | null {
  let best: Game | null = null;
  let bestDistance = Infinity;
  for (const game of candidates) {
    const distance = hoursApart(game.kickoff, kickoff);
    if (distance <= windowHours && distance < bestDistance) {
      best = game;
      bestDistance = distance;
    }
  }
  return best;
}

async function withoutIdentifier(store: Store, source: ApiSource, games: Game[]): Promise<Game[]> {
  const free: Game[] = [];
  for (const game of games) {
    if ((await store.getGameIdentifier(source, game.id)) === null) free.push(game);
  }
  return free;
}

/**
 * Finds the canonical game for an external event: same teams within the
 * window, retried with home and away swapped. With a source given, games that
 * already carry an identifier for it are not candidates.
 */
export async function locateGame(
  store: Store,
  homeTeamId: string,
  awayTeamId: string,
  kickoff: Date,
  windowHours: number,
  source?: ApiSource,
): Promise<GameMatch | null> {
  const { from, to } = windowAround(kickoff, windowHours);
  const candidates = async (home: string, away: string) => {
    const games = await store.findGamesByTeams(home, away, from, to);
    return source ? withoutIdentifier(store, source, games) : games;
  };

  const direct = nearestWithinWindow(await candidates(homeTeamId, awayTeamId), kickoff, windowHours);
  if (direct) return { game: direct, swapped: false };

  const swapped = nearestWithinWindow(await candidates(awayTeamId, homeTeamId), kickoff, windowHours);
  return swapped ? { game: swapped, swapped: true } : null;
}

/**
 * Records (source, external id) -> game mappings for a batch of external
 * events. Only identifier rows are written; canonical games are never created
 * or modified here.
 */
export async function reconcileGames(
  store: Store,
  source: ApiSource,
  events: ExternalEventRow[],
  windowHours = DEFAULT_MATCH_WINDOW_HOURS,
): Promise<BatchReport> {
  const report = new BatchReport('reconcile-games');
  const log = logger.child({ task: 'reconcile-games', source });

  await store.transaction(async (tx) => {
    const teams = await TeamRefResolver.load(tx, source);

    for (const event of events) {
      await runIsolated(tx, report, `${source}:${event.externalId}`, async (unit) => {
        if ((await unit.findGameByIdentifier(source, event.externalId)) !== null) return 'already-mapped';

        const homeTeamId = teams.resolve(event.homeTeamRef);
        const awayTeamId = teams.resolve(event.awayTeamRef);
        if (!homeTeamId || !awayTeamId) {
          log.warn({ home: event.homeTeamRef, away: event.awayTeamRef }, 'Unresolved team reference');
          return 'unresolved-team';
        }

        const match = await locateGame(unit, homeTeamId, awayTeamId, event.kickoff, windowHours, source);
        if (!match) {
          // Every game in the window is taken by another event of this source
          if (await locateGame(unit, homeTeamId, awayTeamId, event.kickoff, windowHours)) return 'already-mapped';
          log.warn(
            { externalId: event.externalId, homeTeamId, awayTeamId, kickoff: event.kickoff.toISOString() },
            'No canonical game for external event',
          );
          return 'unmatched';
        }

        if (!(await unit.insertGameIdentifier(source, event.externalId, match.game.id))) return 'exists';
        if (match.swapped) log.debug({ gameId: match.game.id }, 'Matched with home and away swapped');
      });
    }
  });

  return report;
}
