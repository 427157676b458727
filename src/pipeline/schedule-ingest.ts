import type { Store } from '../db/store.js';
import { GAME_TYPE_IDS, type Game, type GameTypeId } from '../types/match.js';
import { outcomeFromResult } from '../types/outcome.js';
import type { ScheduleRow } from '../types/provider.js';
import { InvariantViolationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { BatchReport, runIsolated } from './batch.js';

/** Scores and results arrive as NaN when the provider has none. */
export function normalizeScore(value: number | null): number | null {
  if (value === null || Number.isNaN(value)) return null;
  return Math.trunc(value);
}

function isGameTypeId(value: string): value is GameTypeId {
  return GAME_TYPE_IDS.some((id) => id === value);
}

export function toGame(row: ScheduleRow, gameTypeId: GameTypeId): Game {
  if (row.homeCode === row.awayCode) {
    throw new InvariantViolationError(`Game ${row.externalGameId} has ${row.homeCode} on both sides`);
  }
  const result = normalizeScore(row.result);
  return {
    id: row.externalGameId,
    homeTeamId: row.homeCode,
    awayTeamId: row.awayCode,
    gameTypeId,
    kickoff: row.kickoff,
    homeScore: normalizeScore(row.homeScore),
    awayScore: normalizeScore(row.awayScore),
    result,
    outcome: outcomeFromResult(result),
  };
}

/**
 * Upserts a season schedule into the canonical games. The provider's game id
 * is the primary key, so re-ingesting the same rows never duplicates. Scores,
 * kickoff and outcome are refreshed on every pass, finished games included.
 */
export async function ingestSchedule(store: Store, rows: ScheduleRow[]): Promise<BatchReport> {
  const report = new BatchReport('update-games');
  let created = 0;

  await store.transaction(async (tx) => {
    const teams = new Set((await tx.listTeams()).map((t) => t.id));
    const gameTypes = new Set<string>((await tx.listGameTypes()).map((g) => g.id));

    for (const row of rows) {
      await runIsolated(tx, report, row.externalGameId, async (unit) => {
        if (!isGameTypeId(row.gameType) || !gameTypes.has(row.gameType)) return 'unknown-game-type';
        if (!teams.has(row.homeCode) || !teams.has(row.awayCode)) return 'unresolved-team';

        const game = toGame(row, row.gameType);
        if ((await unit.upsertGame(game)) === 'created') created++;
      });
    }
  });

  logger.info({ rows: rows.length, created }, 'Schedule ingested');
  return report;
}
