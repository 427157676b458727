import { describe, it, expect, beforeEach } from 'vitest';
import { ingestSchedule, normalizeScore } from '../../src/pipeline/schedule-ingest.js';
import { seedGameTypes } from '../../src/pipeline/seed.js';
import type { Game } from '../../src/types/match.js';
import { makeRow, makeTeam, storeWithTeams } from '../helpers/builders.js';
import { MemoryStore } from '../helpers/memory-store.js';

const KICKOFF = new Date('2025-09-07T17:00:00Z');

/** Rejects one game id with a database error after writing it. */
class RejectingStore extends MemoryStore {
  constructor(private readonly rejectedId: string) {
    super();
  }

  override async upsertGame(game: Game): Promise<'created' | 'updated'> {
    const result = await super.upsertGame(game);
    if (game.id === this.rejectedId) throw this.violation(`games_check violated by ${game.id}`);
    return result;
  }
}

describe('normalizeScore', () => {
  it('maps NaN and null to null', () => {
    expect(normalizeScore(Number.NaN)).toBeNull();
    expect(normalizeScore(null)).toBeNull();
  });

  it('keeps integer scores', () => {
    expect(normalizeScore(24)).toBe(24);
    expect(normalizeScore(0)).toBe(0);
  });
});

describe('ingestSchedule', () => {
  let store: MemoryStore;

  beforeEach(async () => {
    store = await storeWithTeams('KC', 'BUF', 'PHI', 'DAL');
  });

  it('creates unplayed games with null scores and NOT_FINISHED', async () => {
    const report = await ingestSchedule(store, [makeRow('2025_01_BUF_KC', 'KC', 'BUF', KICKOFF)]);

    expect(report.summary()).toEqual({ task: 'update-games', ok: 1, skipped: 0, failed: 0 });
    expect(await store.getGame('2025_01_BUF_KC')).toEqual({
      id: '2025_01_BUF_KC',
      homeTeamId: 'KC',
      awayTeamId: 'BUF',
      gameTypeId: 'REG',
      kickoff: KICKOFF,
      homeScore: null,
      awayScore: null,
      result: null,
      outcome: 'NOT_FINISHED',
    });
  });

  it('is idempotent over the same rows', async () => {
    const rows = [
      makeRow('2025_01_BUF_KC', 'KC', 'BUF', KICKOFF),
      makeRow('2025_01_DAL_PHI', 'PHI', 'DAL', KICKOFF),
    ];
    await ingestSchedule(store, rows);
    const before = await store.listGames();

    const second = await ingestSchedule(store, rows);

    expect(second.summary().failed).toBe(0);
    expect(await store.listGames()).toEqual(before);
  });

  it('refreshes scores and outcome of an existing game', async () => {
    await ingestSchedule(store, [makeRow('2025_01_DAL_PHI', 'PHI', 'DAL', KICKOFF)]);
    await ingestSchedule(store, [
      makeRow('2025_01_DAL_PHI', 'PHI', 'DAL', KICKOFF, { homeScore: 17, awayScore: 24, result: -7 }),
    ]);

    const game = await store.getGame('2025_01_DAL_PHI');
    expect(game?.homeScore).toBe(17);
    expect(game?.awayScore).toBe(24);
    expect(game?.result).toBe(-7);
    expect(game?.outcome).toBe('AWAY');
  });

  it('re-derives a tie from a zero result', async () => {
    await ingestSchedule(store, [
      makeRow('2025_05_KC_BUF', 'BUF', 'KC', KICKOFF, { homeScore: 20, awayScore: 20, result: 0 }),
    ]);
    expect((await store.getGame('2025_05_KC_BUF'))?.outcome).toBe('TIE');
  });

  it('never changes the teams of an existing game', async () => {
    await ingestSchedule(store, [makeRow('2025_01_BUF_KC', 'KC', 'BUF', KICKOFF)]);
    await ingestSchedule(store, [makeRow('2025_01_BUF_KC', 'BUF', 'KC', KICKOFF)]);

    const game = await store.getGame('2025_01_BUF_KC');
    expect(game?.homeTeamId).toBe('KC');
    expect(game?.awayTeamId).toBe('BUF');
  });

  it('skips rows with an unknown game type or team', async () => {
    const report = await ingestSchedule(store, [
      makeRow('2025_PRE_KC_BUF', 'KC', 'BUF', KICKOFF, { gameType: 'PRE' }),
      makeRow('2025_01_NYJ_KC', 'KC', 'NYJ', KICKOFF),
    ]);

    expect(report.get('2025_PRE_KC_BUF')).toEqual({
      key: '2025_PRE_KC_BUF',
      status: 'skipped',
      reason: 'unknown-game-type',
    });
    expect(report.get('2025_01_NYJ_KC')).toEqual({
      key: '2025_01_NYJ_KC',
      status: 'skipped',
      reason: 'unresolved-team',
    });
    expect(await store.listGames()).toEqual([]);
  });

  it('fails only the row whose home and away team are the same', async () => {
    const report = await ingestSchedule(store, [
      makeRow('2025_01_KC_KC', 'KC', 'KC', KICKOFF),
      makeRow('2025_01_DAL_PHI', 'PHI', 'DAL', KICKOFF),
    ]);

    expect(report.get('2025_01_KC_KC')).toEqual({
      key: '2025_01_KC_KC',
      status: 'failed',
      error: 'Game 2025_01_KC_KC has KC on both sides',
    });
    expect((await store.listGames()).map((g) => g.id)).toEqual(['2025_01_DAL_PHI']);
  });

  it('commits the other rows when the database rejects one mid-batch', async () => {
    const rejecting = new RejectingStore('2025_01_DAL_PHI');
    await seedGameTypes(rejecting);
    for (const id of ['KC', 'BUF', 'PHI', 'DAL']) await rejecting.upsertTeam(makeTeam(id));

    const report = await ingestSchedule(rejecting, [
      makeRow('2025_01_BUF_KC', 'KC', 'BUF', KICKOFF),
      makeRow('2025_01_DAL_PHI', 'PHI', 'DAL', KICKOFF),
      makeRow('2025_02_KC_PHI', 'PHI', 'KC', KICKOFF),
    ]);

    expect(report.keys('ok')).toEqual(['2025_01_BUF_KC', '2025_02_KC_PHI']);
    expect(report.get('2025_01_DAL_PHI')).toEqual({
      key: '2025_01_DAL_PHI',
      status: 'failed',
      error: 'games_check violated by 2025_01_DAL_PHI',
    });
    expect((await rejecting.listGames()).map((g) => g.id)).toEqual(['2025_01_BUF_KC', '2025_02_KC_PHI']);
  });
});
