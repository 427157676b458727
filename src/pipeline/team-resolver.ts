import type { Store } from '../db/store.js';
import type { ExternalTeamRow } from '../types/provider.js';
import type { ApiSource } from '../types/source.js';
import { logger } from '../utils/logger.js';
import { BatchReport, runIsolated } from './batch.js';

/**
 * In-memory view of one source's team identifiers: external id -> team id.
 * Loaded once per reconciliation pass.
 */
export class TeamRefResolver {
  private constructor(
    readonly source: ApiSource,
    private readonly refs: Map<string, string>,
  ) {}

  static async load(store: Store, source: ApiSource): Promise<TeamRefResolver> {
    const refs = new Map<string, string>();
    for (const identifier of await store.listTeamIdentifiers(source)) {
      refs.set(identifier.externalId, identifier.teamId);
    }
    logger.debug({ source, refCount: refs.size }, 'Team identifiers loaded');
    return new TeamRefResolver(source, refs);
  }

  resolve(externalId: string): string | null {
    return this.refs.get(externalId.trim()) ?? null;
  }

  get size(): number {
    return this.refs.size;
  }
}

/**
 * Maps a source's teams onto canonical teams by uppercased abbreviation.
 * Unknown abbreviations are reported, never created.
 */
export async function reconcileTeams(
  store: Store,
  source: ApiSource,
  rows: ExternalTeamRow[],
): Promise<BatchReport> {
  const report = new BatchReport('reconcile-teams');

  await store.transaction(async (tx) => {
    for (const row of rows) {
      await runIsolated(tx, report, `${source}:${row.externalId}`, async (unit) => {
        if ((await unit.findTeamByIdentifier(source, row.externalId)) !== null) return 'already-mapped';

        const team = await unit.getTeam(row.abbreviation.trim().toUpperCase());
        if (!team) {
          logger.warn({ source, abbreviation: row.abbreviation }, 'Could not resolve external team');
          return 'unresolved-team';
        }
        if ((await unit.getTeamIdentifier(source, team.id)) !== null) return 'already-mapped';

        if (!(await unit.insertTeamIdentifier(source, row.externalId, team.id))) return 'exists';
      });
    }
  });

  return report;
}
