import { z } from 'zod';
import type { ScheduleProvider, ScheduleRow, TeamDescription } from '../types/provider.js';
import { zonedKickoff } from '../utils/date.js';
import { logger } from '../utils/logger.js';
import { fetchText } from './http-client.js';

/** Schedule times are published as US Eastern wall-clock time. */
const SCHEDULE_TIME_ZONE = 'America/New_York';

const scheduleRecord = z.object({
  game_id: z.string().min(1),
  season: z.coerce.number().int(),
  game_type: z.string(),
  gameday: z.string(),
  gametime: z.string(),
  home_team: z.string().min(1),
  away_team: z.string().min(1),
  home_score: z.string(),
  away_score: z.string(),
  result: z.string(),
});

const teamRecord = z.object({
  team_abbr: z.string().min(1),
  team_name: z.string().min(1),
  team_color: z.string(),
  team_logo_wikipedia: z.string(),
});

/** Empty means "no value"; the provider's NA sentinel comes through as NaN. */
function parseNumber(raw: string): number | null {
  const trimmed = raw.trim();
  if (trimmed === '') return null;
  return Number(trimmed);
}

/** Splits one CSV line, honouring double-quoted fields. */
function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      fields.push(field.trim());
      field = '';
    } else {
      field += ch;
    }
  }
  fields.push(field.trim());
  return fields;
}

/** Header-keyed records; columns the header does not name are dropped. */
export function readCsv(text: string): Record<string, string>[] {
  const lines = text.split(/\r?\n/).filter((line) => line.trim());
  const [headerLine, ...dataLines] = lines;
  if (!headerLine) return [];

  const header = splitCsvLine(headerLine);
  return dataLines.map((line) => {
    const row = splitCsvLine(line);
    const record: Record<string, string> = {};
    header.forEach((column, index) => {
      record[column] = row[index] ?? '';
    });
    return record;
  });
}

export function parseScheduleCsv(text: string, season: number): ScheduleRow[] {
  const rows: ScheduleRow[] = [];
  const log = logger.child({ provider: 'nflverse', season });

  for (const record of readCsv(text)) {
    const parsed = scheduleRecord.safeParse(record);
    if (!parsed.success) {
      log.warn({ issues: parsed.error.issues.length }, 'Malformed schedule row, skipping');
      continue;
    }
    const r = parsed.data;
    if (r.season !== season) continue;

    const kickoff = zonedKickoff(r.gameday, r.gametime, SCHEDULE_TIME_ZONE);
    if (!kickoff) {
      log.debug({ gameId: r.game_id }, 'No kickoff time yet, skipping');
      continue;
    }

    rows.push({
      externalGameId: r.game_id,
      gameType: r.game_type,
      homeCode: r.home_team.toUpperCase(),
      awayCode: r.away_team.toUpperCase(),
      kickoff,
      homeScore: parseNumber(r.home_score),
      awayScore: parseNumber(r.away_score),
      result: parseNumber(r.result),
    });
  }

  return rows;
}

export function parseTeamsCsv(text: string): TeamDescription[] {
  const teams: TeamDescription[] = [];
  for (const record of readCsv(text)) {
    const parsed = teamRecord.safeParse(record);
    if (!parsed.success) continue;
    const t = parsed.data;
    teams.push({
      abbreviation: t.team_abbr.toUpperCase(),
      name: t.team_name,
      color: t.team_color === '' || t.team_color === 'NA' ? null : t.team_color,
      logo: t.team_logo_wikipedia,
    });
  }
  return teams;
}

export class NflverseProvider implements ScheduleProvider {
  constructor(
    private readonly scheduleUrl: string,
    private readonly teamsUrl: string,
  ) {}

  async fetchSeasonSchedule(season: number): Promise<ScheduleRow[]> {
    const text = await fetchText(this.scheduleUrl, 'nflverse.schedule');
    const rows = parseScheduleCsv(text, season);
    logger.info({ season, count: rows.length }, 'Schedule fetched');
    return rows;
  }

  async fetchTeams(): Promise<TeamDescription[]> {
    const text = await fetchText(this.teamsUrl, 'nflverse.teams');
    return parseTeamsCsv(text);
  }
}
