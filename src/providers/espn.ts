import { z } from 'zod';
import type { ExternalEventRow, ExternalTeamRow, SecondaryProvider } from '../types/provider.js';
import { logger } from '../utils/logger.js';
import { fetchJson } from './http-client.js';

const ESPN_BASE = 'https://site.api.espn.com/apis/site/v2/sports/football/nfl';

/** ESPN codes that differ from the schedule provider's team keys. */
const ABBREVIATION_ALIASES: Record<string, string> = {
  WSH: 'WAS',
  LAR: 'LA',
};

const teamsResponse = z.object({
  sports: z.array(
    z.object({
      leagues: z.array(
        z.object({
          teams: z.array(z.object({ team: z.object({ id: z.string(), abbreviation: z.string() }) })),
        }),
      ),
    }),
  ),
});

const scoreboardResponse = z.object({
  events: z
    .array(
      z.object({
        id: z.string(),
        date: z.string(),
        competitions: z.array(
          z.object({
            competitors: z.array(
              z.object({
                homeAway: z.enum(['home', 'away']),
                team: z.object({ id: z.string() }),
              }),
            ),
          }),
        ),
      }),
    )
    .default([]),
});

export function normalizeAbbreviation(raw: string): string {
  const upper = raw.trim().toUpperCase();
  return ABBREVIATION_ALIASES[upper] ?? upper;
}

export function parseTeams(data: unknown): ExternalTeamRow[] {
  const parsed = teamsResponse.parse(data);
  return parsed.sports.flatMap((sport) =>
    sport.leagues.flatMap((league) =>
      league.teams.map(({ team }) => ({
        externalId: team.id,
        abbreviation: normalizeAbbreviation(team.abbreviation),
      })),
    ),
  );
}

export function parseEvents(data: unknown): ExternalEventRow[] {
  const parsed = scoreboardResponse.parse(data);
  const rows: ExternalEventRow[] = [];

  for (const event of parsed.events) {
    const comp = event.competitions[0];
    if (!comp) continue;

    const home = comp.competitors.find((c) => c.homeAway === 'home');
    const away = comp.competitors.find((c) => c.homeAway === 'away');
    if (!home || !away) continue;

    const kickoff = new Date(event.date);
    if (isNaN(kickoff.getTime())) continue;

    rows.push({
      externalId: event.id,
      homeTeamRef: home.team.id,
      awayTeamRef: away.team.id,
      kickoff,
    });
  }

  return rows;
}

export class EspnProvider implements SecondaryProvider {
  constructor(private readonly baseUrl = ESPN_BASE) {}

  async fetchTeams(): Promise<ExternalTeamRow[]> {
    const data = await fetchJson(`${this.baseUrl}/teams`, 'espn.teams');
    return parseTeams(data);
  }

  /** A season runs from August through February of the next year. */
  async fetchEvents(year: number): Promise<ExternalEventRow[]> {
    const url = `${this.baseUrl}/scoreboard?dates=${year}0801-${year + 1}0301&limit=1000`;
    const data = await fetchJson(url, 'espn.scoreboard');
    const rows = parseEvents(data);
    logger.info({ year, count: rows.length }, 'ESPN events fetched');
    return rows;
  }
}
