/** One row of the schedule provider's season schedule. */
export interface ScheduleRow {
  externalGameId: string;
  /** Provider's game type code, e.g. "REG". */
  gameType: string;
  homeCode: string;
  awayCode: string;
  kickoff: Date;
  /** May be NaN when the provider has no score yet. */
  homeScore: number | null;
  awayScore: number | null;
  result: number | null;
}

/** One row of the schedule provider's team description file. */
export interface TeamDescription {
  abbreviation: string;
  name: string;
  color: string | null;
  logo: string;
}

export interface ScheduleProvider {
  fetchSeasonSchedule(season: number): Promise<ScheduleRow[]>;
  fetchTeams(): Promise<TeamDescription[]>;
}

export interface ExternalTeamRow {
  externalId: string;
  abbreviation: string;
}

export interface ExternalEventRow {
  externalId: string;
  homeTeamRef: string;
  awayTeamRef: string;
  kickoff: Date;
}

export interface SecondaryProvider {
  fetchTeams(): Promise<ExternalTeamRow[]>;
  fetchEvents(year: number): Promise<ExternalEventRow[]>;
}
