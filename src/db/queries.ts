import type { ISql, Sql, TransactionSql } from 'postgres';
import type {
  Channel,
  Game,
  GameType,
  GameTypeId,
  GameTypeScaling,
  Poll,
  ScoredWager,
  Team,
  TeamIdentifier,
  User,
  Wager,
} from '../types/match.js';
import type { ApiSource } from '../types/source.js';
import type { PollWithGame, Store } from './store.js';

/**
 * PostgreSQL implementation of the store. Expects the pool from
 * `createSql`, which camelCases column names. Queries go to the open
 * transaction when there is one, otherwise to the pool.
 */
export class PostgresStore implements Store {
  private readonly sql: ISql;

  constructor(
    private readonly pool: Sql,
    private readonly tx: TransactionSql | null = null,
  ) {
    this.sql = tx ?? pool;
  }

  async transaction(work: (tx: Store) => Promise<void>): Promise<void> {
    if (this.tx) {
      await work(this);
      return;
    }
    await this.pool.begin(async (tx) => {
      await work(new PostgresStore(this.pool, tx));
    });
  }

  async savepoint(work: (tx: Store) => Promise<void>): Promise<void> {
    if (!this.tx) {
      await this.transaction(work);
      return;
    }
    await this.tx.savepoint(async (sp) => {
      await work(new PostgresStore(this.pool, sp));
    });
  }

  async ping(): Promise<boolean> {
    const ok = await this.sql`SELECT 1 as ok`.catch(() => null);
    return ok !== null;
  }

  // ===== Teams & game types =====

  async listTeams(): Promise<Team[]> {
    return this.sql<Team[]>`SELECT id, name, logo, color, emoji_id FROM teams ORDER BY id`;
  }

  async getTeam(id: string): Promise<Team | null> {
    const [team] = await this.sql<Team[]>`
      SELECT id, name, logo, color, emoji_id FROM teams WHERE id = ${id}
    `;
    return team ?? null;
  }

  async upsertTeam(team: Team): Promise<void> {
    await this.sql`
      INSERT INTO teams (id, name, logo, color, emoji_id)
      VALUES (${team.id}, ${team.name}, ${team.logo}, ${team.color}, ${team.emojiId})
      ON CONFLICT (id) DO UPDATE SET
        name = EXCLUDED.name,
        logo = EXCLUDED.logo,
        color = EXCLUDED.color,
        emoji_id = COALESCE(EXCLUDED.emoji_id, teams.emoji_id)
    `;
  }

  async listGameTypes(): Promise<GameType[]> {
    return this.sql<GameType[]>`SELECT id, name FROM game_types ORDER BY id`;
  }

  async insertGameType(gameType: GameType): Promise<boolean> {
    const result = await this.sql`
      INSERT INTO game_types (id, name) VALUES (${gameType.id}, ${gameType.name})
      ON CONFLICT DO NOTHING
    `;
    return result.count > 0;
  }

  // ===== Games =====

  async getGame(id: string): Promise<Game | null> {
    const [game] = await this.sql<Game[]>`
      SELECT id, home_team_id, away_team_id, game_type_id, kickoff,
        home_score, away_score, result, outcome
      FROM games WHERE id = ${id}
    `;
    return game ?? null;
  }

  async listGames(): Promise<Game[]> {
    return this.sql<Game[]>`
      SELECT id, home_team_id, away_team_id, game_type_id, kickoff,
        home_score, away_score, result, outcome
      FROM games ORDER BY kickoff, id
    `;
  }

  async upsertGame(game: Game): Promise<'created' | 'updated'> {
    const [row] = await this.sql<{ inserted: boolean }[]>`
      INSERT INTO games (
        id, home_team_id, away_team_id, game_type_id, kickoff,
        home_score, away_score, result, outcome
      )
      VALUES (
        ${game.id}, ${game.homeTeamId}, ${game.awayTeamId}, ${game.gameTypeId}, ${game.kickoff},
        ${game.homeScore}, ${game.awayScore}, ${game.result}, ${game.outcome}
      )
      ON CONFLICT (id) DO UPDATE SET
        kickoff = EXCLUDED.kickoff,
        home_score = EXCLUDED.home_score,
        away_score = EXCLUDED.away_score,
        result = EXCLUDED.result,
        outcome = EXCLUDED.outcome
      RETURNING (xmax = 0) as inserted
    `;
    return row?.inserted ? 'created' : 'updated';
  }

  async findGamesByTeams(homeTeamId: string, awayTeamId: string, from: Date, to: Date): Promise<Game[]> {
    return this.sql<Game[]>`
      SELECT id, home_team_id, away_team_id, game_type_id, kickoff,
        home_score, away_score, result, outcome
      FROM games
      WHERE home_team_id = ${homeTeamId}
        AND away_team_id = ${awayTeamId}
        AND kickoff BETWEEN ${from} AND ${to}
      ORDER BY kickoff
    `;
  }

  async listGamesKickingOff(from: Date, to: Date): Promise<Game[]> {
    return this.sql<Game[]>`
      SELECT id, home_team_id, away_team_id, game_type_id, kickoff,
        home_score, away_score, result, outcome
      FROM games
      WHERE kickoff BETWEEN ${from} AND ${to}
      ORDER BY kickoff, id
    `;
  }

  // ===== Identity map =====

  async listTeamIdentifiers(source: ApiSource): Promise<TeamIdentifier[]> {
    return this.sql<TeamIdentifier[]>`
      SELECT source, external_id, team_id FROM team_identifiers WHERE source = ${source}
    `;
  }

  async findTeamByIdentifier(source: ApiSource, externalId: string): Promise<string | null> {
    const [row] = await this.sql<{ teamId: string }[]>`
      SELECT team_id FROM team_identifiers WHERE source = ${source} AND external_id = ${externalId}
    `;
    return row?.teamId ?? null;
  }

  async getTeamIdentifier(source: ApiSource, teamId: string): Promise<string | null> {
    const [row] = await this.sql<{ externalId: string }[]>`
      SELECT external_id FROM team_identifiers WHERE source = ${source} AND team_id = ${teamId}
    `;
    return row?.externalId ?? null;
  }

  async insertTeamIdentifier(source: ApiSource, externalId: string, teamId: string): Promise<boolean> {
    const result = await this.sql`
      INSERT INTO team_identifiers (source, external_id, team_id)
      VALUES (${source}, ${externalId}, ${teamId})
      ON CONFLICT DO NOTHING
    `;
    return result.count > 0;
  }

  async findGameByIdentifier(source: ApiSource, externalId: string): Promise<string | null> {
    const [row] = await this.sql<{ gameId: string }[]>`
      SELECT game_id FROM game_identifiers WHERE source = ${source} AND external_id = ${externalId}
    `;
    return row?.gameId ?? null;
  }

  async getGameIdentifier(source: ApiSource, gameId: string): Promise<string | null> {
    const [row] = await this.sql<{ externalId: string }[]>`
      SELECT external_id FROM game_identifiers WHERE source = ${source} AND game_id = ${gameId}
    `;
    return row?.externalId ?? null;
  }

  async insertGameIdentifier(source: ApiSource, externalId: string, gameId: string): Promise<boolean> {
    const result = await this.sql`
      INSERT INTO game_identifiers (source, external_id, game_id)
      VALUES (${source}, ${externalId}, ${gameId})
      ON CONFLICT DO NOTHING
    `;
    return result.count > 0;
  }

  async countGameIdentifiers(source: ApiSource): Promise<number> {
    const [row] = await this.sql<{ count: number }[]>`
      SELECT count(*)::int as count FROM game_identifiers WHERE source = ${source}
    `;
    return row?.count ?? 0;
  }

  // ===== Channels & scaling =====

  async listChannels(filter?: { active?: boolean }): Promise<Channel[]> {
    return this.sql<Channel[]>`
      SELECT id, name, role_id, leaderboard_msg_id as leaderboard_message_id, delete_result_msg, active
      FROM channels
      ${filter?.active !== undefined ? this.sql`WHERE active = ${filter.active}` : this.sql``}
      ORDER BY name
    `;
  }

  async getChannel(id: string): Promise<Channel | null> {
    const [channel] = await this.sql<Channel[]>`
      SELECT id, name, role_id, leaderboard_msg_id as leaderboard_message_id, delete_result_msg, active
      FROM channels WHERE id = ${id}
    `;
    return channel ?? null;
  }

  async upsertChannel(channel: Omit<Channel, 'leaderboardMessageId'>): Promise<Channel> {
    const [row] = await this.sql<Channel[]>`
      INSERT INTO channels (id, name, role_id, delete_result_msg, active)
      VALUES (${channel.id}, ${channel.name}, ${channel.roleId}, ${channel.deleteResultMsg}, ${channel.active})
      ON CONFLICT (id) DO UPDATE SET
        name = EXCLUDED.name,
        role_id = EXCLUDED.role_id,
        delete_result_msg = EXCLUDED.delete_result_msg,
        active = EXCLUDED.active
      RETURNING id, name, role_id, leaderboard_msg_id as leaderboard_message_id, delete_result_msg, active
    `;
    return row!;
  }

  async setLeaderboardMessage(channelId: string, messageId: string): Promise<void> {
    await this.sql`UPDATE channels SET leaderboard_msg_id = ${messageId} WHERE id = ${channelId}`;
  }

  async listScalings(channelId?: string): Promise<GameTypeScaling[]> {
    return this.sql<GameTypeScaling[]>`
      SELECT channel_id, game_type_id, factor FROM game_type_scalings
      ${channelId !== undefined ? this.sql`WHERE channel_id = ${channelId}` : this.sql``}
      ORDER BY channel_id, game_type_id
    `;
  }

  async getScalingFactor(channelId: string, gameTypeId: GameTypeId): Promise<number | null> {
    const [row] = await this.sql<{ factor: number }[]>`
      SELECT factor FROM game_type_scalings
      WHERE channel_id = ${channelId} AND game_type_id = ${gameTypeId}
    `;
    return row?.factor ?? null;
  }

  async insertScalingIfMissing(scaling: GameTypeScaling): Promise<boolean> {
    const result = await this.sql`
      INSERT INTO game_type_scalings (channel_id, game_type_id, factor)
      VALUES (${scaling.channelId}, ${scaling.gameTypeId}, ${scaling.factor})
      ON CONFLICT DO NOTHING
    `;
    return result.count > 0;
  }

  async setScalingFactor(scaling: GameTypeScaling): Promise<void> {
    await this.sql`
      INSERT INTO game_type_scalings (channel_id, game_type_id, factor)
      VALUES (${scaling.channelId}, ${scaling.gameTypeId}, ${scaling.factor})
      ON CONFLICT (channel_id, game_type_id) DO UPDATE SET factor = EXCLUDED.factor
    `;
  }

  // ===== Users =====

  async getUser(id: string): Promise<User | null> {
    const [user] = await this.sql<User[]>`SELECT id, username FROM users WHERE id = ${id}`;
    return user ?? null;
  }

  async insertUserIfMissing(user: User): Promise<boolean> {
    const result = await this.sql`
      INSERT INTO users (id, username) VALUES (${user.id}, ${user.username})
      ON CONFLICT DO NOTHING
    `;
    return result.count > 0;
  }

  // ===== Polls =====

  async getPoll(id: number): Promise<Poll | null> {
    const [poll] = await this.sql<Poll[]>`
      SELECT id, channel_id, game_id, message_id, closed, result_posted FROM polls WHERE id = ${id}
    `;
    return poll ?? null;
  }

  async insertPollIfMissing(channelId: string, gameId: string): Promise<boolean> {
    const result = await this.sql`
      INSERT INTO polls (channel_id, game_id) VALUES (${channelId}, ${gameId})
      ON CONFLICT ON CONSTRAINT uq_poll_channel_game DO NOTHING
    `;
    return result.count > 0;
  }

  async listUnpublishedPolls(): Promise<PollWithGame[]> {
    return this.sql<PollWithGame[]>`
      SELECT p.id, p.channel_id, p.game_id, p.message_id, p.closed, p.result_posted,
        g.kickoff, g.game_type_id
      FROM polls p
      JOIN games g ON g.id = p.game_id
      JOIN channels c ON c.id = p.channel_id
      WHERE c.active AND p.message_id IS NULL AND NOT p.closed
      ORDER BY g.kickoff, p.id
    `;
  }

  async listPollsToClose(now: Date): Promise<PollWithGame[]> {
    return this.sql<PollWithGame[]>`
      SELECT p.id, p.channel_id, p.game_id, p.message_id, p.closed, p.result_posted,
        g.kickoff, g.game_type_id
      FROM polls p
      JOIN games g ON g.id = p.game_id
      WHERE NOT p.closed AND g.kickoff <= ${now}
      ORDER BY g.kickoff, p.id
    `;
  }

  async listOpenPolls(): Promise<PollWithGame[]> {
    return this.sql<PollWithGame[]>`
      SELECT p.id, p.channel_id, p.game_id, p.message_id, p.closed, p.result_posted,
        g.kickoff, g.game_type_id
      FROM polls p
      JOIN games g ON g.id = p.game_id
      WHERE NOT p.closed AND p.message_id IS NOT NULL
      ORDER BY g.kickoff, p.id
    `;
  }

  async listPollsAwaitingResults(): Promise<PollWithGame[]> {
    return this.sql<PollWithGame[]>`
      SELECT p.id, p.channel_id, p.game_id, p.message_id, p.closed, p.result_posted,
        g.kickoff, g.game_type_id
      FROM polls p
      JOIN games g ON g.id = p.game_id
      JOIN channels c ON c.id = p.channel_id
      WHERE c.active AND p.closed AND NOT p.result_posted AND g.outcome <> 'NOT_FINISHED'
      ORDER BY g.kickoff, p.id
    `;
  }

  async markPollPublished(pollId: number, messageId: string): Promise<void> {
    await this.sql`UPDATE polls SET message_id = ${messageId} WHERE id = ${pollId} AND message_id IS NULL`;
  }

  async markPollClosed(pollId: number): Promise<void> {
    await this.sql`UPDATE polls SET closed = TRUE WHERE id = ${pollId}`;
  }

  async markResultPosted(pollId: number): Promise<void> {
    await this.sql`UPDATE polls SET result_posted = TRUE WHERE id = ${pollId} AND closed`;
  }

  // ===== Wagers =====

  async listWagers(gameId: string, channelId: string): Promise<Wager[]> {
    return this.sql<Wager[]>`
      SELECT id, user_id, game_id, channel_id, choice FROM wagers
      WHERE game_id = ${gameId} AND channel_id = ${channelId}
      ORDER BY id
    `;
  }

  async upsertWager(wager: Omit<Wager, 'id'>): Promise<void> {
    await this.sql`
      INSERT INTO wagers (user_id, game_id, channel_id, choice)
      VALUES (${wager.userId}, ${wager.gameId}, ${wager.channelId}, ${wager.choice})
      ON CONFLICT ON CONSTRAINT uq_wager_user_game_channel DO UPDATE SET choice = EXCLUDED.choice
    `;
  }

  async deleteWager(id: number): Promise<void> {
    await this.sql`DELETE FROM wagers WHERE id = ${id}`;
  }

  async listScoredWagers(channelId: string): Promise<ScoredWager[]> {
    return this.sql<ScoredWager[]>`
      SELECT w.user_id, u.username, w.channel_id, g.game_type_id, w.choice, g.outcome
      FROM wagers w
      JOIN users u ON u.id = w.user_id
      JOIN games g ON g.id = w.game_id
      WHERE w.channel_id = ${channelId}
      ORDER BY w.id
    `;
  }
}
