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

/** A poll joined with the fields of its game the lifecycle decides on. */
export interface PollWithGame extends Poll {
  kickoff: Date;
  gameTypeId: GameTypeId;
}

/**
 * Persistence engine. Every create that can collide with a unique key is an
 * insert-if-missing returning whether a row was written, so duplicates are a
 * no-op rather than an error.
 */
export interface Store {
  /** Runs `work` as one atomic unit; nested calls join the outer unit. */
  transaction(work: (tx: Store) => Promise<void>): Promise<void>;
  /**
   * Runs `work` so that a failure undoes only its own writes and leaves the
   * enclosing transaction usable. Outside a transaction it is one of its own.
   */
  savepoint(work: (tx: Store) => Promise<void>): Promise<void>;
  ping(): Promise<boolean>;

  listTeams(): Promise<Team[]>;
  getTeam(id: string): Promise<Team | null>;
  upsertTeam(team: Team): Promise<void>;

  listGameTypes(): Promise<GameType[]>;
  insertGameType(gameType: GameType): Promise<boolean>;

  getGame(id: string): Promise<Game | null>;
  listGames(): Promise<Game[]>;
  /** Inserts, or refreshes scores, kickoff, result and outcome of an existing game. */
  upsertGame(game: Game): Promise<'created' | 'updated'>;
  findGamesByTeams(homeTeamId: string, awayTeamId: string, from: Date, to: Date): Promise<Game[]>;
  listGamesKickingOff(from: Date, to: Date): Promise<Game[]>;

  listTeamIdentifiers(source: ApiSource): Promise<TeamIdentifier[]>;
  findTeamByIdentifier(source: ApiSource, externalId: string): Promise<string | null>;
  getTeamIdentifier(source: ApiSource, teamId: string): Promise<string | null>;
  insertTeamIdentifier(source: ApiSource, externalId: string, teamId: string): Promise<boolean>;
  findGameByIdentifier(source: ApiSource, externalId: string): Promise<string | null>;
  getGameIdentifier(source: ApiSource, gameId: string): Promise<string | null>;
  insertGameIdentifier(source: ApiSource, externalId: string, gameId: string): Promise<boolean>;
  countGameIdentifiers(source: ApiSource): Promise<number>;

  listChannels(filter?: { active?: boolean }): Promise<Channel[]>;
  getChannel(id: string): Promise<Channel | null>;
  upsertChannel(channel: Omit<Channel, 'leaderboardMessageId'>): Promise<Channel>;
  setLeaderboardMessage(channelId: string, messageId: string): Promise<void>;

  listScalings(channelId?: string): Promise<GameTypeScaling[]>;
  getScalingFactor(channelId: string, gameTypeId: GameTypeId): Promise<number | null>;
  insertScalingIfMissing(scaling: GameTypeScaling): Promise<boolean>;
  setScalingFactor(scaling: GameTypeScaling): Promise<void>;

  getUser(id: string): Promise<User | null>;
  insertUserIfMissing(user: User): Promise<boolean>;

  getPoll(id: number): Promise<Poll | null>;
  insertPollIfMissing(channelId: string, gameId: string): Promise<boolean>;
  /** Polls with no message yet, in active channels, earliest kickoff first. */
  listUnpublishedPolls(): Promise<PollWithGame[]>;
  /** Polls not closed yet whose game has kicked off. */
  listPollsToClose(now: Date): Promise<PollWithGame[]>;
  /** Published polls that are not closed. */
  listOpenPolls(): Promise<PollWithGame[]>;
  /** Closed polls in active channels whose game is finished and result not posted. */
  listPollsAwaitingResults(): Promise<PollWithGame[]>;
  markPollPublished(pollId: number, messageId: string): Promise<void>;
  markPollClosed(pollId: number): Promise<void>;
  markResultPosted(pollId: number): Promise<void>;

  listWagers(gameId: string, channelId: string): Promise<Wager[]>;
  upsertWager(wager: Omit<Wager, 'id'>): Promise<void>;
  deleteWager(id: number): Promise<void>;
  /** All wagers of a channel joined with their game's outcome and type. */
  listScoredWagers(channelId: string): Promise<ScoredWager[]>;
}
