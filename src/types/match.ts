import type { Choice, Outcome } from './outcome.js';
import type { ApiSource } from './source.js';

export interface Team {
  /** Natural key: the schedule provider's abbreviation, e.g. "KC". */
  id: string;
  name: string;
  logo: string;
  color: string | null;
  emojiId: string | null;
}

export const GAME_TYPE_IDS = ['REG', 'WC', 'DIV', 'CON', 'SB'] as const;
export type GameTypeId = (typeof GAME_TYPE_IDS)[number];

export interface GameType {
  id: GameTypeId;
  name: string;
}

export interface Game {
  /** Schedule provider id, e.g. "2025_01_DAL_PHI". */
  id: string;
  homeTeamId: string;
  awayTeamId: string;
  gameTypeId: GameTypeId;
  kickoff: Date;
  homeScore: number | null;
  awayScore: number | null;
  /** Home minus away. */
  result: number | null;
  outcome: Outcome;
}

export interface TeamIdentifier {
  source: ApiSource;
  externalId: string;
  teamId: string;
}

export interface GameIdentifier {
  source: ApiSource;
  externalId: string;
  gameId: string;
}

export interface Channel {
  id: string;
  name: string;
  roleId: string | null;
  leaderboardMessageId: string | null;
  deleteResultMsg: boolean;
  active: boolean;
}

export interface GameTypeScaling {
  channelId: string;
  gameTypeId: GameTypeId;
  factor: number;
}

export interface User {
  id: string;
  username: string;
}

export interface Poll {
  id: number;
  channelId: string;
  gameId: string;
  messageId: string | null;
  closed: boolean;
  resultPosted: boolean;
}

export interface Wager {
  id: number;
  userId: string;
  gameId: string;
  channelId: string;
  choice: Choice;
}

/** A wager joined with what scoring needs from its game and user. */
export interface ScoredWager {
  userId: string;
  username: string;
  channelId: string;
  gameTypeId: GameTypeId;
  choice: Choice;
  outcome: Outcome;
}
