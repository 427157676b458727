import type { Store } from '../db/store.js';
import { BatchReport, runItem } from '../pipeline/batch.js';
import type { ChatPlatform, Embed, EmbedField } from '../types/chat.js';
import type { ScoredWager } from '../types/match.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { createScalingLookup, earnedPoints, type ScalingLookup } from './grader.js';

export interface LeaderboardUser {
  id: string;
  username: string;
}

export interface LeaderboardEntry {
  place: number;
  score: number;
  users: LeaderboardUser[];
}

const LEADERBOARD_COLOR = 0x6434c9;
const PODIUM_SIZE = 10;

/**
 * Sums each user's earned points and ranks them. Users on the same score
 * share a place, and the next place skips by the size of the tied group.
 */
export function buildLeaderboard(wagers: ScoredWager[], scaling: ScalingLookup): LeaderboardEntry[] {
  const totals = new Map<string, { user: LeaderboardUser; score: number }>();

  for (const w of wagers) {
    const points = earnedPoints(w.choice, w.outcome, scaling(w.channelId, w.gameTypeId));
    const entry = totals.get(w.userId);
    if (entry) entry.score += points;
    else totals.set(w.userId, { user: { id: w.userId, username: w.username }, score: points });
  }

  const byScore = new Map<number, LeaderboardUser[]>();
  for (const { user, score } of totals.values()) {
    const group = byScore.get(score);
    if (group) group.push(user);
    else byScore.set(score, [user]);
  }

  const entries: LeaderboardEntry[] = [];
  let place = 1;
  for (const score of [...byScore.keys()].sort((a, b) => b - a)) {
    const users = byScore.get(score) ?? [];
    users.sort((a, b) => a.username.localeCompare(b.username));
    entries.push({ place, score, users });
    place += users.length;
  }
  return entries;
}

export async function loadLeaderboard(store: Store, channelId: string): Promise<LeaderboardEntry[]> {
  const [wagers, scalings] = await Promise.all([
    store.listScoredWagers(channelId),
    store.listScalings(channelId),
  ]);
  return buildLeaderboard(wagers, createScalingLookup(scalings));
}

function placeTitle(place: number): string {
  if (place === 1) return '🏆 1st Place';
  if (place === 2) return '🥈 2nd Place';
  if (place === 3) return '🥉 3rd Place';
  return `${place}th Place`;
}

export function renderLeaderboard(entries: LeaderboardEntry[], now: Date): Embed {
  const podium = new Map<number, string[]>();
  const rest: string[] = [];

  for (const entry of entries) {
    for (const user of entry.users) {
      if (entry.place <= PODIUM_SIZE) {
        const lines = podium.get(entry.place) ?? [];
        lines.push(`> ${user.username}: ${entry.score}`);
        podium.set(entry.place, lines);
      } else {
        rest.push(`> \`${entry.place}.\` ${user.username}: ${entry.score}`);
      }
    }
  }

  const fields: EmbedField[] = [];
  for (let place = 1; place <= PODIUM_SIZE; place++) {
    const lines = podium.get(place);
    fields.push({ name: placeTitle(place), value: lines ? lines.join('\n') : '> ---', inline: true });
  }
  if (rest.length > 0) fields.push({ name: 'The Rest', value: rest.join('\n'), inline: false });

  return { title: '**Leaderboard**', color: LEADERBOARD_COLOR, fields, timestamp: now };
}

/**
 * Edits the channel's leaderboard message in place, or posts a new one when
 * there is none (or it can no longer be edited) and remembers its id.
 */
export async function publishLeaderboard(
  store: Store,
  chat: ChatPlatform,
  channelId: string,
  now = new Date(),
): Promise<void> {
  const channel = await store.getChannel(channelId);
  if (!channel) throw new Error(`Channel ${channelId} not found`);

  const embed = renderLeaderboard(await loadLeaderboard(store, channelId), now);

  if (channel.leaderboardMessageId) {
    try {
      await chat.editMessage(channelId, channel.leaderboardMessageId, { embed });
      return;
    } catch (err) {
      logger.warn({ channelId, err: errorMessage(err) }, 'Could not edit leaderboard, posting a new one');
    }
  }

  const messageId = await chat.sendMessage(channelId, { embed });
  await store.setLeaderboardMessage(channelId, messageId);
}

export async function publishLeaderboards(store: Store, chat: ChatPlatform, now = new Date()): Promise<BatchReport> {
  const report = new BatchReport('publish-leaderboards');
  for (const channel of await store.listChannels({ active: true })) {
    await runItem(report, channel.id, () => publishLeaderboard(store, chat, channel.id, now));
  }
  return report;
}
