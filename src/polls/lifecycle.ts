import { addDays } from 'date-fns';
import type { PollWithGame, Store } from '../db/store.js';
import { BatchReport, runIsolated, runItem } from '../pipeline/batch.js';
import { scalingFactor } from '../results/grader.js';
import { publishLeaderboards } from '../results/leaderboard.js';
import type { ChatPlatform } from '../types/chat.js';
import type { Poll, User } from '../types/match.js';
import { InvariantViolationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { syncPollWagers } from './ledger.js';
import { renderAnnouncement, renderPoll, renderResult, type PollContext } from './render.js';

export const POLL_STATES = ['PENDING', 'CREATED', 'OPEN', 'CLOSED', 'RESULTS_POSTED'] as const;
export type PollState = (typeof POLL_STATES)[number];

export const DEFAULT_POLL_WINDOW_DAYS = 7;

/**
 * Where a (channel, game) pair is in its lifecycle. States only ever move
 * forward through POLL_STATES; a pass may skip one, never go back.
 */
export function pollState(poll: Poll | null): PollState {
  if (!poll) return 'PENDING';
  if (poll.resultPosted) return 'RESULTS_POSTED';
  if (poll.closed) return 'CLOSED';
  return poll.messageId ? 'OPEN' : 'CREATED';
}

export async function loadPollContext(store: Store, poll: Pick<Poll, 'channelId' | 'gameId'>): Promise<PollContext> {
  const game = await store.getGame(poll.gameId);
  if (!game) throw new InvariantViolationError(`Game ${poll.gameId} not found`);

  const [home, away, gameTypes, factor] = await Promise.all([
    store.getTeam(game.homeTeamId),
    store.getTeam(game.awayTeamId),
    store.listGameTypes(),
    scalingFactor(store, poll.channelId, game.gameTypeId),
  ]);
  const gameType = gameTypes.find((t) => t.id === game.gameTypeId);
  if (!home || !away || !gameType) {
    throw new InvariantViolationError(`Game ${game.id} references a missing team or game type`);
  }
  return { game, home, away, gameType, factor };
}

/** Deletes the platform's pin and poll-ended notices in channels that ask for it. */
async function tidyChannels(store: Store, chat: ChatPlatform, channelIds: Iterable<string>): Promise<void> {
  for (const channelId of new Set(channelIds)) {
    const channel = await store.getChannel(channelId);
    if (!channel?.deleteResultMsg) continue;
    try {
      await chat.purgeSystemMessages(channelId);
    } catch (err) {
      logger.warn({ channelId, err: errorMessage(err) }, 'Could not tidy channel');
    }
  }
}

/**
 * PENDING -> CREATED for every active channel and every game kicking off
 * within the window. The (channel, game) unique key makes reruns and
 * overlapping passes a no-op.
 */
export async function createPolls(
  store: Store,
  now: Date,
  windowDays = DEFAULT_POLL_WINDOW_DAYS,
): Promise<BatchReport> {
  const report = new BatchReport('create-polls');

  await store.transaction(async (tx) => {
    const channels = await tx.listChannels({ active: true });
    const games = await tx.listGamesKickingOff(now, addDays(now, windowDays));

    for (const channel of channels) {
      for (const game of games) {
        await runIsolated(tx, report, `${channel.id}:${game.id}`, async (unit) => {
          if (!(await unit.insertPollIfMissing(channel.id, game.id))) return 'exists';
        });
      }
    }
  });

  return report;
}

/**
 * CREATED -> OPEN. A poll whose publish call fails stays CREATED and is
 * retried next pass; its message handle is only stored once the platform has
 * accepted the poll. Polls whose game already kicked off are left for the
 * close pass.
 */
export async function openPolls(store: Store, chat: ChatPlatform, now: Date): Promise<BatchReport> {
  const report = new BatchReport('open-polls');
  const pending: PollWithGame[] = [];

  for (const poll of await store.listUnpublishedPolls()) {
    if (poll.kickoff.getTime() <= now.getTime()) report.skipped(`poll:${poll.id}`, 'kickoff-passed');
    else pending.push(poll);
  }

  const channelIds = new Set(pending.map((p) => p.channelId));
  for (const channelId of channelIds) {
    const channel = await store.getChannel(channelId);
    try {
      await chat.sendMessage(channelId, renderAnnouncement(channel?.roleId ?? null));
    } catch (err) {
      logger.warn({ channelId, err: errorMessage(err) }, 'Could not announce new polls');
    }
  }

  for (const poll of pending) {
    await runItem(report, `poll:${poll.id}`, async () => {
      const draft = renderPoll(await loadPollContext(store, poll), now);
      const messageId = await chat.publishPoll(poll.channelId, draft);
      await store.markPollPublished(poll.id, messageId);
    });
  }

  await tidyChannels(store, chat, channelIds);
  return report;
}

/**
 * OPEN (or never published CREATED) -> CLOSED once kickoff has passed.
 * Kickoff is the authority: if ending the poll on the platform fails the
 * failure is logged and the poll is closed locally anyway. All closes of a
 * pass are committed together, then each closed poll gets a last ledger sync.
 */
export async function closePolls(store: Store, chat: ChatPlatform, now: Date): Promise<BatchReport> {
  const report = new BatchReport('close-polls');
  const polls = await store.listPollsToClose(now);

  for (const poll of polls) {
    if (!poll.messageId) continue;
    try {
      await chat.closePoll(poll.channelId, poll.messageId);
    } catch (err) {
      logger.warn({ pollId: poll.id, err: errorMessage(err) }, 'Could not end poll on platform, closing locally');
    }
  }

  await store.transaction(async (tx) => {
    for (const poll of polls) {
      await runIsolated(tx, report, `poll:${poll.id}`, (unit) => unit.markPollClosed(poll.id));
    }
  });

  for (const poll of polls) {
    if (!poll.messageId || report.get(`poll:${poll.id}`)?.status !== 'ok') continue;
    try {
      await syncPollWagers(store, chat, poll);
    } catch (err) {
      logger.error({ pollId: poll.id, err: errorMessage(err) }, 'Final wager sync failed');
    }
  }

  await tidyChannels(store, chat, polls.map((p) => p.channelId));
  return report;
}

async function winnersOf(store: Store, context: PollContext, channelId: string): Promise<User[]> {
  const wagers = await store.listWagers(context.game.id, channelId);
  const winners: User[] = [];
  for (const wager of wagers) {
    if (wager.choice !== context.game.outcome) continue;
    winners.push((await store.getUser(wager.userId)) ?? { id: wager.userId, username: wager.userId });
  }
  return winners;
}

/**
 * CLOSED -> RESULTS_POSTED for closed polls whose game has an outcome. A
 * failed reply leaves the poll for the next pass. Leaderboards are refreshed
 * when at least one result went out.
 */
export async function postResults(store: Store, chat: ChatPlatform, now: Date): Promise<BatchReport> {
  const report = new BatchReport('post-results');

  for (const poll of await store.listPollsAwaitingResults()) {
    await runItem(report, `poll:${poll.id}`, async () => {
      if (!poll.messageId) {
        // Nobody could vote on a poll that was never published.
        await store.markResultPosted(poll.id);
        return 'not-published';
      }

      const context = await loadPollContext(store, poll);
      const message = renderResult(context, await winnersOf(store, context, poll.channelId));
      await chat.replyToMessage(poll.channelId, poll.messageId, message);
      await store.markResultPosted(poll.id);
    });
  }

  if (report.keys('ok').length > 0) {
    const leaderboards = await publishLeaderboards(store, chat, now);
    leaderboards.log(logger.child({ task: 'publish-leaderboards' }));
  }
  return report;
}
