import type { PollWithGame, Store } from '../db/store.js';
import { BatchReport, runItem } from '../pipeline/batch.js';
import type { ChatPlatform, PollVote } from '../types/chat.js';
import type { GameTypeId } from '../types/match.js';
import type { Choice } from '../types/outcome.js';
import { InvariantViolationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { choiceForOption } from './render.js';

export interface ObservedVote {
  userId: string;
  username: string;
  choice: Choice;
}

export interface LedgerChanges {
  inserted: number;
  updated: number;
  unchanged: number;
  deleted: number;
}

/** Translates option positions back into choices for a poll of the given game type. */
export function votesToChoices(votes: PollVote[], gameTypeId: GameTypeId): ObservedVote[] {
  return votes.map((vote) => {
    const choice = choiceForOption(gameTypeId, vote.optionIndex);
    if (!choice) {
      throw new InvariantViolationError(
        `Vote by ${vote.userId} for option ${vote.optionIndex} which a ${gameTypeId} poll does not have`,
      );
    }
    return { userId: vote.userId, username: vote.username, choice };
  });
}

/**
 * Brings the wagers of one (game, channel) into exact correspondence with the
 * observed voters: new voters get a wager, changed choices are overwritten,
 * and wagers of users who are no longer voting are deleted. Running it again
 * with the same votes changes nothing.
 */
export async function reconcileWagers(
  store: Store,
  target: { gameId: string; channelId: string },
  votes: ObservedVote[],
): Promise<LedgerChanges> {
  const changes: LedgerChanges = { inserted: 0, updated: 0, unchanged: 0, deleted: 0 };

  const observed = new Map<string, ObservedVote>();
  for (const vote of votes) observed.set(vote.userId, vote);

  await store.transaction(async (tx) => {
    const existing = new Map((await tx.listWagers(target.gameId, target.channelId)).map((w) => [w.userId, w]));

    for (const vote of observed.values()) {
      await tx.insertUserIfMissing({ id: vote.userId, username: vote.username });

      const previous = existing.get(vote.userId);
      if (previous?.choice === vote.choice) {
        changes.unchanged++;
        continue;
      }
      await tx.upsertWager({
        userId: vote.userId,
        gameId: target.gameId,
        channelId: target.channelId,
        choice: vote.choice,
      });
      if (previous) changes.updated++;
      else changes.inserted++;
    }

    for (const wager of existing.values()) {
      if (observed.has(wager.userId)) continue;
      await tx.deleteWager(wager.id);
      changes.deleted++;
    }
  });

  return changes;
}

export async function syncPollWagers(store: Store, chat: ChatPlatform, poll: PollWithGame): Promise<LedgerChanges> {
  if (!poll.messageId) throw new InvariantViolationError(`Poll ${poll.id} has not been published`);

  const votes = await chat.fetchCurrentVoters(poll.channelId, poll.messageId);
  const changes = await reconcileWagers(store, poll, votesToChoices(votes, poll.gameTypeId));
  logger.debug({ pollId: poll.id, ...changes }, 'Wagers reconciled');
  return changes;
}

/** Reconciles the ledger of every published poll that is still open. */
export async function syncWagers(store: Store, chat: ChatPlatform): Promise<BatchReport> {
  const report = new BatchReport('sync-wagers');
  for (const poll of await store.listOpenPolls()) {
    await runItem(report, `poll:${poll.id}`, async () => {
      await syncPollWagers(store, chat, poll);
    });
  }
  return report;
}
