import type { Store } from '../db/store.js';
import type { Channel, GameType } from '../types/match.js';
import { logger } from '../utils/logger.js';

export const GAME_TYPES: readonly GameType[] = [
  { id: 'REG', name: 'Regular Season' },
  { id: 'WC', name: 'Wild Card Round' },
  { id: 'DIV', name: 'Divisional Round' },
  { id: 'CON', name: 'Conference Championship' },
  { id: 'SB', name: 'Super Bowl' },
];

export async function seedGameTypes(store: Store): Promise<number> {
  let inserted = 0;
  await store.transaction(async (tx) => {
    for (const gameType of GAME_TYPES) {
      if (await tx.insertGameType(gameType)) inserted++;
    }
  });
  return inserted;
}

/**
 * Gives every (channel, game type) pair without a scaling row the default
 * factor of 1. Restrict to one channel by passing its id.
 */
export async function seedScalings(store: Store, channelId?: string): Promise<number> {
  let inserted = 0;
  await store.transaction(async (tx) => {
    const gameTypes = await tx.listGameTypes();
    const channels = channelId
      ? [await tx.getChannel(channelId)].filter((c): c is Channel => c !== null)
      : await tx.listChannels();

    for (const channel of channels) {
      for (const gameType of gameTypes) {
        const created = await tx.insertScalingIfMissing({
          channelId: channel.id,
          gameTypeId: gameType.id,
          factor: 1,
        });
        if (created) inserted++;
      }
    }
  });
  if (inserted > 0) logger.info({ inserted }, 'Seeded game type scalings');
  return inserted;
}
