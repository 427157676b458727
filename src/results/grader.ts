import type { Store } from '../db/store.js';
import type { GameTypeId, GameTypeScaling } from '../types/match.js';
import type { Choice, Outcome } from '../types/outcome.js';

export const DEFAULT_SCALING_FACTOR = 1;

export type ScalingLookup = (channelId: string, gameTypeId: GameTypeId) => number;

/** A correct pick earns the scaling factor; anything else, or an unfinished game, earns 0. */
export function earnedPoints(choice: Choice, outcome: Outcome, factor: number): number {
  if (outcome === 'NOT_FINISHED') return 0;
  return choice === outcome ? factor : 0;
}

export function createScalingLookup(scalings: GameTypeScaling[]): ScalingLookup {
  const factors = new Map<string, number>();
  for (const s of scalings) factors.set(`${s.channelId}:${s.gameTypeId}`, s.factor);
  return (channelId, gameTypeId) => factors.get(`${channelId}:${gameTypeId}`) ?? DEFAULT_SCALING_FACTOR;
}

export async function scalingFactor(store: Store, channelId: string, gameTypeId: GameTypeId): Promise<number> {
  return (await store.getScalingFactor(channelId, gameTypeId)) ?? DEFAULT_SCALING_FACTOR;
}

export function pointsLabel(points: number): string {
  return `${points} point${points === 1 ? '' : 's'}`;
}
