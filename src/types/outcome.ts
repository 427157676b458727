export const CHOICES = ['HOME', 'AWAY', 'TIE'] as const;

/** What a participant can pick in a poll. */
export type Choice = (typeof CHOICES)[number];

/** Outcome of a game; NOT_FINISHED until a result is known. */
export type Outcome = Choice | 'NOT_FINISHED';

/**
 * Derive the three-way outcome from a home-minus-away result.
 */
export function outcomeFromResult(result: number | null): Outcome {
  if (result === null) return 'NOT_FINISHED';
  if (result === 0) return 'TIE';
  return result < 0 ? 'AWAY' : 'HOME';
}

export function isChoice(value: string): value is Choice {
  return CHOICES.some((choice) => choice === value);
}
