/**
 * An external call (chat platform, data provider) failed. The item is left in
 * its last known good state and retried next cycle.
 */
export class TransientIoError extends Error {
  constructor(
    public readonly operation: string,
    message: string,
    public readonly statusCode?: number,
  ) {
    super(`${operation}: ${message}`);
    this.name = 'TransientIoError';
  }
}

/** A single record breaks a data invariant; only that record is abandoned. */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
