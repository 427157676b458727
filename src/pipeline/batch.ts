import type { Store } from '../db/store.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export const SKIP_REASONS = [
  'exists',
  'already-mapped',
  'unresolved-team',
  'unmatched',
  'unknown-game-type',
  'kickoff-passed',
  'not-published',
] as const;

export type SkipReason = (typeof SKIP_REASONS)[number];

export type ItemResult =
  | { key: string; status: 'ok' }
  | { key: string; status: 'skipped'; reason: SkipReason }
  | { key: string; status: 'failed'; error: string };

export interface BatchSummary {
  task: string;
  ok: number;
  skipped: number;
  failed: number;
}

/**
 * Per-item outcomes of one task invocation. Items never throw past the
 * report, so one bad record cannot abort the batch.
 */
export class BatchReport {
  readonly items: ItemResult[] = [];

  constructor(readonly task: string) {}

  ok(key: string): void {
    this.items.push({ key, status: 'ok' });
  }

  skipped(key: string, reason: SkipReason): void {
    this.items.push({ key, status: 'skipped', reason });
  }

  failed(key: string, err: unknown): void {
    this.items.push({ key, status: 'failed', error: errorMessage(err) });
  }

  get(key: string): ItemResult | undefined {
    return this.items.find((item) => item.key === key);
  }

  keys(status: ItemResult['status']): string[] {
    return this.items.filter((item) => item.status === status).map((item) => item.key);
  }

  summary(): BatchSummary {
    const summary: BatchSummary = { task: this.task, ok: 0, skipped: 0, failed: 0 };
    for (const item of this.items) summary[item.status]++;
    return summary;
  }

  log(log: Logger): void {
    for (const item of this.items) {
      if (item.status === 'failed') log.error({ key: item.key, err: item.error }, 'Item failed');
      else if (item.status === 'skipped') log.debug({ key: item.key, reason: item.reason }, 'Item skipped');
    }
    log.info(this.summary(), 'Batch complete');
  }
}

/**
 * Runs one item and records its result. The callback returns a reason to
 * record a skip; a thrown error is recorded as a failure.
 */
export async function runItem(
  report: BatchReport,
  key: string,
  work: () => Promise<SkipReason | void>,
): Promise<void> {
  try {
    const reason = await work();
    if (reason) report.skipped(key, reason);
    else report.ok(key);
  } catch (err) {
    report.failed(key, err);
  }
}

/**
 * `runItem` for work that writes inside a batch transaction. The item runs in
 * a savepoint, so a failed item rolls back its own writes only and the items
 * around it still commit.
 */
export async function runIsolated(
  store: Store,
  report: BatchReport,
  key: string,
  work: (tx: Store) => Promise<SkipReason | void>,
): Promise<void> {
  await runItem(report, key, async () => {
    const result: { reason: SkipReason | void } = { reason: undefined };
    await store.savepoint(async (tx) => {
      result.reason = await work(tx);
    });
    return result.reason;
  });
}
