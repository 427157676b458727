import { Queue } from 'bullmq';
import { QUEUE_NAMES } from './constants.js';

export interface RedisConnection {
  host: string;
  port: number;
}

/**
 * Every pass is idempotent, so a failed job is retried once and otherwise
 * left to the next scheduled run.
 */
export function createTaskQueue(connection: RedisConnection): Queue {
  return new Queue(QUEUE_NAMES.TASKS, {
    connection,
    defaultJobOptions: {
      attempts: 2,
      backoff: { type: 'fixed', delay: 2000 },
      removeOnComplete: { count: 500 },
      removeOnFail: { count: 2000 },
    },
  });
}
