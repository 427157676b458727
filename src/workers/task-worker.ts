import { Worker, type Job } from 'bullmq';
import { QUEUE_NAMES, isTaskName, type TaskName } from '../scheduler/constants.js';
import type { RedisConnection } from '../scheduler/queues.js';
import type { BatchSummary } from '../pipeline/batch.js';
import { logger } from '../utils/logger.js';
import type { TaskHandler } from './tasks.js';

/**
 * Runs scheduled tasks one at a time so two passes never interleave their
 * writes to the same polls.
 */
export function createTaskWorker(
  connection: RedisConnection,
  handlers: Record<TaskName, TaskHandler>,
): Worker<unknown, BatchSummary> {
  const worker = new Worker<unknown, BatchSummary>(
    QUEUE_NAMES.TASKS,
    async (job: Job<unknown, BatchSummary>) => {
      const task = job.name;
      if (!isTaskName(task)) throw new Error(`Unknown task: ${task}`);
      const log = logger.child({ job: job.id, task });

      const started = Date.now();
      const summary = await handlers[task](new Date());
      log.debug({ ms: Date.now() - started }, 'Task finished');
      return summary;
    },
    { connection, concurrency: 1 },
  );

  worker.on('failed', (job, err) => {
    logger.error({ job: job?.id, task: job?.name, err: err.message }, 'Task failed');
  });

  return worker;
}
