import type { Queue } from 'bullmq';
import { TASK_NAME_LIST, TASK_SCHEDULES } from './constants.js';
import { logger } from '../utils/logger.js';

/**
 * Registers one repeatable job per task. Uses upsertJobScheduler so restarts
 * are idempotent.
 */
export async function startScheduler(queue: Queue): Promise<void> {
  for (const task of TASK_NAME_LIST) {
    const repeat = TASK_SCHEDULES[task];
    await queue.upsertJobScheduler(task, repeat, { name: task, data: {} });
    logger.info({ task, ...repeat }, 'Registered job scheduler');
  }

  logger.info(`Scheduler initialized with ${TASK_NAME_LIST.length} tasks`);
}
