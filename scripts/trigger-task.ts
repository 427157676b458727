/**
 * Manually enqueue one task, e.g. to ingest the schedule right after setup.
 * Usage: npx tsx scripts/trigger-task.ts [task]
 * Default: update-games
 */
import { Queue } from 'bullmq';
import { QUEUE_NAMES, TASK_NAMES, TASK_NAME_LIST, isTaskName } from '../src/scheduler/constants.js';

const task = process.argv[2] ?? TASK_NAMES.UPDATE_GAMES;
if (!isTaskName(task)) {
  console.error(`Unknown task "${task}". Expected one of: ${TASK_NAME_LIST.join(', ')}`);
  process.exit(1);
}

const queue = new Queue(QUEUE_NAMES.TASKS, {
  connection: {
    host: process.env['REDIS_HOST'] ?? '127.0.0.1',
    port: Number(process.env['REDIS_PORT'] ?? 6379),
  },
});

const job = await queue.add(task, {});

console.log(`Enqueued task job: ${job.id}`);
console.log(`  task: ${task}`);
console.log(`\nWatch logs in the running app process.`);

await queue.close();
