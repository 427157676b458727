import { createServer } from './api/server.js';
import { DiscordClient } from './chat/discord-client.js';
import { parseConfig } from './config.js';
import { createSql } from './db/pool.js';
import { PostgresStore } from './db/queries.js';
import { seedGameTypes, seedScalings } from './pipeline/seed.js';
import { EspnProvider } from './providers/espn.js';
import { NflverseProvider } from './providers/nflverse.js';
import { startScheduler } from './scheduler/index.js';
import { createTaskQueue } from './scheduler/queues.js';
import { createTaskWorker } from './workers/task-worker.js';
import { createTaskHandlers } from './workers/tasks.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  logger.info('Starting gridiron-pickem...');
  const config = parseConfig();

  const sql = createSql(config.DATABASE_URL);
  const store = new PostgresStore(sql);

  // Game types and default scalings must exist before any poll is rendered
  await seedGameTypes(store);
  await seedScalings(store);

  const handlers = createTaskHandlers({
    store,
    chat: new DiscordClient(config.DISCORD_BOT_TOKEN, config.DISCORD_APPLICATION_ID),
    scheduleProvider: new NflverseProvider(config.SCHEDULE_URL, config.TEAMS_URL),
    secondaryProvider: new EspnProvider(),
    secondarySource: 'espn',
    config,
  });

  const connection = { host: config.REDIS_HOST, port: config.REDIS_PORT };
  const queue = createTaskQueue(connection);
  await startScheduler(queue);

  const worker = createTaskWorker(connection, handlers);
  logger.info('Worker started: task-worker');

  const server = await createServer({ store });
  await server.listen({ port: config.PORT, host: '0.0.0.0' });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await server.close();
    await worker.close();
    await queue.close();
    await sql.end();
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  logger.fatal(err, 'Failed to start');
  process.exit(1);
});
