import Fastify from 'fastify';
import type { Store } from '../db/store.js';
import { logger } from '../utils/logger.js';
import { channelsRoutes } from './routes/channels.js';
import { healthRoutes } from './routes/health.js';

export interface ServerOptions {
  store: Store;
}

export async function createServer({ store }: ServerOptions) {
  const app = Fastify({ loggerInstance: logger.child({ module: 'api' }) });

  await app.register(healthRoutes, { store });
  await app.register(channelsRoutes, { prefix: '/channels', store });

  return app;
}
