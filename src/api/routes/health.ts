import type { FastifyPluginAsync } from 'fastify';
import type { Store } from '../../db/store.js';

export const healthRoutes: FastifyPluginAsync<{ store: Store }> = async (app, { store }) => {
  app.get('/health', async () => {
    const dbUp = await store.ping().catch(() => false);
    return {
      status: dbUp ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      services: {
        database: dbUp ? 'up' : 'down',
      },
    };
  });
};
