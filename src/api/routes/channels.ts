import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { Store } from '../../db/store.js';
import { seedScalings } from '../../pipeline/seed.js';
import { loadLeaderboard } from '../../results/leaderboard.js';
import { GAME_TYPE_IDS, type Channel } from '../../types/match.js';

const channelParams = z.object({ id: z.string().min(1) });

const scalingParams = z.object({
  id: z.string().min(1),
  gameTypeId: z.string(),
});

const channelBody = z.object({
  name: z.string().min(1),
  roleId: z.string().min(1).nullable().default(null),
  active: z.boolean().default(true),
  deleteResultMsg: z.boolean().default(false),
});

const scalingBody = z.object({
  factor: z.number().int().min(0),
});

const gameTypeId = z.enum(GAME_TYPE_IDS);

export const channelsRoutes: FastifyPluginAsync<{ store: Store }> = async (app, { store }) => {
  // GET /channels: all registered channels
  app.get('/', async () => {
    return { data: await store.listChannels() };
  });

  // PUT /channels/:id: register or update a channel and seed its scalings
  app.put('/:id', async (request, reply) => {
    const { id } = channelParams.parse(request.params);
    const body = channelBody.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send({ error: 'Invalid channel', issues: body.error.issues });
    }

    let channel: Channel | undefined;
    await store.transaction(async (tx) => {
      channel = await tx.upsertChannel({ id, ...body.data });
      await seedScalings(tx, id);
    });
    return { data: channel };
  });

  // PUT /channels/:id/scaling/:gameTypeId: set the points a correct pick is worth
  app.put('/:id/scaling/:gameTypeId', async (request, reply) => {
    const params = scalingParams.parse(request.params);
    const typeId = gameTypeId.safeParse(params.gameTypeId);
    if (!typeId.success) return reply.code(404).send({ error: 'Game type not found' });

    const body = scalingBody.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send({ error: 'Invalid scaling', issues: body.error.issues });
    }

    if (!(await store.getChannel(params.id))) return reply.code(404).send({ error: 'Channel not found' });

    const scaling = { channelId: params.id, gameTypeId: typeId.data, factor: body.data.factor };
    await store.setScalingFactor(scaling);
    return { data: scaling };
  });

  // GET /channels/:id/leaderboard: ranked standings
  app.get('/:id/leaderboard', async (request, reply) => {
    const { id } = channelParams.parse(request.params);
    if (!(await store.getChannel(id))) return reply.code(404).send({ error: 'Channel not found' });

    return { data: await loadLeaderboard(store, id) };
  });
};
