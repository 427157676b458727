import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer } from '../../src/api/server.js';
import { storeWithTeams } from '../helpers/builders.js';
import type { MemoryStore } from '../helpers/memory-store.js';

describe('channel routes', () => {
  let store: MemoryStore;
  let app: Awaited<ReturnType<typeof createServer>>;

  beforeEach(async () => {
    store = await storeWithTeams();
    app = await createServer({ store });
  });

  afterEach(async () => {
    await app.close();
  });

  it('registers a channel with defaults and seeds its scalings', async () => {
    const res = await app.inject({ method: 'PUT', url: '/channels/c1', payload: { name: 'picks' } });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      data: {
        id: 'c1',
        name: 'picks',
        roleId: null,
        active: true,
        deleteResultMsg: false,
        leaderboardMessageId: null,
      },
    });
    expect(await store.listScalings('c1')).toHaveLength(5);
  });

  it('rejects a channel without a name', async () => {
    const res = await app.inject({ method: 'PUT', url: '/channels/c1', payload: { active: false } });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: 'Invalid channel' });
    expect(await store.getChannel('c1')).toBeNull();
  });

  it('lists channels by name', async () => {
    await app.inject({ method: 'PUT', url: '/channels/c2', payload: { name: 'zebra' } });
    await app.inject({ method: 'PUT', url: '/channels/c1', payload: { name: 'alpha' } });

    const res = await app.inject({ method: 'GET', url: '/channels' });

    expect(res.json().data.map((c: { id: string }) => c.id)).toEqual(['c1', 'c2']);
  });

  it('updates a scaling factor', async () => {
    await app.inject({ method: 'PUT', url: '/channels/c1', payload: { name: 'picks' } });

    const res = await app.inject({ method: 'PUT', url: '/channels/c1/scaling/SB', payload: { factor: 5 } });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ data: { channelId: 'c1', gameTypeId: 'SB', factor: 5 } });
    expect(await store.getScalingFactor('c1', 'SB')).toBe(5);
    expect(await store.getScalingFactor('c1', 'REG')).toBe(1);
  });

  it('rejects unknown game types, negative factors and unknown channels', async () => {
    await app.inject({ method: 'PUT', url: '/channels/c1', payload: { name: 'picks' } });

    const badType = await app.inject({ method: 'PUT', url: '/channels/c1/scaling/XX', payload: { factor: 2 } });
    const badFactor = await app.inject({ method: 'PUT', url: '/channels/c1/scaling/REG', payload: { factor: -1 } });
    const noChannel = await app.inject({ method: 'PUT', url: '/channels/c9/scaling/REG', payload: { factor: 2 } });

    expect(badType.statusCode).toBe(404);
    expect(badFactor.statusCode).toBe(400);
    expect(noChannel.statusCode).toBe(404);
    expect(noChannel.json()).toEqual({ error: 'Channel not found' });
  });

  it('returns an empty leaderboard for a new channel and 404 for an unknown one', async () => {
    await app.inject({ method: 'PUT', url: '/channels/c1', payload: { name: 'picks' } });

    const known = await app.inject({ method: 'GET', url: '/channels/c1/leaderboard' });
    const unknown = await app.inject({ method: 'GET', url: '/channels/c9/leaderboard' });

    expect(known.json()).toEqual({ data: [] });
    expect(unknown.statusCode).toBe(404);
  });
});
