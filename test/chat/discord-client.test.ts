import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher, type Dispatcher } from 'undici';
import { DiscordClient, messagePayload, pollDurationHours } from '../../src/chat/discord-client.js';

const ORIGIN = 'https://discord.test';

function message(id: string, type = 0, authorId = 'app-1') {
  return { id, type, author: { id: authorId } };
}

describe('pollDurationHours', () => {
  it('rounds up to whole hours', () => {
    expect(pollDurationHours(90 * 60 * 1000)).toBe(2);
    expect(pollDurationHours(3 * 3_600_000)).toBe(3);
  });

  it('clamps to the platform limits', () => {
    expect(pollDurationHours(0)).toBe(1);
    expect(pollDurationHours(-5000)).toBe(1);
    expect(pollDurationHours(40 * 24 * 3_600_000)).toBe(768);
  });
});

describe('messagePayload', () => {
  it('allows only the listed mentions', () => {
    expect(messagePayload({ content: 'hi', mentionUsers: ['u1'] })).toEqual({
      content: 'hi',
      embeds: undefined,
      allowed_mentions: { parse: [], users: ['u1'], roles: [] },
    });
  });

  it('converts an embed', () => {
    const payload = messagePayload({
      embed: {
        title: 'Standings',
        color: 0x013369,
        fields: [{ name: '1. alice', value: '3 pts', inline: false }],
        thumbnailUrl: 'https://img.test/kc.png',
        timestamp: new Date('2025-09-07T17:00:00Z'),
      },
    });

    expect(payload.embeds).toEqual([
      {
        title: 'Standings',
        description: undefined,
        color: 0x013369,
        fields: [{ name: '1. alice', value: '3 pts', inline: false }],
        thumbnail: { url: 'https://img.test/kc.png' },
        timestamp: '2025-09-07T17:00:00.000Z',
      },
    ]);
  });
});

describe('DiscordClient', () => {
  let original: Dispatcher;
  let agent: MockAgent;
  const client = new DiscordClient('test-token', 'app-1', `${ORIGIN}/api`);

  beforeEach(() => {
    original = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
  });

  afterEach(async () => {
    setGlobalDispatcher(original);
    await agent.close();
  });

  it('publishes a single-choice poll and pins it', async () => {
    let sent: unknown;
    const pool = agent.get(ORIGIN);
    pool
      .intercept({
        path: '/api/channels/c1/messages',
        method: 'POST',
        body: (raw) => {
          sent = JSON.parse(raw);
          return true;
        },
      })
      .reply(200, message('p1'));
    pool.intercept({ path: '/api/channels/c1/pins/p1', method: 'PUT' }).reply(204, '');

    const id = await client.publishPoll('c1', {
      question: 'KC @ BUF',
      content: '<@&r1>',
      durationMs: 2 * 3_600_000,
      options: [
        { text: 'KC', emoji: { id: 'e1' } },
        { text: 'BUF', emoji: null },
      ],
    });

    expect(id).toBe('p1');
    expect(sent).toEqual({
      content: '<@&r1>',
      allowed_mentions: { parse: [] },
      poll: {
        question: { text: 'KC @ BUF' },
        answers: [{ poll_media: { text: 'KC', emoji: { id: 'e1' } } }, { poll_media: { text: 'BUF' } }],
        duration: 2,
        allow_multiselect: false,
      },
    });
  });

  it('keeps a published poll when pinning fails', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: '/api/channels/c1/messages', method: 'POST' }).reply(200, message('p2'));
    pool.intercept({ path: '/api/channels/c1/pins/p2', method: 'PUT' }).reply(403, { message: 'Missing Permissions' });

    const id = await client.publishPoll('c1', { question: 'q', content: '', durationMs: 1000, options: [] });

    expect(id).toBe('p2');
  });

  it('expires and unpins a poll', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: '/api/channels/c1/polls/p1/expire', method: 'POST' }).reply(200, message('p1'));
    pool.intercept({ path: '/api/channels/c1/pins/p1', method: 'DELETE' }).reply(204, '');

    await expect(client.closePoll('c1', 'p1')).resolves.toBeUndefined();
  });

  it('still unpins a poll that cannot be expired', async () => {
    const pool = agent.get(ORIGIN);
    pool
      .intercept({ path: '/api/channels/c1/polls/p1/expire', method: 'POST' })
      .reply(400, { message: 'This poll has already expired.' });
    pool.intercept({ path: '/api/channels/c1/pins/p1', method: 'DELETE' }).reply(204, '');

    await expect(client.closePoll('c1', 'p1')).rejects.toMatchObject({ operation: 'close-poll', statusCode: 400 });
    expect(() => agent.assertNoPendingInterceptors()).not.toThrow();
  });

  it('reports a rejected request as a transient failure', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/channels/c1/messages', method: 'POST' })
      .reply(429, { message: 'You are being rate limited.' });

    await expect(client.sendMessage('c1', { content: 'hi' })).rejects.toMatchObject({
      name: 'TransientIoError',
      operation: 'send-message',
      statusCode: 429,
    });
  });

  it('lists voters per answer in option order', async () => {
    const pool = agent.get(ORIGIN);
    pool
      .intercept({ path: '/api/channels/c1/messages/p1', method: 'GET' })
      .reply(200, { ...message('p1'), poll: { answers: [{ answer_id: 1 }, { answer_id: 2 }] } });
    pool
      .intercept({ path: '/api/channels/c1/polls/p1/answers/1?limit=100', method: 'GET' })
      .reply(200, { users: [{ id: 'u2', username: 'bob' }] });
    pool
      .intercept({ path: '/api/channels/c1/polls/p1/answers/2?limit=100', method: 'GET' })
      .reply(200, {
        users: [
          { id: 'u1', username: 'alice' },
          { id: 'u3', username: 'carol' },
        ],
      });

    expect(await client.fetchCurrentVoters('c1', 'p1')).toEqual([
      { userId: 'u2', username: 'bob', optionIndex: 0 },
      { userId: 'u1', username: 'alice', optionIndex: 1 },
      { userId: 'u3', username: 'carol', optionIndex: 1 },
    ]);
  });

  it('follows voter pages until a short page', async () => {
    const fullPage = Array.from({ length: 100 }, (_, i) => ({ id: `u${i + 1}`, username: `user${i + 1}` }));
    const pool = agent.get(ORIGIN);
    pool
      .intercept({ path: '/api/channels/c1/messages/p1', method: 'GET' })
      .reply(200, { ...message('p1'), poll: { answers: [{ answer_id: 1 }] } });
    pool
      .intercept({ path: '/api/channels/c1/polls/p1/answers/1?limit=100', method: 'GET' })
      .reply(200, { users: fullPage });
    pool
      .intercept({ path: '/api/channels/c1/polls/p1/answers/1?limit=100&after=u100', method: 'GET' })
      .reply(200, { users: [{ id: 'u101', username: 'user101' }] });

    const votes = await client.fetchCurrentVoters('c1', 'p1');

    expect(votes).toHaveLength(101);
    expect(votes.at(-1)).toEqual({ userId: 'u101', username: 'user101', optionIndex: 0 });
  });

  it('deletes only its own pin and poll-result notices', async () => {
    const pool = agent.get(ORIGIN);
    pool
      .intercept({ path: '/api/channels/c1/messages?limit=50', method: 'GET' })
      .reply(200, [message('n1', 6), message('n2', 0), message('n3', 46), message('n4', 6, 'someone-else')]);
    pool.intercept({ path: '/api/channels/c1/messages/n1', method: 'DELETE' }).reply(204, '');
    pool.intercept({ path: '/api/channels/c1/messages/n3', method: 'DELETE' }).reply(204, '');

    expect(await client.purgeSystemMessages('c1')).toBe(2);
  });

  it('lists application emojis', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/api/applications/app-1/emojis', method: 'GET' })
      .reply(200, { items: [{ id: 'e1', name: 'KC', roles: [] }] });

    expect(await client.listEmojis()).toEqual([{ id: 'e1', name: 'KC' }]);
  });
});
