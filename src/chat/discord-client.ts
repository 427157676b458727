import { request } from 'undici';
import { z } from 'zod';
import { fetchBytes } from '../providers/http-client.js';
import type {
  AppEmoji,
  ChatEmoji,
  ChatMessage,
  ChatPlatform,
  Embed,
  PollDraft,
  PollVote,
} from '../types/chat.js';
import { TransientIoError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const DISCORD_API = 'https://discord.com/api/v10';

const MESSAGE_TYPE_PIN_NOTICE = 6;
const MESSAGE_TYPE_POLL_RESULT = 46;
const SYSTEM_MESSAGE_TYPES: ReadonlySet<number> = new Set([MESSAGE_TYPE_PIN_NOTICE, MESSAGE_TYPE_POLL_RESULT]);

/** Discord takes poll duration in whole hours, at most 32 days. */
const MIN_POLL_HOURS = 1;
const MAX_POLL_HOURS = 768;
const VOTERS_PAGE_SIZE = 100;
const PURGE_SCAN_LIMIT = 50;

const log = logger.child({ module: 'discord' });

const messageSchema = z.object({
  id: z.string(),
  type: z.number(),
  author: z.object({ id: z.string() }),
  poll: z
    .object({ answers: z.array(z.object({ answer_id: z.number() })) })
    .optional(),
});

const votersSchema = z.object({
  users: z.array(z.object({ id: z.string(), username: z.string() })),
});

const emojiSchema = z.object({ id: z.string(), name: z.string() });
const emojiListSchema = z.object({ items: z.array(emojiSchema) });

type Method = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export function pollDurationHours(durationMs: number): number {
  const hours = Math.ceil(durationMs / 3_600_000);
  return Math.min(MAX_POLL_HOURS, Math.max(MIN_POLL_HOURS, hours));
}

function emojiPayload(emoji: ChatEmoji | null) {
  if (!emoji) return undefined;
  return 'id' in emoji ? { id: emoji.id } : { name: emoji.name };
}

function embedPayload(embed: Embed) {
  return {
    title: embed.title,
    description: embed.description,
    color: embed.color,
    fields: embed.fields,
    thumbnail: embed.thumbnailUrl ? { url: embed.thumbnailUrl } : undefined,
    timestamp: embed.timestamp?.toISOString(),
  };
}

export function messagePayload(message: ChatMessage) {
  return {
    content: message.content,
    embeds: message.embed ? [embedPayload(message.embed)] : undefined,
    allowed_mentions: {
      parse: [],
      users: message.mentionUsers ?? [],
      roles: message.mentionRoles ?? [],
    },
  };
}

/** Discord REST client for a bot application. */
export class DiscordClient implements ChatPlatform {
  constructor(
    private readonly token: string,
    private readonly applicationId: string,
    private readonly baseUrl = DISCORD_API,
  ) {}

  private async call(method: Method, path: string, operation: string, payload?: unknown): Promise<unknown> {
    const { statusCode, body } = await request(`${this.baseUrl}${path}`, {
      method,
      headers: {
        Authorization: `Bot ${this.token}`,
        'Content-Type': 'application/json',
        'User-Agent': 'gridiron-pickem/0.1',
      },
      body: payload === undefined ? undefined : JSON.stringify(payload),
      headersTimeout: 15000,
      bodyTimeout: 30000,
    }).catch((err: unknown) => {
      throw new TransientIoError(operation, errorMessage(err));
    });

    if (statusCode < 200 || statusCode >= 300) {
      const detail = await body.text().catch(() => '');
      throw new TransientIoError(operation, `HTTP ${statusCode} ${detail.slice(0, 200)}`, statusCode);
    }
    if (statusCode === 204) {
      await body.dump();
      return null;
    }
    return body.json();
  }

  private async postMessage(channelId: string, payload: object, operation: string): Promise<string> {
    const data = await this.call('POST', `/channels/${channelId}/messages`, operation, payload);
    return messageSchema.parse(data).id;
  }

  async publishPoll(channelId: string, poll: PollDraft): Promise<string> {
    const messageId = await this.postMessage(
      channelId,
      {
        content: poll.content,
        allowed_mentions: { parse: [] },
        poll: {
          question: { text: poll.question },
          answers: poll.options.map((option) => ({
            poll_media: { text: option.text, emoji: emojiPayload(option.emoji) },
          })),
          duration: pollDurationHours(poll.durationMs),
          allow_multiselect: false,
        },
      },
      'publish-poll',
    );

    try {
      await this.call('PUT', `/channels/${channelId}/pins/${messageId}`, 'pin-poll');
    } catch (err) {
      log.warn({ channelId, messageId, err: errorMessage(err) }, 'Could not pin poll');
    }
    return messageId;
  }

  /** Unpins even when ending the poll fails, e.g. because it already ended. */
  async closePoll(channelId: string, messageId: string): Promise<void> {
    try {
      await this.call('POST', `/channels/${channelId}/polls/${messageId}/expire`, 'close-poll');
    } finally {
      try {
        await this.call('DELETE', `/channels/${channelId}/pins/${messageId}`, 'unpin-poll');
      } catch (err) {
        log.warn({ channelId, messageId, err: errorMessage(err) }, 'Could not unpin poll');
      }
    }
  }

  async fetchCurrentVoters(channelId: string, messageId: string): Promise<PollVote[]> {
    const message = messageSchema.parse(
      await this.call('GET', `/channels/${channelId}/messages/${messageId}`, 'fetch-poll'),
    );
    if (!message.poll) throw new TransientIoError('fetch-poll', `Message ${messageId} carries no poll`);

    const votes: PollVote[] = [];
    for (const [optionIndex, answer] of message.poll.answers.entries()) {
      let after: string | undefined;
      for (;;) {
        const query = new URLSearchParams({ limit: String(VOTERS_PAGE_SIZE) });
        if (after) query.set('after', after);
        const page = votersSchema.parse(
          await this.call(
            'GET',
            `/channels/${channelId}/polls/${messageId}/answers/${answer.answer_id}?${query.toString()}`,
            'fetch-voters',
          ),
        );
        for (const user of page.users) votes.push({ userId: user.id, username: user.username, optionIndex });

        const last = page.users.at(-1);
        if (!last || page.users.length < VOTERS_PAGE_SIZE) break;
        after = last.id;
      }
    }
    return votes;
  }

  sendMessage(channelId: string, message: ChatMessage): Promise<string> {
    return this.postMessage(channelId, messagePayload(message), 'send-message');
  }

  replyToMessage(channelId: string, messageId: string, message: ChatMessage): Promise<string> {
    return this.postMessage(
      channelId,
      { ...messagePayload(message), message_reference: { message_id: messageId, fail_if_not_exists: false } },
      'reply-message',
    );
  }

  async editMessage(channelId: string, messageId: string, message: ChatMessage): Promise<void> {
    await this.call('PATCH', `/channels/${channelId}/messages/${messageId}`, 'edit-message', messagePayload(message));
  }

  async purgeSystemMessages(channelId: string): Promise<number> {
    const recent = z
      .array(messageSchema)
      .parse(await this.call('GET', `/channels/${channelId}/messages?limit=${PURGE_SCAN_LIMIT}`, 'list-messages'));

    let deleted = 0;
    for (const message of recent) {
      if (!SYSTEM_MESSAGE_TYPES.has(message.type) || message.author.id !== this.applicationId) continue;
      await this.call('DELETE', `/channels/${channelId}/messages/${message.id}`, 'delete-message');
      deleted++;
    }
    return deleted;
  }

  async listEmojis(): Promise<AppEmoji[]> {
    const data = await this.call('GET', `/applications/${this.applicationId}/emojis`, 'list-emojis');
    return emojiListSchema.parse(data).items;
  }

  async createEmoji(name: string, imageUrl: string): Promise<AppEmoji> {
    const image = await fetchBytes(imageUrl, 'fetch-emoji-image');
    const data = await this.call('POST', `/applications/${this.applicationId}/emojis`, 'create-emoji', {
      name,
      image: `data:image/png;base64,${image.toString('base64')}`,
    });
    return emojiSchema.parse(data);
  }
}
