import type {
  AppEmoji,
  ChatMessage,
  ChatPlatform,
  PollDraft,
  PollVote,
} from '../../src/types/chat.js';
import { TransientIoError } from '../../src/utils/errors.js';

type Method = keyof ChatPlatform;

export interface SentMessage {
  channelId: string;
  messageId: string;
  replyTo: string | null;
  message: ChatMessage;
}

/**
 * Chat platform that keeps everything in memory. Message ids are "m1", "m2"…
 * in the order messages were created. `failOn` makes a method reject with a
 * TransientIoError until cleared.
 */
export class FakeChat implements ChatPlatform {
  readonly polls = new Map<string, { channelId: string; draft: PollDraft; closed: boolean }>();
  readonly messages: SentMessage[] = [];
  readonly edits: { channelId: string; messageId: string; message: ChatMessage }[] = [];
  readonly voters = new Map<string, PollVote[]>();
  readonly emojis: AppEmoji[] = [];
  readonly createdEmojis: { name: string; imageUrl: string }[] = [];
  readonly purged: string[] = [];
  readonly failing = new Set<Method>();
  private nextId = 1;

  failOn(...methods: Method[]): this {
    for (const method of methods) this.failing.add(method);
    return this;
  }

  private guard(method: Method): void {
    if (this.failing.has(method)) throw new TransientIoError(method, 'simulated outage', 503);
  }

  setVoters(messageId: string, votes: PollVote[]): void {
    this.voters.set(messageId, votes);
  }

  async publishPoll(channelId: string, poll: PollDraft): Promise<string> {
    this.guard('publishPoll');
    const messageId = `m${this.nextId++}`;
    this.polls.set(messageId, { channelId, draft: poll, closed: false });
    return messageId;
  }

  async closePoll(_channelId: string, messageId: string): Promise<void> {
    this.guard('closePoll');
    const poll = this.polls.get(messageId);
    if (poll) poll.closed = true;
  }

  async fetchCurrentVoters(_channelId: string, messageId: string): Promise<PollVote[]> {
    this.guard('fetchCurrentVoters');
    return [...(this.voters.get(messageId) ?? [])];
  }

  async sendMessage(channelId: string, message: ChatMessage): Promise<string> {
    this.guard('sendMessage');
    const messageId = `m${this.nextId++}`;
    this.messages.push({ channelId, messageId, replyTo: null, message });
    return messageId;
  }

  async replyToMessage(channelId: string, messageId: string, message: ChatMessage): Promise<string> {
    this.guard('replyToMessage');
    const replyId = `m${this.nextId++}`;
    this.messages.push({ channelId, messageId: replyId, replyTo: messageId, message });
    return replyId;
  }

  async editMessage(channelId: string, messageId: string, message: ChatMessage): Promise<void> {
    this.guard('editMessage');
    this.edits.push({ channelId, messageId, message });
  }

  async purgeSystemMessages(channelId: string): Promise<number> {
    this.guard('purgeSystemMessages');
    this.purged.push(channelId);
    return 0;
  }

  async listEmojis(): Promise<AppEmoji[]> {
    this.guard('listEmojis');
    return [...this.emojis];
  }

  async createEmoji(name: string, imageUrl: string): Promise<AppEmoji> {
    this.guard('createEmoji');
    const emoji = { id: `e${this.nextId++}`, name };
    this.emojis.push(emoji);
    this.createdEmojis.push({ name, imageUrl });
    return emoji;
  }
}
