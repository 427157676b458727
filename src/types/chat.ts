/**
 * The chat platform as seen by the poll lifecycle. Every method may reject
 * with a TransientIoError; callers treat that as retryable.
 */

export type ChatEmoji = { id: string } | { name: string };

export interface PollOption {
  text: string;
  emoji: ChatEmoji | null;
}

export interface PollDraft {
  question: string;
  options: PollOption[];
  /** Message posted together with the poll. */
  content: string;
  durationMs: number;
}

export interface EmbedField {
  name: string;
  value: string;
  inline: boolean;
}

export interface Embed {
  title: string;
  description?: string;
  /** 0xRRGGBB */
  color: number;
  fields: EmbedField[];
  thumbnailUrl?: string;
  timestamp?: Date;
}

export interface ChatMessage {
  content?: string;
  embed?: Embed;
  /** User ids that may be pinged. Nobody is pinged when omitted. */
  mentionUsers?: string[];
  /** Role ids that may be pinged. */
  mentionRoles?: string[];
}

export interface PollVote {
  userId: string;
  username: string;
  /** Zero-based position of the option in the published poll. */
  optionIndex: number;
}

export interface AppEmoji {
  id: string;
  name: string;
}

export interface ChatPlatform {
  publishPoll(channelId: string, poll: PollDraft): Promise<string>;
  closePoll(channelId: string, messageId: string): Promise<void>;
  fetchCurrentVoters(channelId: string, messageId: string): Promise<PollVote[]>;
  sendMessage(channelId: string, message: ChatMessage): Promise<string>;
  replyToMessage(channelId: string, messageId: string, message: ChatMessage): Promise<string>;
  editMessage(channelId: string, messageId: string, message: ChatMessage): Promise<void>;
  /** Deletes the platform's own notices (pins, ended polls) authored by the bot. */
  purgeSystemMessages(channelId: string): Promise<number>;
  listEmojis(): Promise<AppEmoji[]>;
  createEmoji(name: string, imageUrl: string): Promise<AppEmoji>;
}
