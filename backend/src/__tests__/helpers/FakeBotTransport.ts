/**
 * In-process stand-in for the Bot API
 *
 * Records every call, hands out increasing message ids and answers
 * membership lookups from a table. Failures are injected per method.
 *
 * @module __tests__/helpers/FakeBotTransport
 */

import type {
  ChatId,
  ChatMemberStatus,
  IBotTransport,
  InlineKeyboardMarkup,
  SendMessageOptions,
  SentMessage,
} from '@/infrastructure/telegram';

type FakeMethod =
  | 'sendMessage'
  | 'editMessageText'
  | 'deleteMessage'
  | 'deleteMessages'
  | 'forwardMessages'
  | 'copyMessages'
  | 'answerCallbackQuery'
  | 'getChatMemberStatus';

export interface SentRecord {
  chatId: ChatId;
  text: string;
  options: SendMessageOptions;
  messageId: number;
}

export interface RelayRecord {
  toChatId: ChatId;
  fromChatId: ChatId;
  messageIds: number[];
  result: number[];
}

export class FakeBotTransport implements IBotTransport {
  readonly sent: SentRecord[] = [];
  readonly edits: Array<{ chatId: ChatId; messageId: number; text: string; replyMarkup?: InlineKeyboardMarkup }> = [];
  readonly deletions: Array<{ chatId: ChatId; messageIds: number[] }> = [];
  readonly forwards: RelayRecord[] = [];
  readonly copies: RelayRecord[] = [];
  readonly answers: Array<{ callbackQueryId: string; text?: string; showAlert?: boolean }> = [];
  readonly memberships = new Map<number, ChatMemberStatus>();

  defaultStatus: ChatMemberStatus = 'member';
  /** Number of trailing items each forward silently skips */
  forwardShortfall = 0;

  private nextMessageId: number;
  private readonly failures = new Map<FakeMethod, Error[]>();

  constructor(firstMessageId: number = 5000) {
    this.nextMessageId = firstMessageId;
  }

  /**
   * Make the next call of `method` throw `error`
   */
  failNext(method: FakeMethod, error: Error): void {
    const queue = this.failures.get(method) ?? [];
    queue.push(error);
    this.failures.set(method, queue);
  }

  textsTo(chatId: ChatId): string[] {
    return this.sent.filter((record) => record.chatId === chatId).map((record) => record.text);
  }

  lastTo(chatId: ChatId): SentRecord | undefined {
    return this.sent.filter((record) => record.chatId === chatId).at(-1);
  }

  async sendMessage(chatId: ChatId, text: string, options: SendMessageOptions = {}): Promise<SentMessage> {
    this.throwIfFailing('sendMessage');
    const messageId = this.nextMessageId++;
    this.sent.push({ chatId, text, options, messageId });
    return { messageId };
  }

  async editMessageText(
    chatId: ChatId,
    messageId: number,
    text: string,
    options: { replyMarkup?: InlineKeyboardMarkup } = {}
  ): Promise<void> {
    this.throwIfFailing('editMessageText');
    this.edits.push({ chatId, messageId, text, replyMarkup: options.replyMarkup });
  }

  async deleteMessage(chatId: ChatId, messageId: number): Promise<void> {
    this.throwIfFailing('deleteMessage');
    this.deletions.push({ chatId, messageIds: [messageId] });
  }

  async deleteMessages(chatId: ChatId, messageIds: readonly number[]): Promise<void> {
    this.throwIfFailing('deleteMessages');
    this.deletions.push({ chatId, messageIds: [...messageIds] });
  }

  async forwardMessages(toChatId: ChatId, fromChatId: ChatId, messageIds: readonly number[]): Promise<number[]> {
    this.throwIfFailing('forwardMessages');
    const kept = messageIds.slice(0, Math.max(0, messageIds.length - this.forwardShortfall));
    const result = kept.map(() => this.nextMessageId++);
    this.forwards.push({ toChatId, fromChatId, messageIds: [...messageIds], result });
    return result;
  }

  async copyMessages(toChatId: ChatId, fromChatId: ChatId, messageIds: readonly number[]): Promise<number[]> {
    this.throwIfFailing('copyMessages');
    const result = messageIds.map(() => this.nextMessageId++);
    this.copies.push({ toChatId, fromChatId, messageIds: [...messageIds], result });
    return result;
  }

  async answerCallbackQuery(callbackQueryId: string, options: { text?: string; showAlert?: boolean } = {}): Promise<void> {
    this.throwIfFailing('answerCallbackQuery');
    this.answers.push({ callbackQueryId, ...options });
  }

  async getChatMemberStatus(_chatId: ChatId, userId: number): Promise<ChatMemberStatus> {
    this.throwIfFailing('getChatMemberStatus');
    return this.memberships.get(userId) ?? this.defaultStatus;
  }

  private throwIfFailing(method: FakeMethod): void {
    const error = this.failures.get(method)?.shift();
    if (error) {
      throw error;
    }
  }
}
