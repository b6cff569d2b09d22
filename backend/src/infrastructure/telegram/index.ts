/**
 * Telegram infrastructure
 * @module infrastructure/telegram
 */

export { TelegramClient, increasingRuns, MAX_IDS_PER_BULK_CALL, type TelegramClientOptions } from './TelegramClient';
export type { ChatId, IBotTransport, SendMessageOptions, SentMessage } from './IBotTransport';
export * from './telegram.types';
