import type { IBotTransport } from '@/infrastructure/telegram';
import type { IUploadNotifier } from '@/domains/upload-session';
import { MESSAGES, itemsOrphanedText } from './messages';

export class TelegramUploadNotifier implements IUploadNotifier {
  constructor(private readonly transport: Pick<IBotTransport, 'sendMessage'>) {}

  async itemReceived(chatId: number, grouped: boolean): Promise<void> {
    await this.transport.sendMessage(chatId, grouped ? MESSAGES.ALBUM_RECEIVED : MESSAGES.FILE_RECEIVED);
  }

  async relayFailed(chatId: number): Promise<void> {
    await this.transport.sendMessage(chatId, MESSAGES.RELAY_FAILED);
  }

  async itemsOrphaned(chatId: number, count: number): Promise<void> {
    await this.transport.sendMessage(chatId, itemsOrphanedText(count));
  }
}
