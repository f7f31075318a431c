import { Telegram, TelegramError } from 'telegraf';
import { AudioFile, DeliveryChannel, MessageOptions } from './deliveryChannel';
import { MembershipChecker } from './accessGate';

const MEMBER_STATUSES = new Set(['member', 'administrator', 'creator']);

function extra(options: MessageOptions = {}) {
  return {
    parse_mode: options.markdown ? ('Markdown' as const) : undefined,
    reply_markup: options.keyboard,
    link_preview_options: options.disablePreview ? { is_disabled: true } : undefined,
  };
}

/**
 * DeliveryChannel backed by the Bot API client.  Local files are uploaded as
 * streams through telegraf's `{ source }` input.
 */
export class TelegramDeliveryService implements DeliveryChannel, MembershipChecker {
  constructor(private readonly telegram: Telegram) {}

  async sendText(chatId: number, text: string, options?: MessageOptions): Promise<number> {
    const message = await this.telegram.sendMessage(chatId, text, extra(options));
    return message.message_id;
  }

  async editText(chatId: number, messageId: number, text: string, options?: MessageOptions): Promise<void> {
    try {
      await this.telegram.editMessageText(chatId, messageId, undefined, text, extra(options));
    } catch (err) {
      // Editing to identical content is reported as an error by the Bot API
      if (err instanceof TelegramError && err.description.includes('message is not modified')) return;
      throw err;
    }
  }

  async deleteMessage(chatId: number, messageId: number): Promise<void> {
    await this.telegram.deleteMessage(chatId, messageId);
  }

  async sendAudio(chatId: number, file: AudioFile, caption: string): Promise<void> {
    await this.telegram.sendAudio(
      chatId,
      { source: file.path },
      { caption, parse_mode: 'Markdown', title: file.title, performer: file.performer },
    );
  }

  async sendVideo(chatId: number, filePath: string, caption: string): Promise<void> {
    await this.telegram.sendVideo(chatId, { source: filePath }, { caption, parse_mode: 'Markdown', supports_streaming: true });
  }

  async sendPhoto(chatId: number, fileId: string, caption: string): Promise<void> {
    await this.telegram.sendPhoto(chatId, fileId, { caption, parse_mode: 'Markdown' });
  }

  async isMember(channel: string, userId: number): Promise<boolean> {
    const member = await this.telegram.getChatMember(channel, userId);
    return MEMBER_STATUSES.has(member.status);
  }
}

/** True for "bot was blocked by the user" and similar permanent refusals. */
export function isBlockedByUser(err: unknown): boolean {
  return err instanceof TelegramError && err.code === 403;
}
