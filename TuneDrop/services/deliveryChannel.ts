import type { InlineKeyboardMarkup } from 'telegraf/typings/core/types/typegram';

export interface MessageOptions {
  keyboard?: InlineKeyboardMarkup;
  /** Parse the text as (legacy) Telegram Markdown */
  markdown?: boolean;
  disablePreview?: boolean;
}

export interface AudioFile {
  path: string;
  title: string;
  performer: string;
}

/**
 * Everything the download workflow needs to talk to a chat.  Each call may
 * fail on its own; callers decide whether that failure matters.
 */
export interface DeliveryChannel {
  /** Resolves with the id of the new message */
  sendText(chatId: number, text: string, options?: MessageOptions): Promise<number>;
  editText(chatId: number, messageId: number, text: string, options?: MessageOptions): Promise<void>;
  deleteMessage(chatId: number, messageId: number): Promise<void>;
  sendAudio(chatId: number, file: AudioFile, caption: string): Promise<void>;
  sendVideo(chatId: number, filePath: string, caption: string): Promise<void>;
  sendPhoto(chatId: number, fileId: string, caption: string): Promise<void>;
}
