import { Telegraf } from 'telegraf';
import { BotServices } from './botServices';
import { ensureAllowed, requesterOf } from './downloadSelectionHandler';
import { LyricsInfo } from './models/MediaModels';
import {
  CallbackActions,
  LYRICS_CALLBACK_PATTERN,
  LYRICS_DOWNLOAD_CALLBACK_PATTERN,
} from './services/callbackData';
import { escapeMarkdown, lyricsKeyboard, lyricsText } from './services/resultRenderingService';

export const LYRICS_USAGE_TEXT = '📝 *Usage:* /lyrics <song name>\n\nExample: /lyrics Shape of You';
export const LYRICS_PROMPT_TEXT = '📝 Send /lyrics <song name> to look up another song.';
export const LYRICS_NOT_FOUND_TEXT = '❌ No lyrics found. Please try a different search term or check the spelling.';
export const LYRICS_UNAVAILABLE_TEXT = '❌ Lyrics search is unavailable right now. Please try again later.';

export function lyricsSearchingText(query: string): string {
  return `🔍 *Searching lyrics for:* ${escapeMarkdown(query)}...`;
}

/**
 * Looks the song up and shows the result in one status message: a new one,
 * or `messageId` when the request came from a button.
 */
async function showLyrics(services: BotServices, chatId: number, query: string, messageId?: number): Promise<void> {
  const { delivery, lyrics } = services;
  let statusId: number;
  if (messageId != null) {
    await delivery.editText(chatId, messageId, lyricsSearchingText(query), { markdown: true });
    statusId = messageId;
  } else {
    statusId = await delivery.sendText(chatId, lyricsSearchingText(query), { markdown: true });
  }

  let info: LyricsInfo | null;
  try {
    info = await lyrics.find(query);
  } catch (err) {
    console.error(`[lyricsHandler] Lookup failed for "${query}"`, err);
    await delivery.editText(chatId, statusId, LYRICS_UNAVAILABLE_TEXT);
    return;
  }

  if (!info) {
    await delivery.editText(chatId, statusId, LYRICS_NOT_FOUND_TEXT);
    return;
  }

  await delivery.editText(chatId, statusId, lyricsText(info), {
    markdown: true,
    keyboard: lyricsKeyboard(info),
    disablePreview: true,
  });
}

export function registerLyricsHandlers(bot: Telegraf, services: BotServices): void {
  bot.command('lyrics', async (ctx) => {
    const query = ctx.payload.trim();
    if (!query) {
      await ctx.reply(LYRICS_USAGE_TEXT, { parse_mode: 'Markdown' });
      return;
    }
    const requester = requesterOf(ctx);
    if (!requester) return;
    if (!(await ensureAllowed(ctx, services))) return;
    await showLyrics(services, requester.chatId, query);
  });

  // "Get Lyrics" under a result list; the query travels in the callback data
  bot.action(LYRICS_CALLBACK_PATTERN, async (ctx) => {
    await ctx.answerCbQuery();
    const chatId = ctx.chat?.id;
    const messageId = ctx.callbackQuery.message?.message_id;
    if (chatId == null || messageId == null) return;
    await showLyrics(services, chatId, ctx.match[1], messageId);
  });

  bot.action(LYRICS_DOWNLOAD_CALLBACK_PATTERN, async (ctx) => {
    await ctx.answerCbQuery();
    const requester = requesterOf(ctx);
    const messageId = ctx.callbackQuery.message?.message_id;
    if (!requester || messageId == null) return;

    const outcome = await services.workflow.search(requester, ctx.match[1], {
      origin: 'lyrics',
      statusMessageId: messageId,
    });
    console.log(`[lyricsHandler] Download search by ${requester.userId}: ${outcome.state}`);
  });

  bot.action(CallbackActions.lyricsSearchAgain, async (ctx) => {
    await ctx.answerCbQuery();
    await ctx.editMessageText(LYRICS_PROMPT_TEXT);
  });
}
