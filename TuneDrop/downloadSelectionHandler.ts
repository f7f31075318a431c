import { Telegraf, Context, Markup } from 'telegraf';
import { BotServices } from './botServices';
import { Requester } from './services/downloadWorkflow';
import { isYouTubeUrl } from './services/mediaService';
import { channelJoinUrl } from './services/accessGate';
import { CallbackActions, decodeDownload, DOWNLOAD_CALLBACK_PATTERN } from './services/callbackData';
import { escapeMarkdown } from './services/resultRenderingService';

export const SEARCH_PROMPT_TEXT = '🔍 Send me a song name or a YouTube link and I will find it for you.';
export const SEARCH_USAGE_TEXT = '🔍 *Usage:* /search <song name>\n\nExample: /search Despacito';
export const DOWNLOAD_CANCELLED_TEXT = '❌ Download cancelled.';

/** User and chat of the update, or null for updates without both. */
export function requesterOf(ctx: Context): Requester | null {
  const userId = ctx.from?.id;
  const chatId = ctx.chat?.id;
  if (userId == null || chatId == null) return null;
  return { userId, chatId };
}

export function joinChannelText(channel: string): string {
  return [
    '🔒 *Access Restricted*',
    '',
    `To use this bot you need to join our channel first: ${escapeMarkdown(channel)}`,
    '',
    'Join the channel and send your request again.',
  ].join('\n');
}

/**
 * Runs the access gate for the current user and, when access is denied,
 * replies with the "join the channel" prompt.  Returns whether to continue.
 */
export async function ensureAllowed(ctx: Context, services: BotServices): Promise<boolean> {
  const userId = ctx.from?.id;
  if (userId == null) return false;
  if (await services.gate.allowed(userId)) return true;

  const channel = services.gate.forcedChannel() ?? '';
  const url = channelJoinUrl(channel);
  await ctx.reply(joinChannelText(channel), {
    parse_mode: 'Markdown',
    reply_markup: url ? Markup.inlineKeyboard([Markup.button.url('📢 Join Channel', url)]).reply_markup : undefined,
  });
  return false;
}

async function handleQuery(ctx: Context, services: BotServices, text: string): Promise<void> {
  const requester = requesterOf(ctx);
  if (!requester) return;
  if (!(await ensureAllowed(ctx, services))) return;

  if (isYouTubeUrl(text)) {
    const outcome = await services.workflow.resolveLink(requester, text);
    console.log(`[downloadSelectionHandler] Link from ${requester.userId}: ${outcome.state}`);
    return;
  }

  const outcome = await services.workflow.search(requester, text, { origin: 'fresh' });
  console.log(`[downloadSelectionHandler] Search "${text}" by ${requester.userId}: ${outcome.state}`);
}

/**
 * Plain-text search, direct links and the download buttons.  Must be
 * registered after every command handler: the text listener treats whatever
 * reaches it as a query.
 */
export function registerDownloadHandlers(bot: Telegraf, services: BotServices): void {
  bot.command('search', async (ctx) => {
    const query = ctx.payload.trim();
    if (!query) {
      await ctx.reply(SEARCH_USAGE_TEXT, { parse_mode: 'Markdown' });
      return;
    }
    await handleQuery(ctx, services, query);
  });

  bot.action(DOWNLOAD_CALLBACK_PATTERN, async (ctx) => {
    await ctx.answerCbQuery();
    const selection = decodeDownload(ctx.match[0]);
    const requester = requesterOf(ctx);
    const messageId = ctx.callbackQuery.message?.message_id;
    if (!selection || !requester || messageId == null) return;

    const outcome = await services.workflow.select(requester, selection, messageId);
    console.log(`[downloadSelectionHandler] Selection by ${requester.userId}: ${outcome.state}`);
  });

  bot.action(CallbackActions.searchAgain, async (ctx) => {
    await ctx.answerCbQuery();
    await ctx.editMessageText(SEARCH_PROMPT_TEXT);
  });

  bot.action(CallbackActions.cancelDownload, async (ctx) => {
    await ctx.answerCbQuery();
    await ctx.editMessageText(DOWNLOAD_CANCELLED_TEXT);
  });

  bot.on('text', async (ctx) => {
    const text = ctx.message.text.trim();
    // Unknown commands are not queries
    if (!text || text.startsWith('/')) return;
    await handleQuery(ctx, services, text);
  });
}
