import { Telegraf, Markup } from 'telegraf';
import type { BotCommand, InlineKeyboardMarkup } from 'telegraf/typings/core/types/typegram';
import { BotConfig } from './config';
import { BotServices, createServices } from './botServices';
import { registerAdminHandlers } from './adminCommandHandler';
import { registerLyricsHandlers } from './lyricsHandler';
import { registerDownloadHandlers, requesterOf } from './downloadSelectionHandler';
import { buildRecentDownloadsMessage } from './services/statsReportService';
import { runNonCritical } from './services/nonCritical';

export const RECENT_DOWNLOADS_LIMIT = 10;

export const WELCOME_TEXT = [
  '🎵 *Welcome to TuneDrop!*',
  '',
  'Send me a song name or a YouTube link and I will send it back as MP3 or MP4.',
  '',
  'Type /help to see everything I can do.',
].join('\n');

export const GENERIC_ERROR_TEXT = '⚠️ An error occurred while processing your request. Please try again.';

export const BOT_COMMANDS: BotCommand[] = [
  { command: 'start', description: 'Start the bot' },
  { command: 'search', description: 'Search for a song' },
  { command: 'lyrics', description: 'Find song lyrics' },
  { command: 'menu', description: 'Open the music menu' },
  { command: 'help', description: 'Show help' },
];

const MenuActions = {
  search: 'menu_search',
  lyrics: 'menu_lyrics',
  downloads: 'menu_downloads',
} as const;

export function helpText(isAdmin: boolean, isPrimaryAdmin: boolean): string {
  const lines = [
    '🎵 *TuneDrop Help*',
    '',
    '*How to use:*',
    '• Send a song name to search YouTube',
    '• Send a YouTube link to download it directly',
    '• /search <song> - search for music',
    '• /lyrics <song> - find song lyrics',
    '• /menu - open the music menu',
    '',
    '*Formats:* MP3 (audio) and MP4 (video, up to 720p)',
  ];
  if (isAdmin) {
    lines.push(
      '',
      '👑 *Admin Commands:*',
      '• /broadcast <message> - message every active user',
      '• /users - user statistics',
      '• /stats - bot statistics',
      '• /admins - list administrators',
      '• /setchannel @channel - require joining a channel',
      '• /clearchannel - remove the channel requirement',
      '• /addpromo <caption> - reply to a photo to set the promo',
      '• /delpromo - remove the promo',
    );
  }
  if (isPrimaryAdmin) {
    lines.push('', '🔑 *Primary Admin:*', '• /addadmin <user id>', '• /deladmin <user id>');
  }
  return lines.join('\n');
}

function menuKeyboard(): InlineKeyboardMarkup {
  return Markup.inlineKeyboard([
    [Markup.button.callback('🔍 Search Music', MenuActions.search)],
    [Markup.button.callback('📝 Find Lyrics', MenuActions.lyrics)],
    [Markup.button.callback('📂 My Downloads', MenuActions.downloads)],
  ]).reply_markup;
}

/**
 * Builds the bot with every handler attached.  Nothing is started here:
 * polling and webhooks are up to the caller.
 */
export function createBot(config: BotConfig): { bot: Telegraf; services: BotServices } {
  const bot = new Telegraf(config.botToken, { handlerTimeout: config.handlerTimeoutMs });
  const services = createServices(config, bot.telegram);

  // Every update refreshes the user row; a failed write must not block the request
  bot.use(async (ctx, next) => {
    const from = ctx.from;
    if (from && !from.is_bot) {
      await runNonCritical(`track user ${from.id}`, () =>
        services.db.upsertUser({
          id: from.id,
          username: from.username,
          firstName: from.first_name,
          lastName: from.last_name,
        }),
      );
    }
    await next();
  });

  bot.start((ctx) => ctx.reply(WELCOME_TEXT, { parse_mode: 'Markdown' }));

  bot.help((ctx) => {
    const userId = ctx.from?.id;
    const isAdmin = userId != null && services.admins.isAdmin(userId);
    const isPrimary = userId != null && services.admins.isPrimaryAdmin(userId);
    return ctx.reply(helpText(isAdmin, isPrimary), { parse_mode: 'Markdown' });
  });

  bot.command('menu', (ctx) =>
    ctx.reply('🎵 *Music Menu*\n\nWhat would you like to do?', {
      parse_mode: 'Markdown',
      reply_markup: menuKeyboard(),
    }),
  );

  bot.action(MenuActions.search, async (ctx) => {
    await ctx.answerCbQuery();
    await ctx.reply('🔍 Send me a song name or a YouTube link.');
  });

  bot.action(MenuActions.lyrics, async (ctx) => {
    await ctx.answerCbQuery();
    await ctx.reply('📝 Send /lyrics <song name> to find lyrics.');
  });

  bot.action(MenuActions.downloads, async (ctx) => {
    await ctx.answerCbQuery();
    const requester = requesterOf(ctx);
    if (!requester) return;
    const records = services.db.recentDownloads(requester.userId, RECENT_DOWNLOADS_LIMIT);
    await ctx.reply(buildRecentDownloadsMessage(records), { parse_mode: 'Markdown' });
  });

  registerAdminHandlers(bot, services);
  registerLyricsHandlers(bot, services);
  // Last: its text listener takes everything the commands above left
  registerDownloadHandlers(bot, services);

  bot.catch(async (err, ctx) => {
    console.error(`[bot] Unhandled error while processing ${ctx.updateType}`, err);
    if (ctx.chat) {
      await runNonCritical('error notice', () => ctx.reply(GENERIC_ERROR_TEXT));
    }
  });

  return { bot, services };
}
