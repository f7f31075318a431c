import { Telegraf, Context } from 'telegraf';
import type { Message } from 'telegraf/typings/core/types/typegram';
import { BotServices } from './botServices';
import { requesterOf } from './downloadSelectionHandler';
import { Requester } from './services/downloadWorkflow';
import {
  ADMIN_PANEL_TEXT,
  AdminPanelActions,
  adminPanelKeyboard,
  AdminService,
  AdminUsage,
  NO_PERMISSION_TEXT,
  PRIMARY_ONLY_TEXT,
} from './services/adminService';

const replyMarkdown = (ctx: Context, text: string) => ctx.reply(text, { parse_mode: 'Markdown' });

/** The admin behind the update; non-admins get the permission error and null. */
async function requireAdmin(ctx: Context, services: BotServices): Promise<Requester | null> {
  const requester = requesterOf(ctx);
  if (requester && services.admins.isAdmin(requester.userId)) return requester;
  if (ctx.callbackQuery) {
    await ctx.answerCbQuery(NO_PERMISSION_TEXT, { show_alert: true });
  } else {
    await ctx.reply(NO_PERMISSION_TEXT);
  }
  return null;
}

function isPhotoMessage(message: object | undefined): message is Message.PhotoMessage {
  return message !== undefined && 'photo' in message;
}

async function showPanel(ctx: Context, services: BotServices): Promise<void> {
  const isPrimary = ctx.from != null && services.admins.isPrimaryAdmin(ctx.from.id);
  await ctx.reply(ADMIN_PANEL_TEXT, { parse_mode: 'Markdown', reply_markup: adminPanelKeyboard(isPrimary) });
}

/**
 * Admin commands plus the admin panel buttons.  Buttons for actions without
 * arguments run them directly; the rest answer with the command usage.
 */
export function registerAdminHandlers(bot: Telegraf, services: BotServices): void {
  const admin = new AdminService({ db: services.db, admins: services.admins, delivery: services.delivery });

  bot.command('broadcast', async (ctx) => {
    const requester = await requireAdmin(ctx, services);
    if (!requester) return;
    const message = ctx.payload.trim();
    if (!message) {
      await replyMarkdown(ctx, AdminUsage.broadcast);
      return;
    }
    const report = await admin.broadcast(requester.chatId, message);
    console.log(`[adminCommandHandler] Broadcast by ${requester.userId}: ${report.sent}/${report.total} sent`);
  });

  bot.command('users', async (ctx) => {
    if (!(await requireAdmin(ctx, services))) return;
    await replyMarkdown(ctx, admin.userStats());
  });

  bot.command('stats', async (ctx) => {
    if (!(await requireAdmin(ctx, services))) return;
    await replyMarkdown(ctx, admin.botStats());
  });

  bot.command('admins', async (ctx) => {
    if (!(await requireAdmin(ctx, services))) return;
    await replyMarkdown(ctx, admin.adminList());
  });

  bot.command('setchannel', async (ctx) => {
    if (!(await requireAdmin(ctx, services))) return;
    await replyMarkdown(ctx, admin.setChannel(ctx.payload));
  });

  bot.command('clearchannel', async (ctx) => {
    if (!(await requireAdmin(ctx, services))) return;
    await replyMarkdown(ctx, admin.clearChannel());
  });

  bot.command('addpromo', async (ctx) => {
    if (!(await requireAdmin(ctx, services))) return;

    const replied = ctx.message.reply_to_message;
    if (!isPhotoMessage(replied) || replied.photo.length === 0) {
      await showPanel(ctx, services);
      return;
    }

    // Telegram lists the sizes smallest first
    const fileId = replied.photo[replied.photo.length - 1].file_id;
    const caption = ctx.payload.trim() || (replied.caption ?? '');
    await replyMarkdown(ctx, admin.addPromo(fileId, caption));
  });

  bot.command('delpromo', async (ctx) => {
    if (!(await requireAdmin(ctx, services))) return;
    await replyMarkdown(ctx, admin.deletePromos());
  });

  bot.command('addadmin', async (ctx) => {
    const requester = await requireAdmin(ctx, services);
    if (!requester) return;
    await replyMarkdown(ctx, admin.addAdmin(requester.userId, ctx.payload));
  });

  bot.command('deladmin', async (ctx) => {
    const requester = await requireAdmin(ctx, services);
    if (!requester) return;
    await replyMarkdown(ctx, admin.removeAdmin(requester.userId, ctx.payload));
  });

  // ---------------- Admin panel ----------------
  const panelReplies: Record<string, (requester: Requester) => string> = {
    [AdminPanelActions.broadcast]: () => AdminUsage.broadcast,
    [AdminPanelActions.users]: () => admin.userStats(),
    [AdminPanelActions.stats]: () => admin.botStats(),
    [AdminPanelActions.admins]: () => admin.adminList(),
    [AdminPanelActions.setChannel]: () => AdminUsage.setChannel,
    [AdminPanelActions.clearChannel]: () => admin.clearChannel(),
    [AdminPanelActions.addPromo]: () => AdminUsage.addPromo,
    [AdminPanelActions.deletePromo]: () => admin.deletePromos(),
    [AdminPanelActions.addAdmin]: ({ userId }) =>
      services.admins.isPrimaryAdmin(userId) ? AdminUsage.addAdmin : PRIMARY_ONLY_TEXT,
    [AdminPanelActions.removeAdmin]: ({ userId }) =>
      services.admins.isPrimaryAdmin(userId) ? AdminUsage.removeAdmin : PRIMARY_ONLY_TEXT,
  };

  for (const [action, reply] of Object.entries(panelReplies)) {
    bot.action(action, async (ctx) => {
      const requester = await requireAdmin(ctx, services);
      if (!requester) return;
      await ctx.answerCbQuery();
      await replyMarkdown(ctx, reply(requester));
    });
  }
}
