import { Markup } from 'telegraf';
import type { InlineKeyboardButton, InlineKeyboardMarkup } from 'telegraf/typings/core/types/typegram';
import { PersistenceFailureError } from '../models/errors';
import { BotDatabase } from './databaseService';
import { AdminRegistry } from './adminRegistry';
import { FORCED_CHANNEL_SETTING } from './accessGate';
import { DeliveryChannel } from './deliveryChannel';
import { broadcast, BroadcastReport } from './broadcastService';
import { isBlockedByUser } from './telegramDeliveryService';
import { escapeMarkdown } from './resultRenderingService';
import {
  buildAdminListMessage,
  buildBotStatsMessage,
  buildBroadcastProgressMessage,
  buildBroadcastReportMessage,
  buildUserStatsMessage,
} from './statsReportService';

export const NO_PERMISSION_TEXT = "❌ You don't have permission to use this command.";
export const PRIMARY_ONLY_TEXT = '❌ Only the primary admin can manage administrators.';
export const SAVE_FAILED_TEXT = '❌ Could not save the change. Please try again.';

export const AdminUsage = {
  broadcast: '📢 *Usage:* /broadcast <message>',
  setChannel: '📺 *Usage:* /setchannel @channelname',
  addPromo: '🖼 *Usage:* reply to a photo with /addpromo <caption>\n\nWithout a caption the caption of the photo is used.',
  addAdmin: '👑 *Usage:* /addadmin <user id>',
  removeAdmin: '👑 *Usage:* /deladmin <user id>',
} as const;

export const AdminPanelActions = {
  broadcast: 'admin_broadcast',
  users: 'admin_users',
  stats: 'admin_stats',
  admins: 'admin_list',
  setChannel: 'admin_setchannel',
  clearChannel: 'admin_clearchannel',
  addPromo: 'admin_addpromo',
  deletePromo: 'admin_delpromo',
  addAdmin: 'admin_addadmin',
  removeAdmin: 'admin_deladmin',
} as const;

export const ADMIN_PANEL_TEXT = '👑 *Admin Panel*\n\nChoose an action:';

export function adminPanelKeyboard(isPrimary: boolean): InlineKeyboardMarkup {
  const rows: InlineKeyboardButton[][] = [
    [
      Markup.button.callback('📢 Broadcast', AdminPanelActions.broadcast),
      Markup.button.callback('👥 Users', AdminPanelActions.users),
    ],
    [
      Markup.button.callback('📊 Stats', AdminPanelActions.stats),
      Markup.button.callback('👑 Admins', AdminPanelActions.admins),
    ],
    [
      Markup.button.callback('📺 Set Channel', AdminPanelActions.setChannel),
      Markup.button.callback('🚫 Clear Channel', AdminPanelActions.clearChannel),
    ],
    [
      Markup.button.callback('🖼 Add Promo', AdminPanelActions.addPromo),
      Markup.button.callback('🗑 Delete Promo', AdminPanelActions.deletePromo),
    ],
  ];
  if (isPrimary) {
    rows.push([
      Markup.button.callback('➕ Add Admin', AdminPanelActions.addAdmin),
      Markup.button.callback('➖ Remove Admin', AdminPanelActions.removeAdmin),
    ]);
  }
  return Markup.inlineKeyboard(rows).reply_markup;
}

/** `@name` for channel usernames; numeric chat ids are kept as they are. */
export function normalizeChannel(raw: string): string | null {
  const channel = raw.trim();
  if (!channel) return null;
  if (channel.startsWith('@') || /^-?\d+$/.test(channel)) return channel;
  return `@${channel}`;
}

export function broadcastText(message: string): string {
  return `📢 Broadcast Message\n\n${message}`;
}

export interface AdminServiceDeps {
  db: BotDatabase;
  admins: AdminRegistry;
  delivery: DeliveryChannel;
  isBlocked?: (err: unknown) => boolean;
  now?: () => Date;
}

/**
 * The admin commands without the Telegram plumbing: every method returns the
 * Markdown reply for the admin.  Permission checks stay with the handler.
 */
export class AdminService {
  private readonly isBlocked: (err: unknown) => boolean;
  private readonly now: () => Date;

  constructor(private readonly deps: AdminServiceDeps) {
    this.isBlocked = deps.isBlocked ?? isBlockedByUser;
    this.now = deps.now ?? (() => new Date());
  }

  /** Runs a write; a failed write becomes the "could not save" reply. */
  private save(fn: () => string): string {
    try {
      return fn();
    } catch (err) {
      if (err instanceof PersistenceFailureError) return SAVE_FAILED_TEXT;
      throw err;
    }
  }

  userStats(): string {
    return buildUserStatsMessage(this.deps.db.getUserCounts(), this.now());
  }

  botStats(): string {
    const { db } = this.deps;
    return buildBotStatsMessage(db.getUserCounts(), db.getDownloadStats(), this.now());
  }

  adminList(): string {
    const { admins } = this.deps;
    return buildAdminListMessage(admins.list(), admins.primaryId, this.now());
  }

  setChannel(raw: string): string {
    const channel = normalizeChannel(raw);
    if (!channel) return AdminUsage.setChannel;
    return this.save(() => {
      this.deps.db.setSetting(FORCED_CHANNEL_SETTING, channel);
      return `✅ Forced channel set to: ${escapeMarkdown(channel)}\n\nUsers must join this channel to use the bot.`;
    });
  }

  clearChannel(): string {
    const { db } = this.deps;
    if (db.getSetting(FORCED_CHANNEL_SETTING) == null) return 'ℹ️ No forced channel is set.';
    return this.save(() => {
      db.deleteSetting(FORCED_CHANNEL_SETTING);
      return '✅ Forced channel requirement removed.';
    });
  }

  addPromo(fileId: string, caption: string): string {
    return this.save(() => {
      this.deps.db.replacePromo({ fileId, caption });
      return '✅ Promo saved! It will be shown after every download.';
    });
  }

  deletePromos(): string {
    return this.save(() => {
      const removed = this.deps.db.deleteAllPromos();
      return removed > 0 ? '✅ Promo removed.' : 'ℹ️ There is no active promo.';
    });
  }

  addAdmin(actorId: number, rawId: string): string {
    const { admins } = this.deps;
    if (!admins.isPrimaryAdmin(actorId)) return PRIMARY_ONLY_TEXT;
    const id = rawId.trim();
    if (!/^\d+$/.test(id)) return AdminUsage.addAdmin;

    return this.save(() =>
      admins.add(Number(id)) === 'added'
        ? `✅ User ${id} is now an admin.`
        : `ℹ️ User ${id} is already an admin.`,
    );
  }

  removeAdmin(actorId: number, rawId: string): string {
    const { admins } = this.deps;
    if (!admins.isPrimaryAdmin(actorId)) return PRIMARY_ONLY_TEXT;
    const id = rawId.trim();
    if (!/^\d+$/.test(id)) return AdminUsage.removeAdmin;

    return this.save(() => {
      switch (admins.remove(Number(id))) {
        case 'removed':
          return `✅ User ${id} is no longer an admin.`;
        case 'not_admin':
          return `ℹ️ User ${id} is not an admin.`;
        case 'primary':
          return '❌ The primary admin cannot be removed.';
      }
    });
  }

  /**
   * Sends `message` to every active user, keeping a progress message in the
   * admin's chat up to date.  Users who blocked the bot are marked inactive.
   */
  async broadcast(adminChatId: number, message: string): Promise<BroadcastReport> {
    const { db, delivery } = this.deps;
    const recipients = db.listActiveUserIds();
    const statusId = await delivery.sendText(adminChatId, `📤 Broadcasting to ${recipients.length} users...`);

    const report = await broadcast(
      recipients,
      async (userId) => {
        await delivery.sendText(userId, broadcastText(message));
      },
      {
        isBlocked: this.isBlocked,
        onProgress: (progress) => delivery.editText(adminChatId, statusId, buildBroadcastProgressMessage(progress)),
      },
    );

    for (const userId of report.blocked) {
      try {
        db.setUserActive(userId, false);
      } catch (err) {
        console.error(`[adminService] Could not mark user ${userId} inactive`, err);
      }
    }

    await delivery.editText(adminChatId, statusId, buildBroadcastReportMessage(report));
    return report;
  }
}
