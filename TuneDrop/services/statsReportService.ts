import { DownloadRecord, DownloadStats, UserCounts } from '../models/MediaModels';
import { BroadcastProgress, BroadcastReport } from './broadcastService';
import { escapeMarkdown } from './resultRenderingService';

/**
 * Texts of the admin reports.  Sending them stays with the bot layer; these
 * helpers only turn numbers into Markdown.
 */

/** `YYYY-MM-DD HH:MM:SS` in UTC. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

function activeShare(counts: UserCounts): string {
  return ((counts.active / Math.max(counts.total, 1)) * 100).toFixed(1);
}

export function buildUserStatsMessage(counts: UserCounts, now: Date): string {
  const lines: string[] = [];
  lines.push('👥 *User Statistics*');
  lines.push('');
  lines.push(`📊 *Total Users:* ${counts.total}`);
  lines.push(`✅ *Active Users:* ${counts.active}`);
  lines.push(`📈 *Active Share:* ${activeShare(counts)}%`);
  lines.push('');
  lines.push(`📅 *Updated:* ${formatTimestamp(now)}`);
  return lines.join('\n');
}

export function buildBotStatsMessage(counts: UserCounts, downloads: DownloadStats, now: Date): string {
  const lines: string[] = [];
  lines.push('📊 *Bot Statistics*');
  lines.push('');
  lines.push('👥 *Users:*');
  lines.push(`• Total: ${counts.total}`);
  lines.push(`• Active: ${counts.active}`);
  lines.push('');
  lines.push('💾 *Downloads:*');
  lines.push(`• Total: ${downloads.total}`);
  lines.push(`• Today: ${downloads.today}`);
  lines.push(`• MP3 Files: ${downloads.formats.mp3 ?? 0}`);
  lines.push(`• MP4 Files: ${downloads.formats.mp4 ?? 0}`);

  // Effects are only tracked when some download carried one
  const effects = Object.entries(downloads.effects);
  if (effects.length > 0) {
    lines.push('');
    lines.push('🎛 *Effects:*');
    effects.forEach(([effect, count]) => lines.push(`• ${effect}: ${count}`));
  }

  lines.push('');
  lines.push(`📅 *Updated:* ${formatTimestamp(now)}`);
  return lines.join('\n');
}

export function buildAdminListMessage(adminIds: number[], primaryAdminId: number | null, now: Date): string {
  const lines: string[] = ['👑 *Bot Administrators*', '', '*Admin User IDs:*'];
  adminIds.forEach((id) => lines.push(id === primaryAdminId ? `• ${id} (primary)` : `• ${id}`));
  lines.push('');
  lines.push(`*Total Admins:* ${adminIds.length}`);
  lines.push('');
  lines.push(`📅 *Updated:* ${formatTimestamp(now)}`);
  return lines.join('\n');
}

export function buildBroadcastProgressMessage(progress: BroadcastProgress): string {
  return [
    '📤 Broadcasting...',
    '',
    `✅ Sent: ${progress.sent}`,
    `❌ Failed: ${progress.failed}`,
    `📊 Progress: ${progress.sent + progress.failed}/${progress.total}`,
  ].join('\n');
}

export function buildBroadcastReportMessage(report: BroadcastReport): string {
  const lines = [
    '✅ Broadcast Complete!',
    '',
    `📤 Total users: ${report.total}`,
    `✅ Successfully sent: ${report.sent}`,
    `❌ Failed: ${report.failed}`,
  ];
  if (report.blocked.length > 0) {
    lines.push(`🚫 Marked inactive (blocked the bot): ${report.blocked.length}`);
  }
  return lines.join('\n');
}

export function buildRecentDownloadsMessage(records: DownloadRecord[]): string {
  if (records.length === 0) {
    return '📂 *My Downloads*\n\nNothing here yet. Send me a song name to get started!';
  }
  const lines: string[] = ['📂 *My Downloads*', ''];
  records.forEach((r, idx) => {
    const icon = r.format === 'mp3' ? '🎵' : '📹';
    lines.push(`${idx + 1}. ${icon} ${escapeMarkdown(r.title)} (${r.format.toUpperCase()}, ${r.downloadedAt.slice(0, 10)})`);
  });
  return lines.join('\n');
}
