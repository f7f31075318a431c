import { Markup } from 'telegraf';
import type { InlineKeyboardButton, InlineKeyboardMarkup } from 'telegraf/typings/core/types/typegram';
import { Candidate } from '../models/SessionModels';
import { LyricsInfo, MediaDescription, MediaFormat } from '../models/MediaModels';
import {
  CallbackActions,
  encodeDownload,
  encodeLyricsDownload,
  encodeLyricsLookup,
} from './callbackData';

/**
 * Texts and inline keyboards shown by the bot.  Everything here is pure so
 * the workflow tests can assert on exactly what a user would see.
 */

const BUTTON_TITLE_LIMIT = 50;

/** Escapes the characters legacy Telegram Markdown treats as markup. */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

export function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

/** Button labels are plain text; markup characters only add noise there. */
function buttonTitle(title: string): string {
  return truncate(title, BUTTON_TITLE_LIMIT).replace(/[*_[\]]/g, '');
}

export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.round(seconds));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = String(total % 60).padStart(2, '0');
  return h > 0 ? `${h}:${String(m).padStart(2, '0')}:${s}` : `${m}:${s}`;
}

export function formatSizeMb(bytes: number): string {
  return (bytes / (1024 * 1024)).toFixed(2);
}

// ---------------- Search results ----------------

export type ListOrigin = 'fresh' | 'lyrics';

export function searchingText(query: string, origin: ListOrigin): string {
  return origin === 'fresh'
    ? `🔍 *Searching for:* ${escapeMarkdown(query)}...`
    : `🔍 *Searching YouTube for:* ${escapeMarkdown(query)}...`;
}

export function candidateListText(query: string, origin: ListOrigin): string {
  const header = origin === 'fresh' ? 'Search Results for:' : 'YouTube Results for:';
  return `🎵 *${header}* ${escapeMarkdown(query)}\n\nChoose a song to download as MP3 or MP4:`;
}

/**
 * One audio and one video button per candidate, then the navigation row(s).
 * Buttons carry the candidate index plus its id.
 */
export function candidateListKeyboard(
  candidates: Candidate[],
  query: string,
  origin: ListOrigin,
): InlineKeyboardMarkup {
  const rows: InlineKeyboardButton[][] = [];
  candidates.forEach((candidate, index) => {
    const title = buttonTitle(candidate.title);
    rows.push([
      Markup.button.callback(`🎵 ${title}`, encodeDownload({ format: 'audio', index, expectedId: candidate.id })),
    ]);
    rows.push([
      Markup.button.callback(
        `📹 ${title} (MP4)`,
        encodeDownload({ format: 'video', index, expectedId: candidate.id }),
      ),
    ]);
  });

  if (origin === 'fresh') {
    rows.push([Markup.button.callback('📝 Get Lyrics', encodeLyricsLookup(query))]);
    rows.push([Markup.button.callback('🔄 Search Again', CallbackActions.searchAgain)]);
  } else {
    rows.push([Markup.button.callback('🔄 Back to Lyrics', encodeLyricsLookup(query))]);
  }
  return Markup.inlineKeyboard(rows).reply_markup;
}

export function noResultsText(reason: 'empty' | 'unavailable'): string {
  return reason === 'empty'
    ? '❌ No results found. Please try a different search term.'
    : '❌ Search is unavailable right now. Please try again in a moment.';
}

// ---------------- Direct links ----------------

export const PROCESSING_LINK_TEXT = '🔍 *Processing YouTube URL...*';
export const LINK_FAILED_TEXT = '❌ *Error:* Could not get video information. Please check the URL.';

export function linkConfirmText(description: MediaDescription): string {
  const duration = description.durationSeconds ? ` (${formatDuration(description.durationSeconds)})` : '';
  return [
    '🎵 *Video Found:*',
    `📺 *${escapeMarkdown(truncate(description.title, 80))}*`,
    `👤 *By:* ${escapeMarkdown(description.channelName)}${duration}`,
    '',
    'Do you want to download it?',
  ].join('\n');
}

export function linkConfirmKeyboard(item: Candidate): InlineKeyboardMarkup {
  return Markup.inlineKeyboard([
    [Markup.button.callback('✅ Download MP3', encodeDownload({ format: 'audio', index: 0, expectedId: item.id }))],
    [Markup.button.callback('📹 Download MP4', encodeDownload({ format: 'video', index: 0, expectedId: item.id }))],
    [Markup.button.callback('❌ Cancel', CallbackActions.cancelDownload)],
  ]).reply_markup;
}

// ---------------- Download progress ----------------

const FORMAT_LABELS: Record<MediaFormat, { name: string; icon: string; noun: string }> = {
  audio: { name: 'MP3', icon: '🎵', noun: 'Song' },
  video: { name: 'MP4', icon: '📹', noun: 'Video' },
};

export function processingText(title: string, format: MediaFormat): string {
  const label = FORMAT_LABELS[format];
  return [
    `⏳ *Processing your ${label.name} download...*`,
    '',
    `${label.icon} *${label.noun}:* ${escapeMarkdown(truncate(title, 50))}`,
    `📁 *Format:* ${label.name}`,
    '',
    'Please wait, this may take a few moments...',
  ].join('\n');
}

export function uploadingText(format: MediaFormat): string {
  return `📤 *Uploading your ${FORMAT_LABELS[format].name}...*`;
}

export function completeText(format: MediaFormat): string {
  const label = FORMAT_LABELS[format];
  return `✅ *Download Complete!*\n\nYour ${label.name} has been sent above! ${label.icon}`;
}

export function downloadFailedText(): string {
  return '❌ *Download failed!*\n\nPlease try again below or search once more.';
}

export function deliveryFailedText(): string {
  return '❌ *Could not send the file.*\n\nIt may be too large for Telegram. Please try another format below.';
}

/** Both formats of the item that just failed, so the user can retry in place. */
export function retryKeyboard(index: number, expectedId: string): InlineKeyboardMarkup {
  return Markup.inlineKeyboard([
    [Markup.button.callback('🔄 Retry MP3', encodeDownload({ format: 'audio', index, expectedId }))],
    [Markup.button.callback('🔄 Retry MP4', encodeDownload({ format: 'video', index, expectedId }))],
  ]).reply_markup;
}

export const PROMO_SEPARATOR = '━━━━━━━━━━━━━━━━━━━';

export function mediaCaption(item: Candidate, format: MediaFormat, sizeBytes: number): string {
  const label = FORMAT_LABELS[format];
  return [
    `${label.icon} *${escapeMarkdown(truncate(item.title, 50))}*`,
    `📺 *Channel:* ${escapeMarkdown(item.channelName)}`,
    `📦 *Size:* ${formatSizeMb(sizeBytes)} MB`,
    `🎯 *Quality:* ${format === 'audio' ? 'Audio' : 'MP4 Video'}`,
  ].join('\n');
}

export const SESSION_EXPIRED_TEXT = '❌ Session expired. Please search again.';
export const INVALID_SELECTION_TEXT = '❌ Invalid selection. Please search again.';

// ---------------- Lyrics ----------------

export function lyricsText(info: LyricsInfo): string {
  return [
    `🎵 *${escapeMarkdown(info.title)}*`,
    `👤 *Artist:* ${escapeMarkdown(info.artist)}`,
    `💿 *Album:* ${escapeMarkdown(info.album ?? 'Unknown Album')}`,
    `📅 *Released:* ${escapeMarkdown(info.releaseDate ?? 'Unknown')}`,
    '',
    `🔗 *View Full Lyrics:* [Genius.com](${info.externalLink})`,
  ].join('\n');
}

export function lyricsKeyboard(info: LyricsInfo): InlineKeyboardMarkup {
  return Markup.inlineKeyboard([
    [Markup.button.callback('🎵 Download', encodeLyricsDownload(`${info.title} ${info.artist}`))],
    [Markup.button.callback('🔍 Search Again', CallbackActions.lyricsSearchAgain)],
  ]).reply_markup;
}
