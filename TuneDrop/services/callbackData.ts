import { MediaFormat } from '../models/MediaModels';

/**
 * Encoding of inline-button payloads.  Telegram limits callback data to 64
 * bytes, so free text (lyrics queries) is cut to fit.
 */

export const CALLBACK_DATA_LIMIT = 64;

const FORMAT_CODES: Record<MediaFormat, string> = { audio: 'a', video: 'v' };

export interface DownloadSelection {
  format: MediaFormat;
  index: number;
  /** Id of the item the button was rendered for */
  expectedId: string;
}

export const DOWNLOAD_CALLBACK_PATTERN = /^dl:([av]):(\d+):([\w-]+)$/;
export const LYRICS_CALLBACK_PATTERN = /^lyr:(.+)$/s;
export const LYRICS_DOWNLOAD_CALLBACK_PATTERN = /^lyrdl:(.+)$/s;

export const CallbackActions = {
  searchAgain: 'search_again',
  lyricsSearchAgain: 'lyrics_search_again',
  cancelDownload: 'cancel_download',
} as const;

export function encodeDownload(selection: DownloadSelection): string {
  return `dl:${FORMAT_CODES[selection.format]}:${selection.index}:${selection.expectedId}`;
}

export function decodeDownload(data: string): DownloadSelection | null {
  const match = DOWNLOAD_CALLBACK_PATTERN.exec(data);
  if (!match) return null;
  return {
    format: match[1] === 'a' ? 'audio' : 'video',
    index: Number(match[2]),
    expectedId: match[3],
  };
}

/**
 * `prefix` followed by as much of `value` as fits into the callback limit,
 * cut on a character boundary.
 */
export function fitCallbackData(prefix: string, value: string): string {
  let budget = CALLBACK_DATA_LIMIT - Buffer.byteLength(prefix, 'utf8');
  let out = '';
  for (const char of value) {
    const size = Buffer.byteLength(char, 'utf8');
    if (size > budget) break;
    out += char;
    budget -= size;
  }
  return prefix + out;
}

export function encodeLyricsLookup(query: string): string {
  return fitCallbackData('lyr:', query.trim());
}

export function encodeLyricsDownload(songInfo: string): string {
  return fitCallbackData('lyrdl:', songInfo.trim());
}
