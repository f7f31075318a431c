import type { Candidate } from './SessionModels';

/** Which variant of a video the user asked for. */
export type MediaFormat = 'audio' | 'video';

/** Format tag written to the download history. */
export type FormatTag = 'mp3' | 'mp4';

export const FORMAT_TAGS: Record<MediaFormat, FormatTag> = {
  audio: 'mp3',
  video: 'mp4',
};

/** Search hit as returned by the media collaborator. */
export interface SearchHit extends Candidate {
  sourceLink: string;
}

/** Metadata of a single video, read before the user confirms a link download. */
export interface MediaDescription extends Candidate {
  durationSeconds: number | null;
}

export interface LyricsInfo {
  title: string;
  artist: string;
  album: string | null;
  releaseDate: string | null;
  /** Page with the full lyrics */
  externalLink: string;
}

export interface BotUser {
  id: number;
  username?: string;
  firstName?: string;
  lastName?: string;
}

export interface DownloadRecord {
  userId: number;
  title: string;
  format: FormatTag;
  effect: string | null;
  /** ISO-8601 UTC timestamp */
  downloadedAt: string;
}

export interface Promo {
  /** Telegram file id of the banner photo */
  fileId: string;
  caption: string;
  createdAt: string;
}

export interface UserCounts {
  total: number;
  active: number;
}

export interface DownloadStats {
  total: number;
  today: number;
  formats: Record<string, number>;
  effects: Record<string, number>;
}
