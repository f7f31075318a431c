import axios from 'axios';
import { LyricsInfo } from '../models/MediaModels';
import { CollaboratorUnavailableError } from '../models/errors';

/**
 * Small wrapper around the Genius API: one search request picks the first hit,
 * a second request reads album and release date for it.  Genius does not
 * return lyrics text through the API, only the page link.
 */
const GENIUS_BASE_URL = 'https://api.genius.com';
const REQUEST_TIMEOUT = 10_000;
const USER_AGENT = 'TuneDropBot/1.0';

// Decorations YouTube titles carry that only hurt the lyrics search
const TITLE_NOISE_PATTERNS: RegExp[] = [
  /\(Official.*?\)/gi,
  /\[Official.*?\]/gi,
  /\(Lyrics.*?\)/gi,
  /\[Lyrics.*?\]/gi,
  /\(Audio.*?\)/gi,
  /\[Audio.*?\]/gi,
  /\(Video.*?\)/gi,
  /\[Video.*?\]/gi,
  /\(HD.*?\)/gi,
  /\[HD.*?\]/gi,
  /\(4K.*?\)/gi,
  /\[4K.*?\]/gi,
  /- Topic/gi,
  /ft\..*/gi,
  /feat\..*/gi,
  /featuring.*/gi,
];

interface GeniusArtist {
  name: string;
}

interface GeniusHit {
  result: {
    id: number;
    title: string;
    url: string;
    primary_artist: GeniusArtist;
  };
}

interface GeniusSearchResponse {
  response?: { hits?: GeniusHit[] };
}

interface GeniusSongResponse {
  response?: {
    song?: {
      album?: { name?: string } | null;
      release_date_for_display?: string | null;
    };
  };
}

export interface LyricsLookup {
  find(query: string): Promise<LyricsInfo | null>;
}

export function cleanTitle(title: string): string {
  let cleaned = title;
  for (const pattern of TITLE_NOISE_PATTERNS) {
    cleaned = cleaned.replace(pattern, '');
  }
  return cleaned
    .replace(/\s*[-|•]\s*/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export class GeniusLyricsService implements LyricsLookup {
  constructor(private readonly token: string | undefined) {}

  private get headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.token}`,
      'User-Agent': USER_AGENT,
      Accept: 'application/json',
    };
  }

  async find(query: string): Promise<LyricsInfo | null> {
    if (!this.token) {
      console.warn('[lyricsService] GENIUS_API_TOKEN not provided – lyrics lookup disabled');
      return null;
    }

    const searchQuery = cleanTitle(query) || query.trim();
    console.log(`[lyricsService] Searching lyrics for: ${searchQuery}`);

    try {
      const { data } = await axios.get<GeniusSearchResponse>(`${GENIUS_BASE_URL}/search`, {
        headers: this.headers,
        params: { q: searchQuery },
        timeout: REQUEST_TIMEOUT,
      });

      const first = data.response?.hits?.[0]?.result;
      if (!first) {
        console.log('[lyricsService] No search results found');
        return null;
      }

      const { data: songData } = await axios.get<GeniusSongResponse>(`${GENIUS_BASE_URL}/songs/${first.id}`, {
        headers: this.headers,
        timeout: REQUEST_TIMEOUT,
      });
      const song = songData.response?.song;

      return {
        title: first.title,
        artist: first.primary_artist.name,
        externalLink: first.url,
        album: song?.album?.name ?? null,
        releaseDate: song?.release_date_for_display ?? null,
      };
    } catch (err) {
      throw new CollaboratorUnavailableError('lyrics', 'Genius request failed', err);
    }
  }
}
