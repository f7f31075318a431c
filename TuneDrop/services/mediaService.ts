import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import * as path from 'path';
import { MediaDescription, MediaFormat, SearchHit } from '../models/MediaModels';
import { CollaboratorUnavailableError } from '../models/errors';

/**
 * Wrapper around the `yt-dlp` executable.  Search, metadata and downloads are
 * all separate invocations; the process is run without a shell and its stdout
 * is handed back as a string.
 */

const AUDIO_FORMAT = 'bestaudio[ext=m4a]/bestaudio/best';
const VIDEO_FORMAT = 'best[height<=720][ext=mp4]/best[ext=mp4]/best';

const YOUTUBE_URL_PATTERNS = [
  'youtube.com/watch',
  'youtu.be/',
  'youtube.com/v/',
  'youtube.com/embed/',
  'youtube.com/shorts/',
  'm.youtube.com/watch',
];

export type YtDlpRunner = (args: string[]) => Promise<string>;

export interface MediaSearch {
  search(query: string, maxResults: number): Promise<SearchHit[]>;
}

export interface MediaFetch {
  fetchAudio(sourceLink: string, destDir: string, requestId: string): Promise<string | null>;
  fetchVideo(sourceLink: string, destDir: string, requestId: string): Promise<string | null>;
  describe(sourceLink: string): Promise<MediaDescription | null>;
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export function isYouTubeUrl(text: string): boolean {
  const lower = text.toLowerCase();
  return YOUTUBE_URL_PATTERNS.some((pattern) => lower.includes(pattern));
}

/** Spawns `binaryPath` and resolves with its stdout when it exits with 0. */
export function createYtDlpRunner(binaryPath: string, timeoutMs: number): YtDlpRunner {
  return (args) =>
    new Promise<string>((resolve, reject) => {
      const cmd = spawn(binaryPath, args, { timeout: timeoutMs });
      let stdout = '';
      let stderr = '';

      cmd.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      cmd.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });
      cmd.on('error', (err) => {
        reject(new CollaboratorUnavailableError('media', `Could not start ${binaryPath}`, err));
      });
      cmd.on('close', (code, signal) => {
        if (code === 0) {
          resolve(stdout);
          return;
        }
        const lastLine = stderr.trim().split('\n').pop() ?? '';
        const reason = signal ? `killed by ${signal}` : `exit code ${code}`;
        reject(new CollaboratorUnavailableError('media', `yt-dlp failed (${reason}): ${lastLine}`));
      });
    });
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function parseJson(stdout: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (err) {
    throw new CollaboratorUnavailableError('media', 'yt-dlp returned malformed JSON', err);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new CollaboratorUnavailableError('media', 'yt-dlp returned an unexpected document');
  }
  return Object.fromEntries(Object.entries(parsed));
}

function channelOf(entry: Record<string, unknown>): string {
  return asString(entry.uploader) ?? asString(entry.channel) ?? asString(entry.uploader_id) ?? 'Unknown Channel';
}

export class YtDlpMediaService implements MediaSearch, MediaFetch {
  constructor(private readonly run: YtDlpRunner) {}

  async search(query: string, maxResults: number): Promise<SearchHit[]> {
    console.log(`[mediaService] Searching for: ${query}`);
    const stdout = await this.run([
      '--flat-playlist',
      '--dump-single-json',
      '--no-warnings',
      `ytsearch${maxResults}:${query}`,
    ]);
    const document = parseJson(stdout);
    const entries = Array.isArray(document.entries) ? document.entries : [document];

    const hits: SearchHit[] = [];
    for (const raw of entries) {
      if (typeof raw !== 'object' || raw === null) continue;
      const entry = Object.fromEntries(Object.entries(raw));
      const id = asString(entry.id);
      const title = asString(entry.title);
      if (!id || !title) continue;

      hits.push({ id, title, channelName: channelOf(entry), sourceLink: watchUrl(id) });
      if (hits.length >= maxResults) break;
    }

    console.log(`[mediaService] ${hits.length} result(s) for: ${query}`);
    return hits;
  }

  async describe(sourceLink: string): Promise<MediaDescription | null> {
    const stdout = await this.run(['--dump-single-json', '--no-playlist', '--no-warnings', sourceLink]);
    const info = parseJson(stdout);
    const id = asString(info.id);
    if (!id) return null;

    return {
      id,
      title: asString(info.title) ?? 'Unknown Title',
      channelName: channelOf(info),
      durationSeconds: typeof info.duration === 'number' ? info.duration : null,
    };
  }

  fetchAudio(sourceLink: string, destDir: string, requestId: string): Promise<string | null> {
    return this.fetch(sourceLink, destDir, requestId, 'audio');
  }

  fetchVideo(sourceLink: string, destDir: string, requestId: string): Promise<string | null> {
    return this.fetch(sourceLink, destDir, requestId, 'video');
  }

  /**
   * Downloads into `<destDir>/<requestId>.<ext>`; the request id keeps
   * concurrent downloads of equally named titles apart.
   */
  private async fetch(
    sourceLink: string,
    destDir: string,
    requestId: string,
    format: MediaFormat,
  ): Promise<string | null> {
    await fs.mkdir(destDir, { recursive: true });
    console.log(`[mediaService] Starting ${format} download: ${sourceLink}`);

    let stdout: string;
    try {
      stdout = await this.run([
        '-f',
        format === 'audio' ? AUDIO_FORMAT : VIDEO_FORMAT,
        '--no-playlist',
        '--no-warnings',
        '--no-progress',
        '--output',
        path.join(destDir, `${requestId}.%(ext)s`),
        '--print',
        'after_move:filepath',
        '--no-simulate',
        sourceLink,
      ]);
    } catch (err) {
      await this.removeLeftovers(destDir, requestId);
      throw err;
    }

    const filePath = stdout.trim().split('\n').pop()?.trim();
    if (!filePath) return null;

    try {
      await fs.access(filePath);
    } catch {
      console.warn(`[mediaService] yt-dlp reported ${filePath} but it does not exist`);
      return null;
    }
    return filePath;
  }

  /** Partial downloads (`.part`, `.ytdl`, fragments) of an aborted request. */
  private async removeLeftovers(destDir: string, requestId: string): Promise<void> {
    try {
      const leftovers = (await fs.readdir(destDir)).filter((name) => name.startsWith(`${requestId}.`));
      await Promise.all(leftovers.map((name) => fs.rm(path.join(destDir, name), { force: true })));
    } catch (err) {
      console.warn(`[mediaService] Could not clean up partial files of ${requestId}`, err);
    }
  }
}
