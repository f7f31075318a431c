import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import { Candidate, DownloadTarget } from '../models/SessionModels';
import {
  DownloadRecord,
  FORMAT_TAGS,
  MediaDescription,
  Promo,
  SearchHit,
} from '../models/MediaModels';
import { SelectionError } from '../models/errors';
import { SessionManager } from './SessionManager';
import { MediaFetch, MediaSearch } from './mediaService';
import { DeliveryChannel } from './deliveryChannel';
import { DeferredTaskScheduler } from './deferredTaskScheduler';
import { runNonCritical } from './nonCritical';
import { DownloadSelection } from './callbackData';
import * as render from './resultRenderingService';

/** Result list sizes; fixed per entry point, never taken from the request. */
export const FRESH_SEARCH_LIMIT = 8;
export const LYRICS_SEARCH_LIMIT = 3;

/** Delay before the "processing…" status message is removed after delivery. */
export const STATUS_CLEANUP_DELAY_MS = 30_000;

export interface Requester {
  userId: number;
  chatId: number;
}

export interface DownloadLog {
  addDownload(record: DownloadRecord): void;
}

export interface PromoSource {
  getCurrentPromo(): Promo | null;
}

export interface LocalFiles {
  sizeOf(filePath: string): Promise<number>;
  remove(filePath: string): Promise<void>;
}

export const nodeLocalFiles: LocalFiles = {
  sizeOf: async (filePath) => (await fs.stat(filePath)).size,
  remove: (filePath) => fs.rm(filePath, { force: true }),
};

export interface DownloadWorkflowDeps {
  sessions: SessionManager;
  media: MediaSearch & MediaFetch;
  channel: DeliveryChannel;
  downloads: DownloadLog;
  promos: PromoSource;
  scheduler: DeferredTaskScheduler;
  tempDir: string;
  files?: LocalFiles;
  now?: () => Date;
  newRequestId?: () => string;
  statusCleanupDelayMs?: number;
}

export type SearchOutcome =
  | { state: 'Listed'; candidates: Candidate[]; statusMessageId: number }
  | { state: 'NoResults'; reason: 'empty' | 'unavailable'; statusMessageId: number };

export type LinkOutcome =
  | { state: 'LinkResolved'; target: DownloadTarget; statusMessageId: number }
  | { state: 'LinkFailed'; statusMessageId: number };

export type DownloadOutcome =
  | { state: 'Done'; record: DownloadRecord; promoShown: boolean }
  | { state: 'SessionExpired' }
  | { state: 'InvalidSelection' }
  | { state: 'FetchFailed'; target: DownloadTarget }
  | { state: 'DeliveryFailed'; target: DownloadTarget };

export interface SearchOptions {
  origin: render.ListOrigin;
  /** Edit this message instead of sending a new "searching" status */
  statusMessageId?: number;
}

/**
 * Search → pick → fetch → deliver, for one request of one user.
 *
 * The session only ever holds what the user was last shown.  A selection is
 * resolved against it before the fetch starts, so a newer search by the same
 * user cannot change what an in-flight download delivers.
 */
export class DownloadWorkflow {
  private readonly files: LocalFiles;
  private readonly now: () => Date;
  private readonly newRequestId: () => string;
  private readonly statusCleanupDelayMs: number;

  constructor(private readonly deps: DownloadWorkflowDeps) {
    this.files = deps.files ?? nodeLocalFiles;
    this.now = deps.now ?? (() => new Date());
    this.newRequestId = deps.newRequestId ?? randomUUID;
    this.statusCleanupDelayMs = deps.statusCleanupDelayMs ?? STATUS_CLEANUP_DELAY_MS;
  }

  private async showStatus(chatId: number, text: string, messageId?: number): Promise<number> {
    if (messageId != null) {
      await this.deps.channel.editText(chatId, messageId, text, { markdown: true });
      return messageId;
    }
    return this.deps.channel.sendText(chatId, text, { markdown: true });
  }

  async search(requester: Requester, query: string, options: SearchOptions): Promise<SearchOutcome> {
    const { channel, media, sessions } = this.deps;
    const limit = options.origin === 'fresh' ? FRESH_SEARCH_LIMIT : LYRICS_SEARCH_LIMIT;
    const statusMessageId = await this.showStatus(
      requester.chatId,
      render.searchingText(query, options.origin),
      options.statusMessageId,
    );

    let hits: SearchHit[];
    try {
      hits = await media.search(query, limit);
    } catch (err) {
      console.error(`[downloadWorkflow] Search failed for "${query}"`, err);
      await channel.editText(requester.chatId, statusMessageId, render.noResultsText('unavailable'));
      return { state: 'NoResults', reason: 'unavailable', statusMessageId };
    }

    if (hits.length === 0) {
      await channel.editText(requester.chatId, statusMessageId, render.noResultsText('empty'));
      return { state: 'NoResults', reason: 'empty', statusMessageId };
    }

    const candidates: Candidate[] = hits
      .slice(0, limit)
      .map(({ id, title, channelName }) => ({ id, title, channelName }));
    await sessions.put(requester.userId, { kind: 'candidates', items: candidates, originQuery: query });

    await channel.editText(requester.chatId, statusMessageId, render.candidateListText(query, options.origin), {
      markdown: true,
      keyboard: render.candidateListKeyboard(candidates, query, options.origin),
    });
    return { state: 'Listed', candidates, statusMessageId };
  }

  async resolveLink(requester: Requester, link: string): Promise<LinkOutcome> {
    const { channel, media, sessions } = this.deps;
    const statusMessageId = await this.showStatus(requester.chatId, render.PROCESSING_LINK_TEXT);

    let description: MediaDescription | null;
    try {
      description = await media.describe(link);
    } catch (err) {
      console.error(`[downloadWorkflow] Could not describe ${link}`, err);
      description = null;
    }

    if (!description) {
      await channel.editText(requester.chatId, statusMessageId, render.LINK_FAILED_TEXT, { markdown: true });
      return { state: 'LinkFailed', statusMessageId };
    }

    const item: Candidate = { id: description.id, title: description.title, channelName: description.channelName };
    await sessions.put(requester.userId, { kind: 'resolved', item, sourceLink: link });

    await channel.editText(requester.chatId, statusMessageId, render.linkConfirmText(description), {
      markdown: true,
      keyboard: render.linkConfirmKeyboard(item),
    });
    return { state: 'LinkResolved', target: { item, sourceLink: link }, statusMessageId };
  }

  /**
   * Handles a download button.  `statusMessageId` is the message holding the
   * button; it becomes the progress message and is removed after delivery.
   */
  async select(requester: Requester, selection: DownloadSelection, statusMessageId: number): Promise<DownloadOutcome> {
    const { channel, sessions } = this.deps;

    let target: DownloadTarget;
    try {
      target = await sessions.resolveTarget(requester.userId, selection.index, selection.expectedId);
    } catch (err) {
      if (!(err instanceof SelectionError)) throw err;
      if (err.type === 'SESSION_EXPIRED') {
        await channel.editText(requester.chatId, statusMessageId, render.SESSION_EXPIRED_TEXT);
        return { state: 'SessionExpired' };
      }
      await channel.editText(requester.chatId, statusMessageId, render.INVALID_SELECTION_TEXT);
      return { state: 'InvalidSelection' };
    }

    return this.download(requester, target, selection, statusMessageId);
  }

  private async download(
    requester: Requester,
    target: DownloadTarget,
    selection: DownloadSelection,
    statusMessageId: number,
  ): Promise<DownloadOutcome> {
    const { channel, media, tempDir } = this.deps;
    const { chatId } = requester;
    const { format } = selection;
    // The session still holds the target, so the same index and id resolve again
    const retry = render.retryKeyboard(selection.index, target.item.id);

    await channel.editText(chatId, statusMessageId, render.processingText(target.item.title, format), {
      markdown: true,
    });

    // ---------- Fetching ----------
    let filePath: string | null;
    try {
      const requestId = this.newRequestId();
      filePath =
        format === 'audio'
          ? await media.fetchAudio(target.sourceLink, tempDir, requestId)
          : await media.fetchVideo(target.sourceLink, tempDir, requestId);
    } catch (err) {
      console.error(`[downloadWorkflow] Fetch failed for ${target.sourceLink}`, err);
      filePath = null;
    }

    if (!filePath) {
      await channel.editText(chatId, statusMessageId, render.downloadFailedText(), { markdown: true, keyboard: retry });
      return { state: 'FetchFailed', target };
    }

    // ---------- Delivering ----------
    const localPath = filePath;
    try {
      const size = await this.files.sizeOf(localPath);
      const caption = render.mediaCaption(target.item, format, size);
      await channel.editText(chatId, statusMessageId, render.uploadingText(format), { markdown: true });

      if (format === 'audio') {
        await channel.sendAudio(
          chatId,
          { path: localPath, title: target.item.title, performer: target.item.channelName },
          caption,
        );
      } else {
        await channel.sendVideo(chatId, localPath, caption);
      }
    } catch (err) {
      console.error(`[downloadWorkflow] Delivery of ${target.item.id} to ${chatId} failed`, err);
      await runNonCritical('delivery failure notice', () =>
        channel.editText(chatId, statusMessageId, render.deliveryFailedText(), { markdown: true, keyboard: retry }),
      );
      return { state: 'DeliveryFailed', target };
    } finally {
      await runNonCritical(`remove ${localPath}`, () => this.files.remove(localPath));
    }

    const record: DownloadRecord = {
      userId: requester.userId,
      title: target.item.title,
      format: FORMAT_TAGS[format],
      effect: null,
      downloadedAt: this.now().toISOString(),
    };
    try {
      this.deps.downloads.addDownload(record);
    } catch (err) {
      // The file already reached the user; a lost history row is not worth an error message
      console.error(`[downloadWorkflow] Could not record download for user ${requester.userId}`, err);
    }

    await runNonCritical('completion notice', () =>
      channel.editText(chatId, statusMessageId, render.completeText(format), { markdown: true }),
    );

    // ---------- PromoShown ----------
    const promoShown = (await runNonCritical('promo', () => this.showPromo(chatId))) ?? false;

    // ---------- Done ----------
    this.deps.scheduler.schedule(`delete status ${chatId}/${statusMessageId}`, this.statusCleanupDelayMs, () =>
      channel.deleteMessage(chatId, statusMessageId),
    );

    return { state: 'Done', record, promoShown };
  }

  private async showPromo(chatId: number): Promise<boolean> {
    const promo = this.deps.promos.getCurrentPromo();
    if (!promo) return false;
    await this.deps.channel.sendText(chatId, render.PROMO_SEPARATOR);
    await this.deps.channel.sendPhoto(chatId, promo.fileId, promo.caption);
    return true;
  }
}
