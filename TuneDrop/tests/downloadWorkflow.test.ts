import type { InlineKeyboardMarkup } from 'telegraf/typings/core/types/typegram';
import { DownloadWorkflow, Requester } from '../services/downloadWorkflow';
import { SessionManager } from '../services/SessionManager';
import { DeferredTaskScheduler } from '../services/deferredTaskScheduler';
import { BotDatabase } from '../services/databaseService';
import { PersistenceFailureError } from '../models/errors';
import * as render from '../services/resultRenderingService';
import { FakeChannel, FakeFiles, FakeMedia, hit } from './fakes';

const USER: Requester = { userId: 42, chatId: 42 };
const TEMP_DIR = '/tmp/tunedrop-test';
const NOW = new Date('2024-05-01T12:00:00.000Z');

function callbackData(markup: InlineKeyboardMarkup | undefined): string[] {
  if (!markup) return [];
  return markup.inline_keyboard.flat().map((button) => ('callback_data' in button ? button.callback_data : ''));
}

describe('DownloadWorkflow', () => {
  let channel: FakeChannel;
  let media: FakeMedia;
  let files: FakeFiles;
  let sessions: SessionManager;
  let scheduler: DeferredTaskScheduler;
  let db: BotDatabase;
  let workflow: DownloadWorkflow;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    channel = new FakeChannel();
    media = new FakeMedia();
    files = new FakeFiles();
    sessions = new SessionManager();
    scheduler = new DeferredTaskScheduler();
    db = new BotDatabase(':memory:', () => NOW);
    db.upsertUser({ id: USER.userId, username: 'listener' });

    workflow = new DownloadWorkflow({
      sessions,
      media,
      channel,
      downloads: db,
      promos: db,
      scheduler,
      tempDir: TEMP_DIR,
      files,
      now: () => NOW,
      newRequestId: () => 'req-1',
    });
  });

  afterEach(() => {
    scheduler.cancelAll();
    db.close();
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  describe('search', () => {
    it('should list candidates and store them for the user', async () => {
      media.hits = [hit('kJQP7kiw5Fk', 'Luis Fonsi - Despacito', 'LuisFonsiVEVO'), hit('abc123', 'Despacito (Lyrics)')];

      const outcome = await workflow.search(USER, 'despacito', { origin: 'fresh' });

      expect(outcome).toEqual({
        state: 'Listed',
        statusMessageId: 100,
        candidates: [
          { id: 'kJQP7kiw5Fk', title: 'Luis Fonsi - Despacito', channelName: 'LuisFonsiVEVO' },
          { id: 'abc123', title: 'Despacito (Lyrics)', channelName: 'Test Channel' },
        ],
      });
      expect(media.searchCalls).toEqual([{ query: 'despacito', maxResults: 8 }]);
      expect(await sessions.get(USER.userId)).toEqual({
        kind: 'candidates',
        originQuery: 'despacito',
        items: [
          { id: 'kJQP7kiw5Fk', title: 'Luis Fonsi - Despacito', channelName: 'LuisFonsiVEVO' },
          { id: 'abc123', title: 'Despacito (Lyrics)', channelName: 'Test Channel' },
        ],
      });
      expect(channel.calls[0]).toEqual({
        op: 'sendText',
        chatId: 42,
        text: '🔍 *Searching for:* despacito...',
        options: { markdown: true },
        messageId: 100,
      });
      expect(channel.lastTextOf(100)).toBe(render.candidateListText('despacito', 'fresh'));
    });

    it('should render one audio and one video button per candidate plus two navigation rows', async () => {
      media.hits = [hit('id0', 'First'), hit('id1', 'Second'), hit('id2', 'Third')];

      await workflow.search(USER, 'three songs', { origin: 'fresh' });

      const last = channel.calls[channel.calls.length - 1];
      expect(last.op).toBe('editText');
      const markup = last.op === 'editText' ? last.options?.keyboard : undefined;
      expect(markup?.inline_keyboard.length).toBe(8);
      expect(callbackData(markup)).toEqual([
        'dl:a:0:id0',
        'dl:v:0:id0',
        'dl:a:1:id1',
        'dl:v:1:id1',
        'dl:a:2:id2',
        'dl:v:2:id2',
        'lyr:three songs',
        'search_again',
      ]);
    });

    it('should never list more than 8 candidates for a fresh search', async () => {
      media.hits = Array.from({ length: 12 }, (_, i) => hit(`id${i}`, `Song ${i}`));

      const outcome = await workflow.search(USER, 'many', { origin: 'fresh' });

      expect(outcome.state === 'Listed' ? outcome.candidates.length : 0).toBe(8);
    });

    it('should ask for 3 results and edit the given message for the lyrics origin', async () => {
      media.hits = [hit('id0', 'Song 0'), hit('id1', 'Song 1'), hit('id2', 'Song 2'), hit('id3', 'Song 3')];

      const outcome = await workflow.search(USER, 'Song Artist', { origin: 'lyrics', statusMessageId: 77 });

      expect(media.searchCalls).toEqual([{ query: 'Song Artist', maxResults: 3 }]);
      expect(outcome.statusMessageId).toBe(77);
      expect(channel.ops()).toEqual(['editText', 'editText']);
      expect(channel.lastTextOf(77)).toBe('🎵 *YouTube Results for:* Song Artist\n\nChoose a song to download as MP3 or MP4:');
    });

    it('should report NoResults and leave the session alone on an empty result', async () => {
      media.hits = [];

      const outcome = await workflow.search(USER, 'zzzz', { origin: 'fresh' });

      expect(outcome).toEqual({ state: 'NoResults', reason: 'empty', statusMessageId: 100 });
      expect(await sessions.get(USER.userId)).toBeUndefined();
      expect(channel.lastTextOf(100)).toBe('❌ No results found. Please try a different search term.');
    });

    it('should keep the previous list when the search collaborator fails', async () => {
      media.hits = [hit('id0', 'Kept')];
      await workflow.search(USER, 'first', { origin: 'fresh' });
      const before = await sessions.get(USER.userId);

      media.searchError = new Error('yt-dlp exploded');
      const outcome = await workflow.search(USER, 'second', { origin: 'fresh' });

      expect(outcome).toEqual({ state: 'NoResults', reason: 'unavailable', statusMessageId: 101 });
      expect(await sessions.get(USER.userId)).toEqual(before);
    });
  });

  describe('select', () => {
    it('should deliver the picked song, record it as mp3 and show exactly one promo after it', async () => {
      db.replacePromo({ fileId: 'promo-file', caption: 'Summer playlist' });
      media.hits = [hit('kJQP7kiw5Fk', 'Luis Fonsi - Despacito', 'LuisFonsiVEVO'), hit('abc123', 'Despacito (Lyrics)')];
      await workflow.search(USER, 'despacito', { origin: 'fresh' });

      const outcome = await workflow.select(USER, { format: 'audio', index: 0, expectedId: 'kJQP7kiw5Fk' }, 100);

      expect(outcome).toEqual({
        state: 'Done',
        promoShown: true,
        record: {
          userId: 42,
          title: 'Luis Fonsi - Despacito',
          format: 'mp3',
          effect: null,
          downloadedAt: '2024-05-01T12:00:00.000Z',
        },
      });
      expect(media.fetchCalls).toEqual([
        {
          format: 'audio',
          sourceLink: 'https://www.youtube.com/watch?v=kJQP7kiw5Fk',
          destDir: TEMP_DIR,
          requestId: 'req-1',
        },
      ]);
      expect(channel.ops().filter((op) => op === 'sendAudio' || op === 'sendPhoto' || op === 'sendText')).toEqual([
        'sendText',
        'sendAudio',
        'sendText',
        'sendPhoto',
      ]);
      expect(channel.calls.filter((call) => call.op === 'sendText')[1]).toEqual({
        op: 'sendText',
        chatId: 42,
        text: '━━━━━━━━━━━━━━━━━━━',
        options: undefined,
        messageId: 101,
      });
      expect(channel.calls.find((call) => call.op === 'sendAudio')).toEqual({
        op: 'sendAudio',
        chatId: 42,
        file: { path: '/tmp/tunedrop-test/req-1.m4a', title: 'Luis Fonsi - Despacito', performer: 'LuisFonsiVEVO' },
        caption: render.mediaCaption(
          { id: 'kJQP7kiw5Fk', title: 'Luis Fonsi - Despacito', channelName: 'LuisFonsiVEVO' },
          'audio',
          3 * 1024 * 1024,
        ),
      });
      expect(channel.calls.find((call) => call.op === 'sendPhoto')).toEqual({
        op: 'sendPhoto',
        chatId: 42,
        fileId: 'promo-file',
        caption: 'Summer playlist',
      });
      expect(channel.lastTextOf(100)).toBe('✅ *Download Complete!*\n\nYour MP3 has been sent above! 🎵');
      expect(files.removed).toEqual(['/tmp/tunedrop-test/req-1.m4a']);
      expect(db.recentDownloads(42, 10)).toEqual([
        {
          userId: 42,
          title: 'Luis Fonsi - Despacito',
          format: 'mp3',
          effect: null,
          downloadedAt: '2024-05-01T12:00:00.000Z',
        },
      ]);
    });

    it('should report promoShown false and send no photo without a promo', async () => {
      media.hits = [hit('id0', 'Song')];
      await workflow.search(USER, 'song', { origin: 'fresh' });

      const outcome = await workflow.select(USER, { format: 'video', index: 0, expectedId: 'id0' }, 100);

      expect(outcome.state === 'Done' && outcome.promoShown).toBe(false);
      expect(outcome.state === 'Done' && outcome.record.format).toBe('mp4');
      expect(channel.ops()).not.toContain('sendPhoto');
      expect(channel.ops()).toContain('sendVideo');
    });

    it('should report SessionExpired when the user has no session', async () => {
      const outcome = await workflow.select(USER, { format: 'audio', index: 0, expectedId: 'id0' }, 55);

      expect(outcome).toEqual({ state: 'SessionExpired' });
      expect(channel.lastTextOf(55)).toBe('❌ Session expired. Please search again.');
      expect(media.fetchCalls).toEqual([]);
    });

    it('should resolve against the newest list and reject buttons of the overwritten one', async () => {
      media.hits = [hit('A', 'Song A'), hit('B', 'Song B')];
      await workflow.search(USER, 'first', { origin: 'fresh' });
      media.hits = [hit('C', 'Song C'), hit('D', 'Song D')];
      await workflow.search(USER, 'second', { origin: 'fresh' });

      const stale = await workflow.select(USER, { format: 'audio', index: 0, expectedId: 'A' }, 100);
      expect(stale).toEqual({ state: 'InvalidSelection' });
      expect(channel.lastTextOf(100)).toBe('❌ Invalid selection. Please search again.');
      expect(media.fetchCalls).toEqual([]);

      const fresh = await workflow.select(USER, { format: 'audio', index: 1, expectedId: 'D' }, 101);
      expect(fresh.state).toBe('Done');
      expect(media.fetchCalls.map((call) => call.sourceLink)).toEqual(['https://www.youtube.com/watch?v=D']);
    });

    it('should reject an index outside the current list', async () => {
      media.hits = [hit('A', 'Song A')];
      await workflow.search(USER, 'one', { origin: 'fresh' });

      const outcome = await workflow.select(USER, { format: 'audio', index: 5, expectedId: 'A' }, 100);

      expect(outcome).toEqual({ state: 'InvalidSelection' });
    });

    it('should leave the session untouched and record nothing when the fetch fails', async () => {
      media.hits = [hit('A', 'Song A')];
      await workflow.search(USER, 'one', { origin: 'fresh' });
      const before = await sessions.get(USER.userId);
      media.fetchError = new Error('network down');

      const outcome = await workflow.select(USER, { format: 'audio', index: 0, expectedId: 'A' }, 100);

      expect(outcome.state).toBe('FetchFailed');
      expect(await sessions.get(USER.userId)).toEqual(before);
      expect(db.recentDownloads(42, 10)).toEqual([]);
      expect(channel.ops()).not.toContain('sendAudio');
      expect(channel.lastTextOf(100)).toBe(render.downloadFailedText());
    });

    it('should offer both formats of the failed item again after a failed fetch', async () => {
      media.hits = [hit('A', 'Song A'), hit('B', 'Song B')];
      await workflow.search(USER, 'two', { origin: 'fresh' });
      media.fetchError = new Error('network down');

      await workflow.select(USER, { format: 'audio', index: 1, expectedId: 'B' }, 100);

      const last = channel.calls[channel.calls.length - 1];
      expect(last.op === 'editText' && last.text).toBe(
        '❌ *Download failed!*\n\nPlease try again below or search once more.',
      );
      expect(callbackData(last.op === 'editText' ? last.options?.keyboard : undefined)).toEqual([
        'dl:a:1:B',
        'dl:v:1:B',
      ]);

      media.fetchError = null;
      const retried = await workflow.select(USER, { format: 'audio', index: 1, expectedId: 'B' }, 100);
      expect(retried.state === 'Done' && retried.record.title).toBe('Song B');
    });

    it('should deliver the item picked even when a new search replaces the list mid-fetch', async () => {
      media.hits = [hit('A', 'Song A'), hit('B', 'Song B')];
      await workflow.search(USER, 'first', { origin: 'fresh' });
      media.onFetch = () =>
        sessions.put(USER.userId, {
          kind: 'candidates',
          originQuery: 'second',
          items: [{ id: 'C', title: 'Song C', channelName: 'Other Channel' }],
        });

      const outcome = await workflow.select(USER, { format: 'audio', index: 0, expectedId: 'A' }, 100);

      expect(outcome.state === 'Done' && outcome.record.title).toBe('Song A');
      expect(media.fetchCalls.map((call) => call.sourceLink)).toEqual(['https://www.youtube.com/watch?v=A']);
      const sent = channel.calls.find((call) => call.op === 'sendAudio');
      expect(sent?.op === 'sendAudio' && sent.file.title).toBe('Song A');
      expect(db.recentDownloads(42, 10).map((record) => record.title)).toEqual(['Song A']);
    });

    it('should treat a fetch without a file as FetchFailed', async () => {
      media.hits = [hit('A', 'Song A')];
      await workflow.search(USER, 'one', { origin: 'fresh' });
      media.fetchResult = null;

      const outcome = await workflow.select(USER, { format: 'audio', index: 0, expectedId: 'A' }, 100);

      expect(outcome.state).toBe('FetchFailed');
      expect(files.removed).toEqual([]);
    });

    it('should remove the temp file and record nothing when sending fails', async () => {
      media.hits = [hit('A', 'Song A')];
      await workflow.search(USER, 'one', { origin: 'fresh' });
      channel.failing.add('sendAudio');

      const outcome = await workflow.select(USER, { format: 'audio', index: 0, expectedId: 'A' }, 100);

      expect(outcome.state).toBe('DeliveryFailed');
      expect(files.removed).toEqual(['/tmp/tunedrop-test/req-1.m4a']);
      expect(db.recentDownloads(42, 10)).toEqual([]);
      expect(channel.lastTextOf(100)).toBe(render.deliveryFailedText());
      const last = channel.calls[channel.calls.length - 1];
      expect(callbackData(last.op === 'editText' ? last.options?.keyboard : undefined)).toEqual([
        'dl:a:0:A',
        'dl:v:0:A',
      ]);
    });

    it('should still finish with Done when the promo cannot be sent', async () => {
      db.replacePromo({ fileId: 'promo-file', caption: 'Summer playlist' });
      media.hits = [hit('A', 'Song A')];
      await workflow.search(USER, 'one', { origin: 'fresh' });
      channel.failing.add('sendPhoto');

      const outcome = await workflow.select(USER, { format: 'audio', index: 0, expectedId: 'A' }, 100);

      expect(outcome.state).toBe('Done');
      expect(outcome.state === 'Done' && outcome.promoShown).toBe(false);
      expect(db.recentDownloads(42, 10).length).toBe(1);
    });

    it('should still finish with Done when the history write fails', async () => {
      media.hits = [hit('A', 'Song A')];
      await workflow.search(USER, 'one', { origin: 'fresh' });
      jest.spyOn(db, 'addDownload').mockImplementation(() => {
        throw new PersistenceFailureError('addDownload', new Error('disk full'));
      });

      const outcome = await workflow.select(USER, { format: 'audio', index: 0, expectedId: 'A' }, 100);

      expect(outcome.state).toBe('Done');
      expect(channel.lastTextOf(100)).toBe(render.completeText('audio'));
    });

    it('should delete the status message 30 seconds after delivery', async () => {
      jest.useFakeTimers();
      media.hits = [hit('A', 'Song A')];
      await workflow.search(USER, 'one', { origin: 'fresh' });
      await workflow.select(USER, { format: 'audio', index: 0, expectedId: 'A' }, 100);

      expect(scheduler.pendingCount).toBe(1);
      await jest.advanceTimersByTimeAsync(29_999);
      expect(channel.ops()).not.toContain('deleteMessage');

      await jest.advanceTimersByTimeAsync(1);
      expect(channel.calls[channel.calls.length - 1]).toEqual({ op: 'deleteMessage', chatId: 42, messageId: 100 });
      expect(scheduler.pendingCount).toBe(0);
    });

    it('should only log a failing status cleanup', async () => {
      jest.useFakeTimers();
      media.hits = [hit('A', 'Song A')];
      await workflow.search(USER, 'one', { origin: 'fresh' });
      const outcome = await workflow.select(USER, { format: 'audio', index: 0, expectedId: 'A' }, 100);
      channel.failing.add('deleteMessage');

      await jest.advanceTimersByTimeAsync(30_000);

      expect(outcome.state).toBe('Done');
      expect(console.error).toHaveBeenCalledWith(
        '[deferredTaskScheduler] Task "delete status 42/100" failed',
        expect.any(Error),
      );
    });
  });

  describe('links', () => {
    it('should confirm a direct link and download it from the link itself', async () => {
      media.description = { id: 'kJQP7kiw5Fk', title: 'Despacito', channelName: 'LuisFonsiVEVO', durationSeconds: 282 };

      const resolved = await workflow.resolveLink(USER, 'https://youtu.be/kJQP7kiw5Fk');

      expect(resolved).toEqual({
        state: 'LinkResolved',
        statusMessageId: 100,
        target: {
          item: { id: 'kJQP7kiw5Fk', title: 'Despacito', channelName: 'LuisFonsiVEVO' },
          sourceLink: 'https://youtu.be/kJQP7kiw5Fk',
        },
      });
      expect(channel.lastTextOf(100)).toBe(
        '🎵 *Video Found:*\n📺 *Despacito*\n👤 *By:* LuisFonsiVEVO (4:42)\n\nDo you want to download it?',
      );

      const outcome = await workflow.select(USER, { format: 'video', index: 0, expectedId: 'kJQP7kiw5Fk' }, 100);

      expect(outcome.state).toBe('Done');
      expect(media.fetchCalls).toEqual([
        { format: 'video', sourceLink: 'https://youtu.be/kJQP7kiw5Fk', destDir: TEMP_DIR, requestId: 'req-1' },
      ]);
      expect(channel.calls.find((call) => call.op === 'sendVideo')).toEqual({
        op: 'sendVideo',
        chatId: 42,
        filePath: '/tmp/tunedrop-test/req-1.mp4',
        caption: render.mediaCaption(
          { id: 'kJQP7kiw5Fk', title: 'Despacito', channelName: 'LuisFonsiVEVO' },
          'video',
          3 * 1024 * 1024,
        ),
      });
    });

    it('should report LinkFailed without touching the session', async () => {
      media.description = null;

      const outcome = await workflow.resolveLink(USER, 'https://youtu.be/missing');

      expect(outcome).toEqual({ state: 'LinkFailed', statusMessageId: 100 });
      expect(await sessions.get(USER.userId)).toBeUndefined();
      expect(channel.lastTextOf(100)).toBe('❌ *Error:* Could not get video information. Please check the URL.');
    });
  });
});
