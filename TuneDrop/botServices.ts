import { Telegram } from 'telegraf';
import { BotConfig } from './config';
import { createSessionStore } from './sessionStore';
import { isSessionPayload } from './models/SessionModels';
import { BotDatabase } from './services/databaseService';
import { SessionManager } from './services/SessionManager';
import { DownloadWorkflow } from './services/downloadWorkflow';
import { GeniusLyricsService, LyricsLookup } from './services/lyricsService';
import { createYtDlpRunner, YtDlpMediaService } from './services/mediaService';
import { AccessGate } from './services/accessGate';
import { AdminRegistry } from './services/adminRegistry';
import { TelegramDeliveryService } from './services/telegramDeliveryService';
import { DeferredTaskScheduler } from './services/deferredTaskScheduler';

/** Everything the handlers share, built once per process. */
export interface BotServices {
  config: BotConfig;
  db: BotDatabase;
  sessions: SessionManager;
  workflow: DownloadWorkflow;
  lyrics: LyricsLookup;
  gate: AccessGate;
  admins: AdminRegistry;
  delivery: TelegramDeliveryService;
  scheduler: DeferredTaskScheduler;
}

export function createServices(config: BotConfig, telegram: Telegram): BotServices {
  const db = new BotDatabase(config.databasePath);
  const sessions = new SessionManager(
    createSessionStore({ redisUrl: config.redisUrl, ttlSeconds: config.sessionTtlSeconds }, (raw) =>
      isSessionPayload(raw) ? raw : undefined,
    ),
  );
  const delivery = new TelegramDeliveryService(telegram);
  const scheduler = new DeferredTaskScheduler();
  const admins = new AdminRegistry(db, config.primaryAdminId, config.adminUserIds);
  const media = new YtDlpMediaService(createYtDlpRunner(config.ytDlpPath, config.ytDlpTimeoutMs));

  const workflow = new DownloadWorkflow({
    sessions,
    media,
    channel: delivery,
    downloads: db,
    promos: db,
    scheduler,
    tempDir: config.tempDir,
  });

  return {
    config,
    db,
    sessions,
    workflow,
    lyrics: new GeniusLyricsService(config.geniusToken),
    gate: new AccessGate(admins, db, delivery, config.membershipFailurePolicy),
    admins,
    delivery,
    scheduler,
  };
}
