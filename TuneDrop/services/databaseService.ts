import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import {
  BotUser,
  DownloadRecord,
  DownloadStats,
  FormatTag,
  Promo,
  UserCounts,
} from '../models/MediaModels';
import { PersistenceFailureError } from '../models/errors';

/**
 * SQLite persistence for users, download history, bot settings and the promo
 * banner.  better-sqlite3 is synchronous, so every method returns directly.
 *
 * Tables:
 *   users         – one row per Telegram user, upserted on every interaction
 *   downloads     – append-only history
 *   bot_settings  – key/value switches (absent key = feature off)
 *   promos        – banner history; the newest row is the current one
 */

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    user_id INTEGER PRIMARY KEY,
    username TEXT,
    first_name TEXT,
    last_name TEXT,
    joined_at TEXT NOT NULL,
    last_active TEXT NOT NULL,
    is_active INTEGER NOT NULL DEFAULT 1
  );

  CREATE TABLE IF NOT EXISTS downloads (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL,
    song_title TEXT NOT NULL,
    format TEXT NOT NULL,
    effect TEXT,
    downloaded_at TEXT NOT NULL,
    FOREIGN KEY (user_id) REFERENCES users (user_id)
  );

  CREATE TABLE IF NOT EXISTS bot_settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS promos (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    file_id TEXT NOT NULL,
    caption TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
`;

interface CountRow {
  count: number;
}

interface DownloadRow {
  user_id: number;
  song_title: string;
  format: FormatTag;
  effect: string | null;
  downloaded_at: string;
}

interface PromoRow {
  file_id: string;
  caption: string;
  created_at: string;
}

interface GroupRow {
  label: string;
  count: number;
}

export type Clock = () => Date;

export class BotDatabase {
  private readonly db: Database.Database;

  constructor(dbPath: string, private readonly now: Clock = () => new Date()) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA);
    console.log(`[databaseService] Opened ${dbPath}`);
  }

  close(): void {
    this.db.close();
  }

  /** Runs a write and reports any driver error as a PersistenceFailureError. */
  private write<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      console.error(`[databaseService] ${operation} failed`, err);
      throw new PersistenceFailureError(operation, err);
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  // ---------------- Users ----------------

  /** Creates the user on first contact; later calls refresh names and activity. */
  upsertUser(user: BotUser): void {
    const ts = this.timestamp();
    this.write('upsertUser', () =>
      this.db
        .prepare(
          `INSERT INTO users (user_id, username, first_name, last_name, joined_at, last_active, is_active)
           VALUES (?, ?, ?, ?, ?, ?, 1)
           ON CONFLICT(user_id) DO UPDATE SET
             username = excluded.username,
             first_name = excluded.first_name,
             last_name = excluded.last_name,
             last_active = excluded.last_active,
             is_active = 1`,
        )
        .run(user.id, user.username ?? null, user.firstName ?? null, user.lastName ?? null, ts, ts),
    );
  }

  setUserActive(userId: number, active: boolean): void {
    this.write('setUserActive', () =>
      this.db.prepare('UPDATE users SET is_active = ? WHERE user_id = ?').run(active ? 1 : 0, userId),
    );
  }

  getUserCounts(): UserCounts {
    const total = this.db.prepare<[], CountRow>('SELECT COUNT(*) AS count FROM users').get();
    const active = this.db.prepare<[], CountRow>('SELECT COUNT(*) AS count FROM users WHERE is_active = 1').get();
    return { total: total?.count ?? 0, active: active?.count ?? 0 };
  }

  /** Recipients of a broadcast. */
  listActiveUserIds(): number[] {
    const rows = this.db
      .prepare<[], { user_id: number }>('SELECT user_id FROM users WHERE is_active = 1 ORDER BY user_id')
      .all();
    return rows.map((r) => r.user_id);
  }

  // ---------------- Downloads ----------------

  addDownload(record: DownloadRecord): void {
    this.write('addDownload', () =>
      this.db
        .prepare(
          'INSERT INTO downloads (user_id, song_title, format, effect, downloaded_at) VALUES (?, ?, ?, ?, ?)',
        )
        .run(record.userId, record.title, record.format, record.effect, record.downloadedAt),
    );
  }

  recentDownloads(userId: number, limit: number): DownloadRecord[] {
    const rows = this.db
      .prepare<[number, number], DownloadRow>(
        `SELECT user_id, song_title, format, effect, downloaded_at FROM downloads
         WHERE user_id = ? ORDER BY downloaded_at DESC, id DESC LIMIT ?`,
      )
      .all(userId, limit);
    return rows.map((r) => ({
      userId: r.user_id,
      title: r.song_title,
      format: r.format,
      effect: r.effect,
      downloadedAt: r.downloaded_at,
    }));
  }

  getDownloadStats(): DownloadStats {
    const total = this.db.prepare<[], CountRow>('SELECT COUNT(*) AS count FROM downloads').get();
    const today = this.db
      .prepare<[string], CountRow>('SELECT COUNT(*) AS count FROM downloads WHERE substr(downloaded_at, 1, 10) = ?')
      .get(this.timestamp().slice(0, 10));
    const formats = this.db
      .prepare<[], GroupRow>('SELECT format AS label, COUNT(*) AS count FROM downloads GROUP BY format')
      .all();
    const effects = this.db
      .prepare<[], GroupRow>(
        'SELECT effect AS label, COUNT(*) AS count FROM downloads WHERE effect IS NOT NULL GROUP BY effect',
      )
      .all();

    const toRecord = (rows: GroupRow[]) => Object.fromEntries(rows.map((r) => [r.label, r.count]));
    return {
      total: total?.count ?? 0,
      today: today?.count ?? 0,
      formats: toRecord(formats),
      effects: toRecord(effects),
    };
  }

  // ---------------- Settings ----------------

  getSetting(key: string): string | null {
    const row = this.db.prepare<[string], { value: string }>('SELECT value FROM bot_settings WHERE key = ?').get(key);
    return row ? row.value : null;
  }

  setSetting(key: string, value: string): void {
    this.write('setSetting', () =>
      this.db
        .prepare(
          'INSERT INTO bot_settings (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value',
        )
        .run(key, value),
    );
  }

  deleteSetting(key: string): void {
    this.write('deleteSetting', () => this.db.prepare('DELETE FROM bot_settings WHERE key = ?').run(key));
  }

  // ---------------- Promo ----------------

  /** Newest promo by creation time; equal timestamps fall back to the later row. */
  getCurrentPromo(): Promo | null {
    const row = this.db
      .prepare<[], PromoRow>('SELECT file_id, caption, created_at FROM promos ORDER BY created_at DESC, id DESC LIMIT 1')
      .get();
    return row ? { fileId: row.file_id, caption: row.caption, createdAt: row.created_at } : null;
  }

  /** Deletes every promo and inserts `promo` in one transaction. */
  replacePromo(promo: { fileId: string; caption: string }): Promo {
    const created: Promo = { ...promo, createdAt: this.timestamp() };
    const replace = this.db.transaction(() => {
      this.db.prepare('DELETE FROM promos').run();
      this.db
        .prepare('INSERT INTO promos (file_id, caption, created_at) VALUES (?, ?, ?)')
        .run(created.fileId, created.caption, created.createdAt);
    });
    this.write('replacePromo', () => replace());
    return created;
  }

  /** Returns how many promos were removed. */
  deleteAllPromos(): number {
    return this.write('deleteAllPromos', () => this.db.prepare('DELETE FROM promos').run().changes);
  }
}
