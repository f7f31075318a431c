import { ConfigError } from './models/errors';
import { DEFAULT_MEMBERSHIP_FAILURE_POLICY, MembershipFailurePolicy } from './services/accessGate';
import { parseIdList } from './services/adminRegistry';

/**
 * Runtime configuration, read from the environment (populated from `.env` by
 * dotenv in the entry points).  Evaluated at call time, never at import.
 */
export interface BotConfig {
  botToken: string;
  geniusToken?: string;
  primaryAdminId: number | null;
  adminUserIds: number[];
  tempDir: string;
  databasePath: string;
  ytDlpPath: string;
  ytDlpTimeoutMs: number;
  redisUrl?: string;
  sessionTtlSeconds?: number;
  membershipFailurePolicy: MembershipFailurePolicy;
  handlerTimeoutMs: number;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function positiveInt(name: string, value: string | undefined): number | undefined {
  const raw = optional(value);
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return Number(raw);
}

function membershipPolicy(value: string | undefined): MembershipFailurePolicy {
  const raw = optional(value)?.toLowerCase();
  if (raw === undefined) return DEFAULT_MEMBERSHIP_FAILURE_POLICY;
  if (raw === 'open' || raw === 'closed') return raw;
  throw new ConfigError(`MEMBERSHIP_FAILURE_POLICY must be "open" or "closed", got "${raw}"`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const botToken = optional(env.BOT_TOKEN);
  if (!botToken) {
    throw new ConfigError('BOT_TOKEN is not set');
  }

  const adminIdsRaw = env.ADMIN_USER_IDS ?? env.ADMIN_USER_ID ?? '';

  return {
    botToken,
    geniusToken: optional(env.GENIUS_API_TOKEN),
    primaryAdminId: positiveInt('PRIMARY_ADMIN_ID', env.PRIMARY_ADMIN_ID) ?? null,
    adminUserIds: parseIdList(adminIdsRaw),
    tempDir: optional(env.TEMP_DIR) ?? 'temp',
    databasePath: optional(env.DATABASE_PATH) ?? 'bot_database.db',
    ytDlpPath: optional(env.YT_DLP_PATH) ?? 'yt-dlp',
    ytDlpTimeoutMs: positiveInt('YT_DLP_TIMEOUT_MS', env.YT_DLP_TIMEOUT_MS) ?? 300_000,
    redisUrl: optional(env.REDIS_URL),
    sessionTtlSeconds: positiveInt('SESSION_TTL_SECONDS', env.SESSION_TTL_SECONDS),
    membershipFailurePolicy: membershipPolicy(env.MEMBERSHIP_FAILURE_POLICY),
    handlerTimeoutMs: positiveInt('HANDLER_TIMEOUT_MS', env.HANDLER_TIMEOUT_MS) ?? 600_000,
  };
}
