import { SettingsStore } from './adminRegistry';

export const FORCED_CHANNEL_SETTING = 'forced_channel';

/**
 * What to do when the channel-membership check itself fails (Telegram error,
 * bot not in the channel…).  `open` lets the user through, `closed` blocks.
 */
export type MembershipFailurePolicy = 'open' | 'closed';

export const DEFAULT_MEMBERSHIP_FAILURE_POLICY: MembershipFailurePolicy = 'open';

export interface MembershipChecker {
  isMember(channel: string, userId: number): Promise<boolean>;
}

export interface AdminCheck {
  isAdmin(userId: number): boolean;
}

export class AccessGate {
  constructor(
    private readonly admins: AdminCheck,
    private readonly settings: Pick<SettingsStore, 'getSetting'>,
    private readonly membership: MembershipChecker,
    private readonly failurePolicy: MembershipFailurePolicy = DEFAULT_MEMBERSHIP_FAILURE_POLICY,
  ) {}

  /** Channel users must join, or null when the gate is disabled. */
  forcedChannel(): string | null {
    return this.settings.getSetting(FORCED_CHANNEL_SETTING);
  }

  async allowed(userId: number): Promise<boolean> {
    if (this.admins.isAdmin(userId)) return true;

    const channel = this.forcedChannel();
    if (!channel) return true;

    try {
      return await this.membership.isMember(channel, userId);
    } catch (err) {
      console.error(`[accessGate] Membership check failed for user ${userId} in ${channel}`, err);
      return this.failurePolicy === 'open';
    }
  }
}

/** Public join link for a channel stored as `@name`; null for numeric ids. */
export function channelJoinUrl(channel: string): string | null {
  return channel.startsWith('@') ? `https://t.me/${channel.slice(1)}` : null;
}
