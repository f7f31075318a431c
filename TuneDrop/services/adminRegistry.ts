/**
 * Keeps the list of bot administrators.
 *
 * The primary admin comes from configuration, is always part of the list and
 * can never be removed.  The remaining ids start out as configured in the
 * environment; once the primary admin adds or removes someone the whole list
 * is written to the `admin_user_ids` setting, which wins from then on.
 */

export const ADMIN_IDS_SETTING = 'admin_user_ids';

export interface SettingsStore {
  getSetting(key: string): string | null;
  setSetting(key: string, value: string): void;
  deleteSetting(key: string): void;
}

export type AddAdminResult = 'added' | 'already_admin';
export type RemoveAdminResult = 'removed' | 'not_admin' | 'primary';

export function parseIdList(raw: string): number[] {
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => /^\d+$/.test(part))
    .map(Number);
}

export class AdminRegistry {
  constructor(
    private readonly settings: SettingsStore,
    private readonly primaryAdminId: number | null,
    private readonly configuredIds: number[],
  ) {}

  private storedIds(): number[] {
    const stored = this.settings.getSetting(ADMIN_IDS_SETTING);
    return stored != null ? parseIdList(stored) : this.configuredIds;
  }

  get primaryId(): number | null {
    return this.primaryAdminId;
  }

  list(): number[] {
    const ids = new Set(this.storedIds());
    if (this.primaryAdminId != null) ids.add(this.primaryAdminId);
    return [...ids];
  }

  isAdmin(userId: number): boolean {
    return this.list().includes(userId);
  }

  isPrimaryAdmin(userId: number): boolean {
    return this.primaryAdminId != null && userId === this.primaryAdminId;
  }

  add(userId: number): AddAdminResult {
    const ids = this.list();
    if (ids.includes(userId)) return 'already_admin';
    this.persist([...ids, userId]);
    return 'added';
  }

  remove(userId: number): RemoveAdminResult {
    if (this.isPrimaryAdmin(userId)) return 'primary';
    const ids = this.list();
    if (!ids.includes(userId)) return 'not_admin';
    this.persist(ids.filter((id) => id !== userId));
    return 'removed';
  }

  private persist(ids: number[]): void {
    this.settings.setSetting(ADMIN_IDS_SETTING, ids.join(','));
  }
}
