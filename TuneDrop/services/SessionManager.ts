import { KeyValueStore, MemoryStore } from '../sessionStore';
import { Candidate, DownloadTarget, SessionPayload } from '../models/SessionModels';
import { InvalidSelectionError, SessionExpiredError } from '../models/errors';
import { watchUrl } from './mediaService';

/**
 * Thin wrapper around the key-value store. One entry per user, replaced (never
 * merged) by every write, and read without being consumed.
 */
export class SessionManager {
  constructor(private readonly store: KeyValueStore<SessionPayload> = new MemoryStore<SessionPayload>()) {}

  /** Replace whatever the user had with `payload`. */
  async put(userId: number, payload: SessionPayload): Promise<void> {
    await this.store.set(userId.toString(), payload);
  }

  async get(userId: number): Promise<SessionPayload | undefined> {
    return this.store.get(userId.toString());
  }

  async close(): Promise<void> {
    await this.store.close?.();
  }

  /**
   * Looks up the candidate at `index` in the user's current list.  When
   * `expectedId` is given the candidate found there must carry that id, so a
   * button from an older (overwritten) list is rejected even if the index is
   * still in range.
   */
  async resolveCandidate(userId: number, index: number, expectedId?: string): Promise<Candidate> {
    const payload = await this.get(userId);
    if (!payload) throw new SessionExpiredError(userId);
    if (payload.kind !== 'candidates') {
      throw new InvalidSelectionError('Session holds a single link, not a result list');
    }
    return pickCandidate(payload.items, index, expectedId);
  }

  /**
   * Resolves a download button against whatever shape the session currently
   * has.  A resolved link is addressed as index 0.
   */
  async resolveTarget(userId: number, index: number, expectedId?: string): Promise<DownloadTarget> {
    const payload = await this.get(userId);
    if (!payload) throw new SessionExpiredError(userId);

    switch (payload.kind) {
      case 'candidates': {
        const item = pickCandidate(payload.items, index, expectedId);
        return { item, sourceLink: watchUrl(item.id) };
      }
      case 'resolved':
        return { item: pickCandidate([payload.item], index, expectedId), sourceLink: payload.sourceLink };
    }
  }
}

function pickCandidate(items: Candidate[], index: number, expectedId?: string): Candidate {
  if (!Number.isInteger(index) || index < 0 || index >= items.length) {
    throw new InvalidSelectionError(`Index ${index} is outside a list of ${items.length}`);
  }
  const candidate = items[index];
  if (expectedId !== undefined && candidate.id !== expectedId) {
    throw new InvalidSelectionError(`Item at ${index} is ${candidate.id}, expected ${expectedId}`);
  }
  return candidate;
}
