import { SessionManager } from '../services/SessionManager';
import { InvalidSelectionError, SelectionError, SessionExpiredError } from '../models/errors';
import { CandidateList, ResolvedTarget } from '../models/SessionModels';

const LIST: CandidateList = {
  kind: 'candidates',
  originQuery: 'despacito',
  items: [
    { id: 'kJQP7kiw5Fk', title: 'Despacito', channelName: 'LuisFonsiVEVO' },
    { id: 'abc123', title: 'Despacito (Cover)', channelName: 'Cover Band' },
  ],
};

const RESOLVED: ResolvedTarget = {
  kind: 'resolved',
  item: { id: 'xyz789', title: 'Live Session', channelName: 'Studio' },
  sourceLink: 'https://youtu.be/xyz789',
};

describe('SessionManager', () => {
  let sessions: SessionManager;

  beforeEach(() => {
    sessions = new SessionManager();
  });

  it('should replace the previous entry on every put', async () => {
    await sessions.put(1, LIST);
    await sessions.put(1, RESOLVED);
    expect(await sessions.get(1)).toEqual(RESOLVED);
  });

  it('should keep entries of different users apart', async () => {
    await sessions.put(1, LIST);
    await sessions.put(2, RESOLVED);
    expect(await sessions.get(1)).toEqual(LIST);
    expect(await sessions.get(2)).toEqual(RESOLVED);
  });

  it('should not consume the entry when resolving a candidate', async () => {
    await sessions.put(1, LIST);
    expect(await sessions.resolveCandidate(1, 1)).toEqual(LIST.items[1]);
    expect(await sessions.resolveCandidate(1, 1)).toEqual(LIST.items[1]);
    expect(await sessions.get(1)).toEqual(LIST);
  });

  it('should throw SessionExpired for a user without an entry', async () => {
    await expect(sessions.resolveCandidate(7, 0)).rejects.toBeInstanceOf(SessionExpiredError);
  });

  it.each([
    { label: 'an index past the end', index: 2 },
    { label: 'a negative index', index: -1 },
    { label: 'a fractional index', index: 0.5 },
  ])('should throw InvalidSelection for $label', async ({ index }) => {
    await sessions.put(1, LIST);
    await expect(sessions.resolveCandidate(1, index)).rejects.toBeInstanceOf(InvalidSelectionError);
  });

  it('should throw InvalidSelection when the entry is a resolved link', async () => {
    await sessions.put(1, RESOLVED);
    await expect(sessions.resolveCandidate(1, 0)).rejects.toBeInstanceOf(InvalidSelectionError);
  });

  it('should throw InvalidSelection when the id at the index differs', async () => {
    await sessions.put(1, LIST);
    await expect(sessions.resolveCandidate(1, 0, 'abc123')).rejects.toBeInstanceOf(InvalidSelectionError);
  });

  it('should tell the two selection errors apart by type', async () => {
    const expired = await sessions.resolveCandidate(9, 0).catch((err: unknown) => err);
    await sessions.put(9, LIST);
    const invalid = await sessions.resolveCandidate(9, 4).catch((err: unknown) => err);

    expect(expired instanceof SelectionError && expired.type).toBe('SESSION_EXPIRED');
    expect(invalid instanceof SelectionError && invalid.type).toBe('INVALID_SELECTION');
  });

  describe('resolveTarget', () => {
    it('should derive the watch link for a candidate', async () => {
      await sessions.put(1, LIST);
      expect(await sessions.resolveTarget(1, 0, 'kJQP7kiw5Fk')).toEqual({
        item: LIST.items[0],
        sourceLink: 'https://www.youtube.com/watch?v=kJQP7kiw5Fk',
      });
    });

    it('should return the stored link of a resolved entry at index 0', async () => {
      await sessions.put(1, RESOLVED);
      expect(await sessions.resolveTarget(1, 0, 'xyz789')).toEqual({
        item: RESOLVED.item,
        sourceLink: 'https://youtu.be/xyz789',
      });
    });

    it('should reject any other index for a resolved entry', async () => {
      await sessions.put(1, RESOLVED);
      await expect(sessions.resolveTarget(1, 1)).rejects.toBeInstanceOf(InvalidSelectionError);
    });

    it('should throw SessionExpired without an entry', async () => {
      await expect(sessions.resolveTarget(1, 0)).rejects.toBeInstanceOf(SessionExpiredError);
    });
  });
});
