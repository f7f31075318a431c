import { AccessGate, channelJoinUrl, MembershipChecker } from '../services/accessGate';

class FakeSettings {
  constructor(private readonly values: Record<string, string> = {}) {}

  getSetting(key: string): string | null {
    return this.values[key] ?? null;
  }
}

class FakeMembership implements MembershipChecker {
  readonly checks: Array<[string, number]> = [];

  constructor(private readonly result: boolean | Error) {}

  async isMember(channel: string, userId: number): Promise<boolean> {
    this.checks.push([channel, userId]);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

const admins = { isAdmin: (userId: number) => userId === 1 };

describe('AccessGate', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should let admins through without checking membership', async () => {
    const membership = new FakeMembership(false);
    const gate = new AccessGate(admins, new FakeSettings({ forced_channel: '@tunes' }), membership);

    expect(await gate.allowed(1)).toBe(true);
    expect(membership.checks).toEqual([]);
  });

  it('should let everyone through when no channel is configured', async () => {
    const gate = new AccessGate(admins, new FakeSettings(), new FakeMembership(false));
    expect(await gate.allowed(5)).toBe(true);
    expect(gate.forcedChannel()).toBeNull();
  });

  it('should follow the membership check when a channel is configured', async () => {
    const member = new FakeMembership(true);
    const stranger = new FakeMembership(false);

    expect(await new AccessGate(admins, new FakeSettings({ forced_channel: '@tunes' }), member).allowed(5)).toBe(true);
    expect(await new AccessGate(admins, new FakeSettings({ forced_channel: '@tunes' }), stranger).allowed(5)).toBe(false);
    expect(member.checks).toEqual([['@tunes', 5]]);
  });

  it('should allow the user when the check fails under the open policy', async () => {
    const gate = new AccessGate(
      admins,
      new FakeSettings({ forced_channel: '@tunes' }),
      new FakeMembership(new Error('Bad Request: member list is inaccessible')),
      'open',
    );
    expect(await gate.allowed(5)).toBe(true);
  });

  it('should deny the user when the check fails under the closed policy', async () => {
    const gate = new AccessGate(
      admins,
      new FakeSettings({ forced_channel: '@tunes' }),
      new FakeMembership(new Error('Bad Request: member list is inaccessible')),
      'closed',
    );
    expect(await gate.allowed(5)).toBe(false);
  });

  it('should build join links for public channels only', () => {
    expect(channelJoinUrl('@tunes')).toBe('https://t.me/tunes');
    expect(channelJoinUrl('-1001234567890')).toBeNull();
  });
});
