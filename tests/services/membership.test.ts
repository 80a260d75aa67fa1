import fs from 'fs';
import { Economy } from '../../src/economy';
import { createClock, createTestEconomy, TestClock } from '../support/testEconomy';

jest.mock('fs', () => ({
  existsSync: jest.fn(),
  mkdirSync: jest.fn(),
  readFileSync: jest.fn(),
  promises: {
    writeFile: jest.fn()
  }
}));

describe('Memberships', () => {
  let clock: TestClock;
  let economy: Economy;

  beforeEach(() => {
    jest.mocked(fs.existsSync).mockReturnValue(false);
    jest.mocked(fs.promises.writeFile).mockResolvedValue(undefined);
    clock = createClock('2026-03-10T12:00:00.000Z');
    economy = createTestEconomy(clock, ['ADMIN1']);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  test('a new membership starts now', async () => {
    const membership = await economy.memberships.extend('U1', 10);

    expect(membership).toEqual({
      userId: 'U1',
      startedAt: '2026-03-10T12:00:00.000Z',
      expiresAt: '2026-03-20T12:00:00.000Z'
    });
    expect(economy.memberships.isActive('U1')).toBe(true);
  });

  test('an active membership is extended from its expiry', async () => {
    await economy.memberships.extend('U1', 10);
    clock.set('2026-03-15T00:00:00.000Z');

    const membership = await economy.memberships.extend('U1', 5);

    expect(membership.startedAt).toBe('2026-03-10T12:00:00.000Z');
    expect(membership.expiresAt).toBe('2026-03-25T12:00:00.000Z');
  });

  test('a lapsed membership restarts from now', async () => {
    await economy.memberships.extend('U1', 1);
    clock.set('2026-04-01T08:00:00.000Z');

    expect(economy.memberships.isActive('U1')).toBe(false);
    const membership = await economy.memberships.extend('U1', 2);

    expect(membership).toEqual({
      userId: 'U1',
      startedAt: '2026-04-01T08:00:00.000Z',
      expiresAt: '2026-04-03T08:00:00.000Z'
    });
  });

  test('roles rank admins above VIPs', async () => {
    await economy.memberships.extend('U1', 3);
    await economy.memberships.extend('ADMIN1', 3);

    expect(economy.memberships.roleOf('ADMIN1')).toBe('ADMIN');
    expect(economy.memberships.roleOf('U1')).toBe('VIP');
    expect(economy.memberships.roleOf('U2')).toBe('FREE');
  });
});
