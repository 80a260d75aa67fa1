import fs from 'fs';
import { createEconomy, Economy } from '../../src/economy';
import { Logger, LogLevel } from '../../src/logger';
import { ConditionKind, RewardCondition, RewardDefinition } from '../../src/types';

export const TEST_DATA_PATH = '/tmp/besitos-test/store.json';
export const MISSING_SEED_PATH = '/tmp/besitos-test/no-seed.json';

export interface TestClock {
  now: () => Date;
  set: (iso: string) => void;
  advanceSeconds: (seconds: number) => void;
}

export const createClock = (iso: string): TestClock => {
  let current = new Date(iso);
  return {
    now: () => current,
    set: (value: string) => {
      current = new Date(value);
    },
    advanceSeconds: (seconds: number) => {
      current = new Date(current.getTime() + seconds * 1000);
    }
  };
};

export const silentLogger = (): Logger => ({
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  setLevel: jest.fn(),
  getLevel: jest.fn(() => LogLevel.ERROR),
  setName: jest.fn()
});

export const createTestEconomy = (clock: TestClock, adminUsers: string[] = []): Economy =>
  createEconomy({
    dataFilePath: TEST_DATA_PATH,
    seedPath: MISSING_SEED_PATH,
    adminUsers,
    logger: silentLogger(),
    now: clock.now
  });

export const buildReward = (overrides: Partial<RewardDefinition> & { id: string }): RewardDefinition => ({
  name: overrides.id,
  description: '',
  payload: { kind: 'BESITOS', amount: 10 },
  repeatable: false,
  secret: false,
  claimWindowHours: 24,
  active: true,
  sortOrder: 0,
  ...overrides
});

export const buildCondition = (
  rewardId: string,
  kind: ConditionKind,
  value: number | null = null,
  group = 0,
  id = `${rewardId}-${kind.toLowerCase()}-${group}`
): RewardCondition => ({ id, rewardId, kind, value, group });

/**
 * Let the next `n - 1` store writes succeed and reject the n-th
 */
export const failNthWrite = (n: number): void => {
  const writeFile = jest.mocked(fs.promises.writeFile);
  for (let i = 1; i < n; i++) {
    writeFile.mockResolvedValueOnce(undefined);
  }
  writeFile.mockRejectedValueOnce(new Error('disk full'));
};
