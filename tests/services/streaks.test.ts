import fs from 'fs';
import { Economy } from '../../src/economy';
import { createClock, createTestEconomy, failNthWrite, TestClock } from '../support/testEconomy';

jest.mock('fs', () => ({
  existsSync: jest.fn(),
  mkdirSync: jest.fn(),
  readFileSync: jest.fn(),
  promises: {
    writeFile: jest.fn()
  }
}));

describe('Streaks', () => {
  let clock: TestClock;
  let economy: Economy;

  const claimOn = async (userId: string, day: string) => {
    clock.set(`${day}T12:00:00.000Z`);
    return economy.streaks.claimDailyGift(userId);
  };

  beforeEach(() => {
    jest.mocked(fs.existsSync).mockReturnValue(false);
    jest.mocked(fs.promises.writeFile).mockResolvedValue(undefined);
    clock = createClock('2026-03-10T12:00:00.000Z');
    economy = createTestEconomy(clock);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('daily gift', () => {
    test('first claim starts the streak at day 1', async () => {
      const result = await economy.streaks.claimDailyGift('U1');

      expect(result).toEqual({
        success: true,
        data: {
          streakDay: 1,
          longestLength: 1,
          base: 20,
          bonus: 2,
          total: 22,
          balance: 22,
          events: ['daily_gift_claimed', 'streak_updated']
        }
      });

      const [entry] = economy.ledger.history('U1').entries;
      expect(entry.category).toBe('EARN_DAILY');
      expect(entry.reason).toBe('daily_gift');
      expect(entry.metadata).toEqual({ streak_day: 1, base: 20, bonus: 2 });
    });

    test('a second claim on the same UTC day is refused', async () => {
      await economy.streaks.claimDailyGift('U1');

      const result = await economy.streaks.claimDailyGift('U1');

      expect(result).toEqual({
        success: false,
        code: 'ALREADY_CLAIMED_TODAY',
        message: 'Daily gift already claimed today',
        detail: { secondsRemaining: 43200 }
      });
      expect(economy.ledger.balance('U1')).toBe(22);
    });

    test('consecutive days grow the streak and the bonus', async () => {
      await claimOn('U1', '2026-03-10');
      const second = await claimOn('U1', '2026-03-11');
      const third = await claimOn('U1', '2026-03-12');

      expect(second.success && second.data.streakDay).toBe(2);
      expect(second.success && second.data.total).toBe(24);
      expect(third.success && third.data.total).toBe(26);
      expect(economy.ledger.balance('U1')).toBe(72);
    });

    test('claiming just after midnight continues the streak', async () => {
      clock.set('2026-03-10T23:59:59.000Z');
      await economy.streaks.claimDailyGift('U1');
      clock.set('2026-03-11T00:00:01.000Z');

      const result = await economy.streaks.claimDailyGift('U1');

      expect(result.success && result.data.streakDay).toBe(2);
    });

    test('a missed day restarts the streak and keeps the record', async () => {
      await claimOn('U1', '2026-03-10');
      await claimOn('U1', '2026-03-11');
      await claimOn('U1', '2026-03-12');

      const result = await claimOn('U1', '2026-03-14');

      expect(result.success && result.data.streakDay).toBe(1);
      expect(result.success && result.data.longestLength).toBe(3);
    });

    test('the streak bonus is capped', () => {
      expect(economy.streaks.calculatePayout(30)).toEqual({ base: 20, bonus: 50, total: 70 });
      expect(economy.streaks.calculatePayout(25)).toEqual({ base: 20, bonus: 50, total: 70 });
      expect(economy.streaks.calculatePayout(24)).toEqual({ base: 20, bonus: 48, total: 68 });
    });

    test('eligibility reports the time until the next UTC day', async () => {
      expect(economy.streaks.canClaimDailyGift('U1')).toEqual({
        canClaim: true,
        reason: 'available',
        secondsRemaining: 0
      });

      await economy.streaks.claimDailyGift('U1');
      expect(economy.streaks.canClaimDailyGift('U1')).toEqual({
        canClaim: false,
        reason: 'next_claim_in_12h_0m',
        secondsRemaining: 43200
      });

      clock.set('2026-03-10T22:14:30.000Z');
      expect(economy.streaks.canClaimDailyGift('U1').reason).toBe('next_claim_in_1h_45m');
    });

    test('concurrent claims pay out once', async () => {
      const results = await Promise.all([
        economy.streaks.claimDailyGift('U1'),
        economy.streaks.claimDailyGift('U1')
      ]);

      expect(results.filter(r => r.success)).toHaveLength(1);
      expect(results.map(r => r.success || r.code)).toContain('ALREADY_CLAIMED_TODAY');
      expect(economy.ledger.balance('U1')).toBe(22);
      expect(economy.ledger.history('U1', 1, 10, 'EARN_DAILY').totalCount).toBe(1);
    });

    test('a failed credit rolls the streak back so the user can retry', async () => {
      jest.spyOn(economy.ledger, 'earn').mockRejectedValueOnce(new Error('ledger offline'));

      const failed = await economy.streaks.claimDailyGift('U1');

      expect(failed).toEqual({
        success: false,
        code: 'PAYOUT_FAILED',
        message: 'Daily gift could not be credited, please try again',
        detail: { cause: 'ledger offline' }
      });
      expect(economy.streaks.getStreakInfo('U1', 'DAILY_GIFT').currentLength).toBe(0);
      expect(economy.streaks.canClaimDailyGift('U1').canClaim).toBe(true);

      const retried = await economy.streaks.claimDailyGift('U1');
      expect(retried.success && retried.data.streakDay).toBe(1);
      expect(economy.ledger.balance('U1')).toBe(22);
    });

    test('a credit whose save fails is not paid on retry as well', async () => {
      // streak row saves, the credit does not
      failNthWrite(2);

      const failed = await economy.streaks.claimDailyGift('U1');

      expect(failed).toMatchObject({
        success: false,
        code: 'PAYOUT_FAILED',
        detail: { cause: 'Failed to save data' }
      });
      expect(economy.ledger.account('U1')).toBeUndefined();
      expect(economy.ledger.history('U1').totalCount).toBe(0);
      expect(economy.streaks.getStreakInfo('U1', 'DAILY_GIFT').currentLength).toBe(0);

      const retried = await economy.streaks.claimDailyGift('U1');

      expect(retried.success && retried.data.balance).toBe(22);
      expect(economy.ledger.balance('U1')).toBe(22);
      expect(economy.ledger.history('U1', 1, 10, 'EARN_DAILY').totalCount).toBe(1);
      expect(economy.streaks.getStreakInfo('U1', 'DAILY_GIFT').currentLength).toBe(1);
    });
  });

  describe('streak info', () => {
    test('describes a fresh user', () => {
      expect(economy.streaks.getStreakInfo('U1', 'DAILY_GIFT')).toEqual({
        kind: 'DAILY_GIFT',
        currentLength: 0,
        longestLength: 0,
        lastActivity: null,
        canClaim: true,
        nextClaimTime: null
      });
    });

    test('points to the next UTC midnight after a claim', async () => {
      await economy.streaks.claimDailyGift('U1');

      expect(economy.streaks.getStreakInfo('U1', 'DAILY_GIFT')).toEqual({
        kind: 'DAILY_GIFT',
        currentLength: 1,
        longestLength: 1,
        lastActivity: '2026-03-10',
        canClaim: false,
        nextClaimTime: '2026-03-11T00:00:00.000Z'
      });
    });
  });

  describe('reaction streak', () => {
    test('counts each active day once', async () => {
      const first = await economy.streaks.recordReaction('U1');
      const sameDay = await economy.streaks.recordReaction('U1');
      clock.set('2026-03-11T08:00:00.000Z');
      const nextDay = await economy.streaks.recordReaction('U1');

      expect(first).toEqual({ incremented: true, currentLength: 1, events: ['streak_updated'] });
      expect(sameDay).toEqual({ incremented: false, currentLength: 1, events: [] });
      expect(nextDay).toEqual({ incremented: true, currentLength: 2, events: ['streak_updated'] });
    });

    test('a gap restarts the reaction streak', async () => {
      await economy.streaks.recordReaction('U1');
      clock.set('2026-03-13T08:00:00.000Z');

      const result = await economy.streaks.recordReaction('U1');

      expect(result.currentLength).toBe(1);
      expect(economy.streaks.getStreakInfo('U1', 'REACTION')).toEqual({
        kind: 'REACTION',
        currentLength: 1,
        longestLength: 1,
        lastActivity: '2026-03-13',
        canClaim: false,
        nextClaimTime: null
      });
    });
  });

  describe('maintenance', () => {
    test('reset zeroes the current length once', async () => {
      await economy.streaks.claimDailyGift('U1');

      expect(await economy.streaks.resetStreak('U1', 'DAILY_GIFT')).toBe(true);
      expect(await economy.streaks.resetStreak('U1', 'DAILY_GIFT')).toBe(false);
      expect(economy.streaks.getStreakInfo('U1', 'DAILY_GIFT').longestLength).toBe(1);
    });

    test('the sweep expires only streaks that missed a day', async () => {
      await claimOn('U1', '2026-03-10');
      await claimOn('U2', '2026-03-11');
      clock.set('2026-03-12T01:00:00.000Z');

      const expired = await economy.streaks.expireMissedStreaks('DAILY_GIFT');

      expect(expired).toBe(1);
      expect(economy.streaks.getStreakInfo('U1', 'DAILY_GIFT').currentLength).toBe(0);
      expect(economy.streaks.getStreakInfo('U1', 'DAILY_GIFT').longestLength).toBe(1);
      expect(economy.streaks.getStreakInfo('U2', 'DAILY_GIFT').currentLength).toBe(1);
      expect(await economy.streaks.expireMissedStreaks('DAILY_GIFT')).toBe(0);
    });
  });
});
