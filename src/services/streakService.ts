import { createLogger, Logger } from '../logger';
import { Clock, EconomyEvent, fail, ok, Result, StreakKind, StreakState } from '../types';
import { DataService } from './dataService';
import { addDays, nextUtcMidnight, secondsUntilNextUtcDay, utcDay } from './dates';
import { LedgerService } from './ledgerService';

export interface ClaimEligibility {
  canClaim: boolean;
  /** `available` or `next_claim_in_{h}h_{m}m` */
  reason: string;
  secondsRemaining: number;
}

export interface DailyGiftClaim {
  streakDay: number;
  longestLength: number;
  base: number;
  bonus: number;
  total: number;
  balance: number;
  events: EconomyEvent[];
}

export interface ReactionStreakUpdate {
  incremented: boolean;
  currentLength: number;
  events: EconomyEvent[];
}

export interface StreakInfo {
  kind: StreakKind;
  currentLength: number;
  longestLength: number;
  lastActivity: string | null;
  canClaim: boolean;
  nextClaimTime: string | null;
}

export type DailyGiftResult = Result<DailyGiftClaim, 'ALREADY_CLAIMED_TODAY' | 'PAYOUT_FAILED'>;

export interface StreakServiceOptions {
  logger?: Logger;
  now?: Clock;
}

const lastDayOf = (streak: StreakState): string | null =>
  streak.kind === 'DAILY_GIFT' ? streak.lastClaimDay : streak.lastActivityDay;

export class StreakService {
  private dataService: DataService;
  private ledgerService: LedgerService;
  private logger: Logger;
  private now: Clock;

  constructor(dataService: DataService, ledgerService: LedgerService, options: StreakServiceOptions = {}) {
    this.dataService = dataService;
    this.ledgerService = ledgerService;
    this.logger = options.logger ?? createLogger('streaks');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Base plus the per-day bonus, the bonus capped at `streakBonusMax`
   */
  calculatePayout(streakDay: number): { base: number; bonus: number; total: number } {
    const config = this.dataService.getConfig();
    const base = config.dailyGiftBase;
    const bonus = Math.min(streakDay * config.streakBonusPerDay, config.streakBonusMax);
    return { base, bonus, total: base + bonus };
  }

  /**
   * Whether today's gift is still open, and when the next one is
   */
  canClaimDailyGift(userId: string): ClaimEligibility {
    const now = this.now();
    const lastClaimDay = this.dataService.getStreak(userId, 'DAILY_GIFT')?.lastClaimDay ?? null;

    if (lastClaimDay === null || lastClaimDay < utcDay(now)) {
      return { canClaim: true, reason: 'available', secondsRemaining: 0 };
    }

    const seconds = secondsUntilNextUtcDay(now);
    const hours = Math.floor(seconds / 3600);
    const minutes = Math.floor((seconds % 3600) / 60);
    return { canClaim: false, reason: `next_claim_in_${hours}h_${minutes}m`, secondsRemaining: seconds };
  }

  /**
   * Claim today's daily gift. Only one claim per user and UTC day succeeds.
   */
  async claimDailyGift(userId: string): Promise<DailyGiftResult> {
    const now = this.now();
    const today = utcDay(now);
    const yesterday = addDays(today, -1);

    // the conditional write below sees this same row; nothing yields in between
    const previous: StreakState = this.dataService.getStreak(userId, 'DAILY_GIFT') ?? {
      userId,
      kind: 'DAILY_GIFT',
      currentLength: 0,
      longestLength: 0,
      lastClaimDay: null,
      lastActivityDay: null
    };
    const updated = await this.dataService.updateStreakWhere(
      userId,
      'DAILY_GIFT',
      streak => streak.lastClaimDay !== today,
      streak => {
        const streakDay = streak.lastClaimDay === yesterday ? streak.currentLength + 1 : 1;
        return {
          ...streak,
          currentLength: streakDay,
          longestLength: Math.max(streak.longestLength, streakDay),
          lastClaimDay: today,
          lastActivityDay: today
        };
      }
    );

    if (!updated) {
      const seconds = secondsUntilNextUtcDay(now);
      this.logger.debug(`Daily gift already claimed today by ${userId}`);
      return fail('ALREADY_CLAIMED_TODAY', 'Daily gift already claimed today', { secondsRemaining: seconds });
    }

    const payout = this.calculatePayout(updated.currentLength);
    const credit = await this.creditDailyGift(userId, payout, updated.currentLength);

    if (!credit.success) {
      await this.restoreStreak(userId, today, updated.currentLength, previous);
      return fail('PAYOUT_FAILED', 'Daily gift could not be credited, please try again', {
        cause: credit.message
      });
    }

    const events: EconomyEvent[] = ['daily_gift_claimed', 'streak_updated', ...credit.events];
    this.logger.info(`${userId} claimed daily gift: day ${updated.currentLength}, +${payout.total}`);
    return ok({
      streakDay: updated.currentLength,
      longestLength: updated.longestLength,
      ...payout,
      balance: credit.balance,
      events
    });
  }

  private async creditDailyGift(
    userId: string,
    payout: { base: number; bonus: number; total: number },
    streakDay: number
  ): Promise<{ success: true; balance: number; events: EconomyEvent[] } | { success: false; message: string }> {
    try {
      const result = await this.ledgerService.earn(userId, payout.total, 'EARN_DAILY', 'daily_gift', {
        streak_day: streakDay,
        base: payout.base,
        bonus: payout.bonus
      });
      if (!result.success) return { success: false, message: result.message };
      return { success: true, balance: result.data.account.balance, events: result.data.events };
    } catch (error) {
      this.logger.error(`Daily gift credit failed for ${userId}:`, error);
      return { success: false, message: error instanceof Error ? error.message : String(error) };
    }
  }

  /**
   * Undo today's streak write after a failed credit, unless something else
   * has touched the row since
   */
  private async restoreStreak(userId: string, today: string, streakDay: number, previous: StreakState): Promise<void> {
    const restored = await this.dataService.updateStreakWhere(
      userId,
      'DAILY_GIFT',
      streak => streak.lastClaimDay === today && streak.currentLength === streakDay,
      () => previous
    );
    if (!restored) {
      this.logger.error(`Could not restore daily gift streak for ${userId}`);
    }
  }

  /**
   * Count a day of reaction activity. Days at or before the last recorded one
   * leave the streak unchanged.
   */
  async recordReaction(userId: string, when?: Date): Promise<ReactionStreakUpdate> {
    const day = utcDay(when ?? this.now());
    const dayBefore = addDays(day, -1);

    const updated = await this.dataService.updateStreakWhere(
      userId,
      'REACTION',
      streak => streak.lastActivityDay === null || streak.lastActivityDay < day,
      streak => {
        const currentLength = streak.lastActivityDay === dayBefore ? streak.currentLength + 1 : 1;
        return {
          ...streak,
          currentLength,
          longestLength: Math.max(streak.longestLength, currentLength),
          lastActivityDay: day
        };
      }
    );

    if (!updated) {
      return {
        incremented: false,
        currentLength: this.dataService.getStreak(userId, 'REACTION')?.currentLength ?? 0,
        events: []
      };
    }
    return { incremented: true, currentLength: updated.currentLength, events: ['streak_updated'] };
  }

  /**
   * Current and best length of a streak
   */
  getStreakInfo(userId: string, kind: StreakKind): StreakInfo {
    const streak = this.dataService.getStreak(userId, kind);
    const eligibility = kind === 'DAILY_GIFT' ? this.canClaimDailyGift(userId) : undefined;

    return {
      kind,
      currentLength: streak?.currentLength ?? 0,
      longestLength: streak?.longestLength ?? 0,
      lastActivity: streak ? lastDayOf(streak) : null,
      canClaim: eligibility?.canClaim ?? false,
      nextClaimTime: eligibility && !eligibility.canClaim ? nextUtcMidnight(this.now()).toISOString() : null
    };
  }

  /**
   * Set the current length to 0. Returns false when there was nothing to reset.
   */
  async resetStreak(userId: string, kind: StreakKind): Promise<boolean> {
    const reset = await this.dataService.updateStreakWhere(
      userId,
      kind,
      streak => streak.currentLength > 0,
      streak => ({ ...streak, currentLength: 0 })
    );
    if (reset) {
      this.logger.info(`${kind} streak reset for ${userId}`);
    }
    return reset !== null;
  }

  /**
   * Zero every streak of `kind` whose last day is before yesterday, i.e. a
   * day was missed. Returns the number of rows reset.
   */
  async expireMissedStreaks(kind: StreakKind): Promise<number> {
    const yesterday = addDays(utcDay(this.now()), -1);
    const isMissed = (streak: StreakState): boolean => {
      const lastDay = lastDayOf(streak);
      return streak.currentLength > 0 && lastDay !== null && lastDay < yesterday;
    };

    let count = 0;
    for (const streak of this.dataService.getStreaks(kind).filter(isMissed)) {
      const reset = await this.dataService.updateStreakWhere(streak.userId, kind, isMissed, s => ({
        ...s,
        currentLength: 0
      }));
      if (reset) count++;
    }

    if (count > 0) {
      this.logger.info(`Expired ${count} ${kind} streaks`);
    }
    return count;
  }
}

export const createStreakService = (
  dataService: DataService,
  ledgerService: LedgerService,
  options: StreakServiceOptions = {}
): StreakService => {
  return new StreakService(dataService, ledgerService, options);
};
