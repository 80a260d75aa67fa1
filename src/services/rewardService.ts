import { createLogger, Logger } from '../logger';
import {
  Clock,
  EconomyEvent,
  fail,
  ok,
  PayoutKind,
  Result,
  RewardDefinition,
  RewardStatus,
  UserRewardState
} from '../types';
import { DataService, lockedRewardState } from './dataService';
import { addHours } from './dates';
import { LedgerService } from './ledgerService';
import { MembershipService } from './membershipService';
import {
  affectedConditionKinds,
  ConditionContext,
  ConditionProgress,
  evaluateCondition,
  isEligible
} from './rewardConditions';
import { buildNotification, RewardNotification } from './rewardNotifications';
import { StreakService } from './streakService';

export type PayoutDetails =
  | { kind: 'BESITOS'; requested: number; granted: number; balance: number }
  | { kind: 'VIP_EXTENSION'; requested: number; granted: number; expiresAt: string }
  | { kind: 'CONTENT'; contentId: string }
  | { kind: 'BADGE'; badgeName: string; emoji: string };

export interface RewardClaim {
  reward: RewardDefinition;
  state: UserRewardState;
  payout: PayoutDetails;
  wasCapped: boolean;
  events: EconomyEvent[];
}

type Payout = Omit<RewardClaim, 'reward' | 'state'>;

const payoutOf = (payout: PayoutDetails, wasCapped: boolean, events: EconomyEvent[] = []): Payout => ({
  payout,
  wasCapped,
  events
});

export interface UnlockedReward {
  reward: RewardDefinition;
  state: UserRewardState;
}

export interface AvailableReward {
  reward: RewardDefinition;
  state: UserRewardState;
  progress: ConditionProgress[];
}

export interface RewardProgress {
  rewardId: string;
  eligible: boolean;
  conditions: ConditionProgress[];
}

export interface RewardStats {
  byStatus: Record<RewardStatus, number>;
  claimsByPayout: Record<PayoutKind, number>;
  totalClaims: number;
}

export type ClaimResult = Result<
  RewardClaim,
  | 'REWARD_NOT_FOUND'
  | 'REWARD_INACTIVE'
  | 'REWARD_LOCKED'
  | 'REWARD_EXPIRED'
  | 'ALREADY_CLAIMED'
  | 'PAYOUT_FAILED'
>;

export interface RewardServiceOptions {
  logger?: Logger;
  now?: Clock;
}

const STATUS_PRIORITY: Record<RewardStatus, number> = {
  UNLOCKED: 0,
  LOCKED: 1,
  CLAIMED: 2,
  EXPIRED: 3
};

const isElapsed = (state: UserRewardState, now: Date): boolean =>
  state.status === 'UNLOCKED' && state.expiresAt !== null && new Date(state.expiresAt) <= now;

const sameRow = (observed: UserRewardState) => (current: UserRewardState): boolean =>
  current.status === observed.status &&
  current.claimCount === observed.claimCount &&
  current.expiresAt === observed.expiresAt;

export class RewardService {
  private dataService: DataService;
  private ledgerService: LedgerService;
  private streakService: StreakService;
  private membershipService: MembershipService;
  private logger: Logger;
  private now: Clock;

  constructor(
    dataService: DataService,
    ledgerService: LedgerService,
    streakService: StreakService,
    membershipService: MembershipService,
    options: RewardServiceOptions = {}
  ) {
    this.dataService = dataService;
    this.ledgerService = ledgerService;
    this.streakService = streakService;
    this.membershipService = membershipService;
    this.logger = options.logger ?? createLogger('rewards');
    this.now = options.now ?? (() => new Date());
  }

  private buildContext(userId: string): Omit<ConditionContext, 'claimCount'> {
    const account = this.ledgerService.account(userId);
    return {
      streakLength: this.streakService.getStreakInfo(userId, 'DAILY_GIFT').currentLength,
      totalEarned: account?.totalEarned ?? 0,
      level: account?.level ?? 1,
      totalSpent: account?.totalSpent ?? 0,
      hasPurchased:
        this.ledgerService.hasEntry(userId, 'SPEND_SHOP') ||
        this.dataService.hasContentAccess(userId, 'shop_purchase'),
      hasClaimedDailyGift: this.ledgerService.hasEntry(userId, 'EARN_DAILY'),
      hasReacted: this.ledgerService.hasEntry(userId, 'EARN_REACTION'),
      isVip: this.membershipService.isActive(userId)
    };
  }

  private stateOf(userId: string, rewardId: string): UserRewardState {
    return this.dataService.getUserReward(userId, rewardId) ?? lockedRewardState(userId, rewardId);
  }

  /**
   * Status as a reader should see it: an UNLOCKED row past its window is EXPIRED
   */
  private effectiveState(userId: string, rewardId: string, now: Date): UserRewardState {
    const state = this.stateOf(userId, rewardId);
    return isElapsed(state, now) ? { ...state, status: 'EXPIRED' } : state;
  }

  private isEligibleFor(userId: string, reward: RewardDefinition, base: Omit<ConditionContext, 'claimCount'>): boolean {
    const context = { ...base, claimCount: this.stateOf(userId, reward.id).claimCount };
    return isEligible(this.dataService.getRewardConditions(reward.id), context);
  }

  private openWindow(state: UserRewardState, reward: RewardDefinition, now: Date): UserRewardState {
    return {
      ...state,
      status: 'UNLOCKED',
      unlockedAt: now.toISOString(),
      expiresAt: addHours(now, reward.claimWindowHours).toISOString()
    };
  }

  /**
   * Next state for one evaluation, or null when the row stays as it is
   */
  private transition(
    state: UserRewardState,
    reward: RewardDefinition,
    eligible: boolean,
    now: Date
  ): UserRewardState | null {
    switch (state.status) {
      case 'UNLOCKED':
        return isElapsed(state, now) ? { ...state, status: 'EXPIRED' } : null;
      case 'LOCKED':
      case 'EXPIRED':
        return eligible ? this.openWindow(state, reward, now) : null;
      case 'CLAIMED':
        return reward.repeatable && eligible ? this.openWindow(state, reward, now) : null;
    }
  }

  /**
   * Evaluate one reward for a user and apply its transition. Returns the new
   * state when this call moved it into UNLOCKED.
   */
  private async evaluate(
    userId: string,
    reward: RewardDefinition,
    base: Omit<ConditionContext, 'claimCount'>,
    now: Date
  ): Promise<UserRewardState | null> {
    const existing = this.dataService.getUserReward(userId, reward.id);
    const observed = existing ?? lockedRewardState(userId, reward.id);
    const next = this.transition(observed, reward, this.isEligibleFor(userId, reward, base), now);

    if (!next) {
      if (!existing) {
        await this.dataService.updateUserRewardWhere(userId, reward.id, sameRow(observed), state => state);
      }
      return null;
    }

    const written = await this.dataService.updateUserRewardWhere(userId, reward.id, sameRow(observed), () => next);
    if (!written) {
      this.logger.debug(`Reward ${reward.id} for ${userId} changed concurrently, skipping`);
      return null;
    }
    if (written.status !== 'UNLOCKED') {
      this.logger.info(`Reward ${reward.id} expired for ${userId}`);
      return null;
    }
    this.logger.info(`Reward ${reward.id} unlocked for ${userId}`);
    return written;
  }

  /**
   * Re-evaluate the rewards one event can affect
   */
  async checkRewardsOnEvent(userId: string, event: EconomyEvent): Promise<UnlockedReward[]> {
    return this.checkRewardsOnEvents(userId, [event]);
  }

  /**
   * Re-evaluate the active rewards that have a condition touched by any of
   * the events, and return those that became UNLOCKED
   */
  async checkRewardsOnEvents(userId: string, events: EconomyEvent[]): Promise<UnlockedReward[]> {
    const kinds = affectedConditionKinds(events);
    if (kinds.size === 0) return [];

    const now = this.now();
    const base = this.buildContext(userId);
    const candidates = this.dataService
      .getRewards()
      .filter(reward => reward.active)
      .filter(reward => this.dataService.getRewardConditions(reward.id).some(c => kinds.has(c.kind)))
      .sort((a, b) => a.sortOrder - b.sortOrder);

    const unlocked: UnlockedReward[] = [];
    for (const reward of candidates) {
      const state = await this.evaluate(userId, reward, base, now);
      if (state) {
        unlocked.push({ reward, state });
      }
    }
    return unlocked;
  }

  /**
   * Claim an unlocked reward and pay it out. The claim is reserved first and
   * released again when the payout fails.
   */
  async claim(userId: string, rewardId: string): Promise<ClaimResult> {
    const reward = this.dataService.getReward(rewardId);
    if (!reward) {
      return fail('REWARD_NOT_FOUND', `Reward ${rewardId} does not exist`);
    }
    if (!reward.active) {
      return fail('REWARD_INACTIVE', `${reward.name} is not available right now`);
    }

    const now = this.now();
    const observed = this.stateOf(userId, rewardId);

    if (isElapsed(observed, now)) {
      await this.dataService.updateUserRewardWhere(userId, rewardId, sameRow(observed), state => ({
        ...state,
        status: 'EXPIRED'
      }));
      return fail('REWARD_EXPIRED', `${reward.name} has expired`);
    }

    switch (observed.status) {
      case 'LOCKED':
        return fail('REWARD_LOCKED', `${reward.name} is still locked`);
      case 'EXPIRED':
        return fail('REWARD_EXPIRED', `${reward.name} has expired`);
      case 'CLAIMED':
        return fail('ALREADY_CLAIMED', `${reward.name} was already claimed`);
      case 'UNLOCKED':
        break;
    }

    const reserved = await this.dataService.updateUserRewardWhere(
      userId,
      rewardId,
      state => state.status === 'UNLOCKED' && state.claimCount === observed.claimCount,
      state => ({
        ...state,
        status: 'CLAIMED',
        claimedAt: now.toISOString(),
        lastClaimedAt: now.toISOString(),
        claimCount: state.claimCount + 1
      })
    );
    if (!reserved) {
      this.logger.debug(`Concurrent claim of ${rewardId} by ${userId} lost`);
      return fail('ALREADY_CLAIMED', `${reward.name} was already claimed`);
    }

    const payout = await this.payOut(userId, reward, now);
    if (!payout.success) {
      await this.releaseReservation(userId, rewardId, reserved, observed);
      return payout;
    }

    const state = await this.settleAfterClaim(userId, reward, reserved, now);
    this.logger.info(`${userId} claimed ${reward.id} (${reward.payload.kind})`);

    return ok({ reward, state, ...payout.data });
  }

  /**
   * Repeatable rewards re-open when still eligible and otherwise drop back to
   * LOCKED; one-off rewards stay CLAIMED
   */
  private async settleAfterClaim(
    userId: string,
    reward: RewardDefinition,
    reserved: UserRewardState,
    now: Date
  ): Promise<UserRewardState> {
    if (!reward.repeatable) return reserved;

    const eligible = this.isEligibleFor(userId, reward, this.buildContext(userId));
    const settled = await this.dataService.updateUserRewardWhere(userId, reward.id, sameRow(reserved), state =>
      eligible ? this.openWindow(state, reward, now) : { ...state, status: 'LOCKED', expiresAt: null }
    );
    return settled ?? this.stateOf(userId, reward.id);
  }

  private async releaseReservation(
    userId: string,
    rewardId: string,
    reserved: UserRewardState,
    observed: UserRewardState
  ): Promise<void> {
    const released = await this.dataService.updateUserRewardWhere(userId, rewardId, sameRow(reserved), () => observed);
    if (!released) {
      this.logger.error(`Could not release claim reservation of ${rewardId} for ${userId}`);
    }
  }

  private async payOut(
    userId: string,
    reward: RewardDefinition,
    now: Date
  ): Promise<Result<Payout, 'PAYOUT_FAILED'>> {
    const config = this.dataService.getConfig();
    const { payload } = reward;

    try {
      switch (payload.kind) {
        case 'BESITOS': {
          const granted = Math.min(payload.amount, config.maxRewardBesitos);
          const credit = await this.ledgerService.earn(userId, granted, 'EARN_REWARD', `reward:${reward.id}`, {
            reward_id: reward.id,
            requested: payload.amount,
            was_capped: granted < payload.amount
          });
          if (!credit.success) {
            return fail('PAYOUT_FAILED', credit.message);
          }
          return ok(
            payoutOf(
              { kind: 'BESITOS', requested: payload.amount, granted, balance: credit.data.account.balance },
              granted < payload.amount,
              credit.data.events
            )
          );
        }
        case 'VIP_EXTENSION': {
          const granted = Math.min(payload.days, config.maxRewardMembershipDays);
          const membership = await this.membershipService.extend(userId, granted);
          return ok(
            payoutOf(
              { kind: 'VIP_EXTENSION', requested: payload.days, granted, expiresAt: membership.expiresAt },
              granted < payload.days
            )
          );
        }
        case 'CONTENT':
          await this.dataService.grantContentAccess({
            userId,
            contentId: payload.contentId,
            source: 'reward_claim',
            metadata: { reward_id: reward.id },
            createdAt: now.toISOString()
          });
          return ok(payoutOf({ kind: 'CONTENT', contentId: payload.contentId }, false));
        case 'BADGE':
          return ok(payoutOf({ kind: 'BADGE', badgeName: payload.badgeName, emoji: payload.emoji }, false));
      }
    } catch (error) {
      this.logger.error(`Payout of ${reward.id} to ${userId} failed:`, error);
      return fail('PAYOUT_FAILED', `Could not pay out ${reward.name}, please try again`);
    }
  }

  /**
   * Active rewards with their state and progress. Secret rewards are hidden
   * while LOCKED unless `includeSecret` is set.
   */
  getAvailableRewards(userId: string, includeSecret = false): AvailableReward[] {
    const now = this.now();
    const base = this.buildContext(userId);

    return this.dataService
      .getRewards()
      .filter(reward => reward.active)
      .map(reward => {
        const state = this.effectiveState(userId, reward.id, now);
        const context = { ...base, claimCount: state.claimCount };
        const progress = this.dataService.getRewardConditions(reward.id).map(c => evaluateCondition(c, context));
        return { reward, state, progress };
      })
      .filter(({ reward, state }) => includeSecret || !reward.secret || state.status !== 'LOCKED')
      .sort(
        (a, b) =>
          STATUS_PRIORITY[a.state.status] - STATUS_PRIORITY[b.state.status] || a.reward.sortOrder - b.reward.sortOrder
      );
  }

  /**
   * Per-condition progress and overall eligibility for one reward
   */
  getRewardProgress(userId: string, rewardId: string): Result<RewardProgress, 'REWARD_NOT_FOUND'> {
    const reward = this.dataService.getReward(rewardId);
    if (!reward) {
      return fail('REWARD_NOT_FOUND', `Reward ${rewardId} does not exist`);
    }

    const conditions = this.dataService.getRewardConditions(rewardId);
    const context = { ...this.buildContext(userId), claimCount: this.stateOf(userId, rewardId).claimCount };
    return ok({
      rewardId,
      eligible: isEligible(conditions, context),
      conditions: conditions.map(c => evaluateCondition(c, context))
    });
  }

  /**
   * Message announcing newly unlocked rewards
   */
  buildNotification(unlocked: UnlockedReward[], context?: string): RewardNotification {
    return buildNotification(unlocked.map(u => u.reward), context);
  }

  /**
   * Reward counts by status and claims by payout kind
   */
  getUserRewardStats(userId: string): RewardStats {
    const now = this.now();
    const byStatus: Record<RewardStatus, number> = { LOCKED: 0, UNLOCKED: 0, CLAIMED: 0, EXPIRED: 0 };
    const claimsByPayout: Record<PayoutKind, number> = { BESITOS: 0, CONTENT: 0, BADGE: 0, VIP_EXTENSION: 0 };
    let totalClaims = 0;

    for (const reward of this.dataService.getRewards().filter(r => r.active)) {
      const state = this.effectiveState(userId, reward.id, now);
      byStatus[state.status] += 1;
      claimsByPayout[reward.payload.kind] += state.claimCount;
      totalClaims += state.claimCount;
    }

    return { byStatus, claimsByPayout, totalClaims };
  }
}

export const createRewardService = (
  dataService: DataService,
  ledgerService: LedgerService,
  streakService: StreakService,
  membershipService: MembershipService,
  options: RewardServiceOptions = {}
): RewardService => {
  return new RewardService(dataService, ledgerService, streakService, membershipService, options);
};
