import fs from 'fs';
import path from 'path';
import { createLogger, Logger } from '../logger';
import {
  Account,
  AppState,
  ContentAccess,
  ContentAccessSource,
  EconomyConfig,
  LedgerCategory,
  LedgerEntry,
  LedgerMetadata,
  Membership,
  PurchaseRecord,
  ReactionRecord,
  RewardCondition,
  RewardDefinition,
  StreakKind,
  StreakState,
  UserRewardState
} from '../types';
import { DEFAULT_LEVEL_FORMULA } from './levelFormula';
import { persistedStateSchema, rewardSeedSchema } from './stateSchema';

export const DEFAULT_SEED_PATH = path.join(__dirname, '../../data/default-rewards.json');

export const defaultConfig = (): EconomyConfig => ({
  levelFormula: DEFAULT_LEVEL_FORMULA,
  dailyGiftBase: 20,
  streakBonusPerDay: 2,
  streakBonusMax: 50,
  besitosPerReaction: 5,
  maxReactionsPerDay: 20,
  reactionCooldownSeconds: 30,
  maxRewardBesitos: 100,
  maxRewardMembershipDays: 30,
  shopItems: [
    { id: 'wallpaper-pack', name: 'Wallpaper Pack', cost: 50, contentId: 'content-wallpapers' },
    { id: 'behind-the-scenes', name: 'Behind the Scenes', cost: 150, contentId: 'content-bts' }
  ]
});

const emptyState = (): AppState => ({
  config: defaultConfig(),
  accounts: {},
  ledger: [],
  streaks: {},
  rewards: [],
  rewardConditions: [],
  userRewards: {},
  memberships: {},
  contentAccess: [],
  reactions: [],
  purchases: {},
  sequences: { ledger: 0, contentAccess: 0 }
});

/** A balance change plus the ledger line that records it */
export interface Movement {
  userId: string;
  amount: number;
  category: LedgerCategory;
  reason: string;
  metadata: LedgerMetadata;
  createdAt: string;
  /** Only apply when the current balance is at least this much */
  minBalance?: number;
  /** Only apply to an existing account row */
  requireAccount?: boolean;
}

export interface AppliedMovement {
  account: Account;
  entry: LedgerEntry;
  previousLevel: number;
}

export type Predicate<T> = (current: T) => boolean;
export type Mutation<T> = (current: T) => T;

const streakKey = (userId: string, kind: StreakKind) => `${userId}:${kind}`;
const userRewardKey = (userId: string, rewardId: string) => `${userId}:${rewardId}`;

export interface DataServiceOptions {
  logger?: Logger;
  seedPath?: string;
}

/**
 * File-backed store for the economy.
 *
 * Every mutating method checks its precondition and applies the change in one
 * synchronous step over the in-memory state, then queues a write of the whole
 * document. A `null` return means the precondition did not hold and nothing
 * was written. A rejected write means nothing was applied: the in-memory state
 * goes back to what it was before the change, and changes queued behind it are
 * dropped with the same error.
 */
export class DataService {
  private dataFilePath: string;
  private state: AppState;
  private logger: Logger;
  private writeQueue: Promise<void> = Promise.resolve();
  /** State after the last queued change */
  private rollbackPoint: AppState;
  /** Bumped on every rollback; writes queued under an older generation are dropped */
  private generation = 0;

  constructor(dataFilePath: string, options: DataServiceOptions = {}) {
    this.dataFilePath = dataFilePath;
    this.logger = options.logger ?? createLogger('data');
    this.state = this.loadInitialState(options.seedPath ?? DEFAULT_SEED_PATH);
    this.rollbackPoint = structuredClone(this.state);
  }

  /**
   * Load state from disk, or start empty with the seed rewards
   */
  private loadInitialState(seedPath: string): AppState {
    const dir = path.dirname(this.dataFilePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    if (fs.existsSync(this.dataFilePath)) {
      const raw = fs.readFileSync(this.dataFilePath, 'utf8');
      const parsed = persistedStateSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        throw new Error(`Invalid data file ${this.dataFilePath}: ${parsed.error.message}`);
      }
      return { ...parsed.data, config: { ...defaultConfig(), ...parsed.data.config } };
    }

    const state = emptyState();
    if (fs.existsSync(seedPath)) {
      const seed = rewardSeedSchema.parse(JSON.parse(fs.readFileSync(seedPath, 'utf8')));
      for (const { reward, conditions } of seed) {
        state.rewards.push(reward);
        state.rewardConditions.push(...conditions.map(c => ({ ...c, rewardId: reward.id })));
      }
      this.logger.info(`Seeded ${seed.length} rewards from ${seedPath}`);
    }
    return state;
  }

  /**
   * Queue a write of the current state. Writes are serialized so an older
   * snapshot never lands after a newer one. When a write fails the state is
   * restored to the snapshot taken before the change.
   */
  private saveState(): Promise<void> {
    const restoreTo = this.rollbackPoint;
    const generation = this.generation;
    const snapshot = JSON.stringify(this.state, null, 2);
    this.rollbackPoint = structuredClone(this.state);

    const write = this.writeQueue.then(async () => {
      if (generation !== this.generation) {
        throw new Error('Change was queued behind a failed write');
      }
      try {
        await fs.promises.writeFile(this.dataFilePath, snapshot, 'utf8');
      } catch (error) {
        this.state = restoreTo;
        this.rollbackPoint = structuredClone(restoreTo);
        this.generation += 1;
        throw error;
      }
    });
    // keep the queue alive after a failed write; the caller still gets the rejection
    this.writeQueue = write.catch(() => undefined);
    return write.catch((error: unknown) => {
      this.logger.error('Error saving data:', error);
      throw new Error('Failed to save data');
    });
  }

  /**
   * Wait for queued writes to settle
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  // ─── Config ───────────────────────────────────────────────────────────

  getConfig(): EconomyConfig {
    return { ...this.state.config, shopItems: [...this.state.config.shopItems] };
  }

  async updateConfig(newConfig: Partial<EconomyConfig>): Promise<void> {
    this.state.config = { ...this.state.config, ...newConfig };
    await this.saveState();
  }

  // ─── Accounts & ledger ────────────────────────────────────────────────

  getAccount(userId: string): Account | undefined {
    const account = this.state.accounts[userId];
    return account ? { ...account } : undefined;
  }

  /**
   * Apply a balance change and append its ledger entry as one step. Credits
   * create the account row when absent; the level is recomputed from the new
   * total earned.
   */
  async applyMovement(
    movement: Movement,
    computeLevel: (totalEarned: number) => number
  ): Promise<AppliedMovement | null> {
    const existing = this.state.accounts[movement.userId];
    if (!existing && movement.requireAccount) return null;

    const current: Account = existing ?? {
      userId: movement.userId,
      balance: 0,
      totalEarned: 0,
      totalSpent: 0,
      level: 1,
      createdAt: movement.createdAt,
      updatedAt: movement.createdAt
    };

    if (movement.minBalance !== undefined && current.balance < movement.minBalance) return null;

    const balance = current.balance + movement.amount;
    if (balance < 0) return null;

    const totalEarned = current.totalEarned + Math.max(movement.amount, 0);
    const account: Account = {
      ...current,
      balance,
      totalEarned,
      totalSpent: current.totalSpent + Math.max(-movement.amount, 0),
      level: movement.amount > 0 ? computeLevel(totalEarned) : current.level,
      updatedAt: movement.createdAt
    };

    this.state.sequences.ledger += 1;
    const entry: LedgerEntry = {
      id: this.state.sequences.ledger,
      userId: movement.userId,
      amount: movement.amount,
      category: movement.category,
      reason: movement.reason,
      metadata: { ...movement.metadata },
      createdAt: movement.createdAt
    };

    this.state.accounts[movement.userId] = account;
    this.state.ledger.push(entry);
    await this.saveState();

    return { account: { ...account }, entry: { ...entry }, previousLevel: current.level };
  }

  /**
   * Ledger entries for a user, newest first
   */
  getEntries(userId: string, category?: LedgerCategory): LedgerEntry[] {
    return this.state.ledger
      .filter(e => e.userId === userId && (!category || e.category === category))
      .reverse()
      .map(e => ({ ...e, metadata: { ...e.metadata } }));
  }

  hasEntry(userId: string, category: LedgerCategory): boolean {
    return this.state.ledger.some(e => e.userId === userId && e.category === category);
  }

  // ─── Streaks ──────────────────────────────────────────────────────────

  getStreak(userId: string, kind: StreakKind): StreakState | undefined {
    const streak = this.state.streaks[streakKey(userId, kind)];
    return streak ? { ...streak } : undefined;
  }

  getStreaks(kind: StreakKind): StreakState[] {
    return Object.values(this.state.streaks)
      .filter(s => s.kind === kind)
      .map(s => ({ ...s }));
  }

  /**
   * Conditional update of a streak row. A missing row is evaluated as a zeroed
   * one and created by the same write.
   */
  async updateStreakWhere(
    userId: string,
    kind: StreakKind,
    where: Predicate<StreakState>,
    apply: Mutation<StreakState>
  ): Promise<StreakState | null> {
    const key = streakKey(userId, kind);
    const current: StreakState = this.state.streaks[key] ?? {
      userId,
      kind,
      currentLength: 0,
      longestLength: 0,
      lastClaimDay: null,
      lastActivityDay: null
    };
    if (!where({ ...current })) return null;

    const next = { ...apply({ ...current }), userId, kind };
    this.state.streaks[key] = next;
    await this.saveState();
    return { ...next };
  }

  // ─── Reward definitions ───────────────────────────────────────────────

  getRewards(): RewardDefinition[] {
    return this.state.rewards.map(r => ({ ...r }));
  }

  getReward(rewardId: string): RewardDefinition | undefined {
    const reward = this.state.rewards.find(r => r.id === rewardId);
    return reward ? { ...reward } : undefined;
  }

  getRewardConditions(rewardId: string): RewardCondition[] {
    return this.state.rewardConditions.filter(c => c.rewardId === rewardId).map(c => ({ ...c }));
  }

  /**
   * Insert or replace a reward together with its full condition set
   */
  async upsertReward(reward: RewardDefinition, conditions: RewardCondition[]): Promise<void> {
    const index = this.state.rewards.findIndex(r => r.id === reward.id);
    if (index >= 0) {
      this.state.rewards[index] = { ...reward };
    } else {
      this.state.rewards.push({ ...reward });
    }
    this.state.rewardConditions = [
      ...this.state.rewardConditions.filter(c => c.rewardId !== reward.id),
      ...conditions.map(c => ({ ...c, rewardId: reward.id }))
    ];
    await this.saveState();
  }

  // ─── Per-user reward state ────────────────────────────────────────────

  getUserReward(userId: string, rewardId: string): UserRewardState | undefined {
    const state = this.state.userRewards[userRewardKey(userId, rewardId)];
    return state ? { ...state } : undefined;
  }

  getUserRewards(userId: string): UserRewardState[] {
    return Object.values(this.state.userRewards)
      .filter(s => s.userId === userId)
      .map(s => ({ ...s }));
  }

  /**
   * Conditional update of a (user, reward) row. A missing row is evaluated as
   * LOCKED with no claims and created by the same write.
   */
  async updateUserRewardWhere(
    userId: string,
    rewardId: string,
    where: Predicate<UserRewardState>,
    apply: Mutation<UserRewardState>
  ): Promise<UserRewardState | null> {
    const key = userRewardKey(userId, rewardId);
    const current: UserRewardState = this.state.userRewards[key] ?? lockedRewardState(userId, rewardId);
    if (!where({ ...current })) return null;

    const next = { ...apply({ ...current }), userId, rewardId };
    this.state.userRewards[key] = next;
    await this.saveState();
    return { ...next };
  }

  // ─── Memberships & content access ─────────────────────────────────────

  getMembership(userId: string): Membership | undefined {
    const membership = this.state.memberships[userId];
    return membership ? { ...membership } : undefined;
  }

  async updateMembership(
    userId: string,
    apply: (current: Membership | undefined) => Membership
  ): Promise<Membership> {
    const current = this.state.memberships[userId];
    const next = { ...apply(current ? { ...current } : undefined), userId };
    this.state.memberships[userId] = next;
    await this.saveState();
    return { ...next };
  }

  async grantContentAccess(grant: Omit<ContentAccess, 'id'>): Promise<ContentAccess> {
    this.state.sequences.contentAccess += 1;
    const access: ContentAccess = { ...grant, id: this.state.sequences.contentAccess };
    this.state.contentAccess.push(access);
    await this.saveState();
    return { ...access };
  }

  getContentAccess(userId: string): ContentAccess[] {
    return this.state.contentAccess.filter(a => a.userId === userId).map(a => ({ ...a }));
  }

  hasContentAccess(userId: string, source?: ContentAccessSource): boolean {
    return this.state.contentAccess.some(a => a.userId === userId && (!source || a.source === source));
  }

  // ─── Reactions ────────────────────────────────────────────────────────

  getReactions(userId: string): ReactionRecord[] {
    return this.state.reactions.filter(r => r.userId === userId).map(r => ({ ...r }));
  }

  /**
   * Insert a reaction only when the predicate holds against the user's
   * reaction history
   */
  async insertReactionWhere(
    record: ReactionRecord,
    where: Predicate<ReactionRecord[]>
  ): Promise<ReactionRecord | null> {
    if (!where(this.getReactions(record.userId))) return null;
    this.state.reactions.push({ ...record });
    await this.saveState();
    return { ...record };
  }

  /**
   * Remove a reaction recorded by `insertReactionWhere`
   */
  async deleteReaction(record: ReactionRecord): Promise<boolean> {
    const index = this.state.reactions.findIndex(
      r => r.userId === record.userId && r.contentId === record.contentId && r.createdAt === record.createdAt
    );
    if (index < 0) return false;
    this.state.reactions.splice(index, 1);
    await this.saveState();
    return true;
  }

  // ─── Purchases ────────────────────────────────────────────────────────

  getPurchase(attemptId: string): PurchaseRecord | undefined {
    const purchase = this.state.purchases[attemptId];
    return purchase ? { ...purchase } : undefined;
  }

  async insertPurchase(record: PurchaseRecord): Promise<PurchaseRecord | null> {
    if (this.state.purchases[record.attemptId]) return null;
    this.state.purchases[record.attemptId] = { ...record };
    await this.saveState();
    return { ...record };
  }

  async updatePurchaseWhere(
    attemptId: string,
    where: Predicate<PurchaseRecord>,
    apply: Mutation<PurchaseRecord>
  ): Promise<PurchaseRecord | null> {
    const current = this.state.purchases[attemptId];
    if (!current || !where({ ...current })) return null;

    const next = { ...apply({ ...current }), attemptId };
    this.state.purchases[attemptId] = next;
    await this.saveState();
    return { ...next };
  }
}

export const lockedRewardState = (userId: string, rewardId: string): UserRewardState => ({
  userId,
  rewardId,
  status: 'LOCKED',
  unlockedAt: null,
  expiresAt: null,
  claimedAt: null,
  lastClaimedAt: null,
  claimCount: 0
});

export const createDataService = (dataFilePath: string, options: DataServiceOptions = {}): DataService => {
  return new DataService(dataFilePath, options);
};
