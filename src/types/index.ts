/**
 * Core types for the besitos economy
 */

export const LEDGER_CATEGORIES = [
  'EARN_REACTION',
  'EARN_DAILY',
  'EARN_REWARD',
  'EARN_ADMIN',
  'SPEND_SHOP',
  'SPEND_ADMIN'
] as const;
export type LedgerCategory = (typeof LEDGER_CATEGORIES)[number];
export type EarnCategory = Extract<LedgerCategory, `EARN_${string}`>;
export type SpendCategory = Extract<LedgerCategory, `SPEND_${string}`>;

export const isEarnCategory = (category: LedgerCategory): category is EarnCategory =>
  category.startsWith('EARN_');

export interface Account {
  userId: string;
  balance: number;
  totalEarned: number;
  totalSpent: number;
  level: number;
  createdAt: string;
  updatedAt: string;
}

export type LedgerMetadata = Record<string, string | number | boolean | null>;

export interface LedgerEntry {
  id: number;
  userId: string;
  /** Signed: credits are positive, debits negative */
  amount: number;
  category: LedgerCategory;
  reason: string;
  metadata: LedgerMetadata;
  createdAt: string;
}

export const STREAK_KINDS = ['DAILY_GIFT', 'REACTION'] as const;
export type StreakKind = (typeof STREAK_KINDS)[number];

export interface StreakState {
  userId: string;
  kind: StreakKind;
  currentLength: number;
  longestLength: number;
  /** UTC calendar day, YYYY-MM-DD */
  lastClaimDay: string | null;
  lastActivityDay: string | null;
}

export const PAYOUT_KINDS = ['BESITOS', 'CONTENT', 'BADGE', 'VIP_EXTENSION'] as const;
export type PayoutKind = (typeof PAYOUT_KINDS)[number];

export type RewardPayload =
  | { kind: 'BESITOS'; amount: number }
  | { kind: 'CONTENT'; contentId: string }
  | { kind: 'BADGE'; badgeName: string; emoji: string }
  | { kind: 'VIP_EXTENSION'; days: number };

export interface RewardDefinition {
  id: string;
  name: string;
  description: string;
  payload: RewardPayload;
  repeatable: boolean;
  secret: boolean;
  claimWindowHours: number;
  active: boolean;
  sortOrder: number;
}

export const NUMERIC_CONDITION_KINDS = [
  'STREAK_LENGTH',
  'TOTAL_POINTS',
  'LEVEL_REACHED',
  'BESITOS_SPENT'
] as const;
export const EVENT_CONDITION_KINDS = ['FIRST_PURCHASE', 'FIRST_DAILY_GIFT', 'FIRST_REACTION'] as const;
export const EXCLUSION_CONDITION_KINDS = ['NOT_VIP', 'NOT_CLAIMED_BEFORE'] as const;

export type NumericConditionKind = (typeof NUMERIC_CONDITION_KINDS)[number];
export type EventConditionKind = (typeof EVENT_CONDITION_KINDS)[number];
export type ExclusionConditionKind = (typeof EXCLUSION_CONDITION_KINDS)[number];
export type ConditionKind = NumericConditionKind | EventConditionKind | ExclusionConditionKind;

export const CONDITION_KINDS = [
  ...NUMERIC_CONDITION_KINDS,
  ...EVENT_CONDITION_KINDS,
  ...EXCLUSION_CONDITION_KINDS
] as const;

export interface RewardCondition {
  id: string;
  rewardId: string;
  kind: ConditionKind;
  /** Threshold for numeric kinds; null otherwise */
  value: number | null;
  /** 0 = AND group, anything else is an OR bucket */
  group: number;
}

export type ConditionGroup =
  | { kind: 'AND'; conditions: RewardCondition[] }
  | { kind: 'OR'; groupId: number; conditions: RewardCondition[] };

export const REWARD_STATUSES = ['LOCKED', 'UNLOCKED', 'CLAIMED', 'EXPIRED'] as const;
export type RewardStatus = (typeof REWARD_STATUSES)[number];

export interface UserRewardState {
  userId: string;
  rewardId: string;
  status: RewardStatus;
  unlockedAt: string | null;
  expiresAt: string | null;
  claimedAt: string | null;
  lastClaimedAt: string | null;
  claimCount: number;
}

export type UserRole = 'FREE' | 'VIP' | 'ADMIN';

export interface Membership {
  userId: string;
  startedAt: string;
  expiresAt: string;
}

export type ContentAccessSource = 'reward_claim' | 'shop_purchase';

export interface ContentAccess {
  id: number;
  userId: string;
  contentId: string;
  source: ContentAccessSource;
  metadata: LedgerMetadata;
  createdAt: string;
}

export interface ReactionRecord {
  userId: string;
  contentId: string;
  channelId: string;
  emoji: string;
  createdAt: string;
}

export interface ShopItem {
  id: string;
  name: string;
  cost: number;
  contentId: string;
}

export type PurchaseStatus = 'pending' | 'paid' | 'delivered' | 'refunded' | 'payment_failed';

export interface PurchaseRecord {
  attemptId: string;
  userId: string;
  itemId: string;
  price: number;
  status: PurchaseStatus;
  createdAt: string;
  updatedAt: string;
}

export interface EconomyConfig {
  levelFormula: string;
  dailyGiftBase: number;
  streakBonusPerDay: number;
  streakBonusMax: number;
  besitosPerReaction: number;
  maxReactionsPerDay: number;
  reactionCooldownSeconds: number;
  maxRewardBesitos: number;
  maxRewardMembershipDays: number;
  shopItems: ShopItem[];
}

export interface AppState {
  config: EconomyConfig;
  accounts: Record<string, Account>;
  ledger: LedgerEntry[];
  streaks: Record<string, StreakState>;
  rewards: RewardDefinition[];
  rewardConditions: RewardCondition[];
  userRewards: Record<string, UserRewardState>;
  memberships: Record<string, Membership>;
  contentAccess: ContentAccess[];
  reactions: ReactionRecord[];
  purchases: Record<string, PurchaseRecord>;
  sequences: { ledger: number; contentAccess: number };
}

export const ECONOMY_EVENTS = [
  'daily_gift_claimed',
  'reaction_added',
  'purchase_completed',
  'level_up',
  'streak_updated'
] as const;
export type EconomyEvent = (typeof ECONOMY_EVENTS)[number];

export type ErrorCode =
  | 'INVALID_AMOUNT'
  | 'NO_ACCOUNT'
  | 'INSUFFICIENT_FUNDS'
  | 'ALREADY_CLAIMED_TODAY'
  | 'ALREADY_CLAIMED'
  | 'REWARD_NOT_FOUND'
  | 'REWARD_INACTIVE'
  | 'REWARD_LOCKED'
  | 'REWARD_EXPIRED'
  | 'PAYOUT_FAILED'
  | 'ITEM_NOT_FOUND'
  | 'DUPLICATE_ATTEMPT'
  | 'DELIVERY_FAILED'
  | 'DUPLICATE_REACTION'
  | 'RATE_LIMITED'
  | 'DAILY_LIMIT_REACHED';

export type Detail = Record<string, string | number | boolean | null>;

export type Result<T, C extends ErrorCode = ErrorCode> =
  | { success: true; data: T }
  | { success: false; code: C; message: string; detail?: Detail };

export const ok = <T>(data: T): { success: true; data: T } => ({ success: true, data });

export const fail = <C extends ErrorCode>(
  code: C,
  message: string,
  detail?: Detail
): { success: false; code: C; message: string; detail?: Detail } =>
  detail ? { success: false, code, message, detail } : { success: false, code, message };

export interface CommandResult<T = undefined> {
  success: boolean;
  message: string;
  data?: T;
}

export type Clock = () => Date;
