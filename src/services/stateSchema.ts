import { z } from 'zod';
import {
  CONDITION_KINDS,
  LEDGER_CATEGORIES,
  REWARD_STATUSES,
  STREAK_KINDS
} from '../types';

const isoDate = z.string().datetime();
const utcDay = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
const count = z.number().int().nonnegative();

const metadataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

export const rewardPayloadSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('BESITOS'), amount: z.number().int().positive() }),
  z.object({ kind: z.literal('CONTENT'), contentId: z.string().min(1) }),
  z.object({ kind: z.literal('BADGE'), badgeName: z.string().min(1), emoji: z.string() }),
  z.object({ kind: z.literal('VIP_EXTENSION'), days: z.number().int().positive() })
]);

export const rewardDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  payload: rewardPayloadSchema,
  repeatable: z.boolean(),
  secret: z.boolean(),
  claimWindowHours: z.number().positive(),
  active: z.boolean(),
  sortOrder: z.number().int()
});

export const rewardConditionSchema = z.object({
  id: z.string().min(1),
  rewardId: z.string().min(1),
  kind: z.enum(CONDITION_KINDS),
  value: z.number().int().nonnegative().nullable(),
  group: count
});

/** Shape of data/default-rewards.json */
export const rewardSeedSchema = z.array(
  z.object({
    reward: rewardDefinitionSchema,
    conditions: z.array(rewardConditionSchema.omit({ rewardId: true }))
  })
);

const shopItemSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  cost: z.number().int().positive(),
  contentId: z.string().min(1)
});

export const economyConfigSchema = z.object({
  levelFormula: z.string().min(1),
  dailyGiftBase: z.number().int().positive(),
  streakBonusPerDay: count,
  streakBonusMax: count,
  besitosPerReaction: z.number().int().positive(),
  maxReactionsPerDay: z.number().int().positive(),
  reactionCooldownSeconds: count,
  maxRewardBesitos: z.number().int().positive(),
  maxRewardMembershipDays: z.number().int().positive(),
  shopItems: z.array(shopItemSchema)
});

const accountSchema = z.object({
  userId: z.string(),
  balance: count,
  totalEarned: count,
  totalSpent: count,
  level: z.number().int().min(1),
  createdAt: isoDate,
  updatedAt: isoDate
});

const ledgerEntrySchema = z.object({
  id: z.number().int().positive(),
  userId: z.string(),
  amount: z.number().int(),
  category: z.enum(LEDGER_CATEGORIES),
  reason: z.string(),
  metadata: metadataSchema,
  createdAt: isoDate
});

const streakSchema = z.object({
  userId: z.string(),
  kind: z.enum(STREAK_KINDS),
  currentLength: count,
  longestLength: count,
  lastClaimDay: utcDay.nullable(),
  lastActivityDay: utcDay.nullable()
});

const userRewardSchema = z.object({
  userId: z.string(),
  rewardId: z.string(),
  status: z.enum(REWARD_STATUSES),
  unlockedAt: isoDate.nullable(),
  expiresAt: isoDate.nullable(),
  claimedAt: isoDate.nullable(),
  lastClaimedAt: isoDate.nullable(),
  claimCount: count
});

const membershipSchema = z.object({
  userId: z.string(),
  startedAt: isoDate,
  expiresAt: isoDate
});

const contentAccessSchema = z.object({
  id: z.number().int().positive(),
  userId: z.string(),
  contentId: z.string(),
  source: z.enum(['reward_claim', 'shop_purchase']),
  metadata: metadataSchema,
  createdAt: isoDate
});

const reactionSchema = z.object({
  userId: z.string(),
  contentId: z.string(),
  channelId: z.string(),
  emoji: z.string(),
  createdAt: isoDate
});

const purchaseSchema = z.object({
  attemptId: z.string(),
  userId: z.string(),
  itemId: z.string(),
  price: z.number().int().positive(),
  status: z.enum(['pending', 'paid', 'delivered', 'refunded', 'payment_failed']),
  createdAt: isoDate,
  updatedAt: isoDate
});

/**
 * Persisted document. Config keys are optional so that older files pick up
 * newly introduced settings from the defaults.
 */
export const persistedStateSchema = z.object({
  config: economyConfigSchema.partial().default({}),
  accounts: z.record(accountSchema).default({}),
  ledger: z.array(ledgerEntrySchema).default([]),
  streaks: z.record(streakSchema).default({}),
  rewards: z.array(rewardDefinitionSchema).default([]),
  rewardConditions: z.array(rewardConditionSchema).default([]),
  userRewards: z.record(userRewardSchema).default({}),
  memberships: z.record(membershipSchema).default({}),
  contentAccess: z.array(contentAccessSchema).default([]),
  reactions: z.array(reactionSchema).default([]),
  purchases: z.record(purchaseSchema).default({}),
  sequences: z
    .object({ ledger: count, contentAccess: count })
    .default({ ledger: 0, contentAccess: 0 })
});
