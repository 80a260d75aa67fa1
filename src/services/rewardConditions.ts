import {
  ConditionGroup,
  ConditionKind,
  EconomyEvent,
  NUMERIC_CONDITION_KINDS,
  NumericConditionKind,
  RewardCondition
} from '../types';

/**
 * Everything a condition can look at for one (user, reward) pair
 */
export interface ConditionContext {
  streakLength: number;
  totalEarned: number;
  level: number;
  totalSpent: number;
  hasPurchased: boolean;
  hasClaimedDailyGift: boolean;
  hasReacted: boolean;
  isVip: boolean;
  /** Claims of the reward being evaluated */
  claimCount: number;
}

export interface ConditionProgress {
  conditionId: string;
  kind: ConditionKind;
  group: number;
  /** null for event and exclusion kinds */
  current: number | null;
  required: number | null;
  passed: boolean;
}

export const EVENT_CONDITION_MAP: Record<EconomyEvent, ConditionKind[]> = {
  daily_gift_claimed: ['STREAK_LENGTH', 'FIRST_DAILY_GIFT', 'TOTAL_POINTS'],
  reaction_added: ['FIRST_REACTION', 'TOTAL_POINTS'],
  purchase_completed: ['FIRST_PURCHASE', 'BESITOS_SPENT', 'TOTAL_POINTS'],
  level_up: ['LEVEL_REACHED', 'TOTAL_POINTS'],
  streak_updated: ['STREAK_LENGTH', 'TOTAL_POINTS']
};

export const affectedConditionKinds = (events: EconomyEvent[]): Set<ConditionKind> =>
  new Set(events.flatMap(event => EVENT_CONDITION_MAP[event]));

const isNumericKind = (kind: ConditionKind): kind is NumericConditionKind =>
  NUMERIC_CONDITION_KINDS.some(numeric => numeric === kind);

const numericValue = (kind: NumericConditionKind, context: ConditionContext): number => {
  switch (kind) {
    case 'STREAK_LENGTH':
      return context.streakLength;
    case 'TOTAL_POINTS':
      return context.totalEarned;
    case 'LEVEL_REACHED':
      return context.level;
    case 'BESITOS_SPENT':
      return context.totalSpent;
  }
};

export const evaluateCondition = (condition: RewardCondition, context: ConditionContext): ConditionProgress => {
  const base = { conditionId: condition.id, kind: condition.kind, group: condition.group };
  const { kind } = condition;

  if (isNumericKind(kind)) {
    const current = numericValue(kind, context);
    // a numeric condition without a threshold never passes
    const passed = condition.value !== null && current >= condition.value;
    return { ...base, current, required: condition.value, passed };
  }

  switch (kind) {
    case 'FIRST_PURCHASE':
      return { ...base, current: null, required: null, passed: context.hasPurchased };
    case 'FIRST_DAILY_GIFT':
      return { ...base, current: null, required: null, passed: context.hasClaimedDailyGift };
    case 'FIRST_REACTION':
      return { ...base, current: null, required: null, passed: context.hasReacted };
    case 'NOT_VIP':
      return { ...base, current: null, required: null, passed: !context.isVip };
    case 'NOT_CLAIMED_BEFORE':
      return { ...base, current: context.claimCount, required: 0, passed: context.claimCount === 0 };
  }
};

/**
 * Split a flat condition list into its AND group (group 0) followed by one OR
 * group per other group number, in ascending order
 */
export const groupConditions = (conditions: RewardCondition[]): ConditionGroup[] => {
  const groups: ConditionGroup[] = [];

  const andConditions = conditions.filter(c => c.group === 0);
  if (andConditions.length > 0) {
    groups.push({ kind: 'AND', conditions: andConditions });
  }

  const orIds = [...new Set(conditions.filter(c => c.group !== 0).map(c => c.group))].sort((a, b) => a - b);
  for (const groupId of orIds) {
    groups.push({ kind: 'OR', groupId, conditions: conditions.filter(c => c.group === groupId) });
  }

  return groups;
};

export const isGroupSatisfied = (group: ConditionGroup, context: ConditionContext): boolean => {
  const passes = (condition: RewardCondition) => evaluateCondition(condition, context).passed;
  return group.kind === 'AND' ? group.conditions.every(passes) : group.conditions.some(passes);
};

/**
 * Every group must hold; no conditions at all means always eligible
 */
export const isEligible = (conditions: RewardCondition[], context: ConditionContext): boolean =>
  groupConditions(conditions).every(group => isGroupSatisfied(group, context));
