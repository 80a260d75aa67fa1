import { createLogger, Logger } from './logger';
import { Clock, EconomyEvent } from './types';
import { createCommandService, CommandService } from './services/commandService';
import { createDataService, DataService } from './services/dataService';
import { createLedgerService, LedgerService } from './services/ledgerService';
import { createMembershipService, MembershipService } from './services/membershipService';
import { createReactionService, ReactionService } from './services/reactionService';
import { RewardNotification } from './services/rewardNotifications';
import { createRewardService, RewardService, UnlockedReward } from './services/rewardService';
import { createShopService, ShopService } from './services/shopService';
import { createStreakService, StreakService } from './services/streakService';

export interface EconomyOptions {
  dataFilePath: string;
  adminUsers?: string[];
  logger?: Logger;
  now?: Clock;
  seedPath?: string;
}

export interface Dispatched {
  unlocked: UnlockedReward[];
  notification: RewardNotification;
}

export interface Economy {
  data: DataService;
  ledger: LedgerService;
  streaks: StreakService;
  memberships: MembershipService;
  rewards: RewardService;
  reactions: ReactionService;
  shop: ShopService;
  commands: CommandService;
  /** Forward the events of one action to the reward engine */
  dispatch(userId: string, events: EconomyEvent[], context?: string): Promise<Dispatched>;
}

/**
 * Build every service over one store
 */
export const createEconomy = (options: EconomyOptions): Economy => {
  const logger = options.logger ?? createLogger('economy');
  const serviceOptions = { logger, now: options.now };

  const data = createDataService(options.dataFilePath, { logger, seedPath: options.seedPath });
  const ledger = createLedgerService(data, serviceOptions);
  const streaks = createStreakService(data, ledger, serviceOptions);
  const memberships = createMembershipService(data, { ...serviceOptions, adminUsers: options.adminUsers });
  const rewards = createRewardService(data, ledger, streaks, memberships, serviceOptions);
  const reactions = createReactionService(data, ledger, streaks, serviceOptions);
  const shop = createShopService(data, ledger, serviceOptions);
  const commands = createCommandService(data, ledger, streaks, options.adminUsers);

  const dispatch = async (userId: string, events: EconomyEvent[], context?: string): Promise<Dispatched> => {
    const unlocked = await rewards.checkRewardsOnEvents(userId, events);
    return { unlocked, notification: rewards.buildNotification(unlocked, context) };
  };

  return { data, ledger, streaks, memberships, rewards, reactions, shop, commands, dispatch };
};
