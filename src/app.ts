import { App, BlockAction, ButtonAction, StaticSelectAction, ViewOutput } from '@slack/bolt';
import dotenv from 'dotenv';

import { loadConfig } from './config';
import { createEconomy, Dispatched } from './economy';
import { createLogger, parseLogLevel } from './logger';
import { EconomyEvent, ShopItem, STREAK_KINDS } from './types';
import {
  buildAdminPurchaseNotification,
  buildHomeView,
  buildNotificationBlocks,
  buildPurchaseConfirmation,
  buildSettingModal,
  HomeSection,
  isHomeSection
} from './views/homeView';

dotenv.config();

const config = loadConfig();
const logger = createLogger('besitos', parseLogLevel(config.LOG_LEVEL));

// shared with the services; workspace admins are appended once fetched at startup
const adminUsers = [...config.ADMIN_USER_IDS];
const economy = createEconomy({ dataFilePath: config.DATA_FILE_PATH, adminUsers, logger });

const app = new App({
  token: config.SLACK_BOT_TOKEN,
  signingSecret: config.SLACK_SIGNING_SECRET,
  socketMode: config.SOCKET_MODE,
  appToken: config.SLACK_APP_TOKEN,
  logger
});

type SlackClient = App['client'];

const HELP_TEXT = [
  '*Besitos commands:*',
  '`/besitos` - your balance, level and streak',
  '`/besitos daily` - claim your daily gift',
  '`/besitos history [page]` - your latest movements',
  '`/besitos rewards` - rewards you can unlock',
  '`/besitos claim <reward-id>` - claim an unlocked reward',
  '`/besitos shop` - items for sale',
  '`/besitos buy <item-id>` - buy an item'
].join('\n');

const ADMIN_HELP_TEXT = [
  '*Admin commands:*',
  '`/besitos admin credit @user <amount> [reason]`',
  '`/besitos admin debit @user <amount> [reason]`',
  '`/besitos admin formula <expression>`',
  '`/besitos admin caps <besitos> <vip-days>`',
  '`/besitos admin set <setting> <value>`',
  '`/besitos admin item add <id> <cost> <content-id> <name>`',
  '`/besitos admin item remove <id>`',
  '`/besitos admin reward enable|disable <reward-id>`',
  '`/besitos admin reset-streak @user [DAILY_GIFT|REACTION]`'
].join('\n');

async function getAdminUsers(client: SlackClient): Promise<string[]> {
  try {
    const result = await client.users.list({});
    if (!result.ok || !result.members) {
      logger.error('Failed to fetch users:', result.error);
      return [];
    }

    return result.members
      .filter(user => (user.is_admin || user.is_owner || user.is_primary_owner) && !user.deleted)
      .map(user => user.id)
      .filter((id): id is string => typeof id === 'string');
  } catch (error) {
    logger.error('Error fetching admin users:', error);
    return [];
  }
}

async function publishHomeView(client: SlackClient, userId: string, section: HomeSection = 'Home') {
  const view = buildHomeView({
    userId,
    section,
    isAdmin: economy.commands.isAdmin(userId),
    balance: economy.ledger.balance(userId),
    level: economy.ledger.level(userId),
    dailyStreak: economy.streaks.getStreakInfo(userId, 'DAILY_GIFT'),
    reactionStreak: economy.streaks.getStreakInfo(userId, 'REACTION'),
    rewards: economy.rewards.getAvailableRewards(userId),
    shopItems: economy.shop.getItems(),
    history: economy.ledger.history(userId, 1, 10).entries,
    config: economy.data.getConfig()
  });

  try {
    await client.views.publish({ user_id: userId, view });
  } catch (error) {
    logger.error('Error publishing home view:', error);
  }
}

async function sendDirectMessage(client: SlackClient, userId: string, text: string, dispatched?: Dispatched) {
  try {
    await client.chat.postMessage({
      channel: userId,
      text,
      ...(dispatched ? { blocks: buildNotificationBlocks(dispatched.notification) } : {})
    });
  } catch (error) {
    logger.error(`Error messaging ${userId}:`, error);
  }
}

/**
 * Forward events to the reward engine and tell the user about anything unlocked
 */
async function dispatchEvents(client: SlackClient, userId: string, events: EconomyEvent[], context?: string) {
  const dispatched = await economy.dispatch(userId, events, context);
  if (dispatched.notification.primaryAction === 'claim') {
    await sendDirectMessage(client, userId, dispatched.notification.text, dispatched);
  }
}

async function claimDailyGift(client: SlackClient, userId: string): Promise<string> {
  const result = await economy.streaks.claimDailyGift(userId);
  if (!result.success) {
    if (result.code === 'ALREADY_CLAIMED_TODAY') {
      const { reason } = economy.streaks.canClaimDailyGift(userId);
      return `You already claimed today's gift (${reason.replace(/_/g, ' ')}).`;
    }
    return result.message;
  }

  const gift = result.data;
  await dispatchEvents(client, userId, gift.events, `Daily gift, day ${gift.streakDay}`);
  return `:gift: +${gift.total} besitos (${gift.base} + ${gift.bonus} streak bonus). Streak: ${gift.streakDay} days. Balance: ${gift.balance}`;
}

async function claimReward(client: SlackClient, userId: string, rewardId: string): Promise<string> {
  const result = await economy.rewards.claim(userId, rewardId);
  if (!result.success) {
    return result.message;
  }

  const { reward, payout, wasCapped, events } = result.data;
  if (events.length > 0) {
    await dispatchEvents(client, userId, events);
  }

  const capped = wasCapped ? ' (capped)' : '';
  switch (payout.kind) {
    case 'BESITOS':
      return `:tada: ${reward.name}: +${payout.granted} besitos${capped}. Balance: ${payout.balance}`;
    case 'VIP_EXTENSION':
      return `:tada: ${reward.name}: +${payout.granted} VIP days${capped}, until ${payout.expiresAt.slice(0, 10)}`;
    case 'CONTENT':
      return `:tada: ${reward.name}: you now have access to ${payout.contentId}`;
    case 'BADGE':
      return `:tada: ${reward.name}: you earned the ${payout.emoji} ${payout.badgeName} badge`;
  }
}

async function notifyAdminsOfFailedDelivery(client: SlackClient, userId: string, item: ShopItem, refunded: boolean) {
  for (const adminId of adminUsers) {
    try {
      await client.chat.postMessage({
        channel: adminId,
        text: `Delivery of ${item.name} to <@${userId}> failed`,
        blocks: buildAdminPurchaseNotification(userId, item, refunded)
      });
    } catch (error) {
      logger.error('Error notifying admin of failed delivery:', error);
    }
  }
}

async function buyItem(client: SlackClient, userId: string, itemId: string, attemptId: string): Promise<string> {
  const result = await economy.shop.purchase(userId, itemId, attemptId, async item => {
    await client.chat.postMessage({
      channel: userId,
      text: `Here is your ${item.name}: ${item.contentId}`,
      blocks: buildPurchaseConfirmation(item, economy.ledger.balance(userId))
    });
  });

  if (!result.success) {
    if (result.code === 'DELIVERY_FAILED') {
      const item = economy.shop.getItem(itemId);
      if (item) {
        await notifyAdminsOfFailedDelivery(client, userId, item, result.detail?.refunded === true);
      }
    }
    return result.message;
  }

  await dispatchEvents(client, userId, result.data.events, `Bought ${result.data.item.name}`);
  return `:shopping_bags: You bought ${result.data.item.name}. Balance: ${result.data.balance}`;
}

function describeBalance(userId: string): string {
  const streak = economy.streaks.getStreakInfo(userId, 'DAILY_GIFT');
  return (
    `*Balance:* ${economy.ledger.balance(userId)} besitos\n` +
    `*Level:* ${economy.ledger.level(userId)}\n` +
    `*Daily streak:* ${streak.currentLength} (best ${streak.longestLength})` +
    (streak.canClaim ? '\nYour daily gift is ready: `/besitos daily`' : '')
  );
}

function describeHistory(userId: string, pageArg?: string): string {
  const page = Math.max(1, parseInt(pageArg ?? '1', 10) || 1);
  const { entries, totalCount } = economy.ledger.history(userId, page, 10);
  if (entries.length === 0) {
    return page === 1 ? 'No movements yet.' : `No movements on page ${page}.`;
  }
  const lines = entries.map(e => `${e.createdAt.slice(0, 10)}  ${e.amount > 0 ? '+' : ''}${e.amount}  ${e.category}  ${e.reason}`);
  return [`*Movements (page ${page} of ${Math.ceil(totalCount / 10)}):*`, ...lines].join('\n');
}

function describeRewards(userId: string): string {
  const rewards = economy.rewards.getAvailableRewards(userId);
  if (rewards.length === 0) return 'No rewards available right now.';
  return rewards.map(({ reward, state }) => `• \`${reward.id}\` *${reward.name}* - ${state.status.toLowerCase()}`).join('\n');
}

function describeShop(): string {
  const items = economy.shop.getItems();
  if (items.length === 0) return 'The shop is empty.';
  return items.map(item => `• \`${item.id}\` *${item.name}* - ${item.cost} besitos`).join('\n');
}

async function runAdminCommand(userId: string, args: string[]): Promise<string> {
  const commands = economy.commands;
  const [action, ...rest] = args;

  switch (action) {
    case 'credit':
      return (await commands.credit(userId, rest[0] ?? '', rest[1] ?? '', rest.slice(2).join(' '))).message;
    case 'debit':
      return (await commands.debit(userId, rest[0] ?? '', rest[1] ?? '', rest.slice(2).join(' '))).message;
    case 'formula':
      return (await commands.setLevelFormula(userId, rest.join(' '))).message;
    case 'caps':
      return (await commands.setRewardCaps(userId, rest[0] ?? '', rest[1] ?? '')).message;
    case 'set':
      return (await commands.setEconomyValue(userId, rest[0] ?? '', rest[1] ?? '')).message;
    case 'item':
      if (rest[0] === 'add') {
        return (await commands.addShopItem(userId, rest[1] ?? '', rest[2] ?? '', rest[3] ?? '', rest.slice(4).join(' '))).message;
      }
      if (rest[0] === 'remove') {
        return (await commands.removeShopItem(userId, rest[1] ?? '')).message;
      }
      return 'Invalid item command. Available commands: add, remove';
    case 'reward':
      if (rest[0] === 'enable' || rest[0] === 'disable') {
        return (await commands.setRewardActive(userId, rest[1] ?? '', rest[0] === 'enable')).message;
      }
      return 'Invalid reward command. Available commands: enable, disable';
    case 'reset-streak':
      return (await commands.resetStreak(userId, rest[0] ?? '', rest[1])).message;
    default:
      return ADMIN_HELP_TEXT;
  }
}

app.event('app_home_opened', async ({ event, client }) => {
  await publishHomeView(client, event.user);
});

app.command('/besitos', async ({ command, ack, respond, client }) => {
  await ack();

  const { text, user_id } = command;
  const [subcommand = 'balance', ...args] = text.trim().split(/\s+/).filter(part => part.length > 0);
  let message: string;

  try {
    switch (subcommand) {
      case 'balance':
        message = describeBalance(user_id);
        break;
      case 'daily':
        message = await claimDailyGift(client, user_id);
        break;
      case 'history':
        message = describeHistory(user_id, args[0]);
        break;
      case 'rewards':
        message = describeRewards(user_id);
        break;
      case 'claim':
        message = args[0] ? await claimReward(client, user_id, args[0]) : 'Usage: `/besitos claim <reward-id>`';
        break;
      case 'shop':
        message = describeShop();
        break;
      case 'buy':
        message = args[0]
          ? await buyItem(client, user_id, args[0], `${user_id}:${command.trigger_id}`)
          : 'Usage: `/besitos buy <item-id>`';
        break;
      case 'admin':
        message = await runAdminCommand(user_id, args);
        break;
      default:
        message = economy.commands.isAdmin(user_id) ? `${HELP_TEXT}\n\n${ADMIN_HELP_TEXT}` : HELP_TEXT;
    }
  } catch (error) {
    logger.error('Error handling /besitos command:', error);
    message = 'Something went wrong, please try again.';
  }

  await respond({ response_type: 'ephemeral', text: message });
});

app.event('reaction_added', async ({ event, client }) => {
  if (event.item.type !== 'message' || event.item_user === event.user) return;

  try {
    const result = await economy.reactions.react({
      userId: event.user,
      contentId: `${event.item.channel}:${event.item.ts}`,
      channelId: event.item.channel,
      emoji: event.reaction
    });
    if (result.success) {
      await dispatchEvents(client, event.user, result.data.events);
    }
  } catch (error) {
    logger.error('Error recording reaction:', error);
  }
});

app.action<BlockAction<StaticSelectAction>>('home_section_select', async ({ action, body, ack, client }) => {
  await ack();
  const selected = action.selected_option.value;
  await publishHomeView(client, body.user.id, isHomeSection(selected) ? selected : 'Home');
});

app.action<BlockAction<ButtonAction>>('claim_daily_gift', async ({ body, ack, client }) => {
  await ack();
  const userId = body.user.id;
  try {
    await sendDirectMessage(client, userId, await claimDailyGift(client, userId));
  } catch (error) {
    logger.error('Error claiming daily gift:', error);
  }
  await publishHomeView(client, userId);
});

app.action<BlockAction<ButtonAction>>(/^claim_reward_.+/, async ({ action, body, ack, client }) => {
  await ack();
  const userId = body.user.id;
  try {
    await sendDirectMessage(client, userId, await claimReward(client, userId, action.value ?? ''));
  } catch (error) {
    logger.error('Error claiming reward:', error);
  }
  await publishHomeView(client, userId, 'Rewards');
});

app.action<BlockAction<ButtonAction>>(/^buy_item_.+/, async ({ action, body, ack, client }) => {
  await ack();
  const userId = body.user.id;
  try {
    const message = await buyItem(client, userId, action.value ?? '', `${userId}:${action.action_ts}`);
    await sendDirectMessage(client, userId, message);
  } catch (error) {
    logger.error('Error buying item:', error);
  }
  await publishHomeView(client, userId, 'Shop');
});

/**
 * Admin settings: each button opens a modal whose submission runs one command
 */
const SETTINGS_MODALS: Record<
  string,
  {
    title: string;
    inputs: Array<{ blockId: string; label: string; placeholder?: string }>;
    submit: (userId: string, input: (blockId: string) => string) => Promise<{ message: string }>;
  }
> = {
  settings_set_formula: {
    title: 'Level Formula',
    inputs: [{ blockId: 'formula', label: 'Formula', placeholder: 'floor(sqrt(total_earned / 100)) + 1' }],
    submit: (userId, input) => economy.commands.setLevelFormula(userId, input('formula'))
  },
  settings_set_value: {
    title: 'Economy Value',
    inputs: [
      { blockId: 'key', label: 'Setting', placeholder: 'dailyGiftBase' },
      { blockId: 'value', label: 'Value' }
    ],
    submit: (userId, input) => economy.commands.setEconomyValue(userId, input('key').trim(), input('value'))
  },
  settings_set_caps: {
    title: 'Reward Caps',
    inputs: [
      { blockId: 'besitos', label: 'Max besitos per reward' },
      { blockId: 'days', label: 'Max VIP days per reward' }
    ],
    submit: (userId, input) => economy.commands.setRewardCaps(userId, input('besitos'), input('days'))
  },
  settings_add_item: {
    title: 'Add Shop Item',
    inputs: [
      { blockId: 'id', label: 'Item id' },
      { blockId: 'name', label: 'Name' },
      { blockId: 'cost', label: 'Cost' },
      { blockId: 'content', label: 'Content id' }
    ],
    submit: (userId, input) =>
      economy.commands.addShopItem(userId, input('id'), input('cost'), input('content'), input('name'))
  },
  settings_remove_item: {
    title: 'Remove Shop Item',
    inputs: [{ blockId: 'id', label: 'Item id' }],
    submit: (userId, input) => economy.commands.removeShopItem(userId, input('id'))
  },
  settings_credit_user: {
    title: 'Credit User',
    inputs: [
      { blockId: 'user', label: 'User id', placeholder: 'U012ABCDEF' },
      { blockId: 'amount', label: 'Amount' },
      { blockId: 'reason', label: 'Reason' }
    ],
    submit: (userId, input) => economy.commands.credit(userId, input('user'), input('amount'), input('reason'))
  },
  settings_debit_user: {
    title: 'Debit User',
    inputs: [
      { blockId: 'user', label: 'User id', placeholder: 'U012ABCDEF' },
      { blockId: 'amount', label: 'Amount' },
      { blockId: 'reason', label: 'Reason' }
    ],
    submit: (userId, input) => economy.commands.debit(userId, input('user'), input('amount'), input('reason'))
  },
  settings_reset_streak: {
    title: 'Reset Streak',
    inputs: [
      { blockId: 'user', label: 'User id', placeholder: 'U012ABCDEF' },
      { blockId: 'kind', label: 'Streak kind', placeholder: STREAK_KINDS.join(' or ') }
    ],
    submit: (userId, input) => economy.commands.resetStreak(userId, input('user'), input('kind') || 'DAILY_GIFT')
  }
};

const readInput = (view: ViewOutput) => (blockId: string): string =>
  view.state.values[blockId]?.value?.value ?? '';

for (const [actionId, modal] of Object.entries(SETTINGS_MODALS)) {
  app.action<BlockAction<ButtonAction>>(actionId, async ({ body, ack, client }) => {
    await ack();
    if (!economy.commands.isAdmin(body.user.id)) return;
    try {
      await client.views.open({
        trigger_id: body.trigger_id,
        view: buildSettingModal(`${actionId}_modal`, modal.title, modal.inputs)
      });
    } catch (error) {
      logger.error(`Error opening ${actionId} modal:`, error);
    }
  });

  app.view(`${actionId}_modal`, async ({ ack, body, view, client }) => {
    await ack();
    const userId = body.user.id;
    const result = await modal.submit(userId, readInput(view));
    await sendDirectMessage(client, userId, result.message);
    await publishHomeView(client, userId, 'Settings');
  });
}

async function expireStreaks() {
  for (const kind of STREAK_KINDS) {
    await economy.streaks.expireMissedStreaks(kind);
  }
}

(async () => {
  const workspaceAdmins = await getAdminUsers(app.client);
  adminUsers.push(...workspaceAdmins.filter(id => !adminUsers.includes(id)));

  await expireStreaks();
  setInterval(() => {
    expireStreaks().catch(error => logger.error('Error expiring streaks:', error));
  }, config.STREAK_SWEEP_INTERVAL_MINUTES * 60 * 1000);

  await app.start(config.PORT);
  logger.info(`Besitos app is running on port ${config.PORT}`);
})().catch(error => {
  logger.error('Failed to start app:', error);
  process.exit(1);
});
