import { Button, HomeView, KnownBlock, ModalView, PlainTextOption } from '@slack/bolt';
import { AvailableReward } from '../services/rewardService';
import { describePayload, RewardNotification } from '../services/rewardNotifications';
import { StreakInfo } from '../services/streakService';
import { EconomyConfig, LedgerEntry, RewardStatus, ShopItem } from '../types';

export const HOME_SECTIONS = ['Home', 'Rewards', 'Shop', 'History', 'Settings'] as const;
export type HomeSection = (typeof HOME_SECTIONS)[number];

export const isHomeSection = (value: string): value is HomeSection => HOME_SECTIONS.some(section => section === value);

export interface HomeViewModel {
  userId: string;
  section: HomeSection;
  isAdmin: boolean;
  balance: number;
  level: number;
  dailyStreak: StreakInfo;
  reactionStreak: StreakInfo;
  rewards: AvailableReward[];
  shopItems: ShopItem[];
  history: LedgerEntry[];
  config: EconomyConfig;
}

const STATUS_LABELS: Record<RewardStatus, string> = {
  UNLOCKED: ':unlock: Ready to claim',
  LOCKED: ':lock: Locked',
  CLAIMED: ':white_check_mark: Claimed',
  EXPIRED: ':hourglass: Expired'
};

const mrkdwn = (text: string): KnownBlock => ({ type: 'section', text: { type: 'mrkdwn', text } });

const button = (text: string, actionId: string, value?: string): Button => ({
  type: 'button',
  text: { type: 'plain_text', text, emoji: true },
  action_id: actionId,
  ...(value === undefined ? {} : { value })
});

const option = (text: string): PlainTextOption => ({
  text: { type: 'plain_text', text, emoji: true },
  value: text
});

const homeBlocks = (model: HomeViewModel): KnownBlock[] => {
  const daily = model.dailyStreak;
  const giftLine = daily.canClaim
    ? 'Your daily gift is waiting.'
    : `Next daily gift: <!date^${Math.floor(Date.parse(daily.nextClaimTime ?? '') / 1000)}^{time}|tomorrow>`;

  return [
    mrkdwn(`*Your besitos:* ${model.balance}\n*Level:* ${model.level}`),
    mrkdwn(
      `*Daily gift streak:* ${daily.currentLength} (best ${daily.longestLength})\n` +
        `*Reaction streak:* ${model.reactionStreak.currentLength} (best ${model.reactionStreak.longestLength})`
    ),
    mrkdwn(giftLine),
    ...(daily.canClaim ? [{ type: 'actions' as const, elements: [button('Claim daily gift', 'claim_daily_gift')] }] : []),
    { type: 'divider' },
    mrkdwn(
      `*How to earn besitos:*\n` +
        `• React to content for ${model.config.besitosPerReaction} besitos (up to ${model.config.maxReactionsPerDay} a day)\n` +
        `• Claim the daily gift every day to grow your streak\n` +
        '• Use `/besitos` to check your balance from any channel'
    )
  ];
};

const rewardBlocks = (rewards: AvailableReward[]): KnownBlock[] => {
  if (rewards.length === 0) {
    return [mrkdwn('No rewards available right now.')];
  }

  return rewards.flatMap(({ reward, state, progress }): KnownBlock[] => {
    const progressText = progress
      .filter(p => p.required !== null && p.current !== null && p.kind !== 'NOT_CLAIMED_BEFORE')
      .map(p => `${p.kind.toLowerCase().replace(/_/g, ' ')}: ${p.current}/${p.required}`)
      .join(' · ');

    const section: KnownBlock = {
      type: 'section',
      text: {
        type: 'mrkdwn',
        text:
          `*${reward.name}* (${describePayload(reward.payload)})\n${reward.description}\n${STATUS_LABELS[state.status]}` +
          (progressText ? `\n_${progressText}_` : '')
      },
      ...(state.status === 'UNLOCKED' ? { accessory: button('Claim', `claim_reward_${reward.id}`, reward.id) } : {})
    };
    return [section];
  });
};

const shopBlocks = (items: ShopItem[], balance: number): KnownBlock[] => {
  if (items.length === 0) {
    return [mrkdwn('The shop is empty.')];
  }

  return [
    mrkdwn(`*Your besitos:* ${balance}`),
    ...items.map(
      (item): KnownBlock => ({
        type: 'section',
        text: { type: 'mrkdwn', text: `*${item.name}* - ${item.cost} besitos` },
        accessory: button('Buy', `buy_item_${item.id}`, item.id)
      })
    )
  ];
};

const historyBlocks = (entries: LedgerEntry[]): KnownBlock[] => {
  if (entries.length === 0) {
    return [mrkdwn('No movements yet.')];
  }

  return [
    mrkdwn('*Latest movements:*'),
    mrkdwn(
      entries
        .map(e => `${e.createdAt.slice(0, 10)}  ${e.amount > 0 ? '+' : ''}${e.amount}  ${e.category}  ${e.reason}`)
        .join('\n')
    )
  ];
};

const settingsBlocks = (config: EconomyConfig): KnownBlock[] => [
  mrkdwn('*Admin Settings*'),
  { type: 'divider' },
  mrkdwn(`*Level formula:* \`${config.levelFormula}\``),
  { type: 'actions', elements: [button('Set Level Formula', 'settings_set_formula')] },
  { type: 'divider' },
  mrkdwn(
    `*Daily gift:* ${config.dailyGiftBase} + ${config.streakBonusPerDay}/day (bonus max ${config.streakBonusMax})\n` +
      `*Reactions:* ${config.besitosPerReaction} besitos, ${config.maxReactionsPerDay}/day, ` +
      `${config.reactionCooldownSeconds}s cooldown`
  ),
  { type: 'actions', elements: [button('Set Economy Value', 'settings_set_value')] },
  { type: 'divider' },
  mrkdwn(`*Reward caps:* ${config.maxRewardBesitos} besitos, ${config.maxRewardMembershipDays} VIP days`),
  { type: 'actions', elements: [button('Set Reward Caps', 'settings_set_caps')] },
  { type: 'divider' },
  mrkdwn(`*Shop:* ${config.shopItems.map(i => `${i.name} (${i.cost})`).join(', ') || 'empty'}`),
  {
    type: 'actions',
    elements: [button('Add Item', 'settings_add_item'), button('Remove Item', 'settings_remove_item')]
  },
  { type: 'divider' },
  mrkdwn('*Balances & streaks:*'),
  {
    type: 'actions',
    elements: [
      button('Credit User', 'settings_credit_user'),
      button('Debit User', 'settings_debit_user'),
      button('Reset Streak', 'settings_reset_streak')
    ]
  }
];

/**
 * Build the App Home view for one user
 */
export const buildHomeView = (model: HomeViewModel): HomeView => {
  const sections = HOME_SECTIONS.filter(section => section !== 'Settings' || model.isAdmin);
  const selected = model.section === 'Settings' && !model.isAdmin ? 'Home' : model.section;

  const headerSection: KnownBlock = {
    type: 'section',
    text: { type: 'mrkdwn', text: 'Welcome to the besitos economy!' },
    accessory: {
      type: 'static_select',
      action_id: 'home_section_select',
      placeholder: { type: 'plain_text', text: 'Select Section', emoji: true },
      options: sections.map(option),
      initial_option: option(selected)
    }
  };

  let contentBlocks: KnownBlock[];
  switch (selected) {
    case 'Rewards':
      contentBlocks = rewardBlocks(model.rewards);
      break;
    case 'Shop':
      contentBlocks = shopBlocks(model.shopItems, model.balance);
      break;
    case 'History':
      contentBlocks = historyBlocks(model.history);
      break;
    case 'Settings':
      contentBlocks = settingsBlocks(model.config);
      break;
    case 'Home':
      contentBlocks = homeBlocks(model);
      break;
  }

  return { type: 'home', blocks: [headerSection, { type: 'divider' }, ...contentBlocks] };
};

/**
 * Grouped unlock message with one claim button per reward
 */
export const buildNotificationBlocks = (notification: RewardNotification): KnownBlock[] => {
  if (notification.primaryAction === 'none') return [];

  return [
    mrkdwn(notification.text),
    {
      type: 'actions',
      elements: notification.rewards
        .slice(0, 5)
        .map(reward => button(`Claim ${reward.name}`, `claim_reward_${reward.id}`, reward.id))
    }
  ];
};

/**
 * Single-input modal used by the admin settings buttons
 */
export const buildSettingModal = (
  callbackId: string,
  title: string,
  inputs: Array<{ blockId: string; label: string; placeholder?: string; initialValue?: string }>
): ModalView => ({
  type: 'modal',
  callback_id: callbackId,
  title: { type: 'plain_text', text: title, emoji: true },
  submit: { type: 'plain_text', text: 'Save', emoji: true },
  close: { type: 'plain_text', text: 'Cancel', emoji: true },
  blocks: inputs.map(
    (input): KnownBlock => ({
      type: 'input',
      block_id: input.blockId,
      label: { type: 'plain_text', text: input.label, emoji: true },
      element: {
        type: 'plain_text_input',
        action_id: 'value',
        ...(input.placeholder ? { placeholder: { type: 'plain_text' as const, text: input.placeholder } } : {}),
        ...(input.initialValue ? { initial_value: input.initialValue } : {})
      }
    })
  )
});

export const buildPurchaseConfirmation = (item: ShopItem, balance: number): KnownBlock[] => [
  mrkdwn(`:white_check_mark: You've bought *${item.name}*!`),
  mrkdwn(`*Besitos spent:* ${item.cost}\n*Remaining balance:* ${balance}`)
];

export const buildAdminPurchaseNotification = (userId: string, item: ShopItem, refunded: boolean): KnownBlock[] => [
  mrkdwn(':bell: *Shop delivery failed*'),
  mrkdwn(
    `<@${userId}> bought *${item.name}* for ${item.cost} besitos but delivery failed. ` +
      (refunded ? 'The besitos were refunded automatically.' : 'The automatic refund failed, please credit them manually.')
  )
];
