import { RewardDefinition, RewardPayload } from '../types';

export interface RewardNotification {
  text: string;
  rewards: RewardDefinition[];
  primaryAction: 'claim' | 'none';
}

export const describePayload = (payload: RewardPayload): string => {
  switch (payload.kind) {
    case 'BESITOS':
      return `${payload.amount} besitos`;
    case 'CONTENT':
      return 'exclusive content';
    case 'BADGE':
      return `${payload.emoji} ${payload.badgeName} badge`.trim();
    case 'VIP_EXTENSION':
      return `${payload.days} VIP days`;
  }
};

/**
 * One message for everything unlocked by a single event
 */
export const buildNotification = (rewards: RewardDefinition[], context?: string): RewardNotification => {
  if (rewards.length === 0) {
    return { text: '', rewards: [], primaryAction: 'none' };
  }

  const lines =
    rewards.length === 1
      ? [`:gift: You unlocked *${rewards[0].name}*!`, rewards[0].description, `Reward: ${describePayload(rewards[0].payload)}`]
      : [
          `:gift: You unlocked ${rewards.length} rewards!`,
          ...rewards.map(reward => `• *${reward.name}* (${describePayload(reward.payload)})`)
        ];

  if (context) {
    lines.push(`_${context}_`);
  }

  return {
    text: lines.filter(line => line.length > 0).join('\n'),
    rewards: [...rewards],
    primaryAction: 'claim'
  };
};
