import { buildNotification, describePayload } from '../../src/services/rewardNotifications';
import { buildReward } from '../support/testEconomy';

describe('Reward notifications', () => {
  test('describes every payload kind', () => {
    expect(describePayload({ kind: 'BESITOS', amount: 25 })).toBe('25 besitos');
    expect(describePayload({ kind: 'CONTENT', contentId: 'content-bts' })).toBe('exclusive content');
    expect(describePayload({ kind: 'BADGE', badgeName: 'early bird', emoji: ':sunrise:' })).toBe(
      ':sunrise: early bird badge'
    );
    expect(describePayload({ kind: 'BADGE', badgeName: 'plain', emoji: '' })).toBe('plain badge');
    expect(describePayload({ kind: 'VIP_EXTENSION', days: 3 })).toBe('3 VIP days');
  });

  test('nothing unlocked means nothing to send', () => {
    expect(buildNotification([])).toEqual({ text: '', rewards: [], primaryAction: 'none' });
  });

  test('a single reward gets its own message', () => {
    const reward = buildReward({ id: 'week', name: 'Full Week', description: 'Seven days in a row' });

    expect(buildNotification([reward], 'Daily gift claimed')).toEqual({
      text: ':gift: You unlocked *Full Week*!\nSeven days in a row\nReward: 10 besitos\n_Daily gift claimed_',
      rewards: [reward],
      primaryAction: 'claim'
    });
  });

  test('several rewards are grouped in one message', () => {
    const rewards = [
      buildReward({ id: 'a', name: 'Alpha' }),
      buildReward({ id: 'b', name: 'Beta', payload: { kind: 'CONTENT', contentId: 'content-b' } })
    ];

    const notification = buildNotification(rewards);

    expect(notification.text).toBe(':gift: You unlocked 2 rewards!\n• *Alpha* (10 besitos)\n• *Beta* (exclusive content)');
    expect(notification.rewards.map(r => r.id)).toEqual(['a', 'b']);
  });

  test('an empty description is left out', () => {
    expect(buildNotification([buildReward({ id: 'x', name: 'X' })]).text).toBe(
      ':gift: You unlocked *X*!\nReward: 10 besitos'
    );
  });
});
