import fs from 'fs';
import { Economy } from '../../src/economy';
import { ReactionInput } from '../../src/services/reactionService';
import { createClock, createTestEconomy, failNthWrite, TestClock } from '../support/testEconomy';

jest.mock('fs', () => ({
  existsSync: jest.fn(),
  mkdirSync: jest.fn(),
  readFileSync: jest.fn(),
  promises: {
    writeFile: jest.fn()
  }
}));

describe('Reactions', () => {
  let clock: TestClock;
  let economy: Economy;

  const reaction = (contentId: string, userId = 'U1'): ReactionInput => ({
    userId,
    contentId,
    channelId: 'C1',
    emoji: 'heart'
  });

  beforeEach(() => {
    jest.mocked(fs.existsSync).mockReturnValue(false);
    jest.mocked(fs.promises.writeFile).mockResolvedValue(undefined);
    clock = createClock('2026-03-10T12:00:00.000Z');
    economy = createTestEconomy(clock);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  test('a reaction pays besitos and starts the reaction streak', async () => {
    const result = await economy.reactions.react(reaction('C1:100'));

    expect(result).toEqual({
      success: true,
      data: {
        besitosEarned: 5,
        balance: 5,
        streakLength: 1,
        reactionsToday: 1,
        events: ['reaction_added', 'streak_updated']
      }
    });

    const [entry] = economy.ledger.history('U1').entries;
    expect(entry).toMatchObject({
      category: 'EARN_REACTION',
      reason: 'reaction',
      metadata: { content_id: 'C1:100', channel_id: 'C1', emoji: 'heart' }
    });
  });

  test('reacting twice to the same content pays once', async () => {
    await economy.reactions.react(reaction('C1:100'));
    clock.advanceSeconds(120);

    const again = await economy.reactions.react(reaction('C1:100'));

    expect(again).toEqual({
      success: false,
      code: 'DUPLICATE_REACTION',
      message: 'You already reacted to this content'
    });
    expect(economy.ledger.balance('U1')).toBe(5);
  });

  test('reactions inside the cooldown are rate limited', async () => {
    await economy.reactions.react(reaction('C1:100'));
    clock.advanceSeconds(10);

    const limited = await economy.reactions.react(reaction('C1:101'));

    expect(limited).toEqual({
      success: false,
      code: 'RATE_LIMITED',
      message: 'Slow down a little before reacting again',
      detail: { secondsRemaining: 20 }
    });
  });

  test('a later reaction the same day keeps the streak length', async () => {
    await economy.reactions.react(reaction('C1:100'));
    clock.advanceSeconds(31);

    const second = await economy.reactions.react(reaction('C1:101'));

    expect(second.success && second.data).toEqual({
      besitosEarned: 5,
      balance: 10,
      streakLength: 1,
      reactionsToday: 2,
      events: ['reaction_added']
    });
  });

  test('the daily limit caps paid reactions', async () => {
    await economy.data.updateConfig({ maxReactionsPerDay: 2, reactionCooldownSeconds: 0 });

    await economy.reactions.react(reaction('C1:1'));
    await economy.reactions.react(reaction('C1:2'));
    const third = await economy.reactions.react(reaction('C1:3'));

    expect(third).toMatchObject({ success: false, code: 'DAILY_LIMIT_REACHED' });
    expect(economy.ledger.balance('U1')).toBe(10);

    clock.set('2026-03-11T00:00:05.000Z');
    expect((await economy.reactions.react(reaction('C1:3'))).success).toBe(true);
  });

  test('concurrent reactions to the same content pay once', async () => {
    const results = await Promise.all([
      economy.reactions.react(reaction('C1:100')),
      economy.reactions.react(reaction('C1:100'))
    ]);

    expect(results.map(r => r.success || r.code).sort()).toEqual(['DUPLICATE_REACTION', true].sort());
    expect(economy.ledger.balance('U1')).toBe(5);
  });

  test('limits are tracked per user', async () => {
    await economy.reactions.react(reaction('C1:100', 'U1'));

    const other = await economy.reactions.react(reaction('C1:100', 'U2'));

    expect(other.success).toBe(true);
    expect(economy.reactions.secondsUntilNextReaction('U1')).toBe(30);
    expect(economy.reactions.secondsUntilNextReaction('U3')).toBe(0);
  });

  test('a reaction that levels the user up says so', async () => {
    await economy.data.updateConfig({ besitosPerReaction: 100 });

    const result = await economy.reactions.react(reaction('C1:100'));

    expect(result.success && result.data.events).toEqual(['reaction_added', 'streak_updated', 'level_up']);
  });

  test('a credit whose save fails frees the reaction for a retry', async () => {
    // reaction row saves, the credit does not
    failNthWrite(2);

    await expect(economy.reactions.react(reaction('C1:100'))).rejects.toThrow('Failed to save data');

    expect(economy.data.getReactions('U1')).toEqual([]);
    expect(economy.ledger.history('U1').totalCount).toBe(0);

    const retried = await economy.reactions.react(reaction('C1:100'));

    expect(retried.success && retried.data.balance).toBe(5);
    expect(economy.data.getReactions('U1')).toHaveLength(1);
    expect(economy.ledger.history('U1').totalCount).toBe(1);
  });
});
