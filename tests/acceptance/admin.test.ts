import fs from 'fs';
import { Economy } from '../../src/economy';
import { parseUserId } from '../../src/services/commandService';
import { buildCondition, buildReward, createClock, createTestEconomy } from '../support/testEconomy';

jest.mock('fs', () => ({
  existsSync: jest.fn(),
  mkdirSync: jest.fn(),
  readFileSync: jest.fn(),
  promises: {
    writeFile: jest.fn()
  }
}));

describe('Admin Commands Acceptance Tests', () => {
  let economy: Economy;
  const adminUserId = 'ADMIN123';
  const regularUserId = 'USER456';

  beforeEach(() => {
    jest.mocked(fs.existsSync).mockReturnValue(false);
    jest.mocked(fs.promises.writeFile).mockResolvedValue(undefined);
    economy = createTestEconomy(createClock('2026-03-10T12:00:00.000Z'), [adminUserId]);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  test('should parse user mentions and bare ids', () => {
    expect(parseUserId('<@USER456>')).toBe('USER456');
    expect(parseUserId('<@USER456|someone>')).toBe('USER456');
    expect(parseUserId(' USER456 ')).toBe('USER456');
    expect(parseUserId('someone')).toBeNull();
  });

  test('should allow admins to credit besitos', async () => {
    const result = await economy.commands.credit(adminUserId, `<@${regularUserId}>`, '50', 'contest winner');

    expect(result).toEqual({ success: true, message: 'Credited 50 besitos to <@USER456>. New balance: 50' });
    expect(economy.ledger.history(regularUserId).entries[0]).toMatchObject({
      category: 'EARN_ADMIN',
      reason: 'contest winner',
      metadata: { admin_id: adminUserId, action: 'credit' }
    });
  });

  test('should not allow regular users to credit besitos', async () => {
    const result = await economy.commands.credit(regularUserId, regularUserId, '50', 'free money');

    expect(result).toEqual({ success: false, message: 'Only admins can credit besitos' });
    expect(economy.ledger.balance(regularUserId)).toBe(0);
  });

  test('should reject invalid amounts and users', async () => {
    expect(await economy.commands.credit(adminUserId, regularUserId, 'abc', '')).toEqual({
      success: false,
      message: 'Please provide a valid amount of besitos'
    });
    expect(await economy.commands.credit(adminUserId, regularUserId, '0', '')).toEqual({
      success: false,
      message: 'Please provide a valid amount of besitos'
    });
    expect(await economy.commands.credit(adminUserId, 'not a user', '10', '')).toEqual({
      success: false,
      message: 'Invalid user identifier: not a user'
    });
  });

  test('should debit besitos without overdrawing', async () => {
    await economy.commands.credit(adminUserId, regularUserId, '50', '');

    expect(await economy.commands.debit(adminUserId, regularUserId, '80', 'correction')).toEqual({
      success: false,
      message: 'Not enough besitos: 80 needed, 50 available'
    });
    expect(await economy.commands.debit(adminUserId, regularUserId, '20', 'correction')).toEqual({
      success: true,
      message: 'Debited 20 besitos from <@USER456>. New balance: 30'
    });
    expect(await economy.commands.debit(adminUserId, 'NEWUSER', '5', '')).toEqual({
      success: false,
      message: 'NEWUSER has no besitos yet'
    });
  });

  test('should validate the level formula before saving it', async () => {
    expect(await economy.commands.setLevelFormula(adminUserId, 'total_earned -')).toEqual({
      success: false,
      message: 'Invalid formula: Unexpected end of formula'
    });

    const result = await economy.commands.setLevelFormula(adminUserId, ' floor(total_earned / 50) + 1 ');

    expect(result).toEqual({ success: true, message: 'Level formula set to `floor(total_earned / 50) + 1`' });
    expect(economy.data.getConfig().levelFormula).toBe('floor(total_earned / 50) + 1');
  });

  test('should change economy values within their bounds', async () => {
    expect(await economy.commands.setEconomyValue(adminUserId, 'dailyGiftBase', '25')).toEqual({
      success: true,
      message: 'dailyGiftBase set to 25'
    });
    expect(await economy.commands.setEconomyValue(adminUserId, 'dailyGiftBase', '-3')).toEqual({
      success: false,
      message: 'Please provide a valid number for dailyGiftBase'
    });
    expect(await economy.commands.setEconomyValue(adminUserId, 'streakBonusMax', '0')).toMatchObject({ success: true });
    expect(await economy.commands.setEconomyValue(adminUserId, 'levelFormula', '1')).toEqual({
      success: false,
      message:
        'Unknown setting. Available settings: dailyGiftBase, streakBonusPerDay, streakBonusMax, ' +
        'besitosPerReaction, maxReactionsPerDay, reactionCooldownSeconds'
    });

    expect(economy.streaks.calculatePayout(3)).toEqual({ base: 25, bonus: 0, total: 25 });
  });

  test('should set the reward caps used by claims', async () => {
    expect(await economy.commands.setRewardCaps(adminUserId, '200', '7')).toEqual({
      success: true,
      message: 'Reward caps set to 200 besitos and 7 VIP days'
    });
    expect(await economy.commands.setRewardCaps(adminUserId, '200', 'x')).toMatchObject({ success: false });

    const config = economy.data.getConfig();
    expect(config.maxRewardBesitos).toBe(200);
    expect(config.maxRewardMembershipDays).toBe(7);
  });

  test('should manage shop items', async () => {
    expect(await economy.commands.addShopItem(adminUserId, 'Stickers', '30', 'content-stickers', 'Sticker Pack')).toEqual({
      success: true,
      message: 'Added item "Sticker Pack" with cost 30 besitos'
    });
    expect(economy.shop.getItem('stickers')).toEqual({
      id: 'stickers',
      name: 'Sticker Pack',
      cost: 30,
      contentId: 'content-stickers'
    });

    expect(await economy.commands.removeShopItem(adminUserId, 'stickers')).toEqual({
      success: true,
      message: 'Removed item "stickers"'
    });
    expect(await economy.commands.removeShopItem(adminUserId, 'stickers')).toEqual({
      success: false,
      message: 'There is no item called stickers'
    });
    expect(await economy.commands.addShopItem(regularUserId, 'x', '1', 'c', 'X')).toEqual({
      success: false,
      message: 'Only admins can add shop items'
    });
  });

  test('should enable and disable rewards', async () => {
    await economy.data.upsertReward(buildReward({ id: 'r1', name: 'Reward One' }), [
      buildCondition('r1', 'TOTAL_POINTS', 10)
    ]);

    expect(await economy.commands.setRewardActive(adminUserId, 'r1', false)).toEqual({
      success: true,
      message: 'Reward One is now inactive'
    });
    expect(economy.data.getReward('r1')?.active).toBe(false);
    expect(economy.data.getRewardConditions('r1')).toHaveLength(1);
    expect(await economy.commands.setRewardActive(adminUserId, 'r2', true)).toEqual({
      success: false,
      message: 'Reward r2 does not exist'
    });
  });

  test('should reset streaks', async () => {
    await economy.streaks.claimDailyGift(regularUserId);

    expect(await economy.commands.resetStreak(adminUserId, `<@${regularUserId}>`)).toEqual({
      success: true,
      message: 'DAILY_GIFT streak for <@USER456> has been reset'
    });
    expect(await economy.commands.resetStreak(adminUserId, regularUserId)).toEqual({
      success: false,
      message: '<@USER456> has no active DAILY_GIFT streak'
    });
    expect(await economy.commands.resetStreak(adminUserId, regularUserId, 'weekly')).toEqual({
      success: false,
      message: 'Unknown streak kind. Available kinds: DAILY_GIFT, REACTION'
    });
  });
});
