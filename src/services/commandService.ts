import { CommandResult, STREAK_KINDS, StreakKind } from '../types';
import { DataService } from './dataService';
import { LedgerService } from './ledgerService';
import { validateLevelFormula } from './levelFormula';
import { economyConfigSchema } from './stateSchema';
import { StreakService } from './streakService';

export const ECONOMY_SETTINGS = [
  'dailyGiftBase',
  'streakBonusPerDay',
  'streakBonusMax',
  'besitosPerReaction',
  'maxReactionsPerDay',
  'reactionCooldownSeconds'
] as const;
export type EconomySetting = (typeof ECONOMY_SETTINGS)[number];

const isEconomySetting = (key: string): key is EconomySetting => ECONOMY_SETTINGS.some(setting => setting === key);
const isStreakKind = (kind: string): kind is StreakKind => STREAK_KINDS.some(k => k === kind);

/**
 * Accepts `<@U123>`, `<@U123|name>` or a bare `U123`
 */
export const parseUserId = (target: string): string | null => {
  const match = target.trim().match(/^<@([A-Z0-9]+)(?:\|[^>]*)?>$|^([A-Z0-9]+)$/);
  if (!match) return null;
  return match[1] ?? match[2] ?? null;
};

const parsePositiveInt = (value: string): number | null => {
  if (!/^\d+$/.test(value.trim())) return null;
  const parsed = parseInt(value, 10);
  return parsed > 0 ? parsed : null;
};

/**
 * Admin operations behind `/besitos admin ...` and the settings tab
 */
export class CommandService {
  private dataService: DataService;
  private ledgerService: LedgerService;
  private streakService: StreakService;
  private adminUsers: string[];

  constructor(dataService: DataService, ledgerService: LedgerService, streakService: StreakService, adminUsers: string[] = []) {
    this.dataService = dataService;
    this.ledgerService = ledgerService;
    this.streakService = streakService;
    this.adminUsers = adminUsers;
  }

  isAdmin(userId: string): boolean {
    return this.adminUsers.includes(userId);
  }

  async credit(adminId: string, target: string, amountStr: string, reason: string): Promise<CommandResult> {
    if (!this.isAdmin(adminId)) {
      return { success: false, message: 'Only admins can credit besitos' };
    }

    const userId = parseUserId(target);
    if (!userId) {
      return { success: false, message: `Invalid user identifier: ${target}` };
    }

    const amount = parsePositiveInt(amountStr);
    if (amount === null) {
      return { success: false, message: 'Please provide a valid amount of besitos' };
    }

    const result = await this.ledgerService.adminCredit(userId, amount, reason.trim() || 'admin_credit', adminId);
    if (!result.success) {
      return { success: false, message: result.message };
    }

    return {
      success: true,
      message: `Credited ${amount} besitos to <@${userId}>. New balance: ${result.data.account.balance}`
    };
  }

  async debit(adminId: string, target: string, amountStr: string, reason: string): Promise<CommandResult> {
    if (!this.isAdmin(adminId)) {
      return { success: false, message: 'Only admins can debit besitos' };
    }

    const userId = parseUserId(target);
    if (!userId) {
      return { success: false, message: `Invalid user identifier: ${target}` };
    }

    const amount = parsePositiveInt(amountStr);
    if (amount === null) {
      return { success: false, message: 'Please provide a valid amount of besitos' };
    }

    const result = await this.ledgerService.adminDebit(userId, amount, reason.trim() || 'admin_debit', adminId);
    if (!result.success) {
      return { success: false, message: result.message };
    }

    return {
      success: true,
      message: `Debited ${amount} besitos from <@${userId}>. New balance: ${result.data.account.balance}`
    };
  }

  async setLevelFormula(adminId: string, formula: string): Promise<CommandResult> {
    if (!this.isAdmin(adminId)) {
      return { success: false, message: 'Only admins can change the level formula' };
    }

    const trimmed = formula.trim();
    const validation = validateLevelFormula(trimmed);
    if (!validation.valid) {
      return { success: false, message: `Invalid formula: ${validation.error}` };
    }

    await this.dataService.updateConfig({ levelFormula: trimmed });
    return { success: true, message: `Level formula set to \`${trimmed}\`` };
  }

  async setRewardCaps(adminId: string, besitosStr: string, daysStr: string): Promise<CommandResult> {
    if (!this.isAdmin(adminId)) {
      return { success: false, message: 'Only admins can change reward caps' };
    }

    const maxRewardBesitos = parsePositiveInt(besitosStr);
    const maxRewardMembershipDays = parsePositiveInt(daysStr);
    if (maxRewardBesitos === null || maxRewardMembershipDays === null) {
      return { success: false, message: 'Please provide positive whole numbers for both caps' };
    }

    await this.dataService.updateConfig({ maxRewardBesitos, maxRewardMembershipDays });
    return {
      success: true,
      message: `Reward caps set to ${maxRewardBesitos} besitos and ${maxRewardMembershipDays} VIP days`
    };
  }

  async setEconomyValue(adminId: string, key: string, valueStr: string): Promise<CommandResult> {
    if (!this.isAdmin(adminId)) {
      return { success: false, message: 'Only admins can change economy settings' };
    }

    if (!isEconomySetting(key)) {
      return { success: false, message: `Unknown setting. Available settings: ${ECONOMY_SETTINGS.join(', ')}` };
    }

    const parsed = economyConfigSchema.shape[key].safeParse(Number(valueStr.trim()));
    if (valueStr.trim() === '' || !parsed.success) {
      return { success: false, message: `Please provide a valid number for ${key}` };
    }

    const update: Partial<Record<EconomySetting, number>> = {};
    update[key] = parsed.data;
    await this.dataService.updateConfig(update);
    return { success: true, message: `${key} set to ${parsed.data}` };
  }

  async addShopItem(adminId: string, id: string, costStr: string, contentId: string, name: string): Promise<CommandResult> {
    if (!this.isAdmin(adminId)) {
      return { success: false, message: 'Only admins can add shop items' };
    }

    if (!id.trim() || !contentId.trim() || !name.trim()) {
      return { success: false, message: 'Please provide an id, a content id and a name for the item' };
    }

    const cost = parsePositiveInt(costStr);
    if (cost === null) {
      return { success: false, message: 'Please provide a valid cost for the item' };
    }

    const itemId = id.trim().toLowerCase();
    const shopItems = this.dataService.getConfig().shopItems.filter(item => item.id !== itemId);
    shopItems.push({ id: itemId, name: name.trim(), cost, contentId: contentId.trim() });
    await this.dataService.updateConfig({ shopItems });

    return { success: true, message: `Added item "${name.trim()}" with cost ${cost} besitos` };
  }

  async removeShopItem(adminId: string, id: string): Promise<CommandResult> {
    if (!this.isAdmin(adminId)) {
      return { success: false, message: 'Only admins can remove shop items' };
    }

    const itemId = id.trim().toLowerCase();
    const { shopItems } = this.dataService.getConfig();
    if (!shopItems.some(item => item.id === itemId)) {
      return { success: false, message: `There is no item called ${itemId}` };
    }

    await this.dataService.updateConfig({ shopItems: shopItems.filter(item => item.id !== itemId) });
    return { success: true, message: `Removed item "${itemId}"` };
  }

  async setRewardActive(adminId: string, rewardId: string, active: boolean): Promise<CommandResult> {
    if (!this.isAdmin(adminId)) {
      return { success: false, message: 'Only admins can manage rewards' };
    }

    const reward = this.dataService.getReward(rewardId.trim());
    if (!reward) {
      return { success: false, message: `Reward ${rewardId} does not exist` };
    }

    await this.dataService.upsertReward({ ...reward, active }, this.dataService.getRewardConditions(reward.id));
    return { success: true, message: `${reward.name} is now ${active ? 'active' : 'inactive'}` };
  }

  async resetStreak(adminId: string, target: string, kindStr = 'DAILY_GIFT'): Promise<CommandResult> {
    if (!this.isAdmin(adminId)) {
      return { success: false, message: 'Only admins can reset streaks' };
    }

    const userId = parseUserId(target);
    if (!userId) {
      return { success: false, message: `Invalid user identifier: ${target}` };
    }

    const kind = kindStr.trim().toUpperCase();
    if (!isStreakKind(kind)) {
      return { success: false, message: `Unknown streak kind. Available kinds: ${STREAK_KINDS.join(', ')}` };
    }

    const reset = await this.streakService.resetStreak(userId, kind);
    return reset
      ? { success: true, message: `${kind} streak for <@${userId}> has been reset` }
      : { success: false, message: `<@${userId}> has no active ${kind} streak` };
  }
}

export const createCommandService = (
  dataService: DataService,
  ledgerService: LedgerService,
  streakService: StreakService,
  adminUsers: string[] = []
): CommandService => {
  return new CommandService(dataService, ledgerService, streakService, adminUsers);
};
