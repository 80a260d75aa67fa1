import { createLogger, Logger } from '../logger';
import {
  Account,
  Clock,
  EarnCategory,
  EconomyEvent,
  fail,
  LedgerCategory,
  LedgerEntry,
  LedgerMetadata,
  ok,
  Result,
  SpendCategory
} from '../types';
import { DataService } from './dataService';
import { computeLevel } from './levelFormula';

export interface LedgerMovement {
  entry: LedgerEntry;
  account: Account;
  leveledUp: boolean;
  /** `level_up` when an earn raised the cached level */
  events: EconomyEvent[];
}

export interface LedgerPage {
  entries: LedgerEntry[];
  totalCount: number;
}

export type EarnResult = Result<LedgerMovement, 'INVALID_AMOUNT'>;
export type SpendResult = Result<LedgerMovement, 'INVALID_AMOUNT' | 'NO_ACCOUNT' | 'INSUFFICIENT_FUNDS'>;

export interface LedgerServiceOptions {
  logger?: Logger;
  now?: Clock;
}

const isValidAmount = (amount: number): boolean => Number.isInteger(amount) && amount > 0;

/**
 * Balances and the append-only movement log
 */
export class LedgerService {
  private dataService: DataService;
  private logger: Logger;
  private now: Clock;

  constructor(dataService: DataService, options: LedgerServiceOptions = {}) {
    this.dataService = dataService;
    this.logger = options.logger ?? createLogger('ledger');
    this.now = options.now ?? (() => new Date());
  }

  private levelFor = (totalEarned: number): number =>
    computeLevel(this.dataService.getConfig().levelFormula, totalEarned);

  /**
   * Credit a user, opening the account on first use
   */
  async earn(
    userId: string,
    amount: number,
    category: EarnCategory,
    reason: string,
    metadata: LedgerMetadata = {}
  ): Promise<EarnResult> {
    if (!isValidAmount(amount)) {
      return fail('INVALID_AMOUNT', 'Amount must be a positive whole number', { amount });
    }

    const applied = await this.dataService.applyMovement(
      { userId, amount, category, reason, metadata, createdAt: this.now().toISOString() },
      this.levelFor
    );
    // credits only fail on a negative balance, which a positive amount cannot produce
    if (!applied) {
      throw new Error(`Credit of ${amount} to ${userId} was rejected by the store`);
    }

    const leveledUp = applied.account.level > applied.previousLevel;
    this.logger.info(`+${amount} ${category} for ${userId} (balance ${applied.account.balance})`);
    if (leveledUp) {
      this.logger.info(`${userId} reached level ${applied.account.level}`);
    }

    const events: EconomyEvent[] = leveledUp ? ['level_up'] : [];
    return ok({ entry: applied.entry, account: applied.account, leveledUp, events });
  }

  /**
   * Debit a user. Fails without writing when the balance is short.
   */
  async spend(
    userId: string,
    amount: number,
    category: SpendCategory,
    reason: string,
    metadata: LedgerMetadata = {}
  ): Promise<SpendResult> {
    if (!isValidAmount(amount)) {
      return fail('INVALID_AMOUNT', 'Amount must be a positive whole number', { amount });
    }

    const applied = await this.dataService.applyMovement(
      {
        userId,
        amount: -amount,
        category,
        reason,
        metadata,
        createdAt: this.now().toISOString(),
        minBalance: amount,
        requireAccount: true
      },
      this.levelFor
    );

    if (!applied) {
      const account = this.dataService.getAccount(userId);
      if (!account) {
        return fail('NO_ACCOUNT', `${userId} has no besitos yet`);
      }
      this.logger.debug(`Spend of ${amount} rejected for ${userId}, balance ${account.balance}`);
      return fail('INSUFFICIENT_FUNDS', `Not enough besitos: ${amount} needed, ${account.balance} available`, {
        balance: account.balance,
        required: amount
      });
    }

    this.logger.info(`-${amount} ${category} for ${userId} (balance ${applied.account.balance})`);
    const movement: LedgerMovement = { entry: applied.entry, account: applied.account, leveledUp: false, events: [] };
    return ok(movement);
  }

  /**
   * Current balance, 0 for users without an account
   */
  balance(userId: string): number {
    return this.dataService.getAccount(userId)?.balance ?? 0;
  }

  /**
   * Full account row
   */
  account(userId: string): Account | undefined {
    return this.dataService.getAccount(userId);
  }

  /**
   * One page of movements, newest first. Pages start at 1.
   */
  history(userId: string, page = 1, pageSize = 10, category?: LedgerCategory): LedgerPage {
    const entries = this.dataService.getEntries(userId, category);
    const safePage = Math.max(1, Math.floor(page));
    const safeSize = Math.max(1, Math.floor(pageSize));
    const start = (safePage - 1) * safeSize;
    return { entries: entries.slice(start, start + safeSize), totalCount: entries.length };
  }

  /**
   * Whether the user has any movement in this category
   */
  hasEntry(userId: string, category: LedgerCategory): boolean {
    return this.dataService.hasEntry(userId, category);
  }

  /**
   * Manual credit, recorded with the admin who made it
   */
  async adminCredit(userId: string, amount: number, reason: string, adminId: string): Promise<EarnResult> {
    return this.earn(userId, amount, 'EARN_ADMIN', reason, { admin_id: adminId, action: 'credit' });
  }

  /**
   * Manual debit, recorded with the admin who made it
   */
  async adminDebit(userId: string, amount: number, reason: string, adminId: string): Promise<SpendResult> {
    return this.spend(userId, amount, 'SPEND_ADMIN', reason, { admin_id: adminId, action: 'debit' });
  }

  /**
   * Level for the user's total earned under the configured formula
   */
  level(userId: string): number {
    return this.levelFor(this.dataService.getAccount(userId)?.totalEarned ?? 0);
  }
}

export const createLedgerService = (dataService: DataService, options: LedgerServiceOptions = {}): LedgerService => {
  return new LedgerService(dataService, options);
};
