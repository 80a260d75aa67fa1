import { createLogger, Logger } from '../logger';
import { Clock, EconomyEvent, fail, ok, PurchaseRecord, Result, ShopItem } from '../types';
import { DataService } from './dataService';
import { LedgerService } from './ledgerService';

/** Ledger reason of every automatic refund; grep the ledger for it when reconciling */
export const AUTO_REFUND_REASON = 'AUTO_REFUND_DELIVERY_FAILED';
export const SYSTEM_ADMIN_ID = 'system';

export type Deliver = (item: ShopItem, purchase: PurchaseRecord) => Promise<void>;

export interface PurchaseOutcome {
  item: ShopItem;
  purchase: PurchaseRecord;
  balance: number;
  events: EconomyEvent[];
}

export type PurchaseResult = Result<
  PurchaseOutcome,
  'ITEM_NOT_FOUND' | 'DUPLICATE_ATTEMPT' | 'INVALID_AMOUNT' | 'NO_ACCOUNT' | 'INSUFFICIENT_FUNDS' | 'DELIVERY_FAILED'
>;

export interface ShopServiceOptions {
  logger?: Logger;
  now?: Clock;
}

export class ShopService {
  private dataService: DataService;
  private ledgerService: LedgerService;
  private logger: Logger;
  private now: Clock;

  constructor(dataService: DataService, ledgerService: LedgerService, options: ShopServiceOptions = {}) {
    this.dataService = dataService;
    this.ledgerService = ledgerService;
    this.logger = options.logger ?? createLogger('shop');
    this.now = options.now ?? (() => new Date());
  }

  getItems(): ShopItem[] {
    return this.dataService.getConfig().shopItems;
  }

  getItem(itemId: string): ShopItem | undefined {
    return this.getItems().find(item => item.id === itemId);
  }

  private async setStatus(
    attemptId: string,
    from: PurchaseRecord['status'],
    to: PurchaseRecord['status']
  ): Promise<PurchaseRecord | null> {
    return this.dataService.updatePurchaseWhere(
      attemptId,
      purchase => purchase.status === from,
      purchase => ({ ...purchase, status: to, updatedAt: this.now().toISOString() })
    );
  }

  /**
   * Charge for an item and hand it over through `deliver`. Each attempt id is
   * processed at most once; a failed delivery is refunded.
   */
  async purchase(userId: string, itemId: string, attemptId: string, deliver: Deliver): Promise<PurchaseResult> {
    const item = this.getItem(itemId);
    if (!item) {
      return fail('ITEM_NOT_FOUND', `There is no item called ${itemId}`);
    }

    const now = this.now().toISOString();
    const pending = await this.dataService.insertPurchase({
      attemptId,
      userId,
      itemId,
      price: item.cost,
      status: 'pending',
      createdAt: now,
      updatedAt: now
    });
    if (!pending) {
      return fail('DUPLICATE_ATTEMPT', 'This purchase is already being processed');
    }

    const payment = await this.ledgerService
      .spend(userId, item.cost, 'SPEND_SHOP', `shop:${item.id}`, {
        item_id: item.id,
        attempt_id: attemptId
      })
      .catch(async (error: unknown): Promise<never> => {
        // the store rolled the debit back; close the attempt so it is not left pending
        await this.setStatus(attemptId, 'pending', 'payment_failed');
        throw error;
      });
    if (!payment.success) {
      await this.setStatus(attemptId, 'pending', 'payment_failed');
      return payment;
    }

    const paid = (await this.setStatus(attemptId, 'pending', 'paid')) ?? pending;

    try {
      await deliver(item, paid);
      await this.dataService.grantContentAccess({
        userId,
        contentId: item.contentId,
        source: 'shop_purchase',
        metadata: { item_id: item.id, attempt_id: attemptId },
        createdAt: this.now().toISOString()
      });
    } catch (error) {
      this.logger.error(`Delivery of ${item.id} to ${userId} failed:`, error);
      const refunded = await this.refundSafely(attemptId);
      return fail('DELIVERY_FAILED', `${item.name} could not be delivered`, { refunded });
    }

    const delivered = (await this.setStatus(attemptId, 'paid', 'delivered')) ?? paid;

    this.logger.info(`${userId} bought ${item.id} for ${item.cost}`);
    const events: EconomyEvent[] = ['purchase_completed'];
    return ok({ item, purchase: delivered, balance: payment.data.account.balance, events });
  }

  private async refundSafely(attemptId: string): Promise<boolean> {
    try {
      return await this.refundPurchase(attemptId);
    } catch (error) {
      this.logger.error(`Refund of purchase ${attemptId} failed:`, error);
      return false;
    }
  }

  /**
   * Credit back a paid purchase. Only the first call for an attempt pays;
   * later calls return false.
   */
  async refundPurchase(attemptId: string): Promise<boolean> {
    const purchase = await this.setStatus(attemptId, 'paid', 'refunded');
    if (!purchase) return false;

    try {
      const credit = await this.ledgerService.adminCredit(
        purchase.userId,
        purchase.price,
        AUTO_REFUND_REASON,
        SYSTEM_ADMIN_ID
      );
      if (!credit.success) {
        throw new Error(credit.message);
      }
    } catch (error) {
      // put the row back so the refund can be retried
      await this.setStatus(attemptId, 'refunded', 'paid');
      throw error;
    }

    this.logger.info(`Refunded ${purchase.price} to ${purchase.userId} for purchase ${attemptId}`);
    return true;
  }
}

export const createShopService = (
  dataService: DataService,
  ledgerService: LedgerService,
  options: ShopServiceOptions = {}
): ShopService => {
  return new ShopService(dataService, ledgerService, options);
};
