import { createLogger, Logger } from '../logger';
import { Clock, EconomyEvent, fail, ok, ReactionRecord, Result } from '../types';
import { DataService } from './dataService';
import { utcDay } from './dates';
import { LedgerService } from './ledgerService';
import { StreakService } from './streakService';

export interface ReactionInput {
  userId: string;
  contentId: string;
  channelId: string;
  emoji: string;
}

export interface ReactionOutcome {
  besitosEarned: number;
  balance: number;
  streakLength: number;
  reactionsToday: number;
  events: EconomyEvent[];
}

type RejectionCode = 'DUPLICATE_REACTION' | 'RATE_LIMITED' | 'DAILY_LIMIT_REACHED';

export type ReactionResult = Result<ReactionOutcome, RejectionCode>;

export interface ReactionServiceOptions {
  logger?: Logger;
  now?: Clock;
}

const MESSAGES: Record<RejectionCode, string> = {
  DUPLICATE_REACTION: 'You already reacted to this content',
  RATE_LIMITED: 'Slow down a little before reacting again',
  DAILY_LIMIT_REACHED: 'You reached the daily reaction limit'
};

/**
 * Pays besitos for reactions on content
 */
export class ReactionService {
  private dataService: DataService;
  private ledgerService: LedgerService;
  private streakService: StreakService;
  private logger: Logger;
  private now: Clock;

  constructor(
    dataService: DataService,
    ledgerService: LedgerService,
    streakService: StreakService,
    options: ReactionServiceOptions = {}
  ) {
    this.dataService = dataService;
    this.ledgerService = ledgerService;
    this.streakService = streakService;
    this.logger = options.logger ?? createLogger('reactions');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Why a new reaction would be refused given the user's history, or null
   */
  private rejectionFor(history: ReactionRecord[], contentId: string, now: Date): RejectionCode | null {
    const config = this.dataService.getConfig();

    if (history.some(r => r.contentId === contentId)) {
      return 'DUPLICATE_REACTION';
    }

    const cooldownMs = config.reactionCooldownSeconds * 1000;
    if (history.some(r => now.getTime() - new Date(r.createdAt).getTime() < cooldownMs)) {
      return 'RATE_LIMITED';
    }

    const today = utcDay(now);
    if (history.filter(r => utcDay(new Date(r.createdAt)) === today).length >= config.maxReactionsPerDay) {
      return 'DAILY_LIMIT_REACHED';
    }

    return null;
  }

  /**
   * Seconds left on the cooldown, 0 when the user can react
   */
  secondsUntilNextReaction(userId: string): number {
    const now = this.now();
    const cooldownMs = this.dataService.getConfig().reactionCooldownSeconds * 1000;
    const latest = Math.max(0, ...this.dataService.getReactions(userId).map(r => new Date(r.createdAt).getTime()));
    return Math.max(0, Math.ceil((latest + cooldownMs - now.getTime()) / 1000));
  }

  /**
   * Reactions counted toward today's limit
   */
  reactionsToday(userId: string): number {
    const today = utcDay(this.now());
    return this.dataService.getReactions(userId).filter(r => utcDay(new Date(r.createdAt)) === today).length;
  }

  /**
   * Record a reaction and pay for it when the user's reaction history allows it
   */
  async react(input: ReactionInput): Promise<ReactionResult> {
    const now = this.now();
    const record: ReactionRecord = { ...input, createdAt: now.toISOString() };

    const inserted = await this.dataService.insertReactionWhere(
      record,
      history => this.rejectionFor(history, input.contentId, now) === null
    );

    if (!inserted) {
      const history = this.dataService.getReactions(input.userId);
      const code = this.rejectionFor(history, input.contentId, now) ?? 'DUPLICATE_REACTION';
      this.logger.debug(`Reaction by ${input.userId} on ${input.contentId} refused: ${code}`);
      if (code === 'RATE_LIMITED') {
        return fail(code, MESSAGES[code], { secondsRemaining: this.secondsUntilNextReaction(input.userId) });
      }
      return fail(code, MESSAGES[code]);
    }

    const amount = this.dataService.getConfig().besitosPerReaction;
    const credit = await this.ledgerService
      .earn(input.userId, amount, 'EARN_REACTION', 'reaction', {
        content_id: input.contentId,
        channel_id: input.channelId,
        emoji: input.emoji
      })
      .catch(async (error: unknown): Promise<never> => {
        // give the reaction slot back so the user can react again
        await this.dataService.deleteReaction(inserted);
        throw error;
      });
    if (!credit.success) {
      throw new Error(`Reaction credit for ${input.userId} failed: ${credit.message}`);
    }

    const streak = await this.streakService.recordReaction(input.userId, now);
    const events: EconomyEvent[] = ['reaction_added', ...streak.events, ...credit.data.events];

    return ok({
      besitosEarned: amount,
      balance: credit.data.account.balance,
      streakLength: streak.currentLength,
      reactionsToday: this.reactionsToday(input.userId),
      events
    });
  }
}

export const createReactionService = (
  dataService: DataService,
  ledgerService: LedgerService,
  streakService: StreakService,
  options: ReactionServiceOptions = {}
): ReactionService => {
  return new ReactionService(dataService, ledgerService, streakService, options);
};
