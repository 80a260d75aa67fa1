import { createLogger, Logger } from '../logger';
import { Clock, Membership, UserRole } from '../types';
import { DataService } from './dataService';
import { addDaysToDate } from './dates';

export interface MembershipServiceOptions {
  logger?: Logger;
  now?: Clock;
  adminUsers?: string[];
}

/**
 * VIP membership expiry per user
 */
export class MembershipService {
  private dataService: DataService;
  private logger: Logger;
  private now: Clock;
  private adminUsers: string[];

  constructor(dataService: DataService, options: MembershipServiceOptions = {}) {
    this.dataService = dataService;
    this.logger = options.logger ?? createLogger('membership');
    this.now = options.now ?? (() => new Date());
    this.adminUsers = options.adminUsers ?? [];
  }

  /**
   * Add days to a membership: new memberships start now, unexpired ones are
   * extended from their current expiry and expired ones restart from now
   */
  async extend(userId: string, days: number): Promise<Membership> {
    const now = this.now();
    const membership = await this.dataService.updateMembership(userId, current => {
      if (current && new Date(current.expiresAt) > now) {
        return { ...current, expiresAt: addDaysToDate(new Date(current.expiresAt), days).toISOString() };
      }
      return { userId, startedAt: now.toISOString(), expiresAt: addDaysToDate(now, days).toISOString() };
    });
    this.logger.info(`VIP for ${userId} extended by ${days} days until ${membership.expiresAt}`);
    return membership;
  }

  /**
   * Membership row, if the user ever had one
   */
  get(userId: string): Membership | undefined {
    return this.dataService.getMembership(userId);
  }

  /**
   * Whether VIP is active right now
   */
  isActive(userId: string): boolean {
    const membership = this.dataService.getMembership(userId);
    return membership !== undefined && new Date(membership.expiresAt) > this.now();
  }

  isAdmin(userId: string): boolean {
    return this.adminUsers.includes(userId);
  }

  /**
   * VIP while active, ADMIN for configured admins, FREE otherwise
   */
  roleOf(userId: string): UserRole {
    if (this.isAdmin(userId)) return 'ADMIN';
    return this.isActive(userId) ? 'VIP' : 'FREE';
  }
}

export const createMembershipService = (
  dataService: DataService,
  options: MembershipServiceOptions = {}
): MembershipService => {
  return new MembershipService(dataService, options);
};
