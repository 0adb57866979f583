import { BalanceUpdate } from '../interfaces/balance';
import { describeError, fail, Outcome, succeed } from '../interfaces/outcome';
import { logger } from '../logger';
import { UserStore } from './userStore';

export const USER_NOT_FOUND = 'User not found';

/** Balances never go below zero: a delta that would overdraw lands on exactly 0. */
export function clampBalance(current: number, delta: number): number {
  const next = current + delta;
  return next < 0 ? 0 : next;
}

export function formatBalanceMessage(username: string, delta: number, balance: number): string {
  return `User ${username} balance updated successfully by ${delta} to ${balance.toFixed(2)}`;
}

export class BalanceLedger {
  constructor(private readonly users: UserStore) {}

  /**
   * Add `delta` to the user's balance in one transaction.
   * The confirmation reports the requested delta even when the result was clamped.
   */
  async apply(userId: number, delta: number): Promise<Outcome<BalanceUpdate>> {
    try {
      const user = this.users.transaction(() => {
        const current = this.users.findById(userId);
        if (!current) return null;

        const balance = clampBalance(current.balance, delta);
        this.users.setBalance(userId, balance);

        return { ...current, balance };
      });

      if (!user) {
        logger.warn({ userId }, 'Balance update for unknown user');
        return fail('not_found', USER_NOT_FOUND);
      }

      logger.info({ userId, delta, balance: user.balance }, 'User balance updated');

      return succeed({
        user,
        delta,
        message: formatBalanceMessage(user.username, delta, user.balance),
      });
    } catch (err) {
      logger.error({ err, userId, delta }, 'Balance update rolled back');
      return fail('persistence', `Error updating balance: ${describeError(err)}`);
    }
  }
}
