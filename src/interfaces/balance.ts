import { User } from './user';

export type BalanceOperation = 'increase' | 'decrease';

export interface BalanceUpdate {
    user: User;
    /** Requested delta, before any clamping. */
    delta: number;
    message: string;
}
