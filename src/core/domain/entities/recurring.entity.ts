// src/core/domain/entities/recurring.entity.ts
import { TransactionType } from './transaction.entity';

export const RECURRING_FREQUENCIES = ['daily', 'weekly', 'monthly'] as const;

export type RecurringFrequency = typeof RECURRING_FREQUENCIES[number];

export const DEFAULT_FREQUENCY: RecurringFrequency = 'monthly';
export const DEFAULT_RECURRING_TYPE: TransactionType = 'income';

/**
 * A planned payment or contribution. Unlike a transaction, `type` and the
 * sign of `amount` are independent: a savings transfer can be planned as
 * income with a negative amount.
 */
export type RecurringRecord = {
    client_id: string;
    label: string;
    amount: number;
    category: string;
    frequency: RecurringFrequency;
    type: TransactionType;
    next_due_date: Date;
};

export interface NewRecurring {
    clientId: string;
    label: string;
    amount: number;
    category: string;
    frequency?: RecurringFrequency;
    type?: TransactionType;
    nextDueDate?: Date | null;
}

export function buildRecurring(input: NewRecurring, now: Date): RecurringRecord {
    return {
        client_id: input.clientId,
        label: input.label,
        amount: input.amount,
        category: input.category,
        frequency: input.frequency ?? DEFAULT_FREQUENCY,
        type: input.type ?? DEFAULT_RECURRING_TYPE,
        next_due_date: input.nextDueDate ?? now
    };
}

/**
 * Reads a stored `next_due_date`. Older documents may hold it as text.
 * Anything that does not yield a valid instant falls back to `now`, so the
 * item is reported as due instead of being dropped.
 */
export function resolveDueDate(value: unknown, now: Date): Date {
    if (value instanceof Date && !Number.isNaN(value.getTime())) {
        return value;
    }

    if (typeof value === 'string') {
        const parsed = new Date(value);
        if (!Number.isNaN(parsed.getTime())) {
            return parsed;
        }
    }

    return now;
}

export function isDue(value: unknown, now: Date): boolean {
    return resolveDueDate(value, now).getTime() <= now.getTime();
}
