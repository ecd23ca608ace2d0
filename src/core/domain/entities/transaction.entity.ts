// src/core/domain/entities/transaction.entity.ts
export const TRANSACTION_TYPES = ['income', 'expense'] as const;

export type TransactionType = typeof TRANSACTION_TYPES[number];

/**
 * Stored shape of a posted transaction. `amount` carries the sign;
 * `type` is always derived from it.
 */
export type TransactionRecord = {
    client_id: string;
    amount: number;
    category: string;
    note: string | null;
    date: Date;
    type: TransactionType;
};

export interface NewTransaction {
    clientId: string;
    amount: number;
    category: string;
    note?: string | null;
    type: TransactionType;
    date?: Date | null;
}

/**
 * Income keeps the magnitude, expense negates it. The requested type only
 * picks the sign; the sign of `amount` itself is ignored.
 */
export function normalizeAmount(amount: number, type: TransactionType): number {
    const magnitude = Math.abs(amount);
    if (magnitude === 0) {
        return 0;
    }
    return type === 'expense' ? -magnitude : magnitude;
}

// Zero counts as income.
export function typeFromAmount(amount: number): TransactionType {
    return amount >= 0 ? 'income' : 'expense';
}

export function buildTransaction(input: NewTransaction, now: Date): TransactionRecord {
    const amount = normalizeAmount(input.amount, input.type);

    return {
        client_id: input.clientId,
        amount,
        category: input.category,
        note: input.note ?? null,
        date: input.date ?? now,
        type: typeFromAmount(amount)
    };
}
