// src/core/domain/services/ledger.service.ts
import { DocumentFields } from '../../../infrastructure/database/document-store';

export const UNCATEGORIZED = 'Uncategorized';

export type CategoryTotals = Record<string, number>;

export interface LedgerSummary {
    balance: number;
    categories: CategoryTotals;
}

// Documents without a numeric amount contribute nothing.
export function readAmount(document: DocumentFields): number {
    return typeof document.amount === 'number' ? document.amount : 0;
}

export function readCategory(document: DocumentFields): string {
    return typeof document.category === 'string' ? document.category : UNCATEGORIZED;
}

export function computeBalance(transactions: readonly DocumentFields[]): number {
    let balance = 0;
    for (const transaction of transactions) {
        balance += readAmount(transaction);
    }
    return balance;
}

/**
 * Sum of amounts per category, in first-seen order. Every category starts
 * at 0 before its first amount is added.
 */
export function computeCategoryTotals(transactions: readonly DocumentFields[]): CategoryTotals {
    const totals = new Map<string, number>();

    for (const transaction of transactions) {
        const category = readCategory(transaction);
        totals.set(category, (totals.get(category) ?? 0) + readAmount(transaction));
    }

    return Object.fromEntries(totals);
}

export function summarizeLedger(transactions: readonly DocumentFields[]): LedgerSummary {
    return {
        balance: computeBalance(transactions),
        categories: computeCategoryTotals(transactions)
    };
}
