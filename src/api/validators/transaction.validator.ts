// src/api/validators/transaction.validator.ts
import { z } from 'zod';
import { TRANSACTION_TYPES } from '../../core/domain/entities/transaction.entity';
import { DEFAULT_LIST_LIMIT } from '../../core/application/use-cases/transaction/list-transactions.use-case';
import { clientIdField, finiteAmountField, optionalDateTimeField } from '../../shared/utils/validation.util';

export const transactionTypeField = z.enum(TRANSACTION_TYPES, {
    errorMap: () => ({ message: 'type must be income or expense' })
});

/**
 * TransactionIn. `type` only chooses the sign of the stored amount.
 */
export const createTransactionSchema = z.object({
    client_id: clientIdField,
    amount: finiteAmountField,
    category: z.string({ required_error: 'category is required' }),
    note: z.string().nullish(),
    type: transactionTypeField,
    date: optionalDateTimeField
});

export const listTransactionsQuerySchema = z.object({
    client_id: clientIdField,
    category: z.string().optional(),
    limit: z.coerce.number()
        .int('limit must be an integer')
        .positive('limit must be positive')
        .default(DEFAULT_LIST_LIMIT)
});

export const clientQuerySchema = z.object({
    client_id: clientIdField
});

export type CreateTransactionInput = z.infer<typeof createTransactionSchema>;
export type ListTransactionsQuery = z.infer<typeof listTransactionsQuerySchema>;
export type ClientQuery = z.infer<typeof clientQuerySchema>;
