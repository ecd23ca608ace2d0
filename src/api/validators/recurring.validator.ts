// src/api/validators/recurring.validator.ts
import { z } from 'zod';
import {
    DEFAULT_FREQUENCY,
    DEFAULT_RECURRING_TYPE,
    RECURRING_FREQUENCIES
} from '../../core/domain/entities/recurring.entity';
import { clientIdField, finiteAmountField, optionalDateTimeField } from '../../shared/utils/validation.util';
import { transactionTypeField } from './transaction.validator';

export const createRecurringSchema = z.object({
    client_id: clientIdField,
    label: z.string({ required_error: 'label is required' }),
    amount: finiteAmountField,
    category: z.string({ required_error: 'category is required' }),
    frequency: z.enum(RECURRING_FREQUENCIES, {
        errorMap: () => ({ message: 'frequency must be daily, weekly or monthly' })
    }).default(DEFAULT_FREQUENCY),
    type: transactionTypeField.default(DEFAULT_RECURRING_TYPE),
    next_due_date: optionalDateTimeField
});

export type CreateRecurringInput = z.infer<typeof createRecurringSchema>;
