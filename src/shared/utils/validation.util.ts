// src/shared/utils/validation.util.ts
import { z } from 'zod';

export const clientIdField = z.string({ required_error: 'client_id is required' })
    .min(1, 'client_id must not be empty');

const UTC_OFFSET = /(Z|[+-]\d{2}(:?\d{2})?)$/i;

/**
 * ISO-8601 date-time text, converted to a Date. Text without an offset is
 * read as UTC. `null` and a missing value both mean "not provided".
 */
export const optionalDateTimeField = z.string()
    .datetime({ offset: true, local: true, message: 'Must be an ISO-8601 date-time' })
    .transform(value => new Date(UTC_OFFSET.test(value) ? value : `${value}Z`))
    .nullish();

export const finiteAmountField = z.number({
    required_error: 'amount is required',
    invalid_type_error: 'amount must be a number'
}).finite('amount must be finite');
