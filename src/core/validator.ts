import { ZodIssue, ZodTypeAny, z } from 'zod';
import { FieldViolation, ValidationException } from '../shared/exceptions/validation.exception';

export type InputSource = 'body' | 'query' | 'params';

export function toFieldViolations(issues: readonly ZodIssue[], source: InputSource): FieldViolation[] {
    return issues.map(issue => ({
        field: issue.path.length > 0 ? issue.path.join('.') : source,
        message: issue.message
    }));
}

/**
 * Parses `input` against `schema`. On failure every violated field is
 * reported, not just the first.
 */
export function validateInput<S extends ZodTypeAny>(schema: S, input: unknown, source: InputSource): z.output<S> {
    const result = schema.safeParse(input);

    if (!result.success) {
        throw new ValidationException('Request validation failed', toFieldViolations(result.error.issues, source));
    }

    return result.data;
}
