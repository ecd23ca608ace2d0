import {
    buildRecurring,
    isDue,
    resolveDueDate
} from '../../../../src/core/domain/entities/recurring.entity';

describe('Recurring entity', () => {
    const now = new Date('2024-06-15T12:00:00.000Z');

    describe('buildRecurring', () => {
        it('should apply the monthly/income defaults and due now', () => {
            const record = buildRecurring({ clientId: 'c1', label: 'Rent', amount: -900, category: 'Housing' }, now);

            expect(record).toEqual({
                client_id: 'c1',
                label: 'Rent',
                amount: -900,
                category: 'Housing',
                frequency: 'monthly',
                type: 'income',
                next_due_date: now
            });
        });

        it('should keep amount and type independent of each other', () => {
            const record = buildRecurring({
                clientId: 'c1',
                label: 'Savings transfer',
                amount: -200,
                category: 'Savings',
                frequency: 'weekly',
                type: 'income'
            }, now);

            expect(record.amount).toBe(-200);
            expect(record.type).toBe('income');
            expect(record.frequency).toBe('weekly');
        });
    });

    describe('resolveDueDate', () => {
        it('should return a stored Date as is', () => {
            const due = new Date('2024-06-01T00:00:00.000Z');
            expect(resolveDueDate(due, now)).toBe(due);
        });

        it('should parse a textual ISO date', () => {
            expect(resolveDueDate('2024-06-20T00:00:00.000Z', now)).toEqual(new Date('2024-06-20T00:00:00.000Z'));
        });

        it('should fall back to now for unparsable, missing or invalid values', () => {
            expect(resolveDueDate('next tuesday', now)).toBe(now);
            expect(resolveDueDate(undefined, now)).toBe(now);
            expect(resolveDueDate(null, now)).toBe(now);
            expect(resolveDueDate(new Date('invalid'), now)).toBe(now);
        });
    });

    describe('isDue', () => {
        it('should treat past and current due dates as due', () => {
            expect(isDue(new Date('2024-06-14T12:00:00.000Z'), now)).toBe(true);
            expect(isDue(new Date(now.getTime()), now)).toBe(true);
        });

        it('should not treat future due dates as due', () => {
            expect(isDue(new Date('2024-06-15T12:00:00.001Z'), now)).toBe(false);
        });

        it('should always treat an unparsable due date as due', () => {
            expect(isDue('soon', now)).toBe(true);
        });
    });
});
