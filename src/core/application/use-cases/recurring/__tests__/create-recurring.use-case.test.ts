import { CreateRecurringUseCase } from '../create-recurring.use-case';
import { ListRecurringUseCase } from '../list-recurring.use-case';
import { InMemoryDocumentStore } from '../../../../../../test/helpers/in-memory-document-store';
import { FIXED_NOW, fixedClock } from '../../../../../../test/helpers/test-utils';

describe('Recurring schedules', () => {
    let store: InMemoryDocumentStore;

    beforeEach(() => {
        store = new InMemoryDocumentStore();
    });

    describe('CreateRecurringUseCase', () => {
        it('should store amount and type as given, without normalizing the sign', async () => {
            const useCase = new CreateRecurringUseCase(store, fixedClock);

            const result = await useCase.execute({
                clientId: 'c1',
                label: 'Savings transfer',
                amount: -200,
                category: 'Savings',
                type: 'income',
                frequency: 'weekly'
            });

            const [stored] = store.all('recurring');
            expect(String(stored._id)).toBe(result.id);
            expect(stored).toMatchObject({
                client_id: 'c1',
                label: 'Savings transfer',
                amount: -200,
                category: 'Savings',
                frequency: 'weekly',
                type: 'income',
                next_due_date: FIXED_NOW
            });
        });

        it('should default frequency, type and next due date', async () => {
            const useCase = new CreateRecurringUseCase(store, fixedClock);

            await useCase.execute({ clientId: 'c1', label: 'Rent', amount: 900, category: 'Housing' });

            expect(store.all('recurring')[0]).toMatchObject({
                frequency: 'monthly',
                type: 'income',
                next_due_date: FIXED_NOW
            });
        });
    });

    describe('ListRecurringUseCase', () => {
        it('should list every schedule of the client with text timestamps', async () => {
            const create = new CreateRecurringUseCase(store, fixedClock);
            await create.execute({ clientId: 'c1', label: 'Rent', amount: -900, category: 'Housing', type: 'expense' });
            await create.execute({
                clientId: 'c1',
                label: 'Gym',
                amount: -30,
                category: 'Health',
                type: 'expense',
                nextDueDate: new Date('2024-07-01T00:00:00.000Z')
            });
            await create.execute({ clientId: 'c2', label: 'Salary', amount: 2000, category: 'Salary' });

            const { items } = await new ListRecurringUseCase(store).execute({ clientId: 'c1' });

            expect(items.map(item => [item.label, item.next_due_date])).toEqual([
                ['Rent', '2024-06-15T12:00:00.000Z'],
                ['Gym', '2024-07-01T00:00:00.000Z']
            ]);
            expect(typeof items[0]._id).toBe('string');
        });
    });
});
