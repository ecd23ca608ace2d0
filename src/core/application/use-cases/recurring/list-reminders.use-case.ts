import { isDue } from '../../../domain/entities/recurring.entity';
import { DocumentFields, DocumentStore } from '../../../../infrastructure/database/document-store';
import { logger } from '../../../../infrastructure/monitoring/logger.service';
import { Clock, systemClock } from '../../../../shared/types/common.types';

export interface DueReminder {
    label: string | null;
    category: string | null;
    amount: number | null;
}

export interface ListRemindersUseCaseRequest {
    clientId: string;
}

export interface ListRemindersUseCaseResponse {
    due: DueReminder[];
}

function toReminder(document: DocumentFields): DueReminder {
    return {
        label: typeof document.label === 'string' ? document.label : null,
        category: typeof document.category === 'string' ? document.category : null,
        amount: typeof document.amount === 'number' ? document.amount : null
    };
}

/**
 * Read-only: nothing is posted and `next_due_date` is never advanced, so
 * an item stays due on every call until its record changes.
 */
export class ListRemindersUseCase {
    constructor(
        private readonly store: DocumentStore,
        private readonly clock: Clock = systemClock
    ) {}

    async execute(request: ListRemindersUseCaseRequest): Promise<ListRemindersUseCaseResponse> {
        const now = this.clock();
        const schedules = await this.store.find('recurring', { client_id: request.clientId });
        const due = schedules.filter(schedule => isDue(schedule.next_due_date, now)).map(toReminder);

        logger.debug('Reminders computed', {
            clientId: request.clientId,
            schedules: schedules.length,
            due: due.length
        });

        return { due };
    }
}
