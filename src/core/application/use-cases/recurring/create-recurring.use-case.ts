import { buildRecurring, NewRecurring } from '../../../domain/entities/recurring.entity';
import { DocumentStore } from '../../../../infrastructure/database/document-store';
import { logger } from '../../../../infrastructure/monitoring/logger.service';
import { Clock, systemClock } from '../../../../shared/types/common.types';

export type CreateRecurringUseCaseRequest = NewRecurring;

export interface CreateRecurringUseCaseResponse {
    id: string;
}

export class CreateRecurringUseCase {
    constructor(
        private readonly store: DocumentStore,
        private readonly clock: Clock = systemClock
    ) {}

    async execute(request: CreateRecurringUseCaseRequest): Promise<CreateRecurringUseCaseResponse> {
        // Amount and type are stored exactly as given.
        const recurring = buildRecurring(request, this.clock());

        try {
            const id = await this.store.insert('recurring', recurring);

            logger.info('Recurring schedule created', {
                recurringId: id,
                clientId: recurring.client_id,
                frequency: recurring.frequency,
                nextDueDate: recurring.next_due_date.toISOString()
            });

            return { id };
        } catch (error) {
            logger.error('Failed to create recurring schedule', error, { clientId: request.clientId });
            throw error;
        }
    }
}
