import { buildTransaction, NewTransaction } from '../../../domain/entities/transaction.entity';
import { DocumentStore } from '../../../../infrastructure/database/document-store';
import { logger } from '../../../../infrastructure/monitoring/logger.service';
import { Clock, systemClock } from '../../../../shared/types/common.types';

export type CreateTransactionUseCaseRequest = NewTransaction;

export interface CreateTransactionUseCaseResponse {
    id: string;
}

export class CreateTransactionUseCase {
    constructor(
        private readonly store: DocumentStore,
        private readonly clock: Clock = systemClock
    ) {}

    async execute(request: CreateTransactionUseCaseRequest): Promise<CreateTransactionUseCaseResponse> {
        const transaction = buildTransaction(request, this.clock());

        try {
            const id = await this.store.insert('transaction', transaction);

            logger.info('Transaction created', {
                transactionId: id,
                clientId: transaction.client_id,
                type: transaction.type,
                amount: transaction.amount
            });

            return { id };
        } catch (error) {
            logger.error('Failed to create transaction', error, {
                clientId: request.clientId,
                type: request.type
            });
            throw error;
        }
    }
}
