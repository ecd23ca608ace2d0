import { summarizeLedger, CategoryTotals } from '../../../domain/services/ledger.service';
import { DocumentStore } from '../../../../infrastructure/database/document-store';
import { logger } from '../../../../infrastructure/monitoring/logger.service';
import { NotFoundException } from '../../../../shared/exceptions/not-found.exception';
import { SerializedDocument, serializeDocuments } from '../../../../shared/utils/serialization.util';

export interface ResolveShareUseCaseRequest {
    token: string;
}

export interface ResolveShareUseCaseResponse {
    client_id: string;
    balance: number;
    items: SerializedDocument[];
    categories: CategoryTotals;
}

/**
 * Public dashboard behind a share token: the owner's full transaction
 * list, balance and per-category totals. The token is the only check.
 */
export class ResolveShareUseCase {
    constructor(private readonly store: DocumentStore) {}

    async execute(request: ResolveShareUseCaseRequest): Promise<ResolveShareUseCaseResponse> {
        const [share] = await this.store.find('share', { token: request.token }, 1);

        if (!share || typeof share.client_id !== 'string') {
            logger.warn('Share token not found');
            throw new NotFoundException('Share not found');
        }

        const clientId = share.client_id;
        const transactions = await this.store.find('transaction', { client_id: clientId });
        const { balance, categories } = summarizeLedger(transactions);

        return {
            client_id: clientId,
            balance,
            items: serializeDocuments(transactions),
            categories
        };
    }
}
