import { DocumentStore, StoredDocument } from '../../../../infrastructure/database/document-store';
import { logger } from '../../../../infrastructure/monitoring/logger.service';
import { SerializedDocument, serializeDocuments } from '../../../../shared/utils/serialization.util';

export const DEFAULT_LIST_LIMIT = 200;

export interface ListTransactionsUseCaseRequest {
    clientId: string;
    category?: string;
    limit?: number;
}

export interface ListTransactionsUseCaseResponse {
    items: SerializedDocument[];
}

function dateKey(document: StoredDocument): number {
    const value = document.date;
    if (value instanceof Date) {
        return value.getTime();
    }
    if (typeof value === 'string') {
        const parsed = Date.parse(value);
        return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
    }
    return Number.NEGATIVE_INFINITY;
}

export class ListTransactionsUseCase {
    constructor(private readonly store: DocumentStore) {}

    /**
     * The limit is applied by the store before sorting, so with more than
     * `limit` matches the page is not guaranteed to hold the newest ones.
     */
    async execute(request: ListTransactionsUseCaseRequest): Promise<ListTransactionsUseCaseResponse> {
        const limit = request.limit ?? DEFAULT_LIST_LIMIT;
        const filter: Record<string, string> = { client_id: request.clientId };

        // An empty category means "any category".
        if (request.category) {
            filter.category = request.category;
        }

        logger.debug('Listing transactions', { filter, limit });

        const documents = await this.store.find('transaction', filter, limit);
        const sorted = [...documents].sort((left, right) => dateKey(right) - dateKey(left));

        return { items: serializeDocuments(sorted) };
    }
}
