import { DocumentStore } from '../../../../infrastructure/database/document-store';
import { SerializedDocument, serializeDocuments } from '../../../../shared/utils/serialization.util';

export interface ListRecurringUseCaseRequest {
    clientId: string;
}

export interface ListRecurringUseCaseResponse {
    items: SerializedDocument[];
}

export class ListRecurringUseCase {
    constructor(private readonly store: DocumentStore) {}

    async execute(request: ListRecurringUseCaseRequest): Promise<ListRecurringUseCaseResponse> {
        const documents = await this.store.find('recurring', { client_id: request.clientId });
        return { items: serializeDocuments(documents) };
    }
}
