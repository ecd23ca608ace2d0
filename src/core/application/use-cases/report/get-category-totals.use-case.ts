import { computeCategoryTotals, CategoryTotals } from '../../../domain/services/ledger.service';
import { DocumentStore } from '../../../../infrastructure/database/document-store';

export interface GetCategoryTotalsUseCaseRequest {
    clientId: string;
}

export interface GetCategoryTotalsUseCaseResponse {
    categories: CategoryTotals;
}

export class GetCategoryTotalsUseCase {
    constructor(private readonly store: DocumentStore) {}

    async execute(request: GetCategoryTotalsUseCaseRequest): Promise<GetCategoryTotalsUseCaseResponse> {
        const transactions = await this.store.find('transaction', { client_id: request.clientId });
        return { categories: computeCategoryTotals(transactions) };
    }
}
